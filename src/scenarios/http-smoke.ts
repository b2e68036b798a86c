import { defineScenario } from './types.js';

export interface SmokeState {
  /** Last status seen per path. */
  lastStatus: Map<string, number>;
}

/**
 * Generic scenario: every configured path must answer 2xx. Each path is a
 * check and an equally weighted load function; the level-up burst walks
 * all paths in order.
 */
export const httpSmokeScenario = defineScenario<SmokeState>({
  name: 'http-smoke',
  description: 'GET each configured path and expect a 2xx response',

  createState: () => ({ lastStatus: new Map() }),

  register(registry, kit) {
    const paths = kit.config.scenario.paths;

    for (const path of paths) {
      registry.registerCheck(`check ${path}`, async (ctx, state) => {
        const res = await kit.agent.get(path, { signal: ctx.signal });
        state.lastStatus.set(path, res.status);
      });

      registry.registerLoad(1, `load ${path}`, async (ctx, state) => {
        const res = await kit.agent.get(path, { signal: ctx.signal });
        state.lastStatus.set(path, res.status);
      });
    }

    registry.registerLevelUpLoad(1, 'walk all paths', async (ctx, state) => {
      for (const path of paths) {
        if (ctx.signal.aborted) return;
        const res = await kit.agent.get(path, { signal: ctx.signal });
        state.lastStatus.set(path, res.status);
      }
    });
  },
});
