import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { ScenarioError, toError } from '../core/errors.js';
import { httpSmokeScenario } from './http-smoke.js';
import type { Scenario } from './types.js';

export { defineScenario, type Scenario, type ScenarioKit } from './types.js';
export { httpSmokeScenario, type SmokeState } from './http-smoke.js';

const BUILTIN = new Map<string, Scenario<unknown>>([
  [httpSmokeScenario.name, httpSmokeScenario],
]);

export function builtinScenarioNames(): string[] {
  return [...BUILTIN.keys()];
}

export function isScenario(value: unknown): value is Scenario<unknown> {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'name' in value && typeof value.name === 'string' &&
    'createState' in value && typeof value.createState === 'function' &&
    'register' in value && typeof value.register === 'function'
  );
}

/**
 * Resolve a built-in scenario by name, or import a module whose default
 * (or `scenario`) export is a scenario.
 */
export async function loadScenario(nameOrPath: string, cwd: string = process.cwd()): Promise<Scenario<unknown>> {
  const builtin = BUILTIN.get(nameOrPath);
  if (builtin) return builtin;

  let mod: unknown;
  try {
    mod = await import(pathToFileURL(resolve(cwd, nameOrPath)).href);
  } catch (err) {
    throw new ScenarioError(
      `Unknown scenario "${nameOrPath}" (built-in: ${builtinScenarioNames().join(', ')})`,
      nameOrPath,
      toError(err),
    );
  }

  if (typeof mod === 'object' && mod !== null) {
    const candidate = 'default' in mod ? mod.default : 'scenario' in mod ? mod.scenario : undefined;
    if (isScenario(candidate)) return candidate;
  }
  throw new ScenarioError(`Module "${nameOrPath}" does not export a scenario`, nameOrPath);
}
