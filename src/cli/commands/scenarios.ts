import { Command } from 'commander';
import { builtinScenarioNames } from '../../scenarios/index.js';

export function createScenariosCommand(): Command {
  return new Command('scenarios')
    .description('List built-in scenarios')
    .action(() => {
      for (const name of builtinScenarioNames()) {
        console.log(name);
      }
    });
}
