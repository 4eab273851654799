import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { loadConfig } from '../../config/loader.js';
import { PlanGraph } from '../../graph/plan-graph.js';

interface ReadyCommandOptions {
  includeInProgress?: boolean;
  sort?: boolean;
  json?: boolean;
  config?: string;
}

export function createReadyCommand(): Command {
  return new Command('ready')
    .description('List tasks whose direct dependencies are all complete')
    .argument('<plan-file>', 'Path to plan XML file')
    .option('--include-in-progress', 'Also list tasks already in progress')
    .option('--sort', 'Sort task ids alphabetically')
    .option('--json', 'Output result as JSON')
    .option('--config <path>', 'Path to a plangraph config file')
    .action(
      withErrorHandler(async (planFile: string, options: ReadyCommandOptions) => {
        const config = loadConfig(options.config);
        const engine = new PlanGraph();
        engine.buildFromFile(resolve(planFile));

        const tasks = engine.getReadyTasks({
          include_in_progress: options.includeInProgress ?? config.include_in_progress,
        });
        if (options.sort) tasks.sort();

        if (options.json) {
          console.log(JSON.stringify({ tasks }));
          return;
        }

        if (tasks.length === 0) {
          console.log(chalk.dim('No tasks are ready.'));
          return;
        }

        for (const id of tasks) {
          console.log(id);
        }
      }),
    );
}
