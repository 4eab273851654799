import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { PlanGraph } from '../../graph/plan-graph.js';

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check a plan document against the plan schema')
    .argument('<plan-file>', 'Path to plan XML file')
    .option('--json', 'Output result as JSON')
    .action(
      withErrorHandler(async (planFile: string, options: { json?: boolean }) => {
        const resolvedPath = resolve(planFile);
        const engine = new PlanGraph();
        engine.buildFromFile(resolvedPath);

        const plan = engine.plan;
        const nodes = engine.graph.nodeCount;

        if (options.json) {
          console.log(JSON.stringify({
            file: resolvedPath,
            valid: true,
            version: plan?.version ?? null,
            epics: plan?.epics.length ?? 0,
            nodes,
          }));
          return;
        }

        console.log(chalk.green(`✓ ${planFile} is valid`));
        console.log(`  version ${plan?.version ?? '?'}, ${plan?.epics.length ?? 0} epics, ${nodes} nodes`);
      }),
    );
}
