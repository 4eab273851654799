import { Command } from 'commander';
import { resolve } from 'node:path';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { loadConfig } from '../../config/loader.js';
import { PlanGraph } from '../../graph/plan-graph.js';
import { RENDER_FORMATS, toRenderFormat } from '../../render/index.js';

interface RenderCommandOptions {
  format: string;
  status?: boolean;
  descriptions?: boolean;
  config?: string;
}

export function createRenderCommand(): Command {
  return new Command('render')
    .description('Render the plan graph as an outline, Mermaid flowchart or Graphviz DOT')
    .argument('<plan-file>', 'Path to plan XML file')
    .option('-f, --format <format>', `Output format (${RENDER_FORMATS.join(', ')})`, 'outline')
    .option('--status', 'Show status in the outline')
    .option('--no-status', 'Hide status in the outline')
    .option('--descriptions', 'Label flowchart and DOT nodes with descriptions')
    .option('--no-descriptions', 'Leave flowchart and DOT nodes unlabelled')
    .option('--config <path>', 'Path to a plangraph config file')
    .action(
      withErrorHandler(async (planFile: string, options: RenderCommandOptions) => {
        const format = toRenderFormat(options.format);
        const config = loadConfig(options.config);
        const engine = new PlanGraph();
        engine.buildFromFile(resolve(planFile));

        const include_status = options.status ?? config.include_status;
        const include_descriptions = options.descriptions ?? config.include_descriptions;

        switch (format) {
          case 'outline':
            console.log(engine.toOutline({ include_status }));
            break;
          case 'flowchart':
            console.log(engine.toFlowchart({ include_descriptions }));
            break;
          case 'dot':
            console.log(engine.toDot({ include_descriptions }));
            break;
        }
      }),
    );
}
