import { Command } from 'commander';
import { createValidateCommand } from './commands/validate/index.js';
import { createReadyCommand } from './commands/ready/index.js';
import { createRenderCommand } from './commands/render/index.js';

export const VERSION = '0.1.0';

/** Build a fresh command tree; commander keeps parsed option values on each instance */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('plangraph')
    .description('plangraph: epic/story/task plans as a dependency graph')
    .version(VERSION);

  program.addCommand(createValidateCommand());
  program.addCommand(createReadyCommand());
  program.addCommand(createRenderCommand());

  return program;
}
