import { Command } from 'commander';
import { configureLogger, getGlobalOptions } from './utils.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerRenderCommand } from './commands/render.js';
import { registerConfigCommand } from './commands/config.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('buildbrief')
    .description('Turn a failed CI build into a debugging brief: classified root cause and ranked fixes')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-json', 'Write log lines as JSON')
    .option('--cwd <path>', 'Set working directory')
    .option('--config <path>', 'Path to buildbrief.config.json');

  // Wire --verbose / --log-json to logger before any command runs
  program.hook('preAction', (_thisCommand, actionCommand) => {
    configureLogger(getGlobalOptions(actionCommand));
  });

  registerAnalyzeCommand(program);
  registerRenderCommand(program);
  registerConfigCommand(program);

  return program;
}
