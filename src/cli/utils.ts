import { resolve } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import type { z } from 'zod/v4';
import { loadConfig, type LoadedConfig } from '@infra/config/config-loader.js';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { ValidationError } from '@shared/lib/errors.js';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  logJson: boolean;
  cwd?: string;
  config?: string;
}

export interface CommandContext {
  globalOpts: GlobalOptions;
  /** Absolute working directory (`--cwd` or process.cwd()). */
  cwd: string;
  cmd: Command;
}

type CommandHandler = (ctx: CommandContext) => void | Promise<void>;

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Extract global CLI options from a Commander command.
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  return {
    json: !!opts['json'],
    verbose: !!opts['verbose'],
    logJson: !!opts['logJson'],
    cwd: optionalString(opts['cwd']),
    config: optionalString(opts['config']),
  };
}

/** Point the global logger at the flags; `--verbose` beats any configured level. */
export function configureLogger(globalOpts: GlobalOptions, configuredLevel?: 'debug' | 'info' | 'warn' | 'error'): void {
  setLoggerOptions({
    level: globalOpts.verbose ? 'debug' : configuredLevel ?? 'info',
    json: globalOpts.logJson,
  });
}

/**
 * Wrap a CLI command handler with standard boilerplate:
 * extracts global options, resolves the working directory, catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd).
 * Handlers read positionals and local options from `ctx.cmd`.
 */
export function withCommandContext(handler: CommandHandler): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args.at(-1);
    if (!(cmd instanceof Command)) {
      throw new Error('withCommandContext: action was not called with a Command');
    }
    const globalOpts = getGlobalOptions(cmd);

    try {
      const cwd = resolve(globalOpts.cwd ?? process.cwd());
      await handler({ globalOpts, cwd, cmd });
    } catch (error) {
      handleCommandError(error, globalOpts.verbose);
    }
  };
}

/** Load the project config for a command and apply its log level. */
export function loadCommandConfig(ctx: CommandContext): LoadedConfig {
  const loaded = loadConfig(ctx.cwd, ctx.globalOpts.config);
  configureLogger(ctx.globalOpts, loaded.config.logLevel);
  return loaded;
}

/**
 * Validate a command's local options against a schema.
 * @throws ValidationError listing each bad option
 */
export function parseCommandOptions<T>(cmd: Command, schema: z.ZodType<T>): T {
  const result = schema.safeParse(cmd.opts());
  if (!result.success) {
    const detail = result.error.issues.map((i) => `--${i.path.map(String).join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid options: ${detail}`, result.error.issues);
  }
  return result.data;
}

/** Commander argument parser for integer flags. */
export function parseInteger(min: number): (value: string) => number {
  return (value: string) => {
    const n = Number(value);
    if (value.trim() === '' || !Number.isInteger(n) || n < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return n;
  };
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and optionally the stack trace if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
