import { resolve } from 'node:path';
import type { Command } from 'commander';
import { z } from 'zod/v4';
import type { BuildFailureRef } from '@domain/ports/build-log-source.js';
import { DebuggingBriefSchema, type AnalyzeResult } from '@domain/types/brief.js';
import { AnalyzeRunner } from '@features/analyze/analyze-runner.js';
import { applyOverrides } from '@infra/config/config-loader.js';
import { parseBuildRef } from '@infra/logs/build-ref.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { BUILDBRIEF_FILES } from '@shared/constants/paths.js';
import { logger } from '@shared/lib/logger.js';
import { formatBriefMarkdown, formatBriefSummary, formatFailure } from '@cli/formatters/brief-formatter.js';
import {
  loadCommandConfig,
  parseCommandOptions,
  parseInteger,
  withCommandContext,
  type CommandContext,
} from '@cli/utils.js';

/** Exit code for an analysis that ran but produced no brief. */
export const ANALYSIS_FAILED_EXIT_CODE = 2;

const AnalyzeCommandOptionsSchema = z.object({
  repo: z.string().optional(),
  run: z.number().int().positive().optional(),
  maxCandidates: z.number().int().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).optional(),
  search: z.boolean().default(true),
  format: z.enum(['summary', 'markdown', 'json']).default('summary'),
  /** `--out` alone writes to the default file name. */
  out: z.union([z.string(), z.literal(true)]).optional(),
});

type AnalyzeCommandOptions = z.infer<typeof AnalyzeCommandOptionsSchema>;

function resolveRef(logFile: string | undefined, opts: AnalyzeCommandOptions, cwd: string): BuildFailureRef {
  if (opts.repo) {
    const ref = parseBuildRef(opts.repo);
    return opts.run !== undefined ? { ...ref, runId: opts.run } : ref;
  }
  if (opts.run !== undefined) {
    throw new Error('--run needs --repo <owner/repo>.');
  }
  if (!logFile) {
    throw new Error('Provide a log file, "-" to read stdin, or --repo <owner/repo[#run]>.');
  }
  return { kind: 'file', path: logFile === '-' ? '-' : resolve(cwd, logFile) };
}

function writeBrief(path: string, result: Extract<AnalyzeResult, { ok: true }>, asJson: boolean): void {
  if (asJson) {
    JsonStore.write(path, result.brief, DebuggingBriefSchema);
    return;
  }
  JsonStore.writeText(path, formatBriefMarkdown(result.brief));
}

function report(result: AnalyzeResult, format: AnalyzeCommandOptions['format']): void {
  if (format === 'json') {
    console.log(JSON.stringify(result.ok ? result.brief : result.failure, null, 2));
    return;
  }
  if (!result.ok) {
    console.error(formatFailure(result.failure));
    return;
  }
  console.log(format === 'markdown' ? formatBriefMarkdown(result.brief) : formatBriefSummary(result.brief));
}

async function handleAnalyze(ctx: CommandContext): Promise<void> {
  const opts = parseCommandOptions(ctx.cmd, AnalyzeCommandOptionsSchema);
  const ref = resolveRef(ctx.cmd.args[0], opts, ctx.cwd);
  const format = ctx.globalOpts.json ? 'json' : opts.format;

  const loaded = loadCommandConfig(ctx);
  const config = applyOverrides(loaded.config, {
    maxCandidates: opts.maxCandidates,
    timeoutMs: opts.timeoutMs,
    maxRetries: opts.maxRetries,
    noSearch: !opts.search,
  });

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupted, cancelling analysis');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let result: AnalyzeResult;
  try {
    result = await new AnalyzeRunner().run({ ref, config, signal: controller.signal });
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  report(result, format);

  if (!result.ok) {
    process.exitCode = ANALYSIS_FAILED_EXIT_CODE;
    return;
  }
  if (opts.out !== undefined) {
    const path = resolve(ctx.cwd, opts.out === true ? BUILDBRIEF_FILES.defaultBrief : opts.out);
    writeBrief(path, result, format === 'json');
    logger.info('Brief written', { path });
  }
}

export function registerAnalyzeCommand(parent: Command): void {
  parent
    .command('analyze')
    .description('Analyze a failed CI build log and produce a debugging brief')
    .argument('[log-file]', 'Build log to analyze ("-" reads stdin)')
    .option('--repo <ref>', 'GitHub repository, owner/repo or owner/repo#<run-id>')
    .option('--run <id>', 'Workflow run id (defaults to the latest failed run)', parseInteger(1))
    .option('--max-candidates <n>', 'Fix candidates to keep', parseInteger(1))
    .option('--timeout-ms <ms>', 'Deadline for each service call', parseInteger(1))
    .option('--max-retries <n>', 'Retries per stage', parseInteger(0))
    .option('--no-search', 'Skip web search and answer from general knowledge')
    .option('--format <format>', 'Output format: summary, markdown or json', 'summary')
    .option('--out [path]', `Also write the brief to a file (default ${BUILDBRIEF_FILES.defaultBrief})`)
    .action(withCommandContext(handleAnalyze));
}
