import { resolve } from 'node:path';
import type { Command } from 'commander';
import { z } from 'zod/v4';
import { DebuggingBriefSchema } from '@domain/types/brief.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { formatBriefMarkdown, formatBriefSummary } from '@cli/formatters/brief-formatter.js';
import { parseCommandOptions, withCommandContext } from '@cli/utils.js';

const RenderCommandOptionsSchema = z.object({
  format: z.enum(['markdown', 'summary']).default('markdown'),
});

/**
 * Re-render a brief saved with `analyze --format json --out`.
 * No service is called.
 */
export function registerRenderCommand(parent: Command): void {
  parent
    .command('render')
    .description('Render a saved JSON brief as markdown or a terminal summary')
    .argument('<brief-file>', 'Brief written by analyze --format json --out')
    .option('--format <format>', 'Output format: markdown or summary', 'markdown')
    .action(
      withCommandContext((ctx) => {
        const opts = parseCommandOptions(ctx.cmd, RenderCommandOptionsSchema);
        const file = ctx.cmd.args[0];
        if (!file) throw new Error('Missing brief file.');

        const brief = JsonStore.read(resolve(ctx.cwd, file), DebuggingBriefSchema);

        if (ctx.globalOpts.json) {
          console.log(JSON.stringify(brief, null, 2));
          return;
        }
        console.log(opts.format === 'summary' ? formatBriefSummary(brief) : formatBriefMarkdown(brief));
      }),
    );
}
