import type { Command } from 'commander';
import { DEFAULT_REASONING_MODEL } from '@domain/types/config.js';
import { describeSecrets } from '@infra/config/config-loader.js';
import { bold, dim, green, yellow } from '@shared/lib/ansi.js';
import { loadCommandConfig, withCommandContext } from '@cli/utils.js';

export function registerConfigCommand(parent: Command): void {
  parent
    .command('config')
    .description('Show the resolved configuration and which API keys are set')
    .action(
      withCommandContext((ctx) => {
        const { config, source } = loadCommandConfig(ctx);
        const secrets = describeSecrets();

        if (ctx.globalOpts.json) {
          console.log(JSON.stringify({ source: source ?? null, config, secrets }, null, 2));
          return;
        }

        console.log(bold('Configuration'));
        console.log(`  Source: ${source ?? dim('defaults (no buildbrief.config.json)')}`);
        const model = config.reasoning.model
          ?? (config.reasoning.backend === 'anthropic' ? DEFAULT_REASONING_MODEL : 'CLI default');
        console.log(`  Reasoning: ${config.reasoning.backend} (${model})`);
        console.log(`  Search: ${config.search.provider}, up to ${config.search.maxResults} results`);
        console.log(
          `  Analysis: ${config.analysis.maxCandidates} candidates, ` +
          `${config.analysis.timeoutMs}ms per call, ${config.analysis.maxRetries} retries`,
        );
        console.log(`  Log level: ${config.logLevel}`);
        console.log('');
        console.log(bold('API keys'));
        for (const [key, status] of Object.entries(secrets)) {
          console.log(`  ${key}: ${status === 'set' ? green('set') : yellow('missing')}`);
        }
      }),
    );
}
