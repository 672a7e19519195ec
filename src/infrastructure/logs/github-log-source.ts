import { Octokit } from '@octokit/rest';
import AdmZip from 'adm-zip';
import axios from 'axios';
import type { BuildFailureRef, IBuildLogSource } from '@domain/ports/build-log-source.js';
import type { SecretEnv } from '@domain/ports/service-resolver.js';
import { ENV_KEYS } from '@shared/constants/paths.js';
import { LogSourceError, ServiceConfigError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

/** The GitHub Actions calls this source needs. */
export interface GitHubActionsClient {
  /** Id of the most recent failed workflow run, if any. */
  latestFailedRunId(owner: string, repo: string): Promise<number | undefined>;
  /** Short-lived download URL of the run's log archive. */
  logArchiveUrl(owner: string, repo: string, runId: number): Promise<string>;
  download(url: string): Promise<Buffer>;
}

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

/**
 * Join the `.txt` entries of a GitHub Actions log archive in name order,
 * each preceded by a `--- Log File: <name> ---` header. A payload that is
 * not a zip archive is returned as plain text.
 */
export function unpackLogArchive(payload: Buffer): string {
  if (!payload.subarray(0, ZIP_MAGIC.length).equals(ZIP_MAGIC)) {
    return payload.toString('utf-8');
  }
  const entries = new AdmZip(payload)
    .getEntries()
    .filter((entry) => !entry.isDirectory && entry.entryName.endsWith('.txt'))
    .sort((a, b) => (a.entryName < b.entryName ? -1 : a.entryName > b.entryName ? 1 : 0));

  if (entries.length === 0) {
    throw new LogSourceError('No .txt log files found in the downloaded archive');
  }
  return entries
    .map((entry) => `--- Log File: ${entry.entryName} ---\n${entry.getData().toString('utf-8')}`)
    .join('\n');
}

/** Fetches the logs of a GitHub Actions workflow run. */
export class GitHubLogSource implements IBuildLogSource {
  constructor(private readonly client: GitHubActionsClient) {}

  /** @throws ServiceConfigError when GITHUB_TOKEN is unset */
  static fromEnv(env: SecretEnv = process.env): GitHubLogSource {
    const token = env[ENV_KEYS.github];
    if (!token) throw new ServiceConfigError('github', ENV_KEYS.github);
    const octokit = new Octokit({ auth: token });

    return new GitHubLogSource({
      async latestFailedRunId(owner, repo) {
        const { data } = await octokit.rest.actions.listWorkflowRunsForRepo({
          owner,
          repo,
          status: 'failure',
          per_page: 1,
        });
        return data.workflow_runs[0]?.id;
      },
      async logArchiveUrl(owner, repo, runId) {
        const response = await octokit.rest.actions.downloadWorkflowRunLogs({ owner, repo, run_id: runId });
        return response.url;
      },
      async download(url) {
        const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
        return Buffer.from(response.data);
      },
    });
  }

  async fetchLog(ref: BuildFailureRef): Promise<string> {
    if (ref.kind !== 'github') {
      throw new LogSourceError(`GitHubLogSource cannot read a ${ref.kind} reference`);
    }
    const { owner, repo } = ref;
    const slug = `${owner}/${repo}`;

    let runId = ref.runId;
    let payload: Buffer;
    try {
      if (runId === undefined) {
        runId = await this.client.latestFailedRunId(owner, repo);
        if (runId === undefined) {
          throw new LogSourceError(`No failed workflow runs found in ${slug}`);
        }
        logger.info('Using latest failed run', { repo: slug, runId });
      }
      const url = await this.client.logArchiveUrl(owner, repo, runId);
      payload = await this.client.download(url);
    } catch (error) {
      if (error instanceof LogSourceError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new LogSourceError(`Cannot fetch logs for ${slug}${runId !== undefined ? ` run ${runId}` : ''}: ${message}`, error);
    }

    const log = unpackLogArchive(payload);
    logger.debug('Fetched run logs', { repo: slug, runId, length: log.length });
    return log;
  }
}
