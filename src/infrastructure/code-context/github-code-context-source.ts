import { Octokit } from '@octokit/rest';
import type { ICodeContextSource } from '@domain/ports/code-context-source.js';
import type { ServiceCallOptions, ServiceResult } from '@domain/ports/reasoning-service.js';
import type { SecretEnv } from '@domain/ports/service-resolver.js';
import type { RepoContext, RepoFile } from '@domain/types/code-context.js';
import { ENV_KEYS } from '@shared/constants/paths.js';
import { ServiceConfigError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { err, ok } from '@shared/lib/result.js';
import { sliceHead } from '@shared/lib/text.js';

/** Dependency manifests looked for at the repository root, most useful first. */
export const MANIFEST_FILES = [
  'package.json',
  'requirements.txt',
  'pyproject.toml',
  'setup.py',
  'Pipfile',
  'go.mod',
  'Cargo.toml',
  'Gemfile',
  'Dockerfile',
] as const;

export const WORKFLOWS_DIR = '.github/workflows';
/** Files above this size are skipped unread. */
export const MAX_FILE_BYTES = 100 * 1024;
export const MAX_CONTENT_LENGTH = 10_000;
export const TRUNCATION_MARKER = '\n\n... [truncated]';

export interface RepoEntry {
  path: string;
  type: string;
  size: number;
}

/** The GitHub contents calls this source needs. Both answer undefined for a 404. */
export interface GitHubContentsClient {
  listDirectory(owner: string, repo: string, path: string, signal: AbortSignal): Promise<RepoEntry[] | undefined>;
  readFile(owner: string, repo: string, path: string, signal: AbortSignal): Promise<string | undefined>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'status' in error && error.status === 404;
}

function manifestRank(path: string): number {
  return MANIFEST_FILES.findIndex((name) => name === path);
}

/**
 * Reads dependency manifests and workflow files from one GitHub repository.
 */
export class GitHubCodeContextSource implements ICodeContextSource {
  readonly name = 'github';

  constructor(
    private readonly client: GitHubContentsClient,
    private readonly owner: string,
    private readonly repo: string,
  ) {}

  /** @throws ServiceConfigError when GITHUB_TOKEN is unset */
  static fromEnv(owner: string, repo: string, env: SecretEnv = process.env): GitHubCodeContextSource {
    const token = env[ENV_KEYS.github];
    if (!token) throw new ServiceConfigError('github', ENV_KEYS.github);
    const octokit = new Octokit({ auth: token });

    const client: GitHubContentsClient = {
      async listDirectory(owner, repo, path, signal) {
        try {
          const { data } = await octokit.rest.repos.getContent({ owner, repo, path, request: { signal } });
          if (!Array.isArray(data)) return undefined;
          return data.map((entry) => ({ path: entry.path, type: entry.type, size: entry.size }));
        } catch (error) {
          if (isNotFound(error)) return undefined;
          throw error;
        }
      },
      async readFile(owner, repo, path, signal) {
        try {
          const { data } = await octokit.rest.repos.getContent({ owner, repo, path, request: { signal } });
          if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) return undefined;
          return Buffer.from(data.content, 'base64').toString('utf-8');
        } catch (error) {
          if (isNotFound(error)) return undefined;
          throw error;
        }
      },
    };
    return new GitHubCodeContextSource(client, owner, repo);
  }

  async fetch(options: ServiceCallOptions): Promise<ServiceResult<RepoContext>> {
    const repository = `${this.owner}/${this.repo}`;
    try {
      const root = (await this.client.listDirectory(this.owner, this.repo, '', options.signal)) ?? [];
      const manifestEntries = root
        .filter((entry) => entry.type === 'file' && manifestRank(entry.path) >= 0)
        .sort((a, b) => manifestRank(a.path) - manifestRank(b.path));

      const workflowEntries = ((await this.client.listDirectory(this.owner, this.repo, WORKFLOWS_DIR, options.signal)) ?? [])
        .filter((entry) => entry.type === 'file' && /\.ya?ml$/.test(entry.path))
        .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

      const context: RepoContext = {
        repository,
        manifests: await this.readFiles(manifestEntries, options.signal),
        workflows: await this.readFiles(workflowEntries, options.signal),
      };
      logger.debug('Fetched repository context', {
        repo: repository,
        manifests: context.manifests.length,
        workflows: context.workflows.length,
      });
      return ok(context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err({ kind: 'unavailable', message: `Cannot read ${repository}: ${message}` });
    }
  }

  private async readFiles(entries: readonly RepoEntry[], signal: AbortSignal): Promise<RepoFile[]> {
    const files: RepoFile[] = [];
    for (const entry of entries) {
      if (entry.size > MAX_FILE_BYTES) {
        logger.debug('Skipping large repository file', { path: entry.path, size: entry.size });
        continue;
      }
      const content = await this.client.readFile(this.owner, this.repo, entry.path, signal);
      if (content === undefined) continue;
      const truncated = content.length > MAX_CONTENT_LENGTH;
      files.push({
        path: entry.path,
        content: truncated ? sliceHead(content, MAX_CONTENT_LENGTH) + TRUNCATION_MARKER : content,
        truncated,
      });
    }
    return files;
  }
}
