import type { BuildFailureRef } from '@domain/ports/build-log-source.js';
import { InvalidBuildRefError } from '@shared/lib/errors.js';

const SHORT_REF = /^([\w.-]+)\/([\w.-]+?)(?:#(\d+))?$/;
const RUN_URL = /^https:\/\/github\.com\/([\w.-]+)\/([\w.-]+)\/actions\/runs\/(\d+)(?:[/?#].*)?$/;

/**
 * Parse a GitHub Actions build reference.
 *
 * Accepts `owner/repo`, `owner/repo#<run-id>` and a run page URL
 * (`https://github.com/owner/repo/actions/runs/<run-id>`).
 *
 * @throws InvalidBuildRefError for anything else
 */
export function parseBuildRef(input: string): Extract<BuildFailureRef, { kind: 'github' }> {
  const trimmed = input.trim();
  const match = SHORT_REF.exec(trimmed) ?? RUN_URL.exec(trimmed);
  if (!match) throw new InvalidBuildRefError(input);
  const [, owner, repo, rawRunId] = match;
  if (!owner || !repo) throw new InvalidBuildRefError(input);

  const runId = rawRunId !== undefined ? Number(rawRunId) : undefined;
  if (runId !== undefined && (!Number.isSafeInteger(runId) || runId <= 0)) {
    throw new InvalidBuildRefError(input);
  }
  return runId === undefined ? { kind: 'github', owner, repo } : { kind: 'github', owner, repo, runId };
}
