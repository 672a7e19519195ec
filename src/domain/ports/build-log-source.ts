/**
 * Names one failed CI execution.
 * - `file`: a log already on disk (`-` reads stdin)
 * - `github`: a GitHub Actions run; without `runId` the latest failed run is used
 */
export type BuildFailureRef =
  | { kind: 'file'; path: string }
  | { kind: 'github'; owner: string; repo: string; runId?: number };

export interface IBuildLogSource {
  fetchLog(ref: BuildFailureRef): Promise<string>;
}
