import { z } from 'zod/v4';

export const RepoFileSchema = z.object({
  /** Path from the repository root. */
  path: z.string(),
  content: z.string(),
  /** Set when `content` was cut to the size limit. */
  truncated: z.boolean(),
});

export type RepoFile = z.infer<typeof RepoFileSchema>;

/**
 * Files from the failing repository that help research: dependency
 * manifests at the root and the GitHub Actions workflow definitions.
 */
export const RepoContextSchema = z.object({
  /** `owner/repo`. */
  repository: z.string(),
  /** In manifest priority order. */
  manifests: z.array(RepoFileSchema),
  workflows: z.array(RepoFileSchema),
});

export type RepoContext = z.infer<typeof RepoContextSchema>;
