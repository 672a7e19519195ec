import type { RepoContext } from '@domain/types/code-context.js';
import type { ServiceCallOptions, ServiceResult } from './reasoning-service.js';

/**
 * Port interface for reading context files from the repository whose build
 * failed. A source is bound to one repository. Missing files are not errors.
 */
export interface ICodeContextSource {
  readonly name: string;
  fetch(options: ServiceCallOptions): Promise<ServiceResult<RepoContext>>;
}
