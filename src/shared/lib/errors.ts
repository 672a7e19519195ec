export class BuildBriefError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BuildBriefError';
  }
}

export class ConfigError extends BuildBriefError {
  constructor(path: string, detail: string) {
    super(`Invalid configuration in ${path}: ${detail}`);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends BuildBriefError {
  constructor(
    message: string,
    public readonly issues: unknown[],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when the pipeline's own state machine is driven out of order.
 * Indicates a programming error, not a service failure.
 */
export class OrchestratorError extends BuildBriefError {
  constructor(message: string) {
    super(message);
    this.name = 'OrchestratorError';
  }
}

export class ServiceConfigError extends BuildBriefError {
  constructor(service: string, envVar: string) {
    super(`${service} is not configured: set ${envVar} in the environment.`);
    this.name = 'ServiceConfigError';
  }
}

export class InvalidBuildRefError extends BuildBriefError {
  constructor(ref: string) {
    super(`Invalid build reference: "${ref}". Expected "owner/repo" or "owner/repo#<run-id>".`);
    this.name = 'InvalidBuildRefError';
  }
}

export class LogSourceError extends BuildBriefError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'LogSourceError';
  }
}
