import type { ZodIssue } from 'zod';

/**
 * Invalid screen configuration, rejected before any ticker is fetched
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  ${i}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  static fromZodIssues(issues: ZodIssue[]): ConfigurationError {
    return new ConfigurationError(
      issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message
      )
    );
  }
}

/**
 * The ticker universe could not be resolved, so nothing can be screened
 */
export class UniverseUnavailableError extends Error {
  readonly code = 'UNIVERSE_UNAVAILABLE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UniverseUnavailableError';
  }
}
