/**
 * geo-harvest Error Types
 *
 * Fetch-level failures never leave the per-key fetcher; these errors cover
 * configuration, input validation, and the export stage, which are fatal.
 */

/**
 * Invalid postal-code range requested by the operator
 */
export class RangeValidationError extends Error {
  constructor(
    message: string,
    public readonly start: number,
    public readonly end: number
  ) {
    super(message);
    this.name = 'RangeValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RangeValidationError);
    }
  }
}

/**
 * Harvest controller misuse (bad concurrency, duplicate keys)
 */
export class HarvestConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HarvestConfigError';
  }
}

/**
 * Configuration file, environment or flags produced an unusable configuration
 */
export class ConfigValidationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], source?: string) {
    super(
      `Invalid configuration${source ? ` in ${source}` : ''}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Required credential absent from the environment
 */
export class MissingCredentialError extends Error {
  readonly variable: string;

  constructor(variable: string) {
    super(`Missing credential: set ${variable} in the environment`);
    this.name = 'MissingCredentialError';
    this.variable = variable;
  }
}

/**
 * Writing or uploading the exported dataset failed
 */
export class ExportError extends Error {
  readonly stage: 'write' | 'upload';
  readonly filePath: string;
  readonly cause: Error;

  constructor(stage: 'write' | 'upload', filePath: string, cause: Error) {
    super(`Export ${stage} failed for ${filePath}: ${cause.message}`);
    this.name = 'ExportError';
    this.stage = stage;
    this.filePath = filePath;
    this.cause = cause;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
