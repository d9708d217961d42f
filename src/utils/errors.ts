/**
 * Error taxonomy for the publishing pipeline.
 *
 * Every stage failure is one of these; the orchestrator turns them into a `false`
 * run result, so nothing here is meant to reach a process boundary.
 */

export type PipelineErrorCode =
  | 'CONFIG'
  | 'PROVIDER'
  | 'VERIFICATION'
  | 'QUOTA'
  | 'UPLOAD'
  | 'USER_STOP';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

/** A required credential or setting is missing. Not retryable without user action. */
export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
    this.name = 'ConfigError';
  }
}

export type ProviderFailureReason = 'failure' | 'timeout';

export class ProviderError extends PipelineError {
  readonly provider: string;
  readonly reason: ProviderFailureReason;

  constructor(
    provider: string,
    message: string,
    options: { reason?: ProviderFailureReason; cause?: unknown } = {}
  ) {
    super('PROVIDER', message, { cause: options.cause });
    this.name = 'ProviderError';
    this.provider = provider;
    this.reason = options.reason ?? 'failure';
  }
}

/** An artifact is missing or empty after a stage that reported success. */
export class VerificationError extends PipelineError {
  readonly artifactPath: string;

  constructor(artifactPath: string, message: string) {
    super('VERIFICATION', message);
    this.name = 'VerificationError';
    this.artifactPath = artifactPath;
  }
}

/** Provider-side rate limit or daily/weekly cap. */
export class QuotaError extends PipelineError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super('QUOTA', message, options);
    this.name = 'QuotaError';
    this.provider = provider;
  }
}

export class UploadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPLOAD', message, options);
    this.name = 'UploadError';
  }
}

/** Cooperative cancellation. Not a failure: never reported with an error status. */
export class UserStop extends PipelineError {
  constructor(message = 'Run stopped by request') {
    super('USER_STOP', message);
    this.name = 'UserStop';
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/** HTTP status carried by SDK errors (`status`) or axios errors (`response.status`). */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }
  return undefined;
}

/**
 * Map a failed provider call onto the taxonomy. Pipeline errors pass through untouched.
 */
export function toProviderError(provider: string, error: unknown, action: string): PipelineError {
  if (isPipelineError(error)) return error;

  const status = httpStatusOf(error);
  const detail = describeError(error);
  if (status === 429) {
    return new QuotaError(provider, `${provider} rate limit or quota reached while ${action}: ${detail}`, { cause: error });
  }
  if (status === 401 || status === 403) {
    return new ConfigError(`${provider} rejected the configured credentials while ${action}: ${detail}`, { cause: error });
  }
  return new ProviderError(provider, `${provider} failed while ${action}: ${detail}`, { cause: error });
}
