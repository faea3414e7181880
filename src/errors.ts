/**
 * Failure taxonomy for a single order invocation.
 *
 * Each terminal error carries the process exit code it maps to, so callers
 * can tell bad flags, bad credentials and exchange rejections apart without
 * reading log text.
 */

export enum ExitCode {
  Success = 0,
  ConfigurationError = 1,
  ValidationError = 2,
  SubmissionError = 3
}

export class ConfigurationError extends Error {
  readonly exitCode = ExitCode.ConfigurationError;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ValidationError extends Error {
  readonly exitCode = ExitCode.ValidationError;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export interface RemoteErrorDetail {
  readonly message: string;
  readonly code?: number;
  readonly status?: number;
}

/**
 * Raised by the REST transport when the exchange rejects a request or
 * replies with something that is not an order.
 */
export class FuturesApiError extends Error {
  readonly code?: number;
  readonly status?: number;

  constructor(detail: RemoteErrorDetail) {
    super(detail.message);
    this.name = "FuturesApiError";
    this.code = detail.code;
    this.status = detail.status;
  }
}

export class SubmissionError extends Error {
  readonly exitCode = ExitCode.SubmissionError;
  readonly code?: number;
  readonly status?: number;

  constructor(detail: RemoteErrorDetail, options?: { cause?: unknown }) {
    super(detail.message, options);
    this.name = "SubmissionError";
    this.code = detail.code;
    this.status = detail.status;
  }

  /** Wraps whatever the single remote call rejected with, keeping its message and code. */
  static from(error: unknown): SubmissionError {
    if (error instanceof FuturesApiError) {
      return new SubmissionError(
        { message: error.message, code: error.code, status: error.status },
        { cause: error }
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    return new SubmissionError({ message }, { cause: error });
  }
}
