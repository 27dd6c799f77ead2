/**
 * Custom Error Classes
 */

/**
 * Base error class for all syncprobe errors
 */
export class SyncProbeError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'SyncProbeError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid uploads. Raised before anything touches disk.
 */
export class ValidationError extends SyncProbeError {
  public readonly field: string;

  constructor(field: string, message: string, statusCode: number = 400) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      statusCode,
      { field, message }
    );
    this.name = 'ValidationError';
    this.field = field;
  }
}

export interface ProbeExecutionDetails {
  stderr: string;
  exitCode?: number;
  timedOut?: boolean;
}

/**
 * The probe tool could not be run, exited non-zero or timed out.
 * `stderr` is the tool's own diagnostic text and is safe to return to callers.
 */
export class ProbeExecutionError extends SyncProbeError {
  public readonly stderr: string;
  public readonly exitCode?: number;
  public readonly timedOut: boolean;

  constructor(message: string, execution: ProbeExecutionDetails, options?: ErrorOptions) {
    super(
      message,
      'PROBE_EXECUTION_ERROR',
      422,
      {
        exitCode: execution.exitCode,
        timedOut: execution.timedOut ?? false,
        stderr: execution.stderr.substring(0, 1000),
      },
      options
    );
    this.name = 'ProbeExecutionError';
    this.stderr = execution.stderr;
    this.exitCode = execution.exitCode;
    this.timedOut = execution.timedOut ?? false;
  }
}

/**
 * The probe tool ran but its output was not the JSON document we expect.
 */
export class ProbeOutputError extends SyncProbeError {
  constructor(message: string, output: string, options?: ErrorOptions) {
    super(
      message,
      'PROBE_OUTPUT_ERROR',
      500,
      { output: output.substring(0, 200) },
      options
    );
    this.name = 'ProbeOutputError';
  }
}

/**
 * Anything else that went wrong while handling a request
 */
export class InternalError extends SyncProbeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INTERNAL_ERROR', 500, undefined, cause === undefined ? undefined : { cause });
    this.name = 'InternalError';
  }
}
