/**
 * Error taxonomy for the overlay state core.
 *
 * Each error carries a machine-readable `code`. Only {@link ColdStartFailureError}
 * is ever surfaced to readers; the rest are carried in result unions and
 * turned into retries, stale-serving, or a mode downgrade.
 *
 * @module overlay/errors
 */

/** Machine-readable error codes for overlay state failures. */
export type OverlayStateErrorCode =
  | 'EXECUTION_TIMEOUT'
  | 'EXECUTION_FAILURE'
  | 'PARSE_ERROR'
  | 'REMOTE_UNAVAILABLE'
  | 'REMOTE_UNAUTHORIZED'
  | 'COLD_START_FAILURE';

export class OverlayStateError extends Error {
  constructor(
    message: string,
    public readonly code: OverlayStateErrorCode,
  ) {
    super(message);
    this.name = 'OverlayStateError';
  }
}

export class ExecutionTimeoutError extends OverlayStateError {
  constructor(public readonly timeoutMs: number) {
    super(`agent command timed out after ${timeoutMs}ms`, 'EXECUTION_TIMEOUT');
    this.name = 'ExecutionTimeoutError';
  }
}

export class ExecutionFailureError extends OverlayStateError {
  constructor(
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    const detail = stderr.trim() ? `: ${stderr.trim().slice(0, 200)}` : '';
    super(`agent command failed with code ${exitCode ?? 'unknown'}${detail}`, 'EXECUTION_FAILURE');
    this.name = 'ExecutionFailureError';
  }
}

export class ParseError extends OverlayStateError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class RemoteUnavailableError extends OverlayStateError {
  constructor(
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message, 'REMOTE_UNAVAILABLE');
    this.name = 'RemoteUnavailableError';
  }
}

export class RemoteUnauthorizedError extends OverlayStateError {
  constructor(public readonly status: number) {
    super(`remote API rejected credentials (HTTP ${status})`, 'REMOTE_UNAUTHORIZED');
    this.name = 'RemoteUnauthorizedError';
  }
}

/** Raised to every waiter when the slot holds no snapshot and a refresh fails. */
export class ColdStartFailureError extends OverlayStateError {
  constructor(public readonly reason: string) {
    super(`overlay state unavailable: ${reason}`, 'COLD_START_FAILURE');
    this.name = 'ColdStartFailureError';
  }
}

/** Whether a refresh failure is worth one retry. Parse failures never are. */
export function isRetryable(err: OverlayStateError): boolean {
  return err.code === 'EXECUTION_TIMEOUT' || err.code === 'EXECUTION_FAILURE';
}
