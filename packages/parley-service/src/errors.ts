/**
 * Error codes and error class for Parley
 *
 * @packageDocumentation
 */

/**
 * Error codes raised by the invitation core and its hosts
 *
 * Error codes are organized by category:
 * - 100-199: Invitation lifecycle
 * - 200-299: Delivery
 * - 300-399: Inbound payloads
 * - 400-499: Storage
 * - 900-999: Internal
 */
export enum ErrorCode {
  // Lifecycle (100-199)
  InvalidState = 100,
  NotFound = 101,
  CannotInviteSelf = 102,
  InvitationExists = 103,
  CompensationFailed = 104,

  // Delivery (200-299)
  RecipientUnreachable = 200,
  TransportError = 201,

  // Inbound payloads (300-399)
  MalformedPayload = 300,
  /** Push or relay traffic that is not invitation traffic at all */
  UnsupportedPayload = 301,

  // Storage (400-499)
  DuplicateId = 400,
  StorageCorrupted = 401,
  StorageWriteError = 402,

  // Internal (900-999)
  Internal = 900,
}

/**
 * Error from Parley
 */
export class ParleyError extends Error {
  /** Numeric error code */
  readonly code: ErrorCode;
  /** Whether the error is recoverable (the same call can be retried later) */
  readonly recoverable: boolean;
  /** Underlying failure, when this error wraps another */
  readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, recoverable: boolean = false, cause?: unknown) {
    super(message);
    this.name = 'ParleyError';
    this.code = code;
    this.recoverable = recoverable;
    this.cause = cause;
  }
}

/**
 * True when `err` is a ParleyError, optionally with the given code.
 */
export function isParleyError(err: unknown, code?: ErrorCode): err is ParleyError {
  return err instanceof ParleyError && (code === undefined || err.code === code);
}

/**
 * Normalize anything thrown into a ParleyError.
 */
export function toParleyError(err: unknown): ParleyError {
  if (err instanceof ParleyError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ParleyError(ErrorCode.Internal, message, false, err);
}
