/**
 * SwitchyardError: type-safe error wrapper.
 *
 * Semantics:
 * - code is immutable; with() clones instead of mutating
 * - wrap(err, code) returns err unchanged when it already carries that code
 * - retryable and phase come from the code table, never from the caller
 */

import type { ErrorCode, ErrorPhase, SwitchyardErrorData } from "./codes.js";
import { getErrorMetadata } from "./codes.js";

export class SwitchyardError<E extends ErrorCode = ErrorCode> extends Error {
  readonly code: E;
  readonly details?: Record<string, unknown>;
  readonly retryable: boolean;
  readonly phase: ErrorPhase;

  constructor(
    code: E,
    message?: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    const metadata = getErrorMetadata(code);
    super(message ?? metadata.message, options);
    this.name = "SwitchyardError";
    this.code = code;
    this.details = details;
    this.retryable = metadata.retryable;
    this.phase = metadata.phase;
  }

  /**
   * Wrap unknown error with a code (preserves the original as cause).
   */
  static wrap(
    err: unknown,
    code: ErrorCode = "INTERNAL_INCONSISTENCY",
    details?: Record<string, unknown>,
  ): SwitchyardError {
    if (err instanceof SwitchyardError && err.code === code) {
      return err;
    }
    const message = err instanceof Error ? err.message : String(err);
    return new SwitchyardError(code, message, details, { cause: err });
  }

  /**
   * Clone with new code or details (never mutate).
   */
  with<E2 extends ErrorCode = E>(opts: {
    code?: E2;
    details?: Record<string, unknown>;
  }): SwitchyardError<E | E2> {
    return new SwitchyardError<E | E2>(
      opts.code ?? this.code,
      this.message,
      opts.details ?? this.details,
      { cause: this.cause },
    );
  }

  toJSON(): SwitchyardErrorData {
    const result: SwitchyardErrorData = {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      phase: this.phase,
    };
    if (this.details !== undefined) {
      result.details = this.details;
    }
    return result;
  }
}

/**
 * Narrow an unknown rejection to SwitchyardError, optionally of one code.
 */
export function isSwitchyardError<E extends ErrorCode>(
  err: unknown,
  code?: E,
): err is SwitchyardError<E> {
  return (
    err instanceof SwitchyardError && (code === undefined || err.code === code)
  );
}
