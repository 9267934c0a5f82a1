/**
 * Error translation: map thrown errors → SwitchyardError.
 * Used at erasure boundaries so callers only ever observe SwitchyardError.
 */

import { SwitchyardError } from "./error.js";
import type { ErrorCode } from "./codes.js";

export function translateError(
  err: unknown,
  defaultCode: ErrorCode = "INTERNAL_INCONSISTENCY",
): SwitchyardError {
  if (err instanceof SwitchyardError) {
    return err;
  }
  return new SwitchyardError(
    defaultCode,
    err instanceof Error ? err.message : String(err),
    undefined,
    { cause: err },
  );
}
