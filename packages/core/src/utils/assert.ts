/**
 * Assertions: invariant checks (dev + production).
 * Violations surface as INTERNAL_INCONSISTENCY, never as silent drops.
 */

import { SwitchyardError } from "../error/error.js";

export function invariant(
  condition: boolean,
  message: string,
  details?: Record<string, unknown>,
): asserts condition {
  if (!condition) {
    throw new SwitchyardError(
      "INTERNAL_INCONSISTENCY",
      `Invariant: ${message}`,
      details,
    );
  }
}

export function unreachable(message?: string): never {
  throw new SwitchyardError(
    "INTERNAL_INCONSISTENCY",
    `Unreachable: ${message || "code path should not be reached"}`,
  );
}
