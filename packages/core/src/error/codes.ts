/**
 * Error codes: machine-readable classification of dispatcher failures.
 * Each code carries retryability, the phase it belongs to, and a default message.
 *
 * Setup phase (structural misconfiguration, fail fast before traffic):
 * - DUPLICATE_REGISTRATION: identity or dispatch key registered twice
 * - AMBIGUOUS_DISPATCH: same (link, type) route mapped twice
 * - REGISTRY_SEALED: registration attempted after seal()
 * - MISSING_REGISTRATION: verify() found an expected identity absent
 * - INVALID_ARGUMENT: malformed descriptor, capacity, or topology
 *
 * Runtime phase (returned to the caller, never fatal to the process):
 * - PATHWAY_NOT_FOUND / LINK_NOT_FOUND / MESSAGE_TYPE_NOT_MAPPED: lookup miss
 * - TYPE_MISMATCH: stored type tag or payload shape differs from the expected one
 * - ALREADY_CLAIMED: receiver claimed twice
 * - SEND_FAILED: consumer side dropped
 * - CHANNEL_CLOSED: producer handle used after close(), or a receiver the
 *   dispatcher dropped unclaimed on close()
 * - ABORTED: send cancelled before the value was accepted
 * - INTERNAL_INCONSISTENCY: erasure invariant violated (bug)
 */

export type ErrorCode =
  | "DUPLICATE_REGISTRATION"
  | "AMBIGUOUS_DISPATCH"
  | "REGISTRY_SEALED"
  | "MISSING_REGISTRATION"
  | "INVALID_ARGUMENT"
  | "PATHWAY_NOT_FOUND"
  | "LINK_NOT_FOUND"
  | "MESSAGE_TYPE_NOT_MAPPED"
  | "TYPE_MISMATCH"
  | "ALREADY_CLAIMED"
  | "SEND_FAILED"
  | "CHANNEL_CLOSED"
  | "ABORTED"
  | "INTERNAL_INCONSISTENCY";

export type ErrorPhase = "setup" | "runtime";

export interface SwitchyardErrorData {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  retryable?: boolean;
  phase?: ErrorPhase;
}

export interface ErrorMetadata {
  readonly message: string;
  readonly retryable: boolean;
  readonly phase: ErrorPhase;
}

const ERROR_METADATA: Record<ErrorCode, ErrorMetadata> = {
  DUPLICATE_REGISTRATION: {
    message: "Already registered",
    retryable: false,
    phase: "setup",
  },
  AMBIGUOUS_DISPATCH: {
    message: "Ambiguous dispatch",
    retryable: false,
    phase: "setup",
  },
  REGISTRY_SEALED: {
    message: "Registry sealed",
    retryable: false,
    phase: "setup",
  },
  MISSING_REGISTRATION: {
    message: "Missing registration",
    retryable: false,
    phase: "setup",
  },
  INVALID_ARGUMENT: {
    message: "Invalid argument",
    retryable: false,
    phase: "setup",
  },
  PATHWAY_NOT_FOUND: {
    message: "Pathway not found",
    retryable: false,
    phase: "runtime",
  },
  LINK_NOT_FOUND: {
    message: "Link not found",
    retryable: false,
    phase: "runtime",
  },
  MESSAGE_TYPE_NOT_MAPPED: {
    message: "Message type not mapped for link",
    retryable: false,
    phase: "runtime",
  },
  TYPE_MISMATCH: { message: "Type mismatch", retryable: false, phase: "runtime" },
  ALREADY_CLAIMED: {
    message: "Receiver already claimed",
    retryable: false,
    phase: "runtime",
  },
  SEND_FAILED: { message: "Send failed", retryable: false, phase: "runtime" },
  CHANNEL_CLOSED: {
    message: "Channel closed",
    retryable: false,
    phase: "runtime",
  },
  ABORTED: { message: "Aborted", retryable: true, phase: "runtime" },
  INTERNAL_INCONSISTENCY: {
    message: "Internal inconsistency",
    retryable: false,
    phase: "runtime",
  },
};

export function getErrorMetadata(code: ErrorCode): ErrorMetadata {
  return ERROR_METADATA[code];
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && Object.hasOwn(ERROR_METADATA, value);
}
