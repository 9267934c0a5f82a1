/**
 * MessageDescriptor: stable runtime contract.
 *
 * Every payload type crossing the dispatcher is described by one of these,
 * regardless of validator. Core reads only these fields.
 *
 * Fields:
 * - type: discriminant literal → runtime type tag, compared at send/claim time
 * - validate (optional): payload check supplied by a validator adapter
 * - __runtime (optional): brand flag of the adapter that built it
 *
 * Messages travel as envelopes `{ type, payload }`; dispatch compares the
 * envelope's discriminant with the descriptor's, never the payload's shape.
 */

import { SwitchyardError } from "../error/error.js";

export type PayloadCheck<P> =
  | { readonly ok: true; readonly value: P }
  | { readonly ok: false; readonly issues: readonly string[] };

export type PayloadValidator<P> = (payload: unknown) => PayloadCheck<P>;

export interface MessageDescriptor<
  TType extends string = string,
  TPayload = unknown,
> {
  readonly type: TType;
  readonly validate?: PayloadValidator<TPayload>;
  readonly __runtime?: string;
}

export type AnyMessageDescriptor = MessageDescriptor<string, unknown>;

export interface Envelope<TType extends string = string, TPayload = unknown> {
  readonly type: TType;
  readonly payload: TPayload;
}

export type InferPayload<D> =
  D extends MessageDescriptor<string, infer P> ? P : never;

export type EnvelopeOf<D extends AnyMessageDescriptor> = Envelope<
  D["type"],
  InferPayload<D>
>;

/**
 * Outcome of checking an erased value against a descriptor.
 * `tag` failures are erasure bugs; `payload` failures are shape mismatches.
 */
export type EnvelopeCheck =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly reason: "tag" | "payload";
      readonly expected: string;
      readonly received: string;
      readonly issues: readonly string[];
    };

/**
 * Define a message type without payload validation.
 *
 * ```typescript
 * const Ping = defineMessage<"PING", { n: number }>("PING");
 * const Tick = defineMessage("TICK");
 * ```
 */
export function defineMessage<const T extends string, P = undefined>(
  type: T,
  validate?: PayloadValidator<P>,
): MessageDescriptor<T, P> {
  const descriptor: MessageDescriptor<T, P> =
    validate === undefined
      ? { type, __runtime: "switchyard-descriptor" }
      : { type, validate, __runtime: "switchyard-descriptor" };
  assertMessageDescriptor(descriptor);
  return Object.freeze(descriptor);
}

/**
 * Build a typed envelope for a descriptor.
 */
export function envelope<D extends AnyMessageDescriptor>(
  descriptor: D,
  payload: InferPayload<D>,
): EnvelopeOf<D> {
  return { type: descriptor.type, payload };
}

export function isEnvelope(value: unknown): value is Envelope {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string"
  );
}

export function checkEnvelope(
  descriptor: AnyMessageDescriptor,
  value: unknown,
): EnvelopeCheck {
  if (!isEnvelope(value)) {
    return {
      ok: false,
      reason: "tag",
      expected: descriptor.type,
      received: describeValue(value),
      issues: ["value is not a message envelope"],
    };
  }

  if (value.type !== descriptor.type) {
    return {
      ok: false,
      reason: "tag",
      expected: descriptor.type,
      received: value.type,
      issues: [],
    };
  }

  if (descriptor.validate) {
    const result = descriptor.validate(value.payload);
    if (!result.ok) {
      return {
        ok: false,
        reason: "payload",
        expected: descriptor.type,
        received: value.type,
        issues: result.issues,
      };
    }
  }

  return { ok: true };
}

/**
 * Runtime downcast guard: recovers the concrete envelope type from an erased value.
 */
export function isEnvelopeOf<D extends AnyMessageDescriptor>(
  descriptor: D,
  value: unknown,
): value is EnvelopeOf<D> {
  return checkEnvelope(descriptor, value).ok;
}

/**
 * Type guards + assertions.
 * Rejects malformed descriptors at registration time.
 */
export function assertMessageDescriptor(
  obj: unknown,
): asserts obj is AnyMessageDescriptor {
  if (typeof obj !== "object" || obj === null) {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      "Invalid MessageDescriptor: expected an object",
    );
  }

  if (!("type" in obj) || typeof obj.type !== "string" || obj.type === "") {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      "Invalid MessageDescriptor.type: must be non-empty string",
    );
  }

  if (
    "validate" in obj &&
    obj.validate !== undefined &&
    typeof obj.validate !== "function"
  ) {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      `Invalid MessageDescriptor.validate for type "${obj.type}": expected function | undefined, got ${typeof obj.validate}`,
    );
  }
}

export function isMessageDescriptor(obj: unknown): obj is AnyMessageDescriptor {
  try {
    assertMessageDescriptor(obj);
    return true;
  } catch {
    return false;
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
