// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Zod-backed message descriptors.
 *
 * The schema only checks payloads; the type tag stays the descriptor's
 * `type`, so core dispatch never depends on Zod.
 *
 * Prefer strict object schemas so unexpected keys are rejected rather than
 * silently stripped:
 * ```typescript
 * const Join = message("JOIN", z.strictObject({ roomId: z.string() }));
 * ```
 */

import { z } from "zod";
import {
  assertMessageDescriptor,
  type MessageDescriptor,
  type PayloadValidator,
} from "@switchyard/core";

export interface ZodMessageDescriptor<
  T extends string,
  P,
  S extends z.ZodType | undefined = undefined,
> extends MessageDescriptor<T, P> {
  /** Payload schema, if any. */
  readonly schema: S;
  readonly __runtime: "switchyard-zod";
}

/**
 * Create a message descriptor, optionally with a payload schema.
 *
 * ```typescript
 * const Tick = message("TICK");
 * const Ping = message("PING", z.strictObject({ n: z.number().int() }));
 * ```
 */
export function message<const T extends string>(
  type: T,
): ZodMessageDescriptor<T, undefined>;
export function message<const T extends string, S extends z.ZodType>(
  type: T,
  schema: S,
): ZodMessageDescriptor<T, z.output<S>, S>;
export function message(
  type: string,
  schema?: z.ZodType,
): ZodMessageDescriptor<string, unknown, z.ZodType | undefined> {
  const descriptor: ZodMessageDescriptor<
    string,
    unknown,
    z.ZodType | undefined
  > =
    schema === undefined
      ? { type, schema, __runtime: "switchyard-zod" }
      : { type, schema, validate: zodValidator(schema), __runtime: "switchyard-zod" };

  assertMessageDescriptor(descriptor);
  return Object.freeze(descriptor);
}

function zodValidator<S extends z.ZodType>(
  schema: S,
): PayloadValidator<z.output<S>> {
  return (payload) => {
    const result = schema.safeParse(payload);
    if (result.success) {
      return { ok: true, value: result.data };
    }
    return { ok: false, issues: formatIssues(result.error.issues) };
  };
}

/**
 * Flatten Zod issues to `path: message` lines.
 */
export function formatIssues(
  issues: readonly { path: readonly PropertyKey[]; message: string }[],
): string[] {
  return issues.map((issue) =>
    issue.path.length === 0
      ? issue.message
      : `${issue.path.map(String).join(".")}: ${issue.message}`,
  );
}
