// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Endpoint identities: explicit, application-chosen registry keys.
 *
 * A plain string works everywhere an identity is accepted. An EndpointId
 * additionally carries the descriptor, so send() and takeReceiver() infer
 * the envelope type from the identity alone.
 */

import { SwitchyardError } from "../error/error.js";
import {
  assertMessageDescriptor,
  type AnyMessageDescriptor,
} from "../protocol/message-descriptor.js";

export interface EndpointId<
  D extends AnyMessageDescriptor = AnyMessageDescriptor,
> {
  readonly name: string;
  readonly descriptor: D;
}

export type IdentityRef = string | EndpointId;

/**
 * Declare a typed endpoint identity.
 *
 * ```typescript
 * const Alerts = endpointId("alerts", Alert);
 * await dispatcher.send(Alerts, envelope(Alert, { level: "high" }));
 * const rx = dispatcher.takeReceiver(Alerts);
 * ```
 */
export function endpointId<D extends AnyMessageDescriptor>(
  name: string,
  descriptor: D,
): EndpointId<D> {
  assertIdentity(name);
  assertMessageDescriptor(descriptor);
  return Object.freeze({ name, descriptor });
}

export function identityName(identity: IdentityRef): string {
  const name = typeof identity === "string" ? identity : identity.name;
  assertIdentity(name);
  return name;
}

export function assertIdentity(name: unknown): asserts name is string {
  if (typeof name !== "string" || name.trim() === "") {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      "Endpoint identity must be a non-empty string",
      { identity: String(name) },
    );
  }
}
