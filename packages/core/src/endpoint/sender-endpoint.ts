// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Type-erased producer wrapper.
 *
 * The dispatcher stores every sender behind this interface; the concrete
 * envelope type is recovered inside sendErased() by the descriptor's guard.
 */

import { SwitchyardError } from "../error/error.js";
import type { PathwaySender, SendOptions } from "../pathway/sender.js";
import {
  assertMessageDescriptor,
  checkEnvelope,
  isEnvelopeOf,
  type AnyMessageDescriptor,
  type EnvelopeOf,
} from "../protocol/message-descriptor.js";
import { unreachable } from "../utils/assert.js";

export interface SenderEndpoint {
  /** Runtime type tag of the payload this endpoint accepts. */
  readonly messageType: string;
  /** Human-readable payload type for diagnostics. */
  readonly typeName: string;
  readonly descriptor: AnyMessageDescriptor;
  readonly isClosed: boolean;
  /**
   * Downcast an opaque value and forward it into the pathway.
   * Nothing is enqueued when the downcast fails.
   */
  sendErased(value: unknown, options?: SendOptions): Promise<void>;
  close(): void;
}

class TypedSenderEndpoint<D extends AnyMessageDescriptor>
  implements SenderEndpoint
{
  constructor(
    readonly descriptor: D,
    private readonly sender: PathwaySender<EnvelopeOf<D>>,
  ) {}

  get messageType(): string {
    return this.descriptor.type;
  }

  get typeName(): string {
    return this.descriptor.type;
  }

  get isClosed(): boolean {
    return this.sender.isClosed;
  }

  async sendErased(value: unknown, options?: SendOptions): Promise<void> {
    if (isEnvelopeOf(this.descriptor, value)) {
      await this.sender.send(value, options);
      return;
    }

    const check = checkEnvelope(this.descriptor, value);
    if (check.ok) {
      // Guard and check disagree: a validator with side effects or state.
      unreachable(`envelope check for "${this.typeName}" is not deterministic`);
    }
    if (check.reason === "payload") {
      throw new SwitchyardError(
        "TYPE_MISMATCH",
        `Payload does not match message type "${this.typeName}"`,
        { expected: check.expected, issues: check.issues },
      );
    }
    throw new SwitchyardError(
      "INTERNAL_INCONSISTENCY",
      `Downcast failed: sender for "${this.typeName}" received "${check.received}"`,
      { expected: check.expected, received: check.received },
    );
  }

  close(): void {
    this.sender.close();
  }
}

/**
 * Wrap a pathway's producer handle for one concrete message type.
 */
export function senderEndpoint<D extends AnyMessageDescriptor>(
  descriptor: D,
  sender: PathwaySender<EnvelopeOf<D>>,
): SenderEndpoint {
  assertMessageDescriptor(descriptor);
  return new TypedSenderEndpoint(descriptor, sender);
}
