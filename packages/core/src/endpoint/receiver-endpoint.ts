// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Type-erased consumer wrapper.
 *
 * Holds one pathway's consumer handle until it is claimed. claimAs()
 * re-attaches the concrete type through the expected descriptor's guard.
 */

import { SwitchyardError } from "../error/error.js";
import type { Receiver } from "../pathway/receiver.js";
import {
  assertMessageDescriptor,
  isEnvelopeOf,
  type AnyMessageDescriptor,
  type EnvelopeOf,
} from "../protocol/message-descriptor.js";
import { GuardedReceiver } from "./guarded-receiver.js";

export interface ReceiverEndpoint {
  readonly messageType: string;
  readonly typeName: string;
  readonly descriptor: AnyMessageDescriptor;
  /**
   * Recover the concrete consumer handle.
   *
   * @throws SwitchyardError TYPE_MISMATCH when `expected` names another type
   */
  claimAs<D extends AnyMessageDescriptor>(
    expected: D,
  ): Receiver<EnvelopeOf<D>>;
  /** Drop the consumer side without claiming it. */
  close(): void;
}

class ErasedReceiverEndpoint implements ReceiverEndpoint {
  constructor(
    readonly descriptor: AnyMessageDescriptor,
    private readonly receiver: Receiver<unknown>,
  ) {}

  get messageType(): string {
    return this.descriptor.type;
  }

  get typeName(): string {
    return this.descriptor.type;
  }

  claimAs<D extends AnyMessageDescriptor>(
    expected: D,
  ): Receiver<EnvelopeOf<D>> {
    if (expected.type !== this.descriptor.type) {
      throw new SwitchyardError(
        "TYPE_MISMATCH",
        `Expected type "${expected.type}" for receiving, registered type is "${this.descriptor.type}"`,
        { expected: expected.type, registered: this.descriptor.type },
      );
    }
    return new GuardedReceiver(
      this.receiver,
      (value: unknown): value is EnvelopeOf<D> =>
        isEnvelopeOf(expected, value),
      expected.type,
    );
  }

  close(): void {
    this.receiver.close();
  }
}

/**
 * Wrap a pathway's consumer handle for one concrete message type.
 */
export function receiverEndpoint<D extends AnyMessageDescriptor>(
  descriptor: D,
  receiver: Receiver<EnvelopeOf<D>>,
): ReceiverEndpoint {
  assertMessageDescriptor(descriptor);
  return new ErasedReceiverEndpoint(descriptor, receiver);
}
