// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

// Bounded pathway creation.

import { SwitchyardError } from "../error/error.js";
import { PathwayReceiver } from "./receiver.js";
import { PathwaySender } from "./sender.js";
import { PathwayState } from "./state.js";

/**
 * Create a bounded FIFO pathway with one producer and one consumer handle.
 *
 * Capacity 0 makes a rendezvous pathway: `send()` completes only when the
 * consumer takes the value.
 *
 * ```typescript
 * const [tx, rx] = createPathway<number>(1);
 *
 * await tx.send(1);        // buffered
 * const pending = tx.send(2); // suspends: pathway full
 * await rx.recv();         // 1, frees a slot
 * await pending;
 * tx.close();
 * ```
 */
export function createPathway<T>(
  capacity: number,
): [PathwaySender<T>, PathwayReceiver<T>] {
  assertCapacity(capacity);
  const state = new PathwayState<T>(capacity);
  return [new PathwaySender(state), new PathwayReceiver(state)];
}

export function assertCapacity(capacity: number): void {
  if (!Number.isSafeInteger(capacity) || capacity < 0) {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      `Pathway capacity must be a non-negative integer, got ${capacity}`,
      { capacity },
    );
  }
}
