// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

// Producer handle of a pathway.

import { SwitchyardError } from "../error/error.js";
import type { PathwayState } from "./state.js";

export interface SendOptions {
  /**
   * Cancels a send that is suspended on a full pathway. An aborted send is
   * never enqueued.
   */
  signal?: AbortSignal;
}

/**
 * Producer handle: sends values into a bounded pathway.
 *
 * `send()` suspends while the pathway is at capacity. Several producers may
 * share one pathway via `clone()`; the consumer observes end-of-stream after
 * every producer handle is closed.
 *
 * @template T - The type of values carried by the pathway.
 */
export class PathwaySender<T> {
  private closed = false;

  /** @internal */
  constructor(private readonly state: PathwayState<T>) {}

  get capacity(): number {
    return this.state.capacity;
  }

  /** True once this handle was closed or the consumer went away. */
  get isClosed(): boolean {
    return this.closed || this.state.isConsumerClosed;
  }

  /**
   * Send a value, suspending while the pathway is full.
   *
   * @throws SwitchyardError SEND_FAILED when the receiver is dropped,
   *   CHANNEL_CLOSED when this handle was closed, ABORTED on cancellation
   */
  async send(value: T, options: SendOptions = {}): Promise<void> {
    this.ensureOpen();

    const { signal } = options;
    if (signal?.aborted) {
      throw new SwitchyardError(
        "ABORTED",
        "Send aborted before the value was accepted",
        undefined,
        { cause: signal.reason },
      );
    }

    if (this.state.offer(value)) {
      return;
    }

    await this.state.enqueue(value, signal);
  }

  /**
   * Send without suspending. Returns false when the pathway is full.
   */
  trySend(value: T): boolean {
    this.ensureOpen();
    return this.state.offer(value);
  }

  /**
   * Create another producer handle for the same pathway.
   */
  clone(): PathwaySender<T> {
    if (this.closed) {
      throw new SwitchyardError("CHANNEL_CLOSED", "Cannot clone a closed sender");
    }
    this.state.addProducer();
    return new PathwaySender(this.state);
  }

  /**
   * Drop this producer handle. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.state.releaseProducer();
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new SwitchyardError("CHANNEL_CLOSED", "Sender handle is closed");
    }
    if (this.state.isConsumerClosed) {
      throw new SwitchyardError("SEND_FAILED", "Receiver dropped");
    }
  }
}
