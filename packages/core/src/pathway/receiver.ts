// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

// Consumer handle of a pathway.

import { SwitchyardError } from "../error/error.js";
import type { PathwayState } from "./state.js";

export interface RecvOptions {
  /**
   * Cancels a receive that is suspended on an empty pathway. The value that
   * would have gone to it stays queued for the next receive.
   */
  signal?: AbortSignal;
}

/** Result of a non-suspending receive. */
export type TryRecvResult<T> =
  | { kind: "value"; value: T }
  | { kind: "empty" }
  | { kind: "closed" };

/**
 * Consumer contract shared by plain and type-guarded receivers.
 */
export interface Receiver<T> extends AsyncIterable<T> {
  readonly capacity: number;
  readonly size: number;
  readonly isClosed: boolean;
  /** Next value, or null at end-of-stream. */
  recv(options?: RecvOptions): Promise<T | null>;
  tryRecv(): TryRecvResult<T>;
  /** Drop the consumer side; pending and future sends fail. */
  close(): void;
}

/**
 * Consumer handle: receives values from a bounded pathway in FIFO order.
 *
 * @template T - The type of values carried by the pathway.
 */
export class PathwayReceiver<T> implements Receiver<T> {
  /** @internal */
  constructor(private readonly state: PathwayState<T>) {}

  get capacity(): number {
    return this.state.capacity;
  }

  /** Number of buffered values. */
  get size(): number {
    return this.state.size;
  }

  get isClosed(): boolean {
    return this.state.isConsumerClosed || this.state.isDrained;
  }

  /**
   * Receive the next value, suspending while the pathway is empty.
   *
   * Returns null once every producer is closed and the buffer is drained,
   * or after this receiver was closed.
   *
   * @throws SwitchyardError ABORTED when the signal fires first
   */
  async recv(options: RecvOptions = {}): Promise<T | null> {
    if (this.state.isConsumerClosed) {
      return null;
    }

    const { signal } = options;
    if (signal?.aborted) {
      throw new SwitchyardError(
        "ABORTED",
        "Receive aborted before a value arrived",
        undefined,
        { cause: signal.reason },
      );
    }

    const ready = this.state.take();
    if (ready) {
      return ready.value;
    }
    if (this.state.isDrained) {
      return null;
    }

    const box = await this.state.wait(signal);
    return box === null ? null : box.value;
  }

  tryRecv(): TryRecvResult<T> {
    if (this.state.isConsumerClosed) {
      return { kind: "closed" };
    }
    const box = this.state.take();
    if (box) {
      return { kind: "value", value: box.value };
    }
    return this.state.isDrained ? { kind: "closed" } : { kind: "empty" };
  }

  close(): void {
    this.state.closeConsumer();
  }

  /**
   * Iterate over all values until end-of-stream.
   */
  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const value = await this.recv();
      if (value === null) {
        return;
      }
      yield value;
    }
  }
}
