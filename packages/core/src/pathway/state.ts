// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Shared state behind one pathway's producer and consumer handles.
 *
 * Invariants:
 * - pending sends exist only while the buffer is full
 * - receive waiters exist only while the buffer and pending sends are empty
 * - a value is either in the buffer, held by a pending send, or delivered
 *
 * @internal
 */

import { SwitchyardError } from "../error/error.js";
import { invariant } from "../utils/assert.js";

interface Box<T> {
  readonly value: T;
}

interface PendingSend<T> extends Box<T> {
  settle(error?: SwitchyardError): void;
}

type RecvWaiter<T> = (box: Box<T> | null) => void;

export class PathwayState<T> {
  private readonly buffer: Box<T>[] = [];
  private readonly pendingSends: PendingSend<T>[] = [];
  private readonly recvWaiters: RecvWaiter<T>[] = [];
  private producers = 1;
  private consumerClosed = false;

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.buffer.length;
  }

  get isConsumerClosed(): boolean {
    return this.consumerClosed;
  }

  /** True once every producer is gone and nothing is left to deliver. */
  get isDrained(): boolean {
    return (
      this.producers === 0 &&
      this.buffer.length === 0 &&
      this.pendingSends.length === 0
    );
  }

  /**
   * Accept a value without suspending: hand it to a waiting receiver or
   * buffer it. Returns false when the pathway is at capacity.
   */
  offer(value: T): boolean {
    const waiter = this.recvWaiters.shift();
    if (waiter) {
      waiter({ value });
      return true;
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return true;
    }
    return false;
  }

  /**
   * Queue a send behind a full buffer. Resolves once the value is accepted;
   * an abort removes it from the queue, so it is never half-delivered.
   */
  enqueue(value: T, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.pendingSends.indexOf(pending);
        if (index === -1) return;
        this.pendingSends.splice(index, 1);
        reject(
          new SwitchyardError(
            "ABORTED",
            "Send aborted before the value was accepted",
            undefined,
            { cause: signal?.reason },
          ),
        );
      };

      const pending: PendingSend<T> = {
        value,
        settle: (error) => {
          signal?.removeEventListener("abort", onAbort);
          if (error) reject(error);
          else resolve();
        },
      };

      this.pendingSends.push(pending);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Take the next value without suspending, promoting a pending send into
   * the freed slot.
   */
  take(): Box<T> | undefined {
    const head = this.buffer.shift();
    if (head) {
      this.promote();
      return head;
    }
    // Rendezvous (capacity 0): take straight from a suspended sender.
    const pending = this.pendingSends.shift();
    if (pending) {
      pending.settle();
      return pending;
    }
    return undefined;
  }

  /**
   * Suspend until a value arrives or the stream ends. An abort withdraws
   * the waiter, so a later value goes to the next receive instead.
   */
  wait(signal?: AbortSignal): Promise<Box<T> | null> {
    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.recvWaiters.indexOf(waiter);
        if (index === -1) return;
        this.recvWaiters.splice(index, 1);
        reject(
          new SwitchyardError(
            "ABORTED",
            "Receive aborted before a value arrived",
            undefined,
            { cause: signal?.reason },
          ),
        );
      };

      const waiter: RecvWaiter<T> = (box) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(box);
      };

      this.recvWaiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  addProducer(): void {
    this.producers++;
  }

  releaseProducer(): void {
    invariant(this.producers > 0, "producer released twice");
    this.producers--;
    if (this.isDrained) {
      this.wakeReceivers();
    }
  }

  closeConsumer(): void {
    if (this.consumerClosed) return;
    this.consumerClosed = true;
    this.buffer.length = 0;

    const pending = this.pendingSends.splice(0);
    for (const send of pending) {
      send.settle(
        new SwitchyardError("SEND_FAILED", "Receiver dropped before delivery"),
      );
    }
    this.wakeReceivers();
  }

  private promote(): void {
    while (this.buffer.length < this.capacity) {
      const pending = this.pendingSends.shift();
      if (!pending) return;
      this.buffer.push({ value: pending.value });
      pending.settle();
    }
  }

  private wakeReceivers(): void {
    const waiters = this.recvWaiters.splice(0);
    for (const waiter of waiters) {
      waiter(null);
    }
  }
}
