// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Typed view over an erased receiver.
 *
 * Every value is checked by the guard on the way out; a value that fails
 * it is an erasure bug and surfaces as INTERNAL_INCONSISTENCY instead of
 * reaching the consumer with the wrong type.
 */

import { SwitchyardError } from "../error/error.js";
import type {
  Receiver,
  RecvOptions,
  TryRecvResult,
} from "../pathway/receiver.js";

export class GuardedReceiver<T> implements Receiver<T> {
  constructor(
    private readonly inner: Receiver<unknown>,
    private readonly guard: (value: unknown) => value is T,
    private readonly typeName: string,
  ) {}

  get capacity(): number {
    return this.inner.capacity;
  }

  get size(): number {
    return this.inner.size;
  }

  get isClosed(): boolean {
    return this.inner.isClosed;
  }

  async recv(options?: RecvOptions): Promise<T | null> {
    const value = await this.inner.recv(options);
    if (value === null) {
      return null;
    }
    return this.narrow(value);
  }

  tryRecv(): TryRecvResult<T> {
    const result = this.inner.tryRecv();
    if (result.kind !== "value") {
      return result;
    }
    return { kind: "value", value: this.narrow(result.value) };
  }

  close(): void {
    this.inner.close();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const value = await this.recv();
      if (value === null) {
        return;
      }
      yield value;
    }
  }

  private narrow(value: unknown): T {
    if (this.guard(value)) {
      return value;
    }
    throw new SwitchyardError(
      "INTERNAL_INCONSISTENCY",
      `Downcast to "${this.typeName}" failed for a received value`,
      { expected: this.typeName },
    );
  }
}
