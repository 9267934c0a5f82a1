// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Typed endpoint handle: one side of a link with send/recv convenience
 * methods, claimed from a dispatcher.
 */

import type { Receiver, RecvOptions } from "../pathway/receiver.js";
import type { SendOptions } from "../pathway/sender.js";
import { SwitchyardError } from "../error/error.js";
import {
  envelope,
  type AnyMessageDescriptor,
  type EnvelopeOf,
  type InferPayload,
} from "../protocol/message-descriptor.js";
import type { Dispatcher } from "./dispatcher.js";

export interface EndpointHandleSpec<
  S extends AnyMessageDescriptor,
  R extends AnyMessageDescriptor,
> {
  link: string;
  endpoint: string;
  sends?: S;
  receives?: R;
}

/**
 * @template S - Message type this endpoint sends (never: receive-only)
 * @template R - Message type this endpoint receives (never: send-only)
 */
export class EndpointHandle<
  S extends AnyMessageDescriptor = never,
  R extends AnyMessageDescriptor = never,
> implements AsyncIterable<EnvelopeOf<R>>
{
  constructor(
    private readonly dispatcher: Dispatcher,
    readonly link: string,
    readonly endpoint: string,
    private readonly sends: S | undefined,
    private readonly receiver: Receiver<EnvelopeOf<R>> | undefined,
  ) {}

  /**
   * Send a payload to the peer endpoint.
   */
  async send(payload: InferPayload<S>, options?: SendOptions): Promise<void> {
    if (this.sends === undefined) {
      throw new SwitchyardError(
        "MESSAGE_TYPE_NOT_MAPPED",
        `Endpoint "${this.endpoint}" sends nothing on link "${this.link}".`,
        { link: this.link, endpoint: this.endpoint },
      );
    }
    await this.dispatcher.sendOnLink(this.link, envelope(this.sends, payload), {
      ...options,
      from: this.endpoint,
    });
  }

  /**
   * Receive the next message from the peer, or null at end-of-stream.
   */
  async recv(options?: RecvOptions): Promise<EnvelopeOf<R> | null> {
    return this.inbound().recv(options);
  }

  /** Drop this endpoint's receiving side. */
  close(): void {
    this.receiver?.close();
  }

  [Symbol.asyncIterator](): AsyncIterator<EnvelopeOf<R>> {
    return this.inbound()[Symbol.asyncIterator]();
  }

  private inbound(): Receiver<EnvelopeOf<R>> {
    if (this.receiver === undefined) {
      throw new SwitchyardError(
        "MESSAGE_TYPE_NOT_MAPPED",
        `Endpoint "${this.endpoint}" receives nothing on link "${this.link}".`,
        { link: this.link, endpoint: this.endpoint },
      );
    }
    return this.receiver;
  }
}

/**
 * Claim a typed handle for one endpoint of a link. The receiving side is
 * claimed immediately, so each endpoint handle can be created once.
 *
 * ```typescript
 * const pinger = endpointHandle(dispatcher, {
 *   link: "Exchange",
 *   endpoint: "Pinger",
 *   sends: Ping,
 *   receives: Pong,
 * });
 * await pinger.send({ n: 0 });
 * const pong = await pinger.recv();
 * ```
 */
export function endpointHandle<
  S extends AnyMessageDescriptor = never,
  R extends AnyMessageDescriptor = never,
>(dispatcher: Dispatcher, spec: EndpointHandleSpec<S, R>): EndpointHandle<S, R> {
  const receiver =
    spec.receives === undefined
      ? undefined
      : dispatcher.takeLinkReceiver(spec.link, spec.endpoint, spec.receives);
  return new EndpointHandle(
    dispatcher,
    spec.link,
    spec.endpoint,
    spec.sends,
    receiver,
  );
}
