// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Dispatcher: the registry every component sends and claims through.
 *
 * Two phases:
 * - setup (single caller): registerSender / registerReceiver / registerPathway,
 *   then seal()
 * - shared: send / sendOnLink / takeReceiver from any number of tasks
 *
 * The sender and route maps are read-only after seal(). The only shared
 * mutable state is each receiver's claim slot.
 */

import type { ErrorCode } from "../error/codes.js";
import { SwitchyardError } from "../error/error.js";
import { translateError } from "../error/translate.js";
import { ClaimSlot } from "../endpoint/claim-slot.js";
import type { ReceiverEndpoint } from "../endpoint/receiver-endpoint.js";
import type { SenderEndpoint } from "../endpoint/sender-endpoint.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import {
  resolveOptions,
  type DispatcherOptions,
} from "../options/dispatcher.js";
import type { Receiver } from "../pathway/receiver.js";
import type { SendOptions } from "../pathway/sender.js";
import {
  isEnvelope,
  type AnyMessageDescriptor,
  type Envelope,
  type EnvelopeOf,
} from "../protocol/message-descriptor.js";
import { dispatchKey } from "./dispatch-key.js";
import { identityName, type EndpointId, type IdentityRef } from "./identity.js";
import { RouteTable, type Addressing, type PathwayRoute } from "./route-table.js";

interface ReceiverRegistration {
  readonly messageType: string;
  readonly slot: ClaimSlot<ReceiverEndpoint>;
}

export interface PathwayRegistration {
  link: string;
  source: string;
  target: string;
  endpoint: SenderEndpoint;
  /** Default: "type" */
  addressing?: Addressing;
}

export interface LinkSendOptions extends SendOptions {
  /** Sending endpoint; required on direction-addressed links. */
  from?: string;
}

export interface VerifyExpectations {
  senders?: readonly IdentityRef[];
  receivers?: readonly IdentityRef[];
  links?: readonly string[];
}

export interface DispatcherSnapshot {
  readonly name: string;
  readonly sealed: boolean;
  readonly closed: boolean;
  readonly senders: readonly { identity: string; messageType: string }[];
  readonly receivers: readonly {
    identity: string;
    messageType: string;
    claimed: boolean;
  }[];
  readonly routes: readonly PathwayRoute[];
}

/** Codes that indicate a configuration or erasure bug; logged at error. */
const LOUD_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "TYPE_MISMATCH",
  "INTERNAL_INCONSISTENCY",
]);

export class Dispatcher {
  readonly name: string;
  readonly defaultCapacity: number;

  private readonly logger: LoggerAdapter;
  private readonly senders = new Map<string, SenderEndpoint>();
  private readonly receivers = new Map<string, ReceiverRegistration>();
  private readonly routes = new RouteTable();
  /** Receivers that close() dropped before anyone claimed them. */
  private readonly droppedOnClose = new Set<string>();
  private isSealed = false;
  private isClosed = false;

  constructor(options: DispatcherOptions = {}) {
    const resolved = resolveOptions(options);
    this.name = resolved.name;
    this.logger = resolved.logger;
    this.defaultCapacity = resolved.defaultCapacity;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  // ---------------------------------------------------------------------------
  // Registration (setup phase)
  // ---------------------------------------------------------------------------

  /**
   * Register the producer side of a pathway under an identity.
   *
   * @throws SwitchyardError DUPLICATE_REGISTRATION if the identity already
   *   holds a sender
   */
  registerSender(identity: IdentityRef, endpoint: SenderEndpoint): this {
    this.assertSetupPhase();
    const name = identityName(identity);
    this.insertSender(name, endpoint);
    this.logger.debug(LOG_CONTEXT.REGISTRY, "Sender registered", {
      dispatcher: this.name,
      identity: name,
      messageType: endpoint.messageType,
    });
    return this;
  }

  /**
   * Register the consumer side of a pathway under an identity, unclaimed.
   *
   * @throws SwitchyardError DUPLICATE_REGISTRATION if the identity already
   *   holds a receiver
   */
  registerReceiver(identity: IdentityRef, endpoint: ReceiverEndpoint): this {
    this.assertSetupPhase();
    const name = identityName(identity);
    if (this.receivers.has(name)) {
      throw new SwitchyardError(
        "DUPLICATE_REGISTRATION",
        `Receiver for identity "${name}" already registered.`,
        { identity: name },
      );
    }

    this.receivers.set(name, {
      messageType: endpoint.messageType,
      slot: new ClaimSlot(endpoint),
    });
    this.logger.debug(LOG_CONTEXT.REGISTRY, "Receiver registered", {
      dispatcher: this.name,
      identity: name,
      messageType: endpoint.messageType,
    });
    return this;
  }

  /**
   * Register one direction of a link. The sender is stored under the
   * dispatch key `{link}/{source}_to_{target}`, which is returned.
   *
   * @throws SwitchyardError DUPLICATE_REGISTRATION if the key exists,
   *   AMBIGUOUS_DISPATCH if the message type is already mapped on the link
   */
  registerPathway(registration: PathwayRegistration): string {
    this.assertSetupPhase();
    const { link, source, target, endpoint } = registration;
    const key = dispatchKey(link, source, target);

    if (this.senders.has(key)) {
      throw new SwitchyardError(
        "DUPLICATE_REGISTRATION",
        `Pathway "${key}" already registered.`,
        { key },
      );
    }

    this.routes.register({
      key,
      link,
      source,
      target,
      messageType: endpoint.messageType,
      addressing: registration.addressing ?? "type",
    });
    this.insertSender(key, endpoint);

    this.logger.debug(LOG_CONTEXT.REGISTRY, "Pathway registered", {
      dispatcher: this.name,
      key,
      messageType: endpoint.messageType,
      addressing: registration.addressing ?? "type",
    });
    return key;
  }

  /**
   * End the setup phase. Later registrations fail with REGISTRY_SEALED.
   */
  seal(): this {
    if (this.isSealed) return this;
    this.isSealed = true;
    this.logger.info(LOG_CONTEXT.LIFECYCLE, "Dispatcher sealed", {
      dispatcher: this.name,
      senders: this.senders.size,
      receivers: this.receivers.size,
    });
    return this;
  }

  /**
   * Startup validation pass: fail fast if any expected registration is absent.
   *
   * @throws SwitchyardError MISSING_REGISTRATION listing every missing entry
   */
  verify(expected: VerifyExpectations): this {
    const senders = (expected.senders ?? [])
      .map(identityName)
      .filter((name) => !this.senders.has(name));
    const receivers = (expected.receivers ?? [])
      .map(identityName)
      .filter((name) => !this.receivers.has(name));
    const links = (expected.links ?? []).filter(
      (link) => !this.routes.hasLink(link),
    );

    if (senders.length + receivers.length + links.length > 0) {
      const missing = [
        ...senders.map((name) => `sender "${name}"`),
        ...receivers.map((name) => `receiver "${name}"`),
        ...links.map((name) => `link "${name}"`),
      ];
      throw new SwitchyardError(
        "MISSING_REGISTRATION",
        `Missing registrations: ${missing.join(", ")}.`,
        { senders, receivers, links },
      );
    }
    return this;
  }

  // ---------------------------------------------------------------------------
  // Messaging (shared phase)
  // ---------------------------------------------------------------------------

  /**
   * Send a message to the pathway registered under `identity`.
   *
   * Resolves once the pathway accepts the message; suspends while it is full.
   *
   * @throws SwitchyardError PATHWAY_NOT_FOUND, INTERNAL_INCONSISTENCY (type
   *   tag differs from the registered one), TYPE_MISMATCH (payload rejected
   *   by the validator), SEND_FAILED (receiver dropped), ABORTED
   */
  send<D extends AnyMessageDescriptor>(
    identity: EndpointId<D>,
    message: EnvelopeOf<D>,
    options?: SendOptions,
  ): Promise<void>;
  send(
    identity: string,
    message: Envelope,
    options?: SendOptions,
  ): Promise<void>;
  async send(
    identity: IdentityRef,
    message: Envelope,
    options?: SendOptions,
  ): Promise<void> {
    const name = identityName(identity);
    const endpoint = this.senders.get(name);
    if (!endpoint) {
      throw new SwitchyardError(
        "PATHWAY_NOT_FOUND",
        `No pathway registered for identity "${name}" that accepts "${describeType(message)}".`,
        { identity: name, messageType: describeType(message) },
      );
    }

    await this.forward(name, endpoint, message, options);
  }

  /**
   * Send a message on a link; the pathway (and so the direction) is chosen
   * by the message type, or by `options.from` on direction-addressed links.
   *
   * @throws SwitchyardError LINK_NOT_FOUND, MESSAGE_TYPE_NOT_MAPPED,
   *   AMBIGUOUS_DISPATCH (direction-addressed type without `from`), plus the
   *   errors of send()
   */
  async sendOnLink(
    link: string,
    message: Envelope,
    options: LinkSendOptions = {},
  ): Promise<void> {
    const { from, ...sendOptions } = options;
    const route = this.routes.resolve(link, describeType(message), from);
    const endpoint = this.senders.get(route.key);
    if (!endpoint) {
      throw new SwitchyardError(
        "INTERNAL_INCONSISTENCY",
        `Route "${route.key}" has no registered sender.`,
        { key: route.key },
      );
    }

    await this.forward(route.key, endpoint, message, sendOptions);
  }

  /**
   * Claim the receiver registered under `identity`. Succeeds once per
   * identity; the dispatcher keeps no reference to the receiver afterwards.
   *
   * @throws SwitchyardError PATHWAY_NOT_FOUND, TYPE_MISMATCH, ALREADY_CLAIMED,
   *   CHANNEL_CLOSED if close() dropped the receiver unclaimed
   */
  takeReceiver<D extends AnyMessageDescriptor>(
    identity: EndpointId<D>,
  ): Receiver<EnvelopeOf<D>>;
  takeReceiver<D extends AnyMessageDescriptor>(
    identity: IdentityRef,
    expected: D,
  ): Receiver<EnvelopeOf<D>>;
  takeReceiver(
    identity: IdentityRef,
    expected?: AnyMessageDescriptor,
  ): Receiver<Envelope> {
    const descriptor =
      expected ?? (typeof identity === "string" ? undefined : identity.descriptor);
    if (descriptor === undefined) {
      throw new SwitchyardError(
        "INVALID_ARGUMENT",
        "takeReceiver() needs an expected message type for a string identity.",
        { identity: identityName(identity) },
      );
    }
    return this.claim(identityName(identity), descriptor);
  }

  /**
   * Claim the receiver of the pathway on `link` that delivers `expected`
   * to `endpoint`.
   *
   * @throws SwitchyardError LINK_NOT_FOUND, MESSAGE_TYPE_NOT_MAPPED, plus the
   *   errors of takeReceiver()
   */
  takeLinkReceiver<D extends AnyMessageDescriptor>(
    link: string,
    endpoint: string,
    expected: D,
  ): Receiver<EnvelopeOf<D>> {
    if (!this.routes.hasLink(link)) {
      throw new SwitchyardError(
        "LINK_NOT_FOUND",
        `No link named "${link}" is registered.`,
        { link },
      );
    }
    const route = this.routes.findInbound(link, endpoint, expected.type);
    if (!route) {
      throw new SwitchyardError(
        "MESSAGE_TYPE_NOT_MAPPED",
        `Link "${link}" delivers no "${expected.type}" to "${endpoint}".`,
        { link, endpoint, messageType: expected.type },
      );
    }
    return this.claim(route.key, expected);
  }

  /**
   * Drop an unclaimed receiver: its pathway's consumer side closes and
   * further sends fail with SEND_FAILED.
   *
   * @throws SwitchyardError PATHWAY_NOT_FOUND, ALREADY_CLAIMED
   */
  releaseReceiver(identity: IdentityRef): void {
    const name = identityName(identity);
    const registration = this.lookupReceiver(name);
    const endpoint = registration.slot.take();
    if (!endpoint) {
      throw this.unavailable(name);
    }
    endpoint.close();
    this.logger.info(LOG_CONTEXT.CLAIM, "Receiver released unclaimed", {
      dispatcher: this.name,
      identity: name,
    });
  }

  hasSender(identity: IdentityRef): boolean {
    return this.senders.has(identityName(identity));
  }

  hasReceiver(identity: IdentityRef): boolean {
    return this.receivers.has(identityName(identity));
  }

  isClaimed(identity: IdentityRef): boolean {
    return this.receivers.get(identityName(identity))?.slot.isClaimed ?? false;
  }

  describe(): DispatcherSnapshot {
    return {
      name: this.name,
      sealed: this.isSealed,
      closed: this.isClosed,
      senders: Array.from(this.senders, ([identity, endpoint]) => ({
        identity,
        messageType: endpoint.messageType,
      })),
      receivers: Array.from(this.receivers, ([identity, registration]) => ({
        identity,
        messageType: registration.messageType,
        claimed: registration.slot.isClaimed,
      })),
      routes: this.routes.list(),
    };
  }

  /**
   * Drop every held sender and unclaimed receiver. Claimed receivers drain
   * what is buffered, then observe end-of-stream. Idempotent.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.isSealed = true;

    for (const endpoint of this.senders.values()) {
      endpoint.close();
    }
    for (const [name, registration] of this.receivers) {
      const endpoint = registration.slot.take();
      if (endpoint) {
        endpoint.close();
        this.droppedOnClose.add(name);
      }
    }

    this.logger.info(LOG_CONTEXT.LIFECYCLE, "Dispatcher closed", {
      dispatcher: this.name,
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private insertSender(name: string, endpoint: SenderEndpoint): void {
    if (this.senders.has(name)) {
      throw new SwitchyardError(
        "DUPLICATE_REGISTRATION",
        `Sender for identity "${name}" already registered.`,
        { identity: name },
      );
    }
    this.senders.set(name, endpoint);
  }

  private async forward(
    name: string,
    endpoint: SenderEndpoint,
    message: Envelope,
    options?: SendOptions,
  ): Promise<void> {
    const messageType = describeType(message);
    if (!isEnvelope(message) || messageType !== endpoint.messageType) {
      const error = new SwitchyardError(
        "INTERNAL_INCONSISTENCY",
        `Type tag mismatch for "${name}": expected "${endpoint.typeName}" for sending, got "${messageType}".`,
        { identity: name, expected: endpoint.messageType, received: messageType },
      );
      this.logger.error(LOG_CONTEXT.DISPATCH, error.message, error.toJSON());
      throw error;
    }

    try {
      await endpoint.sendErased(message, options);
    } catch (err) {
      const error = translateError(err);
      if (LOUD_CODES.has(error.code)) {
        this.logger.error(LOG_CONTEXT.DISPATCH, error.message, {
          identity: name,
          ...error.toJSON(),
        });
      } else if (error.code === "SEND_FAILED") {
        this.logger.warn(LOG_CONTEXT.PATHWAY, "Receiver dropped", {
          identity: name,
          messageType,
        });
      }
      throw error;
    }
  }

  private claim<D extends AnyMessageDescriptor>(
    name: string,
    expected: D,
  ): Receiver<EnvelopeOf<D>> {
    const registration = this.lookupReceiver(name);

    if (registration.messageType !== expected.type) {
      const error = new SwitchyardError(
        "TYPE_MISMATCH",
        `Expected type "${expected.type}" for receiving on "${name}", registered type is "${registration.messageType}".`,
        {
          identity: name,
          expected: expected.type,
          registered: registration.messageType,
        },
      );
      this.logger.error(LOG_CONTEXT.CLAIM, error.message, error.toJSON());
      throw error;
    }

    const endpoint = registration.slot.take();
    if (!endpoint) {
      throw this.unavailable(name);
    }

    this.logger.debug(LOG_CONTEXT.CLAIM, "Receiver claimed", {
      dispatcher: this.name,
      identity: name,
      messageType: expected.type,
    });
    return endpoint.claimAs(expected);
  }

  private lookupReceiver(name: string): ReceiverRegistration {
    const registration = this.receivers.get(name);
    if (!registration) {
      throw new SwitchyardError(
        "PATHWAY_NOT_FOUND",
        `No receiver registered for identity "${name}".`,
        { identity: name },
      );
    }
    return registration;
  }

  private unavailable(name: string): SwitchyardError {
    const error = this.droppedOnClose.has(name)
      ? new SwitchyardError(
          "CHANNEL_CLOSED",
          `Receiver for identity "${name}" was dropped unclaimed when the dispatcher closed.`,
          { identity: name },
        )
      : new SwitchyardError(
          "ALREADY_CLAIMED",
          `Receiver for identity "${name}" was already claimed.`,
          { identity: name },
        );
    this.logger.warn(LOG_CONTEXT.CLAIM, error.message, error.toJSON());
    return error;
  }

  private assertSetupPhase(): void {
    if (this.isSealed) {
      throw new SwitchyardError(
        "REGISTRY_SEALED",
        `Dispatcher "${this.name}" is sealed; register everything before sharing it.`,
        { dispatcher: this.name },
      );
    }
  }
}

function describeType(message: unknown): string {
  return isEnvelope(message) ? message.type : typeof message;
}
