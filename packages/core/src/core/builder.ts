// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Topology builder: turns a declarative list of pathways and links into a
 * populated, sealed dispatcher.
 *
 * Every pathway is created here with its capacity, then registered through
 * the same calls manual setup code would make.
 */

import { receiverEndpoint } from "../endpoint/receiver-endpoint.js";
import { senderEndpoint } from "../endpoint/sender-endpoint.js";
import { SwitchyardError } from "../error/error.js";
import type { DispatcherOptions } from "../options/dispatcher.js";
import { createPathway } from "../pathway/pathway.js";
import type {
  AnyMessageDescriptor,
  EnvelopeOf,
} from "../protocol/message-descriptor.js";
import { assertEndpointName, assertLinkName } from "./dispatch-key.js";
import { Dispatcher } from "./dispatcher.js";
import { identityName, type IdentityRef } from "./identity.js";
import type { Addressing } from "./route-table.js";

/** A standalone pathway; sender and receiver share one identity. */
export interface PathwaySpec<
  D extends AnyMessageDescriptor = AnyMessageDescriptor,
> {
  identity: IdentityRef;
  message: D;
  /** Default: the dispatcher's defaultCapacity */
  capacity?: number;
}

export interface LinkEndpointSpec {
  name: string;
  /** Message type this endpoint sends to its peer; omit for receive-only. */
  sends?: AnyMessageDescriptor;
}

/** A bidirectional link: one pathway per endpoint that sends. */
export interface LinkSpec {
  name: string;
  capacity?: number;
  /** Default: "type" */
  addressing?: Addressing;
  endpoints: readonly [LinkEndpointSpec, LinkEndpointSpec];
}

export interface TopologySpec {
  pathways?: readonly PathwaySpec[];
  links?: readonly LinkSpec[];
}

export interface BuildOptions extends DispatcherOptions {
  /** Seal the dispatcher after building. Default: true */
  seal?: boolean;
}

/**
 * Build a dispatcher from a topology.
 *
 * ```typescript
 * const dispatcher = buildDispatcher({
 *   links: [
 *     {
 *       name: "Exchange",
 *       capacity: 8,
 *       endpoints: [
 *         { name: "Pinger", sends: Ping },
 *         { name: "Ponger", sends: Pong },
 *       ],
 *     },
 *   ],
 * });
 * ```
 *
 * Any failure closes what was built so far and rethrows.
 */
export function buildDispatcher(
  topology: TopologySpec,
  options: BuildOptions = {},
): Dispatcher {
  const { seal = true, ...dispatcherOptions } = options;
  const dispatcher = new Dispatcher(dispatcherOptions);

  try {
    assertUniqueNames(topology);
    for (const spec of topology.pathways ?? []) {
      addPathway(dispatcher, spec);
    }
    for (const spec of topology.links ?? []) {
      addLink(dispatcher, spec);
    }
  } catch (err) {
    dispatcher.close();
    throw err;
  }

  return seal ? dispatcher.seal() : dispatcher;
}

/**
 * Create one pathway and register both of its sides under `spec.identity`.
 */
export function addPathway<D extends AnyMessageDescriptor>(
  dispatcher: Dispatcher,
  spec: PathwaySpec<D>,
): void {
  const [tx, rx] = createPathway<EnvelopeOf<D>>(
    spec.capacity ?? dispatcher.defaultCapacity,
  );
  try {
    dispatcher.registerSender(spec.identity, senderEndpoint(spec.message, tx));
    dispatcher.registerReceiver(
      spec.identity,
      receiverEndpoint(spec.message, rx),
    );
  } catch (err) {
    rx.close();
    throw err;
  }
}

/**
 * Create and register the pathways of one link. Each receiver is
 * registered under its pathway's dispatch key.
 */
export function addLink(dispatcher: Dispatcher, spec: LinkSpec): void {
  assertLinkName(spec.name);
  const [first, second] = spec.endpoints;
  assertEndpointName(first.name, spec.name);
  assertEndpointName(second.name, spec.name);

  if (first.name === second.name) {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      `Link "${spec.name}" needs two distinct endpoints, got "${first.name}" twice.`,
      { link: spec.name, endpoint: first.name },
    );
  }
  if (!first.sends && !second.sends) {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      `Link "${spec.name}" carries no message type.`,
      { link: spec.name },
    );
  }

  const capacity = spec.capacity ?? dispatcher.defaultCapacity;
  const directions: [LinkEndpointSpec, LinkEndpointSpec][] = [
    [first, second],
    [second, first],
  ];

  for (const [source, target] of directions) {
    if (source.sends) {
      addLinkPathway(
        dispatcher,
        spec,
        source.name,
        target.name,
        source.sends,
        capacity,
      );
    }
  }
}

function addLinkPathway<D extends AnyMessageDescriptor>(
  dispatcher: Dispatcher,
  spec: LinkSpec,
  source: string,
  target: string,
  message: D,
  capacity: number,
): void {
  const [tx, rx] = createPathway<EnvelopeOf<D>>(capacity);
  try {
    const key = dispatcher.registerPathway({
      link: spec.name,
      source,
      target,
      endpoint: senderEndpoint(message, tx),
      addressing: spec.addressing,
    });
    dispatcher.registerReceiver(key, receiverEndpoint(message, rx));
  } catch (err) {
    rx.close();
    throw err;
  }
}

/**
 * Validation pass: duplicate pathway identities and link names are reported
 * together, before anything is registered.
 */
function assertUniqueNames(topology: TopologySpec): void {
  const identities = duplicates(
    (topology.pathways ?? []).map((spec) => identityName(spec.identity)),
  );
  const links = duplicates((topology.links ?? []).map((spec) => spec.name));

  if (identities.length > 0 || links.length > 0) {
    throw new SwitchyardError(
      "DUPLICATE_REGISTRATION",
      `Topology declares duplicates: ${[
        ...identities.map((name) => `pathway "${name}"`),
        ...links.map((name) => `link "${name}"`),
      ].join(", ")}.`,
      { identities, links },
    );
  }
}

function duplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) repeated.add(name);
    seen.add(name);
  }
  return Array.from(repeated);
}
