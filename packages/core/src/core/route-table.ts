// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Link route table: maps (link, message type) to one pathway's dispatch key.
 * Implements ambiguity detection for both addressing modes.
 */

import { SwitchyardError } from "../error/error.js";
import { invariant } from "../utils/assert.js";

/**
 * How a link resolves a message to a pathway:
 * - "type" (default): the message type alone selects the pathway (and so
 *   the direction); a type may be mapped once per link
 * - "direction": routes are qualified by source endpoint, so both
 *   directions may carry the same type; senders must name `from`
 */
export type Addressing = "type" | "direction";

export interface PathwayRoute {
  readonly key: string;
  readonly link: string;
  readonly source: string;
  readonly target: string;
  readonly messageType: string;
  readonly addressing: Addressing;
}

interface LinkRoutes {
  /** message type → key, for type-addressed routes */
  readonly byType: Map<string, string>;
  /** source → message type → key, for direction-addressed routes */
  readonly bySource: Map<string, Map<string, string>>;
}

/**
 * Internal route table for link lookups.
 *
 * Registration is fail-fast: a duplicate key is DUPLICATE_REGISTRATION, and
 * any mapping that would make (link, type) resolve to two pathways is
 * AMBIGUOUS_DISPATCH, even when the keys differ.
 */
export class RouteTable {
  private readonly routes = new Map<string, PathwayRoute>();
  private readonly links = new Map<string, LinkRoutes>();

  /**
   * Register a route. Throws on duplicate key or ambiguous mapping.
   */
  register(route: PathwayRoute): this {
    if (this.routes.has(route.key)) {
      throw new SwitchyardError(
        "DUPLICATE_REGISTRATION",
        `Pathway "${route.key}" already registered.`,
        { key: route.key },
      );
    }

    const existing = this.links.get(route.link);
    if (existing) {
      this.assertUnambiguous(existing, route);
    }

    const entry: LinkRoutes = existing ?? {
      byType: new Map(),
      bySource: new Map(),
    };
    if (route.addressing === "type") {
      entry.byType.set(route.messageType, route.key);
    } else {
      const bySource: Map<string, string> =
        entry.bySource.get(route.source) ?? new Map();
      bySource.set(route.messageType, route.key);
      entry.bySource.set(route.source, bySource);
    }

    this.links.set(route.link, entry);
    this.routes.set(route.key, route);
    return this;
  }

  /**
   * Resolve the route for a message type on a link.
   *
   * @param from - Source endpoint; required for direction-addressed routes,
   *   checked against the route otherwise
   */
  resolve(link: string, messageType: string, from?: string): PathwayRoute {
    const entry = this.links.get(link);
    if (!entry) {
      throw new SwitchyardError(
        "LINK_NOT_FOUND",
        `No link named "${link}" is registered.`,
        { link },
      );
    }

    const typedKey = entry.byType.get(messageType);
    if (typedKey !== undefined) {
      const route = this.routeAt(typedKey);
      if (from !== undefined && route.source !== from) {
        throw notMapped(link, messageType, from);
      }
      return route;
    }

    if (from !== undefined) {
      const key = entry.bySource.get(from)?.get(messageType);
      if (key === undefined) {
        throw notMapped(link, messageType, from);
      }
      return this.routeAt(key);
    }

    const sources = directionalSources(entry, messageType);
    if (sources.length > 0) {
      throw new SwitchyardError(
        "AMBIGUOUS_DISPATCH",
        `Link "${link}" carries "${messageType}" in more than one direction; specify the sending endpoint.`,
        { link, messageType, sources },
      );
    }

    throw notMapped(link, messageType);
  }

  /**
   * Find the route on `link` that delivers `messageType` to `target`.
   *
   * @throws SwitchyardError AMBIGUOUS_DISPATCH when several sources deliver
   *   that type to `target`
   */
  findInbound(
    link: string,
    target: string,
    messageType: string,
  ): PathwayRoute | undefined {
    const matches = this.list().filter(
      (route) =>
        route.link === link &&
        route.target === target &&
        route.messageType === messageType,
    );
    if (matches.length > 1) {
      throw new SwitchyardError(
        "AMBIGUOUS_DISPATCH",
        `Link "${link}" delivers "${messageType}" to "${target}" from more than one source; claim it by dispatch key with takeReceiver().`,
        {
          link,
          target,
          messageType,
          keys: matches.map((route) => route.key),
        },
      );
    }
    return matches[0];
  }

  get(key: string): PathwayRoute | undefined {
    return this.routes.get(key);
  }

  hasLink(link: string): boolean {
    return this.links.has(link);
  }

  /**
   * List all registered routes in registration order.
   */
  list(): readonly PathwayRoute[] {
    return Array.from(this.routes.values());
  }

  private assertUnambiguous(entry: LinkRoutes, route: PathwayRoute): void {
    const conflict =
      entry.byType.get(route.messageType) ??
      (route.addressing === "type"
        ? firstDirectionalKey(entry, route.messageType)
        : entry.bySource.get(route.source)?.get(route.messageType));

    if (conflict !== undefined) {
      throw new SwitchyardError(
        "AMBIGUOUS_DISPATCH",
        `Message type "${route.messageType}" is already mapped on link "${route.link}" (via "${conflict}").`,
        {
          link: route.link,
          messageType: route.messageType,
          existing: conflict,
          incoming: route.key,
        },
      );
    }
  }

  private routeAt(key: string): PathwayRoute {
    const route = this.routes.get(key);
    invariant(route !== undefined, `route table maps to unknown key "${key}"`, {
      key,
    });
    return route;
  }
}

function directionalSources(entry: LinkRoutes, messageType: string): string[] {
  const sources: string[] = [];
  for (const [source, byType] of entry.bySource) {
    if (byType.has(messageType)) sources.push(source);
  }
  return sources;
}

function firstDirectionalKey(
  entry: LinkRoutes,
  messageType: string,
): string | undefined {
  for (const byType of entry.bySource.values()) {
    const key = byType.get(messageType);
    if (key !== undefined) return key;
  }
  return undefined;
}

function notMapped(
  link: string,
  messageType: string,
  from?: string,
): SwitchyardError {
  const direction = from === undefined ? "" : ` from "${from}"`;
  return new SwitchyardError(
    "MESSAGE_TYPE_NOT_MAPPED",
    `Message type "${messageType}" is not mapped${direction} on link "${link}".`,
    from === undefined ? { link, messageType } : { link, messageType, from },
  );
}
