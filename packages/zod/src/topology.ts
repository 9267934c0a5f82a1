// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Declarative topology documents (e.g. a JSON config file).
 *
 * Message types are referenced by name and resolved through a catalog of
 * descriptors, so the document itself stays plain data.
 */

import { z } from "zod";
import {
  SwitchyardError,
  type AnyMessageDescriptor,
  type LinkEndpointSpec,
  type TopologySpec,
} from "@switchyard/core";
import { formatIssues } from "./runtime.js";

const nameSchema = z.string().min(1);
const capacitySchema = z.number().int().nonnegative();

const endpointSchema = z.strictObject({
  name: nameSchema,
  sends: nameSchema.optional(),
});

export const topologyConfigSchema = z.strictObject({
  pathways: z
    .array(
      z.strictObject({
        identity: nameSchema,
        message: nameSchema,
        capacity: capacitySchema.optional(),
      }),
    )
    .optional(),
  links: z
    .array(
      z.strictObject({
        name: nameSchema,
        capacity: capacitySchema.optional(),
        addressing: z.enum(["type", "direction"]).optional(),
        endpoints: z.tuple([endpointSchema, endpointSchema]),
      }),
    )
    .optional(),
});

export type TopologyConfig = z.infer<typeof topologyConfigSchema>;

/** Descriptors by name, or a list keyed by each descriptor's type. */
export type MessageCatalog =
  | Readonly<Record<string, AnyMessageDescriptor>>
  | readonly AnyMessageDescriptor[];

/**
 * Validate a topology document and resolve its message names.
 *
 * ```typescript
 * const topology = parseTopology(JSON.parse(text), [Ping, Pong]);
 * const dispatcher = buildDispatcher(topology);
 * ```
 *
 * @throws SwitchyardError INVALID_ARGUMENT for schema issues or message
 *   names missing from the catalog
 */
export function parseTopology(
  raw: unknown,
  catalog: MessageCatalog,
): TopologySpec {
  const result = topologyConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      `Invalid topology:\n${z.prettifyError(result.error)}`,
      { issues: formatIssues(result.error.issues) },
    );
  }

  const config = result.data;
  const messages = toMap(catalog);
  const unknown = new Set<string>();
  const resolve = (name: string): AnyMessageDescriptor | undefined => {
    const descriptor = messages.get(name);
    if (!descriptor) unknown.add(name);
    return descriptor;
  };

  const pathways = (config.pathways ?? []).flatMap((pathway) => {
    const message = resolve(pathway.message);
    return message
      ? [{ identity: pathway.identity, message, capacity: pathway.capacity }]
      : [];
  });

  const links = (config.links ?? []).map((link) => {
    const endpoint = (spec: {
      name: string;
      sends?: string;
    }): LinkEndpointSpec => ({
      name: spec.name,
      sends: spec.sends === undefined ? undefined : resolve(spec.sends),
    });
    const endpoints: readonly [LinkEndpointSpec, LinkEndpointSpec] = [
      endpoint(link.endpoints[0]),
      endpoint(link.endpoints[1]),
    ];
    return {
      name: link.name,
      capacity: link.capacity,
      addressing: link.addressing,
      endpoints,
    };
  });

  if (unknown.size > 0) {
    const names = Array.from(unknown);
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      `Topology references unknown message types: ${names.join(", ")}.`,
      { unknown: names },
    );
  }

  return { pathways, links };
}

function toMap(catalog: MessageCatalog): Map<string, AnyMessageDescriptor> {
  if (isDescriptorList(catalog)) {
    return new Map(catalog.map((descriptor) => [descriptor.type, descriptor]));
  }
  return new Map(Object.entries(catalog));
}

function isDescriptorList(
  catalog: MessageCatalog,
): catalog is readonly AnyMessageDescriptor[] {
  return Array.isArray(catalog);
}
