// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @switchyard/zod - Zod adapter for Switchyard
 *
 * @example
 * ```typescript
 * import { buildDispatcher, endpointHandle } from "@switchyard/core";
 * import { z, message } from "@switchyard/zod";
 *
 * const Ping = message("PING", z.strictObject({ n: z.number() }));
 * const Pong = message("PONG", z.strictObject({ n: z.number() }));
 *
 * const dispatcher = buildDispatcher({
 *   links: [
 *     {
 *       name: "Exchange",
 *       endpoints: [
 *         { name: "Pinger", sends: Ping },
 *         { name: "Ponger", sends: Pong },
 *       ],
 *     },
 *   ],
 * });
 * ```
 */

// Canonical Zod instance (single import source)
export { z } from "zod";

export { formatIssues, message } from "./runtime.js";
export type { ZodMessageDescriptor } from "./runtime.js";

export { parseTopology, topologyConfigSchema } from "./topology.js";
export type { MessageCatalog, TopologyConfig } from "./topology.js";
