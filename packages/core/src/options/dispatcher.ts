/**
 * Dispatcher configuration.
 * Enabled via new Dispatcher({ name, logger, defaultCapacity }).
 *
 * Behavior:
 * - defaultCapacity applies to pathways the builder creates without an
 *   explicit capacity
 * - logger receives registry, dispatch, claim and lifecycle events
 */

import { DEFAULTS } from "../constants.js";
import { createLogger, type LoggerAdapter } from "../logger.js";
import { assertCapacity } from "../pathway/pathway.js";

export interface DispatcherOptions {
  /** Name used in log lines and describe(). Default: "switchyard" */
  name?: string;
  /** Default: console logger at "warn" and above */
  logger?: LoggerAdapter;
  /** Default: 16 */
  defaultCapacity?: number;
}

export interface ResolvedDispatcherOptions {
  readonly name: string;
  readonly logger: LoggerAdapter;
  readonly defaultCapacity: number;
}

export function resolveOptions(
  options: DispatcherOptions = {},
): ResolvedDispatcherOptions {
  const defaultCapacity = options.defaultCapacity ?? DEFAULTS.PATHWAY_CAPACITY;
  assertCapacity(defaultCapacity);

  return {
    name: options.name ?? DEFAULTS.DISPATCHER_NAME,
    logger: options.logger ?? createLogger({ minLevel: DEFAULTS.LOG_LEVEL }),
    defaultCapacity,
  };
}
