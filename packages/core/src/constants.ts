// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Global constants: default values and addressing separators.
 */

// Default configuration
export const DEFAULTS = {
  PATHWAY_CAPACITY: 16,
  LOG_LEVEL: "warn",
  DISPATCHER_NAME: "switchyard",
} as const;

// Dispatch key grammar: `{link}/{source}_to_{target}`
export const DISPATCH_KEY = {
  LINK_SEPARATOR: "/",
  DIRECTION_SEPARATOR: "_to_",
} as const;
