// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Dispatch keys for link addressing: `{link}/{source}_to_{target}`.
 *
 * Injective because link names may not contain the link separator, and
 * endpoint names may contain neither separator nor begin or end with a
 * fragment of the direction separator (`to_`, `_to`) that would let a second
 * `_to_` straddle the join.
 */

import { DISPATCH_KEY } from "../constants.js";
import { SwitchyardError } from "../error/error.js";

const { LINK_SEPARATOR, DIRECTION_SEPARATOR } = DISPATCH_KEY;
const DIRECTION_HEAD = DIRECTION_SEPARATOR.slice(0, -1); // "_to"
const DIRECTION_TAIL = DIRECTION_SEPARATOR.slice(1); // "to_"

export interface DispatchKeyParts {
  readonly link: string;
  readonly source: string;
  readonly target: string;
}

export function dispatchKey(
  link: string,
  source: string,
  target: string,
): string {
  assertLinkName(link);
  assertEndpointName(source, link);
  assertEndpointName(target, link);
  return `${link}${LINK_SEPARATOR}${source}${DIRECTION_SEPARATOR}${target}`;
}

/**
 * Inverse of dispatchKey(). Returns undefined for strings it did not produce.
 */
export function parseDispatchKey(key: string): DispatchKeyParts | undefined {
  const slash = key.indexOf(LINK_SEPARATOR);
  if (slash <= 0) return undefined;

  const link = key.slice(0, slash);
  const direction = key.slice(slash + LINK_SEPARATOR.length);
  const parts = direction.split(DIRECTION_SEPARATOR);
  if (parts.length !== 2) return undefined;

  const [source, target] = parts;
  if (source === undefined || !isEndpointName(source)) return undefined;
  if (target === undefined || !isEndpointName(target)) return undefined;
  return { link, source, target };
}

export function assertLinkName(link: string): void {
  if (link === "" || link.includes(LINK_SEPARATOR)) {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      `Link name must be non-empty and must not contain "${LINK_SEPARATOR}": "${link}"`,
      { link },
    );
  }
}

export function isEndpointName(name: string): boolean {
  return (
    name !== "" &&
    !name.includes(LINK_SEPARATOR) &&
    !name.includes(DIRECTION_SEPARATOR) &&
    !name.startsWith(DIRECTION_TAIL) &&
    !name.endsWith(DIRECTION_HEAD)
  );
}

export function assertEndpointName(name: string, link: string): void {
  if (!isEndpointName(name)) {
    throw new SwitchyardError(
      "INVALID_ARGUMENT",
      `Endpoint name on link "${link}" must be non-empty, must not contain "${LINK_SEPARATOR}" or "${DIRECTION_SEPARATOR}", and must not start with "${DIRECTION_TAIL}" or end with "${DIRECTION_HEAD}": "${name}"`,
      { link, endpoint: name },
    );
  }
}
