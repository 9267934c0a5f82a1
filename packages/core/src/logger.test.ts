// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, LOG_CONTEXT } from "./logger.js";
import { createCaptureLogger } from "./testing/index.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops entries below the minimum level", () => {
    const log = vi.fn();
    const logger = createLogger({ minLevel: "warn", log });

    logger.debug(LOG_CONTEXT.REGISTRY, "registered");
    logger.info(LOG_CONTEXT.LIFECYCLE, "sealed");
    logger.warn(LOG_CONTEXT.CLAIM, "claimed twice", { identity: "a" });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("warn", "claim", "claimed twice", {
      identity: "a",
    });
  });

  it("writes to the console without a custom sink", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger().error(LOG_CONTEXT.DISPATCH, "mismatch", { code: "X" });

    expect(error).toHaveBeenCalledWith("[dispatch] mismatch", { code: "X" });
  });
});

describe("createCaptureLogger", () => {
  it("records entries by level", () => {
    const logger = createCaptureLogger();
    logger.info(LOG_CONTEXT.LIFECYCLE, "sealed");
    logger.error(LOG_CONTEXT.DISPATCH, "mismatch");

    expect(logger.entries).toHaveLength(2);
    expect(logger.at("error")).toEqual([
      { level: "error", context: "dispatch", message: "mismatch", data: undefined },
    ]);

    logger.clear();
    expect(logger.entries).toHaveLength(0);
  });
});
