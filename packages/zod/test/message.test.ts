// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { buildDispatcher, envelope } from "@switchyard/core";
import { createCaptureLogger } from "@switchyard/core/testing";
import { formatIssues, message, z } from "../src/index.js";

const Ping = message("PING", z.strictObject({ n: z.number().int() }));

describe("message()", () => {
  it("creates a frozen descriptor carrying its schema", () => {
    expect(Ping.type).toBe("PING");
    expect(Ping.__runtime).toBe("switchyard-zod");
    expect(Ping.schema).toBeDefined();
    expect(Object.isFrozen(Ping)).toBe(true);
  });

  it("creates a descriptor without a payload schema", () => {
    const Tick = message("TICK");
    expect(Tick.type).toBe("TICK");
    expect(Tick.schema).toBeUndefined();
    expect(Tick.validate).toBeUndefined();
  });

  it("accepts a valid payload", () => {
    expect(Ping.validate?.({ n: 1 })).toEqual({ ok: true, value: { n: 1 } });
  });

  it("reports issues with their path", () => {
    const result = Ping.validate?.({ n: "1" });
    expect(result?.ok).toBe(false);
    if (result?.ok === false) {
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0]).toMatch(/^n: /);
    }
  });

  it("rejects unknown keys", () => {
    const result = Ping.validate?.({ n: 1, extra: true });
    expect(result?.ok).toBe(false);
    if (result?.ok === false) {
      expect(result.issues[0]).toMatch(/extra/);
    }
  });

  it("rejects an empty type", () => {
    expect(() => message("")).toThrow("Invalid MessageDescriptor.type");
  });
});

describe("formatIssues()", () => {
  it("joins paths with dots", () => {
    expect(
      formatIssues([
        { path: ["links", 0, "capacity"], message: "Too small" },
        { path: [], message: "Unrecognized key" },
      ]),
    ).toEqual(["links.0.capacity: Too small", "Unrecognized key"]);
  });
});

describe("Zod descriptors in a dispatcher", () => {
  it("delivers valid payloads and refuses invalid ones", async () => {
    const logger = createCaptureLogger();
    const dispatcher = buildDispatcher(
      { pathways: [{ identity: "pings", message: Ping, capacity: 2 }] },
      { logger },
    );

    await dispatcher.send("pings", envelope(Ping, { n: 3 }));
    await expect(
      dispatcher.send("pings", { type: "PING", payload: { n: 1.5 } }),
    ).rejects.toMatchObject({
      code: "TYPE_MISMATCH",
      details: { expected: "PING" },
    });

    const rx = dispatcher.takeReceiver("pings", Ping);
    expect(rx.size).toBe(1);
    expect(await rx.recv()).toEqual({ type: "PING", payload: { n: 3 } });
    expect(logger.at("error")).toHaveLength(1);
  });
});
