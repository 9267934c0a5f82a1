// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { thrown } from "../testing/index.js";
import { RouteTable, type Addressing, type PathwayRoute } from "./route-table.js";

// Helper to create test routes with keys in dispatch-key form
function createRoute(
  link: string,
  source: string,
  target: string,
  messageType: string,
  addressing: Addressing = "type",
): PathwayRoute {
  return {
    key: `${link}/${source}_to_${target}`,
    link,
    source,
    target,
    messageType,
    addressing,
  };
}

describe("RouteTable", () => {
  describe("type addressing", () => {
    it("resolves the direction from the message type", () => {
      const table = new RouteTable()
        .register(createRoute("L", "A", "B", "PING"))
        .register(createRoute("L", "B", "A", "PONG"));

      expect(table.resolve("L", "PING").key).toBe("L/A_to_B");
      expect(table.resolve("L", "PONG").key).toBe("L/B_to_A");
      expect(table.resolve("L", "PING", "A").key).toBe("L/A_to_B");
    });

    it("rejects a second route for the same type on one link", () => {
      const table = new RouteTable().register(
        createRoute("L", "A", "B", "PING"),
      );

      expect(
        thrown(() => table.register(createRoute("L", "B", "A", "PING"))),
      ).toMatchObject({
        code: "AMBIGUOUS_DISPATCH",
        details: {
          link: "L",
          messageType: "PING",
          existing: "L/A_to_B",
          incoming: "L/B_to_A",
        },
      });
    });

    it("allows the same type on different links", () => {
      const table = new RouteTable()
        .register(createRoute("L1", "A", "B", "PING"))
        .register(createRoute("L2", "A", "B", "PING"));

      expect(table.resolve("L1", "PING").key).toBe("L1/A_to_B");
      expect(table.resolve("L2", "PING").key).toBe("L2/A_to_B");
    });

    it("rejects a duplicate key", () => {
      const table = new RouteTable().register(
        createRoute("L", "A", "B", "PING"),
      );

      expect(
        thrown(() => table.register(createRoute("L", "A", "B", "PONG"))),
      ).toMatchObject({ code: "DUPLICATE_REGISTRATION" });
    });
  });

  describe("lookup misses", () => {
    const table = new RouteTable().register(createRoute("L", "A", "B", "PING"));

    it("reports an unknown link", () => {
      expect(thrown(() => table.resolve("M", "PING"))).toMatchObject({
        code: "LINK_NOT_FOUND",
        details: { link: "M" },
      });
    });

    it("reports a type the link does not carry", () => {
      expect(thrown(() => table.resolve("L", "PONG"))).toMatchObject({
        code: "MESSAGE_TYPE_NOT_MAPPED",
        details: { link: "L", messageType: "PONG" },
      });
    });

    it("reports a sender that does not own the route", () => {
      expect(thrown(() => table.resolve("L", "PING", "B"))).toMatchObject({
        code: "MESSAGE_TYPE_NOT_MAPPED",
        details: { link: "L", messageType: "PING", from: "B" },
      });
    });
  });

  describe("direction addressing", () => {
    const symmetric = (): RouteTable =>
      new RouteTable()
        .register(createRoute("D", "A", "B", "PING", "direction"))
        .register(createRoute("D", "B", "A", "PING", "direction"));

    it("carries one type in both directions", () => {
      const table = symmetric();
      expect(table.resolve("D", "PING", "A").key).toBe("D/A_to_B");
      expect(table.resolve("D", "PING", "B").key).toBe("D/B_to_A");
    });

    it("requires the sending endpoint", () => {
      expect(thrown(() => symmetric().resolve("D", "PING"))).toMatchObject({
        code: "AMBIGUOUS_DISPATCH",
        details: { link: "D", messageType: "PING", sources: ["A", "B"] },
      });
    });

    it("rejects a type-addressed route for a directional type", () => {
      const table = symmetric();
      expect(
        thrown(() => table.register(createRoute("D", "A", "C", "PING"))),
      ).toMatchObject({
        code: "AMBIGUOUS_DISPATCH",
        details: { existing: "D/A_to_B" },
      });
    });

    it("refuses to pick between two sources feeding one target", () => {
      const table = new RouteTable()
        .register(createRoute("D", "A", "C", "PING", "direction"))
        .register(createRoute("D", "B", "C", "PING", "direction"));

      expect(thrown(() => table.findInbound("D", "C", "PING"))).toMatchObject({
        code: "AMBIGUOUS_DISPATCH",
        details: {
          link: "D",
          target: "C",
          messageType: "PING",
          keys: ["D/A_to_C", "D/B_to_C"],
        },
      });
      expect(table.resolve("D", "PING", "B").key).toBe("D/B_to_C");
    });

    it("rejects a second route for one source and type", () => {
      const table = symmetric();
      expect(
        thrown(() =>
          table.register(createRoute("D", "A", "C", "PING", "direction")),
        ),
      ).toMatchObject({ code: "AMBIGUOUS_DISPATCH" });
    });
  });

  it("finds the inbound route of an endpoint", () => {
    const table = new RouteTable()
      .register(createRoute("L", "A", "B", "PING"))
      .register(createRoute("L", "B", "A", "PONG"));

    expect(table.findInbound("L", "B", "PING")?.key).toBe("L/A_to_B");
    expect(table.findInbound("L", "A", "PING")).toBeUndefined();
    expect(table.list().map((route) => route.key)).toEqual([
      "L/A_to_B",
      "L/B_to_A",
    ]);
  });
});
