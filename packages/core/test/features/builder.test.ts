// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import {
  buildDispatcher,
  createPathway,
  DEFAULTS,
  envelope,
  senderEndpoint,
  type EnvelopeOf,
} from "../../src/index.js";
import { PING, TICK, thrown } from "../../src/testing/index.js";

describe("buildDispatcher", () => {
  it("returns a sealed dispatcher", () => {
    const dispatcher = buildDispatcher({
      pathways: [{ identity: "ticks", message: TICK }],
    });
    const [tx] = createPathway<EnvelopeOf<typeof TICK>>(1);

    expect(dispatcher.sealed).toBe(true);
    expect(
      thrown(() => dispatcher.registerSender("more", senderEndpoint(TICK, tx))),
    ).toMatchObject({ code: "REGISTRY_SEALED" });
  });

  it("can leave the dispatcher open for manual registration", () => {
    const dispatcher = buildDispatcher({}, { seal: false });
    const [tx] = createPathway<EnvelopeOf<typeof TICK>>(1);
    dispatcher.registerSender("more", senderEndpoint(TICK, tx));

    expect(dispatcher.sealed).toBe(false);
    expect(dispatcher.hasSender("more")).toBe(true);
  });

  describe("capacity", () => {
    it("falls back to the dispatcher default", () => {
      const dispatcher = buildDispatcher({
        pathways: [{ identity: "ticks", message: TICK }],
      });

      expect(dispatcher.defaultCapacity).toBe(DEFAULTS.PATHWAY_CAPACITY);
      expect(dispatcher.takeReceiver("ticks", TICK).capacity).toBe(16);
    });

    it("honours defaultCapacity and per-pathway overrides", () => {
      const dispatcher = buildDispatcher(
        {
          pathways: [
            { identity: "ticks", message: TICK },
            { identity: "sync", message: TICK, capacity: 0 },
          ],
          links: [
            {
              name: "Exchange",
              capacity: 8,
              endpoints: [{ name: "Pinger", sends: PING }, { name: "Ponger" }],
            },
          ],
        },
        { defaultCapacity: 3 },
      );

      expect(dispatcher.takeReceiver("ticks", TICK).capacity).toBe(3);
      expect(dispatcher.takeReceiver("sync", TICK).capacity).toBe(0);
      expect(
        dispatcher.takeLinkReceiver("Exchange", "Ponger", PING).capacity,
      ).toBe(8);
    });

    it("rejects a negative default", () => {
      expect(thrown(() => buildDispatcher({}, { defaultCapacity: -1 }))).toMatchObject(
        { code: "INVALID_ARGUMENT" },
      );
    });
  });

  describe("validation", () => {
    it("reports duplicate identities and link names together", () => {
      const link = {
        name: "Exchange",
        endpoints: [{ name: "Pinger", sends: PING }, { name: "Ponger" }],
      } as const;

      expect(
        thrown(() =>
          buildDispatcher({
            pathways: [
              { identity: "ticks", message: TICK },
              { identity: "ticks", message: TICK },
            ],
            links: [link, link],
          }),
        ),
      ).toMatchObject({
        code: "DUPLICATE_REGISTRATION",
        message: 'Topology declares duplicates: pathway "ticks", link "Exchange".',
        details: { identities: ["ticks"], links: ["Exchange"] },
      });
    });

    it("requires two distinct endpoints", () => {
      expect(
        thrown(() =>
          buildDispatcher({
            links: [
              {
                name: "Loop",
                endpoints: [{ name: "A", sends: PING }, { name: "A" }],
              },
            ],
          }),
        ),
      ).toMatchObject({
        code: "INVALID_ARGUMENT",
        details: { link: "Loop", endpoint: "A" },
      });
    });

    it("requires at least one message type per link", () => {
      expect(
        thrown(() =>
          buildDispatcher({
            links: [{ name: "Idle", endpoints: [{ name: "A" }, { name: "B" }] }],
          }),
        ),
      ).toMatchObject({ code: "INVALID_ARGUMENT", details: { link: "Idle" } });
    });

    it("rejects endpoint names that would break dispatch keys", () => {
      expect(
        thrown(() =>
          buildDispatcher({
            links: [
              {
                name: "Exchange",
                endpoints: [{ name: "A_to_B", sends: PING }, { name: "C" }],
              },
            ],
          }),
        ),
      ).toMatchObject({ code: "INVALID_ARGUMENT" });
    });
  });

  it("built pathways carry traffic", async () => {
    const dispatcher = buildDispatcher({
      pathways: [{ identity: "ticks", message: TICK, capacity: 1 }],
    });

    await dispatcher.send("ticks", envelope(TICK, undefined));
    expect(dispatcher.takeReceiver("ticks", TICK).tryRecv()).toEqual({
      kind: "value",
      value: { type: "TICK", payload: undefined },
    });
  });
});
