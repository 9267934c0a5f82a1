// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { buildDispatcher, endpointHandle } from "../../src/index.js";
import { createCaptureLogger, PING, PONG } from "../../src/testing/index.js";

function exchange() {
  const logger = createCaptureLogger();
  const dispatcher = buildDispatcher(
    {
      links: [
        {
          name: "Exchange",
          capacity: 8,
          endpoints: [
            { name: "Pinger", sends: PING },
            { name: "Ponger", sends: PONG },
          ],
        },
      ],
    },
    { logger },
  );
  return { dispatcher, logger };
}

describe("Ping/Pong exchange", () => {
  it("echoes each ping's counter back in a pong over one link", async () => {
    const { dispatcher, logger } = exchange();
    const pinger = endpointHandle(dispatcher, {
      link: "Exchange",
      endpoint: "Pinger",
      sends: PING,
      receives: PONG,
    });
    const ponger = endpointHandle(dispatcher, {
      link: "Exchange",
      endpoint: "Ponger",
      sends: PONG,
      receives: PING,
    });

    const responder = (async () => {
      const seen: number[] = [];
      for await (const ping of ponger) {
        seen.push(ping.payload.n);
        await ponger.send({ n: ping.payload.n });
      }
      return seen;
    })();

    const replies: number[] = [];
    for (let round = 0; round < 3; round++) {
      await pinger.send({ n: round });
      const pong = await pinger.recv();
      replies.push(pong?.payload.n ?? -1);
    }

    expect(replies).toEqual([0, 1, 2]);

    dispatcher.close();
    expect(await responder).toEqual([0, 1, 2]);
    expect(await pinger.recv()).toBeNull();
    expect(logger.at("error")).toHaveLength(0);
  });

  it("a receive given up on a timeout does not consume the next pong", async () => {
    const { dispatcher } = exchange();
    const pinger = endpointHandle(dispatcher, {
      link: "Exchange",
      endpoint: "Pinger",
      sends: PING,
      receives: PONG,
    });
    const ponger = endpointHandle(dispatcher, {
      link: "Exchange",
      endpoint: "Ponger",
      sends: PONG,
    });

    await expect(
      pinger.recv({ signal: AbortSignal.timeout(5) }),
    ).rejects.toMatchObject({ code: "ABORTED" });

    await ponger.send({ n: 7 });
    expect(await pinger.recv()).toEqual({ type: "PONG", payload: { n: 7 } });
  });

  it("a handle without a receiving side cannot receive", async () => {
    const { dispatcher } = exchange();
    const sendOnly = endpointHandle(dispatcher, {
      link: "Exchange",
      endpoint: "Pinger",
      sends: PING,
    });

    await expect(sendOnly.recv()).rejects.toMatchObject({
      code: "MESSAGE_TYPE_NOT_MAPPED",
    });
  });

  it("each endpoint handle can be claimed once", () => {
    const { dispatcher } = exchange();
    endpointHandle(dispatcher, {
      link: "Exchange",
      endpoint: "Ponger",
      receives: PING,
    });

    expect(() =>
      endpointHandle(dispatcher, {
        link: "Exchange",
        endpoint: "Ponger",
        receives: PING,
      }),
    ).toThrow('Receiver for identity "Exchange/Pinger_to_Ponger" was already claimed.');
  });
});
