import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { SubscriptionScheduler } from "../../src/relay/scheduler.js";
import type { OscMessage } from "../../src/network/osc-codec.js";
import { captureLogger } from "../helpers.js";

describe("SubscriptionScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("re-sends each push on its own interval", () => {
    const sent: OscMessage[] = [];
    const scheduler = new SubscriptionScheduler(
      [
        { command: "/xremote", payload: [], intervalMs: 1000 },
        { command: "/meters", payload: [{ type: "s", value: "/meters/1" }], intervalMs: 400 },
      ],
      async (m) => {
        sent.push(m);
      },
      captureLogger().logger,
    );

    scheduler.start();
    vi.advanceTimersByTime(1000);

    expect(sent.filter((m) => m.address === "/xremote")).toHaveLength(1);
    expect(sent.filter((m) => m.address === "/meters")).toHaveLength(2);
    expect(sent.find((m) => m.address === "/meters")?.args).toEqual([{ type: "s", value: "/meters/1" }]);
    scheduler.stop();
  });

  it("sends nothing before the first interval", () => {
    const send = vi.fn(async () => {});
    const scheduler = new SubscriptionScheduler(
      [{ command: "/xremote", payload: [], intervalMs: 1000 }],
      send,
      captureLogger().logger,
    );
    scheduler.start();
    vi.advanceTimersByTime(999);
    expect(send).not.toHaveBeenCalled();
    scheduler.stop();
  });

  it("stops all timers", () => {
    const send = vi.fn(async () => {});
    const scheduler = new SubscriptionScheduler(
      [{ command: "/xremote", payload: [], intervalMs: 100 }],
      send,
      captureLogger().logger,
    );
    scheduler.start();
    expect(scheduler.running).toBe(true);
    vi.advanceTimersByTime(250);
    scheduler.stop();
    expect(scheduler.running).toBe(false);
    vi.advanceTimersByTime(1000);
    expect(send).toHaveBeenCalledTimes(2);
  });

  it("does not double the timers when started twice", () => {
    const send = vi.fn(async () => {});
    const scheduler = new SubscriptionScheduler(
      [{ command: "/xremote", payload: [], intervalMs: 100 }],
      send,
      captureLogger().logger,
    );
    scheduler.start();
    scheduler.start();
    vi.advanceTimersByTime(100);
    expect(send).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it("logs failed sends and keeps going", async () => {
    const { logger, errors } = captureLogger();
    const send = vi.fn(async () => {
      throw new Error("network unreachable");
    });
    const scheduler = new SubscriptionScheduler([{ command: "/xremote", payload: [], intervalMs: 100 }], send, logger);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(200);
    scheduler.stop();

    expect(send).toHaveBeenCalledTimes(2);
    expect(errors().map((l) => l.msg)).toEqual(["Send Error", "Send Error"]);
    expect(errors()[0].command).toBe("/xremote");
  });
});
