import { describe, it, expect, vi } from "vitest";
import { HeartbeatDaemon } from "../../src/client/heartbeat.js";
import { LEVEL, captureLogger, silentLogger } from "../helpers.js";

describe("HeartbeatDaemon", () => {
  it("beats on every interval while connected", async () => {
    const beat = vi.fn(async () => {});
    const daemon = new HeartbeatDaemon({ intervalMs: 10, isConnected: () => true, beat, logger: silentLogger });

    daemon.start();
    expect(daemon.running).toBe(true);
    await vi.waitFor(() => expect(beat.mock.calls.length).toBeGreaterThanOrEqual(3));
    await daemon.stop();

    expect(daemon.running).toBe(false);
    const count = beat.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 40));
    expect(beat).toHaveBeenCalledTimes(count);
  });

  it("skips ticks while disconnected", async () => {
    const beat = vi.fn(async () => {});
    let connected = false;
    const daemon = new HeartbeatDaemon({ intervalMs: 10, isConnected: () => connected, beat, logger: silentLogger });

    daemon.start();
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(beat).not.toHaveBeenCalled();

    connected = true;
    await vi.waitFor(() => expect(beat).toHaveBeenCalled());
    await daemon.stop();
  });

  it("logs a failed beat and keeps running", async () => {
    const { logger, messages } = captureLogger();
    const beat = vi.fn(async () => {
      throw new Error("Socket closed");
    });
    const daemon = new HeartbeatDaemon({ intervalMs: 10, isConnected: () => true, beat, logger });

    daemon.start();
    await vi.waitFor(() => expect(beat.mock.calls.length).toBeGreaterThanOrEqual(2));
    await daemon.stop();

    expect(messages(LEVEL.warn)[0]).toBe("Heartbeat failed: Socket closed");
  });

  it("starts only one loop", async () => {
    const beat = vi.fn(async () => {});
    const daemon = new HeartbeatDaemon({ intervalMs: 40, isConnected: () => true, beat, logger: silentLogger });

    daemon.start();
    daemon.start();
    await vi.waitFor(() => expect(beat).toHaveBeenCalled(), { interval: 5 });
    await daemon.stop();
    expect(beat).toHaveBeenCalledTimes(1);
  });

  it("stops waiting for a stuck beat after the stop timeout", async () => {
    const { logger, messages } = captureLogger();
    const beat = vi.fn(() => new Promise<void>(() => {}));
    const daemon = new HeartbeatDaemon({
      intervalMs: 5,
      stopTimeoutMs: 30,
      isConnected: () => true,
      beat,
      logger,
    });

    daemon.start();
    await vi.waitFor(() => expect(beat).toHaveBeenCalled());
    await daemon.stop();

    expect(messages(LEVEL.warn)).toEqual(["Heartbeat loop still busy after 30ms, continuing shutdown"]);
  });

  it("stop is a no-op when never started", async () => {
    const daemon = new HeartbeatDaemon({ isConnected: () => true, beat: async () => {}, logger: silentLogger });
    await expect(daemon.stop()).resolves.toBeUndefined();
    expect(daemon.intervalMs).toBe(60_000);
  });
});
