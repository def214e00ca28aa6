import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import { errorMessage } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import {
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  HEARTBEAT_STOP_TIMEOUT_MS,
} from "../shared/constants.js";

export interface HeartbeatOptions {
  intervalMs?: number;
  /** How long `stop()` waits for the loop to notice. */
  stopTimeoutMs?: number;
  isConnected: () => boolean;
  /** One heartbeat exchange; rejections are logged and dropped. */
  beat: () => Promise<void>;
  logger?: Logger;
}

/**
 * Background loop that sends a heartbeat every `intervalMs` while connected.
 * It never reconnects; the next application call does that.
 */
export class HeartbeatDaemon {
  readonly intervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly isConnected: () => boolean;
  private readonly beat: () => Promise<void>;
  private readonly log: Logger;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: HeartbeatOptions) {
    this.intervalMs = options.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? HEARTBEAT_STOP_TIMEOUT_MS;
    this.isConnected = options.isConnected;
    this.beat = options.beat;
    this.log = options.logger ?? componentLogger("heartbeat");
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  async stop(): Promise<void> {
    const { controller, loop } = this;
    this.controller = null;
    this.loop = null;
    if (!controller || !loop) return;

    controller.abort();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.stopTimeoutMs);
    });
    const joined = await Promise.race([loop.then(() => true), timedOut]);
    clearTimeout(timer);
    if (!joined) {
      this.log.warn(`Heartbeat loop still busy after ${this.stopTimeoutMs}ms, continuing shutdown`);
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.log.debug(`Heartbeat started (every ${this.intervalMs}ms)`);
    while (!signal.aborted) {
      try {
        await sleep(this.intervalMs, undefined, { signal, ref: false });
      } catch (err) {
        if (!signal.aborted) this.log.warn(`Heartbeat timer failed: ${errorMessage(err)}`);
        break;
      }
      if (!this.isConnected()) continue;

      try {
        await this.beat();
      } catch (err) {
        this.log.warn(`Heartbeat failed: ${errorMessage(err)}`);
      }
    }
    this.log.debug("Heartbeat stopped");
  }
}
