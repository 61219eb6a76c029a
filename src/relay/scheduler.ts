/**
 * Subscription scheduler. Re-sends fixed OSC messages on independent
 * intervals, for OSC devices that only push data after a subscribe command.
 */

import type { Logger } from "pino";
import { oscMessage, type OscMessage } from "../network/osc-codec.js";
import type { ScheduledPush } from "../config/types.js";

export type SendMessage = (message: OscMessage) => Promise<void>;

export class SubscriptionScheduler {
  private timers: NodeJS.Timeout[] = [];

  constructor(
    private readonly pushes: readonly ScheduledPush[],
    private readonly send: SendMessage,
    private readonly logger: Logger,
  ) {}

  get running(): boolean {
    return this.timers.length > 0;
  }

  start(): void {
    if (this.running) return;
    for (const push of this.pushes) {
      this.logger.trace({ command: push.command, intervalMs: push.intervalMs }, "Started subscription");
      this.timers.push(setInterval(() => this.tick(push), push.intervalMs));
    }
  }

  /** A failed send is logged; the timer keeps running. */
  private tick(push: ScheduledPush): void {
    this.logger.trace({ command: push.command }, "Running subscription");
    this.send(oscMessage(push.command, [...push.payload])).catch((err: unknown) => {
      this.logger.error({ err, command: push.command }, "Send Error");
    });
  }

  stop(): void {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
  }
}
