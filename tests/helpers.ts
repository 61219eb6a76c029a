/**
 * Shared test doubles: in-process broker and transport, log capture.
 */

import { pino, type Logger } from "pino";
import type { RelayConfig, RelayConfigDraft } from "../src/config/types.js";
import { validateRelays } from "../src/config/validator.js";
import type {
  BrokerConnection,
  BrokerOptions,
  MessageHandler,
  PublishOptions,
} from "../src/network/mqtt-broker.js";
import type { OscPacket } from "../src/network/osc-codec.js";
import type { OscTransport, TransportOptions } from "../src/network/udp-transport.js";

export interface Published {
  topic: string;
  payload: string;
  retain: boolean;
}

export class FakeBroker implements BrokerConnection {
  readonly published: Published[] = [];
  readonly subscriptions: string[] = [];
  closed = false;
  failSubscribe = new Set<string>();
  private handlers: MessageHandler[] = [];

  constructor(readonly options?: BrokerOptions) {}

  async publish(topic: string, payload: string, options: PublishOptions = {}): Promise<void> {
    this.published.push({ topic, payload, retain: options.retain ?? false });
  }

  async subscribe(topic: string): Promise<void> {
    if (this.failSubscribe.has(topic)) throw new Error(`refused ${topic}`);
    this.subscriptions.push(topic);
  }

  onMessage(handler: MessageHandler): void {
    this.handlers.push(handler);
  }

  /** Deliver a message as the broker would. */
  deliver(topic: string, payload: string | Buffer = ""): void {
    const buf = typeof payload === "string" ? Buffer.from(payload) : payload;
    for (const handler of this.handlers) handler(topic, buf);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  topicsPublished(): string[] {
    return this.published.map((p) => p.topic);
  }
}

export class FakeTransport implements OscTransport {
  readonly mode: "shared-socket" | "client-only";
  readonly sent: OscPacket[] = [];
  closed = false;
  failSends = false;

  constructor(readonly options: TransportOptions) {
    this.mode = options.bind ? "shared-socket" : "client-only";
  }

  address(): undefined {
    return undefined;
  }

  async send(packet: OscPacket | undefined): Promise<void> {
    if (!packet) return;
    if (this.failSends) throw new Error("send failed");
    this.sent.push(packet);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Simulate an inbound datagram. */
  receive(packet: OscPacket): void {
    this.options.onPacket?.(packet, { address: "127.0.0.1", family: "IPv4", port: 9000, size: 0 });
  }
}

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** pino logger writing parsed JSON lines into an array. */
export function captureLogger(): { logger: Logger; lines: LogLine[]; errors: () => LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "trace" },
    {
      write(chunk: string) {
        const line: LogLine = JSON.parse(chunk);
        lines.push(line);
      },
    },
  );
  return { logger, lines, errors: () => lines.filter((l) => l.level === 50) };
}

export function makeDraft(overrides: Partial<RelayConfigDraft> = {}): RelayConfigDraft {
  return {
    mqttHost: "localhost",
    mqttPort: 1883,
    mqttTopic: "osc/test",
    mqttDisableConfigSend: false,
    oscHost: "127.0.0.1",
    oscPort: 10023,
    oscDisallowArbitraryCommand: false,
    commands: [],
    oscSubscriptions: [],
    logLevel: "debug",
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<RelayConfigDraft> = {}): RelayConfig {
  return validateRelays([makeDraft(overrides)])[0];
}

/** Let pending promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Poll until `check` passes; UDP delivery is asynchronous. */
export async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("Timed out waiting for condition");
    await new Promise((r) => setTimeout(r, 10));
  }
}
