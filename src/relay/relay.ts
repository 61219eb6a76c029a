/**
 * Relay engine. One instance per MQTT ⇄ OSC bridge.
 *
 * Owns the broker connection, the UDP transport and the subscription
 * scheduler for a single relay config. Relays share nothing; a process
 * runs one Relay per configured entry.
 */

import type { Logger } from "pino";
import type { RelayConfig } from "../config/types.js";
import { encodeArgumentPayload } from "../core/arguments.js";
import { encodeBundlePayload, toPortable } from "../core/bundle-codec.js";
import { relayTopics, routeMessage, subscriptionTopics, type RouteAction } from "../core/router.js";
import { RelayStartError } from "../errors.js";
import { connectMqtt, type BrokerConnection, type BrokerConnector } from "../network/mqtt-broker.js";
import type { OscMessage, OscPacket } from "../network/osc-codec.js";
import {
  openTransport,
  type OscTransport,
  type TransportOptions,
  type UdpEndpoint,
} from "../network/udp-transport.js";
import { getLogger, relayLogger } from "../utils/logger.js";
import { SubscriptionScheduler } from "./scheduler.js";
import { encodeStatus } from "./status.js";

export interface RelayDependencies {
  connectBroker?: BrokerConnector;
  openTransport?: (options: TransportOptions) => Promise<OscTransport>;
  /** Parent logger; the relay logs through a child tagged with its namespace. */
  logger?: Logger;
}

export type RelayState = "idle" | "starting" | "running" | "stopped";

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Relay {
  readonly logger: Logger;
  private readonly connectBroker: BrokerConnector;
  private readonly openTransport: (options: TransportOptions) => Promise<OscTransport>;
  private readonly topics: ReturnType<typeof relayTopics>;

  private broker?: BrokerConnection;
  private transport?: OscTransport;
  private scheduler?: SubscriptionScheduler;
  private _state: RelayState = "idle";

  constructor(
    readonly config: RelayConfig,
    deps: RelayDependencies = {},
  ) {
    this.logger = relayLogger(config.mqttTopic, config.logLevel, deps.logger ?? getLogger());
    this.connectBroker = deps.connectBroker ?? connectMqtt;
    this.openTransport = deps.openTransport ?? openTransport;
    this.topics = relayTopics(config.mqttTopic);
  }

  get state(): RelayState {
    return this._state;
  }

  /** The OSC peer, when both host and port are configured. */
  private peer(): UdpEndpoint | undefined {
    const { oscHost, oscPort } = this.config;
    return oscHost && oscPort ? { host: oscHost, port: oscPort } : undefined;
  }

  private bindAddress(): UdpEndpoint | undefined {
    const { oscBindAddr, oscBindPort } = this.config;
    return oscBindAddr && oscBindPort ? { host: oscBindAddr, port: oscBindPort } : undefined;
  }

  /**
   * Connect, open the OSC socket, subscribe, start scheduled pushes and
   * publish the status snapshot.
   *
   * @throws RelayStartError if the broker or the OSC socket is unavailable
   */
  async start(): Promise<void> {
    if (this._state !== "idle") {
      throw new Error(`Relay ${this.config.mqttTopic} cannot start from state "${this._state}"`);
    }
    this._state = "starting";
    const { config } = this;

    this.logger.trace("Connecting to MQTT");
    let broker: BrokerConnection;
    try {
      broker = await this.connectBroker(
        {
          host: config.mqttHost,
          port: config.mqttPort,
          clientId: config.mqttClientId,
          username: config.mqttUser,
          password: config.mqttPassword,
        },
        this.logger,
      );
      this.broker = broker;
    } catch (err) {
      this._state = "stopped";
      throw new RelayStartError(`MQTT error: ${errorText(err)}`, { cause: err });
    }
    if (!this.isStarting()) return this.abandonStart();

    const bind = this.bindAddress();
    if (bind) this.logger.trace({ bind }, "Starting OSC Server");
    try {
      this.transport = await this.openTransport({
        peer: this.peer(),
        bind,
        onPacket: (packet) => this.handleOscPacket(packet),
        logger: this.logger,
      });
    } catch (err) {
      await this.stop();
      throw new RelayStartError(`OSC server error: ${errorText(err)}`, { cause: err });
    }
    if (!this.isStarting()) return this.abandonStart();

    broker.onMessage((topic, payload) => {
      this.handleBrokerMessage(topic, payload).catch((err: unknown) => {
        this.logger.error({ err, topic }, "MQTT message handling failed");
      });
    });
    for (const topic of subscriptionTopics(config)) {
      await this.subscribe(topic);
      if (!this.isStarting()) return this.abandonStart();
    }

    this.scheduler = new SubscriptionScheduler(config.oscSubscriptions, (m) => this.sendOsc(m), this.logger);
    this.scheduler.start();
    this._state = "running";

    try {
      await this.publishStatus();
    } catch (err) {
      this.logger.error({ err }, "Status publish failed");
    }
  }

  private isStarting(): boolean {
    return this._state === "starting";
  }

  /** stop() ran while start() was waiting: close what start() opened since. */
  private async abandonStart(): Promise<never> {
    await this.stop();
    throw new RelayStartError(`Relay ${this.config.mqttTopic} was stopped during startup`);
  }

  /** Stop timers, close the OSC socket and the broker connection. Idempotent. */
  async stop(): Promise<void> {
    if (this._state === "stopped" && !this.broker && !this.transport) return;
    this._state = "stopped";

    this.scheduler?.stop();
    this.scheduler = undefined;

    const transport = this.transport;
    const broker = this.broker;
    this.transport = undefined;
    this.broker = undefined;
    await transport?.close();
    await broker?.close();
  }

  private async subscribe(topic: string): Promise<void> {
    this.logger.trace({ topic }, "Subscribing MQTT");
    try {
      await this.broker?.subscribe(topic);
    } catch (err) {
      this.logger.error({ err, topic }, "MQTT Subscribe Error");
    }
  }

  private async publish(topic: string, payload: string): Promise<void> {
    if (!this.broker) throw new Error("MQTT connection is not open");
    await this.broker.publish(topic, payload, { retain: true });
    this.logger.debug({ topic, payload }, "-> [MQTT]");
  }

  private async sendOsc(packet: OscPacket): Promise<void> {
    if (!this.transport) throw new Error("OSC transport is not open");
    await this.transport.send(packet);
  }

  /** Publish the config snapshot unless disabled for this relay. */
  async publishStatus(): Promise<void> {
    if (this.config.mqttDisableConfigSend) return;
    await this.publish(this.topics.status, encodeStatus(this.config));
  }

  // -------------------------------------------------------------------------
  // MQTT → OSC
  // -------------------------------------------------------------------------

  /** Route one broker message and run its actions; each failure is logged on its own. */
  async handleBrokerMessage(topic: string, payload: Buffer): Promise<void> {
    this.logger.info({ topic, payload: payload.toString() }, "<- [MQTT]");
    for (const action of routeMessage(this.config, topic, payload)) {
      await this.execute(action);
    }
  }

  private async execute(action: RouteAction): Promise<void> {
    switch (action.kind) {
      case "rejected":
        this.logger.error({ origin: action.origin }, action.reason);
        return;
      case "status":
        await this.runLogged(() => this.publishStatus(), "Status publish failed");
        return;
      case "message":
        await this.runLogged(() => this.sendOsc(action.message), "Send Error");
        return;
      case "bundle":
        await this.runLogged(() => this.sendOsc(action.bundle), "Send Error");
        return;
    }
  }

  private async runLogged(task: () => Promise<void>, failure: string): Promise<void> {
    try {
      await task();
    } catch (err) {
      this.logger.error({ err }, failure);
    }
  }

  // -------------------------------------------------------------------------
  // OSC → MQTT
  // -------------------------------------------------------------------------

  private handleOscPacket(packet: OscPacket): void {
    this.forwardOscPacket(packet).catch((err: unknown) => {
      this.logger.error({ err }, "MQTT publish failed");
    });
  }

  /**
   * Messages go to `<namespace>/cmd<address>` as a JSON argument array;
   * bundles go to `<namespace>/bundle` as a JSON bundle.
   */
  async forwardOscPacket(packet: OscPacket): Promise<void> {
    if (packet.kind === "message") {
      await this.forwardOscMessage(packet);
      return;
    }
    const bundle = toPortable(packet);
    this.logger.info({ timetag: bundle.timetag }, "<- [OSC] Bundle");
    await this.publish(this.topics.bundle, encodeBundlePayload(bundle));
  }

  private async forwardOscMessage(message: OscMessage): Promise<void> {
    this.logger.info({ address: message.address, args: message.args.map((a) => a.value) }, "<- [OSC]");
    await this.publish(this.topics.command(message.address), encodeArgumentPayload(message.args));
  }
}
