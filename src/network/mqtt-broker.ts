/**
 * MQTT broker connection.
 *
 * The relay talks to the broker through the small BrokerConnection
 * interface; `connectMqtt` backs it with MQTT.js. All traffic is QoS 0.
 */

import { connectAsync, type MqttClient } from "mqtt";
import type { Logger } from "pino";

export interface BrokerOptions {
  host: string;
  port: number;
  clientId?: string;
  username?: string;
  password?: string;
}

export interface PublishOptions {
  retain?: boolean;
}

export type MessageHandler = (topic: string, payload: Buffer) => void;

export interface BrokerConnection {
  publish(topic: string, payload: string, options?: PublishOptions): Promise<void>;
  subscribe(topic: string): Promise<void>;
  onMessage(handler: MessageHandler): void;
  close(): Promise<void>;
}

export type BrokerConnector = (options: BrokerOptions, logger: Logger) => Promise<BrokerConnection>;

/** QoS value MQTT uses in a SUBACK to refuse a subscription. */
const SUBACK_FAILURE = 128;

class MqttBrokerConnection implements BrokerConnection {
  constructor(private readonly client: MqttClient) {}

  async publish(topic: string, payload: string, options: PublishOptions = {}): Promise<void> {
    await this.client.publishAsync(topic, payload, { qos: 0, retain: options.retain ?? false });
  }

  async subscribe(topic: string): Promise<void> {
    const granted = await this.client.subscribeAsync(topic, { qos: 0 });
    if (granted.some((grant) => grant.qos === SUBACK_FAILURE)) {
      throw new Error(`Broker refused subscription to ${topic}`);
    }
  }

  onMessage(handler: MessageHandler): void {
    this.client.on("message", (topic, payload) => handler(topic, payload));
  }

  async close(): Promise<void> {
    await this.client.endAsync();
  }
}

export function brokerUrl(options: Pick<BrokerOptions, "host" | "port">): string {
  return `mqtt://${options.host}:${options.port}`;
}

/**
 * Connect to the broker. Rejects on the first failure (refused credentials,
 * unreachable host); later disconnects are left to MQTT.js reconnection.
 */
export const connectMqtt: BrokerConnector = async (options, logger) => {
  const client = await connectAsync(
    brokerUrl(options),
    {
      clientId: options.clientId,
      username: options.username,
      password: options.password,
    },
    false,
  );

  client.on("reconnect", () => logger.warn("MQTT reconnecting"));
  client.on("offline", () => logger.warn("MQTT connection offline"));
  client.on("error", (err) => logger.error({ err }, "MQTT error"));

  return new MqttBrokerConnection(client);
};
