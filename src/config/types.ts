/**
 * Relay configuration types.
 */

import type { OscArg } from "../network/osc-codec.js";

/** Relay verbosity, from quietest to noisiest. */
export const RELAY_LOG_LEVELS = ["error", "receive", "send", "debug"] as const;

export type RelayLogLevel = (typeof RELAY_LOG_LEVELS)[number];

/** A pre-defined MQTT topic that triggers one OSC command. */
export interface CommandMapping {
  /** OSC address to send: "/ch/1/mute" */
  readonly command: string;
  /** Absolute MQTT topic to subscribe */
  readonly mqttTopic?: string;
  /** Topic below the relay namespace: "mute" → "<namespace>/mute" */
  readonly mqttSubTopic?: string;
  /** Ignore incoming payloads and always send `defaultPayload` */
  readonly disallowPayload: boolean;
  /** Arguments sent when no payload is given or payloads are disallowed */
  readonly defaultPayload: readonly OscArg[];
}

/** An OSC message re-sent on a fixed interval (OSC-side data subscriptions). */
export interface ScheduledPush {
  readonly command: string;
  readonly payload: readonly OscArg[];
  readonly intervalMs: number;
}

/** One relay as read from the configuration file, before validation. */
export interface RelayConfigDraft {
  mqttHost: string;
  mqttPort: number;
  mqttClientId?: string;
  mqttUser?: string;
  mqttPassword?: string;
  /** Namespace root: "osc/example" */
  mqttTopic: string;
  mqttDisableConfigSend: boolean;
  oscHost?: string;
  oscPort?: number;
  oscBindAddr?: string;
  oscBindPort?: number;
  oscDisallowArbitraryCommand: boolean;
  commands: CommandMapping[];
  oscSubscriptions: ScheduledPush[];
  logLevel: RelayLogLevel;
}

/** A validated relay configuration. Frozen; never mutated after load. */
export interface RelayConfig
  extends Readonly<Omit<RelayConfigDraft, "commands" | "oscSubscriptions">> {
  readonly commands: readonly CommandMapping[];
  readonly oscSubscriptions: readonly ScheduledPush[];
}

