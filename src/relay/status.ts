/**
 * Status snapshot published on `<namespace>/status`.
 *
 * Same snake_case keys as config.yaml, except that the mappings listed under
 * `relay_commands` are published as `commands`. The password is masked.
 */

import { argsToJson, type JsonScalar } from "../core/arguments.js";
import { formatDuration } from "../config/duration.js";
import type { RelayConfig } from "../config/types.js";

const MASK = "********";

export interface StatusSnapshot {
  mqtt_host: string;
  mqtt_port: number;
  mqtt_client_id: string;
  mqtt_user: string;
  mqtt_password: string;
  mqtt_topic: string;
  mqtt_disable_config_send: boolean;
  osc_host: string;
  osc_port: number;
  osc_bind_addr: string;
  osc_bind_port: number;
  osc_disallow_arbritary_command: boolean;
  commands: {
    command: string;
    mqtt_topic: string;
    mqtt_sub_topic: string;
    disallow_payload: boolean;
    default_payload: JsonScalar[];
  }[];
  osc_subscriptions: {
    command: string;
    payload: JsonScalar[];
    interval: string;
  }[];
  log_level: string;
}

export function statusSnapshot(config: RelayConfig): StatusSnapshot {
  return {
    mqtt_host: config.mqttHost,
    mqtt_port: config.mqttPort,
    mqtt_client_id: config.mqttClientId ?? "",
    mqtt_user: config.mqttUser ?? "",
    mqtt_password: config.mqttPassword ? MASK : "",
    mqtt_topic: config.mqttTopic,
    mqtt_disable_config_send: config.mqttDisableConfigSend,
    osc_host: config.oscHost ?? "",
    osc_port: config.oscPort ?? 0,
    osc_bind_addr: config.oscBindAddr ?? "",
    osc_bind_port: config.oscBindPort ?? 0,
    osc_disallow_arbritary_command: config.oscDisallowArbitraryCommand,
    commands: config.commands.map((c) => ({
      command: c.command,
      mqtt_topic: c.mqttTopic ?? "",
      mqtt_sub_topic: c.mqttSubTopic ?? "",
      disallow_payload: c.disallowPayload,
      default_payload: argsToJson(c.defaultPayload),
    })),
    osc_subscriptions: config.oscSubscriptions.map((s) => ({
      command: s.command,
      payload: argsToJson(s.payload),
      interval: formatDuration(s.intervalMs),
    })),
    log_level: config.logLevel,
  };
}

export function encodeStatus(config: RelayConfig): string {
  return JSON.stringify(statusSnapshot(config));
}
