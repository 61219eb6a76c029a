/**
 * Relay config validator: per-relay required fields and cross-relay
 * uniqueness. The first violation throws a ConfigError naming the relay.
 */

import { ConfigError } from "../errors.js";
import type { CommandMapping, RelayConfig, RelayConfigDraft, ScheduledPush } from "./types.js";

const TOPIC_WILDCARDS = /[#+]/;

/** Longest delay setInterval honours; Node replaces larger ones with 1ms. */
export const MAX_INTERVAL_MS = 2_147_483_647;

/**
 * Validate relay drafts and return frozen configs.
 *
 * The bind port defaults to the OSC port when only a bind address is given.
 *
 * @throws ConfigError on the first violation
 */
export function validateRelays(drafts: readonly RelayConfigDraft[]): RelayConfig[] {
  if (drafts.length === 0) {
    throw new ConfigError("No relays defined in the configuration file.");
  }

  const relays = drafts.map((draft, index) => validateRelay(draft, index));
  checkCrossRelay(relays);
  return relays.map(freezeRelay);
}

function validateRelay(draft: RelayConfigDraft, index: number): RelayConfigDraft {
  const relay: RelayConfigDraft = { ...draft };

  if (relay.oscBindAddr && !relay.oscBindPort) {
    relay.oscBindPort = relay.oscPort;
  }

  if (!relay.mqttHost || !relay.mqttPort) {
    throw new ConfigError("MQTT host and port are required configurations.", index);
  }
  if (!relay.mqttTopic) {
    throw new ConfigError("MQTT topic is a required configuration.", index);
  }
  if (TOPIC_WILDCARDS.test(relay.mqttTopic) || relay.mqttTopic.endsWith("/")) {
    throw new ConfigError(
      `MQTT topic "${relay.mqttTopic}" must not contain wildcards or end with "/".`,
      index,
    );
  }
  if (!relay.oscBindAddr && !relay.oscHost) {
    throw new ConfigError(
      "You must define either a bind address or an OSC host in the configuration.",
      index,
    );
  }
  if (relay.oscHost && !relay.oscPort) {
    throw new ConfigError("An OSC port is required when an OSC host is set.", index);
  }
  if (relay.oscBindAddr && !relay.oscBindPort) {
    throw new ConfigError("An OSC bind port (or OSC port) is required with a bind address.", index);
  }

  relay.commands.forEach((command, i) => checkCommand(command, i, index));
  relay.oscSubscriptions.forEach((sub, i) => checkSubscription(sub, i, index));

  return relay;
}

function checkCommand(command: CommandMapping, position: number, index: number): void {
  if (!command.mqttTopic && !command.mqttSubTopic) {
    throw new ConfigError(
      `Command ${position} ("${command.command}") needs mqtt_topic or mqtt_sub_topic.`,
      index,
    );
  }
}

function checkSubscription(sub: ScheduledPush, position: number, index: number): void {
  if (!Number.isFinite(sub.intervalMs) || sub.intervalMs < 1) {
    throw new ConfigError(
      `OSC subscription ${position} ("${sub.command}") needs an interval of at least 1ms.`,
      index,
    );
  }
  if (sub.intervalMs > MAX_INTERVAL_MS) {
    throw new ConfigError(
      `OSC subscription ${position} ("${sub.command}") needs an interval of at most ${MAX_INTERVAL_MS}ms.`,
      index,
    );
  }
}

function checkCrossRelay(relays: readonly RelayConfigDraft[]): void {
  relays.forEach((relay, i) => {
    relays.forEach((other, b) => {
      if (b === i) return;
      if (relay.mqttTopic === other.mqttTopic) {
        throw new ConfigError("MQTT topic cannot exist on 2 different relays.", i);
      }
      if (relay.oscBindPort && relay.oscBindPort === other.oscBindPort) {
        throw new ConfigError("Cannot use the same OSC bind port on 2 different relays.", i);
      }
    });
  });
}

function freezeRelay(relay: RelayConfigDraft): RelayConfig {
  return Object.freeze({
    ...relay,
    commands: Object.freeze(
      relay.commands.map((c) => Object.freeze({ ...c, defaultPayload: Object.freeze([...c.defaultPayload]) })),
    ),
    oscSubscriptions: Object.freeze(
      relay.oscSubscriptions.map((s) => Object.freeze({ ...s, payload: Object.freeze([...s.payload]) })),
    ),
  });
}
