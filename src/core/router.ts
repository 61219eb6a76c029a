/**
 * Topic router: decides what an inbound MQTT message should do.
 *
 * Pure: the relay config is read-only and each message is routed on its
 * own. Every matching command mapping fires; only when none matched do the
 * namespace topics apply, in order: send, bundle/send, status/check.
 */

import { oscMessage, type OscArg, type OscBundle, type OscMessage } from "../network/osc-codec.js";
import type { CommandMapping, RelayConfig } from "../config/types.js";
import { decodeArgumentPayload } from "./arguments.js";
import { decodeBundlePayload, toWire } from "./bundle-codec.js";

// ---------------------------------------------------------------------------
// Topics
// ---------------------------------------------------------------------------

/** Well-known topics below a relay namespace. */
export function relayTopics(namespace: string) {
  return {
    send: `${namespace}/send`,
    sendWildcard: `${namespace}/send/#`,
    bundle: `${namespace}/bundle`,
    bundleSend: `${namespace}/bundle/send`,
    status: `${namespace}/status`,
    statusCheck: `${namespace}/status/check`,
    /** `<namespace>/cmd/ch/1/mute` for OSC address `/ch/1/mute` */
    command: (address: string) => `${namespace}/cmd${address}`,
  };
}

/** Absolute topics a mapping listens on. */
export function mappingTopics(namespace: string, mapping: CommandMapping): string[] {
  const topics: string[] = [];
  if (mapping.mqttTopic) topics.push(mapping.mqttTopic);
  if (mapping.mqttSubTopic) topics.push(`${namespace}/${mapping.mqttSubTopic}`);
  return topics;
}

/** Every topic a relay subscribes to, without duplicates. */
export function subscriptionTopics(config: RelayConfig): string[] {
  const topics = relayTopics(config.mqttTopic);
  const all = [topics.sendWildcard, topics.bundleSend, topics.statusCheck];
  for (const mapping of config.commands) {
    all.push(...mappingTopics(config.mqttTopic, mapping));
  }
  return [...new Set(all)];
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export type RouteAction =
  | { kind: "message"; origin: "mapping" | "send"; message: OscMessage }
  | { kind: "bundle"; bundle: OscBundle }
  | { kind: "status" }
  | { kind: "rejected"; origin: "mapping" | "send" | "bundle"; reason: string };

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function mappingAction(mapping: CommandMapping, payload: Buffer): RouteAction {
  let args: OscArg[];
  if (!mapping.disallowPayload && payload.length > 0) {
    try {
      args = decodeArgumentPayload(payload);
    } catch (err) {
      return { kind: "rejected", origin: "mapping", reason: `${mapping.command}: ${errorText(err)}` };
    }
  } else {
    args = [...mapping.defaultPayload];
  }
  return { kind: "message", origin: "mapping", message: oscMessage(mapping.command, args) };
}

const ARBITRARY_DISABLED = "Arbitrary commands are disabled on this relay.";

function sendAction(config: RelayConfig, topic: string, payload: Buffer): RouteAction {
  if (config.oscDisallowArbitraryCommand) {
    return { kind: "rejected", origin: "send", reason: ARBITRARY_DISABLED };
  }

  const address = topic.slice(relayTopics(config.mqttTopic).send.length) || "/";
  let args: OscArg[] = [];
  if (payload.length > 0) {
    try {
      args = decodeArgumentPayload(payload);
    } catch (err) {
      return { kind: "rejected", origin: "send", reason: `${address}: ${errorText(err)}` };
    }
  }
  return { kind: "message", origin: "send", message: oscMessage(address, args) };
}

function bundleAction(config: RelayConfig, payload: Buffer): RouteAction {
  if (config.oscDisallowArbitraryCommand) {
    return { kind: "rejected", origin: "bundle", reason: ARBITRARY_DISABLED };
  }
  try {
    return { kind: "bundle", bundle: toWire(decodeBundlePayload(payload)) };
  } catch (err) {
    return { kind: "rejected", origin: "bundle", reason: errorText(err) };
  }
}

/**
 * Route one MQTT message to the actions it triggers, in execution order.
 * An empty list means the topic is not handled by this relay.
 */
export function routeMessage(config: RelayConfig, topic: string, payload: Buffer): RouteAction[] {
  const ns = config.mqttTopic;
  const topics = relayTopics(ns);

  const actions = config.commands
    .filter((mapping) => mappingTopics(ns, mapping).includes(topic))
    .map((mapping) => mappingAction(mapping, payload));
  if (actions.length > 0) return actions;

  if (topic === topics.send || topic.startsWith(`${topics.send}/`)) {
    return [sendAction(config, topic, payload)];
  }
  if (topic === topics.bundleSend) {
    return [bundleAction(config, payload)];
  }
  if (topic === topics.statusCheck) {
    return [{ kind: "status" }];
  }
  return [];
}
