/**
 * Zod schemas for the configuration file.
 *
 * Keys are snake_case as written in config.yaml; the schemas transform each
 * relay into a camelCase RelayConfigDraft. Presence rules that need the relay
 * index or other relays (required fields, uniqueness) live in the validator.
 */

import { z } from "zod";
import { oscArgListSchema } from "../core/arguments.js";
import { parseDuration } from "./duration.js";
import {
  RELAY_LOG_LEVELS,
  type CommandMapping,
  type RelayConfigDraft,
  type RelayLogLevel,
  type ScheduledPush,
} from "./types.js";

/** Empty and missing strings both mean "not set". */
const optionalText = z
  .string()
  .nullish()
  .transform((s) => (s ? s : undefined));

/** 0 and missing both mean "not set". */
const optionalPort = z
  .number()
  .int()
  .min(0)
  .max(65535)
  .nullish()
  .transform((n) => (n ? n : undefined));

const argList = oscArgListSchema.nullish().transform((args) => args ?? []);

const oscAddress = z.string().startsWith("/", { message: 'OSC address must start with "/"' });

/** Duration string ("5s", "250ms") or a number of milliseconds. */
const interval = z.union([
  z.number().min(0),
  z.string().transform((text, ctx) => {
    const ms = parseDuration(text);
    if (ms === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration "${text}"` });
      return z.NEVER;
    }
    return ms;
  }),
]);

/** Numeric levels 0-3 as in older configs, or the level name. */
const logLevel = z
  .union([z.number().int().min(0).max(RELAY_LOG_LEVELS.length - 1), z.enum(RELAY_LOG_LEVELS)])
  .nullish()
  .transform((level): RelayLogLevel => {
    if (level === null || level === undefined) return "error";
    return typeof level === "number" ? RELAY_LOG_LEVELS[level] : level;
  });

export const commandMappingSchema = z
  .object({
    command: oscAddress,
    mqtt_topic: optionalText,
    mqtt_sub_topic: optionalText,
    disallow_payload: z.boolean().default(false),
    default_payload: argList,
  })
  .transform(
    (raw): CommandMapping => ({
      command: raw.command,
      mqttTopic: raw.mqtt_topic,
      mqttSubTopic: raw.mqtt_sub_topic,
      disallowPayload: raw.disallow_payload,
      defaultPayload: raw.default_payload,
    }),
  );

export const scheduledPushSchema = z
  .object({
    command: oscAddress,
    payload: argList,
    interval,
  })
  .transform(
    (raw): ScheduledPush => ({
      command: raw.command,
      payload: raw.payload,
      intervalMs: raw.interval,
    }),
  );

export const relaySchema = z
  .object({
    mqtt_host: z.string().nullish(),
    mqtt_port: optionalPort,
    mqtt_client_id: optionalText,
    mqtt_user: optionalText,
    mqtt_password: optionalText,
    mqtt_topic: z.string().nullish(),
    mqtt_disable_config_send: z.boolean().default(false),
    osc_host: optionalText,
    osc_port: optionalPort,
    osc_bind_addr: optionalText,
    osc_bind_port: optionalPort,
    // The historical key is misspelled; both spellings are read.
    osc_disallow_arbritary_command: z.boolean().optional(),
    osc_disallow_arbitrary_command: z.boolean().optional(),
    relay_commands: z.array(commandMappingSchema).nullish(),
    osc_subscriptions: z.array(scheduledPushSchema).nullish(),
    log_level: logLevel,
  })
  .transform(
    (raw): RelayConfigDraft => ({
      mqttHost: raw.mqtt_host ?? "",
      mqttPort: raw.mqtt_port ?? 0,
      mqttClientId: raw.mqtt_client_id,
      mqttUser: raw.mqtt_user,
      mqttPassword: raw.mqtt_password,
      mqttTopic: raw.mqtt_topic ?? "",
      mqttDisableConfigSend: raw.mqtt_disable_config_send,
      oscHost: raw.osc_host,
      oscPort: raw.osc_port,
      oscBindAddr: raw.osc_bind_addr,
      oscBindPort: raw.osc_bind_port,
      oscDisallowArbitraryCommand:
        raw.osc_disallow_arbritary_command ?? raw.osc_disallow_arbitrary_command ?? false,
      commands: raw.relay_commands ?? [],
      oscSubscriptions: raw.osc_subscriptions ?? [],
      logLevel: raw.log_level,
    }),
  );

export const configFileSchema = z.object({
  relays: z
    .array(relaySchema)
    .nullish()
    .transform((relays) => relays ?? []),
});
