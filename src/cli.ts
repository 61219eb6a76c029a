/**
 * Command-line shell: flags, config loading, relay lifecycle.
 */

import { parseArgs } from "node:util";
import type { Logger } from "pino";
import { findConfigFile, loadConfig } from "./config/loader.js";
import type { RelayConfig } from "./config/types.js";
import { Relay, type RelayDependencies } from "./relay/relay.js";
import { getLogger, SERVICE_NAME } from "./utils/logger.js";

export const SERVICE_DESCRIPTION = "Bridges MQTT messages to OSC";
export const SERVICE_VERSION = "0.1.0";

export const USAGE = `${SERVICE_NAME}: ${SERVICE_DESCRIPTION}.

Usage:
  -c, --config FILE   Load configuration from FILE
  -v, --version       Print version
  -h, --help          Print this help
`;

export interface CliOptions {
  configPath?: string;
  version: boolean;
  help: boolean;
}

/**
 * @throws TypeError on unknown flags or a missing flag value
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string", short: "c" },
      version: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });
  return {
    configPath: values.config,
    version: values.version ?? false,
    help: values.help ?? false,
  };
}

/**
 * Start every relay in order. If one fails, the ones already running are
 * stopped before the error is rethrown.
 */
export async function startRelays(configs: readonly RelayConfig[], deps: RelayDependencies = {}): Promise<Relay[]> {
  const relays: Relay[] = [];
  try {
    for (const config of configs) {
      const relay = new Relay(config, deps);
      relays.push(relay);
      await relay.start();
    }
  } catch (err) {
    await stopRelays(relays);
    throw err;
  }
  return relays;
}

export async function stopRelays(relays: readonly Relay[]): Promise<void> {
  await Promise.all(relays.map((relay) => relay.stop()));
}

/** Resolve with the first termination signal received. */
export function waitForShutdown(signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"]): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      for (const s of signals) process.off(s, onSignal);
      resolve(signal);
    };
    for (const s of signals) process.on(s, onSignal);
  });
}

/**
 * Run the bridge until SIGINT/SIGTERM.
 *
 * @returns process exit code
 */
export async function main(argv: string[] = process.argv.slice(2), logger: Logger = getLogger()): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${msg}\n\n${USAGE}`);
    return 2;
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return 0;
  }
  if (options.version) {
    process.stdout.write(`${SERVICE_NAME}: ${SERVICE_VERSION}\n`);
    return 0;
  }

  let relays: Relay[];
  try {
    const configFile = await findConfigFile(options.configPath);
    logger.info({ configFile }, "Loading configuration");
    relays = await startRelays(await loadConfig(configFile), { logger });
  } catch (err) {
    logger.fatal({ err }, "Startup failed");
    return 1;
  }

  logger.info({ relays: relays.length }, "Relays running");
  const signal = await waitForShutdown();
  logger.info({ signal }, "Shutting down");
  await stopRelays(relays);
  return 0;
}
