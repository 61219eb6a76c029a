/**
 * Config file discovery and loading.
 *
 * Looks for config.yaml in the working directory, the user's config
 * directory and /etc, unless an explicit path is given.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";
import { ConfigError } from "../errors.js";
import { configFileSchema } from "./schema.js";
import type { RelayConfig } from "./types.js";
import { validateRelays } from "./validator.js";

export const CONFIG_DIR_NAME = "osc-mqtt-bridge";
export const CONFIG_FILE_NAME = "config.yaml";

/** Candidate config paths, in lookup order. */
export function configCandidates(explicit?: string, homeDir = os.homedir()): string[] {
  const candidates = [
    path.resolve(CONFIG_FILE_NAME),
    path.join(homeDir, ".config", CONFIG_DIR_NAME, CONFIG_FILE_NAME),
    path.join("/etc", CONFIG_DIR_NAME, CONFIG_FILE_NAME),
  ];
  return explicit ? [path.resolve(explicit), ...candidates] : candidates;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Return the first candidate that exists.
 *
 * @throws ConfigError if none does
 */
export async function findConfigFile(explicit?: string, homeDir?: string): Promise<string> {
  for (const candidate of configCandidates(explicit, homeDir)) {
    if (await isFile(candidate)) return candidate;
  }
  throw new ConfigError("Unable to find a configuration file.");
}

function describeIssue(issue: ZodIssue): string {
  const [root, index, ...rest] = issue.path;
  if (root === "relays" && typeof index === "number") {
    const field = rest.length > 0 ? `${rest.join(".")}: ` : "";
    return `Relay ${index}: ${field}${issue.message}`;
  }
  const field = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return `${field}${issue.message}`;
}

/**
 * Parse and validate YAML config text.
 *
 * @throws ConfigError on YAML, shape or validation errors
 */
export function parseConfig(text: string, source = CONFIG_FILE_NAME): RelayConfig[] {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Error parsing YAML file ${source}: ${msg}`);
  }

  const result = configFileSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${describeIssue(result.error.issues[0])}`);
  }
  return validateRelays(result.data.relays);
}

export async function loadConfig(filePath: string): Promise<RelayConfig[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Error reading YAML file: ${msg}`);
  }
  return parseConfig(text, filePath);
}
