/**
 * Bundle codec: recursive translation between wire OSC bundles and the
 * portable (JSON-friendly) bundle published on `<namespace>/bundle`.
 *
 * Both directions are pure: inputs are never mutated, element order and
 * time tags are preserved, and arguments are copied without coercion.
 */

import { z } from "zod";
import { oscBundle, oscMessage, type OscArg, type OscBundle } from "../network/osc-codec.js";
import {
  argsToJson,
  formatTimeTag,
  oscArgListSchema,
  parseJson,
  parseTimeTag,
  parseWith,
  type JsonScalar,
} from "./arguments.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PortableMessage {
  address: string;
  arguments: OscArg[];
}

export interface PortableBundle {
  /** ISO-8601 instant, or "immediate". */
  timetag: string;
  messages: PortableMessage[];
  bundles: PortableBundle[];
}

/** Shape of a bundle once serialized to JSON. */
export interface JsonBundle {
  timetag: string;
  messages: { address: string; arguments: JsonScalar[] }[];
  bundles: JsonBundle[];
}

// ---------------------------------------------------------------------------
// Wire <-> portable
// ---------------------------------------------------------------------------

export function toPortable(bundle: OscBundle): PortableBundle {
  return {
    timetag: formatTimeTag(bundle.timetag),
    messages: bundle.messages.map((m) => ({ address: m.address, arguments: [...m.args] })),
    bundles: bundle.bundles.map(toPortable),
  };
}

/**
 * @throws RangeError if the time tag is neither "immediate" nor a valid instant
 */
export function toWire(bundle: PortableBundle): OscBundle {
  const timetag = parseTimeTag(bundle.timetag);
  if (!timetag) {
    throw new RangeError(`Invalid bundle time tag "${bundle.timetag}"`);
  }
  return oscBundle(
    timetag,
    bundle.messages.map((m) => oscMessage(m.address, [...m.arguments])),
    bundle.bundles.map(toWire),
  );
}

// ---------------------------------------------------------------------------
// Portable <-> JSON
// ---------------------------------------------------------------------------

export function bundleToJson(bundle: PortableBundle): JsonBundle {
  return {
    timetag: bundle.timetag,
    messages: bundle.messages.map((m) => ({ address: m.address, arguments: argsToJson(m.arguments) })),
    bundles: bundle.bundles.map(bundleToJson),
  };
}

const portableMessageSchema = z.object({
  address: z.string().startsWith("/", { message: 'OSC address must start with "/"' }),
  // null mirrors an empty argument list
  arguments: oscArgListSchema.nullish().transform((args) => args ?? []),
});

export const portableBundleSchema: z.ZodType<PortableBundle, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    timetag: z
      .string()
      .refine((text) => parseTimeTag(text) !== undefined, { message: "Invalid time tag" }),
    messages: z.array(portableMessageSchema).nullish().transform((ms) => ms ?? []),
    bundles: z.array(portableBundleSchema).nullish().transform((bs) => bs ?? []),
  }),
);

/**
 * Decode the JSON bundle published on `<namespace>/bundle/send`.
 *
 * @throws PayloadError on malformed JSON or shape
 */
export function decodeBundlePayload(payload: Buffer | string): PortableBundle {
  return parseWith(portableBundleSchema, parseJson(payload), "bundle");
}

export function encodeBundlePayload(bundle: PortableBundle): string {
  return JSON.stringify(bundleToJson(bundle));
}
