/**
 * Mapping between tagged OSC arguments and the JSON scalars carried on MQTT.
 *
 * Outbound (OSC → MQTT) every argument becomes a plain JSON scalar.
 * Inbound (MQTT → OSC) the OSC type is inferred from the JSON value, or taken
 * from an explicit `{ "type": "d", "value": 1 }` object.
 */

import { z } from "zod";
import { PayloadError } from "../errors.js";
import {
  dateFromTimeTag,
  IMMEDIATE,
  isImmediate,
  timeTagFromDate,
  type OscArg,
  type OscTimeTag,
} from "../network/osc-codec.js";

export type JsonScalar = string | number | boolean | null;

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/** Literal used for the OSC "immediate" time tag in JSON. */
export const IMMEDIATE_LITERAL = "immediate";

// ---------------------------------------------------------------------------
// Time tags as strings
// ---------------------------------------------------------------------------

const FRACTION_SCALE = 2n ** 32n;

/** Ten decimal places tell any two NTP fractions apart (1e-10 < 2^-32). */
const MAX_FRACTION_DIGITS = 10;

const ISO_INSTANT = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})$/;

const MAX_NTP_SECONDS = 0xffff_ffff;

/** Integer division rounding half up; both operands non-negative. */
function divRound(numerator: bigint, denominator: bigint): bigint {
  return (numerator * 2n + denominator) / (denominator * 2n);
}

/** Shortest ".ddd" that reads back as the same NTP fraction; "" for zero. */
function fractionDigits(fraction: number): string {
  if (fraction === 0) return "";
  const exact = BigInt(fraction);
  for (let digits = 1; digits < MAX_FRACTION_DIGITS; digits++) {
    const scale = 10n ** BigInt(digits);
    const decimal = divRound(exact * scale, FRACTION_SCALE);
    if (decimal < scale && divRound(decimal * FRACTION_SCALE, scale) === exact) {
      return `.${decimal.toString().padStart(digits, "0")}`;
    }
  }
  const decimal = divRound(exact * 10n ** BigInt(MAX_FRACTION_DIGITS), FRACTION_SCALE);
  return `.${decimal.toString().padStart(MAX_FRACTION_DIGITS, "0")}`;
}

/**
 * UTC instant with as many fractional digits as the NTP fraction needs:
 * "2024-01-01T00:00:00Z", "2024-01-01T00:00:00.5Z",
 * "2024-01-01T00:00:00.123456789Z". `parseTimeTag` reads it back exactly.
 */
export function formatTimeTag(tag: OscTimeTag): string {
  if (isImmediate(tag)) return IMMEDIATE_LITERAL;
  const whole = dateFromTimeTag({ seconds: tag.seconds, fraction: 0 }).toISOString().slice(0, 19);
  return `${whole}${fractionDigits(tag.fraction)}Z`;
}

/**
 * Parse "immediate" or an RFC 3339 instant ("Z" or a "+hh:mm" offset).
 * Fractional seconds are converted without going through a Date, so any
 * nanosecond-precision instant keeps its exact NTP fraction.
 * Returns undefined for other text and for instants NTP cannot hold.
 */
export function parseTimeTag(text: string): OscTimeTag | undefined {
  if (text === IMMEDIATE_LITERAL) return IMMEDIATE;
  const match = ISO_INSTANT.exec(text);
  if (!match) return undefined;

  const [, whole, digits = "", zone] = match;
  const date = new Date(`${whole}${zone}`);
  if (Number.isNaN(date.getTime())) return undefined;

  let { seconds } = timeTagFromDate(date);
  let fraction = 0n;
  if (digits) {
    fraction = divRound(BigInt(digits) * FRACTION_SCALE, 10n ** BigInt(digits.length));
  }
  if (fraction === FRACTION_SCALE) {
    seconds += 1;
    fraction = 0n;
  }
  if (seconds < 0 || seconds > MAX_NTP_SECONDS) return undefined;
  return { seconds, fraction: Number(fraction) };
}

// ---------------------------------------------------------------------------
// OSC → JSON
// ---------------------------------------------------------------------------

export function argToJson(arg: OscArg): JsonScalar {
  switch (arg.type) {
    case "i":
    case "f":
    case "d":
      return arg.value;
    case "s":
      return arg.value;
    case "b":
      return arg.value.toString("base64");
    case "t":
      return formatTimeTag(arg.value);
    case "T":
    case "F":
      return arg.value;
    case "N":
      return null;
  }
}

export function argsToJson(args: readonly OscArg[]): JsonScalar[] {
  return args.map(argToJson);
}

// ---------------------------------------------------------------------------
// JSON → OSC
// ---------------------------------------------------------------------------

/**
 * Infer an OSC argument from a JSON scalar.
 *   - string → "s"
 *   - boolean → "T" / "F"
 *   - null → "N"
 *   - integer within int32 → "i", other integers → "d"
 *   - non-integer number → "f"
 */
export function inferOscArg(value: JsonScalar): OscArg {
  if (value === null) return { type: "N", value: null };
  if (typeof value === "string") return { type: "s", value };
  if (typeof value === "boolean") return value ? { type: "T", value: true } : { type: "F", value: false };
  if (Number.isInteger(value)) {
    return value >= INT32_MIN && value <= INT32_MAX ? { type: "i", value } : { type: "d", value };
  }
  return { type: "f", value };
}

const timeTagString = z.string().transform((text, ctx) => {
  const tag = parseTimeTag(text);
  if (!tag) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid time tag "${text}"` });
    return z.NEVER;
  }
  return tag;
});

/** Explicitly typed argument: `{ type, value }`. */
const taggedArgSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("i"), value: z.number().int().min(INT32_MIN).max(INT32_MAX) }),
  z.object({ type: z.literal("f"), value: z.number() }),
  z.object({ type: z.literal("d"), value: z.number() }),
  z.object({ type: z.literal("s"), value: z.string() }),
  z.object({ type: z.literal("b"), value: z.string().base64() }),
  z.object({ type: z.literal("T"), value: z.literal(true).default(true) }),
  z.object({ type: z.literal("F"), value: z.literal(false).default(false) }),
  z.object({ type: z.literal("N"), value: z.null().default(null) }),
  z.object({ type: z.literal("t"), value: timeTagString }),
]);

type TaggedArg = z.output<typeof taggedArgSchema>;

function fromTagged(tagged: TaggedArg): OscArg {
  if (tagged.type === "b") return { type: "b", value: Buffer.from(tagged.value, "base64") };
  return tagged;
}

const jsonScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** One JSON argument: a scalar, or a tagged object. */
export const oscArgSchema: z.ZodType<OscArg, z.ZodTypeDef, unknown> = z.union([
  jsonScalarSchema.transform(inferOscArg),
  taggedArgSchema.transform(fromTagged),
]);

export const oscArgListSchema = z.array(oscArgSchema);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Parse a JSON document, wrapping syntax errors as PayloadError. */
export function parseJson(payload: Buffer | string): unknown {
  try {
    return JSON.parse(payload.toString());
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new PayloadError(`Invalid JSON payload: ${msg}`);
  }
}

/** Validate a parsed value against a schema, throwing PayloadError on failure. */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new PayloadError(`Invalid ${what}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Decode an MQTT payload holding a JSON array of arguments.
 *
 * @throws PayloadError on malformed JSON or a non-array document
 */
export function decodeArgumentPayload(payload: Buffer | string): OscArg[] {
  return parseWith(oscArgListSchema, parseJson(payload), "argument list");
}

export function encodeArgumentPayload(args: readonly OscArg[]): string {
  return JSON.stringify(argsToJson(args));
}
