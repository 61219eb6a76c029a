/**
 * OSC (Open Sound Control) binary codec.
 *
 * Encodes and decodes OSC 1.0 packets:
 *   - Strings: null-terminated, padded to 4-byte boundary
 *   - Type tag string: "," + one char per arg, padded to 4-byte
 *   - Numbers: big-endian int32 / float32 / float64
 *   - Blobs: int32 size + bytes, padded to 4-byte
 *   - Bundles: "#bundle", 64-bit NTP timetag, then size-prefixed elements
 *
 * Reference: opensoundcontrol.org/spec-1_0
 */

import { OscDecodeError } from "../errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** NTP timestamp: seconds since 1900-01-01 plus a 32-bit fraction. */
export interface OscTimeTag {
  seconds: number;
  fraction: number;
}

export interface OscArgInt { type: "i"; value: number }
export interface OscArgFloat { type: "f"; value: number }
export interface OscArgDouble { type: "d"; value: number }
export interface OscArgString { type: "s"; value: string }
export interface OscArgBlob { type: "b"; value: Buffer }
export interface OscArgTrue { type: "T"; value: true }
export interface OscArgFalse { type: "F"; value: false }
export interface OscArgNil { type: "N"; value: null }
export interface OscArgTimeTag { type: "t"; value: OscTimeTag }

export type OscArg =
  | OscArgInt
  | OscArgFloat
  | OscArgDouble
  | OscArgString
  | OscArgBlob
  | OscArgTrue
  | OscArgFalse
  | OscArgNil
  | OscArgTimeTag;

export interface OscMessage {
  kind: "message";
  address: string;
  args: OscArg[];
}

/**
 * Bundle elements are kept as two ordered lists, messages first.
 * Encoding writes them in that order.
 */
export interface OscBundle {
  kind: "bundle";
  timetag: OscTimeTag;
  messages: OscMessage[];
  bundles: OscBundle[];
}

export type OscPacket = OscMessage | OscBundle;

// ---------------------------------------------------------------------------
// Time tags
// ---------------------------------------------------------------------------

/** Seconds between the NTP epoch (1900) and the Unix epoch (1970). */
const NTP_UNIX_OFFSET = 2_208_988_800;
const TWO_POW_32 = 2 ** 32;

/** The special "execute immediately" time tag. */
export const IMMEDIATE: OscTimeTag = Object.freeze({ seconds: 0, fraction: 1 });

export function isImmediate(tag: OscTimeTag): boolean {
  return tag.seconds === 0 && tag.fraction === 1;
}

/** Convert a Date to an NTP time tag (millisecond precision). */
export function timeTagFromDate(date: Date): OscTimeTag {
  const ms = date.getTime();
  if (!Number.isFinite(ms)) {
    throw new RangeError("Cannot build an OSC time tag from an invalid date");
  }
  const unixSeconds = Math.floor(ms / 1000);
  const remainderMs = ms - unixSeconds * 1000;
  return {
    seconds: unixSeconds + NTP_UNIX_OFFSET,
    fraction: Math.round((remainderMs / 1000) * TWO_POW_32),
  };
}

/** Convert an NTP time tag to a Date, rounded to the millisecond. */
export function dateFromTimeTag(tag: OscTimeTag): Date {
  const ms = (tag.seconds - NTP_UNIX_OFFSET) * 1000 + Math.round((tag.fraction * 1000) / TWO_POW_32);
  return new Date(ms);
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function oscMessage(address: string, args: OscArg[] = []): OscMessage {
  return { kind: "message", address, args };
}

export function oscBundle(
  timetag: OscTimeTag,
  messages: OscMessage[] = [],
  bundles: OscBundle[] = [],
): OscBundle {
  return { kind: "bundle", timetag, messages, bundles };
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

const BUNDLE_TAG = "#bundle";

/** Pad a buffer with null bytes to the next 4-byte boundary. */
function padToFour(buf: Buffer): Buffer {
  const remainder = buf.length % 4;
  if (remainder === 0) return buf;
  const padding = Buffer.alloc(4 - remainder, 0);
  return Buffer.concat([buf, padding]);
}

/** Encode a string as null-terminated, padded to 4-byte boundary. */
function encodeString(s: string): Buffer {
  // String + at least one null byte, then pad to 4-byte boundary
  const raw = Buffer.from(s + "\0", "utf-8");
  return padToFour(raw);
}

function encodeInt32(n: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeInt32BE(n, 0);
  return buf;
}

function encodeFloat32(n: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeFloatBE(n, 0);
  return buf;
}

function encodeFloat64(n: number): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeDoubleBE(n, 0);
  return buf;
}

function encodeTimeTag(tag: OscTimeTag): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeUInt32BE(tag.seconds, 0);
  buf.writeUInt32BE(tag.fraction, 4);
  return buf;
}

function encodeBlob(blob: Buffer): Buffer {
  return Buffer.concat([encodeInt32(blob.length), padToFour(Buffer.from(blob))]);
}

/** Binary payload of one argument; T, F and N carry none. */
function encodeArg(arg: OscArg): Buffer | undefined {
  switch (arg.type) {
    case "i":
      return encodeInt32(arg.value);
    case "f":
      return encodeFloat32(arg.value);
    case "d":
      return encodeFloat64(arg.value);
    case "s":
      return encodeString(arg.value);
    case "b":
      return encodeBlob(arg.value);
    case "t":
      return encodeTimeTag(arg.value);
    case "T":
    case "F":
    case "N":
      return undefined;
  }
}

/**
 * Encode an OSC message into a binary Buffer.
 *
 * @throws If address doesn't start with `/`, or a numeric argument is out of range
 */
export function encodeOscMessage(address: string, args: OscArg[]): Buffer {
  if (!address.startsWith("/")) {
    throw new Error(`OSC address must start with "/", got: "${address}"`);
  }

  const parts: Buffer[] = [];

  parts.push(encodeString(address));

  const typeTags = "," + args.map((a) => a.type).join("");
  parts.push(encodeString(typeTags));

  for (const arg of args) {
    const encoded = encodeArg(arg);
    if (encoded) parts.push(encoded);
  }

  return Buffer.concat(parts);
}

/** Encode an OSC bundle, recursing into nested bundles. */
export function encodeOscBundle(bundle: OscBundle): Buffer {
  const parts: Buffer[] = [encodeString(BUNDLE_TAG), encodeTimeTag(bundle.timetag)];

  const elements = [
    ...bundle.messages.map((m) => encodeOscMessage(m.address, m.args)),
    ...bundle.bundles.map((b) => encodeOscBundle(b)),
  ];
  for (const element of elements) {
    parts.push(encodeInt32(element.length), element);
  }

  return Buffer.concat(parts);
}

export function encodeOscPacket(packet: OscPacket): Buffer {
  return packet.kind === "message"
    ? encodeOscMessage(packet.address, packet.args)
    : encodeOscBundle(packet);
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function alignFour(offset: number): number {
  return Math.ceil(offset / 4) * 4;
}

/** Sequential reader over one packet; every read checks bounds. */
class PacketReader {
  offset = 0;

  constructor(private readonly buf: Buffer) {}

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  private need(bytes: number, what: string): void {
    if (this.remaining < bytes) {
      throw new OscDecodeError(`Truncated OSC packet while reading ${what}`);
    }
  }

  string(): string {
    const end = this.buf.indexOf(0, this.offset);
    if (end < 0) {
      throw new OscDecodeError("OSC string is not null-terminated");
    }
    const value = this.buf.toString("utf-8", this.offset, end);
    this.offset = Math.min(alignFour(end + 1), this.buf.length);
    return value;
  }

  int32(): number {
    this.need(4, "int32");
    const value = this.buf.readInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  float32(): number {
    this.need(4, "float32");
    const value = this.buf.readFloatBE(this.offset);
    this.offset += 4;
    return value;
  }

  float64(): number {
    this.need(8, "float64");
    const value = this.buf.readDoubleBE(this.offset);
    this.offset += 8;
    return value;
  }

  timeTag(): OscTimeTag {
    this.need(8, "time tag");
    const seconds = this.buf.readUInt32BE(this.offset);
    const fraction = this.buf.readUInt32BE(this.offset + 4);
    this.offset += 8;
    return { seconds, fraction };
  }

  bytes(length: number, what: string): Buffer {
    if (length < 0) {
      throw new OscDecodeError(`Negative ${what} size`);
    }
    this.need(length, what);
    const value = Buffer.from(this.buf.subarray(this.offset, this.offset + length));
    this.offset += length;
    return value;
  }

  blob(): Buffer {
    const size = this.int32();
    const value = this.bytes(size, "blob");
    this.offset = Math.min(alignFour(this.offset), this.buf.length);
    return value;
  }
}

function decodeArg(tag: string, reader: PacketReader): OscArg {
  switch (tag) {
    case "i":
      return { type: "i", value: reader.int32() };
    case "f":
      return { type: "f", value: reader.float32() };
    case "d":
      return { type: "d", value: reader.float64() };
    case "s":
      return { type: "s", value: reader.string() };
    case "b":
      return { type: "b", value: reader.blob() };
    case "t":
      return { type: "t", value: reader.timeTag() };
    case "T":
      return { type: "T", value: true };
    case "F":
      return { type: "F", value: false };
    case "N":
      return { type: "N", value: null };
    default:
      throw new OscDecodeError(`Unsupported OSC type tag "${tag}"`);
  }
}

function decodeMessage(buf: Buffer): OscMessage {
  const reader = new PacketReader(buf);
  const address = reader.string();

  // Very old senders omit the type tag string entirely.
  if (reader.remaining === 0) return oscMessage(address);

  const typeTags = reader.string();
  if (!typeTags.startsWith(",")) {
    throw new OscDecodeError(`OSC type tag string must start with ",", got: "${typeTags}"`);
  }

  const args: OscArg[] = [];
  for (const tag of typeTags.slice(1)) {
    args.push(decodeArg(tag, reader));
  }
  return oscMessage(address, args);
}

function decodeBundle(buf: Buffer): OscBundle {
  const reader = new PacketReader(buf);
  reader.string(); // "#bundle"
  const bundle = oscBundle(reader.timeTag());

  while (reader.remaining > 0) {
    const size = reader.int32();
    if (size === 0 || size % 4 !== 0) {
      throw new OscDecodeError(`Invalid OSC bundle element size ${size}`);
    }
    const element = decodeOscPacket(reader.bytes(size, "bundle element"));
    if (element.kind === "message") bundle.messages.push(element);
    else bundle.bundles.push(element);
  }

  return bundle;
}

const BUNDLE_HEADER = encodeString(BUNDLE_TAG);

/**
 * Decode one datagram into a message or bundle.
 *
 * @throws OscDecodeError if the bytes are neither
 */
export function decodeOscPacket(buf: Buffer): OscPacket {
  if (buf.length === 0) {
    throw new OscDecodeError("Empty OSC packet");
  }
  if (buf.length % 4 !== 0) {
    throw new OscDecodeError(`OSC packet size must be a multiple of 4, got ${buf.length}`);
  }
  if (buf.subarray(0, BUNDLE_HEADER.length).equals(BUNDLE_HEADER)) {
    return decodeBundle(buf);
  }
  if (buf[0] === 0x2f /* "/" */) {
    return decodeMessage(buf);
  }
  throw new OscDecodeError("Unknown OSC packet received");
}
