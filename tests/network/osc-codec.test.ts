import { describe, it, expect } from "vitest";
import {
  dateFromTimeTag,
  decodeOscPacket,
  encodeOscBundle,
  encodeOscMessage,
  encodeOscPacket,
  IMMEDIATE,
  isImmediate,
  oscBundle,
  oscMessage,
  timeTagFromDate,
  type OscArg,
} from "../../src/network/osc-codec.js";
import { OscDecodeError } from "../../src/errors.js";

describe("OSC encoder", () => {
  it("encodes message with no args (/ch/1/mute)", () => {
    const buf = encodeOscMessage("/ch/1/mute", []);

    // Address: "/ch/1/mute" (10 chars + null = 11, padded to 12)
    // Type tag: "," (1 char + null = 2, padded to 4)
    expect(buf.length).toBe(12 + 4);

    const addr = buf.subarray(0, 12).toString("utf-8").replace(/\0+$/, "");
    expect(addr).toBe("/ch/1/mute");

    const tag = buf.subarray(12, 16).toString("utf-8").replace(/\0+$/, "");
    expect(tag).toBe(",");
  });

  it("encodes int32 argument", () => {
    const buf = encodeOscMessage("/ch/01/mix/on", [{ type: "i", value: 1 }]);

    // Address: 13 + null = 14, padded to 16; ",i" padded to 4; int32
    expect(buf.length).toBe(16 + 4 + 4);
    expect(buf.readInt32BE(20)).toBe(1);
  });

  it("encodes float32 argument", () => {
    const buf = encodeOscMessage("/ch/01/mix/fader", [{ type: "f", value: 0.75 }]);

    // Address: 16 + null = 17, padded to 20
    expect(buf.length).toBe(20 + 4 + 4);
    expect(buf.readFloatBE(24)).toBe(0.75);
  });

  it("encodes string argument", () => {
    const buf = encodeOscMessage("/ch/01/config/name", [{ type: "s", value: "Vocals" }]);

    // Address: 18 + null = 19 → 20; ",s" → 4; "Vocals" 6 + null = 7 → 8
    expect(buf.length).toBe(20 + 4 + 8);
    const str = buf.subarray(24, 32).toString("utf-8").replace(/\0+$/, "");
    expect(str).toBe("Vocals");
  });

  it("encodes float64 argument", () => {
    const buf = encodeOscMessage("/x", [{ type: "d", value: 0.1 }]);
    expect(buf.length).toBe(4 + 4 + 8);
    expect(buf.readDoubleBE(8)).toBe(0.1);
  });

  it("writes T, F and N as type tags only", () => {
    const buf = encodeOscMessage("/x", [
      { type: "T", value: true },
      { type: "F", value: false },
      { type: "N", value: null },
    ]);
    // ",TFN" 4 + null = 5 → 8
    expect(buf.length).toBe(4 + 8);
    expect(buf.subarray(4, 8).toString("utf-8")).toBe(",TFN");
  });

  it("encodes blob with size prefix and padding", () => {
    const buf = encodeOscMessage("/x", [{ type: "b", value: Buffer.from([1, 2, 3]) }]);
    expect(buf.length).toBe(4 + 4 + 4 + 4);
    expect(buf.readInt32BE(8)).toBe(3);
    expect([...buf.subarray(12, 16)]).toEqual([1, 2, 3, 0]);
  });

  it("encodes time tag argument as two uint32", () => {
    const buf = encodeOscMessage("/x", [{ type: "t", value: { seconds: 3_900_000_000, fraction: 42 } }]);
    expect(buf.length).toBe(4 + 4 + 8);
    expect(buf.readUInt32BE(8)).toBe(3_900_000_000);
    expect(buf.readUInt32BE(12)).toBe(42);
  });

  it("rejects invalid address (no leading /)", () => {
    expect(() => encodeOscMessage("mute", [])).toThrow('OSC address must start with "/"');
  });

  it("encodes a bundle header, time tag and size-prefixed elements", () => {
    const buf = encodeOscBundle(oscBundle(IMMEDIATE, [oscMessage("/a")]));

    // "#bundle\0" 8 + time tag 8 + size 4 + element ("/a" 4 + "," 4)
    expect(buf.length).toBe(8 + 8 + 4 + 8);
    expect(buf.subarray(0, 8).toString("utf-8")).toBe("#bundle\0");
    expect(buf.readUInt32BE(8)).toBe(0);
    expect(buf.readUInt32BE(12)).toBe(1);
    expect(buf.readInt32BE(16)).toBe(8);
  });
});

describe("OSC decoder", () => {
  it("decodes every supported argument type", () => {
    const args: OscArg[] = [
      { type: "i", value: -7 },
      { type: "f", value: 0.5 },
      { type: "d", value: 1.25 },
      { type: "s", value: "hello" },
      { type: "b", value: Buffer.from("blob") },
      { type: "T", value: true },
      { type: "F", value: false },
      { type: "N", value: null },
      { type: "t", value: { seconds: 3_900_000_000, fraction: 7 } },
    ];
    const message = oscMessage("/all/types", args);

    expect(decodeOscPacket(encodeOscPacket(message))).toEqual(message);
  });

  it("decodes nested bundles keeping messages and bundles in order", () => {
    const inner = oscBundle({ seconds: 3_900_000_001, fraction: 0 }, [
      oscMessage("/inner/1", [{ type: "i", value: 1 }]),
      oscMessage("/inner/2", [{ type: "i", value: 2 }]),
    ]);
    const outer = oscBundle(IMMEDIATE, [oscMessage("/outer", [{ type: "s", value: "x" }])], [inner]);

    const decoded = decodeOscPacket(encodeOscPacket(outer));
    expect(decoded).toEqual(outer);
  });

  it("accepts messages without a type tag string", () => {
    expect(decodeOscPacket(Buffer.from("/x\0\0"))).toEqual(oscMessage("/x", []));
  });

  it("rejects empty packets", () => {
    expect(() => decodeOscPacket(Buffer.alloc(0))).toThrow("Empty OSC packet");
  });

  it("rejects packets whose size is not a multiple of 4", () => {
    expect(() => decodeOscPacket(Buffer.from("/abcde"))).toThrow(OscDecodeError);
  });

  it("rejects packets that are neither message nor bundle", () => {
    expect(() => decodeOscPacket(Buffer.from("abcd"))).toThrow("Unknown OSC packet received");
  });

  it("rejects unsupported type tags", () => {
    const buf = Buffer.concat([Buffer.from("/x\0\0,h\0\0"), Buffer.alloc(8)]);
    expect(() => decodeOscPacket(buf)).toThrow('Unsupported OSC type tag "h"');
  });

  it("rejects truncated arguments", () => {
    expect(() => decodeOscPacket(Buffer.from("/x\0\0,i\0\0"))).toThrow(
      "Truncated OSC packet while reading int32",
    );
  });

  it("rejects bundle elements with a bad size", () => {
    const size = Buffer.alloc(4);
    size.writeInt32BE(3, 0);
    const buf = Buffer.concat([Buffer.from("#bundle\0"), Buffer.alloc(8), size]);
    expect(() => decodeOscPacket(buf)).toThrow("Invalid OSC bundle element size 3");
  });
});

describe("OSC time tags", () => {
  it("maps the Unix epoch to NTP seconds", () => {
    expect(timeTagFromDate(new Date(0))).toEqual({ seconds: 2_208_988_800, fraction: 0 });
  });

  it("maps half a second to half the fraction range", () => {
    expect(timeTagFromDate(new Date(500))).toEqual({ seconds: 2_208_988_800, fraction: 2 ** 31 });
  });

  it("converts back to the same millisecond", () => {
    const date = new Date("2024-05-01T12:34:56.789Z");
    expect(dateFromTimeTag(timeTagFromDate(date)).toISOString()).toBe("2024-05-01T12:34:56.789Z");
  });

  it("recognises the immediate sentinel", () => {
    expect(isImmediate(IMMEDIATE)).toBe(true);
    expect(isImmediate({ seconds: 0, fraction: 0 })).toBe(false);
  });

  it("rejects invalid dates", () => {
    expect(() => timeTagFromDate(new Date("not a date"))).toThrow(RangeError);
  });
});
