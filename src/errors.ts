/**
 * Error types shared across the bridge.
 *
 * Fatal errors (ConfigError, RelayStartError) end the process from the CLI.
 * PayloadError and OscDecodeError only abort the action that raised them.
 */

/** Invalid configuration. `relayIndex` is set when one relay is at fault. */
export class ConfigError extends Error {
  readonly relayIndex?: number;

  constructor(message: string, relayIndex?: number) {
    super(relayIndex === undefined ? message : `Relay ${relayIndex}: ${message}`);
    this.name = "ConfigError";
    this.relayIndex = relayIndex;
  }
}

/** A relay could not reach its broker or bind its OSC socket. */
export class RelayStartError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RelayStartError";
  }
}

/** An MQTT payload could not be decoded into OSC arguments or a bundle. */
export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PayloadError";
  }
}

/** A datagram is not a well-formed OSC packet. */
export class OscDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OscDecodeError";
  }
}
