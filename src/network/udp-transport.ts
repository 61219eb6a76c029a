/**
 * UDP transport for OSC packets.
 *
 * Two modes:
 *   - shared-socket: one socket bound to the local address receives inbound
 *     packets AND carries every outbound send, so the peer sees replies come
 *     from the address it is sending to.
 *   - client-only: each send creates an ephemeral socket, sends, closes.
 *
 * Uses Node.js built-in `dgram` and `dns`.
 */

import dgram from "node:dgram";
import dns from "node:dns/promises";
import net from "node:net";
import type { Logger } from "pino";
import {
  decodeOscPacket,
  encodeOscPacket,
  type OscPacket,
} from "./osc-codec.js";
import { formatTimeTag } from "../core/arguments.js";

export interface UdpEndpoint {
  host: string;
  port: number;
}

export interface ResolvedEndpoint {
  address: string;
  family: number;
  port: number;
}

export type PacketHandler = (packet: OscPacket, from: dgram.RemoteInfo) => void;

export interface TransportOptions {
  /** OSC peer for outbound packets. */
  peer?: UdpEndpoint;
  /** Local address to listen on. Selects the shared-socket mode. */
  bind?: UdpEndpoint;
  /** Receives decoded inbound packets (shared-socket mode only). */
  onPacket?: PacketHandler;
  logger: Logger;
}

export interface OscTransport {
  readonly mode: "shared-socket" | "client-only";
  /** Bound address in shared-socket mode. */
  address(): net.AddressInfo | undefined;
  /** Send one packet; `undefined` is a no-op. */
  send(packet: OscPacket | undefined): Promise<void>;
  close(): Promise<void>;
}

/**
 * Resolve a host name or literal IP.
 * `family` restricts DNS results to match a bound socket.
 */
export async function resolveEndpoint(endpoint: UdpEndpoint, family?: 4 | 6): Promise<ResolvedEndpoint> {
  const literal = net.isIP(endpoint.host);
  if (literal !== 0) {
    if (family !== undefined && literal !== family) {
      throw new Error(`OSC host ${endpoint.host} is not an IPv${family} address`);
    }
    return { address: endpoint.host, family: literal, port: endpoint.port };
  }
  const { address, family: resolved } = await dns.lookup(endpoint.host, { family: family ?? 0 });
  return { address, family: resolved, port: endpoint.port };
}

/**
 * Send a binary buffer via a throwaway UDP socket.
 * Resolves when the send callback fires. Rejects on socket error.
 */
export function sendUdp(buf: Buffer, target: ResolvedEndpoint): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = dgram.createSocket(target.family === 6 ? "udp6" : "udp4");
    socket.on("error", (err) => {
      socket.close();
      reject(err);
    });
    socket.send(buf, 0, buf.length, target.port, target.address, (err) => {
      socket.close();
      if (err) reject(err);
      else resolve();
    });
  });
}

function describePacket(packet: OscPacket): Record<string, unknown> {
  return packet.kind === "message"
    ? { address: packet.address, args: packet.args.map((a) => a.value) }
    : { bundle: formatTimeTag(packet.timetag) };
}

function logOutbound(logger: Logger, packet: OscPacket, buf: Buffer): void {
  logger.debug(describePacket(packet), "-> [OSC]");
  if (logger.isLevelEnabled("trace")) {
    logger.trace({ binary: buf.toString("latin1").replaceAll("\0", "~") }, "-> [OSC] binary");
  }
}

// ---------------------------------------------------------------------------
// Client-only
// ---------------------------------------------------------------------------

class ClientOnlyTransport implements OscTransport {
  readonly mode = "client-only";

  constructor(
    private readonly peer: UdpEndpoint | undefined,
    private readonly logger: Logger,
  ) {}

  address(): undefined {
    return undefined;
  }

  async send(packet: OscPacket | undefined): Promise<void> {
    if (!packet) return;
    if (!this.peer) throw new Error("No OSC host configured for sending");

    const target = await resolveEndpoint(this.peer);
    const buf = encodeOscPacket(packet);
    logOutbound(this.logger, packet, buf);
    await sendUdp(buf, target);
  }

  async close(): Promise<void> {
    // nothing held open between sends
  }
}

// ---------------------------------------------------------------------------
// Shared socket
// ---------------------------------------------------------------------------

class SharedSocketTransport implements OscTransport {
  readonly mode = "shared-socket";
  private closed = false;

  constructor(
    private readonly socket: dgram.Socket,
    private readonly family: 4 | 6,
    private readonly peer: UdpEndpoint | undefined,
    private readonly logger: Logger,
    onPacket: PacketHandler | undefined,
  ) {
    socket.on("message", (msg, rinfo) => this.receive(msg, rinfo, onPacket));
    socket.on("error", (err) => {
      this.logger.error({ err }, "OSC socket error");
    });
  }

  static async bind(bind: UdpEndpoint, options: TransportOptions): Promise<SharedSocketTransport> {
    const family = net.isIPv6(bind.host) ? 6 : 4;
    const socket = dgram.createSocket(family === 6 ? "udp6" : "udp4");

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        socket.close();
        reject(err);
      };
      socket.once("error", onError);
      socket.bind(bind.port, bind.host, () => {
        socket.off("error", onError);
        resolve();
      });
    });

    options.logger.trace({ bind }, "OSC server listening");
    return new SharedSocketTransport(socket, family, options.peer, options.logger, options.onPacket);
  }

  address(): net.AddressInfo {
    return this.socket.address();
  }

  private receive(msg: Buffer, rinfo: dgram.RemoteInfo, onPacket: PacketHandler | undefined): void {
    let packet: OscPacket;
    try {
      packet = decodeOscPacket(msg);
    } catch (err) {
      this.logger.error({ err, from: `${rinfo.address}:${rinfo.port}` }, "Unknown OSC packet received.");
      return;
    }
    try {
      onPacket?.(packet, rinfo);
    } catch (err) {
      this.logger.error({ err }, "OSC packet handler failed");
    }
  }

  async send(packet: OscPacket | undefined): Promise<void> {
    if (!packet) return;
    if (this.closed) throw new Error("OSC socket is closed");
    if (!this.peer) throw new Error("No OSC host configured for sending");

    const target = await resolveEndpoint(this.peer, this.family);
    const buf = encodeOscPacket(packet);
    logOutbound(this.logger, packet, buf);

    await new Promise<void>((resolve, reject) => {
      this.socket.send(buf, target.port, target.address, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await new Promise<void>((resolve) => this.socket.close(() => resolve()));
  }
}

/**
 * Open the transport for one relay.
 * Shared-socket mode when `bind` is given; rejects if binding fails.
 */
export async function openTransport(options: TransportOptions): Promise<OscTransport> {
  if (options.bind) {
    return SharedSocketTransport.bind(options.bind, options);
  }
  return new ClientOnlyTransport(options.peer, options.logger);
}
