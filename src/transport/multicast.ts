import dgram, { type RemoteInfo, type Socket } from "node:dgram";
import net from "node:net";
import os from "node:os";
import { logger } from "../logger";
import {
  MAX_DATAGRAM_BYTES,
  PayloadTooLargeError,
  TransportError,
  type DatagramHandler,
  type DatagramTransport,
} from "./types";

export type MulticastTransportOptions = {
  address: string;
  port: number;
  /** IPv4 address or interface name (e.g. `eth0`). */
  interface?: string;
  maxPayloadBytes?: number;
};

export function isIpv4Multicast(address: string): boolean {
  if (!net.isIPv4(address)) {
    return false;
  }
  const firstOctet = Number(address.split(".")[0]);
  return firstOctet >= 224 && firstOctet <= 239;
}

export function resolveInterfaceAddress(
  name: string,
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces(),
): string {
  const trimmed = name.trim();
  if (net.isIPv4(trimmed)) {
    return trimmed;
  }
  const ipv4 = interfaces[trimmed]?.find((entry) => entry.family === "IPv4");
  if (!ipv4) {
    throw new TransportError(`Network interface '${trimmed}' not found or has no IPv4 address`);
  }
  return ipv4.address;
}

function closeQuietly(socket: Socket): void {
  try {
    socket.close();
  } catch (error) {
    logger.debug({ err: error }, "Socket already closed");
  }
}

/**
 * UDP multicast transport. The only component in the swarm that performs raw
 * network I/O.
 */
export class MulticastTransport implements DatagramTransport {
  private socket: Socket | null = null;
  private closed = false;
  private readonly maxPayloadBytes: number;

  constructor(private readonly options: MulticastTransportOptions) {
    this.maxPayloadBytes = options.maxPayloadBytes ?? MAX_DATAGRAM_BYTES;
  }

  async join(): Promise<void> {
    const { address, port } = this.options;
    if (!isIpv4Multicast(address)) {
      throw new TransportError(`Address ${address} is not a valid multicast address`);
    }
    const iface = this.options.interface
      ? resolveInterfaceAddress(this.options.interface)
      : undefined;

    const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        closeQuietly(socket);
        reject(new TransportError(`Failed to bind UDP port ${port}: ${error.message}`, { cause: error }));
      };
      socket.once("error", onError);
      socket.bind(port, () => {
        socket.off("error", onError);
        resolve();
      });
    });

    try {
      socket.addMembership(address, iface);
      socket.setMulticastLoopback(true);
      if (iface) {
        socket.setMulticastInterface(iface);
      }
    } catch (error) {
      closeQuietly(socket);
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(
        `Failed to join multicast group ${address}:${port} on interface ${iface ?? "0.0.0.0"}: ${reason}`,
        { cause: error },
      );
    }

    this.socket = socket;
    logger.info({ group: address, port, interface: iface ?? "0.0.0.0" }, "Joined multicast group");
  }

  async send(bytes: Uint8Array): Promise<void> {
    if (bytes.length > this.maxPayloadBytes) {
      throw new PayloadTooLargeError(bytes.length, this.maxPayloadBytes);
    }
    const socket = this.requireSocket();
    const { address, port } = this.options;
    await new Promise<void>((resolve, reject) => {
      socket.send(bytes, port, address, (error) => {
        if (error) {
          reject(new TransportError(`Failed to send datagram to ${address}:${port}`, { cause: error }));
          return;
        }
        resolve();
      });
    });
    logger.debug({ bytes: bytes.length, group: address, port }, "Datagram sent");
  }

  receiveLoop(handler: DatagramHandler): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    const socket = this.requireSocket();
    return new Promise<void>((resolve) => {
      const onMessage = (msg: Buffer, rinfo: RemoteInfo) => {
        try {
          handler(msg, { address: rinfo.address, port: rinfo.port });
        } catch (error) {
          logger.error({ err: error, from: rinfo.address }, "Datagram handler failed");
        }
      };
      const onError = (error: Error) => {
        logger.warn({ err: error }, "Multicast receive error");
      };
      socket.on("message", onMessage);
      socket.on("error", onError);
      socket.once("close", () => {
        socket.off("message", onMessage);
        socket.off("error", onError);
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket || this.closed) {
      this.closed = true;
      return;
    }
    this.closed = true;
    await new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
    logger.info({ group: this.options.address, port: this.options.port }, "Multicast socket closed");
  }

  private requireSocket(): Socket {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }
    if (!this.socket) {
      throw new TransportError("Transport has not joined a multicast group");
    }
    return this.socket;
  }
}
