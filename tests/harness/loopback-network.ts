import type { DatagramHandler, DatagramTransport } from "../../src/transport/types";
import { MAX_DATAGRAM_BYTES, PayloadTooLargeError, TransportError } from "../../src/transport/types";

const LOOPBACK_SOURCE = { address: "127.0.0.1", port: 8080 };

/**
 * In-process stand-in for a multicast group. Every datagram sent by a
 * member is delivered synchronously to all joined members, the sender
 * included, the way multicast loopback behaves on one host.
 */
export class LoopbackNetwork {
  private readonly members = new Set<LoopbackTransport>();
  readonly sent: Uint8Array[] = [];

  createTransport(): LoopbackTransport {
    return new LoopbackTransport(this);
  }

  /** Delivers raw bytes as if some other host had sent them. */
  inject(bytes: Uint8Array): void {
    for (const member of [...this.members]) {
      member.deliver(bytes);
    }
  }

  attach(member: LoopbackTransport): void {
    this.members.add(member);
  }

  detach(member: LoopbackTransport): void {
    this.members.delete(member);
  }

  broadcast(bytes: Uint8Array): void {
    this.sent.push(bytes);
    this.inject(bytes);
  }
}

export class LoopbackTransport implements DatagramTransport {
  private handler: DatagramHandler | null = null;
  private joined = false;
  private closed = false;
  private resolveLoop: (() => void) | null = null;
  failSends = false;

  constructor(private readonly network: LoopbackNetwork) {}

  async join(): Promise<void> {
    this.joined = true;
    this.network.attach(this);
  }

  async send(bytes: Uint8Array): Promise<void> {
    if (bytes.length > MAX_DATAGRAM_BYTES) {
      throw new PayloadTooLargeError(bytes.length);
    }
    if (this.closed || !this.joined) {
      throw new TransportError("Transport is closed");
    }
    if (this.failSends) {
      throw new TransportError("Simulated send failure");
    }
    this.network.broadcast(bytes);
  }

  receiveLoop(handler: DatagramHandler): Promise<void> {
    this.handler = handler;
    if (this.closed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.resolveLoop = resolve;
    });
  }

  deliver(bytes: Uint8Array): void {
    if (this.closed || !this.handler) {
      return;
    }
    this.handler(Buffer.from(bytes), LOOPBACK_SOURCE);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.network.detach(this);
    this.handler = null;
    this.resolveLoop?.();
    this.resolveLoop = null;
  }
}
