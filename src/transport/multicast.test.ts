import type { NetworkInterfaceInfo } from "node:os";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { isIpv4Multicast, MulticastTransport, resolveInterfaceAddress } from "./multicast";
import { PayloadTooLargeError, TransportError } from "./types";

const fake = vi.hoisted(() => {
  type Listener = (...args: unknown[]) => void;

  class FakeSocket {
    readonly listeners = new Map<string, Listener[]>();
    readonly sent: Array<{ bytes: Uint8Array; port: number; address: string }> = [];
    readonly memberships: Array<[string, string | undefined]> = [];
    multicastInterface: string | undefined;
    loopback = false;
    boundPort: number | undefined;
    bindError: Error | null = null;
    closed = false;

    on(event: string, listener: Listener) {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
      return this;
    }

    once(event: string, listener: Listener) {
      const wrapper: Listener = (...args) => {
        this.off(event, wrapper);
        listener(...args);
      };
      return this.on(event, wrapper);
    }

    off(event: string, listener: Listener) {
      this.listeners.set(
        event,
        (this.listeners.get(event) ?? []).filter((entry) => entry !== listener),
      );
      return this;
    }

    emit(event: string, ...args: unknown[]) {
      for (const listener of [...(this.listeners.get(event) ?? [])]) {
        listener(...args);
      }
    }

    listenerCount(event: string) {
      return (this.listeners.get(event) ?? []).length;
    }

    bind(port: number, callback: () => void) {
      if (this.bindError) {
        this.emit("error", this.bindError);
        return;
      }
      this.boundPort = port;
      callback();
    }

    addMembership(group: string, iface?: string) {
      this.memberships.push([group, iface]);
    }

    setMulticastLoopback(flag: boolean) {
      this.loopback = flag;
      return flag;
    }

    setMulticastInterface(iface: string) {
      this.multicastInterface = iface;
    }

    send(
      bytes: Uint8Array,
      port: number,
      address: string,
      callback: (error: Error | null, bytes: number) => void,
    ) {
      this.sent.push({ bytes, port, address });
      callback(null, bytes.length);
    }

    close(callback?: () => void) {
      this.closed = true;
      this.emit("close");
      callback?.();
    }
  }

  const sockets: FakeSocket[] = [];
  let nextBindError: Error | null = null;
  return {
    sockets,
    failNextBind(error: Error) {
      nextBindError = error;
    },
    createSocket() {
      const socket = new FakeSocket();
      socket.bindError = nextBindError;
      nextBindError = null;
      sockets.push(socket);
      return socket;
    },
  };
});

vi.mock("node:dgram", () => ({ default: { createSocket: fake.createSocket } }));

function ipv4(address: string): NetworkInterfaceInfo {
  return {
    address,
    netmask: "255.255.255.0",
    family: "IPv4",
    mac: "00:00:00:00:00:00",
    internal: false,
    cidr: `${address}/24`,
  };
}

describe("isIpv4Multicast", () => {
  it("accepts 224.0.0.0/4 only", () => {
    expect(isIpv4Multicast("239.255.255.250")).toBe(true);
    expect(isIpv4Multicast("224.0.0.1")).toBe(true);
    expect(isIpv4Multicast("192.168.1.1")).toBe(false);
    expect(isIpv4Multicast("240.0.0.1")).toBe(false);
    expect(isIpv4Multicast("ff02::1")).toBe(false);
  });
});

describe("resolveInterfaceAddress", () => {
  it("passes IPv4 addresses through", () => {
    expect(resolveInterfaceAddress("10.0.0.5", {})).toBe("10.0.0.5");
  });

  it("resolves interface names to their IPv4 address", () => {
    expect(resolveInterfaceAddress("eth0", { eth0: [ipv4("192.168.1.20")] })).toBe("192.168.1.20");
  });

  it("fails for missing interfaces", () => {
    expect(() => resolveInterfaceAddress("wlan9", { eth0: [ipv4("192.168.1.20")] })).toThrow(
      "Network interface 'wlan9' not found or has no IPv4 address",
    );
  });
});

describe("MulticastTransport", () => {
  beforeEach(() => {
    fake.sockets.length = 0;
  });

  it("refuses non-multicast addresses before opening a socket", async () => {
    const transport = new MulticastTransport({ address: "192.168.1.1", port: 8080 });
    await expect(transport.join()).rejects.toThrow(
      "Address 192.168.1.1 is not a valid multicast address",
    );
    expect(fake.sockets).toHaveLength(0);
  });

  it("binds the group port, joins the group and enables loopback", async () => {
    const transport = new MulticastTransport({
      address: "239.255.255.250",
      port: 8080,
      interface: "127.0.0.1",
    });
    await transport.join();

    const socket = fake.sockets[0];
    expect(socket.boundPort).toBe(8080);
    expect(socket.memberships).toEqual([["239.255.255.250", "127.0.0.1"]]);
    expect(socket.loopback).toBe(true);
    expect(socket.multicastInterface).toBe("127.0.0.1");
  });

  it("reports bind failures as fatal transport errors", async () => {
    fake.failNextBind(new Error("EADDRINUSE"));
    const transport = new MulticastTransport({ address: "239.255.255.250", port: 8080 });
    await expect(transport.join()).rejects.toBeInstanceOf(TransportError);
  });

  it("sends datagrams to the group", async () => {
    const transport = new MulticastTransport({ address: "239.1.2.3", port: 9000 });
    await transport.join();
    await transport.send(Uint8Array.from([1, 2, 3]));

    expect(fake.sockets[0].sent).toEqual([
      { bytes: Uint8Array.from([1, 2, 3]), port: 9000, address: "239.1.2.3" },
    ]);
  });

  it("rejects payloads above the datagram limit", async () => {
    const transport = new MulticastTransport({ address: "239.1.2.3", port: 9000 });
    await transport.join();

    await expect(transport.send(new Uint8Array(1401))).rejects.toBeInstanceOf(PayloadTooLargeError);
    await transport.send(new Uint8Array(1400));
    expect(fake.sockets[0].sent).toHaveLength(1);
  });

  it("refuses to send before joining", async () => {
    const transport = new MulticastTransport({ address: "239.1.2.3", port: 9000 });
    await expect(transport.send(Uint8Array.from([1]))).rejects.toThrow(
      "Transport has not joined a multicast group",
    );
  });

  it("delivers datagrams, survives receive errors and ends on close", async () => {
    const transport = new MulticastTransport({ address: "239.1.2.3", port: 9000 });
    await transport.join();
    const socket = fake.sockets[0];
    const received: string[] = [];

    const loop = transport.receiveLoop((bytes, source) => {
      received.push(`${source.address}:${bytes.toString("utf8")}`);
    });

    socket.emit("message", Buffer.from("one"), { address: "10.0.0.2", port: 9000 });
    socket.emit("error", new Error("ECONNREFUSED"));
    socket.emit("message", Buffer.from("two"), { address: "10.0.0.3", port: 9000 });

    await transport.close();
    await loop;

    expect(received).toEqual(["10.0.0.2:one", "10.0.0.3:two"]);
    expect(socket.listenerCount("message")).toBe(0);
    await expect(transport.send(Uint8Array.from([1]))).rejects.toThrow("Transport is closed");
  });

  it("keeps receiving when a handler throws", async () => {
    const transport = new MulticastTransport({ address: "239.1.2.3", port: 9000 });
    await transport.join();
    const socket = fake.sockets[0];
    const handler = vi.fn(() => {
      throw new Error("boom");
    });

    const loop = transport.receiveLoop(handler);
    socket.emit("message", Buffer.from("a"), { address: "10.0.0.2", port: 9000 });
    socket.emit("message", Buffer.from("b"), { address: "10.0.0.2", port: 9000 });
    await transport.close();
    await loop;

    expect(handler).toHaveBeenCalledTimes(2);
  });
});
