/** Largest datagram the swarm sends; callers never fragment. */
export const MAX_DATAGRAM_BYTES = 1400;

export type DatagramSource = {
  address: string;
  port: number;
};

export type DatagramHandler = (bytes: Buffer, source: DatagramSource) => void;

export interface DatagramTransport {
  join(): Promise<void>;
  send(bytes: Uint8Array): Promise<void>;
  /** Resolves once the transport is closed. */
  receiveLoop(handler: DatagramHandler): Promise<void>;
  close(): Promise<void>;
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class PayloadTooLargeError extends Error {
  constructor(
    readonly size: number,
    readonly limit: number = MAX_DATAGRAM_BYTES,
  ) {
    super(`Datagram of ${size} bytes exceeds the ${limit} byte limit`);
    this.name = "PayloadTooLargeError";
  }
}
