import { MessageKind, PROTOCOL_VERSION, type MessageEnvelope, type MessageKindValue } from "./envelope";

const MESSAGE_ID_BYTES = 16;
const FLAG_TURN_SEQUENCE = 0x01;
const KNOWN_FLAGS = FLAG_TURN_SEQUENCE;
const MAX_U16 = 0xffff;
const MAX_U32 = 0xffffffff;

const KIND_TABLE: ReadonlyArray<readonly [MessageKindValue, number]> = [
  [MessageKind.CHAT, 0],
  [MessageKind.DEBATE_TURN, 1],
  [MessageKind.HEARTBEAT, 2],
];

const KIND_CODES = new Map<MessageKindValue, number>(KIND_TABLE);
const KINDS_BY_CODE = new Map<number, MessageKindValue>(
  KIND_TABLE.map(([kind, code]) => [code, kind]),
);

const MESSAGE_ID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const LONE_SURROGATE_RE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

export class EnvelopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnvelopeError";
  }
}

function encodeText(field: string, value: string): Buffer {
  if (LONE_SURROGATE_RE.test(value)) {
    throw new EnvelopeError(`${field} contains a lone surrogate`);
  }
  return Buffer.from(value, "utf8");
}

function encodeMessageId(messageId: string): Buffer {
  if (!MESSAGE_ID_RE.test(messageId)) {
    throw new EnvelopeError(`messageId is not a canonical 128-bit id: ${messageId}`);
  }
  return Buffer.from(messageId.replaceAll("-", ""), "hex");
}

function formatMessageId(bytes: Buffer): string {
  const hex = bytes.toString("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join("-");
}

function validate(envelope: MessageEnvelope): number {
  if (envelope.version !== PROTOCOL_VERSION) {
    throw new EnvelopeError(`Unsupported envelope version ${envelope.version}`);
  }
  if (!envelope.senderId) {
    throw new EnvelopeError("senderId is empty");
  }
  if (!Number.isSafeInteger(envelope.createdAt)) {
    throw new EnvelopeError(`createdAt is not an integer timestamp: ${envelope.createdAt}`);
  }
  const seq = envelope.turnSequence;
  if (seq !== undefined && (!Number.isInteger(seq) || seq < 0 || seq > MAX_U32)) {
    throw new EnvelopeError(`turnSequence out of range: ${seq}`);
  }
  const kindCode = KIND_CODES.get(envelope.kind);
  if (kindCode === undefined) {
    throw new EnvelopeError(`Unknown envelope kind ${String(envelope.kind)}`);
  }
  return kindCode;
}

function headerLength(senderBytes: number, hasTurnSequence: boolean): number {
  // version + kind + id + sender length + sender + createdAt + flags + [seq] + content length
  return 1 + 1 + MESSAGE_ID_BYTES + 2 + senderBytes + 8 + 1 + (hasTurnSequence ? 4 : 0) + 4;
}

export function encode(envelope: MessageEnvelope): Uint8Array {
  const kindCode = validate(envelope);
  const id = encodeMessageId(envelope.messageId);
  const sender = encodeText("senderId", envelope.senderId);
  const content = encodeText("content", envelope.content);
  if (sender.length > MAX_U16) {
    throw new EnvelopeError(`senderId too long (${sender.length} bytes)`);
  }
  if (content.length > MAX_U32) {
    throw new EnvelopeError(`content too long (${content.length} bytes)`);
  }

  const hasSeq = envelope.turnSequence !== undefined;
  const out = Buffer.alloc(headerLength(sender.length, hasSeq) + content.length);
  let offset = 0;
  offset = out.writeUInt8(envelope.version, offset);
  offset = out.writeUInt8(kindCode, offset);
  offset += id.copy(out, offset);
  offset = out.writeUInt16BE(sender.length, offset);
  offset += sender.copy(out, offset);
  offset = out.writeBigInt64BE(BigInt(envelope.createdAt), offset);
  offset = out.writeUInt8(hasSeq ? FLAG_TURN_SEQUENCE : 0, offset);
  if (envelope.turnSequence !== undefined) {
    offset = out.writeUInt32BE(envelope.turnSequence, offset);
  }
  offset = out.writeUInt32BE(content.length, offset);
  content.copy(out, offset);
  return out;
}

class Reader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  private take(length: number, field: string): number {
    if (this.offset + length > this.buf.length) {
      throw new DecodeError(
        `Truncated envelope: ${field} needs ${length} bytes at offset ${this.offset}, have ${
          this.buf.length - this.offset
        }`,
      );
    }
    const start = this.offset;
    this.offset += length;
    return start;
  }

  u8(field: string): number {
    return this.buf.readUInt8(this.take(1, field));
  }

  u16(field: string): number {
    return this.buf.readUInt16BE(this.take(2, field));
  }

  u32(field: string): number {
    return this.buf.readUInt32BE(this.take(4, field));
  }

  i64(field: string): bigint {
    return this.buf.readBigInt64BE(this.take(8, field));
  }

  bytes(length: number, field: string): Buffer {
    const start = this.take(length, field);
    return this.buf.subarray(start, start + length);
  }

  text(length: number, field: string): string {
    const raw = this.bytes(length, field);
    try {
      return utf8.decode(raw);
    } catch {
      throw new DecodeError(`${field} is not valid UTF-8`);
    }
  }

  remaining(): number {
    return this.buf.length - this.offset;
  }
}

export function decode(bytes: Uint8Array): MessageEnvelope {
  const reader = new Reader(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));

  const version = reader.u8("version");
  if (version !== PROTOCOL_VERSION) {
    throw new DecodeError(`Unsupported envelope version ${version}`);
  }
  const kindCode = reader.u8("kind");
  const kind = KINDS_BY_CODE.get(kindCode);
  if (!kind) {
    throw new DecodeError(`Unknown envelope kind ${kindCode}`);
  }
  const messageId = formatMessageId(reader.bytes(MESSAGE_ID_BYTES, "messageId"));
  const senderLength = reader.u16("senderId length");
  if (senderLength === 0) {
    throw new DecodeError("Empty senderId");
  }
  const senderId = reader.text(senderLength, "senderId");
  const createdAtRaw = reader.i64("createdAt");
  const createdAt = Number(createdAtRaw);
  if (!Number.isSafeInteger(createdAt)) {
    throw new DecodeError(`createdAt out of range: ${createdAtRaw}`);
  }
  const flags = reader.u8("flags");
  if ((flags & ~KNOWN_FLAGS) !== 0) {
    throw new DecodeError(`Unknown flag bits 0x${flags.toString(16)}`);
  }
  const turnSequence = flags & FLAG_TURN_SEQUENCE ? reader.u32("turnSequence") : undefined;
  const contentLength = reader.u32("content length");
  const content = reader.text(contentLength, "content");
  if (reader.remaining() !== 0) {
    throw new DecodeError(`Length mismatch: ${reader.remaining()} trailing bytes`);
  }

  const envelope: MessageEnvelope = { version, messageId, senderId, kind, content, createdAt };
  if (turnSequence !== undefined) {
    envelope.turnSequence = turnSequence;
  }
  return envelope;
}

/**
 * Clips `content` on a UTF-8 boundary so the encoded envelope fits in
 * `maxBytes`. Returns the envelope unchanged when it already fits.
 */
export function fitContent(envelope: MessageEnvelope, maxBytes: number): MessageEnvelope {
  const sender = Buffer.byteLength(envelope.senderId, "utf8");
  const budget = maxBytes - headerLength(sender, envelope.turnSequence !== undefined);
  if (budget < 0) {
    throw new EnvelopeError(`Envelope header alone exceeds ${maxBytes} bytes`);
  }
  const content = Buffer.from(envelope.content, "utf8");
  if (content.length <= budget) {
    return envelope;
  }
  let cut = budget;
  while (cut > 0 && (content[cut] & 0xc0) === 0x80) {
    cut--;
  }
  return { ...envelope, content: content.subarray(0, cut).toString("utf8") };
}
