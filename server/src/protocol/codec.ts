import { timingSafeEqual } from 'node:crypto';
import { FramingError } from '../lib/errors.js';
import type { AccessCredential, Frame } from '../types.js';
import {
  AUTH_ACCESS_CODE_OFFSET,
  AUTH_BODY_SIZE,
  AUTH_FIELD_SIZE,
  AUTH_PACKET_SIZE,
  AUTH_PACKET_TYPE,
  AUTH_USERNAME_OFFSET,
  DEFAULT_MAX_FRAME_BYTES,
  FRAME_HEADER_SIZE,
} from './constants.js';

function writeField(packet: Buffer, offset: number, value: string, field: string): void {
  const bytes = Buffer.from(value, 'ascii');
  if (bytes.length > AUTH_FIELD_SIZE) {
    throw new FramingError(`${field} exceeds ${AUTH_FIELD_SIZE} bytes`);
  }
  bytes.copy(packet, offset);
}

function readField(packet: Buffer, offset: number): string {
  const field = packet.subarray(offset, offset + AUTH_FIELD_SIZE);
  const end = field.indexOf(0);
  return field.subarray(0, end === -1 ? AUTH_FIELD_SIZE : end).toString('ascii');
}

/**
 * Builds the 80-byte authentication packet:
 * u32le body size (0x40), u32le type (0x3000), two zero words,
 * then username and access code, each NUL padded to 32 bytes.
 */
export function encodeAuth(credential: AccessCredential): Buffer {
  const packet = Buffer.alloc(AUTH_PACKET_SIZE);
  packet.writeUInt32LE(AUTH_BODY_SIZE, 0);
  packet.writeUInt32LE(AUTH_PACKET_TYPE, 4);
  writeField(packet, AUTH_USERNAME_OFFSET, credential.username, 'username');
  writeField(packet, AUTH_ACCESS_CODE_OFFSET, credential.accessCode, 'access code');
  return packet;
}

export function decodeAuth(packet: Buffer): AccessCredential {
  if (packet.length !== AUTH_PACKET_SIZE) {
    throw new FramingError(
      `Auth packet must be ${AUTH_PACKET_SIZE} bytes, got ${packet.length}`,
    );
  }
  const bodySize = packet.readUInt32LE(0);
  const type = packet.readUInt32LE(4);
  if (bodySize !== AUTH_BODY_SIZE || type !== AUTH_PACKET_TYPE) {
    throw new FramingError(
      `Unexpected auth header 0x${bodySize.toString(16)}/0x${type.toString(16)}`,
    );
  }
  return {
    username: readField(packet, AUTH_USERNAME_OFFSET),
    accessCode: readField(packet, AUTH_ACCESS_CODE_OFFSET),
  };
}

/**
 * Byte-for-byte comparison of a received auth packet with the one `expected`
 * encodes to, in constant time. Decoded strings are lossy (high bits, bytes
 * after the first NUL), so they are never compared.
 */
export function authPacketMatches(packet: Buffer, expected: AccessCredential): boolean {
  if (packet.length !== AUTH_PACKET_SIZE) return false;
  let reference: Buffer;
  try {
    reference = encodeAuth(expected);
  } catch (error) {
    if (error instanceof FramingError) return false;
    throw error;
  }
  return timingSafeEqual(packet, reference);
}

export function encodeFrame(payload: Buffer, header?: Buffer): Frame {
  const head = Buffer.alloc(FRAME_HEADER_SIZE);
  if (header) {
    header.copy(head, 0, 0, FRAME_HEADER_SIZE);
  }
  head.writeUInt32LE(payload.length, 0);
  return {
    header: head,
    payload,
    size: payload.length,
    wire: Buffer.concat([head, payload]),
  };
}

/**
 * Splits the printer's byte stream into frames.
 *
 * Each frame is a 16-byte header whose first u32le word is the payload length,
 * followed by that many payload bytes. Incomplete tails are kept until the
 * next push. A bad length fails the decoder for good, since the cursor can no
 * longer be trusted to sit on a header: frames completed earlier in the same
 * chunk are still returned and `failure` is set, otherwise `push` throws.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private error: FramingError | null = null;

  constructor(private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

  push(chunk: Buffer): Frame[] {
    if (this.error) {
      throw new FramingError(`Decoder already failed: ${this.error.message}`);
    }
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: Frame[] = [];

    while (this.buffer.length >= FRAME_HEADER_SIZE) {
      const size = this.buffer.readUInt32LE(0);
      if (size === 0 || size > this.maxFrameBytes) {
        this.error = new FramingError(
          `Implausible frame length ${size} (max ${this.maxFrameBytes})`,
        );
        this.buffer = Buffer.alloc(0);
        if (frames.length === 0) throw this.error;
        break;
      }

      const total = FRAME_HEADER_SIZE + size;
      if (this.buffer.length < total) {
        break;
      }

      // Copy so the frame does not pin the socket's chunk.
      const wire = Buffer.from(this.buffer.subarray(0, total));
      this.buffer = this.buffer.subarray(total);
      frames.push({
        header: wire.subarray(0, FRAME_HEADER_SIZE),
        payload: wire.subarray(FRAME_HEADER_SIZE),
        size,
        wire,
      });
    }

    return frames;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.error = null;
  }

  get failure(): FramingError | null {
    return this.error;
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }
}
