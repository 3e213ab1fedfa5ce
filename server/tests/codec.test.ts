import { describe, expect, it } from 'vitest';
import { FramingError } from '../src/lib/errors.js';
import {
  FrameDecoder,
  authPacketMatches,
  decodeAuth,
  encodeAuth,
  encodeFrame,
} from '../src/protocol/codec.js';
import { credential, payloadOf } from './helpers.js';

describe('encodeAuth', () => {
  it('lays the packet out as the printer expects', () => {
    const packet = encodeAuth({ username: 'bblp', accessCode: '12345678' });

    expect(packet.length).toBe(80);
    expect(packet.readUInt32LE(0)).toBe(0x40);
    expect(packet.readUInt32LE(4)).toBe(0x3000);
    expect(packet.readUInt32LE(8)).toBe(0);
    expect(packet.readUInt32LE(12)).toBe(0);
    expect(packet.subarray(16, 20).toString('ascii')).toBe('bblp');
    expect(packet.subarray(20, 48).every((byte) => byte === 0)).toBe(true);
    expect(packet.subarray(48, 56).toString('ascii')).toBe('12345678');
    expect(packet.subarray(56, 80).every((byte) => byte === 0)).toBe(true);
  });

  it('refuses fields longer than 32 bytes', () => {
    expect(() => encodeAuth({ username: 'bblp', accessCode: 'x'.repeat(33) })).toThrow(
      FramingError,
    );
  });

  it('accepts a 32-byte access code with no padding left', () => {
    const accessCode = 'a'.repeat(32);
    const packet = encodeAuth({ username: 'bblp', accessCode });
    expect(packet.subarray(48, 80).toString('ascii')).toBe(accessCode);
    expect(decodeAuth(packet)).toEqual({ username: 'bblp', accessCode });
  });
});

describe('decodeAuth', () => {
  it('recovers the credential it was given', () => {
    expect(decodeAuth(encodeAuth(credential))).toEqual(credential);
  });

  it('rejects a truncated packet', () => {
    const packet = encodeAuth(credential).subarray(0, 79);
    expect(() => decodeAuth(packet)).toThrow(FramingError);
  });

  it('rejects a packet with the wrong type word', () => {
    const packet = encodeAuth(credential);
    packet.writeUInt32LE(0x3001, 4);
    expect(() => decodeAuth(packet)).toThrow('Unexpected auth header 0x40/0x3001');
  });
});

describe('authPacketMatches', () => {
  const withCode = (accessCode: string) => encodeAuth({ ...credential, accessCode });

  it('accepts only the exact credential', () => {
    expect(authPacketMatches(encodeAuth(credential), credential)).toBe(true);
    expect(authPacketMatches(withCode('test1235'), credential)).toBe(false);
    expect(authPacketMatches(withCode('test123'), credential)).toBe(false);
    expect(authPacketMatches(withCode('test12345'), credential)).toBe(false);
    expect(authPacketMatches(withCode(''), credential)).toBe(false);
    expect(
      authPacketMatches(encodeAuth({ username: 'bblq', accessCode: 'test1234' }), credential),
    ).toBe(false);
  });

  it('rejects access code bytes with the high bit set', () => {
    const packet = encodeAuth(credential);
    for (let offset = 48; offset < 56; offset += 1) {
      packet[offset] |= 0x80;
    }

    expect(decodeAuth(packet).accessCode).toBe('test1234');
    expect(authPacketMatches(packet, credential)).toBe(false);
  });

  it('rejects bytes hidden after the terminating NUL', () => {
    const packet = encodeAuth(credential);
    packet[60] = 0x41;

    expect(decodeAuth(packet).accessCode).toBe('test1234');
    expect(authPacketMatches(packet, credential)).toBe(false);
  });

  it('rejects non-zero reserved words and short packets', () => {
    const packet = encodeAuth(credential);
    packet.writeUInt32LE(1, 8);

    expect(authPacketMatches(packet, credential)).toBe(false);
    expect(authPacketMatches(encodeAuth(credential).subarray(0, 79), credential)).toBe(false);
  });

  it('treats an expected credential that cannot be encoded as a mismatch', () => {
    expect(
      authPacketMatches(encodeAuth(credential), { ...credential, accessCode: 'y'.repeat(40) }),
    ).toBe(false);
  });
});

describe('FrameDecoder', () => {
  it('waits for the rest of a frame split across chunks', () => {
    const frame = encodeFrame(payloadOf(100, 3));
    const decoder = new FrameDecoder();

    expect(decoder.push(frame.wire.subarray(0, 10))).toEqual([]);
    expect(decoder.push(frame.wire.subarray(10, 60))).toEqual([]);
    expect(decoder.pendingBytes).toBe(60);

    const frames = decoder.push(frame.wire.subarray(60));
    expect(frames).toHaveLength(1);
    expect(frames[0].size).toBe(100);
    expect(frames[0].payload.equals(frame.payload)).toBe(true);
    expect(frames[0].wire.equals(frame.wire)).toBe(true);
    expect(decoder.pendingBytes).toBe(0);
  });

  it('returns several frames from one chunk in order and keeps the tail', () => {
    const first = encodeFrame(payloadOf(20, 1));
    const second = encodeFrame(payloadOf(30, 2));
    const third = encodeFrame(payloadOf(40, 3));
    const decoder = new FrameDecoder();

    const frames = decoder.push(
      Buffer.concat([first.wire, second.wire, third.wire.subarray(0, 25)]),
    );

    expect(frames.map((frame) => frame.size)).toEqual([20, 30]);
    expect(frames[1].payload.equals(second.payload)).toBe(true);
    expect(decoder.pendingBytes).toBe(25);
    expect(decoder.push(third.wire.subarray(25)).map((frame) => frame.size)).toEqual([40]);
  });

  it('relays the header words after the length untouched', () => {
    const header = Buffer.alloc(16);
    header.writeUInt32LE(0, 0);
    header.writeUInt32LE(0, 4);
    header.writeUInt32LE(1, 8);
    header.writeUInt32LE(0, 12);
    const frame = encodeFrame(payloadOf(8, 0), header);

    const [decoded] = new FrameDecoder().push(frame.wire);

    expect(decoded.header.readUInt32LE(0)).toBe(8);
    expect(decoded.header.readUInt32LE(8)).toBe(1);
  });

  it('fails on a zero length', () => {
    expect(() => new FrameDecoder().push(Buffer.alloc(16))).toThrow(FramingError);
  });

  it('fails on a length above the limit and stays failed until reset', () => {
    const decoder = new FrameDecoder(1024);
    const header = Buffer.alloc(16);
    header.writeUInt32LE(1025, 0);

    expect(() => decoder.push(header)).toThrow('Implausible frame length 1025 (max 1024)');
    expect(() => decoder.push(encodeFrame(payloadOf(4, 0)).wire)).toThrow(
      'Decoder already failed: Implausible frame length 1025 (max 1024)',
    );

    decoder.reset();
    expect(decoder.push(encodeFrame(payloadOf(4, 0)).wire)).toHaveLength(1);
  });

  it('hands back frames completed before a bad header and then stays failed', () => {
    const decoder = new FrameDecoder(1024);
    const good = encodeFrame(payloadOf(10, 5));
    const bad = Buffer.alloc(16);
    bad.writeUInt32LE(4096, 0);

    const frames = decoder.push(Buffer.concat([good.wire, bad]));

    expect(frames.map((frame) => frame.size)).toEqual([10]);
    expect(decoder.failure).toBeInstanceOf(FramingError);
    expect(() => decoder.push(good.wire)).toThrow(FramingError);
  });
});
