import { readFileSync } from 'node:fs';
import net from 'node:net';
import path from 'node:path';
import tls from 'node:tls';
import { fileURLToPath } from 'node:url';
import type { TlsMaterial } from '../src/lib/certificates.js';
import type { FrameSink } from '../src/lib/fanOutHub.js';
import { AUTH_PACKET_SIZE, PRINTER_USERNAME } from '../src/protocol/constants.js';
import { FrameDecoder, decodeAuth, encodeAuth, encodeFrame } from '../src/protocol/codec.js';
import type { AccessCredential, Frame } from '../src/types.js';

const fixtures = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

export const CERT_PATH = path.join(fixtures, 'test-cert.pem');
export const KEY_PATH = path.join(fixtures, 'test-key.pem');

export const tlsMaterial: TlsMaterial = {
  cert: readFileSync(CERT_PATH),
  key: readFileSync(KEY_PATH),
};

export const credential: AccessCredential = {
  username: PRINTER_USERNAME,
  accessCode: 'test1234',
};

export function payloadOf(size: number, seed: number): Buffer {
  const payload = Buffer.alloc(size);
  for (let i = 0; i < size; i += 1) {
    payload[i] = (i + seed) % 256;
  }
  return payload;
}

export function frameOf(size: number, seed: number): Frame {
  return encodeFrame(payloadOf(size, seed));
}

/** A port nothing is listening on. */
export async function closedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = address && typeof address === 'object' ? address.port : 0;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

/** In-memory socket stand-in for hub tests. */
export class FakeSink implements FrameSink {
  chunks: Buffer[] = [];
  destroyed = false;
  blocked = false;
  failWrites = false;
  private drainListeners: Array<() => void> = [];

  write(chunk: Buffer): boolean {
    if (this.failWrites) {
      throw new Error('EPIPE');
    }
    this.chunks.push(chunk);
    return !this.blocked;
  }

  once(_event: 'drain', listener: () => void): this {
    this.drainListeners.push(listener);
    return this;
  }

  destroy(): this {
    this.destroyed = true;
    return this;
  }

  drain(): void {
    this.blocked = false;
    const listeners = this.drainListeners;
    this.drainListeners = [];
    for (const listener of listeners) {
      listener();
    }
  }
}

/**
 * In-process stand-in for the printer's chamber-image port: checks the auth
 * packet against its own access code and streams whatever frames it is told to.
 */
export class FakePrinter {
  accessCode: string;
  /** When set, authenticated connections are closed anyway. */
  rejectAll = false;
  authPackets: Buffer[] = [];
  connections = 0;
  private server: tls.Server;
  private streams = new Set<tls.TLSSocket>();

  constructor(accessCode = credential.accessCode) {
    this.accessCode = accessCode;
    this.server = tls.createServer({ cert: tlsMaterial.cert, key: tlsMaterial.key });
    this.server.on('secureConnection', (socket) => this.accept(socket));
  }

  async start(): Promise<number> {
    await new Promise<void>((resolve) => this.server.listen(0, '127.0.0.1', resolve));
    return this.port;
  }

  get port(): number {
    const address = this.server.address();
    return address && typeof address === 'object' ? address.port : 0;
  }

  get streaming(): number {
    return this.streams.size;
  }

  send(frame: Frame): void {
    for (const socket of this.streams) {
      socket.write(frame.wire);
    }
  }

  sendRaw(bytes: Buffer): void {
    for (const socket of this.streams) {
      socket.write(bytes);
    }
  }

  dropStreams(): void {
    for (const socket of this.streams) {
      socket.destroy();
    }
  }

  async stop(): Promise<void> {
    this.dropStreams();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }

  private accept(socket: tls.TLSSocket): void {
    this.connections += 1;
    let pending: Buffer = Buffer.alloc(0);
    socket.on('error', () => socket.destroy());
    socket.on('close', () => this.streams.delete(socket));
    socket.on('data', (chunk: Buffer) => {
      if (this.streams.has(socket)) return;
      pending = Buffer.concat([pending, chunk]);
      if (pending.length < AUTH_PACKET_SIZE) return;
      const packet = pending.subarray(0, AUTH_PACKET_SIZE);
      this.authPackets.push(packet);
      let received: AccessCredential | null = null;
      try {
        received = decodeAuth(packet);
      } catch {
        received = null;
      }
      if (this.rejectAll || received?.accessCode !== this.accessCode) {
        socket.destroy();
        return;
      }
      this.streams.add(socket);
    });
  }
}

/** A downstream viewer talking to the proxy. */
export class TestClient {
  frames: Frame[] = [];
  bytesReceived = 0;
  closed = false;
  private decoder = new FrameDecoder();

  private constructor(readonly socket: tls.TLSSocket) {
    socket.on('data', (chunk: Buffer) => {
      this.bytesReceived += chunk.length;
      this.frames.push(...this.decoder.push(chunk));
    });
    socket.on('error', () => undefined);
    socket.on('close', () => {
      this.closed = true;
    });
  }

  static async connect(port: number, auth?: Buffer | AccessCredential): Promise<TestClient> {
    const socket = tls.connect({ host: '127.0.0.1', port, rejectUnauthorized: false });
    await new Promise<void>((resolve, reject) => {
      socket.once('secureConnect', resolve);
      socket.once('error', reject);
    });
    const client = new TestClient(socket);
    if (auth) {
      socket.write(Buffer.isBuffer(auth) ? auth : encodeAuth(auth));
    }
    return client;
  }

  end(): void {
    this.socket.destroy();
  }
}
