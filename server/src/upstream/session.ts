import tls from 'node:tls';
import {
  AuthRejectedError,
  ConnectionLostError,
  FramingError,
  HandshakeError,
  IdleTimeoutError,
  describeError,
} from '../lib/errors.js';
import { FrameDecoder, encodeAuth } from '../protocol/codec.js';
import type { AccessCredential, Frame } from '../types.js';

export interface UpstreamSessionOptions {
  host: string;
  port: number;
  credential: AccessCredential;
  connectTimeoutMs: number;
  /** How long the printer may keep an authenticated socket open silently before we call it accepted. */
  acceptWindowMs: number;
  idleTimeoutMs: number;
  maxFrameBytes: number;
}

export interface UpstreamHandlers {
  onState(state: 'authenticating' | 'streaming'): void;
  onFrame(frame: Frame): void;
}

/** One connection attempt's worth of upstream I/O. */
export interface UpstreamConnection {
  run(handlers: UpstreamHandlers): Promise<void>;
  close(): void;
}

type Phase = 'idle' | 'connecting' | 'authenticating' | 'streaming' | 'closed';

/**
 * A single TLS connection to the printer's chamber-image port.
 *
 * `run` settles once: it resolves only when `close` ends the session and
 * otherwise rejects with the typed reason the connection died.
 */
export class UpstreamSession implements UpstreamConnection {
  private phase: Phase = 'idle';
  private abort: (() => void) | null = null;

  constructor(private readonly options: UpstreamSessionOptions) {}

  run(handlers: UpstreamHandlers): Promise<void> {
    if (this.phase !== 'idle') {
      return Promise.reject(new Error('UpstreamSession can only run once'));
    }
    const { host, port, credential, connectTimeoutMs, acceptWindowMs, idleTimeoutMs } =
      this.options;
    const decoder = new FrameDecoder(this.options.maxFrameBytes);

    return new Promise<void>((resolve, reject) => {
      this.phase = 'connecting';
      let settled = false;
      let acceptTimer: NodeJS.Timeout | undefined;
      let idleTimer: NodeJS.Timeout | undefined;

      // The printer presents a self-signed certificate.
      const socket = tls.connect({ host, port, rejectUnauthorized: false });

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        this.phase = 'closed';
        this.abort = null;
        clearTimeout(connectTimer);
        clearTimeout(acceptTimer);
        clearTimeout(idleTimer);
        socket.destroy();
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };
      this.abort = () => finish();

      const connectTimer = setTimeout(() => {
        finish(new HandshakeError(`TLS connect to ${host}:${port} timed out after ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);

      const armIdle = (): void => {
        clearTimeout(idleTimer);
        idleTimer = setTimeout(() => finish(new IdleTimeoutError(idleTimeoutMs)), idleTimeoutMs);
      };

      const enterStreaming = (): void => {
        if (this.phase !== 'authenticating') return;
        this.phase = 'streaming';
        clearTimeout(acceptTimer);
        armIdle();
        handlers.onState('streaming');
      };

      socket.once('secureConnect', () => {
        clearTimeout(connectTimer);
        this.phase = 'authenticating';
        handlers.onState('authenticating');
        socket.write(encodeAuth(credential));
        acceptTimer = setTimeout(enterStreaming, acceptWindowMs);
      });

      socket.on('data', (chunk: Buffer) => {
        if (settled) return;
        enterStreaming();
        let frames: Frame[];
        try {
          frames = decoder.push(chunk);
        } catch (error) {
          finish(error instanceof FramingError ? error : new FramingError(describeError(error)));
          return;
        }
        for (const frame of frames) {
          armIdle();
          handlers.onFrame(frame);
          if (settled) return;
        }
        if (decoder.failure) {
          finish(decoder.failure);
        }
      });

      socket.on('error', (error: Error) => {
        finish(this.failureFor(error));
      });

      socket.on('close', () => {
        finish(this.failureFor());
      });
    });
  }

  close(): void {
    this.abort?.();
  }

  private failureFor(cause?: Error): Error {
    switch (this.phase) {
      case 'connecting':
        return new HandshakeError(
          cause ? `TLS handshake failed: ${cause.message}` : 'Connection closed during TLS handshake',
          { cause },
        );
      case 'authenticating':
        return new AuthRejectedError(
          cause
            ? `Printer dropped the connection after authentication: ${cause.message}`
            : undefined,
        );
      default:
        return new ConnectionLostError(
          cause ? `Upstream connection lost: ${cause.message}` : undefined,
          { cause },
        );
    }
  }
}
