import type { TLSSocket } from 'node:tls';
import { FramingError } from '../lib/errors.js';
import type { FanOutHub } from '../lib/fanOutHub.js';
import { logger } from '../lib/logger.js';
import { AUTH_PACKET_SIZE } from '../protocol/constants.js';
import { authPacketMatches, decodeAuth } from '../protocol/codec.js';
import type { AccessCredential } from '../types.js';

export interface ClientSessionOptions {
  hub: FanOutHub;
  credential: AccessCredential;
  authTimeoutMs: number;
}

export type RejectReason = 'auth_timeout' | 'auth_malformed' | 'auth_mismatch' | 'closed_before_auth';

const log = logger.child({ component: 'client' });

/**
 * Serves one downstream connection the way the printer would: read the
 * 80-byte auth packet, check it, then stream hub frames until the socket
 * goes away. Nothing is written to a client that has not authenticated.
 */
export function handleClientSocket(socket: TLSSocket, options: ClientSessionOptions): void {
  const remoteAddress = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
  let pending: Buffer = Buffer.alloc(0);
  let clientId: string | null = null;
  let done = false;

  socket.setNoDelay(true);

  const reject = (reason: RejectReason): void => {
    if (done) return;
    done = true;
    clearTimeout(authTimer);
    log.warn({ remoteAddress, reason }, 'client_rejected');
    socket.destroy();
  };

  const authTimer = setTimeout(() => reject('auth_timeout'), options.authTimeoutMs);

  socket.on('data', (chunk: Buffer) => {
    if (clientId || done) return;
    pending = Buffer.concat([pending, chunk]);
    if (pending.length < AUTH_PACKET_SIZE) return;

    clearTimeout(authTimer);
    const packet = pending.subarray(0, AUTH_PACKET_SIZE);
    pending = Buffer.alloc(0);
    try {
      decodeAuth(packet);
    } catch (error) {
      if (!(error instanceof FramingError)) throw error;
      reject('auth_malformed');
      return;
    }

    if (!authPacketMatches(packet, options.credential)) {
      reject('auth_mismatch');
      return;
    }

    clientId = options.hub.register(socket, { remoteAddress });
    log.info({ clientId, remoteAddress, clients: options.hub.size }, 'client_connected');
  });

  socket.on('error', (error: Error) => {
    log.debug({ err: error, clientId, remoteAddress }, 'client_socket_error');
  });

  socket.on('close', () => {
    clearTimeout(authTimer);
    if (clientId) {
      options.hub.deregister(clientId);
      log.info({ clientId, remoteAddress, clients: options.hub.size }, 'client_disconnected');
    } else if (!done) {
      done = true;
      log.warn({ remoteAddress, reason: 'closed_before_auth' }, 'client_rejected');
    }
  });
}
