import tls from 'node:tls';
import type { ProxyConfig } from '../config.js';
import type { TlsMaterial } from '../lib/certificates.js';
import { FanOutHub } from '../lib/fanOutHub.js';
import { logger } from '../lib/logger.js';
import type { ProxyRunner } from '../types.js';
import { UpstreamSession, type UpstreamConnection } from '../upstream/session.js';
import { ReconnectSupervisor, type ReconnectSupervisorOptions } from '../upstream/supervisor.js';
import { handleClientSocket } from './clientSession.js';

export type ChamberProxyConfig = Pick<
  ProxyConfig,
  | 'printerIp'
  | 'credential'
  | 'bindAddress'
  | 'chamberPort'
  | 'connectTimeoutMs'
  | 'upstreamAcceptMs'
  | 'clientAuthTimeoutMs'
  | 'idleTimeoutMs'
  | 'backoff'
  | 'maxFrameBytes'
  | 'clientQueueFrames'
>;

export interface ChamberProxyOverrides {
  /** Port the printer listens on, when it differs from the proxy's own. */
  upstreamPort?: number;
  createSession?: () => UpstreamConnection;
  random?: ReconnectSupervisorOptions['random'];
  wait?: ReconnectSupervisorOptions['wait'];
}

const log = logger.child({ component: 'chamber' });

/**
 * Chamber-image fan-out: one supervised upstream session feeding a hub,
 * and a TLS listener that authenticates each client before joining it to
 * the hub.
 */
export class ChamberImageProxy implements ProxyRunner {
  readonly mode = 'chamber_image' as const;
  readonly hub: FanOutHub;
  readonly supervisor: ReconnectSupervisor;
  private server: tls.Server | null = null;
  private sockets = new Set<tls.TLSSocket>();

  constructor(
    private readonly config: ChamberProxyConfig,
    private readonly tlsMaterial: TlsMaterial,
    overrides: ChamberProxyOverrides = {},
  ) {
    this.hub = new FanOutHub(config.clientQueueFrames);
    const upstreamPort = overrides.upstreamPort ?? config.chamberPort;
    this.supervisor = new ReconnectSupervisor({
      target: this.hub,
      backoff: config.backoff,
      random: overrides.random,
      wait: overrides.wait,
      createSession:
        overrides.createSession ??
        (() =>
          new UpstreamSession({
            host: config.printerIp,
            port: upstreamPort,
            credential: config.credential,
            connectTimeoutMs: config.connectTimeoutMs,
            acceptWindowMs: config.upstreamAcceptMs,
            idleTimeoutMs: config.idleTimeoutMs,
            maxFrameBytes: config.maxFrameBytes,
          })),
    });
  }

  async start(): Promise<void> {
    if (this.server) return;
    const server = tls.createServer({ cert: this.tlsMaterial.cert, key: this.tlsMaterial.key });
    this.server = server;

    server.on('secureConnection', (socket) => {
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
      handleClientSocket(socket, {
        hub: this.hub,
        credential: this.config.credential,
        authTimeoutMs: this.config.clientAuthTimeoutMs,
      });
    });

    server.on('tlsClientError', (error, socket) => {
      log.debug({ err: error, remoteAddress: socket.remoteAddress }, 'client_tls_failed');
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.chamberPort, this.config.bindAddress, () => {
        server.removeListener('error', reject);
        resolve();
      });
    });

    server.on('error', (error) => {
      log.error({ err: error }, 'chamber_server_error');
    });

    log.info(
      { bind: this.config.bindAddress, port: this.port, printer: this.config.printerIp },
      'chamber_proxy_listening',
    );
    this.supervisor.start();
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    await this.supervisor.stop();
    this.hub.closeAll();
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    log.info('chamber_proxy_stopped');
  }

  /** Port actually bound, which differs from the configured one when that was 0. */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.config.chamberPort;
  }

  status(): Record<string, unknown> {
    const stats = this.hub.stats();
    return {
      upstream: this.supervisor.status(),
      clients: stats.clients,
      frames: { published: stats.framesPublished, dropped: stats.framesDropped },
    };
  }
}
