import net from 'node:net';
import { logger } from '../lib/logger.js';
import { FTP_CONTROL_PORT, FTP_DATA_PORT_END, FTP_DATA_PORT_START } from '../protocol/constants.js';

export interface FtpProxyOptions {
  printerIp: string;
  bindAddress: string;
  controlPort?: number;
  /** Inclusive PASV data port range. */
  dataPorts?: [number, number];
  /** Printer-side port for a given local port; identity unless overridden. */
  upstreamPortFor?: (localPort: number) => number;
  connectTimeoutMs?: number;
}

const log = logger.child({ component: 'ftp' });

/**
 * Raw TCP passthrough for the printer's implicit-TLS FTP service. Bytes are
 * forwarded untouched, so TLS runs end to end between client and printer.
 */
export class FtpProxy {
  private servers: net.Server[] = [];
  private sockets = new Set<net.Socket>();
  private readonly controlPort: number;
  private readonly dataPorts: [number, number];

  constructor(private readonly options: FtpProxyOptions) {
    this.controlPort = options.controlPort ?? FTP_CONTROL_PORT;
    this.dataPorts = options.dataPorts ?? [FTP_DATA_PORT_START, FTP_DATA_PORT_END];
  }

  async start(): Promise<void> {
    if (this.servers.length > 0) return;
    // The control port must bind; data ports that are taken are skipped.
    this.servers.push(await this.listen(this.controlPort));
    for (let port = this.dataPorts[0]; port <= this.dataPorts[1]; port += 1) {
      try {
        this.servers.push(await this.listen(port));
      } catch (error) {
        log.debug({ port, err: error }, 'ftp_data_port_unavailable');
      }
    }
    log.info(
      { controlPort: this.controlPort, dataPorts: this.dataPorts, listeners: this.servers.length },
      'ftp_proxy_listening',
    );
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
    await Promise.all(
      this.servers.map((server) => new Promise<void>((resolve) => server.close(() => resolve()))),
    );
    this.servers = [];
    log.info('ftp_proxy_stopped');
  }

  get activeConnections(): number {
    return this.sockets.size;
  }

  /** Ports actually bound, in listen order. */
  boundPorts(): number[] {
    return this.servers.flatMap((server) => {
      const address = server.address();
      return address && typeof address === 'object' ? [address.port] : [];
    });
  }

  private listen(port: number): Promise<net.Server> {
    const server = net.createServer((client) => this.forward(client, port));
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, this.options.bindAddress, () => {
        server.removeListener('error', reject);
        server.on('error', (error) => log.warn({ port, err: error }, 'ftp_listener_error'));
        resolve(server);
      });
    });
  }

  private forward(client: net.Socket, localPort: number): void {
    const upstreamPort = this.options.upstreamPortFor?.(localPort) ?? localPort;
    const connectTimeoutMs = this.options.connectTimeoutMs ?? 10_000;
    const kind = localPort === this.controlPort ? 'control' : 'data';
    const upstream = net.connect({ host: this.options.printerIp, port: upstreamPort });
    this.track(client);
    this.track(upstream);

    log.debug({ kind, port: localPort, remoteAddress: client.remoteAddress }, 'ftp_connection_opened');

    upstream.setTimeout(connectTimeoutMs, () => {
      log.warn({ printer: this.options.printerIp, port: upstreamPort }, 'ftp_upstream_timeout');
      upstream.destroy();
    });
    upstream.once('connect', () => {
      upstream.setTimeout(0);
      client.pipe(upstream);
      upstream.pipe(client);
    });

    const closeBoth = (): void => {
      client.destroy();
      upstream.destroy();
    };
    client.on('error', (error) => log.debug({ kind, err: error }, 'ftp_client_error'));
    upstream.on('error', (error) => log.debug({ kind, err: error }, 'ftp_upstream_error'));
    client.once('close', closeBoth);
    upstream.once('close', () => {
      closeBoth();
      log.debug({ kind, port: localPort }, 'ftp_connection_closed');
    });
  }

  private track(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));
  }
}
