import { v4 as uuid } from 'uuid';
import { ClientWriteError, describeError } from './errors.js';
import { logger } from './logger.js';
import type { ClientInfo, ClientStats, Frame, HubStats } from '../types.js';

/** The slice of a socket the hub writes to. */
export interface FrameSink {
  write(chunk: Buffer): boolean;
  once(event: 'drain', listener: () => void): unknown;
  destroy(error?: Error): unknown;
  readonly destroyed: boolean;
}

interface ClientOutlet {
  id: string;
  sink: FrameSink;
  info: ClientInfo;
  connectedAt: number;
  queue: Frame[];
  alive: boolean;
  awaitingDrain: boolean;
  delivered: number;
  dropped: number;
}

const log = logger.child({ component: 'hub' });

/**
 * Broadcasts upstream frames to every registered client.
 *
 * Each client gets its own bounded queue; a client that cannot keep up loses
 * its oldest pending frames while everyone else is served unchanged. Frames
 * are written whole, one `write` per frame.
 */
export class FanOutHub {
  private clients = new Map<string, ClientOutlet>();
  private published = 0;
  private droppedTotal = 0;

  constructor(private readonly maxQueuedFrames: number = 2) {
    if (maxQueuedFrames < 1) {
      throw new RangeError('maxQueuedFrames must be at least 1');
    }
  }

  register(sink: FrameSink, info: ClientInfo): string {
    let id = uuid();
    while (this.clients.has(id)) {
      id = uuid();
    }
    this.clients.set(id, {
      id,
      sink,
      info,
      connectedAt: Date.now(),
      queue: [],
      alive: true,
      awaitingDrain: false,
      delivered: 0,
      dropped: 0,
    });
    return id;
  }

  deregister(clientId: string): boolean {
    const outlet = this.clients.get(clientId);
    if (!outlet) {
      return false;
    }
    outlet.alive = false;
    outlet.queue = [];
    this.clients.delete(clientId);
    return true;
  }

  publish(frame: Frame): void {
    this.published += 1;
    // Snapshot: a failing write may deregister a client mid-loop.
    for (const outlet of [...this.clients.values()]) {
      if (!outlet.alive) continue;
      outlet.queue.push(frame);
      if (outlet.queue.length > this.maxQueuedFrames) {
        outlet.queue.shift();
        outlet.dropped += 1;
        this.droppedTotal += 1;
      }
      this.flush(outlet);
    }
  }

  /** Forcibly closes and forgets a single client. */
  disconnect(clientId: string): boolean {
    const outlet = this.clients.get(clientId);
    if (!outlet) {
      return false;
    }
    this.deregister(clientId);
    outlet.sink.destroy();
    return true;
  }

  closeAll(): void {
    for (const id of [...this.clients.keys()]) {
      this.disconnect(id);
    }
  }

  has(clientId: string): boolean {
    return this.clients.has(clientId);
  }

  get size(): number {
    return this.clients.size;
  }

  stats(): HubStats {
    return {
      clients: this.clients.size,
      framesPublished: this.published,
      framesDropped: this.droppedTotal,
    };
  }

  list(): ClientStats[] {
    return [...this.clients.values()].map((outlet) => ({
      id: outlet.id,
      remoteAddress: outlet.info.remoteAddress,
      connectedAt: outlet.connectedAt,
      framesDelivered: outlet.delivered,
      framesDropped: outlet.dropped,
      queued: outlet.queue.length,
    }));
  }

  private flush(outlet: ClientOutlet): void {
    while (outlet.alive && !outlet.awaitingDrain && outlet.queue.length > 0) {
      if (outlet.sink.destroyed) {
        this.fail(outlet, new ClientWriteError('Client socket already destroyed'));
        return;
      }
      const frame = outlet.queue.shift();
      if (!frame) return;

      let flushed: boolean;
      try {
        flushed = outlet.sink.write(frame.wire);
      } catch (error) {
        this.fail(
          outlet,
          new ClientWriteError(`Write to client failed: ${describeError(error)}`, {
            cause: error,
          }),
        );
        return;
      }
      outlet.delivered += 1;

      if (!flushed) {
        outlet.awaitingDrain = true;
        outlet.sink.once('drain', () => {
          outlet.awaitingDrain = false;
          this.flush(outlet);
        });
      }
    }
  }

  private fail(outlet: ClientOutlet, error: ClientWriteError): void {
    log.warn({ clientId: outlet.id, err: error }, 'client_write_failed');
    this.deregister(outlet.id);
    outlet.sink.destroy(error);
  }
}
