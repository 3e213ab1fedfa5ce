import { setTimeout as sleep } from 'node:timers/promises';
import type { BackoffConfig } from '../config.js';
import { Backoff } from '../lib/backoff.js';
import { AuthRejectedError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { Frame, UpstreamState, UpstreamStatus } from '../types.js';
import type { UpstreamConnection } from './session.js';

export interface FrameTarget {
  publish(frame: Frame): void;
}

export interface StateChange {
  from: UpstreamState;
  to: UpstreamState;
  attempt: number;
  delayMs?: number;
  error?: Error;
}

export interface ReconnectSupervisorOptions {
  createSession: () => UpstreamConnection;
  target: FrameTarget;
  backoff: BackoffConfig;
  random?: () => number;
  wait?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const log = logger.child({ component: 'upstream' });

function defaultWait(ms: number, signal: AbortSignal): Promise<void> {
  return sleep(ms, undefined, { signal });
}

/**
 * Keeps exactly one upstream session alive, forever.
 *
 * disconnected -> connecting -> authenticating -> streaming, and on any
 * failure -> backoff -> connecting. The backoff resets whenever a session
 * reaches streaming. There is no terminal failure state; only `stop` ends
 * the loop.
 */
export class ReconnectSupervisor {
  private state: UpstreamState = 'disconnected';
  private since = Date.now();
  private attempt = 0;
  private lastError: Error | undefined;
  private running = false;
  private current: UpstreamConnection | null = null;
  private loop: Promise<void> | null = null;
  private sleeper: AbortController | null = null;
  private listeners: Array<(change: StateChange) => void> = [];
  private readonly backoff: Backoff;
  private readonly wait: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(private readonly options: ReconnectSupervisorOptions) {
    this.backoff = new Backoff(options.backoff, options.random);
    this.wait = options.wait ?? defaultWait;
  }

  onStateChange(listener: (change: StateChange) => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((entry) => entry !== listener);
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.runLoop();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.sleeper?.abort();
    this.current?.close();
    await this.loop;
    this.loop = null;
  }

  status(): UpstreamStatus {
    return {
      state: this.state,
      since: this.since,
      attempt: this.attempt,
      lastError: this.lastError?.message,
    };
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      this.attempt += 1;
      this.transition('connecting');
      const session = this.options.createSession();
      this.current = session;

      try {
        await session.run({
          onState: (next) => {
            if (next === 'streaming') {
              this.backoff.reset();
              this.lastError = undefined;
            }
            this.transition(next);
          },
          onFrame: (frame) => this.options.target.publish(frame),
        });
      } catch (error) {
        if (this.running) {
          this.recordFailure(error instanceof Error ? error : new Error(describeError(error)));
        }
      } finally {
        this.current = null;
      }

      if (!this.running) break;

      const delayMs = this.backoff.next();
      this.transition('backoff', { delayMs, error: this.lastError });
      this.sleeper = new AbortController();
      try {
        await this.wait(delayMs, this.sleeper.signal);
      } catch (error) {
        // Aborted by stop(); anything else just shortens this backoff.
        if (this.running) log.warn({ err: error }, 'upstream_backoff_interrupted');
      } finally {
        this.sleeper = null;
      }
    }
    this.transition('disconnected');
  }

  private recordFailure(error: Error): void {
    this.lastError = error;
    if (error instanceof AuthRejectedError) {
      log.error(
        {
          err: error,
          attempt: this.attempt,
          hint: 'check ACCESS_CODE and that LAN mode is enabled on the printer',
        },
        'upstream_auth_rejected',
      );
      return;
    }
    log.warn({ err: error, state: this.state, attempt: this.attempt }, 'upstream_failed');
  }

  private transition(
    to: UpstreamState,
    extra: { delayMs?: number; error?: Error } = {},
  ): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.since = Date.now();
    const change: StateChange = { from, to, attempt: this.attempt, ...extra };
    log.info(
      { from, to, attempt: this.attempt, delayMs: extra.delayMs },
      'upstream_state',
    );
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
