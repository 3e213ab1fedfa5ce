import type { BackoffConfig } from '../config.js';

/**
 * Exponential reconnect delay.
 *
 * The nth consecutive failure waits `min * 2^n` plus up to `jitter` of that,
 * clamped to `max`. With jitter at most 1 the doubled base always covers the
 * previous jittered value, so successive delays never shrink.
 */
export class Backoff {
  private attempt = 0;

  constructor(
    private readonly options: BackoffConfig,
    private readonly random: () => number = Math.random,
  ) {}

  next(): number {
    const base = Math.min(this.options.maxMs, this.options.minMs * 2 ** this.attempt);
    this.attempt += 1;
    const jittered = base * (1 + this.options.jitter * this.random());
    return Math.round(Math.min(this.options.maxMs, jittered));
  }

  reset(): void {
    this.attempt = 0;
  }

  get failures(): number {
    return this.attempt;
  }
}
