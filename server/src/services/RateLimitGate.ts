import { ProviderQuotaExceeded, RunCancelled } from '../errors';
import { env } from '../config/env';

export interface RateLimitGateOptions {
  maxConcurrency: number;
  /** Minimum gap between two request starts */
  minIntervalMs: number;
  /** How long the gate stays closed after a quota signal */
  quotaCooldownMs: number;
}

type GateTask = {
  run: () => Promise<void>;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
};

/**
 * Single gate every provider request passes through: bounded concurrency,
 * paced starts, and a hard stop while the provider quota is exhausted.
 */
export class RateLimitGate {
  private readonly queue: GateTask[] = [];
  private readonly options: RateLimitGateOptions;
  private active = 0;
  private lastStart = 0;
  private haltedUntil = 0;
  private pendingTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: Partial<RateLimitGateOptions> = {}) {
    this.options = {
      maxConcurrency: options.maxConcurrency ?? env.PROVIDER_MAX_CONCURRENCY,
      minIntervalMs: options.minIntervalMs ?? env.PROVIDER_MIN_INTERVAL_MS,
      quotaCooldownMs: options.quotaCooldownMs ?? env.PROVIDER_QUOTA_COOLDOWN_MS,
    };
  }

  get isHalted(): boolean {
    return Date.now() < this.haltedUntil;
  }

  schedule<T>(executor: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new RunCancelled());
    }
    if (this.isHalted) {
      return Promise.reject(new ProviderQuotaExceeded('Provider quota exhausted; request gate is closed'));
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: () => Promise.resolve().then(executor).then(resolve, reject),
        reject,
        signal,
      });
      this.drain();
    });
  }

  /** Close the gate and fail everything still queued. */
  halt(reason = 'Provider quota exceeded'): void {
    this.haltedUntil = Date.now() + this.options.quotaCooldownMs;
    console.warn(`RateLimitGate: halted for ${this.options.quotaCooldownMs}ms (${reason})`);
    this.rejectQueued(() => new ProviderQuotaExceeded(reason));
  }

  private drain(): void {
    if (this.pendingTimer) return;

    while (this.queue.length > 0 && this.active < this.options.maxConcurrency) {
      if (this.isHalted) {
        this.rejectQueued(() => new ProviderQuotaExceeded('Provider quota exhausted; request gate is closed'));
        return;
      }

      const now = Date.now();
      const wait = this.lastStart + this.options.minIntervalMs - now;
      if (wait > 0) {
        this.pendingTimer = setTimeout(() => {
          this.pendingTimer = null;
          this.drain();
        }, wait);
        return;
      }

      const task = this.queue.shift();
      if (!task) return;

      if (task.signal?.aborted) {
        task.reject(new RunCancelled());
        continue;
      }

      this.active += 1;
      this.lastStart = now;
      void task.run().finally(() => {
        this.active -= 1;
        this.drain();
      });
    }
  }

  private rejectQueued(makeError: () => Error): void {
    const queued = this.queue.splice(0, this.queue.length);
    for (const task of queued) {
      task.reject(makeError());
    }
  }
}
