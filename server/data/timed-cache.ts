import { metrics } from "../metrics";
import { createLogger } from "../utils/log";

const log = createLogger("cache");

export type CacheEntry<T> = {
  value: T | null;
  lastUpdated: number;
  ttlMs: number;
};

export type CacheRead<T> =
  | { status: "fresh"; value: T; lastUpdated: number }
  | { status: "stale"; value: T; lastUpdated: number; error: string | null }
  | { status: "unavailable"; error: string | null };

export type TimedCacheOptions<T> = {
  name: string;
  ttlMs: number;
  /** May run several dependent calls; only a fully resolved result is committed. */
  fetch: () => Promise<T>;
  /** Quiet period after a failed refresh during which reads do not refetch. */
  failureBackoffMs?: number;
  /** Called after each committed refresh. */
  onUpdate?: () => void;
  now?: () => number;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * TTL cache around a fallible fetch. A refresh replaces value and timestamp
 * together or leaves both untouched; concurrent readers of an expired entry
 * share one in-flight refresh.
 */
export class TimedCache<T> {
  readonly name: string;
  private readonly options: TimedCacheOptions<T>;
  private readonly now: () => number;
  private entry: CacheEntry<T>;
  private inflight: Promise<CacheRead<T>> | null = null;
  private lastError: string | null = null;
  private retryAt = 0;

  constructor(options: TimedCacheOptions<T>) {
    this.name = options.name;
    this.options = options;
    this.now = options.now ?? Date.now;
    this.entry = { value: null, lastUpdated: 0, ttlMs: Math.max(0, options.ttlMs) };
  }

  peek(): T | null {
    return this.entry.value;
  }

  isFresh(): boolean {
    return this.entry.value !== null && this.now() - this.entry.lastUpdated < this.entry.ttlMs;
  }

  /**
   * Returns the committed entry without waiting. An expired entry starts a
   * background refresh (shared with any in flight); `onUpdate` reports when
   * it lands.
   */
  read(): CacheRead<T> {
    const value = this.peek();
    if (value !== null && this.isFresh()) {
      return { status: "fresh", value, lastUpdated: this.entry.lastUpdated };
    }
    void this.get();
    return this.fallback();
  }

  get(): Promise<CacheRead<T>> {
    const { value, lastUpdated } = this.entry;
    if (value !== null && this.isFresh()) {
      return Promise.resolve({ status: "fresh", value, lastUpdated });
    }
    if (this.inflight) return this.inflight;
    if (this.now() < this.retryAt) {
      return Promise.resolve(this.fallback());
    }

    const attempt = this.refresh().finally(() => {
      this.inflight = null;
    });
    this.inflight = attempt;
    return attempt;
  }

  private async refresh(): Promise<CacheRead<T>> {
    let next: T;
    try {
      next = await this.options.fetch();
    } catch (error) {
      this.lastError = describeError(error);
      this.retryAt = this.now() + Math.max(0, this.options.failureBackoffMs ?? 0);
      metrics.cacheFetches.inc({ cache: this.name, outcome: "error" });
      log.warn(`${this.name} refresh failed: ${this.lastError}`);
      return this.fallback();
    }

    const lastUpdated = this.now();
    this.entry = { value: next, lastUpdated, ttlMs: this.entry.ttlMs };
    this.lastError = null;
    this.retryAt = 0;
    metrics.cacheFetches.inc({ cache: this.name, outcome: "ok" });
    log.debug(`${this.name} refreshed`);
    this.options.onUpdate?.();
    return { status: "fresh", value: next, lastUpdated };
  }

  private fallback(): CacheRead<T> {
    const { value, lastUpdated } = this.entry;
    if (value !== null) {
      return { status: "stale", value, lastUpdated, error: this.lastError };
    }
    return { status: "unavailable", error: this.lastError };
  }
}

export const cachedValue = <T>(read: CacheRead<T>): T | null => (read.status === "unavailable" ? null : read.value);
