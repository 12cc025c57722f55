import { LRUCache } from "lru-cache";
import { describeError } from "../errors";
import { componentLogger, type AppLogger } from "../logger";

export interface TenantPoolOptions<T> {
  create: (tenantId: string) => Promise<T>;
  dispose?: (value: T, tenantId: string) => Promise<void>;
  idleMs?: number;
  maxEntries?: number;
  logger?: AppLogger;
}

export interface TenantPoolStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

interface PoolEntry<T> {
  value: T;
}

/**
 * Per-tenant cache of expensive client handles, idle-expired and capped in
 * LRU order. Concurrent first requests for the same tenant share one
 * creation promise.
 */
export class TenantClientPool<T> {
  private readonly entries: LRUCache<string, PoolEntry<T>>;

  private readonly pending = new Map<string, Promise<T>>();

  private readonly logger: AppLogger;

  private sweeper: NodeJS.Timeout | null = null;

  private closing = false;

  private readonly counters = { hits: 0, misses: 0, evictions: 0 };

  constructor(private readonly options: TenantPoolOptions<T>) {
    this.logger = options.logger ?? componentLogger("client-pool");
    this.entries = new LRUCache<string, PoolEntry<T>>({
      max: options.maxEntries ?? 50,
      ttl: options.idleMs ?? 30 * 60 * 1000,
      updateAgeOnGet: true,
      dispose: (entry, tenantId, reason) => {
        // Replacing a value and shutting down are not evictions.
        if (reason === "set" || this.closing) {
          return;
        }
        this.counters.evictions += 1;
        this.logger.debug("pool:evicted", { tenantId, reason });
        void this.disposeEntry(tenantId, entry.value);
      }
    });
  }

  async get(tenantId: string): Promise<T> {
    const entry = this.entries.get(tenantId);
    if (entry) {
      this.counters.hits += 1;
      return entry.value;
    }

    const inFlight = this.pending.get(tenantId);
    if (inFlight) {
      return inFlight;
    }

    this.counters.misses += 1;
    const creation = this.options
      .create(tenantId)
      .then((value) => {
        this.entries.set(tenantId, { value });
        this.logger.info("pool:created", { tenantId, size: this.entries.size });
        return value;
      })
      .finally(() => {
        this.pending.delete(tenantId);
      });
    this.pending.set(tenantId, creation);
    return creation;
  }

  /** Drops every entry idle for longer than the inactivity window. */
  evictIdle(): number {
    const before = this.counters.evictions;
    this.entries.purgeStale();
    return this.counters.evictions - before;
  }

  startSweeper(intervalMs = 60_000): void {
    if (this.sweeper) {
      return;
    }
    this.sweeper = setInterval(() => this.evictIdle(), intervalMs);
    this.sweeper.unref();
  }

  has(tenantId: string): boolean {
    return this.entries.has(tenantId);
  }

  stats(): TenantPoolStats {
    return { size: this.entries.size, ...this.counters };
  }

  /** Waits for creations still in flight so their handles are disposed too. */
  async closeAll(): Promise<void> {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    await Promise.allSettled([...this.pending.values()]);

    const entries = [...this.entries.entries()];
    this.closing = true;
    try {
      this.entries.clear();
    } finally {
      this.closing = false;
    }
    await Promise.all(entries.map(([tenantId, entry]) => this.disposeEntry(tenantId, entry.value)));
  }

  private async disposeEntry(tenantId: string, value: T): Promise<void> {
    if (!this.options.dispose) {
      return;
    }
    try {
      await this.options.dispose(value, tenantId);
    } catch (error) {
      this.logger.warn("pool:dispose_failed", { tenantId, error: describeError(error) });
    }
  }
}
