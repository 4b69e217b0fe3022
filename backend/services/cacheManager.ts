import { createHash } from 'node:crypto';
import { settings } from '../lib/config.js';
import { describeError } from '../lib/errors.js';
import { logger, noopEventSink, type EventSink } from '../lib/logger.js';
import type { RequestContext } from '../lib/requestContext.js';
import { sleep } from '../lib/retry.js';
import type { ArtifactClass, CacheEntry } from '../lib/types.js';
import type { CacheStore } from './cacheStore.js';

const CACHE_VERSION = 'v1';
const KEY_PREFIX = 'recs';

export const SHARED_SCOPE = 'shared';

export type CacheParams = Record<string, string | number | boolean>;

export type ResolveStatus = 'hit' | 'computed' | 'stale' | 'empty';

export interface Resolved<T> {
    value: T;
    status: ResolveStatus;
}

// `shared` is false when the value only holds for the caller that computed
// it: a failure fallback, or a result it chose not to store.
interface Outcome<T> extends Resolved<T> {
    shared: boolean;
}

export interface ResolveOptions<T> {
    // Returned when recomputation fails and nothing stale is left.
    empty: T;
    ctx?: RequestContext;
    // Freshness in seconds for the computed value; defaults to the artifact tier.
    ttl?: (value: T) => number;
    // Return false to hand the value back without storing it.
    storable?: (value: T) => boolean;
    forceRefresh?: boolean;
}

export interface CacheMetrics {
    hits: number;
    misses: number;
    staleServed: number;
    computeFailures: number;
    lockWaits: number;
    storeErrors: number;
}

export interface CacheManagerOptions {
    store: CacheStore;
    ttls?: Partial<Record<ArtifactClass, number>>;
    degradedTtl?: number;
    staleGraceSeconds?: number;
    lockTimeoutMs?: number;
    lockPollMs?: number;
    clock?: () => number;
    events?: EventSink;
}

export const DEFAULT_TTLS: Record<ArtifactClass, number> = {
    library: settings.CACHE_TTL_LIBRARY,
    'seed-merge': settings.CACHE_TTL_RECOMMENDATIONS,
    rating: settings.CACHE_TTL_RATINGS,
    catalog: settings.CACHE_TTL_CATALOG,
};

/**
 * Hash a credential into the user scope of cache keys so the raw secret
 * never reaches the store.
 */
export function fingerprint(secret: string): string {
    return createHash('sha256').update(secret).digest('hex').slice(0, 24);
}

function stableSerialize(params: CacheParams): string {
    const sorted = Object.keys(params).sort().map((key) => [key, params[key]]);
    return JSON.stringify(sorted);
}

function isCacheEntry(value: unknown): value is CacheEntry<unknown> {
    if (!value || typeof value !== 'object') return false;
    return 'payload' in value && 'insertedAt' in value && 'ttl' in value && 'artifactClass' in value;
}

/**
 * Cache-aside over a CacheStore with fixed TTL tiers, stale-serving on
 * failure and at most one recomputation per key at a time.
 */
export class CacheManager {
    readonly ttls: Record<ArtifactClass, number>;
    readonly degradedTtl: number;
    private readonly store: CacheStore;
    private readonly staleGraceSeconds: number;
    private readonly lockTimeoutMs: number;
    private readonly lockPollMs: number;
    private readonly clock: () => number;
    private readonly events: EventSink;
    private readonly inFlight = new Map<string, Promise<Outcome<unknown>>>();
    private readonly metrics: CacheMetrics = {
        hits: 0,
        misses: 0,
        staleServed: 0,
        computeFailures: 0,
        lockWaits: 0,
        storeErrors: 0,
    };
    private readonly log = logger.child('cache');

    constructor(options: CacheManagerOptions) {
        this.store = options.store;
        this.ttls = { ...DEFAULT_TTLS, ...options.ttls };
        this.degradedTtl = options.degradedTtl ?? settings.CACHE_TTL_DEGRADED;
        this.staleGraceSeconds = options.staleGraceSeconds ?? settings.CACHE_STALE_GRACE;
        this.lockTimeoutMs = options.lockTimeoutMs ?? settings.CACHE_LOCK_TIMEOUT_MS;
        this.lockPollMs = options.lockPollMs ?? 100;
        this.clock = options.clock ?? Date.now;
        this.events = options.events ?? noopEventSink;
    }

    buildKey(artifactClass: ArtifactClass, scope: string, params: CacheParams): string {
        const serialized = JSON.stringify({ scope, artifactClass, params: stableSerialize(params), version: CACHE_VERSION });
        const digest = createHash('sha256').update(serialized).digest('hex');
        return `${KEY_PREFIX}:${scope}:${artifactClass}:${digest}`;
    }

    /**
     * Return the cached artifact when fresh; otherwise recompute it once
     * for all concurrent callers. A failed recomputation serves the stale
     * entry if one survives, else `options.empty`. Callers waiting on a
     * recomputation that failed or was not stored run their own.
     */
    async resolve<T>(
        artifactClass: ArtifactClass,
        scope: string,
        params: CacheParams,
        compute: () => Promise<T>,
        options: ResolveOptions<T>
    ): Promise<Resolved<T>> {
        const key = this.buildKey(artifactClass, scope, params);
        const events = options.ctx?.events ?? this.events;

        if (this.inFlight.has(key)) {
            const joined = await this.joinInFlight<T>(key);
            if (joined) return joined;
        }

        const existing = await this.read<T>(key, events);
        if (existing && !options.forceRefresh && this.isFresh(existing)) {
            this.metrics.hits += 1;
            events.emit({ type: 'cache.hit', artifactClass, key });
            return { value: existing.payload, status: 'hit' };
        }

        // Checked again after every wait so registration follows the check synchronously.
        while (this.inFlight.has(key)) {
            const pending = await this.joinInFlight<T>(key);
            if (pending) return pending;
        }

        const recomputation = this.recompute(key, artifactClass, existing, compute, options, events);
        this.inFlight.set(key, recomputation);
        try {
            const { value, status } = await recomputation;
            return { value, status };
        } finally {
            this.inFlight.delete(key);
        }
    }

    /**
     * Remaining fresh time of an entry, negative once it went stale, or
     * null when the store has nothing for the key.
     */
    async inspect(artifactClass: ArtifactClass, scope: string, params: CacheParams): Promise<{ freshForMs: number } | null> {
        const entry = await this.read<unknown>(this.buildKey(artifactClass, scope, params), this.events);
        if (!entry) return null;
        return { freshForMs: entry.insertedAt + entry.ttl * 1000 - this.clock() };
    }

    async invalidate(scope: string): Promise<number> {
        try {
            const removed = await this.store.deleteByPrefix(`${KEY_PREFIX}:${scope}:`);
            this.log.info(`Invalidated ${removed} entries for scope ${scope.slice(0, 8)}...`);
            return removed;
        } catch (error) {
            this.recordStoreError('invalidate', error, this.events);
            return 0;
        }
    }

    getMetricsSnapshot(): CacheMetrics {
        return { ...this.metrics };
    }

    /**
     * Wait for the recomputation of the key running in this process. Null
     * when there is none, or when its outcome was not shared.
     */
    private async joinInFlight<T>(key: string): Promise<Resolved<T> | null> {
        const pending = this.inFlight.get(key);
        if (!pending) return null;
        this.metrics.lockWaits += 1;
        // Same key means same artifact type.
        const outcome = await (pending as Promise<Outcome<T>>);
        return outcome.shared ? { value: outcome.value, status: outcome.status } : null;
    }

    private isFresh(entry: CacheEntry<unknown>): boolean {
        return this.clock() < entry.insertedAt + entry.ttl * 1000;
    }

    private async recompute<T>(
        key: string,
        artifactClass: ArtifactClass,
        stale: CacheEntry<T> | null,
        compute: () => Promise<T>,
        options: ResolveOptions<T>,
        events: EventSink
    ): Promise<Outcome<T>> {
        this.metrics.misses += 1;
        events.emit({ type: 'cache.miss', artifactClass, key });

        const lock = await this.acquireLock<T>(key, options.forceRefresh === true, events);
        if (lock.entry) {
            // Another process finished the same work while we waited.
            this.metrics.hits += 1;
            return { value: lock.entry.payload, status: 'hit', shared: true };
        }

        try {
            const value = await compute();
            const shared = options.storable?.(value) !== false;
            if (shared) {
                const ttl = options.ttl?.(value) ?? this.ttls[artifactClass];
                await this.write(key, artifactClass, value, ttl, events);
            }
            return { value, status: 'computed', shared };
        } catch (error) {
            this.metrics.computeFailures += 1;
            if (stale) {
                this.metrics.staleServed += 1;
                events.emit({ type: 'cache.stale', artifactClass, key });
                this.log.warn(`Serving stale ${artifactClass} after failed recompute`, { error: describeError(error) });
                return { value: stale.payload, status: 'stale', shared: false };
            }
            this.log.warn(`Recompute of ${artifactClass} failed with nothing stale to serve`, { error: describeError(error) });
            return { value: options.empty, status: 'empty', shared: false };
        } finally {
            if (lock.held) {
                await this.store.releaseLock(key).catch((error: unknown) => this.recordStoreError('releaseLock', error, events));
            }
        }
    }

    /**
     * Take the store-level compute lock. While another holder has it, poll
     * for the value it is producing; after the lock timeout compute anyway.
     */
    private async acquireLock<T>(
        key: string,
        skipPolling: boolean,
        events: EventSink
    ): Promise<{ held: boolean; entry: CacheEntry<T> | null }> {
        const startedAt = this.clock();
        while (true) {
            let acquired: boolean;
            try {
                acquired = await this.store.acquireLock(key, this.lockTimeoutMs);
            } catch (error) {
                this.recordStoreError('acquireLock', error, events);
                return { held: false, entry: null };
            }
            if (acquired) {
                return { held: true, entry: null };
            }

            this.metrics.lockWaits += 1;
            if (!skipPolling) {
                const entry = await this.read<T>(key, events);
                if (entry && this.isFresh(entry)) {
                    return { held: false, entry };
                }
            }
            if (this.clock() - startedAt >= this.lockTimeoutMs) {
                return { held: false, entry: null };
            }
            await sleep(this.lockPollMs);
        }
    }

    private async read<T>(key: string, events: EventSink): Promise<CacheEntry<T> | null> {
        let raw: string | null;
        try {
            raw = await this.store.get(key);
        } catch (error) {
            this.recordStoreError('get', error, events);
            return null;
        }
        if (raw === null) return null;

        try {
            const parsed: unknown = JSON.parse(raw);
            // Entries are written only by write() below, so the payload type follows the key.
            return isCacheEntry(parsed) ? parsed as CacheEntry<T> : null;
        } catch {
            this.log.warn(`Discarding unparseable cache entry ${key}`);
            return null;
        }
    }

    private async write<T>(key: string, artifactClass: ArtifactClass, payload: T, ttl: number, events: EventSink): Promise<void> {
        const entry: CacheEntry<T> = { key, payload, artifactClass, insertedAt: this.clock(), ttl };
        try {
            await this.store.set(key, JSON.stringify(entry), ttl + this.staleGraceSeconds);
        } catch (error) {
            this.recordStoreError('set', error, events);
        }
    }

    private recordStoreError(operation: string, error: unknown, events: EventSink): void {
        this.metrics.storeErrors += 1;
        events.emit({ type: 'cache.error', operation, message: describeError(error) });
    }
}
