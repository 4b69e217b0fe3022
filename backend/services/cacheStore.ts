import { createClient } from 'redis';
import { CacheError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

/**
 * Key-value store behind the Cache Manager. Values are opaque strings;
 * `acquireLock` is an atomic set-if-absent whose lease lapses after
 * `timeoutMs`.
 */
export interface CacheStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
    deleteByPrefix(prefix: string): Promise<number>;
    acquireLock(key: string, timeoutMs: number): Promise<boolean>;
    releaseLock(key: string): Promise<void>;
    close(): Promise<void>;
}

const LOCK_PREFIX = 'lock:';
const CONNECT_TIMEOUT_MS = 2_000;

// ============================================================================
// IN-PROCESS STORE
// ============================================================================

interface MemoryRecord {
    value: string;
    expiresAt: number;
}

export class MemoryCacheStore implements CacheStore {
    private readonly records = new Map<string, MemoryRecord>();
    private readonly locks = new Map<string, number>();

    constructor(
        private readonly clock: () => number = Date.now,
        private readonly maxEntries = 10_000
    ) {}

    get size(): number {
        return this.records.size;
    }

    async get(key: string): Promise<string | null> {
        const record = this.records.get(key);
        if (!record) return null;
        if (record.expiresAt <= this.clock()) {
            this.records.delete(key);
            return null;
        }
        return record.value;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        if (this.records.size >= this.maxEntries && !this.records.has(key)) {
            this.evictOne();
        }
        this.records.set(key, { value, expiresAt: this.clock() + ttlSeconds * 1000 });
    }

    async deleteByPrefix(prefix: string): Promise<number> {
        let removed = 0;
        for (const key of [...this.records.keys()]) {
            if (key.startsWith(prefix)) {
                this.records.delete(key);
                removed += 1;
            }
        }
        return removed;
    }

    async acquireLock(key: string, timeoutMs: number): Promise<boolean> {
        const now = this.clock();
        const heldUntil = this.locks.get(key);
        if (heldUntil !== undefined && heldUntil > now) {
            return false;
        }
        this.locks.set(key, now + timeoutMs);
        return true;
    }

    async releaseLock(key: string): Promise<void> {
        this.locks.delete(key);
    }

    async close(): Promise<void> {
        this.records.clear();
        this.locks.clear();
    }

    // Drops expired records first, otherwise the oldest insertion.
    private evictOne(): void {
        const now = this.clock();
        for (const [key, record] of this.records) {
            if (record.expiresAt <= now) {
                this.records.delete(key);
                return;
            }
        }
        const oldest = this.records.keys().next();
        if (!oldest.done) {
            this.records.delete(oldest.value);
        }
    }
}

// ============================================================================
// REDIS STORE
// ============================================================================

type RedisClient = ReturnType<typeof createClient>;

export class RedisCacheStore implements CacheStore {
    private connecting: Promise<void> | null = null;

    constructor(private readonly client: RedisClient) {
        client.on('error', (error: unknown) => {
            logger.error('Redis client error', error);
        });
    }

    static fromUrl(url: string): RedisCacheStore {
        return new RedisCacheStore(createClient({
            url,
            disableOfflineQueue: true,
            socket: {
                connectTimeout: CONNECT_TIMEOUT_MS,
                reconnectStrategy: (retries: number) => Math.min(retries * 200, 5_000),
            },
        }));
    }

    async get(key: string): Promise<string | null> {
        return this.run('get', (client) => client.get(key));
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.run('set', (client) => client.set(key, value, { EX: Math.max(1, Math.ceil(ttlSeconds)) }));
    }

    async deleteByPrefix(prefix: string): Promise<number> {
        return this.run('deleteByPrefix', async (client) => {
            let removed = 0;
            for await (const key of client.scanIterator({ MATCH: `${prefix}*`, COUNT: 100 })) {
                removed += await client.del(key);
            }
            return removed;
        });
    }

    async acquireLock(key: string, timeoutMs: number): Promise<boolean> {
        return this.run('acquireLock', async (client) => {
            const reply = await client.set(`${LOCK_PREFIX}${key}`, '1', { NX: true, PX: Math.max(1, timeoutMs) });
            return reply === 'OK';
        });
    }

    async releaseLock(key: string): Promise<void> {
        await this.run('releaseLock', (client) => client.del(`${LOCK_PREFIX}${key}`));
    }

    async close(): Promise<void> {
        if (this.client.isOpen) {
            await this.client.quit();
        }
    }

    // Commands fail fast while disconnected (offline queue disabled).
    private async connected(): Promise<RedisClient> {
        if (!this.client.isOpen && !this.connecting) {
            this.connecting = this.client.connect().then(() => undefined).finally(() => {
                this.connecting = null;
            });
        }
        if (this.connecting) {
            let timer: NodeJS.Timeout | undefined;
            const timeout = new Promise<never>((_, reject) => {
                timer = setTimeout(() => reject(new Error('Redis connect timeout')), CONNECT_TIMEOUT_MS);
            });
            try {
                await Promise.race([this.connecting, timeout]);
            } finally {
                clearTimeout(timer);
            }
        }
        return this.client;
    }

    private async run<T>(operation: string, fn: (client: RedisClient) => Promise<T>): Promise<T> {
        try {
            return await fn(await this.connected());
        } catch (error) {
            throw new CacheError(`Redis ${operation} failed`, error);
        }
    }
}

export function createCacheStore(redisUrl: string | undefined): CacheStore {
    if (redisUrl) {
        logger.info(`Using Redis cache store at ${redisUrl.replace(/\/\/[^@]*@/, '//***@')}`);
        return RedisCacheStore.fromUrl(redisUrl);
    }
    logger.info('REDIS_URL not set, using in-process cache store');
    return new MemoryCacheStore();
}
