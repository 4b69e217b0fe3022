import { settings } from '../lib/config.js';
import { describeError } from '../lib/errors.js';
import type { RequestContext } from '../lib/requestContext.js';
import { callWithPolicy, defaultRetryPolicy, type RetryPolicy } from '../lib/retry.js';
import type { LibraryHistory, LibraryHistoryItem, SeedItem, SeedSource, UserConfig } from '../lib/types.js';
import { fingerprint, type CacheManager, type ResolveStatus } from './cacheManager.js';
import type { LibraryService } from './libraryClient.js';

export const LOVED_WEIGHT = 2;
export const WATCHED_WEIGHT = 1;

const EMPTY_HISTORY: LibraryHistory = { watched: [], loved: [] };

const SOURCE_BY_STATUS: Record<ResolveStatus, 'upstream' | 'cache' | 'stale' | 'empty'> = {
    computed: 'upstream',
    hit: 'cache',
    stale: 'stale',
    empty: 'empty',
};

export interface SeedSnapshot {
    seeds: SeedItem[];
    history: LibraryHistory;
    // How the history was obtained; `empty` means the library failed with no snapshot.
    status: ResolveStatus;
}

/**
 * Merge loved and watched history into ranked seeds. Loved wins when an
 * item is in both lists and always weighs more. With `preferLoved` the
 * loved items lead the order, and so survive the seed limit first; either
 * way timestamped items come newest first and the rest keep library order.
 */
export function buildSeeds(history: LibraryHistory, preferLoved: boolean, maxSeeds: number): SeedItem[] {
    const seen = new Set<string>();
    const merged: Array<{ item: LibraryHistoryItem; source: SeedSource }> = [];

    for (const item of history.loved) {
        if (seen.has(item.externalId)) continue;
        seen.add(item.externalId);
        merged.push({ item, source: 'loved' });
    }
    for (const item of history.watched) {
        if (seen.has(item.externalId)) continue;
        seen.add(item.externalId);
        merged.push({ item, source: 'watched' });
    }

    merged.sort((a, b) => {
        if (preferLoved && a.source !== b.source) {
            return a.source === 'loved' ? -1 : 1;
        }
        return (b.item.timestamp ?? -1) - (a.item.timestamp ?? -1);
    });

    return merged.slice(0, maxSeeds).map(({ item, source }, index) => ({
        externalId: item.externalId,
        mediaType: item.mediaType,
        title: item.title,
        source,
        weight: source === 'loved' ? LOVED_WEIGHT : WATCHED_WEIGHT,
        recencyRank: index,
    }));
}

export interface SeedCollectorOptions {
    library: LibraryService;
    cache: CacheManager;
    maxSeeds?: number;
    retryPolicy?: RetryPolicy;
    sleep?: (ms: number) => Promise<void>;
}

export class SeedCollector {
    private readonly library: LibraryService;
    private readonly cache: CacheManager;
    private readonly maxSeeds: number;
    private readonly retryPolicy: RetryPolicy;
    private readonly sleep?: (ms: number) => Promise<void>;

    constructor(options: SeedCollectorOptions) {
        this.library = options.library;
        this.cache = options.cache;
        this.maxSeeds = options.maxSeeds ?? settings.MAX_SEEDS;
        this.retryPolicy = options.retryPolicy ?? defaultRetryPolicy;
        this.sleep = options.sleep;
    }

    /**
     * Seeds for the user. A failed library fetch falls back to the last
     * cached snapshot, stale or not, then to no seeds at all; `status`
     * tells which. Never throws.
     */
    async collect(config: UserConfig, ctx: RequestContext): Promise<SeedSnapshot> {
        const { value: history, status } = await this.cache.resolve<LibraryHistory>(
            'library',
            fingerprint(config.libraryAuthKey),
            {},
            () => this.fetch(config.libraryAuthKey, ctx),
            { empty: EMPTY_HISTORY, ctx }
        );

        const seeds = buildSeeds(history, config.preferLoved, this.maxSeeds);
        ctx.events.emit({ type: 'seeds.collected', count: seeds.length, source: SOURCE_BY_STATUS[status] });
        return { seeds, history, status };
    }

    private fetch(authKey: string, ctx: RequestContext): Promise<LibraryHistory> {
        return ctx.guard('library:history', () => callWithPolicy(
            () => this.library.fetchHistory(authKey),
            this.retryPolicy,
            {
                canContinue: () => !ctx.deadline.expired,
                onRetry: (error, attempt, delayMs) => {
                    ctx.log.debug(`library attempt ${attempt} failed, retrying in ${delayMs}ms`, { error: describeError(error) });
                },
                sleep: this.sleep,
            }
        ));
    }
}
