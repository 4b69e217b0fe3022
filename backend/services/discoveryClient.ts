import { settings } from '../lib/config.js';
import { describeError } from '../lib/errors.js';
import type { RequestContext } from '../lib/requestContext.js';
import { callWithPolicy, defaultRetryPolicy, type RetryPolicy } from '../lib/retry.js';
import type { Semaphore } from '../lib/semaphore.js';
import type { DiscoveryCandidate, SeedItem } from '../lib/types.js';
import type { DiscoveryService, ResolvedItem } from './tmdbClient.js';

export type DiscoveryStrategy = 'niche' | 'similar' | 'unresolved' | 'failed';

export interface DiscoveryOutcome {
    seed: SeedItem;
    candidates: DiscoveryCandidate[];
    strategy: DiscoveryStrategy;
}

export interface NicheFilters {
    minVotes: number;
    maxVotes: number;
    minRating: number;
    maxKeywords: number;
}

export const defaultNicheFilters: NicheFilters = {
    minVotes: settings.DISCOVERY_MIN_VOTES,
    maxVotes: settings.DISCOVERY_MAX_VOTES,
    minRating: settings.DISCOVERY_MIN_RATING,
    maxKeywords: settings.DISCOVERY_MAX_KEYWORDS,
};

export interface DiscoveryClientOptions {
    service: DiscoveryService;
    semaphore: Semaphore;
    retryPolicy?: RetryPolicy;
    filters?: NicheFilters;
    maxCandidates?: number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Finds candidates similar to one seed. Keyword-driven niche discovery
 * first, the generic similar-items list when the seed has no keywords or
 * the niche query comes back empty. Never throws: a seed whose calls
 * exhaust their retries yields an empty, `failed` outcome.
 */
export class DiscoveryClient {
    private readonly service: DiscoveryService;
    private readonly semaphore: Semaphore;
    private readonly retryPolicy: RetryPolicy;
    private readonly filters: NicheFilters;
    private readonly maxCandidates: number;
    private readonly sleep?: (ms: number) => Promise<void>;

    constructor(options: DiscoveryClientOptions) {
        this.service = options.service;
        this.semaphore = options.semaphore;
        this.retryPolicy = options.retryPolicy ?? defaultRetryPolicy;
        this.filters = options.filters ?? defaultNicheFilters;
        this.maxCandidates = options.maxCandidates ?? settings.MAX_CANDIDATES_PER_SEED;
        this.sleep = options.sleep;
    }

    async discover(seed: SeedItem, ctx: RequestContext): Promise<DiscoveryOutcome> {
        try {
            const resolved = await this.resolveSeed(seed, ctx);
            if (!resolved) {
                ctx.log.debug(`Seed ${seed.externalId} has no metadata entry`);
                return this.finish(seed, [], 'unresolved', ctx);
            }

            const keywords = (await this.call('keywords', ctx, () => this.service.getKeywords(resolved.id, resolved.mediaType)))
                .slice(0, this.filters.maxKeywords);

            let strategy: DiscoveryStrategy = 'niche';
            let candidates: DiscoveryCandidate[] = [];

            if (keywords.length === 0) {
                ctx.events.emit({ type: 'discovery.fallback', seedId: seed.externalId, reason: 'no_keywords' });
            } else {
                candidates = await this.call('discover', ctx, () => this.service.discover({
                    mediaType: resolved.mediaType,
                    keywordIds: keywords,
                    minVotes: this.filters.minVotes,
                    maxVotes: this.filters.maxVotes,
                    minRating: this.filters.minRating,
                }));
                if (candidates.length === 0) {
                    ctx.events.emit({ type: 'discovery.fallback', seedId: seed.externalId, reason: 'no_results' });
                }
            }

            if (candidates.length === 0) {
                strategy = 'similar';
                candidates = await this.call('similar', ctx, () => this.service.getSimilar(resolved.id, resolved.mediaType));
            }

            const trimmed = this.trim(candidates, resolved);
            const withIds = await this.attachCanonicalIds(trimmed, ctx);
            return this.finish(seed, withIds, strategy, ctx);
        } catch (error) {
            ctx.log.warn(`Discovery failed for seed ${seed.externalId}`, { error: describeError(error) });
            return this.finish(seed, [], 'failed', ctx);
        }
    }

    private async resolveSeed(seed: SeedItem, ctx: RequestContext): Promise<ResolvedItem | null> {
        if (/^\d+$/.test(seed.externalId)) {
            return { id: Number.parseInt(seed.externalId, 10), mediaType: seed.mediaType };
        }
        return this.call('find', ctx, () => this.service.findByExternalId(seed.externalId));
    }

    // Drops the seed itself and repeats, then caps the list.
    private trim(candidates: DiscoveryCandidate[], resolved: ResolvedItem): DiscoveryCandidate[] {
        const seen = new Set<string>([String(resolved.id)]);
        const result: DiscoveryCandidate[] = [];
        for (const candidate of candidates) {
            if (seen.has(candidate.externalId)) continue;
            seen.add(candidate.externalId);
            result.push(candidate);
            if (result.length >= this.maxCandidates) break;
        }
        return result;
    }

    /**
     * Fill in the primary canonical id from the metadata service where the
     * list payload lacked one. A failed lookup leaves the id empty.
     */
    private async attachCanonicalIds(candidates: DiscoveryCandidate[], ctx: RequestContext): Promise<DiscoveryCandidate[]> {
        return Promise.all(candidates.map(async (candidate) => {
            if (candidate.primaryCanonicalId) return candidate;
            try {
                const { imdbId } = await this.call('external_ids', ctx, () =>
                    this.service.getExternalIds(Number.parseInt(candidate.externalId, 10), candidate.mediaType));
                return { ...candidate, primaryCanonicalId: imdbId };
            } catch (error) {
                ctx.log.debug(`No external ids for ${candidate.externalId}`, { error: describeError(error) });
                return candidate;
            }
        }));
    }

    private finish(seed: SeedItem, candidates: DiscoveryCandidate[], strategy: DiscoveryStrategy, ctx: RequestContext): DiscoveryOutcome {
        ctx.events.emit({
            type: 'discovery.result',
            seedId: seed.externalId,
            mediaType: seed.mediaType,
            count: candidates.length,
            strategy,
        });
        return { seed, candidates, strategy };
    }

    private call<T>(stage: string, ctx: RequestContext, fn: () => Promise<T>): Promise<T> {
        return ctx.guard(`tmdb:${stage}`, () => callWithPolicy(
            () => this.semaphore.run(fn),
            this.retryPolicy,
            {
                canContinue: () => !ctx.deadline.expired,
                onRetry: (error, attempt, delayMs) => {
                    ctx.log.debug(`tmdb ${stage} attempt ${attempt} failed, retrying in ${delayMs}ms`, { error: describeError(error) });
                },
                sleep: this.sleep,
            }
        ));
    }
}
