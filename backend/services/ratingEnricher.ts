import { describeError, UpstreamDegradedError } from '../lib/errors.js';
import type { RequestContext } from '../lib/requestContext.js';
import { callWithPolicy, defaultRetryPolicy, type RetryPolicy } from '../lib/retry.js';
import type { Semaphore } from '../lib/semaphore.js';
import type { DiscoveryCandidate, EnrichedCandidate, RatingLookup } from '../lib/types.js';
import { SHARED_SCOPE, type CacheManager } from './cacheManager.js';
import type { RatingService } from './mdblistClient.js';

const EMPTY_LOOKUP: RatingLookup = { rating: null, canonicalId: null };

export interface RatingEnricherOptions {
    // null when no rating credential is configured: enrichment is skipped.
    service: RatingService | null;
    cache: CacheManager;
    semaphore: Semaphore;
    retryPolicy?: RetryPolicy;
    sleep?: (ms: number) => Promise<void>;
}

function primaryOnly(candidate: DiscoveryCandidate): EnrichedCandidate {
    return { ...candidate, secondaryRating: null, canonicalId: candidate.primaryCanonicalId };
}

/**
 * Attaches secondary ratings and canonical ids. Once a lookup exhausts its
 * retries the request is degraded for the rating service and every later
 * candidate keeps its primary rating and id.
 */
export class RatingEnricher {
    private readonly service: RatingService | null;
    private readonly cache: CacheManager;
    private readonly semaphore: Semaphore;
    private readonly retryPolicy: RetryPolicy;
    private readonly sleep?: (ms: number) => Promise<void>;

    constructor(options: RatingEnricherOptions) {
        this.service = options.service;
        this.cache = options.cache;
        this.semaphore = options.semaphore;
        this.retryPolicy = options.retryPolicy ?? defaultRetryPolicy;
        this.sleep = options.sleep;
    }

    async enrich(candidates: DiscoveryCandidate[], ctx: RequestContext): Promise<EnrichedCandidate[]> {
        return Promise.all(candidates.map(candidate => this.enrichOne(candidate, ctx)));
    }

    private async enrichOne(candidate: DiscoveryCandidate, ctx: RequestContext): Promise<EnrichedCandidate> {
        const service = this.service;
        if (!service || ctx.isDegraded('mdblist')) {
            return primaryOnly(candidate);
        }

        const lookupId = candidate.primaryCanonicalId ?? `tmdb:${candidate.externalId}`;
        const { value, status } = await this.cache.resolve<RatingLookup>(
            'rating',
            SHARED_SCOPE,
            { id: lookupId, mediaType: candidate.mediaType },
            () => this.lookup(service, candidate, ctx),
            { empty: EMPTY_LOOKUP, ctx }
        );

        if ((status === 'stale' || status === 'empty') && !ctx.deadlineHit) {
            this.degrade(candidate, ctx);
        }

        return {
            ...candidate,
            secondaryRating: value.rating,
            canonicalId: value.canonicalId ?? candidate.primaryCanonicalId,
        };
    }

    private lookup(service: RatingService, candidate: DiscoveryCandidate, ctx: RequestContext): Promise<RatingLookup> {
        return ctx.guard('mdblist:rating', () => callWithPolicy(
            () => this.semaphore.run(async () => {
                // Queued behind a lookup that already degraded the request.
                if (ctx.isDegraded('mdblist')) {
                    throw new UpstreamDegradedError('mdblist');
                }
                return service.getRating({
                    externalId: candidate.externalId,
                    mediaType: candidate.mediaType,
                    primaryCanonicalId: candidate.primaryCanonicalId,
                });
            }),
            this.retryPolicy,
            {
                canContinue: () => !ctx.deadline.expired && !ctx.isDegraded('mdblist'),
                onRetry: (error, attempt, delayMs) => {
                    ctx.log.debug(`mdblist attempt ${attempt} for ${candidate.externalId} failed, retrying in ${delayMs}ms`, {
                        error: describeError(error),
                    });
                },
                sleep: this.sleep,
            }
        ));
    }

    private degrade(candidate: DiscoveryCandidate, ctx: RequestContext): void {
        if (ctx.isDegraded('mdblist')) return;
        ctx.markDegraded('mdblist');
        ctx.log.warn(`Rating service degraded at ${candidate.externalId}; using primary ratings for the rest of the request`);
        ctx.events.emit({ type: 'enrichment.degraded', service: 'mdblist', externalId: candidate.externalId });
    }
}
