import { buildCatalogId } from '../lib/addonProtocol.js';
import { settings } from '../lib/config.js';
import { ConfigError, UpstreamDegradedError, type UpstreamService } from '../lib/errors.js';
import type { EventSink } from '../lib/logger.js';
import { Deadline, RequestContext } from '../lib/requestContext.js';
import { defaultRetryPolicy, type RetryPolicy } from '../lib/retry.js';
import { Semaphore } from '../lib/semaphore.js';
import type {
    CatalogItem,
    CatalogRow,
    EnrichedCandidate,
    MediaType,
    ScoredCandidate,
    SeedContribution,
    SeedItem,
    UserConfig,
} from '../lib/types.js';
import { fingerprint, SHARED_SCOPE, type CacheManager, type CacheMetrics, type CacheParams } from './cacheManager.js';
import { defaultNicheFilters, DiscoveryClient, type NicheFilters } from './discoveryClient.js';
import type { LibraryService } from './libraryClient.js';
import type { RatingService } from './mdblistClient.js';
import { RatingEnricher } from './ratingEnricher.js';
import { applyCanonicalGate, defaultScoringOptions, scoreRow, type ScoringOptions } from './scorer.js';
import { SeedCollector } from './seedCollector.js';
import type { DiscoveryService } from './tmdbClient.js';

const TMDB_IMAGE_BASE = 'https://image.tmdb.org/t/p';

export type UpstreamSemaphores = Record<UpstreamService, Semaphore>;

export function createUpstreamSemaphores(limit: number = settings.MAX_CONCURRENT_API_CALLS): UpstreamSemaphores {
    return {
        library: new Semaphore(limit),
        tmdb: new Semaphore(limit),
        mdblist: new Semaphore(limit),
    };
}

export interface RecommendationServiceDeps {
    cache: CacheManager;
    library: LibraryService;
    // Throws ConfigError when the config carries no usable metadata credential.
    discoveryFor: (config: UserConfig) => DiscoveryService;
    ratingsFor: (config: UserConfig) => RatingService | null;
    semaphores?: UpstreamSemaphores;
    retryPolicy?: RetryPolicy;
    sleep?: (ms: number) => Promise<void>;
    filters?: NicheFilters;
    scoring?: Partial<Omit<ScoringOptions, 'minRating' | 'exclude'>>;
    maxSeeds?: number;
    maxCandidatesPerSeed?: number;
    deadlineMs?: number;
    events?: EventSink;
}

export interface RowsOptions {
    ctx?: RequestContext;
    forceRefresh?: boolean;
}

// ============================================================================
// ROW HELPERS
// ============================================================================

export function buildRowTitle(seed: SeedItem): string {
    return seed.source === 'loved' ? `Because you loved ${seed.title}` : `Because you watched ${seed.title}`;
}

export function isMediaTypeEnabled(config: UserConfig, mediaType: MediaType): boolean {
    return mediaType === 'movie' ? config.includeMovies : config.includeSeries;
}

export function toCatalogItem(candidate: ScoredCandidate): CatalogItem {
    return {
        canonicalId: candidate.canonicalId,
        mediaType: candidate.mediaType,
        title: candidate.title,
        poster: candidate.posterPath ? `${TMDB_IMAGE_BASE}/w500${candidate.posterPath}` : null,
        background: candidate.backdropPath ? `${TMDB_IMAGE_BASE}/original${candidate.backdropPath}` : null,
        description: candidate.overview,
        releaseInfo: candidate.releaseDate ? candidate.releaseDate.slice(0, 4) : null,
        rating: Math.round(candidate.normalizedRating * 10) / 10,
    };
}

// Everything in the config that changes the catalog, minus the credentials.
function catalogParams(config: UserConfig, mediaType: MediaType, withRatings: boolean): CacheParams {
    return {
        mediaType,
        rowCount: config.rowCount,
        minRating: config.minRating,
        preferLoved: config.preferLoved,
        ratings: withRatings,
    };
}

// ============================================================================
// CATALOG ASSEMBLER
// ============================================================================

/**
 * Top-level pipeline: seeds, per-seed discovery and enrichment, gate,
 * scoring and rows, with the cache manager at every stage boundary.
 */
export class RecommendationService {
    private readonly deps: RecommendationServiceDeps;
    private readonly semaphores: UpstreamSemaphores;
    private readonly retryPolicy: RetryPolicy;
    private readonly seedCollector: SeedCollector;

    constructor(deps: RecommendationServiceDeps) {
        this.deps = deps;
        this.semaphores = deps.semaphores ?? createUpstreamSemaphores();
        this.retryPolicy = deps.retryPolicy ?? defaultRetryPolicy;
        this.seedCollector = new SeedCollector({
            library: deps.library,
            cache: deps.cache,
            maxSeeds: deps.maxSeeds,
            retryPolicy: this.retryPolicy,
            sleep: deps.sleep,
        });
    }

    private createDeadline(): Deadline {
        return Deadline.after(this.deps.deadlineMs ?? settings.REQUEST_DEADLINE_MS);
    }

    createContext(deadline: Deadline = this.createDeadline()): RequestContext {
        return new RequestContext({ deadline, events: this.deps.events });
    }

    /**
     * Ordered rows for one media type. Only a ConfigError escapes; upstream
     * trouble yields fewer or older rows. A library outage with nothing
     * cached yields no rows and stores nothing.
     */
    async getRows(config: UserConfig, mediaType: MediaType, options: RowsOptions = {}): Promise<CatalogRow[]> {
        if (!isMediaTypeEnabled(config, mediaType)) {
            return [];
        }

        const discovery = this.deps.discoveryFor(config);
        const ctx = options.ctx ?? this.createContext();
        const { cache } = this.deps;

        const { value } = await cache.resolve<CatalogRow[]>(
            'catalog',
            fingerprint(config.libraryAuthKey),
            catalogParams(config, mediaType, this.deps.ratingsFor(config) !== null),
            () => this.buildRows(config, mediaType, discovery, ctx),
            {
                empty: [],
                ctx,
                ttl: () => (ctx.degraded ? cache.degradedTtl : cache.ttls.catalog),
                storable: () => !ctx.deadlineHit,
                forceRefresh: options.forceRefresh,
            }
        );
        return value;
    }

    /**
     * Both media types under one deadline. Each type keeps its own
     * degradation flags, so trouble in one does not shorten the other's TTL.
     */
    async getCatalog(config: UserConfig): Promise<Record<MediaType, CatalogRow[]>> {
        const deadline = this.createDeadline();
        const [movie, series] = await Promise.all([
            this.getRows(config, 'movie', { ctx: this.createContext(deadline) }),
            this.getRows(config, 'series', { ctx: this.createContext(deadline) }),
        ]);
        return { movie, series };
    }

    async getRow(config: UserConfig, mediaType: MediaType, rowIndex: number): Promise<CatalogRow | null> {
        const rows = await this.getRows(config, mediaType);
        return rows[rowIndex] ?? null;
    }

    /**
     * Remaining fresh time of a user's cached catalog, or null when none is
     * cached.
     */
    async catalogFreshness(config: UserConfig, mediaType: MediaType): Promise<number | null> {
        const params = catalogParams(config, mediaType, this.deps.ratingsFor(config) !== null);
        const entry = await this.deps.cache.inspect('catalog', fingerprint(config.libraryAuthKey), params);
        return entry ? entry.freshForMs : null;
    }

    async invalidateUser(config: UserConfig): Promise<number> {
        return this.deps.cache.invalidate(fingerprint(config.libraryAuthKey));
    }

    getCacheMetrics(): CacheMetrics {
        return this.deps.cache.getMetricsSnapshot();
    }

    private async buildRows(
        config: UserConfig,
        mediaType: MediaType,
        discovery: DiscoveryService,
        ctx: RequestContext
    ): Promise<CatalogRow[]> {
        const { seeds, history, status } = await this.seedCollector.collect(config, ctx);
        if (status === 'empty') {
            // Library down with no snapshot: the stored catalog, if any, stays.
            throw new UpstreamDegradedError('library');
        }
        if (status === 'stale' && !ctx.deadlineHit) {
            ctx.markDegraded('library');
        }
        const typeSeeds = seeds.filter(seed => seed.mediaType === mediaType);
        if (typeSeeds.length === 0) {
            ctx.log.info(`No ${mediaType} seeds for this user`);
            return [];
        }

        const ratings = this.deps.ratingsFor(config);
        const discoveryClient = new DiscoveryClient({
            service: discovery,
            semaphore: this.semaphores.tmdb,
            retryPolicy: this.retryPolicy,
            filters: this.deps.filters ?? defaultNicheFilters,
            maxCandidates: this.deps.maxCandidatesPerSeed,
            sleep: this.deps.sleep,
        });
        const enricher = new RatingEnricher({
            service: ratings,
            cache: this.deps.cache,
            semaphore: this.semaphores.mdblist,
            retryPolicy: this.retryPolicy,
            sleep: this.deps.sleep,
        });

        const contributions = await Promise.all(typeSeeds.map(async (seed): Promise<SeedContribution> => ({
            seed,
            candidates: await this.resolveSeed(seed, discoveryClient, enricher, ratings !== null, ctx),
        })));
        const gated = contributions.map(contribution => applyCanonicalGate(contribution, ctx.events, ctx.log));

        const scoring: ScoringOptions = {
            ...defaultScoringOptions,
            ...this.deps.scoring,
            minRating: config.minRating,
            exclude: new Set(history.watched.map(item => item.externalId)),
        };

        const rows: CatalogRow[] = [];
        for (const contribution of gated) {
            if (rows.length >= config.rowCount) break;
            const items = scoreRow(contribution, gated, scoring).map(toCatalogItem);
            if (items.length === 0) continue;
            rows.push({
                rowId: buildCatalogId(mediaType, rows.length),
                title: buildRowTitle(contribution.seed),
                mediaType,
                seedId: contribution.seed.externalId,
                items,
            });
        }

        ctx.log.info(`Built ${rows.length} ${mediaType} rows from ${typeSeeds.length} seeds`);
        return rows;
    }

    /**
     * Discovery plus enrichment for one seed, cached across users. A seed
     * whose discovery failed is not stored and marks the request degraded.
     */
    private async resolveSeed(
        seed: SeedItem,
        discoveryClient: DiscoveryClient,
        enricher: RatingEnricher,
        withRatings: boolean,
        ctx: RequestContext
    ): Promise<EnrichedCandidate[]> {
        const { cache } = this.deps;
        const { value, status } = await cache.resolve<EnrichedCandidate[]>(
            'seed-merge',
            SHARED_SCOPE,
            { seedId: seed.externalId, mediaType: seed.mediaType, ratings: withRatings },
            async () => {
                const outcome = await discoveryClient.discover(seed, ctx);
                if (outcome.strategy === 'failed') {
                    throw new UpstreamDegradedError('tmdb');
                }
                return enricher.enrich(outcome.candidates, ctx);
            },
            {
                empty: [],
                ctx,
                ttl: () => (ctx.degraded ? cache.degradedTtl : cache.ttls['seed-merge']),
                storable: () => !ctx.deadlineHit,
            }
        );

        if ((status === 'empty' || status === 'stale') && !ctx.deadlineHit) {
            ctx.markDegraded('tmdb');
        }
        return value;
    }
}

// ============================================================================
// WIRING
// ============================================================================

export interface UpstreamFactories {
    discoveryFor: RecommendationServiceDeps['discoveryFor'];
    ratingsFor: RecommendationServiceDeps['ratingsFor'];
}

/**
 * Per-config service instances over server-wide defaults: a key in the
 * user's config wins over the server's.
 */
export function createUpstreamFactories(
    createDiscovery: (apiKey: string) => DiscoveryService,
    createRatings: (apiKey: string) => RatingService,
    serverKeys: { tmdbApiKey?: string; mdblistApiKey?: string } = {
        tmdbApiKey: settings.TMDB_API_KEY,
        mdblistApiKey: settings.MDBLIST_API_KEY,
    }
): UpstreamFactories {
    return {
        discoveryFor: (config) => {
            const apiKey = config.tmdbApiKey ?? serverKeys.tmdbApiKey;
            if (!apiKey) {
                throw new ConfigError('tmdbApiKey: a metadata API key is required');
            }
            return createDiscovery(apiKey);
        },
        ratingsFor: (config) => {
            const apiKey = config.mdblistApiKey ?? serverKeys.mdblistApiKey;
            return apiKey ? createRatings(apiKey) : null;
        },
    };
}
