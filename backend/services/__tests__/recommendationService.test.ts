import { beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, UpstreamUnavailableError } from '../../lib/errors.js';
import { Deadline, RequestContext } from '../../lib/requestContext.js';
import type { CatalogRow, LibraryHistory } from '../../lib/types.js';
import type { CacheManager } from '../cacheManager.js';
import {
    buildRowTitle,
    createUpstreamFactories,
    RecommendationService,
    toCatalogItem,
} from '../recommendationService.js';
import {
    fastRetryPolicy,
    FakeDiscovery,
    FakeLibrary,
    FakeRatings,
    makeCacheManager,
    makeCandidate,
    makeContext,
    makeHistoryItem,
    makeSeed,
    makeUserConfig,
    noSleep,
    RecordingEventSink,
    silentLogger,
} from './fakes.js';

const NOW = 1_700_000_000_000;

const history: LibraryHistory = {
    watched: [
        makeHistoryItem({ externalId: 'tt0000010', title: 'Seed Two', timestamp: 100 }),
        makeHistoryItem({ externalId: 'tt0000020', title: 'Show Seed', mediaType: 'series', timestamp: 50 }),
    ],
    loved: [
        makeHistoryItem({ externalId: 'tt0133093', title: 'The Matrix', timestamp: 200 }),
    ],
};

const alpha = makeCandidate({
    externalId: '101',
    title: 'Alpha',
    rawRating: 8,
    primaryCanonicalId: 'tt1000001',
    posterPath: '/alpha.jpg',
    releaseDate: '1999-03-31',
});
const bravo = makeCandidate({ externalId: '102', title: 'Bravo', rawRating: 7.5, primaryCanonicalId: 'tt1000002' });
const charlie = makeCandidate({ externalId: '103', title: 'Charlie', rawRating: 9, primaryCanonicalId: null });
const seriesOne = makeCandidate({
    externalId: '201',
    mediaType: 'series',
    title: 'Series One',
    rawRating: 7.2,
    primaryCanonicalId: 'tt2000001',
});

const baselineMovieRows: CatalogRow[] = [
    {
        rowId: 'recs_movie_0',
        title: 'Because you loved The Matrix',
        mediaType: 'movie',
        seedId: 'tt0133093',
        items: [
            {
                canonicalId: 'tt1000001',
                mediaType: 'movie',
                title: 'Alpha',
                poster: 'https://image.tmdb.org/t/p/w500/alpha.jpg',
                background: null,
                description: null,
                releaseInfo: '1999',
                rating: 8,
            },
            {
                canonicalId: 'tt1000002',
                mediaType: 'movie',
                title: 'Bravo',
                poster: null,
                background: null,
                description: null,
                releaseInfo: null,
                rating: 7.5,
            },
        ],
    },
    {
        rowId: 'recs_movie_1',
        title: 'Because you watched Seed Two',
        mediaType: 'movie',
        seedId: 'tt0000010',
        items: [
            {
                canonicalId: 'tt1000001',
                mediaType: 'movie',
                title: 'Alpha',
                poster: 'https://image.tmdb.org/t/p/w500/alpha.jpg',
                background: null,
                description: null,
                releaseInfo: '1999',
                rating: 8,
            },
        ],
    },
];

describe('row helpers', () => {
    it('titles rows after the seed', () => {
        expect(buildRowTitle(makeSeed({ title: 'Heat', source: 'loved' }))).toBe('Because you loved Heat');
        expect(buildRowTitle(makeSeed({ title: 'Heat' }))).toBe('Because you watched Heat');
    });

    it('rounds the displayed rating', () => {
        const item = toCatalogItem({
            ...makeCandidate({ backdropPath: '/b.jpg' }),
            secondaryRating: 7.26,
            canonicalId: 'tt0000001',
            frequency: 1,
            normalizedRating: 7.26,
            compositeScore: 8.26,
        });

        expect(item.rating).toBe(7.3);
        expect(item.background).toBe('https://image.tmdb.org/t/p/original/b.jpg');
    });
});

describe('createUpstreamFactories', () => {
    it('prefers the user key and falls back to the server key', () => {
        const seen: string[] = [];
        const factories = createUpstreamFactories(
            (apiKey) => {
                seen.push(apiKey);
                return new FakeDiscovery();
            },
            () => new FakeRatings(),
            { tmdbApiKey: 'server-tmdb-key' }
        );

        factories.discoveryFor(makeUserConfig({ tmdbApiKey: 'user-tmdb-key' }));
        factories.discoveryFor(makeUserConfig({ tmdbApiKey: undefined }));

        expect(seen).toEqual(['user-tmdb-key', 'server-tmdb-key']);
        expect(factories.ratingsFor(makeUserConfig())).toBeNull();
        expect(factories.ratingsFor(makeUserConfig({ mdblistApiKey: 'test-mdb-key' }))).toBeInstanceOf(FakeRatings);
    });

    it('requires a metadata key somewhere', () => {
        const factories = createUpstreamFactories(() => new FakeDiscovery(), () => new FakeRatings(), {});

        expect(() => factories.discoveryFor(makeUserConfig({ tmdbApiKey: undefined }))).toThrow(ConfigError);
    });
});

describe('RecommendationService', () => {
    let library: FakeLibrary;
    let discovery: FakeDiscovery;
    let ratings: FakeRatings;
    let cache: CacheManager;
    let service: RecommendationService;

    function serviceOver(cacheManager: CacheManager): RecommendationService {
        return new RecommendationService({
            cache: cacheManager,
            library,
            ...createUpstreamFactories(() => discovery, () => ratings, {}),
            retryPolicy: fastRetryPolicy,
            sleep: noSleep,
        });
    }

    beforeEach(() => {
        library = new FakeLibrary(history);
        discovery = new FakeDiscovery();
        discovery.resolved.set('tt0133093', { id: 603, mediaType: 'movie' });
        discovery.resolved.set('tt0000010', { id: 10, mediaType: 'movie' });
        discovery.resolved.set('tt0000020', { id: 20, mediaType: 'series' });
        discovery.keywords.set(603, [1]);
        discovery.keywords.set(10, [2]);
        discovery.nicheByKeyword.set(1, [alpha, bravo]);
        discovery.nicheByKeyword.set(2, [alpha, charlie]);
        discovery.similar.set(20, [seriesOne]);

        ratings = new FakeRatings();
        cache = makeCacheManager(() => NOW, { degradedTtl: 900 });
        service = serviceOver(cache);
    });

    it('builds one row per seed, ranked by agreement and rating', async () => {
        const events = new RecordingEventSink();

        const rows = await service.getRows(makeUserConfig(), 'movie', { ctx: makeContext(events) });

        expect(rows).toEqual(baselineMovieRows);
        expect(events.ofType('candidate.dropped')).toEqual([
            { type: 'candidate.dropped', seedId: 'tt0000010', count: 1, reason: 'missing_canonical_id' },
        ]);
    });

    it('builds series rows from the similar-items fallback', async () => {
        const { series } = await service.getCatalog(makeUserConfig());

        expect(series).toHaveLength(1);
        expect(series[0]?.title).toBe('Because you watched Show Seed');
        expect(series[0]?.rowId).toBe('recs_series_0');
        expect(series[0]?.items.map((item) => [item.canonicalId, item.rating])).toEqual([['tt2000001', 7.2]]);
        expect(library.fetchHistory).toHaveBeenCalledTimes(1);
    });

    it('serves the second request from cache', async () => {
        const config = makeUserConfig();

        await service.getRows(config, 'movie');
        const again = await service.getRows(config, 'movie');

        expect(again).toEqual(baselineMovieRows);
        expect(library.fetchHistory).toHaveBeenCalledTimes(1);
        expect(discovery.getKeywords).toHaveBeenCalledTimes(2);
        await expect(service.catalogFreshness(config, 'movie')).resolves.toBe(3_600_000);
    });

    it('shares one computation between concurrent requests', async () => {
        const config = makeUserConfig();

        const [first, second] = await Promise.all([
            service.getRows(config, 'movie'),
            service.getRows(config, 'movie'),
        ]);

        expect(first).toEqual(second);
        expect(library.fetchHistory).toHaveBeenCalledTimes(1);
    });

    it('stops at the configured row count', async () => {
        const rows = await service.getRows(makeUserConfig({ rowCount: 1 }), 'movie');

        expect(rows.map((row) => row.rowId)).toEqual(['recs_movie_0']);
    });

    it('skips disabled media types without touching upstreams', async () => {
        const rows = await service.getRows(makeUserConfig({ includeMovies: false }), 'movie');

        expect(rows).toEqual([]);
        expect(library.fetchHistory).not.toHaveBeenCalled();
    });

    it('rejects configs without a metadata key', async () => {
        await expect(service.getRows(makeUserConfig({ tmdbApiKey: undefined }), 'movie')).rejects.toBeInstanceOf(ConfigError);
    });

    it('falls back to primary ratings and a short TTL when ratings fail', async () => {
        ratings.getRating.mockRejectedValue(new UpstreamUnavailableError('mdblist', 503));
        const config = makeUserConfig({ mdblistApiKey: 'test-mdb-key' });
        const ctx = makeContext();

        const rows = await service.getRows(config, 'movie', { ctx });

        expect(rows).toEqual(baselineMovieRows);
        expect(ctx.isDegraded('mdblist')).toBe(true);
        await expect(service.catalogFreshness(config, 'movie')).resolves.toBe(900_000);
    });

    it('uses the secondary rating when the lookup succeeds', async () => {
        ratings.ratings.set('tt1000002', 9.5);

        const rows = await service.getRows(makeUserConfig({ mdblistApiKey: 'test-mdb-key' }), 'movie');

        // Bravo: 2 + 9.5 beats Alpha: 3 + 8.
        expect(rows[0]?.items.map((item) => [item.canonicalId, item.rating])).toEqual([
            ['tt1000002', 9.5],
            ['tt1000001', 8],
        ]);
    });

    it('omits the row of a seed whose discovery failed', async () => {
        discovery.getKeywords.mockImplementation(async (id: number) => {
            if (id === 10) throw new UpstreamUnavailableError('tmdb', 503);
            return discovery.keywords.get(id) ?? [];
        });
        const config = makeUserConfig();
        const ctx = makeContext();

        const rows = await service.getRows(config, 'movie', { ctx });

        expect(rows).toHaveLength(1);
        expect(rows[0]?.items.map((item) => item.canonicalId)).toEqual(['tt1000001', 'tt1000002']);
        expect(ctx.isDegraded('tmdb')).toBe(true);
        await expect(service.catalogFreshness(config, 'movie')).resolves.toBe(900_000);
    });

    it('computes a shared seed for itself when the request it waited on ran out of time', async () => {
        let markStarted = () => {};
        const started = new Promise<void>((resolve) => {
            markStarted = () => resolve();
        });
        discovery.getKeywords.mockImplementation(async (id: number) => {
            markStarted();
            await new Promise((resolve) => setTimeout(resolve, 60));
            return discovery.keywords.get(id) ?? [];
        });
        const hurried = new RequestContext({ reqId: 'a', deadline: Deadline.after(30), events: new RecordingEventSink(), log: silentLogger });
        const patient = makeContext();
        const patientConfig = makeUserConfig({ libraryAuthKey: 'test-secret-b' });

        const first = service.getRows(makeUserConfig({ libraryAuthKey: 'test-secret-a' }), 'movie', { ctx: hurried });
        await started;
        const second = service.getRows(patientConfig, 'movie', { ctx: patient });

        await expect(first).resolves.toEqual([]);
        await expect(second).resolves.toEqual(baselineMovieRows);
        expect(hurried.deadlineHit).toBe(true);
        expect(patient.degraded).toBe(false);
        await expect(service.catalogFreshness(patientConfig, 'movie')).resolves.toBe(3_600_000);
    });

    it('caches nothing while the library is down with no snapshot', async () => {
        library.fetchHistory.mockRejectedValue(new UpstreamUnavailableError('library', 503));
        const config = makeUserConfig();

        await expect(service.getRows(config, 'movie')).resolves.toEqual([]);
        await expect(service.catalogFreshness(config, 'movie')).resolves.toBeNull();

        library.fetchHistory.mockImplementation(async () => history);

        await expect(service.getRows(config, 'movie')).resolves.toEqual(baselineMovieRows);
        await expect(service.catalogFreshness(config, 'movie')).resolves.toBe(3_600_000);
    });

    it('keeps the stored catalog when a refresh finds the library down and its snapshot gone', async () => {
        let now = NOW;
        const clocked = serviceOver(makeCacheManager(() => now, { ttls: { library: 60 }, staleGraceSeconds: 0 }));
        const config = makeUserConfig();
        await clocked.getRows(config, 'movie');

        now = NOW + 120_000;
        library.fetchHistory.mockRejectedValue(new UpstreamUnavailableError('library', 503));
        const rows = await clocked.getRows(config, 'movie', { forceRefresh: true });

        expect(rows).toEqual(baselineMovieRows);
        expect(library.fetchHistory).toHaveBeenCalledTimes(4);
        await expect(clocked.catalogFreshness(config, 'movie')).resolves.toBe(3_480_000);
    });

    it('rebuilds from a stale library snapshot with the degraded ttl', async () => {
        let now = NOW;
        const clocked = serviceOver(makeCacheManager(() => now, { degradedTtl: 900 }));
        const config = makeUserConfig();
        await clocked.getRows(config, 'movie');

        now = NOW + 7 * 3_600_000;
        library.fetchHistory.mockRejectedValue(new UpstreamUnavailableError('library', 503));
        const ctx = makeContext();
        const rows = await clocked.getRows(config, 'movie', { ctx });

        expect(rows).toEqual(baselineMovieRows);
        expect(ctx.isDegraded('library')).toBe(true);
        await expect(clocked.catalogFreshness(config, 'movie')).resolves.toBe(900_000);
    });

    it('keeps the degradation of one media type out of the other', async () => {
        discovery.getSimilar.mockRejectedValue(new UpstreamUnavailableError('tmdb', 503));
        const config = makeUserConfig();

        const { movie, series } = await service.getCatalog(config);

        expect(movie).toEqual(baselineMovieRows);
        expect(series).toEqual([]);
        await expect(service.catalogFreshness(config, 'movie')).resolves.toBe(3_600_000);
        await expect(service.catalogFreshness(config, 'series')).resolves.toBe(900_000);
    });

    it('drops the user cache on invalidation', async () => {
        const config = makeUserConfig();
        await service.getRows(config, 'movie');

        await expect(service.invalidateUser(config)).resolves.toBe(2);
        await service.getRows(config, 'movie');

        expect(library.fetchHistory).toHaveBeenCalledTimes(2);
        expect(service.getCacheMetrics().hits).toBeGreaterThan(0);
    });

    it('returns a single row or null', async () => {
        const config = makeUserConfig();

        await expect(service.getRow(config, 'movie', 1)).resolves.toEqual(baselineMovieRows[1]);
        await expect(service.getRow(config, 'movie', 5)).resolves.toBeNull();
    });
});
