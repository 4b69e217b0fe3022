import { describe, expect, it } from 'vitest';
import { makeUserConfig } from '../../services/__tests__/fakes.js';
import { buildCatalogId, buildManifest, toMetaPreview } from '../addonProtocol.js';
import { catalogIdSchema } from '../validators.js';

describe('buildManifest', () => {
    it('lists row slots of enabled media types only', () => {
        const manifest = buildManifest(makeUserConfig({ rowCount: 2, includeMovies: false }), '2.0.0');

        expect(manifest.version).toBe('2.0.0');
        expect(manifest.catalogs.map((catalog) => [catalog.id, catalog.name])).toEqual([
            ['recs_series_0', 'Recommended Series #1'],
            ['recs_series_1', 'Recommended Series #2'],
        ]);
        expect(manifest.behaviorHints).toEqual({ configurable: true, configurationRequired: false, adult: false, p2p: false });
    });

    it('uses catalog ids the id schema accepts', () => {
        expect(catalogIdSchema.parse(buildCatalogId('movie', 4))).toEqual({ mediaType: 'movie', rowIndex: 4 });
    });
});

describe('toMetaPreview', () => {
    it('omits absent fields and formats the rating', () => {
        expect(toMetaPreview({
            canonicalId: 'tt0000001',
            mediaType: 'series',
            title: 'Quiet Show',
            poster: 'https://image.tmdb.org/t/p/w500/q.jpg',
            background: null,
            description: 'Slow and good.',
            releaseInfo: '2015',
            rating: 8,
        })).toEqual({
            id: 'tt0000001',
            type: 'series',
            name: 'Quiet Show',
            posterShape: 'poster',
            poster: 'https://image.tmdb.org/t/p/w500/q.jpg',
            description: 'Slow and good.',
            releaseInfo: '2015',
            imdbRating: '8.0',
        });
    });

    it('leaves out a zero rating', () => {
        const preview = toMetaPreview({
            canonicalId: 'tt0000002',
            mediaType: 'movie',
            title: 'Unrated',
            poster: null,
            background: null,
            description: null,
            releaseInfo: null,
            rating: 0,
        });

        expect(preview.imdbRating).toBeUndefined();
    });
});
