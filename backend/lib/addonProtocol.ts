import { MEDIA_TYPES, type CatalogItem, type MediaType, type UserConfig } from './types.js';

// --- Catalog-client protocol payloads ---

export interface ManifestCatalog {
    type: MediaType;
    id: string;
    name: string;
    extra: Array<Record<string, unknown>>;
}

export interface AddonManifest {
    id: string;
    version: string;
    name: string;
    description: string;
    resources: string[];
    types: MediaType[];
    idPrefixes: string[];
    catalogs: ManifestCatalog[];
    behaviorHints: Record<string, boolean>;
}

export interface MetaPreview {
    id: string;
    type: MediaType;
    name: string;
    posterShape: 'poster';
    poster?: string;
    background?: string;
    description?: string;
    releaseInfo?: string;
    imdbRating?: string;
}

// Catalog ids look like "recs_movie_0": prefix, media type, row index.
export function buildCatalogId(mediaType: MediaType, rowIndex: number): string {
    return `recs_${mediaType}_${rowIndex}`;
}

const CATALOG_LABELS: Record<MediaType, string> = {
    movie: 'Recommended Movies',
    series: 'Recommended Series',
};

/**
 * One catalog per row slot and enabled media type. Row titles depend on
 * history, so slots carry generic names.
 */
export function buildManifest(config: UserConfig, version: string): AddonManifest {
    const catalogs: ManifestCatalog[] = [];
    for (const mediaType of MEDIA_TYPES) {
        const enabled = mediaType === 'movie' ? config.includeMovies : config.includeSeries;
        if (!enabled) continue;
        for (let index = 0; index < config.rowCount; index += 1) {
            catalogs.push({
                type: mediaType,
                id: buildCatalogId(mediaType, index),
                name: `${CATALOG_LABELS[mediaType]} #${index + 1}`,
                extra: [],
            });
        }
    }

    return {
        id: 'org.recsrows.recommendations',
        version,
        name: 'Recommendation Rows',
        description: 'Personalized rows built from your watch history and loved items',
        resources: ['catalog'],
        types: [...MEDIA_TYPES],
        idPrefixes: ['tt'],
        catalogs,
        behaviorHints: { configurable: true, configurationRequired: false, adult: false, p2p: false },
    };
}

export function toMetaPreview(item: CatalogItem): MetaPreview {
    return {
        id: item.canonicalId,
        type: item.mediaType,
        name: item.title,
        posterShape: 'poster',
        poster: item.poster ?? undefined,
        background: item.background ?? undefined,
        description: item.description ?? undefined,
        releaseInfo: item.releaseInfo ?? undefined,
        imdbRating: item.rating > 0 ? item.rating.toFixed(1) : undefined,
    };
}
