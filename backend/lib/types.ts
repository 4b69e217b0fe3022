// --- Media Types ---
export type MediaType = 'movie' | 'series';

export const MEDIA_TYPES: readonly MediaType[] = ['movie', 'series'];

// --- User Configuration (validated in validators.ts) ---
export interface UserConfig {
    libraryAuthKey: string;
    tmdbApiKey?: string;
    mdblistApiKey?: string;
    rowCount: number;
    minRating: number;
    includeMovies: boolean;
    includeSeries: boolean;
    preferLoved: boolean;
}

// --- Library History ---
export interface LibraryHistoryItem {
    externalId: string;
    mediaType: MediaType;
    title: string;
    timestamp: number | null; // epoch millis of last watch, null when unknown
}

export interface LibraryHistory {
    watched: LibraryHistoryItem[];
    loved: LibraryHistoryItem[];
}

// --- Seeds ---
export type SeedSource = 'loved' | 'watched';

export interface SeedItem {
    externalId: string;
    mediaType: MediaType;
    title: string;
    source: SeedSource;
    weight: number;
    recencyRank: number; // 0 = most recent
}

// --- Candidates ---
export interface DiscoveryCandidate {
    externalId: string; // metadata-service id
    mediaType: MediaType;
    title: string;
    rawRating: number; // primary rating, 0-10
    voteCount: number;
    // Query keywords that matched it; empty for similar-items results.
    keywordSet: number[];
    popularity: number;
    overview: string | null;
    posterPath: string | null;
    backdropPath: string | null;
    releaseDate: string | null;
    primaryCanonicalId: string | null;
}

export interface EnrichedCandidate extends DiscoveryCandidate {
    secondaryRating: number | null;
    canonicalId: string | null;
}

export interface ScoredCandidate extends EnrichedCandidate {
    canonicalId: string;
    frequency: number;
    normalizedRating: number;
    compositeScore: number;
}

/**
 * Candidates a single seed produced, after enrichment.
 */
export interface SeedContribution {
    seed: SeedItem;
    candidates: EnrichedCandidate[];
}

// --- Produced Interface ---
export interface CatalogItem {
    canonicalId: string;
    mediaType: MediaType;
    title: string;
    poster: string | null;
    background: string | null;
    description: string | null;
    releaseInfo: string | null;
    rating: number;
}

export interface CatalogRow {
    rowId: string;
    title: string;
    mediaType: MediaType;
    seedId: string;
    items: CatalogItem[];
}

// --- Cache ---
export type ArtifactClass = 'library' | 'seed-merge' | 'rating' | 'catalog';

export interface CacheEntry<T> {
    key: string;
    payload: T;
    artifactClass: ArtifactClass;
    insertedAt: number; // epoch millis
    ttl: number; // seconds of freshness
}

// --- Rating Service Payloads ---
export interface RatingLookup {
    rating: number | null;
    canonicalId: string | null;
}
