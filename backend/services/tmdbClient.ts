import { settings } from '../lib/config.js';
import { ConfigError } from '../lib/errors.js';
import { buildUrl, fetchJson, type FetchLike } from '../lib/http.js';
import type { DiscoveryCandidate, MediaType } from '../lib/types.js';

export interface DiscoveryFilter {
    mediaType: MediaType;
    keywordIds: number[];
    minVotes: number;
    maxVotes: number;
    minRating: number;
}

export interface ResolvedItem {
    id: number;
    mediaType: MediaType;
}

/**
 * Metadata/discovery service boundary. Every method throws
 * UpstreamUnavailableError on failure.
 */
export interface DiscoveryService {
    findByExternalId(externalId: string): Promise<ResolvedItem | null>;
    getKeywords(id: number, mediaType: MediaType): Promise<number[]>;
    discover(filter: DiscoveryFilter): Promise<DiscoveryCandidate[]>;
    getSimilar(id: number, mediaType: MediaType): Promise<DiscoveryCandidate[]>;
    getExternalIds(id: number, mediaType: MediaType): Promise<{ imdbId: string | null }>;
}

// --- TMDB payloads ---

interface TMDBItem {
    id: number;
    title?: string;
    name?: string;
    poster_path?: string | null;
    backdrop_path?: string | null;
    release_date?: string;
    first_air_date?: string;
    vote_average?: number;
    vote_count?: number;
    popularity?: number;
    overview?: string;
    imdb_id?: string | null;
    external_ids?: { imdb_id?: string | null };
}

interface TMDBListResponse {
    page: number;
    results: TMDBItem[];
    total_pages: number;
    total_results: number;
}

interface TMDBKeywordsResponse {
    id: number;
    keywords?: { id: number; name: string }[]; // movies
    results?: { id: number; name: string }[]; // tv
}

interface TMDBFindResponse {
    movie_results?: TMDBItem[];
    tv_results?: TMDBItem[];
}

interface TMDBExternalIdsResponse {
    imdb_id?: string | null;
}

function tmdbPath(mediaType: MediaType): 'movie' | 'tv' {
    return mediaType === 'movie' ? 'movie' : 'tv';
}

// `matchedKeywords` are the discover query's keywords, not the title's own.
export function toDiscoveryCandidate(item: TMDBItem, mediaType: MediaType, matchedKeywords: number[] = []): DiscoveryCandidate {
    const imdbId = item.external_ids?.imdb_id ?? item.imdb_id ?? null;
    return {
        externalId: String(item.id),
        mediaType,
        title: item.title || item.name || `${item.id}`,
        rawRating: item.vote_average ?? 0,
        voteCount: item.vote_count ?? 0,
        keywordSet: matchedKeywords,
        popularity: item.popularity ?? 0,
        overview: item.overview || null,
        posterPath: item.poster_path ?? null,
        backdropPath: item.backdrop_path ?? null,
        releaseDate: item.release_date || item.first_air_date || null,
        primaryCanonicalId: imdbId && imdbId.startsWith('tt') ? imdbId : null,
    };
}

export class TmdbClient implements DiscoveryService {
    constructor(
        private readonly apiKey: string | undefined = settings.TMDB_API_KEY,
        private readonly baseUrl: string = settings.TMDB_BASE_URL,
        private readonly fetchImpl?: FetchLike
    ) {}

    withApiKey(apiKey: string | undefined): TmdbClient {
        return new TmdbClient(apiKey ?? this.apiKey, this.baseUrl, this.fetchImpl);
    }

    async findByExternalId(externalId: string): Promise<ResolvedItem | null> {
        if (/^\d+$/.test(externalId)) {
            return null; // already a TMDB id; caller keeps the seed's media type
        }
        const response = await this.request<TMDBFindResponse>(`/find/${encodeURIComponent(externalId)}`, {
            external_source: 'imdb_id',
        });
        const movie = response.movie_results?.[0];
        if (movie) return { id: movie.id, mediaType: 'movie' };
        const show = response.tv_results?.[0];
        if (show) return { id: show.id, mediaType: 'series' };
        return null;
    }

    async getKeywords(id: number, mediaType: MediaType): Promise<number[]> {
        const response = await this.request<TMDBKeywordsResponse>(`/${tmdbPath(mediaType)}/${id}/keywords`);
        const keywords = response.keywords ?? response.results ?? [];
        return keywords.map(keyword => keyword.id);
    }

    /**
     * Niche discovery: mid-popularity, well-rated titles sharing any of the
     * given keywords, best-rated first.
     */
    async discover(filter: DiscoveryFilter): Promise<DiscoveryCandidate[]> {
        const response = await this.request<TMDBListResponse>(`/discover/${tmdbPath(filter.mediaType)}`, {
            with_keywords: filter.keywordIds.join('|'),
            'vote_count.gte': filter.minVotes,
            'vote_count.lte': filter.maxVotes,
            'vote_average.gte': filter.minRating,
            sort_by: 'vote_average.desc',
            page: 1,
        });
        return (response.results || []).map(item => toDiscoveryCandidate(item, filter.mediaType, filter.keywordIds));
    }

    async getSimilar(id: number, mediaType: MediaType): Promise<DiscoveryCandidate[]> {
        const response = await this.request<TMDBListResponse>(`/${tmdbPath(mediaType)}/${id}/recommendations`, { page: 1 });
        return (response.results || []).map(item => toDiscoveryCandidate(item, mediaType));
    }

    async getExternalIds(id: number, mediaType: MediaType): Promise<{ imdbId: string | null }> {
        const response = await this.request<TMDBExternalIdsResponse>(`/${tmdbPath(mediaType)}/${id}/external_ids`);
        return { imdbId: response.imdb_id || null };
    }

    private async request<T>(endpoint: string, params: Record<string, string | number> = {}): Promise<T> {
        if (!this.apiKey) {
            throw new ConfigError('TMDB API key is missing');
        }
        const url = buildUrl(this.baseUrl, endpoint, { api_key: this.apiKey, language: 'en-US', ...params });
        return fetchJson<T>('tmdb', url, { fetchImpl: this.fetchImpl });
    }
}
