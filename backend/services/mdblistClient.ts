import { settings } from '../lib/config.js';
import { buildUrl, fetchJson, type FetchLike } from '../lib/http.js';
import type { MediaType, RatingLookup } from '../lib/types.js';

export interface RatingQuery {
    externalId: string; // metadata-service id
    mediaType: MediaType;
    primaryCanonicalId: string | null;
}

/**
 * Secondary rating service boundary. Throws UpstreamUnavailableError on
 * failure; an unknown title is a normal empty lookup, not an error.
 */
export interface RatingService {
    getRating(query: RatingQuery): Promise<RatingLookup>;
}

interface MDBListResponse {
    response?: boolean;
    title?: string;
    imdbid?: string | null;
    score?: number | string | null; // 0-100
    imdbrating?: number | string | null; // 0-10
    tomatoesrating?: number | string | null; // 0-100
    metacriticrating?: number | string | null; // 0-100
}

// Order of preference, with the divisor bringing each field onto 0-10.
const RATING_FIELDS: Array<[keyof MDBListResponse, number]> = [
    ['score', 10],
    ['imdbrating', 1],
    ['tomatoesrating', 10],
    ['metacriticrating', 10],
];

/**
 * First usable rating on a 0-10 scale, or null when the payload has none.
 */
export function extractRating(data: MDBListResponse | null): number | null {
    if (!data) return null;

    for (const [field, divisor] of RATING_FIELDS) {
        const value = data[field];
        if (value === null || value === undefined || value === '' || typeof value === 'boolean') continue;
        const numeric = typeof value === 'number' ? value : Number.parseFloat(value);
        if (!Number.isFinite(numeric) || numeric <= 0) continue;
        return Math.max(0, Math.min(10, numeric / divisor));
    }
    return null;
}

export class MdblistClient implements RatingService {
    constructor(
        private readonly apiKey: string,
        private readonly baseUrl: string = settings.MDBLIST_BASE_URL,
        private readonly fetchImpl?: FetchLike
    ) {}

    async getRating(query: RatingQuery): Promise<RatingLookup> {
        const lookup = query.primaryCanonicalId
            ? { i: query.primaryCanonicalId }
            : { tm: query.externalId, m: query.mediaType === 'movie' ? 'movie' : 'show' };

        const url = buildUrl(this.baseUrl, '', { apikey: this.apiKey, ...lookup });
        const data = await fetchJson<MDBListResponse>('mdblist', url, { fetchImpl: this.fetchImpl });

        if (data.response === false) {
            return { rating: null, canonicalId: null };
        }

        const imdbId = data.imdbid && data.imdbid.startsWith('tt') ? data.imdbid : null;
        return { rating: extractRating(data), canonicalId: imdbId };
    }
}
