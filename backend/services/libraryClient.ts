import { z } from 'zod';
import { settings } from '../lib/config.js';
import { UpstreamUnavailableError } from '../lib/errors.js';
import { fetchJson, type FetchLike } from '../lib/http.js';
import type { LibraryHistory, LibraryHistoryItem, MediaType } from '../lib/types.js';

/**
 * Library service boundary: given a credential, the user's watch history
 * and loved items. Implementations throw UpstreamUnavailableError.
 */
export interface LibraryService {
    fetchHistory(authKey: string): Promise<LibraryHistory>;
}

// --- Stremio datastore payload ---

const libraryItemSchema = z.object({
    _id: z.string(),
    type: z.string(),
    name: z.string().optional().default(''),
    removed: z.boolean().optional(),
    loved: z.boolean().optional(),
    isFavorite: z.boolean().optional(),
    state: z.object({
        lastWatched: z.string().nullable().optional(),
        timesWatched: z.number().optional(),
        flaggedWatched: z.number().optional(),
    }).partial().optional(),
});

const datastoreResponseSchema = z.object({
    result: z.array(z.unknown()).optional(),
    items: z.array(z.unknown()).optional(),
    error: z.unknown().optional(),
});

type LibraryItem = z.infer<typeof libraryItemSchema>;

// IMDb ids or plain numeric metadata ids; everything else (channels, local files) is ignored.
const SEEDABLE_ID = /^(tt\d+|\d+)$/;

function toMediaType(type: string): MediaType | null {
    if (type === 'movie') return 'movie';
    if (type === 'series' || type === 'tv') return 'series';
    return null;
}

function parseTimestamp(value: string | null | undefined): number | null {
    if (!value) return null;
    const parsed = Date.parse(value);
    // The datastore uses the epoch for "never watched".
    return Number.isNaN(parsed) || parsed <= 0 ? null : parsed;
}

function toHistoryItem(item: LibraryItem): LibraryHistoryItem | null {
    const mediaType = toMediaType(item.type);
    if (!mediaType || !SEEDABLE_ID.test(item._id)) return null;
    return {
        externalId: item._id,
        mediaType,
        title: item.name,
        timestamp: parseTimestamp(item.state?.lastWatched),
    };
}

function isWatched(item: LibraryItem, historyItem: LibraryHistoryItem): boolean {
    return historyItem.timestamp !== null
        || (item.state?.timesWatched ?? 0) > 0
        || (item.state?.flaggedWatched ?? 0) > 0;
}

/**
 * Split raw datastore items into watched and loved lists, most recent
 * first. Removed and unparseable items are skipped.
 */
export function parseLibraryItems(rawItems: unknown[]): LibraryHistory {
    const watched: LibraryHistoryItem[] = [];
    const loved: LibraryHistoryItem[] = [];

    for (const raw of rawItems) {
        const parsed = libraryItemSchema.safeParse(raw);
        if (!parsed.success || parsed.data.removed) continue;

        const item = parsed.data;
        const historyItem = toHistoryItem(item);
        if (!historyItem) continue;

        if (item.loved || item.isFavorite) {
            loved.push(historyItem);
        }
        if (isWatched(item, historyItem)) {
            watched.push(historyItem);
        }
    }

    // Stable sort keeps library order among items without a timestamp.
    const byRecency = (a: LibraryHistoryItem, b: LibraryHistoryItem) => (b.timestamp ?? -1) - (a.timestamp ?? -1);
    watched.sort(byRecency);
    loved.sort(byRecency);

    return { watched, loved };
}

export class StremioLibraryClient implements LibraryService {
    constructor(
        private readonly apiUrl: string = settings.LIBRARY_API_URL,
        private readonly fetchImpl?: FetchLike
    ) {}

    async fetchHistory(authKey: string): Promise<LibraryHistory> {
        const body = await fetchJson<unknown>('library', this.apiUrl, {
            method: 'POST',
            body: { authKey, collection: 'libraryItem', all: true },
            fetchImpl: this.fetchImpl,
        });

        const parsed = datastoreResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new UpstreamUnavailableError('library', 200, 'Unexpected library payload');
        }
        if (parsed.data.error !== undefined) {
            throw new UpstreamUnavailableError('library', 200, 'Library service rejected the request');
        }

        return parseLibraryItems(parsed.data.result ?? parsed.data.items ?? []);
    }
}
