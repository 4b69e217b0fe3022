import { describe, expect, it, vi } from 'vitest';
import { UpstreamUnavailableError } from '../../lib/errors.js';
import { parseLibraryItems, StremioLibraryClient } from '../libraryClient.js';

const rawItems: unknown[] = [
    { _id: 'tt0000001', type: 'movie', name: 'Alpha', state: { lastWatched: '2024-01-02T00:00:00.000Z', timesWatched: 1 } },
    { _id: 'tt0000002', type: 'series', name: 'Beta', loved: true, state: { lastWatched: '1970-01-01T00:00:00.000Z' } },
    { _id: 'tt0000003', type: 'movie', name: 'Gamma', removed: true, state: { timesWatched: 2 } },
    { _id: 'local:abc', type: 'movie', name: 'Local file', state: { timesWatched: 1 } },
    { _id: 'tt0000004', type: 'channel', name: 'Channel' },
    { _id: 'tt0000005', type: 'movie', name: 'Delta', state: { lastWatched: '2024-03-01T00:00:00.000Z' } },
    { _id: '550', type: 'movie', name: 'Numeric', isFavorite: true, state: { flaggedWatched: 1 } },
    42,
];

describe('parseLibraryItems', () => {
    it('splits watched and loved items, newest first', () => {
        const history = parseLibraryItems(rawItems);

        expect(history.watched.map((item) => item.externalId)).toEqual(['tt0000005', 'tt0000001', '550']);
        expect(history.loved.map((item) => item.externalId)).toEqual(['tt0000002', '550']);
    });

    it('maps item fields', () => {
        const history = parseLibraryItems(rawItems);

        expect(history.watched[0]).toEqual({
            externalId: 'tt0000005',
            mediaType: 'movie',
            title: 'Delta',
            timestamp: Date.parse('2024-03-01T00:00:00.000Z'),
        });
        expect(history.loved[0]).toEqual({ externalId: 'tt0000002', mediaType: 'series', title: 'Beta', timestamp: null });
    });
});

describe('StremioLibraryClient', () => {
    it('posts the credential to the datastore', async () => {
        const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
            new Response(JSON.stringify({ result: rawItems }), { status: 200 }));
        const client = new StremioLibraryClient('https://library.test/api/datastoreGet', fetchImpl);

        const history = await client.fetchHistory('test-secret');

        expect(history.watched).toHaveLength(3);
        const [url, init] = fetchImpl.mock.calls[0];
        expect(url).toBe('https://library.test/api/datastoreGet');
        expect(init?.method).toBe('POST');
        expect(JSON.parse(String(init?.body))).toEqual({ authKey: 'test-secret', collection: 'libraryItem', all: true });
    });

    it('treats an error payload as unavailable', async () => {
        const fetchImpl = vi.fn(async () => new Response(JSON.stringify({ error: { message: 'bad key' } }), { status: 200 }));
        const client = new StremioLibraryClient('https://library.test/api/datastoreGet', fetchImpl);

        await expect(client.fetchHistory('test-secret')).rejects.toMatchObject({
            name: 'UpstreamUnavailableError',
            service: 'library',
            retryable: false,
        });
    });

    it('maps server errors to retryable failures', async () => {
        const fetchImpl = vi.fn(async () => new Response('oops', { status: 503 }));
        const client = new StremioLibraryClient('https://library.test/api/datastoreGet', fetchImpl);

        const error = await client.fetchHistory('test-secret').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(UpstreamUnavailableError);
        expect(error).toMatchObject({ status: 503, retryable: true });
    });
});
