import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { catalogIdSchema, decodeUserConfig, encodeUserConfig, parseUserConfig, rowsQuerySchema } from '../validators.js';

describe('parseUserConfig', () => {
    it('applies documented defaults', () => {
        expect(parseUserConfig({ libraryAuthKey: 'test-secret' })).toEqual({
            libraryAuthKey: 'test-secret',
            rowCount: 5,
            minRating: 6,
            includeMovies: true,
            includeSeries: true,
            preferLoved: true,
        });
    });

    it('rejects a blank credential', () => {
        expect(() => parseUserConfig({ libraryAuthKey: '   ' }))
            .toThrow(new ConfigError('libraryAuthKey: Library credential cannot be empty'));
    });

    it('rejects a missing credential', () => {
        expect(() => parseUserConfig({})).toThrow(ConfigError);
        expect(() => parseUserConfig({})).toThrow(/^libraryAuthKey: /);
    });

    it('bounds the row count', () => {
        expect(() => parseUserConfig({ libraryAuthKey: 'test-secret', rowCount: 25 })).toThrow(/^rowCount: /);
    });

    it('names the whole config when the input is not an object', () => {
        expect(() => parseUserConfig('nope')).toThrow(/^config: /);
    });
});

describe('configuration tokens', () => {
    it('decodes what it encodes', () => {
        const token = encodeUserConfig({ libraryAuthKey: 'test-secret', rowCount: 3, includeSeries: false });
        const config = decodeUserConfig(token);

        expect(config.rowCount).toBe(3);
        expect(config.includeSeries).toBe(false);
        expect(config.includeMovies).toBe(true);
    });

    it('rejects tokens that are not base64url JSON', () => {
        expect(() => decodeUserConfig('%%%')).toThrow(new ConfigError('Configuration token is not valid base64url JSON'));
    });
});

describe('request schemas', () => {
    it('parses catalog ids', () => {
        expect(catalogIdSchema.parse('recs_series_3')).toEqual({ mediaType: 'series', rowIndex: 3 });
    });

    it('rejects unknown catalog ids', () => {
        expect(() => catalogIdSchema.parse('recs_anime_0')).toThrow(z.ZodError);
    });

    it('accepts an omitted type', () => {
        expect(rowsQuerySchema.parse({})).toEqual({});
        expect(() => rowsQuerySchema.parse({ type: 'tv' })).toThrow("type must be 'movie' or 'series'");
    });
});
