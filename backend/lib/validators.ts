import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { UserConfig } from './types.js';

// --- User Configuration Schema ---

export const userConfigSchema = z.object({
    libraryAuthKey: z.string({ message: "Library credential is required" }).trim().min(1, "Library credential cannot be empty"),
    tmdbApiKey: z.string().trim().min(1).optional(),
    mdblistApiKey: z.string().trim().min(1).optional(),
    rowCount: z.number().int().min(1).max(20).default(5),
    minRating: z.number().min(0).max(10).default(6.0),
    includeMovies: z.boolean().default(true),
    includeSeries: z.boolean().default(true),
    preferLoved: z.boolean().default(true),
});

export type UserConfigInput = z.input<typeof userConfigSchema>;

function formatIssues(error: z.ZodError): string {
    return error.issues.map(e => `${e.path.join('.') || 'config'}: ${e.message}`).join(', ');
}

/**
 * Validate a raw configuration object. Throws ConfigError, the only
 * terminal error kind of the pipeline.
 */
export function parseUserConfig(input: unknown): UserConfig {
    const result = userConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError(formatIssues(result.error));
    }
    return result.data;
}

/**
 * Configuration travels in the URL as base64url-encoded JSON.
 */
export function decodeUserConfig(token: string): UserConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
    } catch {
        throw new ConfigError('Configuration token is not valid base64url JSON');
    }
    return parseUserConfig(raw);
}

export function encodeUserConfig(config: UserConfigInput): string {
    return Buffer.from(JSON.stringify(config), 'utf8').toString('base64url');
}

// --- Request Parameter Schemas ---

export const mediaTypeSchema = z.enum(['movie', 'series'], {
    message: "type must be 'movie' or 'series'",
});

export const rowsQuerySchema = z.object({
    type: mediaTypeSchema.optional(),
});

// Catalog ids look like "recs_movie_0": prefix, media type, row index.
export const catalogIdSchema = z
    .string()
    .regex(/^recs_(movie|series)_\d+$/, "Catalog id must look like recs_<type>_<index>")
    .transform((id) => {
        const parts = id.split('_');
        return { mediaType: mediaTypeSchema.parse(parts[1]), rowIndex: Number.parseInt(parts[2] ?? '0', 10) };
    });
