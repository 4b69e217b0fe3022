import { Request, Response, NextFunction } from 'express';
import { buildManifest, toMetaPreview } from '../lib/addonProtocol.js';
import { ConfigError } from '../lib/errors.js';
import type { CatalogRow, UserConfig } from '../lib/types.js';
import { catalogIdSchema, mediaTypeSchema, rowsQuerySchema } from '../lib/validators.js';
import type { CacheWarmer } from '../services/cacheWarmer.js';
import type { RecommendationService } from '../services/recommendationService.js';
import '../middleware/userConfigMiddleware.js';

// Catalog clients may cache a row response this long (seconds).
const CATALOG_CACHE_MAX_AGE = 3600;

function requireUserConfig(req: Request): UserConfig {
    if (!req.userConfig) {
        throw new ConfigError('config: missing configuration token');
    }
    return req.userConfig;
}

export function createRecommendationController(
    service: RecommendationService,
    warmer: CacheWarmer | null,
    version: string
) {
    /**
     * GET /:config/manifest.json
     * Addon manifest with one catalog per row slot
     */
    const getManifest = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const config = requireUserConfig(req);
            res.status(200).json(buildManifest(config, version));
        } catch (error) {
            console.error("Error building manifest:", error);
            next(error);
        }
    };

    /**
     * GET /:config/catalog/:type/:id.json
     * One recommendation row as catalog metas
     */
    const getCatalog = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const config = requireUserConfig(req);
            const type = mediaTypeSchema.parse(req.params.type);
            const { mediaType, rowIndex } = catalogIdSchema.parse(req.params.id);

            if (type !== mediaType) {
                res.status(200).json({ metas: [] });
                return;
            }

            warmer?.recordActivity(config);
            const row = await service.getRow(config, mediaType, rowIndex);
            res.status(200).json({
                metas: row ? row.items.map(toMetaPreview) : [],
                cacheMaxAge: CATALOG_CACHE_MAX_AGE,
            });
        } catch (error) {
            console.error("Error serving catalog:", error);
            next(error);
        }
    };

    /**
     * GET /api/recommendations/:config/rows
     * All rows, optionally for one media type (?type=movie|series)
     */
    const getRows = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const config = requireUserConfig(req);
            const { type } = rowsQuerySchema.parse(req.query);
            warmer?.recordActivity(config);

            let rows: CatalogRow[];
            if (type) {
                rows = await service.getRows(config, type);
            } else {
                const catalog = await service.getCatalog(config);
                rows = [...catalog.movie, ...catalog.series];
            }
            res.status(200).json({ rows });
        } catch (error) {
            console.error("Error generating recommendation rows:", error);
            next(error);
        }
    };

    /**
     * DELETE /api/recommendations/:config/cache
     * Drop every cached artifact of the user
     */
    const invalidateCache = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const config = requireUserConfig(req);
            const removed = await service.invalidateUser(config);
            res.status(200).json({ removed });
        } catch (error) {
            console.error("Error invalidating recommendation cache:", error);
            next(error);
        }
    };

    /**
     * GET /api/recommendations/debug/cache
     * Cache counters since process start
     */
    const getCacheDebug = (req: Request, res: Response) => {
        res.status(200).json({
            metrics: service.getCacheMetrics(),
            trackedUsers: warmer ? warmer.trackedUsers : 0,
        });
    };

    const getHealth = (req: Request, res: Response) => {
        res.status(200).json({ status: 'ok', version });
    };

    return { getManifest, getCatalog, getRows, invalidateCache, getCacheDebug, getHealth };
}

export type RecommendationController = ReturnType<typeof createRecommendationController>;
