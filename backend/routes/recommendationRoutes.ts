import express, { Router } from 'express';
import type { RecommendationController } from '../controllers/recommendationController.js';
import { attachUserConfig } from '../middleware/userConfigMiddleware.js';

// Mounted at /api/recommendations
export function createRecommendationRoutes(controller: RecommendationController): Router {
    const router = express.Router();

    // GET /api/recommendations/debug/cache - Cache counters
    router.get('/debug/cache', controller.getCacheDebug);

    // GET /api/recommendations/:config/rows - All rows for the configured user
    router.get('/:config/rows', attachUserConfig, controller.getRows);

    // DELETE /api/recommendations/:config/cache - Invalidate the user's cached artifacts
    router.delete('/:config/cache', attachUserConfig, controller.invalidateCache);

    return router;
}

// Mounted at the root: the paths catalog clients expect
export function createAddonRoutes(controller: RecommendationController): Router {
    const router = express.Router();

    // GET /:config/manifest.json - Addon manifest
    router.get('/:config/manifest.json', attachUserConfig, controller.getManifest);

    // GET /:config/catalog/:type/:id.json - One recommendation row
    router.get('/:config/catalog/:type/:id.json', attachUserConfig, controller.getCatalog);

    return router;
}
