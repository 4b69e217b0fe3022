import express, { Express, Request, Response, ErrorRequestHandler } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { APP_VERSION, settings } from '../lib/config.js';
import { ConfigError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { createRecommendationController } from '../controllers/recommendationController.js';
import { createAddonRoutes, createRecommendationRoutes } from '../routes/recommendationRoutes.js';
import type { CacheWarmer } from '../services/cacheWarmer.js';
import type { RecommendationService } from '../services/recommendationService.js';

export interface AppDeps {
    service: RecommendationService;
    warmer?: CacheWarmer | null;
    version?: string;
}

// --- Define Global Error Handler with explicit type ---
export const globalErrorHandler: ErrorRequestHandler = (err, req, res, next) => {
    let statusCode = 500;
    let message = 'Internal Server Error';

    if (err instanceof ConfigError) {
        statusCode = 400;
        message = err.message;
    } else if (err instanceof z.ZodError) {
        statusCode = 400; // Bad Request
        message = err.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    } else {
        logger.error('Unhandled request error', err);
    }

    res.status(statusCode).json({
        status: 'error',
        statusCode,
        message,
        ...(settings.NODE_ENV === 'development' && err instanceof Error ? { stack: err.stack } : {}),
    });
};

export function createApp(deps: AppDeps): Express {
    const app: Express = express();
    const version = deps.version ?? APP_VERSION;
    const controller = createRecommendationController(deps.service, deps.warmer ?? null, version);

    // --- CORS Setup ---
    // Catalog clients fetch from arbitrary origins; the configuration UI is FRONTEND_URL.
    app.use(cors({
        origin: '*',
        methods: 'GET,HEAD,DELETE',
        allowedHeaders: ['Content-Type'],
    }));

    app.use(express.json());

    // --- API Routes ---
    app.get('/health', controller.getHealth);
    app.use('/api/recommendations', createRecommendationRoutes(controller));

    app.get('/api', (req: Request, res: Response) => {
        res.json({ message: `Recommendation rows API. Configure at ${settings.FRONTEND_URL}` });
    });

    app.use('/', createAddonRoutes(controller));

    app.use(globalErrorHandler);

    return app;
}
