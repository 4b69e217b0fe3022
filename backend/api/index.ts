import { settings } from '../lib/config.js';
import { createLoggingEventSink, logger } from '../lib/logger.js';
import { CacheManager } from '../services/cacheManager.js';
import { createCacheStore } from '../services/cacheStore.js';
import { CacheWarmer } from '../services/cacheWarmer.js';
import { StremioLibraryClient } from '../services/libraryClient.js';
import { MdblistClient } from '../services/mdblistClient.js';
import { createUpstreamFactories, RecommendationService } from '../services/recommendationService.js';
import { TmdbClient } from '../services/tmdbClient.js';
import { createApp } from './app.js';

const port = settings.PORT;

const store = createCacheStore(settings.REDIS_URL);
const cache = new CacheManager({ store, events: createLoggingEventSink() });
const tmdb = new TmdbClient();

const service = new RecommendationService({
    cache,
    library: new StremioLibraryClient(),
    ...createUpstreamFactories(
        (apiKey) => tmdb.withApiKey(apiKey),
        (apiKey) => new MdblistClient(apiKey)
    ),
});

const warmer = new CacheWarmer(service);
const app = createApp({ service, warmer });

const server = app.listen(port, () => {
    logger.info(`Server listening on port ${port}`);
    warmer.start();
});

const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    warmer.stop();
    server.close(() => {
        store.close()
            .catch((error: unknown) => logger.error('Failed to close cache store', error))
            .finally(() => process.exit(0));
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
