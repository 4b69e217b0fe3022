import { settings } from '../lib/config.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { MEDIA_TYPES, type UserConfig } from '../lib/types.js';
import { fingerprint } from './cacheManager.js';
import { isMediaTypeEnabled, type RecommendationService } from './recommendationService.js';

export type WarmableCatalog = Pick<RecommendationService, 'catalogFreshness' | 'getRows'>;

export interface CacheWarmerOptions {
    intervalMinutes?: number;
    thresholdSeconds?: number;
    activeWindowHours?: number;
    maxUsers?: number;
    clock?: () => number;
}

export interface WarmCycleResult {
    checked: number;
    warmed: number;
    failed: number;
    expired: number;
}

interface ActiveUser {
    config: UserConfig;
    lastSeen: number;
}

/**
 * Periodically refreshes catalogs of recently active users before they
 * expire, so their next request is a cache hit.
 */
export class CacheWarmer {
    private readonly users = new Map<string, ActiveUser>();
    private readonly intervalMs: number;
    private readonly thresholdMs: number;
    private readonly activeWindowMs: number;
    private readonly maxUsers: number;
    private readonly clock: () => number;
    private readonly log = logger.child('warmer');
    private timer: NodeJS.Timeout | null = null;
    private running: Promise<WarmCycleResult> | null = null;

    constructor(private readonly service: WarmableCatalog, options: CacheWarmerOptions = {}) {
        this.intervalMs = (options.intervalMinutes ?? settings.CACHE_WARM_INTERVAL_MINUTES) * 60_000;
        this.thresholdMs = (options.thresholdSeconds ?? settings.CACHE_WARM_THRESHOLD_SECONDS) * 1000;
        this.activeWindowMs = (options.activeWindowHours ?? settings.CACHE_WARM_ACTIVE_WINDOW_HOURS) * 3_600_000;
        this.maxUsers = options.maxUsers ?? settings.CACHE_WARM_MAX_USERS;
        this.clock = options.clock ?? Date.now;
    }

    get trackedUsers(): number {
        return this.users.size;
    }

    /**
     * Record a request. The least recently seen user is forgotten once the
     * registry is full.
     */
    recordActivity(config: UserConfig): void {
        const key = fingerprint(config.libraryAuthKey);
        this.users.delete(key);
        this.users.set(key, { config, lastSeen: this.clock() });

        if (this.users.size > this.maxUsers) {
            const oldest = this.users.keys().next();
            if (!oldest.done) this.users.delete(oldest.value);
        }
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            this.runCycle().catch((error: unknown) => {
                this.log.error('Warm cycle crashed', { error: describeError(error) });
            });
        }, this.intervalMs);
        this.timer.unref();
        this.log.info(`Cache warming every ${this.intervalMs / 60_000} minutes`);
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
    }

    /**
     * One pass over active users. A cycle requested while another runs
     * joins the running one.
     */
    runCycle(): Promise<WarmCycleResult> {
        if (!this.running) {
            this.running = this.warmAll().finally(() => {
                this.running = null;
            });
        }
        return this.running;
    }

    private async warmAll(): Promise<WarmCycleResult> {
        const result: WarmCycleResult = { checked: 0, warmed: 0, failed: 0, expired: 0 };
        const cutoff = this.clock() - this.activeWindowMs;

        for (const [key, user] of [...this.users]) {
            if (user.lastSeen < cutoff) {
                this.users.delete(key);
                result.expired += 1;
                continue;
            }

            for (const mediaType of MEDIA_TYPES) {
                if (!isMediaTypeEnabled(user.config, mediaType)) continue;
                result.checked += 1;
                try {
                    const freshForMs = await this.service.catalogFreshness(user.config, mediaType);
                    // Nothing cached means the user has not asked for this type yet.
                    if (freshForMs === null || freshForMs >= this.thresholdMs) continue;
                    await this.service.getRows(user.config, mediaType, { forceRefresh: true });
                    result.warmed += 1;
                } catch (error) {
                    result.failed += 1;
                    this.log.warn(`Warming ${mediaType} catalog for ${key.slice(0, 8)}... failed`, { error: describeError(error) });
                }
            }
        }

        this.log.info(`Warm cycle done: ${result.warmed} warmed, ${result.failed} failed, ${result.expired} expired`);
        return result;
    }
}
