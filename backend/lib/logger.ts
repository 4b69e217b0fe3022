import { settings } from './config.js';
import type { ArtifactClass, MediaType } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
    debug(msg: string, extra?: unknown): void;
    info(msg: string, extra?: unknown): void;
    warn(msg: string, extra?: unknown): void;
    error(msg: string, extra?: unknown): void;
    child(tag: string): Logger;
}

export function createLogger(tag: string, minLevel: LogLevel = settings.LOG_LEVEL): Logger {
    const write = (level: LogLevel, msg: string, extra?: unknown) => {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
        const base = `[${tag}][${new Date().toISOString()}][${level.toUpperCase()}] ${msg}`;
        const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
        if (extra !== undefined) sink(base, extra);
        else sink(base);
    };

    return {
        debug: (msg, extra) => write('debug', msg, extra),
        info: (msg, extra) => write('info', msg, extra),
        warn: (msg, extra) => write('warn', msg, extra),
        error: (msg, extra) => write('error', msg, extra),
        child: (childTag) => createLogger(`${tag}][${childTag}`, minLevel),
    };
}

export const logger = createLogger('recs');

// ============================================================================
// PIPELINE EVENTS
// ============================================================================

export type PipelineEvent =
    | { type: 'seeds.collected'; count: number; source: 'upstream' | 'cache' | 'stale' | 'empty' }
    | { type: 'discovery.result'; seedId: string; mediaType: MediaType; count: number; strategy: 'niche' | 'similar' | 'unresolved' | 'failed' }
    | { type: 'discovery.fallback'; seedId: string; reason: 'no_keywords' | 'no_results' }
    | { type: 'enrichment.degraded'; service: string; externalId: string }
    | { type: 'candidate.dropped'; seedId: string; count: number; reason: 'missing_canonical_id' }
    | { type: 'cache.hit' | 'cache.miss' | 'cache.stale'; artifactClass: ArtifactClass; key: string }
    | { type: 'cache.error'; operation: string; message: string }
    | { type: 'request.deadline'; stage: string };

export type PipelineEventType = PipelineEvent['type'];

export interface EventSink {
    emit(event: PipelineEvent): void;
}

/**
 * Default sink: writes every event through the logger. Cache traffic goes to
 * debug, degradations to warn.
 */
export function createLoggingEventSink(target: Logger = logger.child('events')): EventSink {
    return {
        emit(event) {
            const { type, ...fields } = event;
            switch (type) {
                case 'enrichment.degraded':
                case 'request.deadline':
                case 'cache.error':
                    target.warn(type, fields);
                    return;
                case 'cache.hit':
                case 'cache.miss':
                case 'cache.stale':
                    target.debug(type, fields);
                    return;
                default:
                    target.info(type, fields);
            }
        },
    };
}

export const noopEventSink: EventSink = { emit: () => {} };
