import { randomUUID } from 'node:crypto';
import { settings } from './config.js';
import { DeadlineExceededError, type UpstreamService } from './errors.js';
import { createLoggingEventSink, logger, type EventSink, type Logger } from './logger.js';

export type Clock = () => number;

/**
 * Soft deadline for one catalog request. Work started after expiry is
 * skipped; work still pending at expiry is abandoned.
 */
export class Deadline {
    constructor(readonly expiresAt: number, private readonly clock: Clock = Date.now) {}

    static after(ms: number, clock: Clock = Date.now): Deadline {
        return new Deadline(clock() + ms, clock);
    }

    static none(): Deadline {
        return new Deadline(Number.POSITIVE_INFINITY);
    }

    get remainingMs(): number {
        return Math.max(0, this.expiresAt - this.clock());
    }

    get expired(): boolean {
        return this.clock() >= this.expiresAt;
    }
}

export interface RequestContextOptions {
    reqId?: string;
    deadline?: Deadline;
    events?: EventSink;
    log?: Logger;
}

/**
 * Request-scoped state threaded through every component call: deadline,
 * event sink and the per-request degradation flags. Nothing here outlives
 * the request.
 */
export class RequestContext {
    readonly reqId: string;
    readonly deadline: Deadline;
    readonly events: EventSink;
    readonly log: Logger;
    private readonly degradedServices = new Set<UpstreamService>();
    private deadlineReported = false;

    constructor(options: RequestContextOptions = {}) {
        this.reqId = options.reqId ?? randomUUID().slice(0, 8);
        this.deadline = options.deadline ?? Deadline.after(settings.REQUEST_DEADLINE_MS);
        this.events = options.events ?? createLoggingEventSink();
        this.log = (options.log ?? logger).child(`req:${this.reqId}`);
    }

    markDegraded(service: UpstreamService): void {
        this.degradedServices.add(service);
    }

    isDegraded(service: UpstreamService): boolean {
        return this.degradedServices.has(service);
    }

    get degraded(): boolean {
        return this.degradedServices.size > 0;
    }

    get deadlineHit(): boolean {
        return this.deadlineReported || this.deadline.expired;
    }

    /**
     * Run `fn` unless the deadline already passed; abandon the wait when it
     * passes mid-flight. Either way a DeadlineExceededError is thrown.
     */
    async guard<T>(stage: string, fn: () => Promise<T>): Promise<T> {
        if (this.deadline.expired) {
            this.reportDeadline(stage);
            throw new DeadlineExceededError(`Deadline passed before ${stage}`);
        }

        const remaining = this.deadline.remainingMs;
        if (!Number.isFinite(remaining)) {
            return fn();
        }

        let timer: NodeJS.Timeout | undefined;
        const expiry = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                this.reportDeadline(stage);
                reject(new DeadlineExceededError(`Deadline passed during ${stage}`));
            }, remaining);
        });

        try {
            return await Promise.race([fn(), expiry]);
        } finally {
            clearTimeout(timer);
        }
    }

    private reportDeadline(stage: string): void {
        if (this.deadlineReported) return;
        this.deadlineReported = true;
        this.events.emit({ type: 'request.deadline', stage });
    }
}
