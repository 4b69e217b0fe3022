export type UpstreamService = 'library' | 'tmdb' | 'mdblist';

/**
 * Network failure or non-OK response from an upstream service.
 * `status` is null when no response arrived (timeout, DNS, reset).
 */
export class UpstreamUnavailableError extends Error {
    readonly service: UpstreamService;
    readonly status: number | null;

    constructor(service: UpstreamService, status: number | null, message?: string) {
        super(message ?? `${service} unavailable${status === null ? '' : ` (${status})`}`);
        this.name = 'UpstreamUnavailableError';
        this.service = service;
        this.status = status;
    }

    /** 5xx, 429 and transport errors are worth another attempt; other 4xx are not. */
    get retryable(): boolean {
        return this.status === null || this.status >= 500 || this.status === 429;
    }
}

// Rating service exhausted its retries for the current request.
export class UpstreamDegradedError extends Error {
    readonly service: UpstreamService;

    constructor(service: UpstreamService, cause?: unknown) {
        super(`${service} degraded for this request`, { cause });
        this.name = 'UpstreamDegradedError';
        this.service = service;
    }
}

export class DataIntegrityError extends Error {
    readonly externalId: string;

    constructor(externalId: string, message: string) {
        super(message);
        this.name = 'DataIntegrityError';
        this.externalId = externalId;
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class CacheError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'CacheError';
    }
}

export class DeadlineExceededError extends Error {
    constructor(message = 'Request deadline exceeded') {
        super(message);
        this.name = 'DeadlineExceededError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
