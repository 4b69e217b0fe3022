import { settings } from './config.js';
import { UpstreamUnavailableError, type UpstreamService } from './errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    body?: unknown;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
}

/**
 * Fetch JSON from an upstream service. Any non-OK status, timeout or
 * transport failure becomes an UpstreamUnavailableError.
 */
export async function fetchJson<T>(service: UpstreamService, url: string, options: HttpRequestOptions = {}): Promise<T> {
    const timeoutMs = options.timeoutMs ?? settings.UPSTREAM_TIMEOUT_MS;
    const fetchImpl = options.fetchImpl ?? fetch;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
        response = await fetchImpl(url, {
            method: options.method ?? 'GET',
            headers: {
                'Accept': 'application/json',
                ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
            },
            body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
            signal: controller.signal,
        });
    } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
            throw new UpstreamUnavailableError(service, null, `Request timeout after ${timeoutMs}ms`);
        }
        throw new UpstreamUnavailableError(service, null, error instanceof Error ? error.message : String(error));
    } finally {
        clearTimeout(timeoutId);
    }

    if (!response.ok) {
        throw new UpstreamUnavailableError(service, response.status, `${service} API error (${response.status})`);
    }

    try {
        return await response.json() as T;
    } catch {
        throw new UpstreamUnavailableError(service, response.status, `Invalid JSON from ${service}`);
    }
}

export function buildUrl(base: string, path: string, params: Record<string, string | number | undefined> = {}): string {
    const url = new URL(path.replace(/^\//, ''), base.endsWith('/') ? base : `${base}/`);
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
            url.searchParams.append(key, String(value));
        }
    }
    return url.toString();
}
