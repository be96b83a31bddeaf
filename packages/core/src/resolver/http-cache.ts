import { ok, type Result } from '../types/result.js';
import type { CacheError } from '../types/errors.js';

/**
 * A cached HTTP response body with the validators needed to reuse it.
 */
export class CachedResponse {
  constructor(
    readonly cachedAt: Date,
    /** Freshness lifetime in milliseconds. */
    readonly maxAgeMs: number,
    readonly etag: string,
    readonly data: Uint8Array
  ) {}

  expiresAt(): Date {
    return new Date(this.cachedAt.getTime() + this.maxAgeMs);
  }

  expired(now: Date): boolean {
    return now.getTime() - this.cachedAt.getTime() > this.maxAgeMs;
  }
}

/**
 * Response cache used by the HTTP loader. A miss is `ok(undefined)`;
 * `saveCache` yields `undefined` when the response may not be stored.
 */
export interface HttpCache {
  loadCache(url: URL): Promise<Result<CachedResponse | undefined, CacheError>>;
  saveCache(
    url: URL,
    headers: Headers,
    body: Uint8Array
  ): Promise<Result<CachedResponse | undefined, CacheError>>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Freshness lifetime from a Cache-Control header, in milliseconds.
 * `no-cache` and `no-store` win over `max-age`; malformed `max-age`
 * values are ignored.
 */
export function getCacheControlMaxAge(header: string | null | undefined): number {
  if (!header) return 0;
  let maxAgeMs = 0;
  for (const directive of header.split(',')) {
    const [rawName = '', rawValue = ''] = directive.trim().split('=', 2);
    const name = rawName.trim().toLowerCase();
    if (name === 'no-cache' || name === 'no-store') {
      return 0;
    }
    if (name === 'max-age') {
      const value = rawValue.trim();
      if (/^[+-]?\d+$/.test(value)) {
        maxAgeMs = Number.parseInt(value, 10) * 1000;
      }
    }
  }
  return maxAgeMs;
}

/** Cache key of a URL: its string form without the fragment. */
export function cacheKey(url: URL): string {
  const copy = new URL(url.href);
  copy.hash = '';
  return copy.href;
}

/**
 * Builds the record `saveCache` should store, or `undefined` when the
 * response is not cacheable.
 */
export function toCachedResponse(
  headers: Headers,
  body: Uint8Array,
  now: Date
): CachedResponse | undefined {
  const maxAgeMs = getCacheControlMaxAge(headers.get('cache-control'));
  if (maxAgeMs <= 0) {
    return undefined;
  }
  return new CachedResponse(now, maxAgeMs, headers.get('etag') ?? '', body);
}

export class MemoryHttpCache implements HttpCache {
  private readonly entries = new Map<string, CachedResponse>();

  constructor(private readonly now: Clock = systemClock) {}

  async loadCache(url: URL): Promise<Result<CachedResponse | undefined, CacheError>> {
    return ok(this.entries.get(cacheKey(url)));
  }

  async saveCache(
    url: URL,
    headers: Headers,
    body: Uint8Array
  ): Promise<Result<CachedResponse | undefined, CacheError>> {
    const cached = toCachedResponse(headers, body, this.now());
    if (cached) {
      this.entries.set(cacheKey(url), cached);
    }
    return ok(cached);
  }
}
