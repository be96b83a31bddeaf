/* global fetch, AbortController */
import path from 'node:path';
import { gunzipSync } from 'node:zlib';

import { ErrorCode } from '../errors/codes.js';
import { setReferrer, type Schema } from '../schema/model.js';
import { referrerUrl } from '../schema/referrer.js';
import { CacheError, errorMessage, type ResolutionError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { parseYamlValue } from '../util/yaml.js';
import { schemaFromJSON } from '../schema/codec.js';
import {
  decodeSchemaText,
  formatDuration,
  formatSizeBytes,
  loadError,
  redactUrl,
  trimFragment,
  type LoadContext,
  type LoadResult,
  type Loader,
} from './loader.js';
import { systemClock, type CachedResponse, type Clock, type HttpCache } from './http-cache.js';

export type HttpClient = (
  url: URL,
  init: { headers: Headers; signal: AbortSignal }
) => Promise<Response>;

export const fetchClient: HttpClient = (url, init) => fetch(url, init);

export const ACCEPT_HEADER =
  'application/schema+json,application/json,application/schema+yaml,application/yaml,text/plain; charset=utf-8';

export const DEFAULT_SIZE_LIMIT = 200 * 1000 * 1000;
export const DEFAULT_TIMEOUT_MS = 30_000;

const YAML_MEDIA_TYPE = /^application\/(.*\+)?yaml$/;

export interface HttpLoaderOptions {
  client?: HttpClient;
  /** Response cache; no caching when absent. */
  cache?: HttpCache;
  userAgent?: string;
  /** Body size ceiling in bytes; 0 disables it. */
  sizeLimit?: number;
  timeoutMs?: number;
  now?: Clock;
}

export interface MediaType {
  type: string;
  params: Record<string, string>;
}

/** Parses a Content-Type value; `undefined` when absent or malformed. */
export function parseMediaType(header: string | null): MediaType | undefined {
  if (!header) return undefined;
  const [rawType = '', ...rawParams] = header.split(';');
  const type = rawType.trim().toLowerCase();
  if (!/^[\w!#$&^.+-]+\/[\w!#$&^.+-]+$/.test(type)) return undefined;

  const params: Record<string, string> = {};
  for (const param of rawParams) {
    const eq = param.indexOf('=');
    if (eq === -1) {
      if (param.trim() === '') continue;
      return undefined;
    }
    const name = param.slice(0, eq).trim().toLowerCase();
    let value = param.slice(eq + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    params[name] = value;
  }
  return { type, params };
}

function hasGzipMagic(body: Uint8Array): boolean {
  return body.length >= 2 && body[0] === 0x1f && body[1] === 0x8b;
}

/** Collection URL of a fetched document, used to resolve its relative refs. */
function documentDirUrl(url: URL): URL {
  const dir = trimFragment(url);
  if (dir.pathname !== '') {
    dir.pathname = path.posix.dirname(dir.pathname);
  }
  return dir;
}

interface CacheLookup {
  cached?: CachedResponse;
  /** Set when `cached` is still fresh. */
  schema?: Schema;
}

function parseCachedBody(data: Uint8Array): Result<Schema, CacheError> {
  const parsed = parseYamlValue(new TextDecoder().decode(data));
  const schema = parsed.isErr() ? parsed : schemaFromJSON(parsed.value);
  if (schema.isErr()) {
    return err(
      new CacheError({
        message: `parse cached YAML: ${schema.error.message}`,
        errorCode: ErrorCode.CACHE_READ_FAILED,
        cause: schema.error,
      })
    );
  }
  return ok(schema.value);
}

/**
 * Loads `http:` and `https:` refs, reusing fresh cached responses and
 * revalidating stale ones with `If-None-Match`. JSON unless the response
 * has a YAML media type.
 */
export class HttpLoader implements Loader {
  private readonly client: HttpClient;
  private readonly cache: HttpCache | undefined;
  private readonly userAgent: string;
  private readonly sizeLimit: number;
  private readonly timeoutMs: number;
  private readonly now: Clock;

  constructor(options: HttpLoaderOptions = {}) {
    this.client = options.client ?? fetchClient;
    this.cache = options.cache;
    this.userAgent = options.userAgent ?? '';
    this.sizeLimit = options.sizeLimit ?? DEFAULT_SIZE_LIMIT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? systemClock;
  }

  async load(ref: URL, ctx: LoadContext): Promise<LoadResult> {
    const { logger } = ctx;
    const url = trimFragment(ref);
    const refText = JSON.stringify(redactUrl(ref));
    const start = Date.now();

    logger.log('Loading', redactUrl(url));

    let cached: CachedResponse | undefined;
    const lookup = await this.loadCache(url);
    if (lookup.isErr()) {
      logger.log('Error loading from cache:', lookup.error.message);
    } else {
      cached = lookup.value.cached;
      const fresh = lookup.value.schema;
      if (cached && fresh !== undefined) {
        logger.logf(
          '=> got %s from cache in %s (expires in %s)',
          formatSizeBytes(cached.data.length),
          formatDuration(Date.now() - start),
          formatDuration(cached.expiresAt().getTime() - this.now().getTime())
        );
        return ok(this.stamp(fresh, url));
      }
    }

    const headers = new Headers();
    headers.set('Accept', ACCEPT_HEADER);
    headers.set('Accept-Encoding', 'gzip');
    if (ctx.referrer?.startsWith('http://') || ctx.referrer?.startsWith('https://')) {
      headers.set('Link', `<${ctx.referrer}>; rel="describedby"`);
    }
    if (this.userAgent !== '') {
      headers.set('User-Agent', this.userAgent);
    }
    if (cached && cached.etag !== '') {
      headers.set('If-None-Match', cached.etag);
    }

    // A listener never fires for a signal aborted before it was added.
    if (ctx.signal?.aborted) {
      return err(loadError('request $ref over HTTP: aborted', url, ErrorCode.REQUEST_FAILED));
    }
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    ctx.signal?.addEventListener('abort', onAbort);
    try {
      let resp = await this.request(url, headers, controller.signal);
      if (resp.isErr()) return resp;

      if (cached && cached.etag !== '' && resp.value.status === 304) {
        const renewed = await this.renewCache(url, resp.value.headers, cached);
        if (renewed.isErr()) {
          logger.log('Error using etag cache:', renewed.error.message);
          headers.delete('If-None-Match');
          resp = await this.request(url, headers, controller.signal);
        } else {
          logger.logf(
            '=> renewed cache of %s in %s (expires in %s)',
            formatSizeBytes(cached.data.length),
            formatDuration(Date.now() - start),
            formatDuration(renewed.value.maxAgeMs)
          );
          return ok(this.stamp(renewed.value.schema, url));
        }
        if (resp.isErr()) return resp;
      }

      return await this.readResponse(ref, url, refText, resp.value, start, ctx);
    } finally {
      clearTimeout(timer);
      ctx.signal?.removeEventListener('abort', onAbort);
    }
  }

  private async request(
    url: URL,
    headers: Headers,
    signal: AbortSignal
  ): Promise<Result<Response, ResolutionError>> {
    try {
      return ok(await this.client(url, { headers, signal }));
    } catch (cause) {
      return err(
        loadError(`request $ref over HTTP: ${errorMessage(cause)}`, url, ErrorCode.REQUEST_FAILED, cause)
      );
    }
  }

  private async readResponse(
    ref: URL,
    url: URL,
    refText: string,
    resp: Response,
    start: number,
    ctx: LoadContext
  ): Promise<LoadResult> {
    const failed = (message: string, errorCode: ErrorCode, cause?: unknown) =>
      err(loadError(`request $ref=${refText} over HTTP: ${message}`, ref, errorCode, cause));

    if (resp.status < 200 || resp.status >= 300) {
      await resp.body?.cancel();
      return failed(
        `got non-2xx status code: ${`${resp.status} ${resp.statusText}`.trim()}`,
        ErrorCode.HTTP_STATUS
      );
    }

    const encoding = (resp.headers.get('content-encoding') ?? '').trim().toLowerCase();
    if (encoding !== '' && encoding !== 'gzip' && encoding !== 'identity') {
      await resp.body?.cancel();
      return failed(
        `unsupported content encoding: ${JSON.stringify(resp.headers.get('content-encoding'))}`,
        ErrorCode.UNSUPPORTED_ENCODING
      );
    }

    let format: 'YAML' | 'JSON' = 'JSON';
    const mediaType = parseMediaType(resp.headers.get('content-type'));
    if (mediaType) {
      const charset = mediaType.params.charset ?? '';
      if (!['', 'utf-8', 'utf8'].includes(charset.toLowerCase())) {
        await resp.body?.cancel();
        return failed(
          `unsupported response charset: ${JSON.stringify(charset)}`,
          ErrorCode.UNSUPPORTED_ENCODING
        );
      }
      if (YAML_MEDIA_TYPE.test(mediaType.type)) {
        format = 'YAML';
      }
    }

    const read = await this.readBody(resp);
    if (read.isErr()) {
      return failed(read.error.message, read.error.code, read.error.cause);
    }
    let body = read.value;
    // fetch usually decompresses already; only gunzip what still looks gzipped.
    if (encoding === 'gzip' && hasGzipMagic(body)) {
      try {
        body = new Uint8Array(gunzipSync(body));
      } catch (cause) {
        return failed(`create gzip reader: ${errorMessage(cause)}`, ErrorCode.UNSUPPORTED_ENCODING, cause);
      }
    }

    let cached: CachedResponse | undefined;
    if (this.cache) {
      const saved = await this.cache.saveCache(url, resp.headers, body);
      if (saved.isErr()) {
        ctx.logger.log('Error saving response cache:', saved.error.message);
      } else {
        cached = saved.value;
      }
    }

    const duration = formatDuration(Date.now() - start);
    if (cached) {
      ctx.logger.logf(
        '=> cached %s in %s (expires in %s)',
        formatSizeBytes(body.length),
        duration,
        formatDuration(cached.maxAgeMs)
      );
    } else {
      ctx.logger.logf('=> got %s in %s', formatSizeBytes(body.length), duration);
    }

    const schema = decodeSchemaText(
      new TextDecoder().decode(body),
      format,
      ref,
      (f) => `parse $ref=${refText} ${f}`
    );
    if (schema.isErr()) return schema;
    return ok(this.stamp(schema.value, url));
  }

  private async readBody(
    resp: Response
  ): Promise<Result<Uint8Array, { message: string; code: ErrorCode; cause?: unknown }>> {
    if (!resp.body) {
      return ok(new Uint8Array(0));
    }
    const chunks: Uint8Array[] = [];
    let size = 0;
    const reader = resp.body.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        size += value.length;
        if (this.sizeLimit > 0 && size > this.sizeLimit) {
          await reader.cancel();
          return err({
            message: `aborted request after reading more than ${formatSizeBytes(this.sizeLimit)}`,
            code: ErrorCode.RESPONSE_TOO_LARGE,
          });
        }
        chunks.push(value);
      }
    } catch (cause) {
      return err({ message: errorMessage(cause), code: ErrorCode.REQUEST_FAILED, cause });
    }
    return ok(new Uint8Array(Buffer.concat(chunks)));
  }

  private async loadCache(url: URL): Promise<Result<CacheLookup, CacheError>> {
    if (!this.cache) return ok({});
    const loaded = await this.cache.loadCache(url);
    if (loaded.isErr()) return loaded;

    const cached = loaded.value;
    if (!cached || cached.expired(this.now())) {
      return ok({ cached });
    }
    const schema = parseCachedBody(cached.data);
    if (schema.isErr()) return schema;
    return ok({ cached, schema: schema.value });
  }

  /**
   * Refreshes a revalidated record with the 304 response's headers and
   * reparses its body. A 304 that may not be stored still vouches for the
   * cached bytes.
   */
  private async renewCache(
    url: URL,
    headers: Headers,
    cached: CachedResponse
  ): Promise<Result<{ schema: Schema; maxAgeMs: number }, CacheError>> {
    if (!this.cache) {
      return err(new CacheError({ message: 'no cache configured' }));
    }
    const saved = await this.cache.saveCache(url, headers, cached.data);
    if (saved.isErr()) return saved;

    const schema = parseCachedBody(cached.data);
    if (schema.isErr()) return schema;
    return ok({ schema: schema.value, maxAgeMs: saved.value?.maxAgeMs ?? 0 });
  }

  private stamp(schema: Schema, url: URL): Schema {
    setReferrer(schema, referrerUrl(documentDirUrl(url)));
    return schema;
  }
}
