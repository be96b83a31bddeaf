import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import { ErrorCode } from '../errors/codes.js';
import { CacheError, errorMessage } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import {
  CachedResponse,
  systemClock,
  toCachedResponse,
  type Clock,
  type HttpCache,
} from './http-cache.js';

export const META_FILE = '_meta.json';
export const CONTENT_FILE = '_content';

interface CacheMeta {
  cachedAt: string;
  maxAgeMs: number;
  etag: string;
}

function isCacheMeta(value: unknown): value is CacheMeta {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'cachedAt' in value &&
    typeof value.cachedAt === 'string' &&
    'maxAgeMs' in value &&
    typeof value.maxAgeMs === 'number' &&
    'etag' in value &&
    typeof value.etag === 'string'
  );
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function expandHome(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

export function canonicalizeCacheDir(dir: string): string {
  const expanded = expandHome(dir);
  return path.resolve(expanded);
}

/**
 * Per-user cache directory of the platform, or `undefined` when none can be
 * determined.
 */
export function userCacheDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string | undefined {
  switch (platform) {
    case 'win32':
      return env.LOCALAPPDATA || undefined;
    case 'darwin':
      return env.HOME ? path.join(env.HOME, 'Library', 'Caches') : undefined;
    default:
      if (env.XDG_CACHE_HOME && path.isAbsolute(env.XDG_CACHE_HOME)) {
        return env.XDG_CACHE_HOME;
      }
      return env.HOME ? path.join(env.HOME, '.cache') : undefined;
  }
}

export function defaultCacheDir(): string {
  return path.join(userCacheDir() ?? os.tmpdir(), 'schemaweave', 'httploader');
}

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';

/** RFC 4648 base32, standard alphabet, no padding. */
export function base32(text: string): string {
  let out = '';
  let buffer = 0;
  let bits = 0;
  for (const byte of Buffer.from(text, 'utf8')) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      out += BASE32_ALPHABET.charAt((buffer >>> (bits - 5)) & 31);
      bits -= 5;
    }
    buffer &= (1 << bits) - 1;
  }
  if (bits > 0) {
    out += BASE32_ALPHABET.charAt((buffer << (5 - bits)) & 31);
  }
  return out;
}

const SAFE_SEGMENT = /^[A-Za-z0-9.-][A-Za-z0-9._-]*$/;

// Names starting with "_" belong to the cache's own files and to encoded
// segments; literal "_x" segments get encoded as well.
function cacheSegment(segment: string): string {
  if (segment === '.') return '_dot';
  if (segment === '..') return '_up';
  return SAFE_SEGMENT.test(segment) ? segment : `_${base32(segment)}`;
}

/**
 * Relative directory of a URL's cache record: scheme, host, port, then the
 * path segments.
 */
export function urlToCachePath(url: URL): string {
  const parts = [
    cacheSegment(url.protocol.replace(/:$/, '') || 'no-scheme'),
    cacheSegment(url.hostname || 'no-host'),
  ];
  if (url.port) {
    parts.push(url.port);
  }
  const segments = url.pathname.split('/').filter((segment) => segment !== '');
  if (segments.length === 0) {
    parts.push('_index');
  }
  parts.push(...segments.map(cacheSegment));
  if (url.search) {
    parts.push(`_${base32(url.search)}`);
  }
  return path.join(...parts);
}

/**
 * HTTP response cache persisted on disk, one directory per URL holding the
 * raw body and a small JSON metadata file.
 */
export class FileHttpCache implements HttpCache {
  readonly cacheDir: string;

  constructor(cacheDir: string = defaultCacheDir(), private readonly now: Clock = systemClock) {
    this.cacheDir = canonicalizeCacheDir(cacheDir);
  }

  recordDir(url: URL): string {
    return path.join(this.cacheDir, urlToCachePath(url));
  }

  async loadCache(url: URL): Promise<Result<CachedResponse | undefined, CacheError>> {
    const dir = this.recordDir(url);
    try {
      const meta: unknown = JSON.parse(await fs.readFile(path.join(dir, META_FILE), 'utf8'));
      if (!isCacheMeta(meta)) {
        return err(
          new CacheError({
            message: `read cache of ${url.href}: malformed ${META_FILE}`,
            errorCode: ErrorCode.CACHE_READ_FAILED,
          })
        );
      }
      const data = await fs.readFile(path.join(dir, CONTENT_FILE));
      return ok(
        new CachedResponse(new Date(meta.cachedAt), meta.maxAgeMs, meta.etag, new Uint8Array(data))
      );
    } catch (cause) {
      if (isNotFound(cause)) {
        return ok(undefined);
      }
      return err(
        new CacheError({
          message: `read cache of ${url.href}: ${errorMessage(cause)}`,
          errorCode: ErrorCode.CACHE_READ_FAILED,
          cause,
        })
      );
    }
  }

  async saveCache(
    url: URL,
    headers: Headers,
    body: Uint8Array
  ): Promise<Result<CachedResponse | undefined, CacheError>> {
    const cached = toCachedResponse(headers, body, this.now());
    if (!cached) {
      return ok(undefined);
    }
    const dir = this.recordDir(url);
    const meta: CacheMeta = {
      cachedAt: cached.cachedAt.toISOString(),
      maxAgeMs: cached.maxAgeMs,
      etag: cached.etag,
    };
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(path.join(dir, CONTENT_FILE), body);
      await fs.writeFile(path.join(dir, META_FILE), JSON.stringify(meta), 'utf8');
    } catch (cause) {
      return err(
        new CacheError({
          message: `write cache of ${url.href}: ${errorMessage(cause)}`,
          errorCode: ErrorCode.CACHE_WRITE_FAILED,
          cause,
        })
      );
    }
    return ok(cached);
  }
}
