import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { schemaFromJSON } from '../schema/codec.js';
import { isSchemaNode, type Schema } from '../schema/model.js';
import { ErrorCode } from '../errors/codes.js';
import { ResolutionError, errorMessage } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { Logger } from '../util/logger.js';
import { parseYamlValue } from '../util/yaml.js';

export interface LoadContext {
  logger: Logger;
  /** URL of the document holding the `$ref` being loaded, when known. */
  referrer?: string;
  signal?: AbortSignal;
}

export type LoadResult = Result<Schema, ResolutionError>;

/**
 * Fetches the schema fragment a resolved `$ref` points to. Implementations
 * stamp the fragment's referrer so its own relative refs keep resolving.
 */
export interface Loader {
  load(ref: URL, ctx: LoadContext): Promise<LoadResult>;
}

export function formatSizeBytes(size: number): string {
  if (size < 2_000) return `${size}B`;
  if (size < 2_000_000) return `${Math.floor(size / 1_000)}KB`;
  return `${Math.floor(size / 1_000_000)}MB`;
}

/** Short human duration: `0s`, `250ms`, `1.5s`, `2m5s`, `1h0m0s`. */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.trunc(ms));
  if (total === 0) return '0s';
  if (total < 1000) return `${total}ms`;

  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = `${Number(((total % 60_000) / 1000).toFixed(3))}s`;
  if (hours > 0) return `${hours}h${minutes}m${seconds}`;
  if (minutes > 0) return `${minutes}m${seconds}`;
  return seconds;
}

/** URL text safe for logs and errors: passwords are masked. */
export function redactUrl(url: URL): string {
  if (!url.password) return url.href;
  const copy = new URL(url.href);
  copy.password = 'xxxxx';
  return copy.href;
}

export function trimFragment(url: URL): URL {
  const copy = new URL(url.href);
  copy.hash = '';
  return copy;
}

export function loadError(
  message: string,
  ref: URL | string,
  errorCode: ErrorCode = ErrorCode.REF_LOAD_FAILED,
  cause?: unknown
): ResolutionError {
  const refText = typeof ref === 'string' ? ref : redactUrl(ref);
  return new ResolutionError({ message, errorCode, context: { ref: refText }, cause });
}

export type TextFormat = 'YAML' | 'JSON';

/**
 * Decodes fetched bytes into a schema. The text is parsed as JSON unless
 * `format` is YAML; `label` prefixes error messages.
 */
export function decodeSchemaText(
  text: string,
  format: TextFormat,
  ref: URL,
  label: (format: TextFormat) => string
): LoadResult {
  let value: unknown;
  if (format === 'YAML') {
    const parsed = parseYamlValue(text);
    if (parsed.isErr()) {
      return err(loadError(`${label(format)}: ${parsed.error.message}`, ref, ErrorCode.PARSE_ERROR, parsed.error));
    }
    value = parsed.value;
  } else {
    try {
      value = JSON.parse(text);
    } catch (cause) {
      return err(loadError(`${label(format)}: ${errorMessage(cause)}`, ref, ErrorCode.PARSE_ERROR, cause));
    }
  }
  const schema = schemaFromJSON(value);
  if (schema.isErr()) {
    return err(loadError(`${label(format)}: ${schema.error.message}`, ref, schema.error.errorCode, schema.error));
  }
  return ok(schema.value);
}

/**
 * Identifier given to a loaded fragment: for local files the path relative
 * to `basePathForIds` (forward slashes), otherwise the URL. Fragments are
 * dropped either way.
 */
export function refRelativeToBase(ref: URL, basePathForIds: string): string {
  const trimmed = trimFragment(ref);
  if (trimmed.protocol !== 'file:' || basePathForIds === '') {
    return trimmed.href;
  }
  const relative = path.relative(basePathForIds, fileURLToPath(trimmed));
  return relative.split(path.sep).join('/');
}

/**
 * Loads `ref` through `loader` and sets the fragment's `$id` relative to
 * `basePathForIds`.
 */
export async function load(
  loader: Loader,
  ref: URL | string,
  basePathForIds: string,
  ctx: LoadContext
): Promise<LoadResult> {
  if (ref === '') {
    return err(loadError('cannot load empty $ref', ref, ErrorCode.INVALID_REF));
  }
  let url: URL;
  try {
    url = typeof ref === 'string' ? new URL(ref) : ref;
  } catch (cause) {
    return err(
      loadError(`parse $ref=${JSON.stringify(ref)} as URL: invalid URL`, String(ref), ErrorCode.INVALID_REF, cause)
    );
  }

  const loaded = await loader.load(url, ctx);
  if (loaded.isErr()) return loaded;

  if (isSchemaNode(loaded.value)) {
    loaded.value.$id = refRelativeToBase(url, basePathForIds);
  }
  return loaded;
}
