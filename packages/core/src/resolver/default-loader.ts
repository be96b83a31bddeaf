import { FileLoader } from './file-loader.js';
import { HttpLoader, type HttpClient } from './http-loader.js';
import type { HttpCache } from './http-cache.js';
import type { Loader } from './loader.js';
import { MemoLoader } from './memo-loader.js';
import { SchemeLoader } from './scheme-loader.js';

export interface DefaultLoaderOptions {
  /** Directory local refs must stay inside. Defaults to the working directory. */
  bundleRoot?: string;
  client?: HttpClient;
  cache?: HttpCache;
  userAgent?: string;
}

/**
 * Memoized loader for `http`, `https` and `file` refs.
 */
export function createDefaultLoader(options: DefaultLoaderOptions = {}): Loader {
  const fileLoader = new FileLoader(options.bundleRoot);
  const httpLoader = new HttpLoader({
    client: options.client,
    cache: options.cache,
    userAgent: options.userAgent,
  });
  return new MemoLoader(
    new SchemeLoader({
      http: httpLoader,
      https: httpLoader,
      file: fileLoader,
    })
  );
}
