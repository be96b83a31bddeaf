import type { Schema } from '../schema/model.js';
import { ok } from '../types/result.js';
import { trimFragment, type LoadContext, type LoadResult, type Loader } from './loader.js';

/**
 * Remembers every successfully loaded document, keyed by its URL without
 * fragment, and hands out the same instance on later loads. Failures are
 * not remembered.
 */
export class MemoLoader implements Loader {
  private readonly schemas = new Map<string, Schema>();

  constructor(private readonly inner: Loader) {}

  async load(ref: URL, ctx: LoadContext): Promise<LoadResult> {
    const key = trimFragment(ref).href;
    const known = this.schemas.get(key);
    if (known !== undefined) {
      return ok(known);
    }
    const loaded = await this.inner.load(ref, ctx);
    if (loaded.isOk()) {
      this.schemas.set(key, loaded.value);
    }
    return loaded;
  }
}
