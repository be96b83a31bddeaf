import { ErrorCode } from '../errors/codes.js';
import { err } from '../types/result.js';
import { loadError, redactUrl, type LoadContext, type LoadResult, type Loader } from './loader.js';

/**
 * Dispatches to a loader by URL scheme (`http`, `file`, ...).
 */
export class SchemeLoader implements Loader {
  private readonly loaders: ReadonlyMap<string, Loader>;

  constructor(loaders: Record<string, Loader>) {
    this.loaders = new Map(Object.entries(loaders));
  }

  get schemes(): string[] {
    return [...this.loaders.keys()].sort();
  }

  async load(ref: URL, ctx: LoadContext): Promise<LoadResult> {
    const scheme = ref.protocol.replace(/:$/, '');
    const loader = this.loaders.get(scheme);
    if (!loader) {
      return err(
        loadError(
          `cannot load schema from $ref=${JSON.stringify(redactUrl(ref))}, supported schemes: ${this.schemes.join(',')}`,
          ref,
          ErrorCode.UNSUPPORTED_REF_SCHEME
        )
      );
    }
    return loader.load(ref, ctx);
  }
}
