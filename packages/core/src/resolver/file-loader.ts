import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { ErrorCode } from '../errors/codes.js';
import { referrerDir } from '../schema/referrer.js';
import { setReferrer } from '../schema/model.js';
import { errorMessage, type ResolutionError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import {
  decodeSchemaText,
  formatSizeBytes,
  loadError,
  type LoadContext,
  type LoadResult,
  type Loader,
} from './loader.js';

function escapesRoot(relative: string): boolean {
  return (
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  );
}

/**
 * Loads `file:` refs from disk. Every file must live under `root`, also
 * after following symlinks.
 */
export class FileLoader implements Loader {
  readonly root: string;
  private realRoot: Promise<string> | undefined;

  constructor(root: string = process.cwd()) {
    this.root = path.resolve(root);
  }

  async load(ref: URL, ctx: LoadContext): Promise<LoadResult> {
    if (ref.protocol !== 'file:') {
      return err(
        loadError(
          `file url in $ref=${JSON.stringify(ref.href)} must start with "file://", "./", or "/"`,
          ref,
          ErrorCode.UNSUPPORTED_REF_SCHEME
        )
      );
    }

    let absolute: string;
    try {
      absolute = fileURLToPath(ref);
    } catch (cause) {
      return err(loadError(`parse file url: ${errorMessage(cause)}`, ref, ErrorCode.INVALID_REF, cause));
    }

    const relative = path.relative(this.root, absolute);
    if (relative === '') {
      return err(loadError(`file url in $ref=${JSON.stringify(ref.href)} must contain a path`, ref, ErrorCode.INVALID_REF));
    }
    const inside = await this.checkInsideRoot(ref, absolute, relative);
    if (inside.isErr()) return inside;

    ctx.logger.log('Loading file', relative);
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(absolute);
    } catch (cause) {
      return err(loadError(`read file ${relative}: ${errorMessage(cause)}`, ref, ErrorCode.REF_LOAD_FAILED, cause));
    }
    ctx.logger.logf('=> got %s', formatSizeBytes(bytes.length));

    const ext = path.extname(absolute).toLowerCase();
    const format = ext === '.yml' || ext === '.yaml' ? 'YAML' : 'JSON';
    const decoded = decodeSchemaText(bytes.toString('utf8'), format, ref, (f) => `parse ${f} file`);
    if (decoded.isErr()) return decoded;

    setReferrer(decoded.value, referrerDir(path.dirname(absolute)));
    return decoded;
  }

  private async checkInsideRoot(
    ref: URL,
    absolute: string,
    relative: string
  ): Promise<Result<void, ResolutionError>> {
    const escaped = () =>
      err(
        loadError(
          `open ${relative}: path escapes from parent`,
          ref,
          ErrorCode.REF_OUTSIDE_ROOT
        )
      );
    if (escapesRoot(relative)) {
      return escaped();
    }

    let real: string;
    try {
      this.realRoot ??= fs.realpath(this.root);
      const realRoot = await this.realRoot;
      real = path.relative(realRoot, await fs.realpath(absolute));
    } catch (cause) {
      return err(loadError(`open ${relative}: ${errorMessage(cause)}`, ref, ErrorCode.REF_LOAD_FAILED, cause));
    }
    return escapesRoot(real) ? escaped() : ok(undefined);
  }
}
