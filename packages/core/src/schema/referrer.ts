import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { ErrorCode } from '../errors/codes.js';
import { ResolutionError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { SchemaNode } from './model.js';

/**
 * Where a fragment was loaded from: the directory of a local file, or the
 * collection URL of a remote one. Relative `$ref`s inside the fragment are
 * resolved against it.
 */
export type Referrer =
  | { kind: 'dir'; dir: string }
  | { kind: 'url'; url: URL };

export function referrerDir(dir: string): Referrer {
  return { kind: 'dir', dir };
}

export function referrerUrl(url: URL): Referrer {
  return { kind: 'url', url: new URL(url.href) };
}

export function referrerToString(referrer: Referrer | undefined): string {
  if (!referrer) return '';
  return referrer.kind === 'dir' ? referrer.dir : referrer.url.href;
}

/**
 * A local-file `$ref`: a relative path plus optional fragment.
 */
export interface RefFile {
  path: string;
  frag: string;
}

export function refFileToString(refFile: RefFile): string {
  return refFile.frag ? `${refFile.path}#${refFile.frag}` : refFile.path;
}

const SCHEME = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;

export function refScheme(ref: string): string {
  return SCHEME.exec(ref)?.[1]?.toLowerCase() ?? '';
}

function invalidRef(ref: string, message: string): ResolutionError {
  return new ResolutionError({
    message: `parse $ref=${JSON.stringify(ref)}: ${message}`,
    errorCode: ErrorCode.INVALID_REF,
    context: { ref },
  });
}

function decodePath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Parses a `file:` or scheme-less `$ref`. Refs with any other scheme yield
 * the empty RefFile. Absolute paths, query strings and user info are
 * rejected so refs stay inside the directory tree they were written in.
 */
export function parseRefFile(ref: string): Result<RefFile, ResolutionError> {
  const scheme = refScheme(ref);
  if (ref === '' || (scheme !== '' && scheme !== 'file')) {
    return ok({ path: '', frag: '' });
  }

  let rest = ref;
  if (scheme === 'file') {
    rest = ref.slice('file:'.length);
    if (rest.startsWith('//')) {
      rest = rest.slice(2);
      if (rest === '') {
        return err(invalidRef(ref, 'unexpected empty file://'));
      }
      const authorityEnd = rest.search(/[/?#]/);
      const authority = authorityEnd === -1 ? rest : rest.slice(0, authorityEnd);
      if (authority.includes('@')) {
        return err(invalidRef(ref, 'file URL user info not supported'));
      }
    } else if (rest === '') {
      return err(invalidRef(ref, 'unexpected empty file:'));
    }
  }

  const hashIndex = rest.indexOf('#');
  const pathPart = hashIndex === -1 ? rest : rest.slice(0, hashIndex);
  const frag = hashIndex === -1 ? '' : decodePath(rest.slice(hashIndex + 1));

  if (pathPart.includes('?')) {
    return err(invalidRef(ref, 'file query parameters not supported'));
  }
  const filePath = decodePath(pathPart);
  if (filePath.startsWith('/')) {
    return err(invalidRef(ref, 'absolute paths not supported'));
  }
  return ok({ path: filePath, frag });
}

/**
 * Resolves a relative RefFile against a referrer, producing an absolute
 * `file:` or `http(s):` URL with the fragment preserved.
 */
export function joinReferrer(referrer: Referrer, refFile: RefFile): URL {
  let url: URL;
  if (referrer.kind === 'dir') {
    url = pathToFileURL(path.resolve(referrer.dir, refFile.path));
  } else {
    url = new URL(referrer.url.href);
    url.pathname = path.posix.join(url.pathname || '/', refFile.path);
    url.search = '';
  }
  url.hash = refFile.frag;
  return url;
}

/**
 * Resolves the node's `$ref` into an absolute URL using its referrer.
 * Without a referrer, local refs resolve against the working directory.
 */
export function parseRef(node: SchemaNode): Result<URL | undefined, ResolutionError> {
  const ref = node.$ref;
  if (!ref) return ok(undefined);

  const scheme = refScheme(ref);
  if (scheme !== '' && scheme !== 'file') {
    try {
      return ok(new URL(ref));
    } catch (cause) {
      return err(
        new ResolutionError({
          message: `parse $ref=${JSON.stringify(ref)} as URL: invalid URL`,
          errorCode: ErrorCode.INVALID_REF,
          context: { ref },
          cause,
        })
      );
    }
  }

  const refFile = parseRefFile(ref);
  if (refFile.isErr()) return refFile;
  return ok(
    joinReferrer(node.refReferrer ?? referrerDir(process.cwd()), refFile.value)
  );
}
