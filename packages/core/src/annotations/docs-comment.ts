/**
 * Docs comments: the `# -- description` convention used by chart
 * documentation tools, optionally scoped with a dotted path
 * (`# image.tag -- (string) Tag to pull`).
 */

import { ErrorCode } from '../errors/codes.js';
import { AnnotationError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { Ptr } from '../util/pointer.js';
import { cutSchemaComment } from './annotation-compiler.js';

// Handles, among others:
//
//	# -- A very simple comment
//	#    --    a lot of spacing
//	# --(string)No spacing
//	# -- (tpl/array) Custom type
//	# ------- Dash overload
//	# myField."kubernetes.io/hostname" -- (string) Description
export const DOCS_COMMENT_PATTERN =
  /^#\s+(?<path>(?:\w[^\s.]*)(?:\.(?:\S+|"[^"]*"))*)?\s*--\s*(?:\((?<type>[\w/.-]+)\)\s*)?(?<desc>.*)/;

const TAG_PATTERN = /^@(?<tag>default|section|notationType)\s*--\s*(?<value>.*)$/;

export interface DocsComment {
  path: string[];
  description: string;
  type: string;
  notationType: string;
  default: string;
  section: string;
}

export function emptyDocsComment(): DocsComment {
  return {
    path: [],
    description: '',
    type: '',
    notationType: '',
    default: '',
    section: '',
  };
}

function docsError(message: string): AnnotationError {
  return new AnnotationError({ message, errorCode: ErrorCode.INVALID_DOCS_COMMENT });
}

/**
 * Splits a dotted docs path. Segments after a dot may be double-quoted to
 * contain dots or spaces; quotes inside an unquoted segment are kept as-is.
 */
export function parseDocsPath(path: string): Result<string[], AnnotationError> {
  if (path === '') {
    return ok([]);
  }
  if (path.startsWith('"')) {
    return err(docsError(`must not start with a quote: ${path}`));
  }
  const invalid = () => err(docsError(`invalid syntax: ${path}`));

  const segments: string[] = [];
  let i = 0;
  for (;;) {
    if (path[i] === '"') {
      const close = path.indexOf('"', i + 1);
      if (close === -1) return invalid();
      segments.push(path.slice(i + 1, close));
      i = close + 1;
    } else {
      let j = i;
      while (j < path.length && path[j] !== '.') {
        if (path[j] === '"') {
          const close = path.indexOf('"', j + 1);
          if (close === -1) return invalid();
          j = close + 1;
        } else {
          j++;
        }
      }
      if (j === i) return invalid();
      segments.push(path.slice(i, j));
      i = j;
    }

    if (i >= path.length) break;
    if (path[i] !== '.') {
      return err(docsError(`expected dot separator, but got '${path[i]}' in: ${path}`));
    }
    i++;
    if (i >= path.length) return invalid();
  }
  return ok(segments);
}

/**
 * Parses a docs block: the `--` line followed by continuation lines, which
 * extend the description unless they are `@default`, `@section` or
 * `@notationType` tags. Lines above the first `--` line are ignored.
 */
export function parseDocsComment(lines: readonly string[]): Result<DocsComment, AnnotationError> {
  const docs = emptyDocsComment();
  let started = false;

  for (const line of lines) {
    if (!started) {
      const match = DOCS_COMMENT_PATTERN.exec(line);
      if (!match) continue;
      started = true;

      const path = parseDocsPath(match.groups?.path ?? '');
      if (path.isErr()) return path;
      docs.path = path.value;
      docs.type = match.groups?.type ?? '';
      docs.description = (match.groups?.desc ?? '').trimEnd();
      continue;
    }

    if (cutSchemaComment(line) !== undefined) {
      return err(docsError("'# @schema' comments are not supported in docs comments"));
    }
    const text = (line.startsWith('#') ? line.slice(1) : line).trim();
    if (text === '') continue;

    const tag = TAG_PATTERN.exec(text)?.groups;
    const value = tag?.value ?? '';
    switch (tag?.tag) {
      case 'default':
        docs.default = value;
        break;
      case 'section':
        docs.section = value;
        break;
      case 'notationType':
        docs.notationType = value;
        break;
      default:
        docs.description += ` ${text}`;
    }
  }
  return ok(docs);
}

/**
 * Whether a docs comment describes the node at `ptr`. Unscoped comments
 * describe the node they are attached to.
 */
export function docsAppliesTo(docs: DocsComment, ptr: Ptr): boolean {
  if (docs.path.length === 0) {
    return true;
  }
  const parts = ptr.parts;
  return docs.path.length === parts.length && docs.path.every((seg, i) => parts[i] === seg);
}

/**
 * Keeps the last blank-line separated paragraph of a head comment and splits
 * it at the first docs line: plain comment lines above, docs block below.
 */
export function splitHeadComment(headComment: string): { comments: string[]; docs: string[] } {
  if (headComment === '') {
    return { comments: [], docs: [] };
  }
  const paragraphStart = headComment.lastIndexOf('\n\n');
  const lastParagraph =
    paragraphStart === -1 ? headComment : headComment.slice(paragraphStart + 2);
  const lines = lastParagraph.split('\n');

  const docsStart = lines.findIndex((line) => DOCS_COMMENT_PATTERN.test(line));
  if (docsStart === -1) {
    return { comments: lines, docs: [] };
  }
  return { comments: lines.slice(0, docsStart), docs: lines.slice(docsStart) };
}
