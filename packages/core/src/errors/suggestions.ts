/**
 * Suggestion helpers
 * Pure functions that turn an error into a one-line hint for the CLI.
 */

import { ANNOTATION_KEYS } from '../annotations/annotation-compiler.js';
import type { WeaveError } from '../types/errors.js';
import { ErrorCode } from './codes.js';

/**
 * Edit-distance approximation: positional character differences plus the
 * length delta. Enough for small typos.
 */
export function calculateDistance(a: string, b: string): number {
  const longer = a.length > b.length ? a : b;
  const shorter = a.length > b.length ? b : a;
  if (longer.length === 0) return shorter.length;
  if (shorter.length === 0) return longer.length;

  let distance = longer.length - shorter.length;
  for (let i = 0; i < shorter.length; i++) {
    if (shorter[i] !== longer[i]) distance++;
  }
  return distance;
}

/**
 * Up to 3 close matches for a misspelt string, closest first.
 */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 3
): string[] {
  return validOptions
    .map((option) => ({ option, distance: calculateDistance(input, option) }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(({ option }) => option);
}

const WORKAROUNDS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.REF_OUTSIDE_ROOT]:
    'Point --bundleRoot at a directory containing every referenced file',
  [ErrorCode.UNSUPPORTED_REF_SCHEME]:
    'Use a relative path, an absolute path, or an http(s) URL in $ref',
  [ErrorCode.CACHE_READ_FAILED]: 'Run with --noCache or remove the cache directory',
  [ErrorCode.CACHE_WRITE_FAILED]: 'Run with --noCache or choose another --cacheDir',
  [ErrorCode.INVALID_DRAFT]: 'Pass --draft with one of 4, 6, 7, 2019, 2020',
  [ErrorCode.CIRCULAR_REFERENCE_DETECTED]:
    'Replace the repeated subschema with a $ref to a shared definition',
};

/**
 * Hint for `error`, if one applies: a close annotation name for an unknown
 * `@schema` key, otherwise a fixed workaround per error code.
 */
export function getWorkaround(error: WeaveError): string | undefined {
  const key = error.context?.key;
  if (error.errorCode === ErrorCode.UNKNOWN_ANNOTATION && key !== undefined) {
    const matches = didYouMean(key, ANNOTATION_KEYS, 2);
    if (matches.length > 0) {
      return `Did you mean ${matches.map((match) => JSON.stringify(match)).join(' or ')}?`;
    }
    return undefined;
  }
  return WORKAROUNDS[error.errorCode];
}
