import { ErrorCode } from '../errors/codes.js';
import { ConfigError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export const DRAFT_URLS = {
  4: 'http://json-schema.org/draft-04/schema#',
  6: 'http://json-schema.org/draft-06/schema#',
  7: 'http://json-schema.org/draft-07/schema#',
  2019: 'https://json-schema.org/draft/2019-09/schema',
  2020: 'https://json-schema.org/draft/2020-12/schema',
} as const;

export type Draft = keyof typeof DRAFT_URLS;

export const DEFAULT_DRAFT: Draft = 2020;

export function isDraft(value: number): value is Draft {
  return Object.prototype.hasOwnProperty.call(DRAFT_URLS, value);
}

/** Canonical `$schema` URL for a draft selector. */
export function getSchemaUrl(draft: number): Result<string, ConfigError> {
  if (!isDraft(draft)) {
    return err(
      new ConfigError({
        message:
          'invalid draft version. Please use one of: 4, 6, 7, 2019, 2020',
        errorCode: ErrorCode.INVALID_DRAFT,
        context: { setting: 'draft' },
      })
    );
  }
  return ok(DRAFT_URLS[draft]);
}
