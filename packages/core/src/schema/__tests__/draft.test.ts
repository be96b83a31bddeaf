import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { expectErr, expectOk } from '../../test-utils/result.js';
import { DEFAULT_DRAFT, getSchemaUrl, isDraft } from '../draft.js';

describe('getSchemaUrl', () => {
  it('maps every supported draft to its meta-schema URL', () => {
    expect(expectOk(getSchemaUrl(4))).toBe('http://json-schema.org/draft-04/schema#');
    expect(expectOk(getSchemaUrl(6))).toBe('http://json-schema.org/draft-06/schema#');
    expect(expectOk(getSchemaUrl(7))).toBe('http://json-schema.org/draft-07/schema#');
    expect(expectOk(getSchemaUrl(2019))).toBe('https://json-schema.org/draft/2019-09/schema');
    expect(expectOk(getSchemaUrl(DEFAULT_DRAFT))).toBe(
      'https://json-schema.org/draft/2020-12/schema'
    );
  });

  it('rejects other numbers', () => {
    const error = expectErr(getSchemaUrl(5));
    expect(error.message).toBe('invalid draft version. Please use one of: 4, 6, 7, 2019, 2020');
    expect(error.errorCode).toBe(ErrorCode.INVALID_DRAFT);
    expect(isDraft(Number.NaN)).toBe(false);
  });
});
