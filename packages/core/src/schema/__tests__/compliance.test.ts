import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { expectErr, expectOk } from '../../test-utils/result.js';
import { ensureCompliant } from '../compliance.js';
import type { SchemaNode } from '../model.js';

describe('ensureCompliant', () => {
  it('rejects a node nested inside itself', () => {
    const root: SchemaNode = { type: 'object', properties: {} };
    root.properties = { self: root };

    const error = expectErr(ensureCompliant(root));
    expect(error.message).toBe('/properties/self: circular reference detected in schema');
    expect(error.errorCode).toBe(ErrorCode.CIRCULAR_REFERENCE_DETECTED);
  });

  it('accepts a node shared by siblings', () => {
    const shared: SchemaNode = { type: 'string' };
    expectOk(ensureCompliant({ type: 'object', properties: { a: shared, b: shared } }));
  });

  it('closes open object schemas when asked', () => {
    const root: SchemaNode = {
      type: 'object',
      properties: {
        nested: { type: 'object' },
        open: { type: 'object', additionalProperties: true },
        name: { type: 'string' },
      },
    };
    expectOk(ensureCompliant(root, { noAdditionalProperties: true }));
    expect(root).toEqual({
      type: 'object',
      additionalProperties: false,
      properties: {
        nested: { type: 'object', additionalProperties: false },
        open: { type: 'object', additionalProperties: true },
        name: { type: 'string' },
      },
    });
  });

  it('drops type next to combinators', () => {
    const root: SchemaNode = {
      type: 'object',
      properties: { port: { type: 'integer', anyOf: [{ type: 'integer' }, { type: 'string' }] } },
    };
    expectOk(ensureCompliant(root));
    expect(root.properties?.port).toEqual({ anyOf: [{ type: 'integer' }, { type: 'string' }] });
  });
});
