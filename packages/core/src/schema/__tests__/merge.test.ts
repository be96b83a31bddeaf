import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { mergeSchemas, uniqueAppend } from '../merge.js';
import { referrerDir } from '../referrer.js';
import type { SchemaNode } from '../model.js';

const numRuns = Number(process.env.FC_NUM_RUNS ?? 100);

const leaf: fc.Arbitrary<SchemaNode> = fc.record(
  { type: fc.constantFrom('string', 'integer'), title: fc.string() },
  { requiredKeys: ['type'] }
);

/** Fields that combine instead of shadowing; property names carry `prefix`. */
const combinedFields = (prefix: string): fc.Arbitrary<SchemaNode> =>
  fc.record(
    {
      enum: fc.array(fc.oneof(fc.string(), fc.integer()), { maxLength: 3 }),
      required: fc.array(fc.constantFrom('x', 'y', 'z'), { maxLength: 3 }),
      properties: fc.dictionary(
        fc.string({ minLength: 1, maxLength: 4 }).map((key) => `${prefix}${key}`),
        leaf,
        { maxKeys: 3 }
      ),
    },
    { requiredKeys: [] }
  );

// Each shadowing field goes to one of the three nodes, or to none (3).
const owner = fc.integer({ min: 0, max: 3 });
const shadowingFields = fc.record({
  title: fc.tuple(fc.string(), owner),
  minimum: fc.tuple(fc.integer(), owner),
  maxLength: fc.tuple(fc.nat(), owner),
  type: fc.tuple(fc.constantFrom('string', 'integer', 'object'), owner),
  items: fc.tuple(leaf, owner),
});

const anyNode: fc.Arbitrary<SchemaNode> = fc
  .tuple(combinedFields(''), shadowingFields)
  .map(([node, fields]) => ({
    ...node,
    title: fields.title[0],
    minimum: fields.minimum[0],
    type: fields.type[0],
    items: fields.items[0],
  }));

describe('mergeSchemas', () => {
  it('lets present src keywords win and keeps the rest of dest', () => {
    const dest: SchemaNode = { type: 'string', title: 'old', minLength: 1 };
    const src: SchemaNode = { title: 'new', description: '' };
    expect(mergeSchemas(dest, src)).toEqual({ type: 'string', title: 'new', minLength: 1 });
  });

  it('merges properties recursively', () => {
    const dest: SchemaNode = {
      type: 'object',
      properties: { a: { type: 'string', title: 'A' }, b: { type: 'integer' } },
    };
    const src: SchemaNode = { properties: { a: { minLength: 3 }, c: true } };
    expect(mergeSchemas(dest, src)).toEqual({
      type: 'object',
      properties: {
        a: { type: 'string', title: 'A', minLength: 3 },
        b: { type: 'integer' },
        c: true,
      },
    });
  });

  it('concatenates enums and unions required', () => {
    const merged = mergeSchemas(
      { enum: ['a'], required: ['x', 'y'] },
      { enum: ['b'], required: ['y', 'z'] }
    );
    expect(merged).toEqual({ enum: ['a', 'b'], required: ['x', 'y', 'z'] });
  });

  it('moves the referrer together with the $ref', () => {
    const merged = mergeSchemas(
      { $ref: 'a.json', refReferrer: referrerDir('/one') },
      { $ref: 'b.json', refReferrer: referrerDir('/two') }
    );
    expect(merged).toEqual({ $ref: 'b.json', refReferrer: referrerDir('/two') });
  });

  it('handles boolean schemas', () => {
    expect(mergeSchemas({ type: 'string' }, false)).toBe(false);
    expect(mergeSchemas(true, { type: 'string' })).toBe(true);
    expect(mergeSchemas(undefined, { type: 'string' })).toEqual({ type: 'string' });
  });

  it('does not mutate its inputs', () => {
    const dest: SchemaNode = { properties: { a: { type: 'string' } } };
    const src: SchemaNode = { properties: { a: { minLength: 1 } } };
    mergeSchemas(dest, src);
    expect(dest).toEqual({ properties: { a: { type: 'string' } } });
    expect(src).toEqual({ properties: { a: { minLength: 1 } } });
  });

  it('merging into an empty node reproduces src', () => {
    fc.assert(
      fc.property(
        fc.record({
          title: fc.string({ minLength: 1 }),
          minimum: fc.integer(),
          type: fc.constantFrom('string', 'integer', 'object'),
        }),
        (src) => {
          expect(mergeSchemas({}, src)).toEqual(src);
        }
      ),
      { numRuns }
    );
  });

  it('merging an empty node into any node keeps it', () => {
    fc.assert(
      fc.property(anyNode, (node) => {
        expect(mergeSchemas(node, {})).toEqual(node);
        expect(mergeSchemas(node, undefined)).toBe(node);
      }),
      { numRuns }
    );
  });

  it('is associative when nodes set independent fields', () => {
    fc.assert(
      fc.property(
        combinedFields('a.'),
        combinedFields('b.'),
        combinedFields('c.'),
        shadowingFields,
        (partA, partB, partC, fields) => {
          const nodes: SchemaNode[] = [{ ...partA }, { ...partB }, { ...partC }];
          const assign = (index: number, set: (node: SchemaNode) => void) => {
            const node = nodes[index];
            if (node) set(node);
          };
          assign(fields.title[1], (node) => (node.title = fields.title[0]));
          assign(fields.minimum[1], (node) => (node.minimum = fields.minimum[0]));
          assign(fields.maxLength[1], (node) => (node.maxLength = fields.maxLength[0]));
          assign(fields.type[1], (node) => (node.type = fields.type[0]));
          assign(fields.items[1], (node) => (node.items = fields.items[0]));
          const [a = {}, b = {}, c = {}] = nodes;

          expect(mergeSchemas(mergeSchemas(a, b), c)).toEqual(
            mergeSchemas(a, mergeSchemas(b, c))
          );
        }
      ),
      { numRuns }
    );
  });
});

describe('uniqueAppend', () => {
  it('keeps every value once, in first-seen order', () => {
    fc.assert(
      fc.property(fc.array(fc.string()), fc.array(fc.string()), (dest, src) => {
        const merged = uniqueAppend(dest, src);
        expect(new Set(merged).size).toBe(merged.length);
        expect(new Set(merged)).toEqual(new Set([...dest, ...src]));
        expect(merged).toEqual([...new Set([...dest, ...src])]);
      }),
      { numRuns }
    );
  });
});
