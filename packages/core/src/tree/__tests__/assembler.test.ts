import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import type { SchemaNode } from '../../schema/model.js';
import { expectErr, expectOk } from '../../test-utils/result.js';
import { Ptr } from '../../util/pointer.js';
import { assembleSchema, getComments, type AssembleOptions } from '../assembler.js';
import { mapping, scalar } from '../node.js';
import { getYamlKind } from '../scalar-kind.js';
import { parseYamlTree } from '../yaml-adapter.js';

function assemble(lines: string[], options: AssembleOptions = {}): SchemaNode {
  const tree = expectOk(parseYamlTree(lines.join('\n')));
  if (!tree) throw new Error('empty document');
  return expectOk(assembleSchema(Ptr.root, undefined, tree, options));
}

describe('getYamlKind', () => {
  it.each([
    ['3', 'integer'],
    ['-42', 'integer'],
    ['9223372036854775808', 'number'],
    ['0.5', 'number'],
    ['.inf', 'string'],
    ['inf', 'number'],
    ['true', 'boolean'],
    ['False', 'boolean'],
    ['yes', 'string'],
    ['null', 'string'],
    ['', 'null'],
  ])('%s is %s', (token, kind) => {
    expect(getYamlKind(token)).toBe(kind);
  });
});

describe('getComments', () => {
  it('orders head, key line, value line and foot comments', () => {
    const key = scalar('k', 'plain', {
      headComment: '# head',
      lineComment: '# key line',
      footComment: '# foot 1\n# foot 2',
    });
    const value = mapping([], { lineComment: '# value line' });
    expect(getComments(key, value, false)).toEqual({
      comments: ['# head', '# key line', '# value line', '# foot 1', '# foot 2'],
      docs: [],
    });
  });

  it('separates the docs block in docs mode', () => {
    const key = scalar('k', 'plain', { headComment: '# @schema minimum:1\n# -- Docs' });
    expect(getComments(key, scalar('1'), true)).toEqual({
      comments: ['# @schema minimum:1'],
      docs: ['# -- Docs'],
    });
    expect(getComments(key, scalar('1'), false)).toEqual({
      comments: ['# @schema minimum:1', '# -- Docs'],
      docs: [],
    });
  });
});

describe('assembleSchema', () => {
  it('infers types and applies inline annotations', () => {
    const schema = assemble([
      'replicas: 3 # @schema minimum:1;maximum:10',
      'ratio: 0.5',
      'enabled: true',
      'port: "8080"',
      'tilde: ~',
      'empty:',
    ]);
    expect(schema).toEqual({
      type: 'object',
      properties: {
        replicas: { type: 'integer', minimum: 1, maximum: 10 },
        ratio: { type: 'number' },
        enabled: { type: 'boolean' },
        port: { type: 'string' },
        tilde: { type: 'string' },
        empty: { type: 'null' },
      },
    });
  });

  it('builds nested objects with required and hidden keys', () => {
    const schema = assemble([
      'image:',
      '  # @schema required',
      '  repository: nginx',
      '  # @schema hidden',
      '  pullSecret: x',
    ]);
    expect(schema.properties?.image).toEqual({
      type: 'object',
      properties: { repository: { type: 'string', requiredByParent: true } },
      required: ['repository'],
    });
  });

  it('merges sequence items into one items schema', () => {
    const schema = assemble(['ports:', '  - 80', '  - 443', 'tags: []']);
    expect(schema.properties).toEqual({
      ports: { type: 'array', items: { type: 'integer' } },
      tags: { type: 'array' },
    });
  });

  it('lets annotations override the inferred type', () => {
    const schema = assemble(['# @schema type:[string, integer]', 'port: 80']);
    expect(schema.properties?.port).toEqual({ type: ['string', 'integer'] });
  });

  it('applies item annotations to empty lists', () => {
    const schema = assemble(['# @schema item:string;itemEnum:[a, b]', 'tags: []']);
    expect(schema.properties?.tags).toEqual({
      type: 'array',
      items: { type: 'string', enum: ['a', 'b'] },
    });
  });

  it('drops properties with skipProperties', () => {
    const schema = assemble(['# @schema skipProperties', 'labels:', '  app: web']);
    expect(schema.properties?.labels).toEqual({ type: 'object', skipProperties: true });
  });

  it('folds properties into additionalProperties with mergeProperties', () => {
    const schema = assemble(['# @schema mergeProperties', 'limits:', '  cpu: 1', '  memory: 2']);
    expect(schema.properties?.limits).toEqual({
      type: 'object',
      mergeProperties: true,
      additionalProperties: { type: 'integer' },
    });
  });

  it('reads descriptions from docs comments when enabled', () => {
    const lines = ['image:', '  # -- Image tag to pull', '  tag: latest'];
    expect(assemble(lines, { useDocs: true }).properties?.image).toEqual({
      type: 'object',
      properties: { tag: { type: 'string', description: 'Image tag to pull' } },
    });
    expect(assemble(lines).properties?.image).toEqual({
      type: 'object',
      properties: { tag: { type: 'string' } },
    });
  });

  it('ignores docs comments scoped to another path', () => {
    const schema = assemble(['# image.tag -- The tag', 'image:', '  tag: latest'], {
      useDocs: true,
    });
    expect(schema.properties?.image).toEqual({
      type: 'object',
      properties: { tag: { type: 'string' } },
    });
  });

  it('prefers an @schema description over docs', () => {
    const schema = assemble(['# @schema description:From schema', '# -- From docs', 'name: x'], {
      useDocs: true,
    });
    expect(schema.properties?.name).toEqual({ type: 'string', description: 'From schema' });
  });

  it('reports the pointer of a bad annotation', () => {
    const tree = expectOk(parseYamlTree('image:\n  tag: x # @schema minimun:1\n'));
    if (!tree) throw new Error('empty document');
    const error = expectErr(assembleSchema(Ptr.root, undefined, tree));
    expect(error.message).toBe('/image/tag: parse @schema comments: unknown annotation "minimun"');
    expect(error.errorCode).toBe(ErrorCode.UNKNOWN_ANNOTATION);
    expect(error.context?.pointer).toBe('/image/tag');
  });
});
