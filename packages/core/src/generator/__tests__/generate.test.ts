import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { mergeConfig, type PartialConfig } from '../../config/config.js';
import { ErrorCode } from '../../errors/codes.js';
import { schemaToJSON } from '../../schema/codec.js';
import { expectErr, expectOk } from '../../test-utils/result.js';
import { BufferedLogger, silentLogger } from '../../util/logger.js';
import { generateSchema, readStream } from '../generate.js';

const SCHEMA_2020 = 'https://json-schema.org/draft/2020-12/schema';

describe('generateSchema', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'schemaweave-gen-')));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function write(file: string, lines: string[]): Promise<void> {
    await fs.mkdir(path.dirname(path.join(dir, file)), { recursive: true });
    await fs.writeFile(path.join(dir, file), lines.join('\n'));
  }

  function generate(config: PartialConfig, readStdin?: () => Promise<string>) {
    return generateSchema(mergeConfig(config), { logger: silentLogger, cwd: dir, readStdin });
  }

  it('builds an object schema from one values file', async () => {
    await write('values.yaml', [
      '# @schema required',
      'name: app',
      'replicas: 3 # @schema minimum:1',
      'image:',
      '  tag: latest',
    ]);
    const schema = expectOk(await generate({ values: ['values.yaml'] }));
    expect(schemaToJSON(schema)).toEqual({
      $schema: SCHEMA_2020,
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string' },
        replicas: { type: 'integer', minimum: 1 },
        image: { type: 'object', properties: { tag: { type: 'string' } } },
      },
    });
  });

  it('merges documents in order', async () => {
    await write('a.yaml', ['a: 1', 'keep: true']);
    await write('b.yaml', ['a: text', 'b: 0.5']);
    await write('empty.yaml', ['# no values']);
    const schema = expectOk(await generate({ values: ['a.yaml', 'empty.yaml', 'b.yaml'], draft: 7 }));
    expect(schemaToJSON(schema)).toEqual({
      $schema: 'http://json-schema.org/draft-07/schema#',
      type: 'object',
      properties: {
        a: { type: 'string' },
        keep: { type: 'boolean' },
        b: { type: 'number' },
      },
    });
  });

  it('reads "-" from stdin', async () => {
    const schema = expectOk(await generate({ values: ['-'] }, async () => 'port: 80\n'));
    expect(schemaToJSON(schema)).toEqual({
      $schema: SCHEMA_2020,
      type: 'object',
      properties: { port: { type: 'integer' } },
    });
  });

  it('applies root settings', async () => {
    await write('values.yaml', ['image:', '  tag: latest']);
    const schema = expectOk(
      await generate({
        values: ['values.yaml'],
        schemaRoot: {
          id: 'https://example.com/values.schema.json',
          title: 'Values',
          description: 'Chart values',
          additionalProperties: true,
        },
      })
    );
    expect(schemaToJSON(schema)).toEqual({
      $schema: SCHEMA_2020,
      $id: 'https://example.com/values.schema.json',
      title: 'Values',
      description: 'Chart values',
      type: 'object',
      properties: { image: { type: 'object', properties: { tag: { type: 'string' } } } },
      additionalProperties: true,
    });
  });

  it('closes every object with noAdditionalProperties', async () => {
    await write('values.yaml', ['image:', '  tag: latest']);
    const schema = expectOk(await generate({ values: ['values.yaml'], noAdditionalProperties: true }));
    expect(schemaToJSON(schema)).toEqual({
      $schema: SCHEMA_2020,
      type: 'object',
      properties: {
        image: {
          type: 'object',
          properties: { tag: { type: 'string' } },
          additionalProperties: false,
        },
      },
      additionalProperties: false,
    });
  });

  it('bundles local refs into $defs', async () => {
    await write('defs/port.json', ['{"type":"integer","minimum":1}']);
    await write('values.yaml', ['# @schema $ref:defs/port.json', 'port: 80']);
    const logger = new BufferedLogger();
    const schema = expectOk(
      await generateSchema(mergeConfig({ values: ['values.yaml'], bundle: true, noCache: true }), {
        logger,
        cwd: dir,
      })
    );
    expect(schemaToJSON(schema)).toEqual({
      $schema: SCHEMA_2020,
      type: 'object',
      properties: { port: { $ref: 'defs/port.json', type: 'integer' } },
      $defs: { 'port.json': { $id: 'defs/port.json', type: 'integer', minimum: 1 } },
    });
    expect(logger.lines).toEqual([`Loading file ${path.join('defs', 'port.json')}`, '=> got 30B']);
  });

  it('bundles without ids when asked', async () => {
    await write('defs/port.json', ['{"type":"integer","minimum":1}']);
    await write('values.yaml', ['# @schema $ref:defs/port.json', 'port: 80']);
    const schema = expectOk(
      await generate({ values: ['values.yaml'], bundle: true, bundleWithoutId: true, noCache: true })
    );
    expect(schemaToJSON(schema)).toEqual({
      $schema: SCHEMA_2020,
      type: 'object',
      properties: { port: { $ref: '#/$defs/port.json', type: 'integer' } },
      $defs: { 'port.json': { type: 'integer', minimum: 1 } },
    });
  });

  it('refuses bundled files outside the bundle root', async () => {
    await write('defs/port.json', ['{"type":"integer"}']);
    await write('chart/values.yaml', ['# @schema $ref:../defs/port.json', 'port: 80']);
    const error = expectErr(
      await generate({
        values: ['chart/values.yaml'],
        bundle: true,
        bundleRoot: 'chart',
        noCache: true,
      })
    );
    expect(error.errorCode).toBe(ErrorCode.REF_OUTSIDE_ROOT);
  });

  it('validates the config first', async () => {
    const error = expectErr(await generate({}));
    expect(error.message).toBe('values flag is required');
  });

  it('reports unreadable values files', async () => {
    const error = expectErr(await generate({ values: ['missing.yaml'] }));
    expect(error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
    expect(error.message.startsWith('read --values="missing.yaml": ')).toBe(true);
  });

  it('rejects documents that are not mappings', async () => {
    await write('list.yaml', ['- a', '- b']);
    const error = expectErr(await generate({ values: ['list.yaml'] }));
    expect(error.errorCode).toBe(ErrorCode.INVALID_DOCUMENT);
    expect(error.message).toBe('list.yaml: values document must be a mapping, got a sequence');
  });

  it('names the file of a bad annotation', async () => {
    await write('bad.yaml', ['a: 1 # @schema minimun:1']);
    const error = expectErr(await generate({ values: ['bad.yaml'] }));
    expect(error.errorCode).toBe(ErrorCode.UNKNOWN_ANNOTATION);
    expect(error.message).toBe(
      'bad.yaml: parse schema: /a: parse @schema comments: unknown annotation "minimun"'
    );
    expect(error.context?.key).toBe('minimun');
  });

  it('reports YAML syntax errors', async () => {
    await write('broken.yaml', ['a: [1, 2', 'b: 3']);
    const error = expectErr(await generate({ values: ['broken.yaml'] }));
    expect(error.errorCode).toBe(ErrorCode.PARSE_ERROR);
    expect(error.message.startsWith('parse --values="broken.yaml": ')).toBe(true);
  });
});

describe('readStream', () => {
  it('concatenates string and buffer chunks', async () => {
    expect(await readStream(Readable.from(['port: ', Buffer.from('80\n')]))).toBe('port: 80\n');
  });
});
