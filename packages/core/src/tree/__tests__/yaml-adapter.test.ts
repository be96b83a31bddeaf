import { describe, it, expect } from 'vitest';

import { expectErr, expectOk } from '../../test-utils/result.js';
import type { MappingNode, TreeNode } from '../node.js';
import { parseYamlTree } from '../yaml-adapter.js';

function parseMapping(text: string): MappingNode {
  const tree = expectOk(parseYamlTree(text));
  if (tree?.kind !== 'mapping') {
    throw new Error(`expected a mapping, got ${tree?.kind ?? 'nothing'}`);
  }
  return tree;
}

function entry(node: TreeNode, key: string): { key: TreeNode; value: TreeNode } {
  if (node.kind !== 'mapping') throw new Error(`expected a mapping, got ${node.kind}`);
  const found = node.entries.find((e) => e.key.value === key);
  if (!found) throw new Error(`no entry ${key}`);
  return found;
}

describe('parseYamlTree', () => {
  it('returns undefined for empty documents', () => {
    expect(expectOk(parseYamlTree(''))).toBeUndefined();
    expect(expectOk(parseYamlTree('# only a comment\n'))).toBeUndefined();
  });

  it('reports syntax errors', () => {
    expectErr(parseYamlTree('a: [1, 2\nb: 3\n'));
  });

  it('keeps scalar sources and quoting styles', () => {
    const root = parseMapping("port: 8080\ntag: '1.25'\nname: \"app\"\nempty:\n");
    expect(entry(root, 'port').value).toMatchObject({ kind: 'scalar', value: '8080', style: 'plain' });
    expect(entry(root, 'tag').value).toMatchObject({ value: '1.25', style: 'single' });
    expect(entry(root, 'name').value).toMatchObject({ value: 'app', style: 'double' });
    expect(entry(root, 'empty').value).toMatchObject({ kind: 'scalar', value: '' });
  });

  it('attaches head and line comments', () => {
    const root = parseMapping(
      [
        '# Number of pods',
        '# @schema minimum:1',
        'replicas: 3 # @schema maximum:10',
        'image: # @schema title:Image',
        '  repository: nginx',
      ].join('\n')
    );
    const replicas = entry(root, 'replicas');
    expect(replicas.key.headComment).toBe('# Number of pods\n# @schema minimum:1');
    expect(replicas.key.lineComment).toBe('');
    expect(replicas.value.lineComment).toBe('# @schema maximum:10');

    const image = entry(root, 'image');
    expect(image.key.lineComment).toBe('# @schema title:Image');
    expect(image.value.kind).toBe('mapping');
  });

  it('keeps blank-line separated paragraphs in head comments', () => {
    const root = parseMapping('# first\n\n# second\nkey: v\n');
    expect(entry(root, 'key').key.headComment).toBe('# first\n\n# second');
  });

  it('attaches foot comments that close a block', () => {
    const root = parseMapping(
      ['a: 1', '# @schema type:string', '# trailing', '', 'b: 2'].join('\n')
    );
    expect(entry(root, 'a').key.footComment).toBe('# @schema type:string\n# trailing');
    expect(entry(root, 'b').key.headComment).toBe('');
  });

  it('attributes comments between entries to the next key', () => {
    const root = parseMapping(['a: 1', '# @schema hidden', 'b: 2'].join('\n'));
    expect(entry(root, 'a').key.footComment).toBe('');
    expect(entry(root, 'b').key.headComment).toBe('# @schema hidden');
  });

  it('reads line comments on sequence items', () => {
    const root = parseMapping(['list:', '  - a # @schema minLength:1', '  - b'].join('\n'));
    const list = entry(root, 'list').value;
    if (list.kind !== 'sequence') throw new Error('expected a sequence');
    expect(list.items.map((item) => item.lineComment)).toEqual(['# @schema minLength:1', '']);
  });

  it('resolves aliases', () => {
    const root = parseMapping(['base: &b', '  x: 1', 'copy: *b'].join('\n'));
    const copy = entry(root, 'copy').value;
    expect(entry(copy, 'x').value).toMatchObject({ kind: 'scalar', value: '1' });
  });

  it('normalizes CRLF line endings', () => {
    const root = parseMapping('# @schema minimum:1\r\nreplicas: 3\r\n');
    expect(entry(root, 'replicas').key.headComment).toBe('# @schema minimum:1');
  });
});
