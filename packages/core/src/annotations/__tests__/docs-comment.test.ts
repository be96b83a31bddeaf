import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { expectErr, expectOk } from '../../test-utils/result.js';
import { Ptr } from '../../util/pointer.js';
import {
  DOCS_COMMENT_PATTERN,
  docsAppliesTo,
  emptyDocsComment,
  parseDocsComment,
  parseDocsPath,
  splitHeadComment,
} from '../docs-comment.js';

describe('DOCS_COMMENT_PATTERN', () => {
  it.each([
    ['# -- A very simple comment', '', '', 'A very simple comment'],
    ['#    --    a lot of spacing', '', '', 'a lot of spacing'],
    ['# --(string)No spacing', '', 'string', 'No spacing'],
    ['# -- (tpl/array) Custom type', '', 'tpl/array', 'Custom type'],
    ['# image.tag -- Tag to pull', 'image.tag', '', 'Tag to pull'],
  ])('matches %s', (line, path, type, desc) => {
    const groups = DOCS_COMMENT_PATTERN.exec(line)?.groups;
    expect(groups?.path ?? '').toBe(path);
    expect(groups?.type ?? '').toBe(type);
    expect(groups?.desc).toBe(desc);
  });

  it('does not match plain comments', () => {
    expect(DOCS_COMMENT_PATTERN.test('# plain comment')).toBe(false);
  });
});

describe('parseDocsPath', () => {
  it('splits dotted and quoted segments', () => {
    expect(expectOk(parseDocsPath('nodeSelector."kubernetes.io/hostname"'))).toEqual([
      'nodeSelector',
      'kubernetes.io/hostname',
    ]);
    expect(expectOk(parseDocsPath(''))).toEqual([]);
  });

  it('rejects malformed paths', () => {
    expect(expectErr(parseDocsPath('"quoted"')).message).toBe('must not start with a quote: "quoted"');
    expect(expectErr(parseDocsPath('a.')).message).toBe('invalid syntax: a.');
    expect(expectErr(parseDocsPath('a."b"c')).message).toBe(
      "expected dot separator, but got 'c' in: a.\"b\"c"
    );
  });
});

describe('parseDocsComment', () => {
  it('reads continuation lines and tags', () => {
    const docs = expectOk(
      parseDocsComment([
        '# unrelated line above',
        '# -- (int) Number of replicas',
        '# to run',
        '# @default -- 3',
        '# @section -- Scaling',
      ])
    );
    expect(docs).toEqual({
      ...emptyDocsComment(),
      type: 'int',
      description: 'Number of replicas to run',
      default: '3',
      section: 'Scaling',
    });
  });

  it('rejects @schema lines inside the block', () => {
    const error = expectErr(parseDocsComment(['# -- Replicas', '# @schema minimum:1']));
    expect(error.message).toBe("'# @schema' comments are not supported in docs comments");
    expect(error.errorCode).toBe(ErrorCode.INVALID_DOCS_COMMENT);
  });
});

describe('docsAppliesTo', () => {
  it('matches unscoped comments and exact paths', () => {
    const scoped = { ...emptyDocsComment(), path: ['image', 'tag'] };
    expect(docsAppliesTo(emptyDocsComment(), Ptr.of('anything'))).toBe(true);
    expect(docsAppliesTo(scoped, Ptr.of('image', 'tag'))).toBe(true);
    expect(docsAppliesTo(scoped, Ptr.of('image'))).toBe(false);
  });
});

describe('splitHeadComment', () => {
  it('keeps the last paragraph and splits at the docs line', () => {
    expect(splitHeadComment('# license text\n\n# @schema minimum:1\n# -- Replicas\n# more')).toEqual({
      comments: ['# @schema minimum:1'],
      docs: ['# -- Replicas', '# more'],
    });
    expect(splitHeadComment('# @schema type:string')).toEqual({
      comments: ['# @schema type:string'],
      docs: [],
    });
  });
});
