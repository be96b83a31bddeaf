/**
 * Builds the comment-preserving tree from YAML text. Parsing is done by the
 * `yaml` package; comments are attributed from the source lines around each
 * node's range:
 *
 * - head: comment lines touching a mapping key from above, up to the
 *   previous content line (blank-line separated paragraphs kept),
 * - line: the trailing comment on the key's line for block values, or after
 *   the value for scalars and flow collections,
 * - foot: comment lines right after an entry at the key's indentation that
 *   close its block (followed by a blank line, a shallower line or the end).
 */

import {
  isAlias,
  isMap,
  isScalar,
  isSeq,
  parseAllDocuments,
  visit,
  type Document,
  type Scalar,
} from 'yaml';

import { ParseError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import {
  mapping,
  scalar,
  sequence,
  type MappingEntry,
  type ScalarNode,
  type ScalarStyle,
  type TreeNode,
} from './node.js';

type LineKind = 'blank' | 'comment' | 'content';

type NodeRange = readonly [number, number, number] | null | undefined;

const KEY_LINE_COMMENT = /^\s*:(?:\s+[&!|>][^\s#]*)*\s+(#.*)$/;
const VALUE_LINE_COMMENT = /^\s+(#.*)$/;

class SourceLines {
  readonly lines: string[];
  private readonly starts: number[] = [];
  private readonly inScalar: boolean[];
  private readonly claimed: boolean[];

  constructor(text: string) {
    this.lines = text.split('\n');
    let offset = 0;
    for (const line of this.lines) {
      this.starts.push(offset);
      offset += line.length + 1;
    }
    this.inScalar = this.lines.map(() => false);
    this.claimed = this.lines.map(() => false);
  }

  get count(): number {
    return this.lines.length;
  }

  lineOf(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }

  columnOf(offset: number): number {
    return offset - (this.starts[this.lineOf(offset)] ?? 0);
  }

  /** Lines spanned by multi-line scalars are never comments. */
  markScalar(range: NodeRange): void {
    if (!range) return;
    const first = this.lineOf(range[0]);
    const last = this.lineOf(Math.max(range[0], range[1] - 1));
    for (let line = first + 1; line <= last; line++) {
      this.inScalar[line] = true;
    }
  }

  kind(line: number): LineKind {
    const text = (this.lines[line] ?? '').trim();
    if (text === '') return 'blank';
    if (text.startsWith('#') && !this.inScalar[line]) return 'comment';
    return 'content';
  }

  indent(line: number): number {
    const text = this.lines[line] ?? '';
    return text.length - text.trimStart().length;
  }

  text(line: number): string {
    return (this.lines[line] ?? '').trim();
  }

  isClaimed(line: number): boolean {
    return this.claimed[line] ?? false;
  }

  claim(line: number): void {
    this.claimed[line] = true;
  }

  /** Rest of the line holding `offset`, from `offset` on. */
  restOfLine(offset: number): string {
    const line = this.lineOf(offset);
    const start = this.starts[line] ?? 0;
    return (this.lines[line] ?? '').slice(offset - start);
  }

  /** Last content line at or before the one holding `offset`, not above `floor`. */
  lastContentLine(offset: number, floor: number): number {
    let line = this.lineOf(Math.max(offset - 1, 0));
    while (line > floor && this.kind(line) !== 'content') {
      line--;
    }
    return line;
  }
}

interface EntryLayout {
  key: ScalarNode;
  keyLine: number;
  column: number;
  endLine: number;
}

class TreeBuilder {
  /** Block mapping entries, children before their parents. */
  readonly layouts: EntryLayout[] = [];
  private readonly resolving = new Set<unknown>();

  constructor(
    private readonly doc: Document.Parsed,
    private readonly source: SourceLines
  ) {}

  build(node: unknown): Result<TreeNode, ParseError> {
    if (node === null || node === undefined) {
      return ok(scalar(''));
    }
    if (isAlias(node)) {
      const target = node.resolve(this.doc);
      if (!target) {
        return err(new ParseError({ message: `unresolved alias *${node.source}` }));
      }
      if (this.resolving.has(target)) {
        return err(new ParseError({ message: `alias *${node.source} refers to itself` }));
      }
      this.resolving.add(target);
      const resolved = this.build(target);
      this.resolving.delete(target);
      return resolved;
    }
    if (isScalar(node)) {
      return ok(this.scalar(node));
    }
    if (isSeq(node)) {
      const items: TreeNode[] = [];
      for (const item of node.items) {
        const built = this.build(item);
        if (built.isErr()) return built;
        if (built.value.kind === 'scalar' && isScalar(item)) {
          built.value.lineComment = this.valueLineComment(item.range);
        }
        items.push(built.value);
      }
      return ok(sequence(items));
    }
    if (isMap(node)) {
      const entries: MappingEntry[] = [];
      for (const pair of node.items) {
        if (!isScalar(pair.key)) {
          return err(new ParseError({ message: 'only scalar mapping keys are supported' }));
        }
        const key = this.scalar(pair.key);
        const value = this.build(pair.value);
        if (value.isErr()) return value;
        this.attachLineComment(pair.key, key, pair.value, value.value);
        if (!node.flow) {
          this.recordLayout(pair.key.range, key, pair.value);
        }
        entries.push({ key, value: value.value });
      }
      return ok(mapping(entries));
    }
    return err(new ParseError({ message: 'unsupported YAML node' }));
  }

  private scalar(node: Scalar): ScalarNode {
    const text =
      node.source ?? (node.value === null || node.value === undefined ? '' : String(node.value));
    return scalar(text, scalarStyle(node.type));
  }

  private valueLineComment(range: NodeRange): string {
    if (!range) return '';
    return VALUE_LINE_COMMENT.exec(this.source.restOfLine(range[1]))?.[1]?.trimEnd() ?? '';
  }

  private attachLineComment(
    yamlKey: Scalar,
    key: ScalarNode,
    yamlValue: unknown,
    value: TreeNode
  ): void {
    if (isScalar(yamlValue) || isMap(yamlValue) || isSeq(yamlValue)) {
      const trailsValue = isScalar(yamlValue)
        ? yamlValue.type !== 'BLOCK_LITERAL' && yamlValue.type !== 'BLOCK_FOLDED'
        : yamlValue.flow === true;
      if (trailsValue) {
        value.lineComment = this.valueLineComment(yamlValue.range);
        if (value.lineComment !== '') return;
      }
    }
    if (yamlKey.range) {
      const rest = this.source.restOfLine(yamlKey.range[1]);
      key.lineComment = KEY_LINE_COMMENT.exec(rest)?.[1]?.trimEnd() ?? '';
    }
  }

  private recordLayout(keyRange: NodeRange, key: ScalarNode, yamlValue: unknown): void {
    if (!keyRange) return;
    const keyLine = this.source.lineOf(keyRange[0]);
    let end = keyRange[1];
    if (isScalar(yamlValue) || isMap(yamlValue) || isSeq(yamlValue) || isAlias(yamlValue)) {
      end = Math.max(end, yamlValue.range?.[1] ?? end);
    }
    this.layouts.push({
      key,
      keyLine,
      column: this.source.columnOf(keyRange[0]),
      endLine: this.source.lastContentLine(end, keyLine),
    });
  }
}

function scalarStyle(type: Scalar['type']): ScalarStyle {
  switch (type) {
    case 'QUOTE_DOUBLE':
      return 'double';
    case 'QUOTE_SINGLE':
      return 'single';
    case 'BLOCK_LITERAL':
      return 'literal';
    case 'BLOCK_FOLDED':
      return 'folded';
    default:
      return 'plain';
  }
}

function attachFootComment(source: SourceLines, layout: EntryLayout): void {
  let line = layout.endLine + 1;
  while (line < source.count && source.isClaimed(line)) line++;

  const start = line;
  while (
    line < source.count &&
    source.kind(line) === 'comment' &&
    source.indent(line) === layout.column
  ) {
    line++;
  }
  if (line === start) return;

  const closesBlock =
    line >= source.count || source.kind(line) === 'blank' || source.indent(line) < layout.column;
  if (!closesBlock) return;

  const footLines: string[] = [];
  for (let i = start; i < line; i++) {
    source.claim(i);
    footLines.push(source.text(i));
  }
  layout.key.footComment = footLines.join('\n');
}

function attachHeadComment(source: SourceLines, layout: EntryLayout): void {
  const above = layout.keyLine - 1;
  if (above < 0 || source.kind(above) !== 'comment' || source.isClaimed(above)) {
    return;
  }

  const collected: string[] = [];
  for (let line = above; line >= 0; line--) {
    const kind = source.kind(line);
    if (kind === 'content' || source.isClaimed(line)) break;
    if (kind === 'blank') {
      if (collected[0] !== '') collected.unshift('');
      continue;
    }
    collected.unshift(source.text(line));
  }
  while (collected[0] === '') collected.shift();
  layout.key.headComment = collected.join('\n');
}

/**
 * Parses the first document of `text`. Returns `undefined` for an empty
 * document. CRLF line endings are normalized first.
 */
export function parseYamlTree(text: string): Result<TreeNode | undefined, ParseError> {
  const normalized = text.replace(/\r\n/g, '\n');
  const [doc] = parseAllDocuments(normalized);
  if (!doc) {
    return ok(undefined);
  }
  const [first] = doc.errors;
  if (first) {
    return err(new ParseError({ message: first.message, cause: first }));
  }
  if (doc.contents === null) {
    return ok(undefined);
  }

  const source = new SourceLines(normalized);
  visit(doc, {
    Scalar(_key, node) {
      source.markScalar(node.range);
    },
  });

  const builder = new TreeBuilder(doc, source);
  const tree = builder.build(doc.contents);
  if (tree.isErr()) return tree;

  for (const layout of builder.layouts) {
    attachFootComment(source, layout);
  }
  for (const layout of builder.layouts) {
    attachHeadComment(source, layout);
  }
  return ok(tree.value);
}
