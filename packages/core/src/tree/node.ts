/**
 * Comment-preserving document tree the assembler walks. Every node carries
 * three comment slots; comment strings keep their `#` markers, and multi-line
 * head comments separate paragraphs with a blank line (`\n\n`).
 */

export interface CommentSlots {
  /** Comment lines directly above the node. */
  headComment: string;
  /** Trailing comment on the node's own line. */
  lineComment: string;
  /** Comment lines closing the node's block. */
  footComment: string;
}

export type ScalarStyle = 'plain' | 'single' | 'double' | 'literal' | 'folded';

export interface ScalarNode extends CommentSlots {
  kind: 'scalar';
  /** Source text of the scalar, quotes removed. */
  value: string;
  style: ScalarStyle;
}

export interface MappingEntry {
  key: ScalarNode;
  value: TreeNode;
}

export interface MappingNode extends CommentSlots {
  kind: 'mapping';
  entries: MappingEntry[];
}

export interface SequenceNode extends CommentSlots {
  kind: 'sequence';
  items: TreeNode[];
}

export type TreeNode = ScalarNode | MappingNode | SequenceNode;

function noComments(): CommentSlots {
  return { headComment: '', lineComment: '', footComment: '' };
}

export function scalar(
  value: string,
  style: ScalarStyle = 'plain',
  comments: Partial<CommentSlots> = {}
): ScalarNode {
  return { kind: 'scalar', value, style, ...noComments(), ...comments };
}

export function mapping(
  entries: MappingEntry[],
  comments: Partial<CommentSlots> = {}
): MappingNode {
  return { kind: 'mapping', entries, ...noComments(), ...comments };
}

export function sequence(items: TreeNode[], comments: Partial<CommentSlots> = {}): SequenceNode {
  return { kind: 'sequence', items, ...noComments(), ...comments };
}

export function isQuoted(node: ScalarNode): boolean {
  return node.style === 'single' || node.style === 'double';
}
