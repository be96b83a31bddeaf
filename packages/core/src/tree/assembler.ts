import { compileAnnotations } from '../annotations/annotation-compiler.js';
import {
  docsAppliesTo,
  parseDocsComment,
  splitHeadComment,
} from '../annotations/docs-comment.js';
import { mergeSchemas } from '../schema/merge.js';
import {
  hasType,
  setEntry,
  type Schema,
  type SchemaMap,
  type SchemaNode,
} from '../schema/model.js';
import { AnnotationError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { Ptr } from '../util/pointer.js';
import {
  isQuoted,
  type MappingNode,
  type ScalarNode,
  type SequenceNode,
  type TreeNode,
} from './node.js';
import { getYamlKind } from './scalar-kind.js';

export interface AssembleOptions {
  /** Honour `# -- description` docs comments. */
  useDocs?: boolean;
}

export interface NodeComments {
  /** Lines handed to the annotation compiler. */
  comments: string[];
  /** Docs block carved out of the head comment, docs mode only. */
  docs: string[];
}

/**
 * Comment lines of a key/value pair, in precedence order: last head
 * paragraph, key line comment, value line comment, foot comment.
 */
export function getComments(
  key: ScalarNode | undefined,
  value: TreeNode,
  useDocs: boolean
): NodeComments {
  let comments: string[] = [];
  let docs: string[] = [];
  if (key) {
    const head = splitHeadComment(key.headComment);
    comments = head.comments;
    docs = head.docs;
    if (!useDocs) {
      comments = [...comments, ...docs];
      docs = [];
    }
    if (key.lineComment !== '') comments.push(key.lineComment);
  }
  if (value.lineComment !== '') comments.push(value.lineComment);
  if (key && key.footComment !== '') {
    comments.push(...key.footComment.split('\n'));
  }
  return { comments, docs };
}

function wrapAnnotationError(ptr: Ptr, what: string, error: AnnotationError): AnnotationError {
  return new AnnotationError({
    message: `${ptr}: ${what}: ${error.message}`,
    errorCode: error.errorCode,
    context: { ...error.context, pointer: ptr.toString() },
    cause: error,
  });
}

function assembleMapping(
  ptr: Ptr,
  node: SchemaNode,
  value: MappingNode,
  options: AssembleOptions
): Result<number, AnnotationError> {
  const properties: SchemaMap = {};
  const required: string[] = [];
  let children = 0;

  for (const entry of value.entries) {
    const name = entry.key.value;
    const child = assembleSchema(ptr.prop(name), entry.key, entry.value, options);
    if (child.isErr()) return child;

    if (child.value.hidden) continue;
    if (child.value.requiredByParent) required.push(name);
    setEntry<Schema>(properties, name, child.value);
    children++;
  }

  node.type = 'object';
  node.properties = properties;
  if (required.length > 0) node.required = required;
  return ok(children);
}

function assembleSequence(
  ptr: Ptr,
  node: SchemaNode,
  value: SequenceNode,
  options: AssembleOptions
): Result<number, AnnotationError> {
  let items: Schema | undefined;
  for (const [index, item] of value.items.entries()) {
    const itemSchema = assembleSchema(ptr.item(index), undefined, item, options);
    if (itemSchema.isErr()) return itemSchema;
    if (itemSchema.value.hidden) continue;
    items = mergeSchemas(items, itemSchema.value);
  }

  node.type = 'array';
  if (items !== undefined) node.items = items;
  return ok(value.items.length);
}

function applyDocs(
  ptr: Ptr,
  node: SchemaNode,
  docsLines: string[]
): Result<void, AnnotationError> {
  if (docsLines.length === 0) return ok(undefined);
  const docs = parseDocsComment(docsLines);
  if (docs.isErr()) {
    return err(wrapAnnotationError(ptr, 'parse docs comment', docs.error));
  }
  if (docsAppliesTo(docs.value, ptr) && docs.value.description !== '' && !node.description) {
    node.description = docs.value.description;
  }
  return ok(undefined);
}

/** Folds every property schema into one `additionalProperties` schema. */
function mergePropertiesInto(node: SchemaNode): void {
  let merged: Schema | undefined;
  for (const child of Object.values(node.properties ?? {})) {
    merged = mergeSchemas(merged, child);
  }
  if (merged !== undefined) {
    node.additionalProperties = merged;
    delete node.properties;
  }
}

/**
 * Builds the schema of one key/value pair. `key` is absent for sequence
 * items. Mappings become objects, sequences arrays with their items merged
 * into one schema, and scalars get a type inferred from their token.
 * Comments are compiled last, so annotations override inferred values.
 */
export function assembleSchema(
  ptr: Ptr,
  key: ScalarNode | undefined,
  value: TreeNode,
  options: AssembleOptions = {}
): Result<SchemaNode, AnnotationError> {
  const node: SchemaNode = {};
  let children = 0;

  switch (value.kind) {
    case 'mapping': {
      const built = assembleMapping(ptr, node, value, options);
      if (built.isErr()) return built;
      children = built.value;
      break;
    }
    case 'sequence': {
      const built = assembleSequence(ptr, node, value, options);
      if (built.isErr()) return built;
      children = built.value;
      break;
    }
    case 'scalar':
      node.type = isQuoted(value) ? 'string' : getYamlKind(value.value);
      break;
  }

  const { comments, docs } = getComments(key, value, options.useDocs ?? false);
  const compiled = compileAnnotations(node, comments);
  if (compiled.isErr()) {
    return err(wrapAnnotationError(ptr, 'parse @schema comments', compiled.error));
  }
  const documented = applyDocs(ptr, node, docs);
  if (documented.isErr()) return documented;

  if (node.skipProperties && hasType(node, 'object')) {
    delete node.properties;
  } else if (node.mergeProperties && value.kind === 'mapping' && children > 0) {
    mergePropertiesInto(node);
  }
  return ok(node);
}
