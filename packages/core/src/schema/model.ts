/**
 * Schema entity model.
 *
 * A schema is either one of the boolean schemas (`true` accepts anything,
 * `false` nothing) or a {@link SchemaNode} carrying constraint keywords.
 * Boolean kinds are bare literals without constraint fields; changing kind
 * always produces a new value.
 */

import type { Referrer } from './referrer.js';
import { Ptr } from '../util/pointer.js';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type SchemaMap = Record<string, Schema>;

export interface SchemaNode {
  $schema?: string;
  $id?: string;
  title?: string;
  description?: string;
  $comment?: string;
  examples?: JsonValue[];
  readOnly?: boolean;
  default?: JsonValue;
  const?: JsonValue;
  $ref?: string;
  type?: string | string[];
  enum?: JsonValue[];
  allOf?: Schema[];
  anyOf?: Schema[];
  oneOf?: Schema[];
  not?: Schema;
  maximum?: number;
  minimum?: number;
  multipleOf?: number;
  pattern?: string;
  maxLength?: number;
  minLength?: number;
  maxItems?: number;
  minItems?: number;
  uniqueItems?: boolean;
  items?: Schema;
  additionalItems?: Schema;
  required?: string[];
  maxProperties?: number;
  minProperties?: number;
  properties?: SchemaMap;
  patternProperties?: SchemaMap;
  additionalProperties?: Schema;
  unevaluatedProperties?: boolean;
  $defs?: SchemaMap;
  definitions?: SchemaMap;

  /** Keywords this model does not know, kept verbatim from loaded fragments. */
  extraKeywords?: JsonObject;

  // Never serialized.
  /** Location the `$ref` of this node is resolved against. */
  refReferrer?: Referrer;
  hidden?: boolean;
  skipProperties?: boolean;
  mergeProperties?: boolean;
  requiredByParent?: boolean;
}

export type Schema = boolean | SchemaNode;

/** Serialized keywords, in output order. */
export const SCHEMA_KEYWORDS = [
  '$schema',
  '$id',
  'title',
  'description',
  '$comment',
  'examples',
  'readOnly',
  'default',
  'const',
  '$ref',
  'type',
  'enum',
  'allOf',
  'anyOf',
  'oneOf',
  'not',
  'maximum',
  'minimum',
  'multipleOf',
  'pattern',
  'maxLength',
  'minLength',
  'maxItems',
  'minItems',
  'uniqueItems',
  'items',
  'additionalItems',
  'required',
  'maxProperties',
  'minProperties',
  'properties',
  'patternProperties',
  'additionalProperties',
  'unevaluatedProperties',
  '$defs',
  'definitions',
] as const satisfies readonly (keyof SchemaNode)[];

export type SchemaKeyword = (typeof SCHEMA_KEYWORDS)[number];

export function isSchemaNode(schema: Schema | undefined): schema is SchemaNode {
  return typeof schema === 'object';
}

/**
 * Whether a keyword counts as set: flags must be true, values and
 * sub-schemas must be defined (so `default: false` and
 * `additionalProperties: false` count), strings, lists and maps non-empty.
 */
export function isKeywordPresent(node: SchemaNode, keyword: SchemaKeyword): boolean {
  const value = node[keyword];
  switch (keyword) {
    case 'readOnly':
    case 'uniqueItems':
      return value === true;
    case 'default':
    case 'const':
    case 'not':
    case 'items':
    case 'additionalItems':
    case 'additionalProperties':
    case 'unevaluatedProperties':
      return value !== undefined;
    default:
      return isPresent(value);
  }
}

/** Defined, and not an empty string, list or map. */
export function isPresent(value: unknown): boolean {
  if (value === undefined || value === '') return false;
  if (Array.isArray(value)) return value.length > 0;
  if (value !== null && typeof value === 'object') {
    return Object.keys(value).length > 0;
  }
  return true;
}

export function hasCombinator(node: SchemaNode): boolean {
  return (
    isPresent(node.allOf) ||
    isPresent(node.anyOf) ||
    isPresent(node.oneOf) ||
    node.not !== undefined
  );
}

/** True when `type` is, or includes, the given JSON type. */
export function hasType(node: SchemaNode, type: string): boolean {
  return Array.isArray(node.type) ? node.type.includes(type) : node.type === type;
}

/**
 * Own-property assignment that also works for keys such as `__proto__`
 * coming from values files.
 */
export function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function getEntry<T>(record: Record<string, T> | undefined, key: string): T | undefined {
  if (!record || !Object.prototype.hasOwnProperty.call(record, key)) {
    return undefined;
  }
  return record[key];
}

function sortedEntries<T>(record: Record<string, T> | undefined): [string, T][] {
  if (!record) return [];
  return Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

type SubschemaEdge = [Ptr, SchemaNode];

function* mapEdges(keyword: string, map: SchemaMap | undefined): Generator<SubschemaEdge> {
  for (const [key, sub] of sortedEntries(map)) {
    if (isSchemaNode(sub)) yield [Ptr.of(keyword, key), sub];
  }
}

function* listEdges(keyword: string, list: Schema[] | undefined): Generator<SubschemaEdge> {
  for (const [index, sub] of (list ?? []).entries()) {
    if (isSchemaNode(sub)) yield [Ptr.of(keyword, index), sub];
  }
}

function* singleEdge(keyword: string, sub: Schema | undefined): Generator<SubschemaEdge> {
  if (isSchemaNode(sub)) yield [Ptr.of(keyword), sub];
}

/**
 * Structural sub-schema edges of a node, object kinds only, in a stable order.
 * Paths are relative to the node.
 */
export function* subschemas(schema: Schema): Generator<SubschemaEdge> {
  if (!isSchemaNode(schema)) return;
  yield* mapEdges('properties', schema.properties);
  yield* singleEdge('additionalProperties', schema.additionalProperties);
  yield* mapEdges('patternProperties', schema.patternProperties);
  yield* singleEdge('items', schema.items);
  yield* singleEdge('additionalItems', schema.additionalItems);
  yield* mapEdges('$defs', schema.$defs);
  yield* mapEdges('definitions', schema.definitions);
  yield* listEdges('allOf', schema.allOf);
  yield* listEdges('anyOf', schema.anyOf);
  yield* listEdges('oneOf', schema.oneOf);
  yield* singleEdge('not', schema.not);
}

/**
 * Stamps `referrer` on every node of the tree that carries a `$ref`.
 */
export function setReferrer(schema: Schema, referrer: Referrer | undefined): void {
  if (!isSchemaNode(schema)) return;
  if (schema.$ref) {
    schema.refReferrer = referrer;
  }
  for (const [, sub] of subschemas(schema)) {
    setReferrer(sub, referrer);
  }
}
