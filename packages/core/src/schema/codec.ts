/**
 * Conversion between Schema values and plain JSON values.
 */

import { stringify as stringifyYaml } from 'yaml';

import { SchemaStructureError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { Ptr } from '../util/pointer.js';
import {
  SCHEMA_KEYWORDS,
  isKeywordPresent,
  isSchemaNode,
  setEntry,
  type JsonObject,
  type JsonValue,
  type Schema,
  type SchemaMap,
  type SchemaNode,
} from './model.js';

type DecodeResult<T> = Result<T, SchemaStructureError>;

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function mistyped(ptr: Ptr, expected: string, value: unknown): SchemaStructureError {
  return new SchemaStructureError({
    message: `${ptr}: expected ${expected}, got ${typeName(value)}`,
    context: { pointer: ptr.toString() },
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks that a decoded YAML/JSON value only contains JSON data.
 */
export function toJsonValue(value: unknown, ptr: Ptr = Ptr.root): DecodeResult<JsonValue> {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return ok(value);
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? ok(value) : err(mistyped(ptr, 'finite number', value));
  }
  if (Array.isArray(value)) {
    const list: JsonValue[] = [];
    for (const [index, item] of value.entries()) {
      const converted = toJsonValue(item, ptr.item(index));
      if (converted.isErr()) return converted;
      list.push(converted.value);
    }
    return ok(list);
  }
  if (isPlainObject(value)) {
    const object: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item, ptr.prop(key));
      if (converted.isErr()) return converted;
      setEntry(object, key, converted.value);
    }
    return ok(object);
  }
  return err(mistyped(ptr, 'JSON value', value));
}

function decodeString(value: unknown, ptr: Ptr): DecodeResult<string> {
  return typeof value === 'string' ? ok(value) : err(mistyped(ptr, 'string', value));
}

function decodeBoolean(value: unknown, ptr: Ptr): DecodeResult<boolean> {
  return typeof value === 'boolean' ? ok(value) : err(mistyped(ptr, 'boolean', value));
}

function decodeNumber(value: unknown, ptr: Ptr): DecodeResult<number> {
  return typeof value === 'number' && Number.isFinite(value)
    ? ok(value)
    : err(mistyped(ptr, 'number', value));
}

function decodeUnsigned(value: unknown, ptr: Ptr): DecodeResult<number> {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
    ? ok(value)
    : err(mistyped(ptr, 'non-negative integer', value));
}

function decodeList(value: unknown, ptr: Ptr): DecodeResult<JsonValue[]> {
  if (!Array.isArray(value)) return err(mistyped(ptr, 'array', value));
  const converted = toJsonValue(value, ptr);
  return converted.isErr() ? converted : ok(Array.isArray(converted.value) ? converted.value : []);
}

function decodeStringList(value: unknown, ptr: Ptr): DecodeResult<string[]> {
  if (!Array.isArray(value)) return err(mistyped(ptr, 'array of strings', value));
  const list: string[] = [];
  for (const [index, item] of value.entries()) {
    const decoded = decodeString(item, ptr.item(index));
    if (decoded.isErr()) return decoded;
    list.push(decoded.value);
  }
  return ok(list);
}

function decodeType(value: unknown, ptr: Ptr): DecodeResult<string | string[]> {
  return typeof value === 'string' ? ok(value) : decodeStringList(value, ptr);
}

export function schemaListFromJSON(value: unknown, ptr: Ptr = Ptr.root): DecodeResult<Schema[]> {
  if (!Array.isArray(value)) return err(mistyped(ptr, 'array of schemas', value));
  const list: Schema[] = [];
  for (const [index, item] of value.entries()) {
    const decoded = schemaFromJSON(item, ptr.item(index));
    if (decoded.isErr()) return decoded;
    list.push(decoded.value);
  }
  return ok(list);
}

export function schemaMapFromJSON(value: unknown, ptr: Ptr = Ptr.root): DecodeResult<SchemaMap> {
  if (!isPlainObject(value)) return err(mistyped(ptr, 'map of schemas', value));
  const map: SchemaMap = {};
  for (const [key, item] of Object.entries(value)) {
    const decoded = schemaFromJSON(item, ptr.prop(key));
    if (decoded.isErr()) return decoded;
    setEntry(map, key, decoded.value);
  }
  return ok(map);
}

/**
 * Decodes one keyword into the node. Returns false for keywords the model
 * does not know.
 */
function decodeKeyword(
  node: SchemaNode,
  key: string,
  value: unknown,
  ptr: Ptr
): DecodeResult<boolean> {
  const at = ptr.prop(key);
  const assign = <T>(result: DecodeResult<T>, set: (decoded: T) => void): DecodeResult<boolean> => {
    if (result.isErr()) return result;
    set(result.value);
    return ok(true);
  };

  switch (key) {
    case '$schema':
      return assign(decodeString(value, at), (v) => (node.$schema = v));
    case '$id':
      return assign(decodeString(value, at), (v) => (node.$id = v));
    case 'title':
      return assign(decodeString(value, at), (v) => (node.title = v));
    case 'description':
      return assign(decodeString(value, at), (v) => (node.description = v));
    case '$comment':
      return assign(decodeString(value, at), (v) => (node.$comment = v));
    case '$ref':
      return assign(decodeString(value, at), (v) => (node.$ref = v));
    case 'pattern':
      return assign(decodeString(value, at), (v) => (node.pattern = v));
    case 'readOnly':
      return assign(decodeBoolean(value, at), (v) => (node.readOnly = v));
    case 'uniqueItems':
      return assign(decodeBoolean(value, at), (v) => (node.uniqueItems = v));
    case 'unevaluatedProperties':
      return assign(decodeBoolean(value, at), (v) => (node.unevaluatedProperties = v));
    case 'maximum':
      return assign(decodeNumber(value, at), (v) => (node.maximum = v));
    case 'minimum':
      return assign(decodeNumber(value, at), (v) => (node.minimum = v));
    case 'multipleOf':
      return assign(decodeNumber(value, at), (v) => (node.multipleOf = v));
    case 'maxLength':
      return assign(decodeUnsigned(value, at), (v) => (node.maxLength = v));
    case 'minLength':
      return assign(decodeUnsigned(value, at), (v) => (node.minLength = v));
    case 'maxItems':
      return assign(decodeUnsigned(value, at), (v) => (node.maxItems = v));
    case 'minItems':
      return assign(decodeUnsigned(value, at), (v) => (node.minItems = v));
    case 'maxProperties':
      return assign(decodeUnsigned(value, at), (v) => (node.maxProperties = v));
    case 'minProperties':
      return assign(decodeUnsigned(value, at), (v) => (node.minProperties = v));
    case 'default':
      return assign(toJsonValue(value, at), (v) => (node.default = v));
    case 'const':
      return assign(toJsonValue(value, at), (v) => (node.const = v));
    case 'enum':
      return assign(decodeList(value, at), (v) => (node.enum = v));
    case 'examples':
      return assign(decodeList(value, at), (v) => (node.examples = v));
    case 'type':
      return assign(decodeType(value, at), (v) => (node.type = v));
    case 'required':
      return assign(decodeStringList(value, at), (v) => (node.required = v));
    case 'not':
      return assign(schemaFromJSON(value, at), (v) => (node.not = v));
    case 'items':
      return assign(schemaFromJSON(value, at), (v) => (node.items = v));
    case 'additionalItems':
      return assign(schemaFromJSON(value, at), (v) => (node.additionalItems = v));
    case 'additionalProperties':
      return assign(schemaFromJSON(value, at), (v) => (node.additionalProperties = v));
    case 'allOf':
      return assign(schemaListFromJSON(value, at), (v) => (node.allOf = v));
    case 'anyOf':
      return assign(schemaListFromJSON(value, at), (v) => (node.anyOf = v));
    case 'oneOf':
      return assign(schemaListFromJSON(value, at), (v) => (node.oneOf = v));
    case 'properties':
      return assign(schemaMapFromJSON(value, at), (v) => (node.properties = v));
    case 'patternProperties':
      return assign(schemaMapFromJSON(value, at), (v) => (node.patternProperties = v));
    case '$defs':
      return assign(schemaMapFromJSON(value, at), (v) => (node.$defs = v));
    case 'definitions':
      return assign(schemaMapFromJSON(value, at), (v) => (node.definitions = v));
    default:
      return ok(false);
  }
}

/**
 * Decodes a parsed JSON/YAML document into a Schema. Fails on the first
 * keyword whose value has the wrong shape, naming its pointer.
 */
export function schemaFromJSON(value: unknown, ptr: Ptr = Ptr.root): DecodeResult<Schema> {
  if (typeof value === 'boolean') {
    return ok(value);
  }
  if (!isPlainObject(value)) {
    return err(mistyped(ptr, 'schema object or boolean', value));
  }

  const node: SchemaNode = {};
  for (const [key, item] of Object.entries(value)) {
    const decoded = decodeKeyword(node, key, item, ptr);
    if (decoded.isErr()) return decoded;
    if (decoded.value) continue;

    const extra = toJsonValue(item, ptr.prop(key));
    if (extra.isErr()) return extra;
    node.extraKeywords ??= {};
    setEntry(node.extraKeywords, key, extra.value);
  }
  return ok(node);
}

function mapToJSON(map: SchemaMap): JsonObject {
  const out: JsonObject = {};
  for (const key of Object.keys(map).sort()) {
    const sub = map[key];
    if (sub !== undefined) setEntry(out, key, schemaToJSON(sub));
  }
  return out;
}

function keywordToJSON(node: SchemaNode, keyword: (typeof SCHEMA_KEYWORDS)[number]): JsonValue {
  switch (keyword) {
    case 'allOf':
    case 'anyOf':
    case 'oneOf':
      return (node[keyword] ?? []).map(schemaToJSON);
    case 'not':
    case 'items':
    case 'additionalItems':
    case 'additionalProperties': {
      const sub = node[keyword];
      return sub === undefined ? null : schemaToJSON(sub);
    }
    case 'properties':
    case 'patternProperties':
    case '$defs':
    case 'definitions':
      return mapToJSON(node[keyword] ?? {});
    default:
      return node[keyword] ?? null;
  }
}

/**
 * Plain JSON form of a schema: keywords in canonical order, map keys sorted,
 * directives and referrers dropped, boolean kinds as bare `true`/`false`.
 */
export function schemaToJSON(schema: Schema): JsonValue {
  if (!isSchemaNode(schema)) {
    return schema;
  }
  const out: JsonObject = {};
  for (const keyword of SCHEMA_KEYWORDS) {
    if (isKeywordPresent(schema, keyword)) {
      setEntry(out, keyword, keywordToJSON(schema, keyword));
    }
  }
  for (const [key, value] of Object.entries(schema.extraKeywords ?? {})) {
    if (!Object.prototype.hasOwnProperty.call(out, key)) {
      setEntry(out, key, value);
    }
  }
  return out;
}

export type OutputFormat = 'json' | 'yaml';

export interface FormatOptions {
  format?: OutputFormat;
  indent?: number;
}

export function formatSchema(schema: Schema, options: FormatOptions = {}): string {
  const indent = options.indent ?? 4;
  const value = schemaToJSON(schema);
  if (options.format === 'yaml') {
    return stringifyYaml(value, { indent });
  }
  return JSON.stringify(value, null, indent) + '\n';
}
