import { ErrorCode } from '../errors/codes.js';
import {
  schemaFromJSON,
  schemaListFromJSON,
  schemaMapFromJSON,
  toJsonValue,
} from '../schema/codec.js';
import { hasType, isSchemaNode, type Schema, type SchemaNode } from '../schema/model.js';
import { AnnotationError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import {
  coerceBoolean,
  coerceList,
  coerceNumber,
  coerceObject,
  coerceTypeList,
  coerceUnsigned,
  type Coerced,
} from './coerce.js';

export interface AnnotationClause {
  key: string;
  value: string;
}

/**
 * Turns `# @schema foo bar` into `foo bar`. The marker must be followed by
 * whitespace, so `# @schemafoo` is an ordinary comment.
 */
export function cutSchemaComment(line: string): string | undefined {
  const withoutPound = (line.startsWith('#') ? line.slice(1) : line).trim();
  if (!withoutPound.startsWith('@schema')) {
    return undefined;
  }
  const rest = withoutPound.slice('@schema'.length);
  const trimmed = rest.trim();
  if (trimmed.length === rest.length) {
    return undefined;
  }
  return trimmed;
}

/** Clauses of every directive line, in source order. */
export function* splitClauses(lines: readonly string[]): Generator<AnnotationClause> {
  for (const line of lines) {
    const body = cutSchemaComment(line);
    if (body === undefined) continue;

    for (const part of body.split(';')) {
      const colon = part.indexOf(':');
      const key = colon === -1 ? part : part.slice(0, colon);
      const value = colon === -1 ? '' : part.slice(colon + 1);
      yield { key: key.trim(), value: value.trim() };
    }
  }
}

type Apply = (node: SchemaNode, value: string) => Coerced<void>;

function objectValue<T>(
  value: string,
  decode: (parsed: unknown) => Result<T, { message: string }>
): Coerced<T> {
  const parsed = coerceObject(value);
  if (parsed.isErr()) return parsed;
  const decoded = decode(parsed.value);
  if (decoded.isErr()) {
    return err(`parse object ${JSON.stringify(value.trim())}: ${decoded.error.message}`);
  }
  return ok(decoded.value);
}

/** A YAML `null` clears the field instead of decoding. */
function orClear<T>(
  decode: (parsed: unknown) => Result<T, { message: string }>
): (parsed: unknown) => Result<T | undefined, { message: string }> {
  return (parsed) => (parsed === null ? ok(undefined) : decode(parsed));
}

function setWith<T>(coerced: Coerced<T>, set: (value: T) => void): Coerced<void> {
  if (coerced.isErr()) return coerced;
  set(coerced.value);
  return ok(undefined);
}

/** Copy-on-write access to `items`, turning boolean kinds into an empty node. */
function withItems(node: SchemaNode, update: (items: SchemaNode) => void): void {
  const items: SchemaNode = isSchemaNode(node.items) ? { ...node.items } : {};
  update(items);
  node.items = items;
}

const booleanField =
  (set: (node: SchemaNode, value: boolean) => void): Apply =>
  (node, value) =>
    setWith(coerceBoolean(value), (v) => set(node, v));

const unsignedField =
  (set: (node: SchemaNode, value: number | undefined) => void): Apply =>
  (node, value) =>
    setWith(coerceUnsigned(value), (v) => set(node, v));

const numberField =
  (set: (node: SchemaNode, value: number | undefined) => void): Apply =>
  (node, value) =>
    setWith(coerceNumber(value), (v) => set(node, v));

const schemaField =
  (set: (node: SchemaNode, value: Schema | undefined) => void): Apply =>
  (node, value) =>
    setWith(objectValue(value, orClear((parsed) => schemaFromJSON(parsed))), (v) => set(node, v));

const schemaListField =
  (set: (node: SchemaNode, value: Schema[] | undefined) => void): Apply =>
  (node, value) =>
    setWith(objectValue(value, orClear((parsed) => schemaListFromJSON(parsed))), (v) =>
      set(node, v)
    );

const APPLIERS: Record<string, Apply> = {
  type: (node, value) => {
    node.type = coerceTypeList(value);
    return ok(undefined);
  },
  enum: (node, value) => {
    node.enum = coerceList(value, false);
    return ok(undefined);
  },
  examples: (node, value) => {
    node.examples = coerceList(value, false);
    return ok(undefined);
  },
  title: (node, value) => {
    node.title = value;
    return ok(undefined);
  },
  description: (node, value) => {
    node.description = value;
    return ok(undefined);
  },
  pattern: (node, value) => {
    node.pattern = value;
    return ok(undefined);
  },
  $id: (node, value) => {
    node.$id = value;
    return ok(undefined);
  },
  $ref: (node, value) => {
    node.$ref = value;
    return ok(undefined);
  },

  minimum: numberField((node, v) => (node.minimum = v)),
  maximum: numberField((node, v) => (node.maximum = v)),
  // Zero and negative divisors leave the field unset.
  multipleOf: numberField((node, v) => (node.multipleOf = v !== undefined && v > 0 ? v : undefined)),

  minLength: unsignedField((node, v) => (node.minLength = v)),
  maxLength: unsignedField((node, v) => (node.maxLength = v)),
  minItems: unsignedField((node, v) => (node.minItems = v)),
  maxItems: unsignedField((node, v) => (node.maxItems = v)),
  minProperties: unsignedField((node, v) => (node.minProperties = v)),
  maxProperties: unsignedField((node, v) => (node.maxProperties = v)),

  uniqueItems: booleanField((node, v) => (node.uniqueItems = v)),
  readOnly: booleanField((node, v) => (node.readOnly = v)),
  unevaluatedProperties: booleanField((node, v) => (node.unevaluatedProperties = v)),
  required: booleanField((node, v) => (node.requiredByParent = v)),
  hidden: booleanField((node, v) => (node.hidden = v)),
  skipProperties: booleanField((node, v) => (node.skipProperties = v)),
  mergeProperties: booleanField((node, v) => (node.mergeProperties = v)),

  default: (node, value) =>
    setWith(objectValue(value, orClear((parsed) => toJsonValue(parsed))), (v) => (node.default = v)),
  const: (node, value) =>
    setWith(objectValue(value, orClear((parsed) => toJsonValue(parsed))), (v) => (node.const = v)),
  patternProperties: (node, value) =>
    setWith(
      objectValue(value, orClear((parsed) => schemaMapFromJSON(parsed))),
      (v) => (node.patternProperties = v)
    ),
  additionalProperties: (node, value) => {
    if (value.trim() === '') {
      node.additionalProperties = true;
      return ok(undefined);
    }
    return schemaField((n, v) => (n.additionalProperties = v))(node, value);
  },
  not: schemaField((node, v) => (node.not = v)),
  allOf: schemaListField((node, v) => (node.allOf = v)),
  anyOf: schemaListField((node, v) => (node.anyOf = v)),
  oneOf: schemaListField((node, v) => (node.oneOf = v)),

  item: (node, value) => {
    withItems(node, (items) => (items.type = coerceTypeList(value)));
    return ok(undefined);
  },
  itemEnum: (node, value) => {
    withItems(node, (items) => (items.enum = coerceList(value, false)));
    return ok(undefined);
  },
  itemRef: (node, value) => {
    withItems(node, (items) => (items.$ref = value));
    return ok(undefined);
  },
  itemProperties: (node, value) => {
    const decoded = objectValue(value, orClear((parsed) => schemaMapFromJSON(parsed)));
    if (decoded.isErr()) return decoded;
    const properties = decoded.value;
    if (isSchemaNode(node.items) && hasType(node.items, 'object')) {
      withItems(node, (items) => (items.properties = properties));
    }
    return ok(undefined);
  },
};

export const ANNOTATION_KEYS: readonly string[] = Object.keys(APPLIERS);

/**
 * Applies every `@schema` clause found in `lines` to `node`, in order.
 * Later clauses overwrite earlier ones. Stops at the first malformed clause.
 */
export function compileAnnotations(
  node: SchemaNode,
  lines: readonly string[]
): Result<void, AnnotationError> {
  for (const { key, value } of splitClauses(lines)) {
    const apply = Object.prototype.hasOwnProperty.call(APPLIERS, key) ? APPLIERS[key] : undefined;
    if (!apply) {
      return err(
        new AnnotationError({
          message: `unknown annotation ${JSON.stringify(key)}`,
          errorCode: ErrorCode.UNKNOWN_ANNOTATION,
          context: { key },
        })
      );
    }
    const applied = apply(node, value);
    if (applied.isErr()) {
      return err(
        new AnnotationError({
          message: `${key}: ${applied.error}`,
          context: { key },
        })
      );
    }
  }
  return ok(undefined);
}
