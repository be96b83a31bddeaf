/**
 * Value coercions for `@schema` clause values. Each returns the message of
 * the failure; the compiler prefixes it with the clause key.
 */

import { toJsonValue } from '../schema/codec.js';
import type { JsonValue } from '../schema/model.js';
import { err, ok, type Result } from '../types/result.js';
import { parseYamlValue } from '../util/yaml.js';

export type Coerced<T> = Result<T, string>;

const UNSIGNED = /^\d+$/;
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

function quote(value: string): string {
  return JSON.stringify(value);
}

/** Empty means true. */
export function coerceBoolean(value: string): Coerced<boolean> {
  switch (value.trim()) {
    case 'true':
    case '':
      return ok(true);
    case 'false':
      return ok(false);
    default:
      return err(`invalid boolean ${quote(value)}, must be "true" or "false"`);
  }
}

/** `undefined` clears the field. */
export function coerceUnsigned(value: string): Coerced<number | undefined> {
  const text = value.trim();
  if (text === '' || text === 'null') {
    return ok(undefined);
  }
  if (text.startsWith('-')) {
    return err(`invalid integer ${quote(text)}: negative values not allowed`);
  }
  if (!UNSIGNED.test(text)) {
    return err(`invalid integer ${quote(text)}: invalid syntax`);
  }
  const num = Number(text);
  if (!Number.isSafeInteger(num)) {
    return err(`invalid integer ${quote(text)}: value out of range`);
  }
  return ok(num);
}

/** `undefined` clears the field. */
export function coerceNumber(value: string): Coerced<number | undefined> {
  const text = value.trim();
  if (text === '' || text === 'null') {
    return ok(undefined);
  }
  if (!DECIMAL.test(text)) {
    return err(`invalid number ${quote(text)}: invalid syntax`);
  }
  const num = Number(text);
  if (!Number.isFinite(num)) {
    return err(`invalid number ${quote(text)}: value out of range`);
  }
  return ok(num);
}

function scalarToString(value: JsonValue): JsonValue {
  if (value === null) return 'null';
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return value.map(scalarToString);
  return value;
}

function splitList(text: string, stringsOnly: boolean): JsonValue[] {
  let body = text;
  if (body.startsWith('[')) {
    body = body.slice(1);
    if (body.endsWith(']')) body = body.slice(0, -1);
  }

  const list: JsonValue[] = [];
  for (const item of body.split(',')) {
    const trimmed = item.trim();
    if (!stringsOnly && trimmed === 'null') {
      list.push(null);
      continue;
    }
    if (trimmed.startsWith('"')) {
      const unquoted = parseQuoted(trimmed);
      if (unquoted !== undefined) {
        list.push(unquoted);
        continue;
      }
    }
    list.push(trimmed.replace(/^"+|"+$/g, ''));
  }
  return list;
}

function parseQuoted(text: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'string' ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reads `[a, "b", 1, null]` as a YAML flow sequence. Text that does not
 * parse as one is split on commas instead. In strings-only mode every
 * scalar, including `null`, becomes its literal text.
 */
export function coerceList(value: string, stringsOnly: boolean): JsonValue[] {
  if (value.startsWith('[')) {
    const parsed = parseYamlValue(value);
    if (parsed.isOk() && Array.isArray(parsed.value)) {
      const json = toJsonValue(parsed.value);
      if (json.isOk() && Array.isArray(json.value)) {
        return stringsOnly ? json.value.map(scalarToString) : json.value;
      }
    }
  }
  return splitList(value, stringsOnly);
}

/** `type` lists: one entry is stored as a bare string. */
export function coerceTypeList(value: string): string | string[] {
  const types = coerceList(value, true).map((entry) =>
    typeof entry === 'string' ? entry : JSON.stringify(entry)
  );
  const [only] = types;
  return types.length === 1 && only !== undefined ? only : types;
}

/**
 * Parses a YAML scalar, list or mapping. Empty text is rejected.
 */
export function coerceObject(value: string): Coerced<unknown> {
  const text = value.trim();
  if (text === '') {
    return err(`parse object ${quote(text)}: missing value`);
  }
  const parsed = parseYamlValue(text);
  if (parsed.isErr()) {
    return err(`parse object ${quote(text)}: ${parsed.error.message}`);
  }
  return ok(parsed.value);
}
