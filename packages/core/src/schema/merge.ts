/**
 * Deep merge of schema fragments: later (src) values shadow earlier (dest)
 * values whenever they are present.
 *
 * Neither input is mutated. The result is a fresh node for every level that
 * had to be combined; untouched sub-trees are shared by reference with the
 * inputs, so callers must not mutate the inputs afterwards.
 */

import {
  SCHEMA_KEYWORDS,
  getEntry,
  isKeywordPresent,
  isSchemaNode,
  setEntry,
  type Schema,
  type SchemaKeyword,
  type SchemaMap,
  type SchemaNode,
} from './model.js';

function copyKeyword<K extends SchemaKeyword>(
  target: SchemaNode,
  source: SchemaNode,
  key: K
): void {
  target[key] = source[key];
}

function mergeMaps(dest: SchemaMap, src: SchemaMap): SchemaMap {
  const merged: SchemaMap = { ...dest };
  for (const [key, srcValue] of Object.entries(src)) {
    setEntry(merged, key, mergeSchemas(getEntry(dest, key), srcValue));
  }
  return merged;
}

/** Union keeping first-seen order. */
export function uniqueAppend(dest: readonly string[], src: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of [...dest, ...src]) {
    if (!seen.has(value)) {
      seen.add(value);
      out.push(value);
    }
  }
  return out;
}

function mergeNodes(dest: SchemaNode, src: SchemaNode): SchemaNode {
  const result: SchemaNode = { ...dest };

  for (const keyword of SCHEMA_KEYWORDS) {
    if (!isKeywordPresent(src, keyword)) continue;

    switch (keyword) {
      case 'properties':
      case '$defs':
      case 'definitions': {
        const destMap = dest[keyword];
        const srcMap = src[keyword];
        result[keyword] = destMap && srcMap ? mergeMaps(destMap, srcMap) : srcMap;
        break;
      }
      case 'enum':
        result.enum = [...(dest.enum ?? []), ...(src.enum ?? [])];
        break;
      case 'required':
        result.required = uniqueAppend(dest.required ?? [], src.required ?? []);
        break;
      case 'items':
        result.items = mergeSchemas(dest.items, src.items);
        break;
      case 'additionalItems':
        result.additionalItems = mergeSchemas(dest.additionalItems, src.additionalItems);
        break;
      case '$ref':
        result.$ref = src.$ref;
        result.refReferrer = src.refReferrer;
        break;
      default:
        copyKeyword(result, src, keyword);
    }
  }

  if (src.extraKeywords) {
    result.extraKeywords = { ...dest.extraKeywords, ...src.extraKeywords };
  }
  if (src.hidden) result.hidden = true;
  if (src.skipProperties) result.skipProperties = true;
  if (src.mergeProperties) result.mergeProperties = true;
  if (src.requiredByParent) result.requiredByParent = true;

  return result;
}

/**
 * Merges `src` into `dest`. An absent side yields the other side as-is.
 * A boolean src replaces dest; a boolean dest absorbs an object src.
 */
export function mergeSchemas(dest: Schema, src: Schema | undefined): Schema;
export function mergeSchemas(dest: Schema | undefined, src: Schema): Schema;
export function mergeSchemas(
  dest: Schema | undefined,
  src: Schema | undefined
): Schema | undefined;
export function mergeSchemas(
  dest: Schema | undefined,
  src: Schema | undefined
): Schema | undefined {
  if (dest === undefined) return src;
  if (src === undefined) return dest;
  if (!isSchemaNode(src)) return src;
  if (!isSchemaNode(dest)) return dest;
  return mergeNodes(dest, src);
}
