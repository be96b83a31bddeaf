import { ErrorCode } from '../errors/codes.js';
import { SchemaStructureError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { Ptr } from '../util/pointer.js';
import {
  hasCombinator,
  hasType,
  isSchemaNode,
  subschemas,
  type Schema,
  type SchemaNode,
} from './model.js';

export interface ComplianceOptions {
  /** Close every object schema that does not say otherwise. */
  noAdditionalProperties?: boolean;
}

/**
 * Normalizes a schema tree in place before output:
 * - rejects sub-schema cycles (a node reachable from itself),
 * - optionally sets `additionalProperties: false` on open object schemas,
 * - drops `type` from nodes carrying allOf/anyOf/oneOf/not.
 *
 * The same node may appear under several parents; only ancestor cycles fail.
 */
export function ensureCompliant(
  schema: Schema,
  options: ComplianceOptions = {}
): Result<void, SchemaStructureError> {
  return visit(schema, Ptr.root, new Set<SchemaNode>(), options);
}

function visit(
  schema: Schema,
  ptr: Ptr,
  onStack: Set<SchemaNode>,
  options: ComplianceOptions
): Result<void, SchemaStructureError> {
  if (!isSchemaNode(schema)) {
    return ok(undefined);
  }
  if (onStack.has(schema)) {
    return err(
      new SchemaStructureError({
        message: `${ptr}: circular reference detected in schema`,
        errorCode: ErrorCode.CIRCULAR_REFERENCE_DETECTED,
        context: { pointer: ptr.toString() },
      })
    );
  }

  onStack.add(schema);
  for (const [path, sub] of subschemas(schema)) {
    const result = visit(sub, ptr.concat(path), onStack, options);
    if (result.isErr()) return result;
  }
  onStack.delete(schema);

  if (
    options.noAdditionalProperties &&
    hasType(schema, 'object') &&
    schema.additionalProperties === undefined
  ) {
    schema.additionalProperties = false;
  }

  if (hasCombinator(schema)) {
    delete schema.type;
  }

  return ok(undefined);
}
