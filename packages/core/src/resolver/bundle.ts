import path from 'node:path';

import { ErrorCode } from '../errors/codes.js';
import {
  getEntry,
  isSchemaNode,
  setEntry,
  subschemas,
  type Schema,
  type SchemaMap,
  type SchemaNode,
} from '../schema/model.js';
import { parseRef, referrerDir } from '../schema/referrer.js';
import { ResolutionError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { encodePointerSegment, Ptr } from '../util/pointer.js';
import {
  load,
  refRelativeToBase,
  trimFragment,
  type LoadContext,
  type Loader,
} from './loader.js';

export interface BundleOptions {
  loader: Loader;
  /** Absolute directory that bundled local `$id`s and `$ref`s are relative to. */
  basePathForIds: string;
  ctx: LoadContext;
}

type BundleResult = Result<void, ResolutionError>;

function atPointer(ptr: Ptr, error: ResolutionError): ResolutionError {
  return new ResolutionError({
    message: `${ptr}: ${error.message}`,
    errorCode: error.errorCode,
    context: { ...error.context, pointer: ptr.toString() },
    cause: error,
  });
}

function isLocalRef(ref: string): boolean {
  return ref.startsWith('#');
}

/**
 * `$defs` key for a bundled fragment: the last path segment of its id,
 * suffixed `_2`, `_3`... when taken.
 */
export function generateBundledName(id: string, defs: SchemaMap | undefined): string {
  const baseName = path.posix.basename(id.replace(/[?#].*$/, '')) || 'schema';
  let name = baseName;
  for (let i = 2; getEntry(defs, name) !== undefined; i++) {
    name = `${baseName}_${i}`;
  }
  return name;
}

class Bundler {
  /** Bundled `$id` to its `$defs` name. */
  private readonly bundled = new Map<string, string>();
  private readonly visited = new WeakSet<SchemaNode>();

  constructor(
    private readonly root: SchemaNode,
    private readonly options: BundleOptions
  ) {
    for (const [name, def] of Object.entries(root.$defs ?? {})) {
      if (isSchemaNode(def) && def.$id) {
        this.bundled.set(def.$id, name);
      }
    }
  }

  async walk(schema: SchemaNode, ptr: Ptr, referrer: string | undefined): Promise<BundleResult> {
    if (this.visited.has(schema)) return ok(undefined);
    this.visited.add(schema);

    for (const [edge, sub] of [...subschemas(schema)]) {
      const walked = await this.walk(sub, ptr.concat(edge), referrer);
      if (walked.isErr()) return walked;
    }
    return this.bundleRef(schema, ptr, referrer);
  }

  private async bundleRef(
    schema: SchemaNode,
    ptr: Ptr,
    referrer: string | undefined
  ): Promise<BundleResult> {
    if (!schema.$ref || isLocalRef(schema.$ref)) {
      return ok(undefined);
    }
    const parsed = parseRef(schema);
    if (parsed.isErr()) return err(atPointer(ptr, parsed.error));
    const url = parsed.value;
    if (!url) return ok(undefined);

    const { basePathForIds, loader, ctx } = this.options;
    const id = refRelativeToBase(url, basePathForIds);
    let name = this.bundled.get(id);
    if (name === undefined) {
      const loaded = await load(loader, url, basePathForIds, {
        ...ctx,
        referrer: referrer ?? ctx.referrer,
      });
      if (loaded.isErr()) return err(atPointer(ptr, loaded.error));

      name = generateBundledName(id, this.root.$defs);
      this.root.$defs ??= {};
      setEntry(this.root.$defs, name, loaded.value);
      this.bundled.set(id, name);

      if (isSchemaNode(loaded.value)) {
        const walked = await this.walk(
          loaded.value,
          Ptr.of('$defs', name),
          trimFragment(url).href
        );
        if (walked.isErr()) return walked;
      }
    }

    schema.$ref = `${id}${url.hash}`;
    schema.refReferrer = basePathForIds !== '' ? referrerDir(basePathForIds) : undefined;
    return ok(undefined);
  }
}

/**
 * Loads every non-local `$ref` of `root` into `root.$defs` and rewrites the
 * ref to the bundled fragment's `$id`. Loaded fragments are bundled too;
 * a fragment already in `$defs` (same `$id`) is not loaded again. `root`
 * is updated in place.
 */
export async function bundleSchema(root: Schema, options: BundleOptions): Promise<BundleResult> {
  if (!isSchemaNode(root)) {
    return ok(undefined);
  }
  return new Bundler(root, options).walk(root, Ptr.root, undefined);
}

function findDefName(defs: SchemaMap | undefined, id: string): string | undefined {
  for (const [name, def] of Object.entries(defs ?? {})) {
    if (isSchemaNode(def) && def.$id === id) {
      return name;
    }
  }
  return undefined;
}

function changeRefs(root: SchemaNode, schema: SchemaNode, ptr: Ptr): BundleResult {
  for (const [edge, sub] of subschemas(schema)) {
    const changed = changeRefs(root, sub, ptr.concat(edge));
    if (changed.isErr()) return changed;
  }

  const ref = schema.$ref;
  if (!ref || isLocalRef(ref)) {
    return ok(undefined);
  }
  const hashIndex = ref.indexOf('#');
  const id = hashIndex === -1 ? ref : ref.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? '' : ref.slice(hashIndex + 1).replace(/^\//, '');

  const name = findDefName(root.$defs, id);
  if (name === undefined) {
    return err(
      new ResolutionError({
        message: `${ptr}: no $defs found that matches $ref=${JSON.stringify(ref)}`,
        errorCode: ErrorCode.INVALID_REF,
        context: { ref, pointer: ptr.toString() },
      })
    );
  }
  const target = `#/$defs/${encodePointerSegment(name)}`;
  schema.$ref = fragment !== '' ? `${target}/${fragment}` : target;
  return ok(undefined);
}

/**
 * Points every bundled `$ref` straight at its `$defs` entry
 * (`#/$defs/<name>[/<fragment>]`) and drops the `$id`s of the entries, for
 * consumers that do not resolve embedded `$id`s. Local refs are left alone.
 */
export function bundleRemoveIds(root: Schema): BundleResult {
  if (!isSchemaNode(root)) {
    return ok(undefined);
  }
  const changed = changeRefs(root, root, Ptr.root);
  if (changed.isErr()) return changed;
  for (const def of Object.values(root.$defs ?? {})) {
    if (isSchemaNode(def)) {
      delete def.$id;
    }
  }
  return ok(undefined);
}
