import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  STDIN_PATH,
  validateConfig,
  type GenerateConfig,
} from '../config/config.js';
import { ErrorCode } from '../errors/codes.js';
import { bundleRemoveIds, bundleSchema } from '../resolver/bundle.js';
import { FileHttpCache } from '../resolver/cache-store.js';
import { createDefaultLoader } from '../resolver/default-loader.js';
import type { Loader } from '../resolver/loader.js';
import { ensureCompliant } from '../schema/compliance.js';
import { getSchemaUrl } from '../schema/draft.js';
import { mergeSchemas } from '../schema/merge.js';
import {
  isSchemaNode,
  setEntry,
  setReferrer,
  type Schema,
  type SchemaMap,
  type SchemaNode,
} from '../schema/model.js';
import { referrerDir, type Referrer } from '../schema/referrer.js';
import { assembleSchema } from '../tree/assembler.js';
import type { MappingNode } from '../tree/node.js';
import { parseYamlTree } from '../tree/yaml-adapter.js';
import {
  AnnotationError,
  ConfigError,
  ParseError,
  SchemaStructureError,
  errorMessage,
  type WeaveError,
} from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { Logger } from '../util/logger.js';
import { Ptr } from '../util/pointer.js';

export interface GenerateDeps {
  logger: Logger;
  /** Loader used for bundling; a default http/https/file loader otherwise. */
  loader?: Loader;
  /** Reads the whole of stdin for a `-` values entry. */
  readStdin?: () => Promise<string>;
  cwd?: string;
  signal?: AbortSignal;
}

interface ValuesDocument {
  referrer: Referrer;
  text: string;
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function readValues(
  file: string,
  deps: GenerateDeps
): Promise<Result<ValuesDocument, WeaveError>> {
  const cwd = deps.cwd ?? process.cwd();
  try {
    if (file === STDIN_PATH) {
      const read = deps.readStdin ?? (() => readStream(process.stdin));
      return ok({ referrer: referrerDir(cwd), text: await read() });
    }
    const absolute = path.resolve(cwd, file);
    const text = await fs.readFile(absolute, 'utf8');
    return ok({ referrer: referrerDir(path.dirname(absolute)), text });
  } catch (cause) {
    return err(
      new ConfigError({
        message: `read --values=${JSON.stringify(file)}: ${errorMessage(cause)}`,
        context: { file, setting: 'values' },
        cause,
      })
    );
  }
}

/** Object schema of one values document, one property per top-level key. */
function documentSchema(
  file: string,
  root: MappingNode,
  config: GenerateConfig
): Result<SchemaNode, WeaveError> {
  const properties: SchemaMap = {};
  const required: string[] = [];
  for (const entry of root.entries) {
    const name = entry.key.value;
    const schema = assembleSchema(Ptr.of(name), entry.key, entry.value, {
      useDocs: config.useDocs,
    });
    if (schema.isErr()) {
      return err(
        new AnnotationError({
          message: `${file}: parse schema: ${schema.error.message}`,
          errorCode: schema.error.errorCode,
          context: { ...schema.error.context, file },
          cause: schema.error,
        })
      );
    }
    if (schema.value.hidden) continue;
    setEntry<Schema>(properties, name, schema.value);
    if (schema.value.requiredByParent) required.push(name);
  }

  const { schemaRoot } = config;
  const node: SchemaNode = { type: 'object', properties };
  if (required.length > 0) node.required = required;
  if (schemaRoot.title) node.title = schemaRoot.title;
  if (schemaRoot.description) node.description = schemaRoot.description;
  if (schemaRoot.id) node.$id = schemaRoot.id;
  return ok(node);
}

/**
 * Builds the schema of the configured values documents: every top-level key
 * is assembled from its comments, documents are merged in order, then the
 * root settings, bundling, the closed-object policy and the compliance pass
 * are applied.
 */
export async function generateSchema(
  config: GenerateConfig,
  deps: GenerateDeps
): Promise<Result<SchemaNode, WeaveError>> {
  const valid = validateConfig(config);
  if (valid.isErr()) return valid;
  const schemaUrl = getSchemaUrl(config.draft);
  if (schemaUrl.isErr()) return schemaUrl;

  let merged: SchemaNode = {};
  for (const file of config.values) {
    const doc = await readValues(file, deps);
    if (doc.isErr()) return doc;

    const tree = parseYamlTree(doc.value.text);
    if (tree.isErr()) {
      return err(
        new ParseError({
          message: `parse --values=${JSON.stringify(file)}: ${tree.error.message}`,
          context: { file },
          cause: tree.error,
        })
      );
    }
    if (tree.value === undefined) continue;
    if (tree.value.kind !== 'mapping') {
      return err(
        new SchemaStructureError({
          message: `${file}: values document must be a mapping, got a ${tree.value.kind}`,
          errorCode: ErrorCode.INVALID_DOCUMENT,
          context: { file },
        })
      );
    }

    const schema = documentSchema(file, tree.value, config);
    if (schema.isErr()) return schema;
    const temp = schema.value;
    setReferrer(temp, doc.value.referrer);
    // The root ref resolves against the config, not the values file.
    if (config.schemaRoot.ref) {
      temp.$ref = config.schemaRoot.ref;
      temp.refReferrer = config.schemaRoot.refReferrer;
    }

    const next = mergeSchemas(merged, temp);
    if (isSchemaNode(next)) merged = next;
  }

  if (config.bundle) {
    const bundled = await bundle(merged, config, deps);
    if (bundled.isErr()) return bundled;
  }

  if (config.schemaRoot.additionalProperties !== undefined) {
    merged.additionalProperties = config.schemaRoot.additionalProperties;
  } else if (config.noAdditionalProperties) {
    merged.additionalProperties = false;
  }

  const compliant = ensureCompliant(merged, {
    noAdditionalProperties: config.noAdditionalProperties,
  });
  if (compliant.isErr()) return compliant;

  merged.$schema = schemaUrl.value;
  merged.type = 'object';
  return ok(merged);
}

async function bundle(
  schema: SchemaNode,
  config: GenerateConfig,
  deps: GenerateDeps
): Promise<Result<void, WeaveError>> {
  const cwd = deps.cwd ?? process.cwd();
  const bundleRoot = path.resolve(cwd, config.bundleRoot || '.');
  const basePathForIds =
    config.output === STDIN_PATH ? cwd : path.dirname(path.resolve(cwd, config.output));
  const loader =
    deps.loader ??
    createDefaultLoader({
      bundleRoot,
      cache: config.noCache ? undefined : new FileHttpCache(config.cacheDir),
    });

  const bundled = await bundleSchema(schema, {
    loader,
    basePathForIds,
    ctx: { logger: deps.logger, signal: deps.signal },
  });
  if (bundled.isErr()) return bundled;
  return config.bundleWithoutId ? bundleRemoveIds(schema) : ok(undefined);
}
