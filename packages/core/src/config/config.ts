import { promises as fs } from 'node:fs';
import path from 'node:path';
import AjvModule, { type ErrorObject } from 'ajv';
import formatsModule from 'ajv-formats';

import { ErrorCode } from '../errors/codes.js';
import { DEFAULT_DRAFT, getSchemaUrl } from '../schema/draft.js';
import { referrerDir, type Referrer } from '../schema/referrer.js';
import { ConfigError, errorMessage } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { parseYamlValue } from '../util/yaml.js';

const Ajv = AjvModule.default;
const addFormats = formatsModule.default;

export const DEFAULT_CONFIG_FILE = '.schema.yaml';
export const DEFAULT_OUTPUT = 'values.schema.json';
export const DEFAULT_INDENT = 4;
export const STDIN_PATH = '-';

export interface SchemaRootConfig {
  id?: string;
  ref?: string;
  /** Location `ref` is resolved against; the working directory when unset. */
  refReferrer?: Referrer;
  title?: string;
  description?: string;
  additionalProperties?: boolean;
}

export interface GenerateConfig {
  /** Values documents, `-` for stdin. */
  values: string[];
  /** Output file, `-` for stdout. */
  output: string;
  draft: number;
  indent: number;
  noAdditionalProperties: boolean;
  bundle: boolean;
  bundleWithoutId: boolean;
  /** Directory bundled local refs must stay inside; the working directory when empty. */
  bundleRoot: string;
  useDocs: boolean;
  schemaRoot: SchemaRootConfig;
  /** HTTP cache directory; the user cache directory when unset. */
  cacheDir?: string;
  noCache: boolean;
}

export type PartialConfig = Partial<Omit<GenerateConfig, 'schemaRoot'>> & {
  schemaRoot?: SchemaRootConfig;
};

export function defaultConfig(): GenerateConfig {
  return {
    values: [],
    output: DEFAULT_OUTPUT,
    draft: DEFAULT_DRAFT,
    indent: DEFAULT_INDENT,
    noAdditionalProperties: false,
    bundle: false,
    bundleWithoutId: false,
    bundleRoot: '',
    useDocs: false,
    schemaRoot: {},
    noCache: false,
  };
}

/** Shape of `.schema.yaml`. */
export interface ConfigFile {
  values?: string[];
  output?: string;
  draft?: number;
  indent?: number;
  noAdditionalProperties?: boolean;
  bundle?: boolean;
  bundleWithoutID?: boolean;
  bundleRoot?: string;
  useDocs?: boolean;
  cacheDir?: string;
  noCache?: boolean;
  schemaRoot?: {
    id?: string;
    ref?: string;
    title?: string;
    description?: string;
    additionalProperties?: boolean;
  };
}

export const CONFIG_FILE_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    values: { type: 'array', items: { type: 'string', minLength: 1 } },
    output: { type: 'string', minLength: 1 },
    draft: { type: 'integer', enum: [4, 6, 7, 2019, 2020] },
    indent: { type: 'integer', minimum: 1 },
    noAdditionalProperties: { type: 'boolean' },
    bundle: { type: 'boolean' },
    bundleWithoutID: { type: 'boolean' },
    bundleRoot: { type: 'string' },
    useDocs: { type: 'boolean' },
    cacheDir: { type: 'string', minLength: 1 },
    noCache: { type: 'boolean' },
    schemaRoot: {
      type: 'object',
      additionalProperties: false,
      properties: {
        id: { type: 'string', format: 'uri-reference' },
        ref: { type: 'string', format: 'uri-reference' },
        title: { type: 'string' },
        description: { type: 'string' },
        additionalProperties: { type: 'boolean' },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: false, strict: true });
addFormats(ajv);
const validateConfigFile = ajv.compile<ConfigFile>(CONFIG_FILE_SCHEMA);

function describeAjvError(error: ErrorObject | undefined): string {
  if (!error) return 'invalid configuration';
  const where = error.instancePath === '' ? '' : `${error.instancePath.slice(1).replace(/\//g, '.')}: `;
  return `${where}${error.message ?? 'is invalid'}`;
}

/**
 * Maps a validated config file onto config fields. A `schemaRoot.ref`
 * resolves against the file's directory.
 */
export function fromConfigFile(file: ConfigFile, configDir: string): PartialConfig {
  const config: PartialConfig = {
    values: file.values,
    output: file.output,
    draft: file.draft,
    indent: file.indent,
    noAdditionalProperties: file.noAdditionalProperties,
    bundle: file.bundle,
    bundleWithoutId: file.bundleWithoutID,
    bundleRoot: file.bundleRoot,
    useDocs: file.useDocs,
    cacheDir: file.cacheDir,
    noCache: file.noCache,
  };
  if (file.schemaRoot) {
    config.schemaRoot = { ...file.schemaRoot };
    if (file.schemaRoot.ref) {
      config.schemaRoot.refReferrer = referrerDir(configDir);
    }
  }
  return config;
}

export interface LoadConfigOptions {
  /** A missing file yields an empty config instead of an error. */
  optional?: boolean;
}

/**
 * Reads and validates a YAML config file.
 */
export async function loadConfigFile(
  file: string,
  options: LoadConfigOptions = {}
): Promise<Result<PartialConfig, ConfigError>> {
  const absolute = path.resolve(file);
  let text: string;
  try {
    text = await fs.readFile(absolute, 'utf8');
  } catch (cause) {
    if (options.optional && cause instanceof Error && 'code' in cause && cause.code === 'ENOENT') {
      return ok({});
    }
    return err(
      new ConfigError({
        message: `read config ${file}: ${errorMessage(cause)}`,
        context: { file },
        cause,
      })
    );
  }

  const parsed = parseYamlValue(text);
  if (parsed.isErr()) {
    return err(
      new ConfigError({
        message: `parse config ${file}: ${parsed.error.message}`,
        context: { file },
        cause: parsed.error,
      })
    );
  }
  const data = parsed.value ?? {};
  if (!validateConfigFile(data)) {
    return err(
      new ConfigError({
        message: `invalid config ${file}: ${describeAjvError(validateConfigFile.errors?.[0])}`,
        context: { file, setting: validateConfigFile.errors?.[0]?.instancePath },
      })
    );
  }
  return ok(fromConfigFile(data, path.dirname(absolute)));
}

function mergeSchemaRoot(base: SchemaRootConfig, layer: SchemaRootConfig): SchemaRootConfig {
  const merged = { ...base };
  if (layer.id !== undefined) merged.id = layer.id;
  if (layer.ref !== undefined) {
    merged.ref = layer.ref;
    merged.refReferrer = layer.refReferrer;
  }
  if (layer.title !== undefined) merged.title = layer.title;
  if (layer.description !== undefined) merged.description = layer.description;
  if (layer.additionalProperties !== undefined) {
    merged.additionalProperties = layer.additionalProperties;
  }
  return merged;
}

/**
 * Layers partial configs over the defaults; later layers win for every
 * value they define. `schemaRoot` merges field by field, a `ref` always
 * travelling with its referrer.
 */
export function mergeConfig(...layers: PartialConfig[]): GenerateConfig {
  const merged = defaultConfig();
  for (const layer of layers) {
    merged.values = layer.values ?? merged.values;
    merged.output = layer.output ?? merged.output;
    merged.draft = layer.draft ?? merged.draft;
    merged.indent = layer.indent ?? merged.indent;
    merged.noAdditionalProperties = layer.noAdditionalProperties ?? merged.noAdditionalProperties;
    merged.bundle = layer.bundle ?? merged.bundle;
    merged.bundleWithoutId = layer.bundleWithoutId ?? merged.bundleWithoutId;
    merged.bundleRoot = layer.bundleRoot ?? merged.bundleRoot;
    merged.useDocs = layer.useDocs ?? merged.useDocs;
    merged.cacheDir = layer.cacheDir ?? merged.cacheDir;
    merged.noCache = layer.noCache ?? merged.noCache;
    if (layer.schemaRoot) {
      merged.schemaRoot = mergeSchemaRoot(merged.schemaRoot, layer.schemaRoot);
    }
  }
  return merged;
}

function invalid(message: string, setting: string): ConfigError {
  return new ConfigError({ message, errorCode: ErrorCode.CONFIGURATION_ERROR, context: { setting } });
}

/**
 * Checks the settings the generator relies on: at least one values
 * document, stdin at most once, a known draft and a positive even indent.
 */
export function validateConfig(config: GenerateConfig): Result<GenerateConfig, ConfigError> {
  if (config.values.length === 0) {
    return err(invalid('values flag is required', 'values'));
  }
  if (config.values.filter((value) => value === STDIN_PATH).length > 1) {
    return err(invalid('values flag must not contain multiple stdin ("-f -")', 'values'));
  }
  const url = getSchemaUrl(config.draft);
  if (url.isErr()) return url;
  if (!Number.isInteger(config.indent) || config.indent <= 0) {
    return err(invalid('indentation must be a positive number', 'indent'));
  }
  if (config.indent % 2 !== 0) {
    return err(invalid('indentation must be an even number', 'indent'));
  }
  return ok(config);
}
