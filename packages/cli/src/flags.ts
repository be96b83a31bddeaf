import {
  ConfigError,
  ErrorCode,
  err,
  ok,
  referrerDir,
  type PartialConfig,
  type Result,
  type SchemaRootConfig,
} from '@schemaweave/core';

/**
 * CLI options as Commander hands them over. Dotted flags such as
 * `--schemaRoot.id` keep their dots in the attribute name.
 */
export interface CliOptions {
  values?: string[];
  output?: string;
  draft?: number;
  indent?: number;
  noAdditionalProperties?: boolean;
  bundle?: boolean;
  bundleWithoutID?: boolean;
  bundleRoot?: string;
  useDocs?: boolean;
  config?: string;
  cacheDir?: string;
  noCache?: boolean;
  quiet?: boolean;
  [key: string]: unknown;
}

/** Commander argument parser for repeatable, comma separated `--values`. */
export function collectValues(value: string, previous: string[] | undefined): string[] {
  const files = value
    .split(',')
    .map((file) => file.trim())
    .filter((file) => file !== '');
  return [...(previous ?? []), ...files];
}

export function parseInteger(value: string): number {
  return /^[+-]?\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : Number.NaN;
}

export function parseBoolean(value: string | boolean): Result<boolean, ConfigError> {
  if (typeof value === 'boolean') return ok(value);
  switch (value.trim().toLowerCase()) {
    case '':
    case 'true':
    case '1':
      return ok(true);
    case 'false':
    case '0':
      return ok(false);
    default:
      return err(
        new ConfigError({
          message: `invalid boolean value ${JSON.stringify(value)}`,
          errorCode: ErrorCode.CONFIGURATION_ERROR,
        })
      );
  }
}

function stringOption(options: CliOptions, name: string): string | undefined {
  const value = options[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseSchemaRoot(
  options: CliOptions,
  cwd: string
): Result<SchemaRootConfig | undefined, ConfigError> {
  const root: SchemaRootConfig = {};
  let set = false;

  const id = stringOption(options, 'schemaRoot.id');
  if (id !== undefined) {
    root.id = id;
    set = true;
  }
  const ref = stringOption(options, 'schemaRoot.ref');
  if (ref !== undefined) {
    root.ref = ref;
    root.refReferrer = referrerDir(cwd);
    set = true;
  }
  const title = stringOption(options, 'schemaRoot.title');
  if (title !== undefined) {
    root.title = title;
    set = true;
  }
  const description = stringOption(options, 'schemaRoot.description');
  if (description !== undefined) {
    root.description = description;
    set = true;
  }

  const additional = options['schemaRoot.additionalProperties'];
  if (typeof additional === 'string' || typeof additional === 'boolean') {
    const parsed = parseBoolean(additional);
    if (parsed.isErr()) {
      return err(
        new ConfigError({
          message: `--schemaRoot.additionalProperties: ${parsed.error.message}`,
          errorCode: ErrorCode.CONFIGURATION_ERROR,
          context: { setting: 'schemaRoot.additionalProperties' },
        })
      );
    }
    root.additionalProperties = parsed.value;
    set = true;
  }
  return ok(set ? root : undefined);
}

/**
 * Maps parsed CLI options onto a config layer. Only flags given on the
 * command line are set, so config file values survive otherwise. A
 * `--schemaRoot.ref` resolves against the working directory.
 */
export function parseConfigFlags(
  options: CliOptions,
  cwd: string
): Result<PartialConfig, ConfigError> {
  const schemaRoot = parseSchemaRoot(options, cwd);
  if (schemaRoot.isErr()) return schemaRoot;

  const config: PartialConfig = {
    values: options.values,
    output: options.output,
    draft: options.draft,
    indent: options.indent,
    noAdditionalProperties: options.noAdditionalProperties,
    bundle: options.bundle,
    bundleWithoutId: options.bundleWithoutID,
    bundleRoot: options.bundleRoot,
    useDocs: options.useDocs,
    cacheDir: options.cacheDir,
    noCache: options.noCache,
  };
  if (schemaRoot.value) config.schemaRoot = schemaRoot.value;
  return ok(config);
}
