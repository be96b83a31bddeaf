#!/usr/bin/env node

// CLI entry point
// - Command name: `schemaweave`, a single command.
// - Reads `.schema.yaml` (or --config) and layers the flags over it, then calls
//   generateSchema/writeSchema from @schemaweave/core.
// - Logs go to stderr so `--output -` can stream the schema to stdout.

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  DEFAULT_CONFIG_FILE,
  ErrorCode,
  ErrorPresenter,
  InternalError,
  createStreamLogger,
  generateSchema,
  isWeaveError,
  loadConfigFile,
  mergeConfig,
  silentLogger,
  writeSchema,
  type Loader,
  type WeaveError,
} from '@schemaweave/core';
import { renderCLIView } from './render.js';
import {
  collectValues,
  parseConfigFlags,
  parseInteger,
  type CliOptions,
} from './flags.js';

interface WritableLike {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdout: WritableLike;
  stderr: WritableLike;
  cwd: string;
  readStdin?: () => Promise<string>;
  /** Loader for bundled refs; the default http/https/file loader otherwise. */
  loader?: Loader;
}

function processIO(): CliIO {
  return { stdout: process.stdout, stderr: process.stderr, cwd: process.cwd() };
}

/**
 * Loads the config file, layers the flags over it, then generates and
 * writes the schema. Failures are thrown as WeaveError.
 */
export async function runGenerate(options: CliOptions, io: CliIO): Promise<void> {
  const logger = options.quiet ? silentLogger : createStreamLogger(io.stderr);

  const flags = parseConfigFlags(options, io.cwd);
  if (flags.isErr()) throw flags.error;

  const configFile = path.resolve(io.cwd, options.config ?? DEFAULT_CONFIG_FILE);
  const fileConfig = await loadConfigFile(configFile, {
    optional: options.config === undefined,
  });
  if (fileConfig.isErr()) throw fileConfig.error;

  const config = mergeConfig(fileConfig.value, flags.value);
  const schema = await generateSchema(config, {
    logger,
    cwd: io.cwd,
    readStdin: io.readStdin,
    loader: io.loader,
  });
  if (schema.isErr()) throw schema.error;

  const written = await writeSchema(schema.value, {
    output: config.output,
    indent: config.indent,
    cwd: io.cwd,
    stdout: io.stdout,
  });
  if (written.isErr()) throw written.error;
  logger.log('JSON schema successfully generated');
}

export function createProgram(io: CliIO = processIO()): Command {
  const program = new Command();

  program
    .name('schemaweave')
    .description('Generate a JSON Schema from annotated YAML values files')
    .version('0.1.0')
    .option(
      '-f, --values <files>',
      'Values files, comma separated or repeated ("-" reads stdin)',
      collectValues
    )
    .option('-o, --output <file>', 'Output file path, "-" for stdout (default "values.schema.json")')
    .option('-d, --draft <version>', 'Draft version: 4, 6, 7, 2019 or 2020 (default 2020)', parseInteger)
    .option('-i, --indent <spaces>', 'Indentation spaces, an even number (default 4)', parseInteger)
    .option(
      '--noAdditionalProperties',
      'Default additionalProperties to false for all objects in the schema'
    )
    .option('--bundle', 'Bundle referenced ($ref) subschemas into $defs')
    .option(
      '--bundleWithoutID',
      'Reference bundled subschemas by $defs path instead of $id'
    )
    .option(
      '--bundleRoot <dir>',
      'Directory local referenced files must live in (default working directory)'
    )
    .option('--useDocs', 'Read descriptions from "# -- text" docs comments')
    .option('--schemaRoot.id <id>', 'JSON schema ID')
    .option('--schemaRoot.ref <ref>', 'JSON schema URI reference')
    .option('--schemaRoot.title <title>', 'JSON schema title')
    .option('--schemaRoot.description <text>', 'JSON schema description')
    .option('--schemaRoot.additionalProperties [bool]', 'Allow additional properties at the root')
    .option('-c, --config <file>', `Config file (default "${DEFAULT_CONFIG_FILE}" when present)`)
    .option('--cacheDir <dir>', 'HTTP cache directory (supports ~)')
    .option('--noCache', 'Disable the HTTP cache for bundled remote refs')
    .option('-q, --quiet', 'Do not log progress to stderr')
    .action(async (options: CliOptions) => {
      await runGenerate(options, io);
    });

  return program;
}

function toWeaveError(err: unknown): WeaveError {
  if (isWeaveError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError({
    message: message || 'Unexpected error',
    errorCode: ErrorCode.INTERNAL_ERROR,
    cause: err,
  });
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  const error = toWeaveError(err);
  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
