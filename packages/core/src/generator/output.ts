import { promises as fs } from 'node:fs';
import path from 'node:path';

import { STDIN_PATH } from '../config/config.js';
import { ErrorCode } from '../errors/codes.js';
import { formatSchema, type OutputFormat } from '../schema/codec.js';
import type { Schema } from '../schema/model.js';
import { ConfigError, errorMessage } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export interface WriteOptions {
  /** Target file, `-` for stdout. */
  output: string;
  indent: number;
  cwd?: string;
  stdout?: { write(chunk: string): unknown };
}

/** YAML for `.yaml`/`.yml` targets, JSON for anything else. */
export function outputFormat(output: string): OutputFormat {
  const ext = path.extname(output).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

export async function writeSchema(
  schema: Schema,
  options: WriteOptions
): Promise<Result<void, ConfigError>> {
  const text = formatSchema(schema, {
    format: outputFormat(options.output),
    indent: options.indent,
  });
  if (options.output === STDIN_PATH) {
    (options.stdout ?? process.stdout).write(text);
    return ok(undefined);
  }

  const target = path.resolve(options.cwd ?? process.cwd(), options.output);
  try {
    await fs.writeFile(target, text, { mode: 0o644 });
  } catch (cause) {
    return err(
      new ConfigError({
        message: `write output ${options.output}: ${errorMessage(cause)}`,
        errorCode: ErrorCode.CONFIGURATION_ERROR,
        context: { file: options.output, setting: 'output' },
        cause,
      })
    );
  }
  return ok(undefined);
}
