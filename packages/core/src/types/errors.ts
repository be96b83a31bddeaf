/**
 * Error hierarchy for schemaweave
 * Every error carries a stable code, the offending location and its cause.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

export interface ErrorContext {
  pointer?: string; // Pointer into the values document or schema (e.g. '/image/tag')
  key?: string; // Annotation key for directive errors
  ref?: string; // $ref being resolved
  file?: string; // Input document or config file
  setting?: string; // Configuration setting
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface WeaveErrorParams {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Base error class for all schemaweave errors
 */
export abstract class WeaveError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  protected constructor(params: WeaveErrorParams, defaultCode: ErrorCode) {
    const cause = toError(params.cause);
    super(params.message, { cause });
    this.name = this.constructor.name;
    this.errorCode = params.errorCode ?? defaultCode;
    this.severity = params.severity ?? 'error';
    this.context = params.context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Malformed `@schema` or docs comments
 */
export class AnnotationError extends WeaveError {
  constructor(params: WeaveErrorParams) {
    super(params, ErrorCode.INVALID_ANNOTATION);
  }

  get key(): string | undefined {
    return this.context?.key;
  }
}

/**
 * Circular references, mistyped schema keywords, malformed values documents
 */
export class SchemaStructureError extends WeaveError {
  constructor(params: WeaveErrorParams) {
    super(params, ErrorCode.INVALID_SCHEMA_STRUCTURE);
  }

  get pointer(): string | undefined {
    return this.context?.pointer;
  }
}

/**
 * Failures while resolving a single $ref
 */
export class ResolutionError extends WeaveError {
  constructor(params: WeaveErrorParams) {
    super(params, ErrorCode.REF_LOAD_FAILED);
  }

  get ref(): string | undefined {
    return this.context?.ref;
  }
}

/**
 * HTTP cache read/write failures; callers log these and carry on
 */
export class CacheError extends WeaveError {
  constructor(params: WeaveErrorParams) {
    super(params, ErrorCode.CACHE_READ_FAILED);
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends WeaveError {
  constructor(params: WeaveErrorParams) {
    super(params, ErrorCode.CONFIGURATION_ERROR);
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * YAML/JSON text that could not be parsed
 */
export class ParseError extends WeaveError {
  constructor(params: WeaveErrorParams) {
    super(params, ErrorCode.PARSE_ERROR);
  }
}

/**
 * Unexpected failures with no better classification
 */
export class InternalError extends WeaveError {
  constructor(params: WeaveErrorParams) {
    super(params, ErrorCode.INTERNAL_ERROR);
  }
}

export function isWeaveError(error: unknown): error is WeaveError {
  return error instanceof WeaveError;
}

export function toError(value: unknown): Error | undefined {
  if (value === undefined || value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

/** Message of any thrown value, for wrapping library exceptions. */
export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
