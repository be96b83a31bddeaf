/**
 * Turns a WeaveError into the plain data the CLI renders. Nothing here
 * writes to a stream.
 */

import type { ErrorCode } from './codes.js';
import type { ErrorContext, WeaveError } from '../types/errors.js';
import { getWorkaround } from './suggestions.js';

/** True when the variable is set to anything but "", "0" or "false". */
function envFlag(name: string): boolean {
  const value = process.env[name];
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  cause?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: WeaveError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      cause: this.#formatCause(error),
      workaround: error.suggestions?.[0] ?? getWorkaround(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout.columns || 80,
    };
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const loc = ctx.pointer ?? ctx.ref ?? ctx.file ?? ctx.setting;
    return loc ? `Location: ${loc}` : undefined;
  }

  // Only the root cause adds information; intermediate messages are already
  // folded into the error's own message.
  #formatCause(error: WeaveError): string | undefined {
    if (this.env === 'prod') return undefined;
    let cause: unknown = error.cause;
    let last: Error | undefined;
    while (cause instanceof Error) {
      last = cause;
      cause = cause.cause;
    }
    if (!last || error.message.endsWith(last.message)) return undefined;
    return last.message;
  }

  #shouldUseColors(requested?: boolean): boolean {
    if (envFlag('NO_COLOR')) return false;
    if (envFlag('FORCE_COLOR')) return true;
    return requested ?? this.env === 'dev';
  }
}
