import { format, inspect } from 'node:util';

/**
 * Logging capability threaded through the generator and loaders.
 */
export interface Logger {
  log(...args: unknown[]): void;
  logf(fmt: string, ...args: unknown[]): void;
}

interface WritableLike {
  write(chunk: string): unknown;
}

// Like console.log, but without printf-style handling of the first argument.
function joinArgs(args: unknown[]): string {
  return args
    .map((arg) => (typeof arg === 'string' ? arg : inspect(arg)))
    .join(' ');
}

/**
 * Writes one line per call.
 * Defaults to process.stderr so stdout stays free for `--output -`.
 */
export function createStreamLogger(
  stream: WritableLike = process.stderr
): Logger {
  return {
    log(...args: unknown[]): void {
      stream.write(joinArgs(args) + '\n');
    },
    logf(fmt: string, ...args: unknown[]): void {
      stream.write(format(fmt, ...args) + '\n');
    },
  };
}

export const silentLogger: Logger = {
  log(): void {},
  logf(): void {},
};

/** In-memory logger for tests and for surfacing messages later. */
export class BufferedLogger implements Logger {
  readonly lines: string[] = [];

  log(...args: unknown[]): void {
    this.lines.push(joinArgs(args));
  }

  logf(fmt: string, ...args: unknown[]): void {
    this.lines.push(format(fmt, ...args));
  }
}
