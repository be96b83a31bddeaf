import type { Result } from '../types/result.js';

/** Value of an Ok result; throws with the error otherwise. */
export function expectOk<T, E>(result: Result<T, E>): T {
  if (result.isErr()) {
    const detail = result.error instanceof Error ? result.error.message : String(result.error);
    throw new Error(`expected Ok, got Err: ${detail}`);
  }
  return result.value;
}

/** Error of an Err result; throws otherwise. */
export function expectErr<T, E>(result: Result<T, E>): E {
  if (result.isOk()) {
    throw new Error(`expected Err, got Ok: ${JSON.stringify(result.value)}`);
  }
  return result.error;
}
