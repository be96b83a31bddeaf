const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const HEX_FLOAT = /^[+-]?0[xX](?:[0-9a-fA-F]+(?:\.[0-9a-fA-F]*)?|\.[0-9a-fA-F]+)[pP][+-]?\d+$/;
const SPECIAL_FLOAT = /^[+-]?(?:inf|infinity|nan)$/i;
const BOOLEANS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True', '0', 'f', 'F', 'FALSE', 'false', 'False']);

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

function isInt64(value: string): boolean {
  if (!INTEGER.test(value)) return false;
  const num = BigInt(value);
  return num >= INT64_MIN && num <= INT64_MAX;
}

function isFloat(value: string): boolean {
  if (SPECIAL_FLOAT.test(value) || HEX_FLOAT.test(value)) return true;
  return DECIMAL.test(value) && Number.isFinite(Number(value));
}

/**
 * JSON type of an unquoted scalar token: integer, then number, then
 * boolean, else string; the empty token is null.
 */
export function getYamlKind(value: string): 'integer' | 'number' | 'boolean' | 'string' | 'null' {
  if (isInt64(value)) return 'integer';
  if (isFloat(value)) return 'number';
  if (BOOLEANS.has(value)) return 'boolean';
  return value !== '' ? 'string' : 'null';
}
