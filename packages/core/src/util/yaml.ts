import { parseDocument } from 'yaml';

import { ParseError, errorMessage } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

/**
 * Parses a single YAML (or JSON) document into plain JS values.
 * The first reported parser error fails the whole text.
 */
export function parseYamlValue(text: string): Result<unknown, ParseError> {
  const doc = parseDocument(text);
  const [first] = doc.errors;
  if (first) {
    return err(new ParseError({ message: first.message, cause: first }));
  }
  try {
    return ok(doc.toJS());
  } catch (cause) {
    return err(new ParseError({ message: errorMessage(cause), cause }));
  }
}
