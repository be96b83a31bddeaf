/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit codes.
 */

export type Severity = 'info' | 'warn' | 'error';

export enum ErrorCode {
  // Directive and structural errors (E001–E099)
  INVALID_ANNOTATION = 'E001',
  UNKNOWN_ANNOTATION = 'E002',
  INVALID_DOCS_COMMENT = 'E003',
  INVALID_SCHEMA_STRUCTURE = 'E010',
  INVALID_DOCUMENT = 'E011',
  CIRCULAR_REFERENCE_DETECTED = 'E012',

  // Resolution errors (E100–E199)
  INVALID_REF = 'E100',
  UNSUPPORTED_REF_SCHEME = 'E101',
  REF_OUTSIDE_ROOT = 'E102',
  REF_LOAD_FAILED = 'E103',
  HTTP_STATUS = 'E110',
  UNSUPPORTED_ENCODING = 'E111',
  RESPONSE_TOO_LARGE = 'E112',
  REQUEST_FAILED = 'E113',

  // Cache errors (E200–E299)
  CACHE_READ_FAILED = 'E200',
  CACHE_WRITE_FAILED = 'E201',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  INVALID_DRAFT = 'E301',

  // Parse errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const EXIT_CODES = {
  [ErrorCode.INVALID_ANNOTATION]: 10,
  [ErrorCode.UNKNOWN_ANNOTATION]: 10,
  [ErrorCode.INVALID_DOCS_COMMENT]: 11,
  [ErrorCode.INVALID_SCHEMA_STRUCTURE]: 20,
  [ErrorCode.INVALID_DOCUMENT]: 21,
  [ErrorCode.CIRCULAR_REFERENCE_DETECTED]: 22,
  [ErrorCode.INVALID_REF]: 30,
  [ErrorCode.UNSUPPORTED_REF_SCHEME]: 30,
  [ErrorCode.REF_OUTSIDE_ROOT]: 31,
  [ErrorCode.REF_LOAD_FAILED]: 32,
  [ErrorCode.HTTP_STATUS]: 33,
  [ErrorCode.UNSUPPORTED_ENCODING]: 34,
  [ErrorCode.RESPONSE_TOO_LARGE]: 35,
  [ErrorCode.REQUEST_FAILED]: 36,
  [ErrorCode.CACHE_READ_FAILED]: 40,
  [ErrorCode.CACHE_WRITE_FAILED]: 41,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_DRAFT]: 51,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
