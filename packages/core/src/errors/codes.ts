/** Stable error codes with the CLI exit code and HTTP status for each */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by kind
export enum ErrorCode {
  // Input errors (E001–E099)
  INVALID_TYPE = 'E001',
  MALFORMED_INPUT = 'E002',
  UNSUPPORTED_STRATEGY = 'E003',

  // Resource limits (E100–E199)
  FIELD_LIMIT_EXCEEDED = 'E100',

  // Field violations (E200–E299)
  VALIDATION_FAILED = 'E200',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  INVALID_RULE = 'E301',
  SCHEMA_COMPILE_FAILED = 'E302',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// 1 is reserved for a document that failed validation
export const EXIT_CODES = {
  [ErrorCode.INVALID_TYPE]: 10,
  [ErrorCode.MALFORMED_INPUT]: 11,
  [ErrorCode.UNSUPPORTED_STRATEGY]: 12,
  [ErrorCode.FIELD_LIMIT_EXCEEDED]: 20,
  [ErrorCode.VALIDATION_FAILED]: 1,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_RULE]: 51,
  [ErrorCode.SCHEMA_COMPILE_FAILED]: 52,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export const HTTP_STATUS_BY_CODE = {
  [ErrorCode.INVALID_TYPE]: 400,
  [ErrorCode.MALFORMED_INPUT]: 400,
  [ErrorCode.UNSUPPORTED_STRATEGY]: 400,
  [ErrorCode.FIELD_LIMIT_EXCEEDED]: 413,
  [ErrorCode.VALIDATION_FAILED]: 422,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.INVALID_RULE]: 500,
  [ErrorCode.SCHEMA_COMPILE_FAILED]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

export function getHttpStatus(code: ErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}
