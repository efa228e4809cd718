import { describe, test, expect } from 'vitest';
import {
  ErrorCode,
  EXIT_CODES,
  HTTP_STATUS_BY_CODE,
  getExitCode,
  getHttpStatus,
  type Severity,
} from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(EXIT_CODES).length).toBe(enumCodes.length);
    for (const code of enumCodes) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
    }
  });

  test('HTTP_STATUS_BY_CODE covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(HTTP_STATUS_BY_CODE).length).toBe(enumCodes.length);
    for (const code of enumCodes) {
      expect(HTTP_STATUS_BY_CODE[code]).toBeTypeOf('number');
    }
  });

  test('exit codes are within valid 1-255 range', () => {
    for (const exit of Object.values(EXIT_CODES)) {
      expect(exit).toBeGreaterThanOrEqual(1);
      expect(exit).toBeLessThanOrEqual(255);
    }
  });

  test('maps error kinds to HTTP classes', () => {
    expect(getHttpStatus(ErrorCode.MALFORMED_INPUT)).toBe(400);
    expect(getHttpStatus(ErrorCode.UNSUPPORTED_STRATEGY)).toBe(400);
    expect(getHttpStatus(ErrorCode.FIELD_LIMIT_EXCEEDED)).toBe(413);
    expect(getHttpStatus(ErrorCode.VALIDATION_FAILED)).toBe(422);
    expect(getHttpStatus(ErrorCode.SCHEMA_COMPILE_FAILED)).toBe(500);
  });

  test('a failed validation exits with 1', () => {
    expect(getExitCode(ErrorCode.VALIDATION_FAILED)).toBe(1);
  });

  test('Severity type is exported and constrained', () => {
    const sev: Severity = 'error';
    expect(sev).toBe('error');
  });
});
