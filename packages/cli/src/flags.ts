import { ConfigError, ErrorCode } from '@fieldwarden/core';

export type OutputFormat = 'text' | 'json';

/**
 * Raw commander option values; numbers arrive as strings and are parsed here
 */
export interface ValidateCliOptions {
  schema?: string;
  data?: string;
  partial?: boolean;
  maxErrors?: string;
  redact?: string;
  format?: string;
  schemaId?: string;
}

export interface PresenceCliOptions {
  data?: string;
  leaves?: boolean;
  maxDepth?: string;
  maxFields?: string;
}

function invalidFlag(flag: string, message: string, value: unknown): never {
  throw new ConfigError({
    message: `${flag} ${message}`,
    errorCode: ErrorCode.CONFIGURATION_ERROR,
    context: { setting: flag, value },
  });
}

export function requireFlag(flag: string, value: string | undefined): string {
  if (value === undefined || value.trim() === '') {
    invalidFlag(flag, 'is required', value);
  }
  return value;
}

/**
 * Parse an integer flag; `undefined` when the flag was not given
 */
export function parseCount(
  flag: string,
  value: string | undefined,
  minimum: number
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < minimum) {
    invalidFlag(flag, `must be an integer >= ${minimum}, got "${value}"`, value);
  }
  return parsed;
}

export function resolveOutputFormat(value: string | undefined): OutputFormat {
  const format = (value ?? 'text').toLowerCase();
  if (format === 'text' || format === 'json') return format;
  return invalidFlag('--format', `must be text or json, got "${value}"`, value);
}

/** `password, token` -> `['password', 'token']` */
export function parseRedact(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}
