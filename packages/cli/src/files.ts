import fs from 'node:fs';
import path from 'node:path';

import { ErrorCode, InputError } from '@fieldwarden/core';

export interface JsonDocument {
  path: string;
  text: string;
  value: unknown;
}

export function resolvePath(p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
}

/**
 * Read and parse a JSON file, keeping its text for presence computation
 *
 * @throws {InputError} When the file is missing or is not valid JSON
 */
export function readJsonDocument(file: string, what: string): JsonDocument {
  const resolved = resolvePath(file);
  if (!fs.existsSync(resolved)) {
    throw new InputError({
      message: `${what} file not found: ${resolved}`,
      errorCode: ErrorCode.MALFORMED_INPUT,
      context: { path: resolved },
    });
  }

  const text = fs.readFileSync(resolved, 'utf8');
  try {
    return { path: resolved, text, value: JSON.parse(text) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputError({
      message: `invalid JSON in ${what} file ${resolved}: ${message}`,
      errorCode: ErrorCode.MALFORMED_INPUT,
      context: { path: resolved },
      cause: error instanceof Error ? error : undefined,
    });
  }
}
