import type { Command } from 'commander';

import {
  ErrorCode,
  ErrorPresenter,
  getExitCode,
  redactPaths,
  Validator,
  type ValidationError,
} from '@fieldwarden/core';

import { readJsonDocument } from '../files.js';
import {
  parseCount,
  parseRedact,
  requireFlag,
  resolveOutputFormat,
  type OutputFormat,
  type ValidateCliOptions,
} from '../flags.js';
import { renderCLIView } from '../render.js';

export interface ValidateReport {
  valid: boolean;
  truncated: boolean;
  errors: Array<{ path: string; code: string; message: string }>;
}

export function registerValidateCommand(
  program: Command,
  onError: (error: unknown) => never
): void {
  program
    .command('validate')
    .description('Validate a JSON document against a JSON Schema')
    .option('-s, --schema <file>', 'JSON Schema file path')
    .option('-d, --data <file>', 'JSON document to validate')
    .option('--partial', 'Only check fields present in the document', false)
    .option('--max-errors <n>', 'Report at most n violations (0 = all)')
    .option(
      '--redact <paths>',
      'Comma-separated path substrings whose values are hidden'
    )
    .option('--format <format>', 'Output format: text|json', 'text')
    .option('--schema-id <id>', 'Cache key for the schema (default: file path)')
    .action((options: ValidateCliOptions) => {
      try {
        runValidate(options);
      } catch (error) {
        onError(error);
      }
    });
}

/**
 * Validate `--data` against `--schema`, print the outcome to stdout and set
 * the exit code. Input and configuration problems throw.
 */
export function runValidate(options: ValidateCliOptions): ValidateReport {
  const format = resolveOutputFormat(options.format);
  const maxErrors = parseCount('--max-errors', options.maxErrors, 0);
  const redact = parseRedact(options.redact);

  const schema = readJsonDocument(requireFlag('--schema', options.schema), 'schema');
  const data = readJsonDocument(requireFlag('--data', options.data), 'data');

  const validator = new Validator({
    strategy: 'schema',
    redactor: redact.length > 0 ? redactPaths(...redact) : undefined,
  });
  const error = validator.validate(data.value, {
    schema: { id: options.schemaId ?? schema.path, schema: schema.value },
    maxErrors,
    partial: options.partial === true,
    raw: options.partial === true ? data.text : undefined,
  });

  const report = toReport(error);
  process.stdout.write(formatReport(report, error, format) + '\n');
  if (error) {
    process.exitCode = getExitCode(ErrorCode.VALIDATION_FAILED);
  }
  return report;
}

function toReport(error: ValidationError | undefined): ValidateReport {
  return {
    valid: error === undefined,
    truncated: error?.truncated ?? false,
    errors: (error?.fields ?? []).map(({ path, code, message }) => ({
      path,
      code,
      message,
    })),
  };
}

function formatReport(
  report: ValidateReport,
  error: ValidationError | undefined,
  format: OutputFormat
): string {
  if (format === 'json') return JSON.stringify(report, null, 2);
  if (!error) return 'valid';
  const presenter = new ErrorPresenter('dev', {
    colors: process.stdout.isTTY === true,
  });
  return renderCLIView(presenter.formatForCLI(error));
}
