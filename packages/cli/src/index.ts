#!/usr/bin/env node

// fieldwarden CLI: `validate` runs the schema strategy over a JSON document,
// `presence` lists the field paths the document carries.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  isFieldwardenError,
} from '@fieldwarden/core';
import { renderCLIView } from './render.js';
import { registerPresenceCommand } from './commands/presence.js';
import { registerValidateCommand } from './commands/validate.js';

export function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, {
    colors: process.stderr.isTTY === true,
  });

  const error = isFieldwardenError(err) ? err : InternalError.wrap(err);
  console.error(renderCLIView(presenter.formatForCLI(error)));
  return process.exit(error.getExitCode());
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('fieldwarden')
    .description('Validate JSON documents and inspect field presence')
    .version('0.1.0');

  registerValidateCommand(program, handleCliError);
  registerPresenceCommand(program, handleCliError);

  return program;
}

const program = createProgram();

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
