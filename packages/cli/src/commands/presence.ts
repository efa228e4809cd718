import type { Command } from 'commander';

import { computePresence, isErr } from '@fieldwarden/core';

import { readJsonDocument } from '../files.js';
import { parseCount, requireFlag, type PresenceCliOptions } from '../flags.js';

export function registerPresenceCommand(
  program: Command,
  onError: (error: unknown) => never
): void {
  program
    .command('presence')
    .description('Print the field paths present in a JSON document')
    .option('-d, --data <file>', 'JSON document to inspect')
    .option('--leaves', 'Only print paths without present descendants', false)
    .option('--max-depth <n>', 'Do not expand containers below this depth')
    .option('--max-fields <n>', 'Fail when the document has more fields')
    .action((options: PresenceCliOptions) => {
      try {
        runPresence(options);
      } catch (error) {
        onError(error);
      }
    });
}

/**
 * Print one present path per line. Depth truncation is reported on stderr.
 */
export function runPresence(options: PresenceCliOptions): string[] {
  const maxDepth = parseCount('--max-depth', options.maxDepth, 1);
  const maxFields = parseCount('--max-fields', options.maxFields, 1);
  const data = readJsonDocument(requireFlag('--data', options.data), 'data');

  const result = computePresence(data.text, { maxDepth, maxFields });
  if (isErr(result)) throw result.error;

  const { presence, depthExceeded, truncatedPaths } = result.value;
  if (depthExceeded) {
    process.stderr.write(
      `[fieldwarden] warning: presence truncated below: ${truncatedPaths.join(', ')}\n`
    );
  }

  const paths = options.leaves === true ? presence.leafPaths() : presence.paths();
  if (paths.length > 0) {
    process.stdout.write(paths.join('\n') + '\n');
  }
  return paths;
}
