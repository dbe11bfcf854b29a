/**
 * glyphdeck list — show cached datasets, most recent first.
 */

import type { Command } from 'commander';
import type { CacheEntry } from 'glyphdeck-core';

import { formatOutput, type OutputFormat } from '../output/index.js';
import { status } from '../ui/spinner.js';
import { parseFormat } from './options.js';
import { runAction, type CommandDeps } from './shared.js';

/**
 * One table row per entry; the position is what `study` accepts
 */
export function toListRows(entries: readonly CacheEntry[]): Array<Record<string, unknown>> {
  return entries.map((entry, i) => ({
    '#': i + 1,
    name: entry.name,
    kind: entry.sourceKind,
    records: entry.count,
    cached: entry.createdAt,
    source: entry.source,
  }));
}

export function registerListCommand(program: Command, deps: CommandDeps): void {
  program
    .command('list')
    .description('List cached datasets, most recent first')
    .option('-f, --format <format>', 'Output format: table, json', parseFormat, 'table')
    .action(async (opts: { format: OutputFormat }) => {
      await runAction(async () => {
        const ctx = await deps.openContext();
        const entries = await ctx.store.listEntries();

        if (opts.format === 'json') {
          process.stdout.write(formatOutput(entries, 'json'));
          return;
        }
        if (entries.length === 0) {
          status.info('No cached datasets yet. Load one with `glyphdeck load <file>` or `glyphdeck sheet <url>`.');
          return;
        }
        process.stdout.write(formatOutput(toListRows(entries), 'table'));
      });
    });
}
