/**
 * glyphdeck prune — delete cached dataset files no entry refers to.
 */

import type { Command } from 'commander';

import { formatOutput, type OutputFormat } from '../output/index.js';
import { status } from '../ui/spinner.js';
import { parseFormat } from './options.js';
import { runAction, type CommandDeps } from './shared.js';

export function registerPruneCommand(program: Command, deps: CommandDeps): void {
  program
    .command('prune')
    .description('Delete cached dataset files that no entry refers to')
    .option('-f, --format <format>', 'Output format: table, json', parseFormat, 'table')
    .action(async (opts: { format: OutputFormat }) => {
      await runAction(async () => {
        const ctx = await deps.openContext();
        const removed = await ctx.store.pruneOrphans();

        if (opts.format === 'json') {
          process.stdout.write(formatOutput({ removed }, 'json'));
          return;
        }
        if (removed.length === 0) {
          status.info('Nothing to prune.');
          return;
        }
        status.success(`Removed ${removed.length} orphaned dataset file(s)`);
        process.stdout.write(formatOutput(removed, 'table'));
      });
    });
}
