/**
 * glyphdeck sheet — cache a shared online spreadsheet.
 */

import type { Command } from 'commander';
import { loadWithSpinner, runAction, studyRecords, type CommandDeps } from './shared.js';

interface SheetOptions {
  name?: string;
  gid?: string;
  study?: boolean;
}

export function registerSheetCommand(program: Command, deps: CommandDeps): void {
  program
    .command('sheet')
    .description('Load a spreadsheet shared by link into the cache')
    .argument('<url>', 'Shareable spreadsheet URL')
    .option('-n, --name <name>', 'Display name (defaults to sheet-YYYYMMDD)')
    .option('--gid <gid>', 'Tab to export (defaults to the configured sheetGid)')
    .option('--study', 'Start studying as soon as the sheet is loaded')
    .action(async (url: string, opts: SheetOptions) => {
      await runAction(async () => {
        const ctx = await deps.openContext();
        const dataset = await loadWithSpinner('Fetching spreadsheet', () =>
          ctx.loader.loadRemoteSheet(url, { name: opts.name, gid: opts.gid })
        );
        if (dataset && opts.study) {
          await studyRecords(ctx, deps, dataset.records, dataset.name);
        }
      });
    });
}
