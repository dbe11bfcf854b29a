/**
 * glyphdeck load — cache a local spreadsheet or CSV file.
 */

import type { Command } from 'commander';
import { loadWithSpinner, runAction, studyRecords, type CommandDeps } from './shared.js';

interface LoadOptions {
  name?: string;
  study?: boolean;
}

export function registerLoadCommand(program: Command, deps: CommandDeps): void {
  program
    .command('load')
    .description('Load a local spreadsheet or CSV file into the cache')
    .argument('<file>', 'Path to an .xlsx, .xls, .ods or .csv file')
    .option('-n, --name <name>', 'Display name (defaults to the file name)')
    .option('--study', 'Start studying as soon as the file is loaded')
    .action(async (file: string, opts: LoadOptions) => {
      await runAction(async () => {
        const ctx = await deps.openContext();
        const dataset = await loadWithSpinner(`Loading ${file}`, () =>
          ctx.loader.loadLocalFile(file, opts.name)
        );
        if (dataset && opts.study) {
          await studyRecords(ctx, deps, dataset.records, dataset.name);
        }
      });
    });
}
