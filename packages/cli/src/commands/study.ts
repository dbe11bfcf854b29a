/**
 * glyphdeck study — flashcards from a cached dataset.
 *
 * Usage:
 *   glyphdeck study            most recently loaded dataset
 *   glyphdeck study 3          third entry of `glyphdeck list`
 *   glyphdeck study "N5 kanji" by name or source
 */

import type { Command } from 'commander';

import { status } from '../ui/spinner.js';
import { parsePhaseSeconds } from './options.js';
import { runAction, studyRecords, type CommandDeps } from './shared.js';

interface StudyOptions {
  characterSeconds?: number;
  answerSeconds?: number;
  shuffle?: boolean;
}

export function registerStudyCommand(program: Command, deps: CommandDeps): void {
  program
    .command('study')
    .description('Study a cached dataset')
    .argument('[selector]', 'Position in `list`, name, or source', '1')
    .option('--character-seconds <n>', 'Seconds the character is shown alone', parsePhaseSeconds)
    .option('--answer-seconds <n>', 'Seconds the reading and meaning are shown', parsePhaseSeconds)
    .option('--shuffle', 'Shuffle the cards before starting')
    .option('--no-shuffle', 'Keep the stored order')
    .action(async (selector: string, opts: StudyOptions) => {
      await runAction(async () => {
        const ctx = await deps.openContext();
        const lookup = await ctx.loader.openCached(selector);

        switch (lookup.status) {
          case 'missing-entry': {
            const entries = await ctx.store.listEntries();
            status.error(
              entries.length === 0
                ? 'No cached datasets yet. Load one with `glyphdeck load <file>` or `glyphdeck sheet <url>`.'
                : `No cached dataset matches "${selector}". Run \`glyphdeck list\` to see them.`
            );
            process.exitCode = 1;
            return;
          }
          case 'missing-file':
            status.error(
              `The cached data for "${lookup.entry.name}" is missing. Load ${lookup.entry.source} again.`
            );
            process.exitCode = 1;
            return;
          case 'found':
            await studyRecords(ctx, deps, lookup.records, lookup.entry.name, {
              characterSeconds: opts.characterSeconds,
              answerSeconds: opts.answerSeconds,
              shuffle: opts.shuffle,
            });
        }
      });
    });
}
