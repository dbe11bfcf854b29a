/**
 * glyphdeck-cli
 *
 * Command-line front end: load spreadsheets into the cache, list and
 * prune cached datasets, and study them as timed flashcards.
 */

import { Command } from 'commander';

import { registerListCommand } from './commands/list.js';
import { registerLoadCommand } from './commands/load.js';
import { registerPruneCommand } from './commands/prune.js';
import { registerSheetCommand } from './commands/sheet.js';
import { registerStudyCommand } from './commands/study.js';
import { createCliContext } from './context.js';
import { runStudyScreen, type StudyScreenRunner } from './ui/study-screen.js';

import type { CommandDeps } from './commands/shared.js';
import type { FetchLike } from 'glyphdeck-core';

export const VERSION = '0.1.0';

export interface ProgramOptions {
  /** Environment for configuration and the data directory */
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  runStudyScreen?: StudyScreenRunner;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('glyphdeck')
    .description('Timed flashcards for characters, their readings and meanings')
    .version(VERSION)
    .option('-v, --verbose', 'Show debug output');

  const deps: CommandDeps = {
    openContext: () =>
      createCliContext({
        verbose: program.opts<{ verbose?: boolean }>().verbose ?? false,
        env: options.env,
        fetch: options.fetch,
      }),
    runStudyScreen: options.runStudyScreen ?? ((timer, title) => runStudyScreen(timer, title)),
  };

  registerLoadCommand(program, deps);
  registerSheetCommand(program, deps);
  registerListCommand(program, deps);
  registerStudyCommand(program, deps);
  registerPruneCommand(program, deps);

  return program;
}

export { createCliContext, type CliContext } from './context.js';
export { formatOutput, type OutputFormat } from './output/index.js';
