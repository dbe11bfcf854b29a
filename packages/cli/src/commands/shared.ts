/**
 * Pieces shared by the command modules
 */

import {
  ConfigValidationException,
  errorMessage,
  StudySession,
  StudyTimer,
  type CharacterRecord,
  type LoadedDataset,
} from 'glyphdeck-core';

import { status, withSpinner } from '../ui/spinner.js';

import type { CliContext } from '../context.js';
import type { StudyScreenRunner } from '../ui/study-screen.js';

export interface CommandDeps {
  openContext(): Promise<CliContext>;
  runStudyScreen: StudyScreenRunner;
}

/**
 * Run a command body; any error it throws is reported and sets exit code 1.
 */
export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  }
}

export function reportError(error: unknown): void {
  if (error instanceof ConfigValidationException) {
    status.error(error.message);
    console.log(error.formatErrors());
    return;
  }
  status.error(errorMessage(error));
}

/**
 * Load a dataset behind a spinner. Failures are shown on the spinner, set
 * exit code 1 and yield null.
 */
export async function loadWithSpinner(
  text: string,
  load: () => Promise<LoadedDataset>
): Promise<LoadedDataset | null> {
  try {
    return await withSpinner(text, load, {
      successText: (dataset) =>
        `Cached ${dataset.records.length} record(s) as "${dataset.name}"`,
    });
  } catch {
    process.exitCode = 1;
    return null;
  }
}

export interface StudyOverrides {
  characterSeconds?: number | undefined;
  answerSeconds?: number | undefined;
  shuffle?: boolean | undefined;
}

/**
 * Build a session over the records and hand it to the study screen.
 * Overrides win over the configuration.
 */
export async function studyRecords(
  ctx: CliContext,
  deps: CommandDeps,
  records: readonly CharacterRecord[],
  title: string,
  overrides: StudyOverrides = {}
): Promise<void> {
  const session = new StudySession(records, {
    shuffle: overrides.shuffle ?? ctx.config.shuffleOnStudy,
    source: title,
  });
  const timer = new StudyTimer(session, {
    characterMs: (overrides.characterSeconds ?? ctx.config.characterSeconds) * 1000,
    answerMs: (overrides.answerSeconds ?? ctx.config.answerSeconds) * 1000,
  });

  ctx.logger.debug(`Studying ${session.total} record(s) from "${title}"`);
  try {
    await deps.runStudyScreen(timer, title);
  } finally {
    timer.dispose();
  }
}
