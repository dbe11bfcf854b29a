/**
 * Study Screen - Full-terminal flashcard view driven by a StudyTimer
 *
 * Keys:
 *   space        start / stop the timer
 *   ← / →        previous / next card
 *   r            shuffle and return to the first card
 *   q, Ctrl-C    quit
 */

import * as readline from 'node:readline';
import chalk, { type ChalkInstance } from 'chalk';

import type { StudyTimer, StudyView } from 'glyphdeck-core';

export const KEY_HELP = 'space start/stop · ←/→ previous/next · r shuffle · q quit';

/** Clear the screen and move the cursor home */
const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

export interface RenderOptions {
  title: string;
  running: boolean;
  colors?: ChalkInstance;
}

/**
 * The lines of one frame. The answer lines are blank during the character
 * phase so the card does not jump when they appear.
 */
export function renderStudyView(view: StudyView, options: RenderOptions): string[] {
  const c = options.colors ?? chalk;
  const state = options.running ? c.green('running') : c.yellow('paused');

  const lines = [
    `${c.bold(options.title)}  ${c.dim(`${view.position} / ${view.total}`)}  ${state}`,
    '',
    `    ${c.bold(view.record.character)}`,
    '',
  ];

  if (view.phase === 'answer') {
    lines.push(`    ${c.cyan(view.record.reading || '—')}`, `    ${view.record.meaning || '—'}`);
  } else {
    lines.push('', '');
  }

  lines.push('', c.dim(KEY_HELP));
  return lines;
}

/** The fields of a readline keypress the screen reads */
export interface KeyPress {
  name?: string | undefined;
  ctrl?: boolean | undefined;
}

export type KeyAction = 'quit' | 'handled' | 'ignored';

/**
 * Apply one keypress to the timer
 */
export function handleStudyKey(timer: StudyTimer, key: KeyPress): KeyAction {
  if (key.name === 'q' || (key.ctrl && key.name === 'c')) {
    return 'quit';
  }

  switch (key.name) {
    case 'space':
      timer.toggle();
      return 'handled';
    case 'left':
      timer.previous();
      return 'handled';
    case 'right':
      timer.next();
      return 'handled';
    case 'r':
      timer.shuffle();
      return 'handled';
    default:
      return 'ignored';
  }
}

/** Key source; process.stdin in a terminal */
export interface KeyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface ScreenOutput {
  write(text: string): unknown;
}

export interface StudyScreenStreams {
  input?: KeyInput;
  output?: ScreenOutput;
}

export type StudyScreenRunner = (timer: StudyTimer, title: string) => Promise<void>;

/**
 * Take over the terminal until the user quits or the input ends. The
 * timer starts running immediately.
 */
export function runStudyScreen(
  timer: StudyTimer,
  title: string,
  streams: StudyScreenStreams = {}
): Promise<void> {
  const input: KeyInput = streams.input ?? process.stdin;
  const output: ScreenOutput = streams.output ?? process.stdout;

  return new Promise((resolve) => {
    const draw = (): void => {
      const lines = renderStudyView(timer.view(), { title, running: timer.isRunning });
      output.write(CLEAR_SCREEN + lines.join('\n') + '\n');
    };

    const onKeypress = (_text: string | undefined, key: KeyPress | undefined): void => {
      if (!key) {return;}
      if (handleStudyKey(timer, key) === 'quit') {
        finish();
      }
    };

    let finished = false;
    const finish = (): void => {
      if (finished) {return;}
      finished = true;
      input.off('end', finish);
      timer.off('view', draw);
      timer.off('state', draw);
      timer.stop();
      input.off('keypress', onKeypress);
      if (input.isTTY) {
        input.setRawMode?.(false);
      }
      input.pause();
      output.write(SHOW_CURSOR);
      resolve();
    };

    readline.emitKeypressEvents(input);
    if (input.isTTY) {
      input.setRawMode?.(true);
    }
    input.on('keypress', onKeypress);
    // Input that runs out (a pipe or /dev/null) ends the session
    input.once('end', finish);
    input.resume();

    timer.on('view', draw);
    timer.on('state', draw);

    output.write(HIDE_CURSOR);
    draw();
    timer.start();
  });
}
