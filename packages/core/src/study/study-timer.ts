/**
 * Study Timer - Drives a StudySession on a fixed rhythm
 *
 * While running, the current phase stays on screen for its duration and
 * then the session advances. Manual navigation restarts the delay so a
 * freshly shown character always gets its full time.
 *
 * Events:
 *   'view'  (view: StudyView)   whenever the visible card or phase changes
 *   'state' (running: boolean)  when the timer starts or stops
 *
 * @module study/study-timer
 */

import { EventEmitter } from 'node:events';

import type { StudySession, StudyView } from './study-session.js';

export interface StudyTimerOptions {
  /** How long the character is shown alone */
  characterMs: number;
  /** How long the reading and meaning are shown */
  answerMs: number;
}

export class StudyTimer extends EventEmitter {
  private readonly session: StudySession;
  private readonly options: StudyTimerOptions;
  private timeout: NodeJS.Timeout | null = null;
  private running = false;

  constructor(session: StudySession, options: StudyTimerOptions) {
    super();
    if (options.characterMs <= 0 || options.answerMs <= 0) {
      throw new RangeError('Study phase durations must be positive');
    }
    this.session = session;
    this.options = options;
  }

  get isRunning(): boolean {
    return this.running;
  }

  view(): StudyView {
    return this.session.view();
  }

  start(): void {
    if (this.running) {return;}
    this.running = true;
    this.emit('state', true);
    this.schedule();
  }

  stop(): void {
    if (!this.running) {return;}
    this.running = false;
    this.clear();
    this.emit('state', false);
  }

  toggle(): void {
    if (this.running) {
      this.stop();
    } else {
      this.start();
    }
  }

  next(): StudyView {
    return this.publish(this.session.next());
  }

  previous(): StudyView {
    return this.publish(this.session.previous());
  }

  shuffle(): StudyView {
    return this.publish(this.session.shuffle());
  }

  /**
   * Stop and release the pending timeout
   */
  dispose(): void {
    this.stop();
    this.removeAllListeners();
  }

  private publish(view: StudyView): StudyView {
    this.emit('view', view);
    if (this.running) {
      this.schedule();
    }
    return view;
  }

  private schedule(): void {
    this.clear();
    const delay =
      this.session.phase === 'character' ? this.options.characterMs : this.options.answerMs;
    this.timeout = setTimeout(() => {
      this.timeout = null;
      this.publish(this.session.advance());
    }, delay);
  }

  private clear(): void {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
  }
}
