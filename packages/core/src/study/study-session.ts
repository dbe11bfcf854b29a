/**
 * Study Session - Position and phase of one pass through a dataset
 *
 * Each record is shown in two phases: the character alone, then the
 * character with its reading and meaning. Advancing from the second
 * phase moves to the next record, wrapping at the end.
 *
 * @module study/study-session
 */

import { EmptyDatasetError } from '../dataset/errors.js';

import type { CharacterRecord } from '../cache/types.js';

export type StudyPhase = 'character' | 'answer';

/**
 * What the presentation layer should show right now
 */
export interface StudyView {
  record: CharacterRecord;
  phase: StudyPhase;
  /** 1-based position in the current order */
  position: number;
  total: number;
}

export interface StudySessionOptions {
  /** Shuffle the records before the first card */
  shuffle?: boolean;
  /** Source of randomness in [0, 1); defaults to Math.random */
  random?: () => number;
  /** Label used in the error for an empty dataset */
  source?: string;
}

export class StudySession {
  private readonly order: CharacterRecord[];
  private readonly random: () => number;
  private index = 0;
  private currentPhase: StudyPhase = 'character';

  /**
   * @throws EmptyDatasetError if there are no records
   */
  constructor(records: readonly CharacterRecord[], options: StudySessionOptions = {}) {
    if (records.length === 0) {
      throw new EmptyDatasetError(options.source ?? 'study session');
    }
    this.order = [...records];
    this.random = options.random ?? Math.random;
    if (options.shuffle) {
      this.shuffleOrder();
    }
  }

  get phase(): StudyPhase {
    return this.currentPhase;
  }

  get position(): number {
    return this.index + 1;
  }

  get total(): number {
    return this.order.length;
  }

  records(): readonly CharacterRecord[] {
    return this.order;
  }

  view(): StudyView {
    const record = this.order[this.index];
    if (!record) {
      throw new RangeError(`Study position ${this.index} is out of range`);
    }
    return {
      record,
      phase: this.currentPhase,
      position: this.position,
      total: this.total,
    };
  }

  /**
   * Character → answer; answer → next record's character.
   */
  advance(): StudyView {
    if (this.currentPhase === 'character') {
      this.currentPhase = 'answer';
      return this.view();
    }
    return this.next();
  }

  next(): StudyView {
    return this.moveTo(this.index + 1);
  }

  previous(): StudyView {
    return this.moveTo(this.index - 1);
  }

  /**
   * Reorder the records at random and return to the first card
   */
  shuffle(): StudyView {
    this.shuffleOrder();
    return this.moveTo(0);
  }

  private moveTo(index: number): StudyView {
    const total = this.order.length;
    this.index = ((index % total) + total) % total;
    this.currentPhase = 'character';
    return this.view();
  }

  // Fisher-Yates
  private shuffleOrder(): void {
    for (let i = this.order.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      const a = this.order[i];
      const b = this.order[j];
      if (a === undefined || b === undefined) {continue;}
      this.order[i] = b;
      this.order[j] = a;
    }
  }
}
