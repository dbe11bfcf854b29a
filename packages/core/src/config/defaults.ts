/**
 * Configuration defaults
 *
 * @module config/defaults
 */

import type { GlyphdeckConfig } from './types.js';

/** Bounds for characterSeconds and answerSeconds */
export const PHASE_SECONDS_RANGE = { min: 1, max: 10 } as const;

export const DEFAULT_CONFIG: GlyphdeckConfig = {
  characterSeconds: 2,
  answerSeconds: 2,
  shuffleOnStudy: true,
  headerLabels: ['한자'],
  sheetGid: '0',
};
