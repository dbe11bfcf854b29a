/**
 * Configuration Types
 *
 * @module config/types
 */

export interface GlyphdeckConfig {
  /** Seconds the character is shown alone */
  characterSeconds: number;
  /** Seconds the reading and meaning are shown */
  answerSeconds: number;
  /** Shuffle a dataset when a study session starts */
  shuffleOnStudy: boolean;
  /** Character-column values treated as header rows */
  headerLabels: string[];
  /** Sheet tab exported from remote spreadsheets */
  sheetGid: string;
}
