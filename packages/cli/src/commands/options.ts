/**
 * Option parsers shared by the commands
 */

import { InvalidArgumentError } from 'commander';
import { isPhaseSeconds, PHASE_SECONDS_RANGE } from 'glyphdeck-core';

import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../output/index.js';

export function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return value;
}

export function parsePhaseSeconds(value: string): number {
  const seconds = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!isPhaseSeconds(seconds)) {
    throw new InvalidArgumentError(
      `Expected a whole number of seconds from ${PHASE_SECONDS_RANGE.min} to ${PHASE_SECONDS_RANGE.max}.`
    );
  }
  return seconds;
}
