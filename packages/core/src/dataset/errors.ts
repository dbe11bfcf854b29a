/**
 * Dataset Errors
 *
 * Loading fails in two distinguishable ways: the source could not be read
 * at all, or it was read but held no usable rows.
 *
 * @module dataset/errors
 */

/**
 * Error thrown when a file, URL or network response cannot be read
 */
export class SourceUnreadableError extends Error {
  public readonly source: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, source: string, errorCause?: Error) {
    super(message);
    this.name = 'SourceUnreadableError';
    this.source = source;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when a URL does not identify a spreadsheet
 */
export class InvalidSheetUrlError extends Error {
  constructor(public readonly url: string) {
    super(`Not a recognised spreadsheet URL: ${url}`);
    this.name = 'InvalidSheetUrlError';
  }
}

/**
 * Error thrown when a source was read but produced no records
 */
export class EmptyDatasetError extends Error {
  constructor(public readonly source: string) {
    super(`No data found in ${source}`);
    this.name = 'EmptyDatasetError';
  }
}
