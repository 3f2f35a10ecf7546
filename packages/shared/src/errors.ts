/**
 * Error types for the reference rate pipeline
 *
 * Text-path errors (missing field, unparsable or ambiguous date, bad time)
 * are recovered by the image fallback. Exhaustion errors are surfaced.
 */

export class RatekeeperError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * No attempt (direct, mirror or proxied) produced a valid PDF
 */
export class AcquisitionExhaustedError extends RatekeeperError {
  constructor(attempts: number, options?: { cause?: unknown }) {
    super(
      `Unable to retrieve a valid PDF after ${attempts} attempts`,
      'ACQUISITION_EXHAUSTED',
      { attempts },
      options
    );
  }
}

export class MissingFieldError extends RatekeeperError {
  constructor(field: 'date' | 'time') {
    super(`No line starting with "${field}" found in the text`, 'MISSING_FIELD', { field });
  }
}

export class DateParseError extends RatekeeperError {
  constructor(line: string) {
    super(`Failed to parse date from '${line}'`, 'DATE_PARSE', { line });
  }
}

export class AmbiguousDateError extends RatekeeperError {
  constructor(line: string, candidates: [string, string], reference?: string) {
    super(`Unable to parse date with confidence from '${line}'`, 'AMBIGUOUS_DATE', {
      line,
      candidates,
      reference,
    });
  }
}

export class TimeParseError extends RatekeeperError {
  constructor(line: string) {
    super(`Failed to parse time from '${line}'`, 'TIME_PARSE', { line });
  }
}

/**
 * Neither text extraction nor any rendered page yielded the rate table
 */
export class ExtractionExhaustedError extends RatekeeperError {
  constructor(pagesTried: number, options?: { cause?: unknown }) {
    super(
      'Unable to extract reference rates from text or images',
      'EXTRACTION_EXHAUSTED',
      { pagesTried },
      options
    );
  }
}

export class ConfigurationError extends RatekeeperError {
  constructor(message: string, setting: string) {
    super(message, 'CONFIGURATION', { setting });
  }
}

export class SeriesFormatError extends RatekeeperError {
  constructor(filePath: string, detail: string) {
    super(`Malformed series file ${filePath}: ${detail}`, 'SERIES_FORMAT', { filePath });
  }
}
