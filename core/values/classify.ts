import { parse as parseDate, isValid } from 'date-fns';
import { Category } from './Category';
import { InputTypeError } from '@core/errors/InputTypeError';
import type { ValueConfig } from '@core/config/types';
import { DEFAULT_VALUE_CONFIG } from '@core/config/defaults';

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

// Day/month/year fields only; the actual date is irrelevant
const REFERENCE_DATE = new Date(2000, 0, 1);

export interface Classification {
  category: Category;
  numericValue: number;
}

/**
 * Anything that turns a raw response into a classification. Implemented by
 * the value factory and by the configured classifiers built here.
 */
export interface Classifier {
  classify(raw: unknown): Classification;
}

/**
 * Parses a full signed decimal, returning NaN for anything else. No
 * surrounding whitespace, no "inf" or "nan" spellings, no hex.
 */
export function parseDecimal(text: string): number {
  return DECIMAL_PATTERN.test(text) ? Number(text) : NaN;
}

export function isDecimalString(text: string): boolean {
  return DECIMAL_PATTERN.test(text);
}

// date-fns reads yyyy as one to four digits
const FOUR_DIGIT_YEAR = /(?:^|\D)\d{4}(?:\D|$)/;

/**
 * Returns the first date format the raw string matches, if any. Only
 * strings with a four-digit run can match, so "1-2-3" and "31-12-99" stay
 * text.
 */
export function matchDateFormat(raw: string, dateFormats: readonly string[]): string | undefined {
  if (!FOUR_DIGIT_YEAR.test(raw)) {
    return undefined;
  }
  return dateFormats.find(format => isValid(parseDate(raw, format, REFERENCE_DATE)));
}

/**
 * Classifies a raw response string. The checks run in a fixed order:
 * blank, missing-data code, decimal, date, text. Codes are checked before
 * numbers so a numeric-looking code such as "-999" stays a code.
 */
export function classify(
  raw: unknown,
  missingCodes: ReadonlySet<string> | readonly string[],
  dateFormats: readonly string[]
): Classification {
  if (typeof raw !== 'string') {
    throw new InputTypeError('Response values must be strings', raw);
  }

  if (raw === '') {
    return { category: Category.Missing, numericValue: 0 };
  }

  const isCode = 'has' in missingCodes ? missingCodes.has(raw) : missingCodes.includes(raw);
  if (isCode) {
    return { category: Category.Code, numericValue: NaN };
  }

  if (DECIMAL_PATTERN.test(raw)) {
    return { category: Category.Number, numericValue: Number(raw) };
  }

  if (matchDateFormat(raw, dateFormats) !== undefined) {
    return { category: Category.Date, numericValue: NaN };
  }

  return { category: Category.Text, numericValue: NaN };
}

/**
 * Binds a value config into a reusable classifier.
 */
export function createClassifier(config: ValueConfig = DEFAULT_VALUE_CONFIG): Classifier {
  const missingCodes = new Set(config.missingDataCodes);
  const dateFormats = [...config.dateFormats];
  return {
    classify: (raw: unknown) => classify(raw, missingCodes, dateFormats)
  };
}

export const defaultClassifier: Classifier = createClassifier();
