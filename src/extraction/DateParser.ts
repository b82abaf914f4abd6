import { parse, isValid } from 'date-fns';
import { DateFormatError } from '../errors/AnalysisError.js';

/**
 * Supported Date header layouts, tried in this order
 */
export const DATE_PATTERNS = [
  'EEE, d MMM yyyy HH:mm:ss',
  'EEE, d MMM yyyy HH:mm',
  'd MMM yyyy HH:mm:ss',
  'd MMM yyyy HH:mm'
] as const;

// Trailing "+0200", "-0700", "(CEST)", "GMT" segments, possibly several
const TRAILING_ZONE = /(?:\s+(?:[+-]\d{4}|\([^)]*\)|[A-Z]{1,5}))+\s*$/;

const REFERENCE_DATE = new Date(2000, 0, 1, 0, 0, 0, 0);

// date-fns reads "yyyy" as one to four digits; headers must carry all four
const FOUR_DIGIT_YEAR = /(?:^|\s)\d{4} \d{1,2}:/;

/**
 * Removes the zone offset and zone comments from the end of a Date header.
 * The wall-clock time of the sender is kept as is.
 */
export function stripZoneOffset(value: string): string {
  return value.trim().replace(TRAILING_ZONE, '').trim();
}

export type DatePattern = (typeof DATE_PATTERNS)[number];

export interface ParsedMailDate {
  timestamp: Date;
  pattern: DatePattern;
}

/**
 * Parses a Date header and reports which pattern matched
 * @throws DateFormatError if no supported pattern matches
 */
export function matchMailDate(value: string, messageIndex?: number): ParsedMailDate {
  // any run of whitespace counts as one separator, e.g. "Mon,  5 Jun"
  const stripped = stripZoneOffset(value).replace(/\s+/g, ' ');
  if (!FOUR_DIGIT_YEAR.test(stripped)) {
    throw new DateFormatError(stripped, messageIndex);
  }

  for (const pattern of DATE_PATTERNS) {
    const parsed = parse(stripped, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return { timestamp: parsed, pattern };
    }
  }

  throw new DateFormatError(stripped, messageIndex);
}

/**
 * Parses a Date header into a local date-time carrying the header's wall-clock fields
 * @throws DateFormatError if no supported pattern matches
 */
export function parseMailDate(value: string, messageIndex?: number): Date {
  return matchMailDate(value, messageIndex).timestamp;
}
