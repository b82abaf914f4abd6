import type { AnalysisErrorCode } from '../errors/AnalysisError.js';

/**
 * Header strings of one message as yielded by a message source
 */
export interface RawMessageHeaders {
  from?: string;
  date?: string;
}

/**
 * One accepted message reduced to its normalized sender and timestamp
 */
export interface MailRecord {
  sender: string;
  timestamp: Date;
}

/**
 * Policy for Date headers that match no supported pattern
 */
export type InvalidDatePolicy = 'skip' | 'fail';

export interface ExtractionOptions {
  /** Minimum number of messages for a sender to be kept (inclusive) */
  threshold: number;
  onInvalidDate?: InvalidDatePolicy;
}

/**
 * A message that was left out of the analysis
 */
export interface SkippedMessage {
  index: number;
  code: AnalysisErrorCode;
  message: string;
}

export interface ExtractionResult {
  mailsPerSender: Map<string, number>;
  datetimesPerSender: Map<string, Date[]>;
  skipped: SkippedMessage[];
}

export interface SenderFeatureRow {
  sender: string;
  mailCount: number;
  avgSecondsSinceMidnight: number;
  avgWeekday: number;
}

export const FEATURE_COLUMNS = ['mailCount', 'avgSecondsSinceMidnight', 'avgWeekday'] as const;

export type FeatureColumn = (typeof FEATURE_COLUMNS)[number];

/**
 * Numeric feature rows aligned 1:1 with their sender identifiers
 */
export interface FeatureMatrix {
  identifiers: string[];
  columns: readonly FeatureColumn[];
  rows: number[][];
}

export type DistanceMatrix = readonly (readonly number[])[];

/**
 * Distance function over feature vectors
 */
export type Metric = (a: readonly number[], b: readonly number[]) => number;

/** [birth, death]; death is Infinity for essential classes */
export type PersistencePair = [number, number];

export interface ConnectedComponents {
  identifiers: Map<number, string[]>;
  dataPoints: Map<number, number[][]>;
}
