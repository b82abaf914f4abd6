/**
 * Machine-readable codes for every error the analysis can raise
 */
export type AnalysisErrorCode =
  | 'MISSING_FIELD'
  | 'ADDRESS_FORMAT'
  | 'DATE_FORMAT'
  | 'CONSISTENCY'
  | 'SOURCE_UNAVAILABLE'
  | 'INPUT'
  | 'UNSUPPORTED_DIMENSION';

/**
 * Base error class for the sender analysis
 */
export class AnalysisError extends Error {
  public readonly code: AnalysisErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly originalError?: Error;

  constructor(
    code: AnalysisErrorCode,
    message: string,
    details?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message);
    this.name = 'AnalysisError';
    this.code = code;
    this.details = details;
    this.originalError = originalError;

    // Maintain proper stack trace
    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * Whether the error only affects a single message
   */
  get recoverable(): boolean {
    return false;
  }
}

/**
 * Sender or date header absent from a message
 */
export class MissingFieldError extends AnalysisError {
  constructor(public readonly field: 'from' | 'date', messageIndex?: number) {
    super('MISSING_FIELD', `Message is missing the ${field === 'from' ? 'From' : 'Date'} header`, {
      field,
      messageIndex
    });
    this.name = 'MissingFieldError';
  }

  override get recoverable(): boolean {
    return true;
  }
}

/**
 * Sender header without exactly one "@"
 */
export class AddressFormatError extends AnalysisError {
  constructor(sender: string, messageIndex?: number) {
    super('ADDRESS_FORMAT', `Sender "${sender}" does not contain exactly one "@"`, {
      sender,
      messageIndex
    });
    this.name = 'AddressFormatError';
  }

  override get recoverable(): boolean {
    return true;
  }
}

/**
 * Date header that matches none of the supported patterns
 */
export class DateFormatError extends AnalysisError {
  constructor(date: string, messageIndex?: number) {
    super('DATE_FORMAT', `date ${date} does not match any supported format`, {
      date,
      messageIndex
    });
    this.name = 'DateFormatError';
  }

  override get recoverable(): boolean {
    return true;
  }
}

/**
 * Distance matrix, identifiers and labels disagree
 */
export class ConsistencyError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONSISTENCY', message, details);
    this.name = 'ConsistencyError';
  }
}

/**
 * The message source cannot be opened
 */
export class SourceUnavailableError extends AnalysisError {
  constructor(source: string, originalError?: Error) {
    super(
      'SOURCE_UNAVAILABLE',
      `Message source ${source} cannot be opened${originalError ? `: ${originalError.message}` : ''}`,
      { source },
      originalError
    );
    this.name = 'SourceUnavailableError';
  }
}

/**
 * Invalid configuration value or argument
 */
export class InputError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INPUT', message, details);
    this.name = 'InputError';
  }
}

/**
 * Persistence requested for a homology dimension the engine does not compute
 */
export class UnsupportedDimensionError extends AnalysisError {
  constructor(dimension: number, supported: number) {
    super(
      'UNSUPPORTED_DIMENSION',
      `Homology dimension ${dimension} is not supported (maximum: ${supported})`,
      { dimension, supported }
    );
    this.name = 'UnsupportedDimensionError';
  }
}

/**
 * Utility class for formatting errors
 */
export class ErrorFormatter {
  /**
   * Converts internal errors to one-line messages for the command line
   */
  static formatErrorForUser(error: unknown): string {
    if (error instanceof AnalysisError) {
      switch (error.code) {
        case 'SOURCE_UNAVAILABLE':
          return `${error.message}. Check MBOX_PATH or --input.`;

        case 'CONSISTENCY':
          return `Internal consistency check failed: ${error.message}`;

        case 'INPUT':
          return `Invalid input: ${error.message}`;

        default:
          return `Error: ${error.message}`;
      }
    } else if (error instanceof Error) {
      return `Error: ${error.message}`;
    } else {
      return 'An unknown error occurred.';
    }
  }

  /**
   * Generates detailed technical error information for logs
   */
  static formatErrorForLogs(error: unknown): Record<string, unknown> {
    if (!(error instanceof Error)) {
      return { message: String(error), name: 'Unknown' };
    }

    const result: Record<string, unknown> = {
      message: error.message,
      name: error.name,
      stack: error.stack
    };

    if (error instanceof AnalysisError) {
      result.code = error.code;
      if (error.details) {
        result.details = error.details;
      }
      if (error.originalError) {
        result.cause = this.formatErrorForLogs(error.originalError);
      }
    }

    return result;
  }
}
