import { describe, it, expect } from '@jest/globals';
import {
  AddressFormatError,
  AnalysisError,
  ConsistencyError,
  DateFormatError,
  ErrorFormatter,
  InputError,
  MissingFieldError,
  SourceUnavailableError,
  UnsupportedDimensionError
} from '../../../src/errors/AnalysisError.js';

describe('AnalysisError', () => {
  it('should carry code, name and details', () => {
    const error = new DateFormatError('yesterday', 4);

    expect(error).toBeInstanceOf(AnalysisError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DateFormatError');
    expect(error.code).toBe('DATE_FORMAT');
    expect(error.message).toBe('date yesterday does not match any supported format');
    expect(error.details).toEqual({ date: 'yesterday', messageIndex: 4 });
  });

  it('should mark only per-message errors as recoverable', () => {
    expect(new MissingFieldError('from').recoverable).toBe(true);
    expect(new AddressFormatError('nobody').recoverable).toBe(true);
    expect(new DateFormatError('never').recoverable).toBe(true);
    expect(new ConsistencyError('sizes differ').recoverable).toBe(false);
    expect(new SourceUnavailableError('inbox.mbox').recoverable).toBe(false);
    expect(new InputError('bad').recoverable).toBe(false);
    expect(new UnsupportedDimensionError(1, 0).recoverable).toBe(false);
  });

  it('should name the missing header', () => {
    expect(new MissingFieldError('date').message).toBe('Message is missing the Date header');
    expect(new MissingFieldError('from').message).toBe('Message is missing the From header');
  });

  it('should include the cause of an unavailable source', () => {
    const error = new SourceUnavailableError('inbox.mbox', new Error('ENOENT'));

    expect(error.message).toBe('Message source inbox.mbox cannot be opened: ENOENT');
    expect(error.originalError?.message).toBe('ENOENT');
  });

  describe('ErrorFormatter', () => {
    it('should format errors for the command line', () => {
      expect(ErrorFormatter.formatErrorForUser(new SourceUnavailableError('inbox.mbox'))).toBe(
        'Message source inbox.mbox cannot be opened. Check MBOX_PATH or --input.'
      );
      expect(ErrorFormatter.formatErrorForUser(new ConsistencyError('sizes differ'))).toBe(
        'Internal consistency check failed: sizes differ'
      );
      expect(ErrorFormatter.formatErrorForUser(new InputError('epsilon must be >= 0, got -1'))).toBe(
        'Invalid input: epsilon must be >= 0, got -1'
      );
      expect(ErrorFormatter.formatErrorForUser(new UnsupportedDimensionError(2, 0))).toBe(
        'Error: Homology dimension 2 is not supported (maximum: 0)'
      );
      expect(ErrorFormatter.formatErrorForUser(new Error('boom'))).toBe('Error: boom');
      expect(ErrorFormatter.formatErrorForUser('boom')).toBe('An unknown error occurred.');
    });

    it('should format errors for logs with their cause', () => {
      const formatted = ErrorFormatter.formatErrorForLogs(
        new SourceUnavailableError('inbox.mbox', new Error('EACCES'))
      );

      expect(formatted).toMatchObject({
        name: 'SourceUnavailableError',
        code: 'SOURCE_UNAVAILABLE',
        details: { source: 'inbox.mbox' },
        cause: { name: 'Error', message: 'EACCES' }
      });
    });

    it('should format non-errors for logs', () => {
      expect(ErrorFormatter.formatErrorForLogs(42)).toEqual({ message: '42', name: 'Unknown' });
    });
  });
});
