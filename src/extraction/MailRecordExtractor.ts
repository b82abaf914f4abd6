import {
  ExtractionOptions,
  ExtractionResult,
  MailRecord,
  RawMessageHeaders,
  SkippedMessage
} from '../types/index.js';
import {
  AddressFormatError,
  AnalysisError,
  AnalysisErrorCode,
  InputError,
  MissingFieldError
} from '../errors/AnalysisError.js';
import { parseMailDate } from './DateParser.js';
import { getStageLogger } from '../utils/logger.js';

const log = getStageLogger('extraction');

/**
 * Reduces a From header to a lowercase address.
 * "Jane Doe <Jane@Example.com>" becomes "jane@example.com".
 * @throws AddressFormatError if the header does not hold exactly one "@"
 */
export function normalizeSender(from: string, messageIndex?: number): string {
  if (from.split('@').length !== 2) {
    throw new AddressFormatError(from, messageIndex);
  }

  let address = from.trim();
  const open = address.indexOf('<');
  const close = open === -1 ? -1 : address.indexOf('>', open + 1);
  if (open !== -1 && close !== -1) {
    address = address.slice(open + 1, close).trim();
  }

  return address.toLowerCase();
}

/**
 * Turns one message into a MailRecord
 * @throws MissingFieldError, AddressFormatError or DateFormatError
 */
export function toMailRecord(headers: RawMessageHeaders, messageIndex?: number): MailRecord {
  if (headers.from === undefined) {
    throw new MissingFieldError('from', messageIndex);
  }
  if (headers.date === undefined) {
    throw new MissingFieldError('date', messageIndex);
  }

  return {
    sender: normalizeSender(headers.from, messageIndex),
    timestamp: parseMailDate(headers.date, messageIndex)
  };
}

/**
 * Extracts per-sender message counts and timestamps from a message sequence.
 *
 * Messages with a missing header or a malformed sender are skipped. Messages
 * with an unparsable date are skipped as well, unless `onInvalidDate` is
 * 'fail', in which case the DateFormatError aborts the extraction.
 * Only senders with at least `threshold` messages are returned.
 */
export function extractMailRecords(
  messages: Iterable<RawMessageHeaders>,
  options: ExtractionOptions
): ExtractionResult {
  const { threshold, onInvalidDate = 'skip' } = options;
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new InputError(`threshold must be an integer >= 1, got ${threshold}`, { threshold });
  }

  const mailsPerAddress = new Map<string, number>();
  const datetimesPerAddress = new Map<string, Date[]>();
  const skipped: SkippedMessage[] = [];

  let index = 0;
  for (const headers of messages) {
    const messageIndex = index++;
    let record: MailRecord;
    try {
      record = toMailRecord(headers, messageIndex);
    } catch (error) {
      if (!(error instanceof AnalysisError) || !error.recoverable) {
        throw error;
      }
      if (error.code === 'DATE_FORMAT' && onInvalidDate === 'fail') {
        log.error('Unparsable Date header, aborting', { messageIndex, error: error.message });
        throw error;
      }
      log.debug('Skipping message', { messageIndex, code: error.code, reason: error.message });
      skipped.push({ index: messageIndex, code: error.code, message: error.message });
      continue;
    }

    mailsPerAddress.set(record.sender, (mailsPerAddress.get(record.sender) ?? 0) + 1);
    const timestamps = datetimesPerAddress.get(record.sender);
    if (timestamps) {
      timestamps.push(record.timestamp);
    } else {
      datetimesPerAddress.set(record.sender, [record.timestamp]);
    }
  }

  const mailsPerSender = new Map<string, number>();
  const datetimesPerSender = new Map<string, Date[]>();
  for (const [address, count] of mailsPerAddress) {
    if (count >= threshold) {
      mailsPerSender.set(address, count);
      datetimesPerSender.set(address, datetimesPerAddress.get(address) ?? []);
    }
  }

  log.info('Mail records extracted', {
    messages: index,
    senders: mailsPerAddress.size,
    qualifyingSenders: mailsPerSender.size,
    threshold,
    skipped: summarizeSkipped(skipped)
  });

  return { mailsPerSender, datetimesPerSender, skipped };
}

function summarizeSkipped(skipped: SkippedMessage[]): Partial<Record<AnalysisErrorCode, number>> {
  const summary: Partial<Record<AnalysisErrorCode, number>> = {};
  for (const entry of skipped) {
    summary[entry.code] = (summary[entry.code] ?? 0) + 1;
  }
  return summary;
}
