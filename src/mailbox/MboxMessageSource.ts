import fs from 'fs';
import path from 'path';
import { StringDecoder } from 'string_decoder';
import { RawMessageHeaders } from '../types/index.js';
import { IMessageSource } from './IMessageSource.js';
import { SourceUnavailableError } from '../errors/AnalysisError.js';
import { logger } from '../utils/logger.js';

const DEFAULT_CHUNK_SIZE = 64 * 1024;

type TrackedHeader = keyof RawMessageHeaders;

/**
 * Incremental state of the message currently being read
 */
interface MessageState {
  headers: RawMessageHeaders;
  inHeaders: boolean;
  lastHeader: TrackedHeader | null;
}

/**
 * Reads From and Date headers out of an MBOX file (RFC4155).
 *
 * A message starts at a "From " line that follows a blank line or the start
 * of the file. Only the header block of each message is examined.
 */
export class MboxMessageSource implements IMessageSource {
  private readonly filePath: string;
  private readonly chunkSize: number;

  constructor(filePath: string, options: { chunkSize?: number } = {}) {
    this.filePath = path.resolve(filePath);
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  /** @inheritdoc */
  describe(): string {
    return this.filePath;
  }

  /** @inheritdoc */
  open(): void {
    let stats: fs.Stats;
    try {
      fs.accessSync(this.filePath, fs.constants.R_OK);
      stats = fs.statSync(this.filePath);
    } catch (error) {
      throw new SourceUnavailableError(this.filePath, error instanceof Error ? error : new Error(String(error)));
    }

    if (!stats.isFile()) {
      throw new SourceUnavailableError(this.filePath, new Error('not a regular file'));
    }
  }

  /** @inheritdoc */
  *messages(): Generator<RawMessageHeaders> {
    let fd: number;
    try {
      fd = fs.openSync(this.filePath, 'r');
    } catch (error) {
      throw new SourceUnavailableError(this.filePath, error instanceof Error ? error : new Error(String(error)));
    }

    const decoder = new StringDecoder('utf8');
    const buffer = Buffer.alloc(this.chunkSize);
    let current: MessageState | null = null;
    let previousBlank = true;
    let remainder = '';
    let messageCount = 0;

    try {
      let bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null);
      while (bytesRead > 0) {
        const text = remainder + decoder.write(buffer.subarray(0, bytesRead));
        const lines = text.split('\n');
        remainder = lines.pop() ?? '';

        for (const rawLine of lines) {
          const line = stripCarriageReturn(rawLine);
          if (previousBlank && line.startsWith('From ')) {
            if (current) {
              messageCount++;
              yield current.headers;
            }
            current = { headers: {}, inHeaders: true, lastHeader: null };
          } else if (current?.inHeaders) {
            this.consumeHeaderLine(current, line);
          }
          previousBlank = line.length === 0;
        }

        bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null);
      }

      const tail = stripCarriageReturn(remainder + decoder.end());
      if (tail.length > 0) {
        if (previousBlank && tail.startsWith('From ')) {
          if (current) {
            messageCount++;
            yield current.headers;
          }
          current = { headers: {}, inHeaders: true, lastHeader: null };
        } else if (current?.inHeaders) {
          this.consumeHeaderLine(current, tail);
        }
      }

      if (current) {
        messageCount++;
        yield current.headers;
      }

      logger.debug('MboxMessageSource: Finished reading mailbox', {
        file: this.filePath,
        messageCount
      });
    } finally {
      fs.closeSync(fd);
    }
  }

  /**
   * Applies one header line to the message state, unfolding continuation lines
   */
  private consumeHeaderLine(state: MessageState, line: string): void {
    if (line.length === 0) {
      state.inHeaders = false;
      state.lastHeader = null;
      return;
    }

    if (/^[ \t]/.test(line)) {
      if (state.lastHeader) {
        state.headers[state.lastHeader] = `${state.headers[state.lastHeader] ?? ''} ${line.trim()}`;
      }
      return;
    }

    state.lastHeader = null;
    const match = line.match(/^([^:\s]+):[ \t]*(.*)$/);
    if (!match) {
      return;
    }

    const name = match[1].toLowerCase();
    if ((name === 'from' || name === 'date') && state.headers[name] === undefined) {
      state.headers[name] = match[2].trimEnd();
      state.lastHeader = name;
    }
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
