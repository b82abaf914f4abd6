import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { MboxMessageSource } from '../../../src/mailbox/MboxMessageSource.js';
import { SourceUnavailableError } from '../../../src/errors/AnalysisError.js';

const SAMPLE_MBOX = path.join(__dirname, '../../fixtures/sample.mbox');

const EXPECTED_HEADERS = [
  { from: 'Alice Example <alice@example.com>', date: 'Mon, 5 Jun 2023 10:00:00 +0200' },
  { from: 'Bob <bob@example.org>', date: '9 Jun 2023 18:00:00' },
  { from: 'Zoë Carol <carol@example.net>' }
];

describe('MboxMessageSource', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mbox-source-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('open', () => {
    it('should accept a readable file', () => {
      expect(() => new MboxMessageSource(SAMPLE_MBOX).open()).not.toThrow();
    });

    it('should reject a missing file', () => {
      const source = new MboxMessageSource(path.join(tempDir, 'missing.mbox'));

      expect(() => source.open()).toThrow(SourceUnavailableError);
    });

    it('should reject a directory', () => {
      const source = new MboxMessageSource(tempDir);

      expect(() => source.open()).toThrow(expect.objectContaining({ code: 'SOURCE_UNAVAILABLE' }));
    });
  });

  it('should describe itself by its absolute path', () => {
    expect(new MboxMessageSource('inbox.mbox').describe()).toBe(path.resolve('inbox.mbox'));
  });

  describe('messages', () => {
    it('should read the From and Date headers of every message', () => {
      const headers = [...new MboxMessageSource(SAMPLE_MBOX).messages()];

      expect(headers).toEqual(EXPECTED_HEADERS);
    });

    it('should give the same result when chunks split lines and characters', () => {
      const headers = [...new MboxMessageSource(SAMPLE_MBOX, { chunkSize: 7 }).messages()];

      expect(headers).toEqual(EXPECTED_HEADERS);
    });

    it('should handle CRLF line endings and a missing final newline', () => {
      const filePath = path.join(tempDir, 'crlf.mbox');
      fs.writeFileSync(
        filePath,
        [
          'From a@example.com Mon Jun  5 10:00:00 2023',
          'From: a@example.com',
          'Date: 5 Jun 2023 10:00',
          '',
          'body',
          '',
          'From b@example.com Mon Jun  5 11:00:00 2023',
          'Date: 5 Jun 2023 11:00',
          'From: b@example.com'
        ].join('\r\n')
      );

      const headers = [...new MboxMessageSource(filePath).messages()];

      expect(headers).toEqual([
        { from: 'a@example.com', date: '5 Jun 2023 10:00' },
        { date: '5 Jun 2023 11:00', from: 'b@example.com' }
      ]);
    });

    it('should keep the first occurrence of a repeated header', () => {
      const filePath = path.join(tempDir, 'repeated.mbox');
      fs.writeFileSync(
        filePath,
        'From x Mon Jun  5 10:00:00 2023\nFrom: first@example.com\nFrom: second@example.com\n\n'
      );

      expect([...new MboxMessageSource(filePath).messages()]).toEqual([{ from: 'first@example.com' }]);
    });

    it('should yield nothing for an empty file', () => {
      const filePath = path.join(tempDir, 'empty.mbox');
      fs.writeFileSync(filePath, '');

      expect([...new MboxMessageSource(filePath).messages()]).toEqual([]);
    });

    it('should close the file when iteration stops early', () => {
      const closeSpy = jest.spyOn(fs, 'closeSync');
      const source = new MboxMessageSource(SAMPLE_MBOX);

      for (const headers of source.messages()) {
        expect(headers.from).toBe('Alice Example <alice@example.com>');
        break;
      }

      expect(closeSpy).toHaveBeenCalledTimes(1);
    });

    it('should fail when the file disappears before reading', () => {
      const source = new MboxMessageSource(path.join(tempDir, 'gone.mbox'));

      expect(() => [...source.messages()]).toThrow(SourceUnavailableError);
    });
  });
});
