import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SenderClusteringPipeline } from '../../../src/pipeline/SenderClusteringPipeline.js';
import { MboxMessageSource } from '../../../src/mailbox/MboxMessageSource.js';
import {
  DateFormatError,
  InputError,
  SourceUnavailableError,
  UnsupportedDimensionError
} from '../../../src/errors/AnalysisError.js';
import { InMemoryMessageSource, mockMessages } from '../../fixtures/mockMessages.js';

describe('SenderClusteringPipeline Integration', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sender-pipeline-'));
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('should keep only senders at or above the threshold', () => {
    const pipeline = new SenderClusteringPipeline(
      { source: new InMemoryMessageSource(mockMessages) },
      { output: { directory: outputDir }, extraction: { threshold: 2 } }
    );

    const result = pipeline.run();

    expect(result.features).toEqual([
      { sender: 'alice@example.com', mailCount: 5, avgSecondsSinceMidnight: 35280, avgWeekday: 2 }
    ]);
    expect(result.reportPath).toBe(path.join(outputDir, 'connected_components_epsilon_0.6.txt'));
    expect(fs.readFileSync(result.reportPath, 'utf8')).toBe('Cluster 0: alice@example.com\n');
    expect(result.persistence.diagrams).toEqual([[[0, Infinity]]]);
  });

  it('should record every skipped message', () => {
    const result = new SenderClusteringPipeline(
      { source: new InMemoryMessageSource(mockMessages) },
      { output: { directory: outputDir } }
    ).run();

    expect(result.skipped.map(({ index, code }) => [index, code])).toEqual([
      [6, 'MISSING_FIELD'],
      [7, 'MISSING_FIELD'],
      [8, 'ADDRESS_FORMAT'],
      [9, 'ADDRESS_FORMAT'],
      [10, 'DATE_FORMAT']
    ]);
  });

  it('should separate distant senders and merge them at a larger epsilon', () => {
    const source = new InMemoryMessageSource(mockMessages);

    const separate = new SenderClusteringPipeline(
      { source },
      { output: { directory: outputDir } }
    ).run();
    const merged = new SenderClusteringPipeline(
      { source },
      { output: { directory: outputDir }, clustering: { epsilon: 2 } }
    ).run();

    expect(separate.senderCount).toBe(2);
    expect(separate.clusterCount).toBe(2);
    expect(fs.readFileSync(separate.reportPath, 'utf8')).toBe(
      'Cluster 0: alice@example.com\nCluster 1: bob@example.org\n'
    );
    expect(separate.components.dataPoints.get(0)).toEqual([[1, 0, 0]]);
    expect(separate.components.dataPoints.get(1)).toEqual([[0, 1, 1]]);

    const [h0] = separate.persistence.diagrams;
    expect(h0).toHaveLength(2);
    expect(h0[0][1]).toBeCloseTo(Math.sqrt(3), 10);
    expect(h0[1]).toEqual([0, Infinity]);

    expect(path.basename(merged.reportPath)).toBe('connected_components_epsilon_2.0.txt');
    expect(fs.readFileSync(merged.reportPath, 'utf8')).toBe(
      'Cluster 0: alice@example.com, bob@example.org\n'
    );
  });

  it('should put senders with identical features in one cluster at epsilon 0', () => {
    const source = new InMemoryMessageSource([
      { from: 'y@example.com', date: 'Mon, 5 Jun 2023 10:00:00 +0200' },
      { from: 'x@example.com', date: 'Mon, 5 Jun 2023 10:00:00 +0200' }
    ]);

    const result = new SenderClusteringPipeline(
      { source },
      { output: { directory: outputDir }, clustering: { epsilon: 0 } }
    ).run();

    expect(result.persistence.distanceMatrix).toEqual([
      [0, 0],
      [0, 0]
    ]);
    expect(result.persistence.diagrams).toEqual([[[0, Infinity]]]);
    expect(fs.readFileSync(result.reportPath, 'utf8')).toBe('Cluster 0: y@example.com, x@example.com\n');
  });

  it('should read an mbox file end to end', () => {
    const result = new SenderClusteringPipeline(
      { source: new MboxMessageSource(path.join(__dirname, '../../fixtures/sample.mbox')) },
      { output: { directory: outputDir }, clustering: { epsilon: 0.6 } }
    ).run();

    // carol has no Date header
    expect(result.skipped).toHaveLength(1);
    expect(result.features.map((row) => row.sender)).toEqual(['alice@example.com', 'bob@example.org']);
    expect(fs.readFileSync(result.reportPath, 'utf8')).toBe(
      'Cluster 0: alice@example.com\nCluster 1: bob@example.org\n'
    );
  });

  it('should write the summary when asked to', () => {
    const result = new SenderClusteringPipeline(
      { source: new InMemoryMessageSource(mockMessages) },
      { output: { directory: outputDir, writeSummary: true }, extraction: { threshold: 2 } }
    ).run();

    expect(result.summaryPath).toBe(path.join(outputDir, 'sender_features_epsilon_0.6.json'));
    const summary: unknown = JSON.parse(fs.readFileSync(path.join(outputDir, 'sender_features_epsilon_0.6.json'), 'utf8'));
    expect(summary).toEqual({
      epsilon: 0.6,
      threshold: 2,
      senders: [{ sender: 'alice@example.com', mailCount: 5, avgSecondsSinceMidnight: 35280, avgWeekday: 2 }],
      persistence: { h0: [[0, null]] },
      clusters: [{ label: 0, members: ['alice@example.com'] }]
    });
  });

  it('should write an empty report when no sender meets the threshold', () => {
    const result = new SenderClusteringPipeline(
      { source: new InMemoryMessageSource(mockMessages) },
      { output: { directory: outputDir }, extraction: { threshold: 10 } }
    ).run();

    expect(result.senderCount).toBe(0);
    expect(result.persistence.diagrams).toEqual([[]]);
    expect(fs.readFileSync(result.reportPath, 'utf8')).toBe('');
  });

  describe('Error Handling', () => {
    it('should stop before writing anything when the source is unavailable', () => {
      const reportDir = path.join(outputDir, 'reports');
      const pipeline = new SenderClusteringPipeline(
        { source: new InMemoryMessageSource(mockMessages, false) },
        { output: { directory: reportDir } }
      );

      expect(() => pipeline.run()).toThrow(SourceUnavailableError);
      expect(fs.existsSync(reportDir)).toBe(false);
    });

    it('should abort on an unparsable date when configured to fail', () => {
      const pipeline = new SenderClusteringPipeline(
        { source: new InMemoryMessageSource(mockMessages) },
        { output: { directory: outputDir }, extraction: { onInvalidDate: 'fail' } }
      );

      expect(() => pipeline.run()).toThrow(DateFormatError);
      expect(fs.readdirSync(outputDir)).toEqual([]);
    });

    it('should validate the configuration before opening the source', () => {
      const source = new InMemoryMessageSource(mockMessages);
      const pipeline = new SenderClusteringPipeline(
        { source },
        { output: { directory: outputDir }, clustering: { epsilon: -1 } }
      );

      expect(() => pipeline.run()).toThrow(InputError);
      expect(source.opened).toBe(false);
    });

    it('should reject homology dimensions the engine does not compute', () => {
      const pipeline = new SenderClusteringPipeline(
        { source: new InMemoryMessageSource(mockMessages) },
        { output: { directory: outputDir }, clustering: { maxDimension: 1 } }
      );

      expect(() => pipeline.run()).toThrow(UnsupportedDimensionError);
    });
  });
});
