import { IMessageSource } from '../mailbox/IMessageSource.js';
import { IPersistenceEngine, PersistenceResult } from '../persistence/interfaces/IPersistenceEngine.js';
import { RipsZeroDimensionalEngine } from '../persistence/RipsZeroDimensionalEngine.js';
import { AnalysisConfigManager, AnalysisConfigOverrides, AnalysisSystemConfig } from '../config/AnalysisConfig.js';
import { extractMailRecords } from '../extraction/MailRecordExtractor.js';
import { aggregateFeatures, minMaxScale, toFeatureMatrix } from '../features/FeatureAggregator.js';
import { compositeDistance } from '../metric/CompositeMetric.js';
import { extractConnectedComponents } from '../clustering/ClusterExtractor.js';
import { writeConnectedComponents, writeSummary } from '../report/ReportWriter.js';
import {
  ConnectedComponents,
  Metric,
  SenderFeatureRow,
  SkippedMessage
} from '../types/index.js';
import { ErrorFormatter } from '../errors/AnalysisError.js';
import { logger } from '../utils/logger.js';

export interface PipelineDependencies {
  source: IMessageSource;
  engine?: IPersistenceEngine;
  metric?: Metric;
}

export interface PipelineResult {
  reportPath: string;
  summaryPath?: string;
  senderCount: number;
  clusterCount: number;
  features: SenderFeatureRow[];
  persistence: PersistenceResult;
  components: ConnectedComponents;
  skipped: SkippedMessage[];
}

/**
 * Runs the whole analysis: mailbox -> mail records -> features ->
 * persistence -> connected components -> report.
 */
export class SenderClusteringPipeline {
  private readonly configManager: AnalysisConfigManager;
  private readonly source: IMessageSource;
  private readonly engine: IPersistenceEngine;
  private readonly metric: Metric;

  constructor(dependencies: PipelineDependencies, config?: AnalysisConfigOverrides) {
    this.configManager = new AnalysisConfigManager(config);
    this.source = dependencies.source;
    this.engine = dependencies.engine ?? new RipsZeroDimensionalEngine();
    this.metric = dependencies.metric ?? compositeDistance;
  }

  getConfig(): AnalysisSystemConfig {
    return this.configManager.getConfig();
  }

  /**
   * Executes the run. Fatal errors propagate unchanged; nothing is written
   * before every stage up to the clustering has succeeded.
   */
  run(): PipelineResult {
    this.configManager.assertValid();
    const config = this.configManager.getConfig();

    const startTime = Date.now();
    logger.info('SenderClusteringPipeline: Starting run', {
      source: this.source.describe(),
      threshold: config.extraction.threshold,
      epsilon: config.clustering.epsilon
    });

    try {
      this.source.open();

      const extraction = extractMailRecords(this.source.messages(), {
        threshold: config.extraction.threshold,
        onInvalidDate: config.extraction.onInvalidDate
      });

      const features = aggregateFeatures(extraction.mailsPerSender, extraction.datetimesPerSender);
      if (features.length === 0) {
        logger.warn('SenderClusteringPipeline: No sender meets the threshold', {
          threshold: config.extraction.threshold
        });
      }

      const unscaled = toFeatureMatrix(features);
      const matrix = config.features.scaleFeatures ? minMaxScale(unscaled) : unscaled;

      const persistence = this.engine.compute({
        points: matrix.rows,
        identifiers: matrix.identifiers,
        metric: this.metric,
        maxDimension: config.clustering.maxDimension
      });

      const components = extractConnectedComponents(persistence, matrix.rows, config.clustering.epsilon);

      const reportPath = writeConnectedComponents(
        components.identifiers,
        config.output.directory,
        config.clustering.epsilon
      );

      const summaryPath = config.output.writeSummary
        ? writeSummary(
            {
              epsilon: config.clustering.epsilon,
              threshold: config.extraction.threshold,
              features,
              h0Diagram: persistence.diagrams[0] ?? [],
              components
            },
            config.output.directory
          )
        : undefined;

      logger.info('SenderClusteringPipeline: Run complete', {
        senders: features.length,
        clusters: components.identifiers.size,
        skipped: extraction.skipped.length,
        durationMs: Date.now() - startTime
      });

      return {
        reportPath,
        summaryPath,
        senderCount: features.length,
        clusterCount: components.identifiers.size,
        features,
        persistence,
        components,
        skipped: extraction.skipped
      };
    } catch (error) {
      logger.error('SenderClusteringPipeline: Run failed', ErrorFormatter.formatErrorForLogs(error));
      throw error;
    }
  }
}
