#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { AnalysisConfigManager, loadConfigFromEnv, parseArguments } from './config/AnalysisConfig.js';
import { MboxMessageSource } from './mailbox/MboxMessageSource.js';
import { SenderClusteringPipeline } from './pipeline/SenderClusteringPipeline.js';
import { ErrorFormatter, InputError } from './errors/AnalysisError.js';
import { logger } from './utils/logger.js';

/**
 * Command line entry point.
 * Settings come from .env, then the environment, then --key=value arguments.
 */
function main(): number {
  dotenv.config();
  // the logger is created before .env is loaded
  if (process.env.LOG_LEVEL) {
    logger.level = process.env.LOG_LEVEL;
  }

  try {
    const settings = { ...process.env, ...parseArguments(process.argv.slice(2)) };
    const configManager = new AnalysisConfigManager(loadConfigFromEnv(settings));
    const config = configManager.getConfig();

    if (!config.input.mboxPath) {
      throw new InputError('No mailbox given: set MBOX_PATH or pass --input=<file>');
    }

    const pipeline = new SenderClusteringPipeline(
      { source: new MboxMessageSource(config.input.mboxPath) },
      config
    );
    const result = pipeline.run();

    console.log(`Senders analyzed: ${result.senderCount}`);
    console.log(`Messages skipped: ${result.skipped.length}`);
    console.log(`Clusters at epsilon ${config.clustering.epsilon}: ${result.clusterCount}`);
    console.log(`Report: ${result.reportPath}`);
    if (result.summaryPath) {
      console.log(`Summary: ${result.summaryPath}`);
    }
    return 0;
  } catch (error) {
    console.error(ErrorFormatter.formatErrorForUser(error));
    return 1;
  }
}

process.exitCode = main();
