import cloneDeep from 'lodash/cloneDeep.js';
import { InvalidDatePolicy } from '../types/index.js';
import { InputError } from '../errors/AnalysisError.js';

/**
 * Centralized configuration for a sender clustering run
 */
export interface AnalysisSystemConfig {
  input: {
    /** Read by the command line entry point to build the message source */
    mboxPath: string;
  };
  output: {
    directory: string;
    writeSummary: boolean;
  };
  extraction: {
    threshold: number;
    onInvalidDate: InvalidDatePolicy;
  };
  features: {
    scaleFeatures: boolean;
  };
  clustering: {
    epsilon: number;
    maxDimension: number;
  };
}

/**
 * Per-section partial overrides
 */
export type AnalysisConfigOverrides = {
  [Section in keyof AnalysisSystemConfig]?: Partial<AnalysisSystemConfig[Section]>;
};

/**
 * Default configuration for a sender clustering run
 */
export const DEFAULT_ANALYSIS_CONFIG: AnalysisSystemConfig = {
  input: {
    mboxPath: ''
  },
  output: {
    directory: './output',
    writeSummary: false
  },
  extraction: {
    threshold: 1,
    onInvalidDate: 'skip'
  },
  features: {
    scaleFeatures: true
  },
  clustering: {
    epsilon: 0.6,
    maxDimension: 0
  }
};

/**
 * Configuration manager for sender clustering runs
 */
export class AnalysisConfigManager {
  private config: AnalysisSystemConfig;

  constructor(config?: AnalysisConfigOverrides) {
    this.config = this.mergeConfigs(DEFAULT_ANALYSIS_CONFIG, config || {});
  }

  /**
   * Get the complete configuration
   */
  getConfig(): AnalysisSystemConfig {
    return cloneDeep(this.config);
  }

  /**
   * Update configuration
   */
  updateConfig(updates: AnalysisConfigOverrides): void {
    this.config = this.mergeConfigs(this.config, updates);
  }

  /**
   * Reset to default configuration
   */
  resetToDefaults(): void {
    this.config = cloneDeep(DEFAULT_ANALYSIS_CONFIG);
  }

  /**
   * Validate configuration
   */
  validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!this.config.output.directory) {
      errors.push('output.directory is required');
    }

    const { threshold, onInvalidDate } = this.config.extraction;
    if (!Number.isInteger(threshold) || threshold < 1) {
      errors.push('extraction.threshold must be an integer >= 1');
    }

    if (onInvalidDate !== 'skip' && onInvalidDate !== 'fail') {
      errors.push("extraction.onInvalidDate must be 'skip' or 'fail'");
    }

    const { epsilon, maxDimension } = this.config.clustering;
    if (Number.isNaN(epsilon) || epsilon < 0) {
      errors.push('clustering.epsilon must be >= 0');
    }

    if (!Number.isInteger(maxDimension) || maxDimension < 0) {
      errors.push('clustering.maxDimension must be a non-negative integer');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Throws an InputError listing every validation problem
   */
  assertValid(): void {
    const { valid, errors } = this.validateConfig();
    if (!valid) {
      throw new InputError(`Invalid configuration: ${errors.join('; ')}`, { errors });
    }
  }

  /**
   * Merge overrides into a base configuration, section by section
   */
  private mergeConfigs(
    base: AnalysisSystemConfig,
    override: AnalysisConfigOverrides
  ): AnalysisSystemConfig {
    const result = cloneDeep(base);

    if (override.input) {
      result.input = { ...result.input, ...override.input };
    }

    if (override.output) {
      result.output = { ...result.output, ...override.output };
    }

    if (override.extraction) {
      result.extraction = { ...result.extraction, ...override.extraction };
    }

    if (override.features) {
      result.features = { ...result.features, ...override.features };
    }

    if (override.clustering) {
      result.clustering = { ...result.clustering, ...override.clustering };
    }

    return result;
  }
}

/**
 * Source of string settings, e.g. process.env
 */
export type SettingsSource = Record<string, string | undefined>;

function parseNumber(name: string, value: string): number {
  const trimmed = value.trim();
  const parsed = trimmed === 'inf' || trimmed === 'Infinity' ? Infinity : Number(trimmed);
  if (trimmed.length === 0 || Number.isNaN(parsed)) {
    throw new InputError(`${name} must be a number, got "${value}"`, { name, value });
  }
  return parsed;
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new InputError(`${name} must be a boolean, got "${value}"`, { name, value });
}

function parseInvalidDatePolicy(name: string, value: string): InvalidDatePolicy {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'skip' || normalized === 'fail') {
    return normalized;
  }
  throw new InputError(`${name} must be 'skip' or 'fail', got "${value}"`, { name, value });
}

/**
 * Reads configuration overrides from environment-style settings.
 * Unset variables leave the defaults in place.
 *
 * Recognized keys: MBOX_PATH, OUTPUT_DIR, WRITE_SUMMARY, THRESHOLD,
 * ON_INVALID_DATE, SCALE_FEATURES, EPSILON, MAX_DIMENSION.
 */
export function loadConfigFromEnv(env: SettingsSource): AnalysisConfigOverrides {
  const overrides: AnalysisConfigOverrides = {};

  if (env.MBOX_PATH) {
    overrides.input = { mboxPath: env.MBOX_PATH };
  }

  const output: Partial<AnalysisSystemConfig['output']> = {};
  if (env.OUTPUT_DIR) output.directory = env.OUTPUT_DIR;
  if (env.WRITE_SUMMARY) output.writeSummary = parseBoolean('WRITE_SUMMARY', env.WRITE_SUMMARY);
  if (Object.keys(output).length > 0) overrides.output = output;

  const extraction: Partial<AnalysisSystemConfig['extraction']> = {};
  if (env.THRESHOLD) extraction.threshold = parseNumber('THRESHOLD', env.THRESHOLD);
  if (env.ON_INVALID_DATE) extraction.onInvalidDate = parseInvalidDatePolicy('ON_INVALID_DATE', env.ON_INVALID_DATE);
  if (Object.keys(extraction).length > 0) overrides.extraction = extraction;

  if (env.SCALE_FEATURES) {
    overrides.features = { scaleFeatures: parseBoolean('SCALE_FEATURES', env.SCALE_FEATURES) };
  }

  const clustering: Partial<AnalysisSystemConfig['clustering']> = {};
  if (env.EPSILON) clustering.epsilon = parseNumber('EPSILON', env.EPSILON);
  if (env.MAX_DIMENSION) clustering.maxDimension = parseNumber('MAX_DIMENSION', env.MAX_DIMENSION);
  if (Object.keys(clustering).length > 0) overrides.clustering = clustering;

  return overrides;
}

const ARGUMENT_KEYS: Record<string, string> = {
  input: 'MBOX_PATH',
  output: 'OUTPUT_DIR',
  summary: 'WRITE_SUMMARY',
  threshold: 'THRESHOLD',
  'on-invalid-date': 'ON_INVALID_DATE',
  scale: 'SCALE_FEATURES',
  epsilon: 'EPSILON',
  'max-dimension': 'MAX_DIMENSION'
};

/**
 * Maps `--key=value` command line arguments onto environment-style keys,
 * so they can be layered over process.env and read by loadConfigFromEnv.
 */
export function parseArguments(argv: readonly string[]): SettingsSource {
  const settings: SettingsSource = {};

  for (const argument of argv) {
    const match = argument.match(/^--([a-z-]+)(?:=(.*))?$/);
    const key = match ? ARGUMENT_KEYS[match[1]] : undefined;
    if (!match || !key) {
      throw new InputError(`Unknown argument "${argument}"`, { argument });
    }
    // a bare flag such as --summary means true
    settings[key] = match[2] ?? 'true';
  }

  return settings;
}
