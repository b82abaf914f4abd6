import fs from 'fs';
import path from 'path';
import { ConnectedComponents, PersistencePair, SenderFeatureRow } from '../types/index.js';
import { assertValidEpsilon } from '../clustering/ClusterExtractor.js';
import { getStageLogger } from '../utils/logger.js';

const log = getStageLogger('report');

/**
 * Fixed decimal representation of epsilon used in file names.
 * Whole numbers keep one decimal place (1 -> "1.0"), other values use the
 * shortest decimal that round-trips (0.6 -> "0.6"), never exponent notation.
 */
export function formatEpsilon(epsilon: number): string {
  assertValidEpsilon(epsilon);
  if (epsilon === Infinity) {
    return 'inf';
  }
  const decimal = plainDecimal(epsilon);
  return Number.isInteger(epsilon) ? `${decimal}.0` : decimal;
}

// Expands "1.5e-7" to "0.00000015" and "1e+21" to "1000000000000000000000"
function plainDecimal(value: number): string {
  const match = /^(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(String(value));
  if (!match) {
    return String(value);
  }

  const digits = match[1] + (match[2] ?? '');
  const exponent = Number(match[3]);
  if (exponent < 0) {
    return `0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  // only integers of 1e21 and above print with a positive exponent
  return digits.padEnd(exponent + 1, '0');
}

export function reportFileName(epsilon: number): string {
  return `connected_components_epsilon_${formatEpsilon(epsilon)}.txt`;
}

export function summaryFileName(epsilon: number): string {
  return `sender_features_epsilon_${formatEpsilon(epsilon)}.json`;
}

/**
 * Renders one "Cluster <label>: <identifiers>" line per component
 */
export function formatConnectedComponents(components: ReadonlyMap<number, readonly string[]>): string {
  let content = '';
  for (const [label, identifiers] of components) {
    content += `Cluster ${label}: ${identifiers.join(', ')}\n`;
  }
  return content;
}

/**
 * Writes the connected components to `<outputDir>/connected_components_epsilon_<epsilon>.txt`,
 * replacing any earlier file of that name.
 * @returns Absolute path of the written file
 */
export function writeConnectedComponents(
  components: ReadonlyMap<number, readonly string[]>,
  outputDir: string,
  epsilon: number
): string {
  const filePath = path.resolve(outputDir, reportFileName(epsilon));
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, formatConnectedComponents(components), { encoding: 'utf8', flag: 'w' });

  log.info('Connected components written', { file: filePath, clusters: components.size });
  return filePath;
}

export interface AnalysisSummary {
  epsilon: number;
  threshold: number;
  features: SenderFeatureRow[];
  h0Diagram: PersistencePair[];
  components: ConnectedComponents;
}

/**
 * Writes the feature rows, the dimension-0 diagram and the clusters as JSON.
 * Infinite deaths are written as null.
 * @returns Absolute path of the written file
 */
export function writeSummary(summary: AnalysisSummary, outputDir: string): string {
  const filePath = path.resolve(outputDir, summaryFileName(summary.epsilon));
  const document = {
    epsilon: summary.epsilon,
    threshold: summary.threshold,
    senders: summary.features,
    persistence: {
      h0: summary.h0Diagram.map(([birth, death]) => [birth, Number.isFinite(death) ? death : null])
    },
    clusters: [...summary.components.identifiers].map(([label, members]) => ({ label, members }))
  };

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(document, null, 2) + '\n', { encoding: 'utf8', flag: 'w' });

  log.info('Summary written', { file: filePath });
  return filePath;
}
