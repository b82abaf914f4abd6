import { DistanceMatrix, Metric, PersistencePair } from '../../types/index.js';

/**
 * Input of a persistence computation
 */
export interface PersistenceInput {
  /** Feature vectors, one per identifier */
  points: readonly (readonly number[])[];
  /** Identifiers in the same order as `points` */
  identifiers: readonly string[];
  metric: Metric;
  /** Highest homology dimension to compute */
  maxDimension: number;
}

/**
 * Output of a persistence computation
 */
export interface PersistenceResult {
  /** Persistence diagrams, indexed by homology dimension */
  diagrams: PersistencePair[][];
  /** Pairwise distances; row and column order match `identifiers` */
  distanceMatrix: DistanceMatrix;
  identifiers: readonly string[];
}

/**
 * Interface for engines that turn a point cloud and a metric into
 * persistence diagrams and a pairwise distance matrix.
 * Implementations must be deterministic for fixed input.
 */
export interface IPersistenceEngine {
  compute(input: PersistenceInput): PersistenceResult;
}
