import { PersistencePair } from '../types/index.js';
import { PersistenceResult } from './interfaces/IPersistenceEngine.js';
import { InputError } from '../errors/AnalysisError.js';
import { logger } from '../utils/logger.js';

/**
 * Selects the persistence pairs of one dimension whose death value lies in
 * [startEpsilon, stopEpsilon]. These are the epsilon values at which the
 * sublevel complexes of the filtration merge.
 *
 * Returns null when the result holds no diagram for `dimension`.
 */
export function filterDiagram(
  result: Pick<PersistenceResult, 'diagrams'>,
  dimension: number,
  startEpsilon = 0,
  stopEpsilon = Infinity
): PersistencePair[] | null {
  if (startEpsilon > stopEpsilon) {
    throw new InputError(`startEpsilon (${startEpsilon}) must not exceed stopEpsilon (${stopEpsilon})`);
  }

  const diagram = result.diagrams[dimension];
  if (!diagram) {
    logger.warn('No persistence data for dimension', { dimension, available: result.diagrams.length });
    return null;
  }

  return diagram.filter(([, death]) => startEpsilon <= death && death <= stopEpsilon);
}
