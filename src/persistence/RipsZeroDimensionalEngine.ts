import { IPersistenceEngine, PersistenceInput, PersistenceResult } from './interfaces/IPersistenceEngine.js';
import { DistanceMatrix, Metric, PersistencePair } from '../types/index.js';
import { ConsistencyError, InputError, UnsupportedDimensionError } from '../errors/AnalysisError.js';
import { getStageLogger } from '../utils/logger.js';

const log = getStageLogger('persistence');

interface Edge {
  i: number;
  j: number;
  weight: number;
}

/**
 * Evaluates the metric on every pair of points.
 * Only i < j is evaluated; the lower triangle mirrors it.
 */
export function pairwiseDistances(points: readonly (readonly number[])[], metric: Metric): number[][] {
  const n = points.length;
  const matrix: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const distance = metric(points[i], points[j]);
      if (!(distance >= 0)) {
        throw new InputError(`metric returned ${distance} for points ${i} and ${j}`, { i, j, distance });
      }
      matrix[i][j] = distance;
      matrix[j][i] = distance;
    }
  }

  return matrix;
}

/**
 * Disjoint-set forest with path halving and union by size
 */
class UnionFind {
  private readonly parent: number[];
  private readonly size: number[];

  constructor(n: number) {
    this.parent = Array.from({ length: n }, (_, index) => index);
    this.size = new Array<number>(n).fill(1);
  }

  find(x: number): number {
    let node = x;
    while (this.parent[node] !== node) {
      this.parent[node] = this.parent[this.parent[node]];
      node = this.parent[node];
    }
    return node;
  }

  /**
   * Merges the sets of a and b; returns false when they were already joined
   */
  union(a: number, b: number): boolean {
    let rootA = this.find(a);
    let rootB = this.find(b);
    if (rootA === rootB) {
      return false;
    }
    if (this.size[rootA] < this.size[rootB]) {
      [rootA, rootB] = [rootB, rootA];
    }
    this.parent[rootB] = rootA;
    this.size[rootA] += this.size[rootB];
    return true;
  }
}

/**
 * Dimension-0 persistence diagram of the Rips filtration over a distance matrix.
 *
 * Every point is born at 0. Edges are added in ascending weight (ties by
 * index); each edge that joins two components kills one of them at the
 * edge's weight. Zero-length pairs are omitted and the component that never
 * dies is reported as [0, Infinity].
 */
export function zeroDimensionalDiagram(matrix: DistanceMatrix): PersistencePair[] {
  const n = matrix.length;
  if (n === 0) {
    return [];
  }

  const edges: Edge[] = [];
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      edges.push({ i, j, weight: matrix[i][j] });
    }
  }
  edges.sort((a, b) => a.weight - b.weight || a.i - b.i || a.j - b.j);

  const components = new UnionFind(n);
  const diagram: PersistencePair[] = [];
  let merges = 0;

  for (const edge of edges) {
    if (merges === n - 1) {
      break;
    }
    if (components.union(edge.i, edge.j)) {
      merges++;
      if (edge.weight > 0) {
        diagram.push([0, edge.weight]);
      }
    }
  }

  diagram.push([0, Infinity]);
  return diagram;
}

/**
 * In-process persistence engine for the Vietoris-Rips filtration,
 * limited to homology dimension 0.
 */
export class RipsZeroDimensionalEngine implements IPersistenceEngine {
  static readonly MAX_SUPPORTED_DIMENSION = 0;

  /** @inheritdoc */
  compute(input: PersistenceInput): PersistenceResult {
    const { points, identifiers, metric, maxDimension } = input;

    if (!Number.isInteger(maxDimension) || maxDimension < 0) {
      throw new InputError(`maxDimension must be a non-negative integer, got ${maxDimension}`);
    }
    if (maxDimension > RipsZeroDimensionalEngine.MAX_SUPPORTED_DIMENSION) {
      throw new UnsupportedDimensionError(maxDimension, RipsZeroDimensionalEngine.MAX_SUPPORTED_DIMENSION);
    }
    if (points.length !== identifiers.length) {
      throw new ConsistencyError('Number of points and number of identifiers are not equal', {
        points: points.length,
        identifiers: identifiers.length
      });
    }

    const startTime = Date.now();
    const distanceMatrix = pairwiseDistances(points, metric);
    const diagrams = [zeroDimensionalDiagram(distanceMatrix)];

    log.info('Persistence computed', {
      points: points.length,
      maxDimension,
      h0Pairs: diagrams[0].length,
      durationMs: Date.now() - startTime
    });

    return {
      diagrams,
      distanceMatrix,
      identifiers: [...identifiers]
    };
  }
}
