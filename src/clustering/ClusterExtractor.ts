import { ConnectedComponents, DistanceMatrix } from '../types/index.js';
import { ConsistencyError, InputError } from '../errors/AnalysisError.js';
import { getStageLogger } from '../utils/logger.js';

const log = getStageLogger('clustering');

/**
 * Distance matrix together with the identifiers of its rows
 */
export interface LabeledDistanceMatrix {
  distanceMatrix: DistanceMatrix;
  identifiers: readonly string[];
}

export function assertValidEpsilon(epsilon: number): void {
  if (Number.isNaN(epsilon) || epsilon < 0) {
    throw new InputError(`epsilon must be >= 0, got ${epsilon}`, { epsilon });
  }
}

/**
 * Thresholds a distance matrix: entry (i, j) is true when the distance is at
 * most epsilon. Returns a new matrix; the input is left untouched.
 */
export function buildAdjacency(matrix: DistanceMatrix, epsilon: number): boolean[][] {
  assertValidEpsilon(epsilon);
  return matrix.map((row) => row.map((distance) => distance <= epsilon));
}

/**
 * Labels every vertex of an undirected graph with the index of its connected
 * component. Components are numbered in order of their lowest vertex.
 */
export function connectedComponentLabels(adjacency: readonly (readonly boolean[])[]): number[] {
  const n = adjacency.length;
  const labels = new Array<number>(n).fill(-1);
  let next = 0;

  for (let start = 0; start < n; start++) {
    if (labels[start] !== -1) {
      continue;
    }
    labels[start] = next;
    const queue = [start];
    for (let head = 0; head < queue.length; head++) {
      const vertex = queue[head];
      for (let neighbor = 0; neighbor < n; neighbor++) {
        // either direction counts as an edge
        if (labels[neighbor] === -1 && (adjacency[vertex][neighbor] || adjacency[neighbor][vertex])) {
          labels[neighbor] = next;
          queue.push(neighbor);
        }
      }
    }
    next++;
  }

  return labels;
}

/**
 * Groups identifiers and their feature vectors into the connected components
 * of the graph whose edges join points at distance <= epsilon.
 *
 * Components are labeled 0, 1, ... in order of their smallest member
 * identifier; members keep their input order.
 *
 * @throws ConsistencyError when the matrix, identifiers, points and labels disagree in size
 */
export function extractConnectedComponents(
  source: LabeledDistanceMatrix,
  points: readonly (readonly number[])[],
  epsilon: number
): ConnectedComponents {
  assertValidEpsilon(epsilon);
  const { distanceMatrix, identifiers } = source;
  const n = identifiers.length;

  if (distanceMatrix.length !== n || distanceMatrix.some((row) => row.length !== n)) {
    throw new ConsistencyError('Distance matrix is not aligned with the identifiers', {
      identifiers: n,
      rows: distanceMatrix.length
    });
  }
  if (points.length !== n) {
    throw new ConsistencyError('Number of data points and number of identifiers are not equal', {
      identifiers: n,
      points: points.length
    });
  }

  const labels = connectedComponentLabels(buildAdjacency(distanceMatrix, epsilon));
  if (labels.length !== n) {
    throw new ConsistencyError(
      'Number of data points and number of elements of all connected components are not equal!',
      { identifiers: n, labels: labels.length }
    );
  }

  const members = new Map<number, number[]>();
  labels.forEach((label, index) => {
    const group = members.get(label);
    if (group) {
      group.push(index);
    } else {
      members.set(label, [index]);
    }
  });

  const ordered = [...members.values()]
    .map((indices) => ({ indices, smallest: smallestIdentifier(indices, identifiers) }))
    .sort((a, b) => compareIdentifiers(a.smallest, b.smallest));

  const components: ConnectedComponents = {
    identifiers: new Map(),
    dataPoints: new Map()
  };
  let labeled = 0;
  ordered.forEach(({ indices }, label) => {
    components.identifiers.set(label, indices.map((index) => identifiers[index]));
    components.dataPoints.set(label, indices.map((index) => [...points[index]]));
    labeled += indices.length;
  });

  if (labeled !== n) {
    throw new ConsistencyError('Connected components do not partition the identifiers', {
      identifiers: n,
      labeled
    });
  }

  log.info('Connected components extracted', { epsilon, points: n, components: components.identifiers.size });
  return components;
}

function smallestIdentifier(indices: readonly number[], identifiers: readonly string[]): string {
  return indices
    .map((index) => identifiers[index])
    .reduce((smallest, identifier) => (compareIdentifiers(identifier, smallest) < 0 ? identifier : smallest));
}

// Code-unit order, independent of the host locale
function compareIdentifiers(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
