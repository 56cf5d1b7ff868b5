import type { MetricName } from '../../../config/similarity.config';
import type { Vector } from '../interfaces/similarity-search/similarity-search.interface';

/**
 * `desc`: higher scores are closer (similarities).
 * `asc`: lower scores are closer (distances).
 */
export type SortDirection = 'desc' | 'asc';

export interface SimilarityMetric {
  readonly name: MetricName;
  readonly direction: SortDirection;
  score(a: Vector, b: Vector): number;
}

function dot(a: Vector, b: Vector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

function maxAbs(v: Vector): number {
  let max = 0;
  for (const x of v) {
    const abs = Math.abs(x);
    if (abs > max) max = abs;
  }
  return max;
}

/**
 * dot(a, b) / (|a| · |b|), computed on each vector divided by its largest
 * magnitude so the squared norms stay in [1, dims] for any finite input.
 * Identical vectors scale identically, and sqrt(n · n) = n keeps their
 * similarity at exactly 1. Zero-norm input gives NaN.
 */
export const cosineSimilarity: SimilarityMetric = {
  name: 'cosine',
  direction: 'desc',
  score(a, b) {
    const scaleA = maxAbs(a);
    const scaleB = maxAbs(b);
    if (scaleA === 0 || scaleB === 0) return NaN;

    let ab = 0;
    let aa = 0;
    let bb = 0;
    for (let i = 0; i < a.length; i++) {
      const x = a[i] / scaleA;
      const y = b[i] / scaleB;
      ab += x * y;
      aa += x * x;
      bb += y * y;
    }
    return Math.min(1, Math.max(-1, ab / Math.sqrt(aa * bb)));
  },
};

export const dotProduct: SimilarityMetric = {
  name: 'dot',
  direction: 'desc',
  score: dot,
};

export const euclideanDistance: SimilarityMetric = {
  name: 'euclidean',
  direction: 'asc',
  score(a, b) {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      const diff = a[i] - b[i];
      sum += diff * diff;
    }
    return Math.sqrt(sum);
  },
};

const METRICS: Record<MetricName, SimilarityMetric> = {
  cosine: cosineSimilarity,
  dot: dotProduct,
  euclidean: euclideanDistance,
};

export function resolveMetric(name: MetricName): SimilarityMetric {
  return METRICS[name];
}
