import { ValidationError } from '../../common/errors/similarity.errors';
import type {
  Vector,
  VectorMetadata,
} from './interfaces/similarity-search/similarity-search.interface';

export function assertVector(vector: unknown): asserts vector is Vector {
  if (!Array.isArray(vector)) {
    throw new ValidationError('Vector must be an array of numbers');
  }
  if (vector.length === 0) {
    throw new ValidationError('Vector must not be empty');
  }
  vector.forEach((element: unknown, index) => {
    if (typeof element !== 'number' || !Number.isFinite(element)) {
      throw new ValidationError(`Vector element at index ${index} is not a finite number`);
    }
  });
}

export function assertMetadata(metadata: unknown): asserts metadata is VectorMetadata {
  if (typeof metadata !== 'object' || metadata === null || Array.isArray(metadata)) {
    throw new ValidationError('Metadata must be an object');
  }
  if (!('id' in metadata) || metadata.id === undefined || metadata.id === null) {
    throw new ValidationError("Metadata must contain an 'id' field");
  }
  if (typeof metadata.id !== 'string' || metadata.id === '') {
    throw new ValidationError("Metadata 'id' must be a non-empty string");
  }
}

/**
 * Floors `topK`; anything below 1 (or not a number) means "no results".
 */
export function normalizeTopK(topK: number): number {
  const limit = Math.floor(topK);
  return Number.isNaN(limit) || limit < 1 ? 0 : limit;
}
