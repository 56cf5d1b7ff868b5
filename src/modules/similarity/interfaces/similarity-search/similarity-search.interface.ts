export type Vector = number[];

export interface VectorMetadata {
  id: string;
  [field: string]: unknown;
}

export interface IndexBatchItem {
  vector: Vector;
  metadata: VectorMetadata;
}

export interface ScoredResult {
  id: string;
  score: number;
}

export interface HealthStatus {
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}

/**
 * Storage-agnostic similarity search. Every backend implements this and is
 * bound to the SIMILARITY_SEARCH token.
 */
export interface SimilaritySearch {
  /** Name of the backing store, for logs and health reports. */
  readonly backend: string;

  indexVector(vector: Vector, metadata: VectorMetadata): Promise<void>;

  /**
   * Indexes items in order and stops at the first failure. Items written
   * before the failure stay written.
   */
  indexVectors(batch: IndexBatchItem[]): Promise<void>;

  /**
   * Up to `topK` best matches, best first. Empty when nothing is stored or
   * `topK` is below 1.
   */
  querySimilar(vector: Vector, topK: number): Promise<ScoredResult[]>;

  isHealthy(): Promise<HealthStatus>;

  close(): Promise<void>;
}
