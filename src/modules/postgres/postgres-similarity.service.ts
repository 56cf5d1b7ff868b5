// modules/postgres/postgres-similarity.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, QueryRunner } from 'typeorm';
import { StorageError, describeError } from '../../common/errors/similarity.errors';
import type {
  HealthStatus,
  IndexBatchItem,
  ScoredResult,
  SimilaritySearch,
  Vector,
  VectorMetadata,
} from '../similarity/interfaces/similarity-search/similarity-search.interface';
import type { SimilarityMetric } from '../similarity/metrics/similarity-metric';
import { indexInOrder } from '../similarity/similarity.batch';
import { SIMILARITY_METRIC } from '../similarity/similarity.constants';
import { rankResults, scoreCandidates } from '../similarity/similarity.ranking';
import { assertMetadata, assertVector, normalizeTopK } from '../similarity/similarity.validation';
import { VectorRecord } from './entities/vector-record.entity';

@Injectable()
export class PostgresSimilaritySearch implements SimilaritySearch {
  readonly backend = 'postgres';
  private readonly logger = new Logger(PostgresSimilaritySearch.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @Inject(SIMILARITY_METRIC) private readonly metric: SimilarityMetric,
  ) {}

  /**
   * Upsert one row inside its own transaction; indexing an id again replaces
   * its vector.
   */
  async indexVector(vector: Vector, metadata: VectorMetadata): Promise<void> {
    assertVector(vector);
    assertMetadata(metadata);

    try {
      await this.withQueryRunner(async (queryRunner) => {
        await queryRunner.startTransaction();
        try {
          await queryRunner.manager.upsert(VectorRecord, { id: metadata.id, vector }, ['id']);
          await queryRunner.commitTransaction();
        } catch (error) {
          await this.rollback(queryRunner);
          throw error;
        }
      });
    } catch (error) {
      this.logger.error(`Failed to index vector ${metadata.id}:`, error);
      throw new StorageError(`Failed to index vector "${metadata.id}"`, error);
    }

    this.logger.log(`📝 Vector indexed: ${metadata.id}`);
  }

  async indexVectors(batch: IndexBatchItem[]): Promise<void> {
    await indexInOrder(this, batch);
    this.logger.log(`📚 Batch indexed: ${batch.length} vectors`);
  }

  /**
   * Full scan: every stored row is scored, then ranked. No approximate index
   * is involved, so cost grows with the table.
   */
  async querySimilar(vector: Vector, topK: number): Promise<ScoredResult[]> {
    assertVector(vector);

    const limit = normalizeTopK(topK);
    if (limit === 0) return [];

    let records: VectorRecord[];
    try {
      records = await this.withQueryRunner((queryRunner) =>
        queryRunner.manager.find(VectorRecord, { select: { id: true, vector: true } }),
      );
    } catch (error) {
      this.logger.error('Similarity query failed:', error);
      throw new StorageError('Failed to query similar vectors', error);
    }

    const { scored, mismatched } = scoreCandidates(vector, records, this.metric);
    if (mismatched.length > 0) {
      this.logger.warn(
        `Skipped ${mismatched.length} rows with dimension != ${vector.length}: ${mismatched.join(', ')}`,
      );
    }

    this.logger.debug(`🔍 Scanned ${records.length} rows (limit ${limit})`);
    return rankResults(scored, this.metric.direction, limit);
  }

  /**
   * Health check for PostgreSQL connectivity
   */
  async isHealthy(): Promise<HealthStatus> {
    const start = Date.now();
    try {
      await this.dataSource.query('SELECT 1');
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      return { healthy: false, error: describeError(error) };
    }
  }

  async close(): Promise<void> {
    if (!this.dataSource.isInitialized) return;
    await this.dataSource.destroy();
    this.logger.log('PostgreSQL connection closed');
  }

  private async withQueryRunner<T>(work: (queryRunner: QueryRunner) => Promise<T>): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    try {
      await queryRunner.connect();
      return await work(queryRunner);
    } finally {
      await queryRunner.release();
    }
  }

  private async rollback(queryRunner: QueryRunner): Promise<void> {
    if (!queryRunner.isTransactionActive) return;
    try {
      await queryRunner.rollbackTransaction();
    } catch (rollbackError) {
      // The upsert error is what the caller sees.
      this.logger.warn(`Rollback failed: ${describeError(rollbackError)}`);
    }
  }
}
