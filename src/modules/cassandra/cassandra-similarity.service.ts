// modules/cassandra/cassandra-similarity.service.ts
import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client, types } from 'cassandra-driver';
import {
  StorageError,
  ValidationError,
  describeError,
} from '../../common/errors/similarity.errors';
import type { CassandraConfig, RankingPolicy } from '../../config/similarity.config';
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
import { Candidate, rankResults, scoreCandidates } from '../similarity/similarity.ranking';
import { assertMetadata, assertVector, normalizeTopK } from '../similarity/similarity.validation';
import { assertCqlIdentifier } from './cassandra-client.factory';
import { CASSANDRA_CLIENT, FLOAT32_MAX, MAX_CQL_LIMIT } from './cassandra.constants';

/**
 * The vector column holds 32-bit floats. Values are rounded to that precision
 * before they are written or compared, so a stored vector scores against
 * itself exactly.
 */
function toFloat32(vector: Vector): Float32Array {
  vector.forEach((element, index) => {
    if (Math.abs(element) > FLOAT32_MAX) {
      throw new ValidationError(`Vector element at index ${index} exceeds the 32-bit float range`);
    }
  });
  return Float32Array.from(vector);
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

/**
 * Vector columns come back as arrays, Float32Array or the driver's Vector
 * type depending on the driver release; all of them are iterable.
 */
function readVector(value: unknown): Vector | undefined {
  if (!isIterable(value)) return undefined;
  return Array.from(value, (element) => Number(element));
}

@Injectable()
export class CassandraSimilaritySearch implements SimilaritySearch, OnModuleInit, OnModuleDestroy {
  readonly backend = 'cassandra';
  private readonly logger = new Logger(CassandraSimilaritySearch.name);
  private readonly tableRef: string;
  private readonly annEnabled: boolean;
  private readonly ranking: RankingPolicy;
  private closed = false;

  constructor(
    @Inject(CASSANDRA_CLIENT) private readonly client: Client,
    @Inject(SIMILARITY_METRIC) private readonly metric: SimilarityMetric,
    configService: ConfigService,
  ) {
    const config = configService.getOrThrow<CassandraConfig>('cassandra');
    this.tableRef = `${assertCqlIdentifier(config.keyspace)}.${assertCqlIdentifier(config.table)}`;
    this.annEnabled = config.annEnabled;
    this.ranking = config.ranking;
  }

  async onModuleInit(): Promise<void> {
    await this.client.connect();
    this.logger.log(
      `✅ Cassandra session ready (${this.tableRef}, ann=${this.annEnabled}, ranking=${this.ranking})`,
    );
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  /**
   * Store one vector. CQL inserts are upserts: a repeated id overwrites.
   */
  async indexVector(vector: Vector, metadata: VectorMetadata): Promise<void> {
    assertVector(vector);
    assertMetadata(metadata);
    const stored = toFloat32(vector);

    const query = `INSERT INTO ${this.tableRef} (id, vector) VALUES (?, ?)`;
    try {
      await this.client.execute(query, [metadata.id, stored], {
        prepare: true,
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
   * ANN query (or full scan when ANN is off), scored client-side with the
   * configured metric.
   */
  async querySimilar(vector: Vector, topK: number): Promise<ScoredResult[]> {
    assertVector(vector);
    const query = toFloat32(vector);

    const limit = Math.min(normalizeTopK(topK), MAX_CQL_LIMIT);
    if (limit === 0) return [];

    const rows = this.annEnabled
      ? await this.fetchRows(`SELECT id, vector FROM ${this.tableRef} ORDER BY vector ANN OF ? LIMIT ?`, [
          query,
          limit,
        ])
      : await this.fetchRows(`SELECT id, vector FROM ${this.tableRef}`, []);

    const candidates: Candidate[] = [];
    for (const row of rows) {
      const stored = readVector(row['vector']);
      if (!stored) {
        this.logger.warn(`Skipping row ${String(row['id'])}: unreadable vector column`);
        continue;
      }
      candidates.push({ id: String(row['id']), vector: stored });
    }

    const { scored, mismatched } = scoreCandidates(
      Array.from(query),
      candidates,
      this.metric,
    );
    if (mismatched.length > 0) {
      this.logger.warn(
        `Skipped ${mismatched.length} rows with dimension != ${vector.length}: ${mismatched.join(', ')}`,
      );
    }

    this.logger.debug(`🔍 Scored ${scored.length} candidates (limit ${limit})`);

    if (this.annEnabled && this.ranking === 'store') {
      return scored.slice(0, limit);
    }
    return rankResults(scored, this.metric.direction, limit);
  }

  /**
   * Health check for the Cassandra session
   */
  async isHealthy(): Promise<HealthStatus> {
    const start = Date.now();
    try {
      await this.client.execute('SELECT release_version FROM system.local');
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      return { healthy: false, error: describeError(error) };
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client.shutdown();
    this.logger.log('Cassandra session closed');
  }

  private async fetchRows(query: string, params: unknown[]): Promise<types.Row[]> {
    const rows: types.Row[] = [];
    try {
      let pageState: string | undefined;
      do {
        const result = await this.client.execute(query, params, { prepare: true, pageState });
        rows.push(...result.rows);
        pageState = result.pageState || undefined;
      } while (pageState);
    } catch (error) {
      this.logger.error('Similarity query failed:', error);
      throw new StorageError('Failed to query similar vectors', error);
    }
    return rows;
  }
}
