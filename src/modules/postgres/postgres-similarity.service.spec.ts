// modules/postgres/postgres-similarity.service.spec.ts
import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken } from '@nestjs/typeorm';
import { StorageError, ValidationError } from '../../common/errors/similarity.errors';
import { InMemoryDataSource } from '../../test/fakes/in-memory-data-source';
import { cosineSimilarity, euclideanDistance } from '../similarity/metrics/similarity-metric';
import { SIMILARITY_METRIC } from '../similarity/similarity.constants';
import { PostgresSimilaritySearch } from './postgres-similarity.service';

async function createService(metric = cosineSimilarity) {
  const dataSource = new InMemoryDataSource();
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      PostgresSimilaritySearch,
      { provide: getDataSourceToken(), useValue: dataSource },
      { provide: SIMILARITY_METRIC, useValue: metric },
    ],
  }).compile();

  return { service: module.get<PostgresSimilaritySearch>(PostgresSimilaritySearch), dataSource };
}

describe('PostgresSimilaritySearch', () => {
  it('should be defined', async () => {
    const { service } = await createService();
    expect(service).toBeDefined();
    expect(service.backend).toBe('postgres');
  });

  describe('indexVector', () => {
    it('commits the row and releases the connection', async () => {
      const { service, dataSource } = await createService();

      await service.indexVector([0.1, 0.2, 0.3], { id: '123' });

      expect(dataSource.rows.get('123')).toEqual({ id: '123', vector: [0.1, 0.2, 0.3] });
      expect(dataSource.queryRunners).toHaveLength(1);
      expect(dataSource.queryRunners[0].isReleased).toBe(true);
      expect(dataSource.queryRunners[0].isTransactionActive).toBe(false);
    });

    it('accepts metadata with extra fields', async () => {
      const { service, dataSource } = await createService();

      await service.indexVector([1, 0], { id: 'doc-1', source: 'manual', tags: ['a'] });

      expect(dataSource.rows.get('doc-1')).toEqual({ id: 'doc-1', vector: [1, 0] });
    });

    it('overwrites a record indexed twice under the same id', async () => {
      const { service, dataSource } = await createService();
      await service.indexVector([1, 0], { id: 'A' });

      await service.indexVector([0, 1], { id: 'A' });

      expect(dataSource.rows.size).toBe(1);
      expect(dataSource.rows.get('A')).toEqual({ id: 'A', vector: [0, 1] });
      await expect(service.querySimilar([0, 1], 5)).resolves.toEqual([{ id: 'A', score: 1 }]);
    });

    it('rolls back and raises a StorageError when the write fails', async () => {
      const { service, dataSource } = await createService();
      dataSource.rejectUpsertOf('bad', new Error('value too long for type'));

      const attempt = service.indexVector([0, 1], { id: 'bad' });

      await expect(attempt).rejects.toThrow(StorageError);
      await expect(attempt).rejects.toThrow('Failed to index vector "bad": value too long for type');
      expect(dataSource.rows.has('bad')).toBe(false);
      expect(dataSource.queryRunners[0].rolledBack).toEqual([[]]);
      expect(dataSource.queryRunners[0].isReleased).toBe(true);
    });

    it('rolls back when the commit fails', async () => {
      const { service, dataSource } = await createService();
      dataSource.failNext('commit', new Error('Connection terminated'));

      await expect(service.indexVector([1, 0], { id: 'lost' })).rejects.toThrow(
        'Failed to index vector "lost": Connection terminated',
      );
      expect(dataSource.rows.has('lost')).toBe(false);
      expect(dataSource.queryRunners[0].rolledBack).toEqual([[{ id: 'lost', vector: [1, 0] }]]);
    });

    it('wraps connection failures in a StorageError', async () => {
      const { service, dataSource } = await createService();
      dataSource.failNext('connect', new Error('ECONNREFUSED'));

      await expect(service.indexVector([1, 0], { id: 'a' })).rejects.toThrow(
        'Failed to index vector "a": ECONNREFUSED',
      );
      expect(dataSource.queryRunners[0].isReleased).toBe(true);
    });

    it('validates before opening a connection', async () => {
      const { service, dataSource } = await createService();
      const infinite = [1, Infinity];
      const emptyId = JSON.parse('{"id": ""}');

      await expect(service.indexVector(infinite, { id: 'a' })).rejects.toThrow(
        'Vector element at index 1 is not a finite number',
      );
      await expect(service.indexVector([1], emptyId)).rejects.toThrow(
        "Metadata 'id' must be a non-empty string",
      );
      expect(dataSource.queryRunners).toHaveLength(0);
    });
  });

  describe('indexVectors', () => {
    it('indexes every item in order', async () => {
      const { service, dataSource } = await createService();

      await service.indexVectors([
        { vector: [1, 0], metadata: { id: 'a' } },
        { vector: [0, 1], metadata: { id: 'b' } },
      ]);

      expect(Array.from(dataSource.rows.keys())).toEqual(['a', 'b']);
    });

    it('keeps items written before a failing one', async () => {
      const { service, dataSource } = await createService();
      dataSource.rejectUpsertOf('b', new Error('connection reset'));

      await expect(
        service.indexVectors([
          { vector: [1, 0], metadata: { id: 'a' } },
          { vector: [0, 1], metadata: { id: 'b' } },
          { vector: [1, 1], metadata: { id: 'c' } },
        ]),
      ).rejects.toThrow(StorageError);

      expect(Array.from(dataSource.rows.keys())).toEqual(['a']);
    });

    it('accepts an empty batch', async () => {
      const { service, dataSource } = await createService();

      await service.indexVectors([]);

      expect(dataSource.queryRunners).toHaveLength(0);
    });
  });

  describe('querySimilar', () => {
    it('returns a similarity of exactly 1 for the indexed vector itself', async () => {
      const { service } = await createService();
      await service.indexVector([0.1, 0.2, 0.3], { id: 'sample_id' });

      await expect(service.querySimilar([0.1, 0.2, 0.3], 1)).resolves.toEqual([
        { id: 'sample_id', score: 1 },
      ]);
    });

    it('ranks by descending similarity with ties broken by id', async () => {
      const { service } = await createService();
      await service.indexVector([1, 0], { id: 'C' });
      await service.indexVector([0, 1], { id: 'B' });
      await service.indexVector([1, 0], { id: 'A' });

      await expect(service.querySimilar([1, 0], 2)).resolves.toEqual([
        { id: 'A', score: 1 },
        { id: 'C', score: 1 },
      ]);
    });

    it('returns every row when topK exceeds the table size', async () => {
      const { service } = await createService();
      await service.indexVector([1, 0], { id: 'x' });
      await service.indexVector([-1, 0], { id: 'y' });

      await expect(service.querySimilar([1, 0], 10)).resolves.toEqual([
        { id: 'x', score: 1 },
        { id: 'y', score: -1 },
      ]);
    });

    it('floors fractional topK values', async () => {
      const { service } = await createService();
      await service.indexVector([1, 0], { id: 'x' });
      await service.indexVector([0, 1], { id: 'y' });

      await expect(service.querySimilar([1, 0], 1.9)).resolves.toEqual([{ id: 'x', score: 1 }]);
    });

    it('returns an empty list for topK <= 0 without a round trip', async () => {
      const { service, dataSource } = await createService();

      await expect(service.querySimilar([1, 0], 0)).resolves.toEqual([]);
      expect(dataSource.queryRunners).toHaveLength(0);
    });

    it('sorts ascending for distance metrics', async () => {
      const { service } = await createService(euclideanDistance);
      await service.indexVector([3, 4], { id: 'far' });
      await service.indexVector([1, 0], { id: 'near' });

      await expect(service.querySimilar([0, 0], 2)).resolves.toEqual([
        { id: 'near', score: 1 },
        { id: 'far', score: 5 },
      ]);
    });

    it('skips rows whose dimension differs from the query', async () => {
      const { service } = await createService();
      await service.indexVector([1, 0], { id: 'two' });
      await service.indexVector([1, 0, 0], { id: 'three' });

      await expect(service.querySimilar([1, 0], 5)).resolves.toEqual([{ id: 'two', score: 1 }]);
    });

    it('wraps read failures in a StorageError', async () => {
      const { service, dataSource } = await createService();
      dataSource.failNext('find', new Error('relation "vectors" does not exist'));

      await expect(service.querySimilar([1, 0], 5)).rejects.toThrow(
        'Failed to query similar vectors: relation "vectors" does not exist',
      );
      expect(dataSource.queryRunners[0].isReleased).toBe(true);
    });

    it('rejects an empty query vector', async () => {
      const { service } = await createService();

      await expect(service.querySimilar([], 5)).rejects.toThrow(ValidationError);
    });
  });

  describe('lifecycle', () => {
    it('reports health from a trivial query', async () => {
      const { service, dataSource } = await createService();

      await expect(service.isHealthy()).resolves.toMatchObject({ healthy: true });

      dataSource.failNext('query', new Error('timeout'));
      await expect(service.isHealthy()).resolves.toEqual({ healthy: false, error: 'timeout' });
    });

    it('destroys the data source on close', async () => {
      const { service, dataSource } = await createService();
      const destroy = jest.spyOn(dataSource, 'destroy');

      await service.close();
      await service.close();

      expect(destroy).toHaveBeenCalledTimes(1);
      expect(dataSource.isInitialized).toBe(false);
    });
  });
});
