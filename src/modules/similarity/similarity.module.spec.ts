import { CassandraModule } from '../cassandra/cassandra.module';
import { CassandraSimilaritySearch } from '../cassandra/cassandra-similarity.service';
import { PostgresModule } from '../postgres/postgres.module';
import { PostgresSimilaritySearch } from '../postgres/postgres-similarity.service';
import { SIMILARITY_SEARCH } from './similarity.constants';
import { SimilarityModule } from './similarity.module';

describe('SimilarityModule.forRoot', () => {
  it('binds the Cassandra backend when selected', () => {
    const dynamicModule = SimilarityModule.forRoot({ backend: 'cassandra' });

    expect(dynamicModule.imports).toEqual([CassandraModule]);
    expect(dynamicModule.providers).toEqual([
      { provide: SIMILARITY_SEARCH, useExisting: CassandraSimilaritySearch },
    ]);
    expect(dynamicModule.exports).toEqual([SIMILARITY_SEARCH]);
  });

  it('binds the PostgreSQL backend when selected', () => {
    const dynamicModule = SimilarityModule.forRoot({ backend: 'postgres' });

    expect(dynamicModule.imports).toEqual([PostgresModule]);
    expect(dynamicModule.providers).toEqual([
      { provide: SIMILARITY_SEARCH, useExisting: PostgresSimilaritySearch },
    ]);
  });
});
