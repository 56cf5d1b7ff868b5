import { DynamicModule, Logger, Module } from '@nestjs/common';
import { loadSimilarityConfig, VectorBackend } from '../../config/similarity.config';
import { CassandraModule } from '../cassandra/cassandra.module';
import { CassandraSimilaritySearch } from '../cassandra/cassandra-similarity.service';
import { PostgresModule } from '../postgres/postgres.module';
import { PostgresSimilaritySearch } from '../postgres/postgres-similarity.service';
import { SIMILARITY_SEARCH } from './similarity.constants';

export interface SimilarityModuleOptions {
  /** Defaults to the `backend` value of the layered configuration. */
  backend?: VectorBackend;
}

@Module({})
export class SimilarityModule {
  /**
   * Imports exactly one backend module and binds it to SIMILARITY_SEARCH.
   * Place after ConfigModule.forRoot() so .env values are already in process.env.
   */
  static forRoot(options: SimilarityModuleOptions = {}): DynamicModule {
    const backend = options.backend ?? loadSimilarityConfig().backend;
    new Logger(SimilarityModule.name).log(`🗄️ Similarity backend: ${backend}`);

    return {
      module: SimilarityModule,
      global: true,
      imports: [backend === 'cassandra' ? CassandraModule : PostgresModule],
      providers: [
        {
          provide: SIMILARITY_SEARCH,
          useExisting:
            backend === 'cassandra' ? CassandraSimilaritySearch : PostgresSimilaritySearch,
        },
      ],
      exports: [SIMILARITY_SEARCH],
    };
  }
}
