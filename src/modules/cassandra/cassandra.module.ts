import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CassandraConfig } from '../../config/similarity.config';
import { MetricsModule } from '../similarity/metrics/metrics.module';
import { createCassandraClient } from './cassandra-client.factory';
import { CassandraSimilaritySearch } from './cassandra-similarity.service';
import { CASSANDRA_CLIENT } from './cassandra.constants';

@Module({
  imports: [MetricsModule],
  providers: [
    {
      provide: CASSANDRA_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createCassandraClient(configService.getOrThrow<CassandraConfig>('cassandra')),
    },
    CassandraSimilaritySearch,
  ],
  exports: [CassandraSimilaritySearch],
})
export class CassandraModule {}
