import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { PostgresConfig } from '../../config/similarity.config';
import { MetricsModule } from '../similarity/metrics/metrics.module';
import { VectorRecord } from './entities/vector-record.entity';
import { PostgresSimilaritySearch } from './postgres-similarity.service';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const isProduction = configService.get<string>('NODE_ENV') === 'production';
        const config = configService.getOrThrow<PostgresConfig>('postgres');
        return {
          type: 'postgres',
          host: config.host,
          port: config.port,
          username: config.username,
          password: config.password,
          database: config.database,
          entities: [VectorRecord],
          synchronize: config.synchronize,
          logging: isProduction ? ['error'] : ['error', 'warn'],
          ssl: false,
          extra: {
            max: 10,
            idleTimeoutMillis: 30000,
          },
        };
      },
    }),
    MetricsModule,
  ],
  providers: [PostgresSimilaritySearch],
  exports: [PostgresSimilaritySearch],
})
export class PostgresModule {}
