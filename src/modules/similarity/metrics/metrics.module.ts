import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { MetricName } from '../../../config/similarity.config';
import { SIMILARITY_METRIC } from '../similarity.constants';
import { resolveMetric } from './similarity-metric';

@Module({
  providers: [
    {
      provide: SIMILARITY_METRIC,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const metric = resolveMetric(configService.getOrThrow<MetricName>('metric'));
        new Logger('MetricsModule').log(`📐 Similarity metric: ${metric.name} (${metric.direction})`);
        return metric;
      },
    },
  ],
  exports: [SIMILARITY_METRIC],
})
export class MetricsModule {}
