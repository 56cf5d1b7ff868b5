import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SimilarityModule } from './modules/similarity/similarity.module';
import { VectorsModule } from './modules/vectors/vectors.module';
import similarityConfig from './config/similarity.config';
import { validate } from './config/env.validation';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [similarityConfig],
      validate,
    }),
    // Reads the backend choice, so it must come after ConfigModule has loaded .env
    SimilarityModule.forRoot(),
    VectorsModule,
  ],
})
export class AppModule {}
