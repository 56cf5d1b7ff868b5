import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe, VersioningType } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { NextFunction, Request, Response } from 'express';
import { AppModule } from './app.module';
import { SimilarityExceptionFilter } from './common/filters/similarity-exception/similarity-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('HTTP');

  // URI versioning: /v1/vectors/*
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: '1',
  });

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const { method, originalUrl } = req;
    const start = Date.now();

    res.on('finish', () => {
      const { statusCode } = res;
      const duration = Date.now() - start;
      logger.log(`${method} ${originalUrl} ${statusCode} - ${duration}ms`);
    });

    next();
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new SimilarityExceptionFilter());

  // Close the Cassandra session / PostgreSQL pool on SIGTERM and SIGINT
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Vector Similarity API')
    .setDescription(
      'Store embedding vectors and query the top-k most similar ones.\n\n' +
        'The backing store (Cassandra/Astra or PostgreSQL) is chosen at startup with `VECTOR_BACKEND`.',
    )
    .setVersion('1.0')
    .addTag('vectors', 'Vector indexing and similarity queries')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT || 3001;
  await app.listen(port);

  logger.log(`Vector similarity service running on http://localhost:${port}`);
  logger.log(`Swagger API docs available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : error);
  process.exit(1);
});
