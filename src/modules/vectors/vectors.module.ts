import { Module } from '@nestjs/common';
import { EmbeddingModule } from '../embedding/embedding.module';
import { VectorsController } from './vectors.controller';
import { VectorsService } from './vectors.service';

@Module({
  imports: [EmbeddingModule],
  controllers: [VectorsController],
  providers: [VectorsService],
  exports: [VectorsService],
})
export class VectorsModule {}
