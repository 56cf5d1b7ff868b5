import { ArrayNotEmpty, IsArray, IsNumber, IsObject } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import type { VectorMetadata } from '../../similarity/interfaces/similarity-search/similarity-search.interface';

export class IndexVectorDto {
  @ApiProperty({
    description: 'Embedding vector to store',
    type: [Number],
    example: [0.1, 0.2, 0.3],
  })
  @IsArray()
  @ArrayNotEmpty()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { each: true })
  vector!: number[];

  @ApiProperty({
    description: 'Record metadata; `id` is required, other fields are passed through',
    example: { id: 'doc-1', source: 'manual' },
  })
  @IsObject()
  metadata!: VectorMetadata;
}
