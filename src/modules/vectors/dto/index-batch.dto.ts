import { IsArray, IsObject } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { IndexVectorDto } from './index-vector.dto';

export class IndexBatchDto {
  @ApiProperty({
    description:
      'Vectors to index, in order. Indexing stops at the first invalid or failing item; ' +
      'earlier items stay indexed.',
    type: [IndexVectorDto],
  })
  @IsArray()
  @IsObject({ each: true })
  items!: IndexVectorDto[];
}
