import { ArrayNotEmpty, IsArray, IsInt, IsNumber, IsOptional } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class QueryVectorDto {
  @ApiProperty({
    description: 'Query vector',
    type: [Number],
    example: [0.1, 0.2, 0.3],
  })
  @IsArray()
  @ArrayNotEmpty()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { each: true })
  vector!: number[];

  @ApiPropertyOptional({
    description: 'Maximum number of matches; values below 1 return no matches',
    example: 5,
  })
  @IsOptional()
  @IsInt()
  topK?: number;
}
