import { IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class QueryTextDto {
  @ApiProperty({
    description: 'Text to embed and search with',
    example: 'sample text',
  })
  @IsString()
  @IsNotEmpty()
  text!: string;

  @ApiPropertyOptional({ description: 'Maximum number of matches', example: 5 })
  @IsOptional()
  @IsInt()
  topK?: number;
}
