import { IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class IndexTextDto {
  @ApiProperty({
    description: 'Text to embed and index',
    example: 'This is a sample text for embedding.',
  })
  @IsString()
  @IsNotEmpty()
  text!: string;

  @ApiPropertyOptional({
    description: 'Record id; a UUID is generated when omitted',
    example: 'sample_id',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  id?: string;

  @ApiPropertyOptional({
    description: 'Extra metadata passed through with the record',
    example: { source: 'user_input' },
  })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}
