// modules/vectors/vectors.controller.ts
import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { VectorsService } from './vectors.service';
import { IndexVectorDto } from './dto/index-vector.dto';
import { IndexBatchDto } from './dto/index-batch.dto';
import { QueryVectorDto } from './dto/query-vector.dto';
import { IndexTextDto } from './dto/index-text.dto';
import { QueryTextDto } from './dto/query-text.dto';

const MATCHES_SCHEMA = {
  type: 'object',
  properties: {
    results: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', example: 'doc-1' },
          score: { type: 'number', example: 0.98 },
        },
      },
    },
    count: { type: 'number', example: 1 },
  },
};

@ApiTags('vectors')
@Controller({ path: 'vectors', version: '1' })
export class VectorsController {
  constructor(private readonly vectorsService: VectorsService) {}

  /**
   * POST /vectors - Index a single vector
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Index a single vector' })
  @ApiBody({ type: IndexVectorDto })
  @ApiResponse({ status: 201, description: 'Vector indexed' })
  @ApiResponse({ status: 400, description: 'Invalid vector or metadata' })
  @ApiResponse({ status: 503, description: 'Backing store failure' })
  async indexVector(@Body() dto: IndexVectorDto) {
    await this.vectorsService.indexVector(dto.vector, dto.metadata);

    return {
      success: true,
      id: dto.metadata.id,
    };
  }

  /**
   * POST /vectors/batch - Index vectors in order, stopping at the first failure
   */
  @Post('batch')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Index several vectors in order' })
  @ApiBody({ type: IndexBatchDto })
  @ApiResponse({ status: 201, description: 'All vectors indexed' })
  async indexBatch(@Body() dto: IndexBatchDto) {
    await this.vectorsService.indexVectors(dto.items);

    return {
      success: true,
      count: dto.items.length,
    };
  }

  /**
   * POST /vectors/query - Top-k most similar vectors
   */
  @Post('query')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Query the most similar vectors' })
  @ApiBody({ type: QueryVectorDto })
  @ApiResponse({ status: 200, description: 'Ranked matches', schema: MATCHES_SCHEMA })
  async query(@Body() dto: QueryVectorDto) {
    const results = await this.vectorsService.querySimilar(dto.vector, dto.topK);
    return { results, count: results.length };
  }

  /**
   * POST /vectors/text - Embed text and index it
   */
  @Post('text')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Embed text and index the embedding' })
  @ApiBody({ type: IndexTextDto })
  @ApiResponse({ status: 201, description: 'Text indexed' })
  async indexText(@Body() dto: IndexTextDto) {
    const id = await this.vectorsService.indexText(dto.text, dto.id, dto.metadata);

    return {
      success: true,
      id,
    };
  }

  /**
   * POST /vectors/text/query - Embed text and query with it
   */
  @Post('text/query')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Embed text and query the most similar vectors' })
  @ApiBody({ type: QueryTextDto })
  @ApiResponse({ status: 200, description: 'Ranked matches', schema: MATCHES_SCHEMA })
  async queryText(@Body() dto: QueryTextDto) {
    const results = await this.vectorsService.queryText(dto.text, dto.topK);
    return { results, count: results.length };
  }

  /**
   * GET /vectors/health - Backing store health
   */
  @Get('health')
  @ApiOperation({ summary: 'Health of the selected backing store' })
  @ApiResponse({
    status: 200,
    description: 'Backend health',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        backend: { type: 'string', example: 'postgres' },
        latencyMs: { type: 'number', example: 3 },
        timestamp: { type: 'string', format: 'date-time' },
      },
    },
  })
  async health() {
    return this.vectorsService.health();
  }
}
