// modules/vectors/vectors.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { EmbeddingService } from '../embedding/embedding.service';
import type {
  HealthStatus,
  IndexBatchItem,
  ScoredResult,
  SimilaritySearch,
  Vector,
  VectorMetadata,
} from '../similarity/interfaces/similarity-search/similarity-search.interface';
import { SIMILARITY_SEARCH } from '../similarity/similarity.constants';

export interface VectorsHealth extends HealthStatus {
  status: 'healthy' | 'degraded';
  backend: string;
  timestamp: string;
}

@Injectable()
export class VectorsService {
  private readonly logger = new Logger(VectorsService.name);
  private readonly defaultTopK: number;

  constructor(
    @Inject(SIMILARITY_SEARCH) private readonly similaritySearch: SimilaritySearch,
    private readonly embeddingService: EmbeddingService,
    configService: ConfigService,
  ) {
    this.defaultTopK = configService.get<number>('defaultTopK') ?? 5;
  }

  async indexVector(vector: Vector, metadata: VectorMetadata): Promise<void> {
    await this.similaritySearch.indexVector(vector, metadata);
  }

  async indexVectors(items: IndexBatchItem[]): Promise<void> {
    await this.similaritySearch.indexVectors(items);
  }

  async querySimilar(vector: Vector, topK: number = this.defaultTopK): Promise<ScoredResult[]> {
    return this.similaritySearch.querySimilar(vector, topK);
  }

  /**
   * Embed text and index it. An empty embedding (embedder failure) is
   * rejected by the backend's validation.
   */
  async indexText(
    text: string,
    id: string = uuidv4(),
    metadata: Record<string, unknown> = {},
  ): Promise<string> {
    const vector = await this.embeddingService.embedText(text);
    await this.similaritySearch.indexVector(vector, { ...metadata, id });

    this.logger.log(`🧠 Text embedded and indexed: ${id} (${vector.length} dims)`);
    return id;
  }

  async queryText(text: string, topK: number = this.defaultTopK): Promise<ScoredResult[]> {
    const vector = await this.embeddingService.embedText(text);
    return this.similaritySearch.querySimilar(vector, topK);
  }

  async health(): Promise<VectorsHealth> {
    const check = await this.similaritySearch.isHealthy();
    return {
      ...check,
      status: check.healthy ? 'healthy' : 'degraded',
      backend: this.similaritySearch.backend,
      timestamp: new Date().toISOString(),
    };
  }
}
