// modules/embedding/embedding.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InferenceClient } from '@huggingface/inference';
import type { EmbeddingConfig } from '../../config/similarity.config';

function isNumber(value: unknown): value is number {
  return typeof value === 'number';
}

/**
 * Feature extraction returns a 1D array for a single input, or a 2D array
 * when the provider batches; anything else is not an embedding.
 */
export function toEmbedding(result: unknown): number[] {
  if (!Array.isArray(result) || result.length === 0) return [];
  const first: unknown = result[0];
  const row: unknown[] = Array.isArray(first) ? first : result;
  return row.every(isNumber) ? row : [];
}

@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);
  // One client per service instance; the API key never becomes process state.
  private readonly client: InferenceClient;
  private readonly model: string;

  constructor(private readonly configService: ConfigService) {
    const config = this.configService.getOrThrow<EmbeddingConfig>('embedding');
    this.client = new InferenceClient(config.apiKey);
    this.model = config.model;

    this.logger.log(`✅ Embedding service initialized with ${config.service} (${this.model})`);
  }

  /**
   * Embed text with the Hugging Face Inference API. Failures are logged and
   * degrade to an empty vector.
   */
  async embedText(text: string): Promise<number[]> {
    try {
      const result = await this.client.featureExtraction({
        model: this.model,
        inputs: text,
        provider: 'hf-inference',
      });

      const embedding = toEmbedding(result);
      if (embedding.length === 0) {
        this.logger.error('Unexpected embedding format from Hugging Face API');
      }
      return embedding;
    } catch (error) {
      this.logger.error('Embedding generation failed:', error);
      return [];
    }
  }
}
