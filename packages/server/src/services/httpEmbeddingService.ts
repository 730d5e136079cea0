import { z } from 'zod';
import { ExternalServiceError, type EmbeddingService, type Vector } from '@stratamem/core';
import type { EmbeddingConfig } from '../config.js';

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
});

/**
 * Client for an OpenAI-compatible `POST /embeddings` endpoint
 * (OpenAI, Ollama, vLLM, LM Studio and the like).
 */
export class HttpEmbeddingService implements EmbeddingService {
  readonly dimension: number;
  readonly modelName: string;
  private readonly url: string;

  constructor(
    private readonly config: EmbeddingConfig,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.dimension = config.dimension;
    this.modelName = config.model;
    this.url = `${config.apiUrl.replace(/\/+$/, '')}/embeddings`;
  }

  async embed(text: string): Promise<Vector> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<Vector[]> {
    if (texts.length === 0) return [];

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ model: this.modelName, input: texts }),
      });
    } catch (err) {
      throw new ExternalServiceError('embedding', `Embedding endpoint unreachable: ${this.url}`, err);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw new ExternalServiceError('embedding', `Embedding request failed with HTTP ${response.status}: ${detail}`);
    }

    const parsed = embeddingResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new ExternalServiceError('embedding', 'Embedding response is not in the expected format');
    }

    const vectors = [...parsed.data.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
    if (vectors.length !== texts.length) {
      throw new ExternalServiceError('embedding', `Expected ${texts.length} embeddings, received ${vectors.length}`);
    }
    const wrongSize = vectors.find(vector => vector.length !== this.dimension);
    if (wrongSize) {
      throw new ExternalServiceError(
        'embedding',
        `Expected ${this.dimension}-dimensional embeddings, received ${wrongSize.length}`,
      );
    }
    return vectors;
  }
}
