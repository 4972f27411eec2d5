import OpenAI from 'openai';
import type { AppConfig } from './config';
import { EmbeddingError, errorMessage, VectorDimensionError } from './errors';
import type { Logger } from './logger';

export const MAX_CHARS_PER_EMBEDDING = 8000;

/** The slice of the OpenAI SDK this service talks to. */
export interface EmbeddingsApi {
  embeddings: {
    create(body: { model: string; input: string | string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
      usage?: { total_tokens: number };
    }>;
  };
}

export class EmbeddingService {
  private client: EmbeddingsApi;
  readonly model: string;
  readonly dimension: number;

  constructor(
    config: AppConfig['embedding'],
    private readonly logger: Logger,
    client?: EmbeddingsApi
  ) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
    this.model = config.model;
    this.dimension = config.dimension;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  /** One request for all inputs; vectors come back in input order. */
  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let response: Awaited<ReturnType<EmbeddingsApi['embeddings']['create']>>;
    try {
      response = await this.client.embeddings.create({
        model: this.model,
        input: texts.map((t) => t.substring(0, MAX_CHARS_PER_EMBEDDING)),
      });
    } catch (error) {
      this.logger.error(`Embedding request failed: ${errorMessage(error)}`);
      throw new EmbeddingError(`Embedding request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.data.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding service returned ${response.data.length} vectors for ${texts.length} inputs`
      );
    }

    const vectors = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    for (const vector of vectors) {
      if (vector.length !== this.dimension) {
        const mismatch = new VectorDimensionError(this.dimension, vector.length);
        this.logger.error(mismatch.message);
        throw new EmbeddingError(mismatch.message, { cause: mismatch });
      }
    }

    this.logger.debug(
      `🔢 Embedded ${texts.length} text(s) with ${this.model} (${response.usage?.total_tokens ?? 0} tokens)`
    );
    return vectors;
  }
}
