import type OpenAI from "openai";
import type { Embedder } from "../types/index.js";
import Logger from "../utils/logger.js";

/** The slice of the OpenAI client this service calls */
export interface EmbeddingsApi {
  embeddings: {
    create(body: OpenAI.EmbeddingCreateParams): PromiseLike<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export class EmbeddingService implements Embedder {
  constructor(
    private readonly client: EmbeddingsApi,
    private readonly model: string,
    private readonly batchSize: number = 32
  ) {}

  async embed(texts: string[]): Promise<Float32Array[]> {
    const embeddings: Float32Array[] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      Logger.debug(`Embedding batch ${i / this.batchSize + 1}`, { size: batch.length, model: this.model });

      const response = await this.client.embeddings.create({
        model: this.model,
        input: batch,
        encoding_format: "float",
      });

      if (response.data.length !== batch.length) {
        throw new Error(
          `Embedding API returned ${response.data.length} vectors for ${batch.length} inputs`
        );
      }

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) {
        embeddings.push(new Float32Array(item.embedding));
      }
    }

    return embeddings;
  }
}
