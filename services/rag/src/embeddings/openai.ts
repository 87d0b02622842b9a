import { postJson } from "./http.js";
import type { DenseEmbeddingProvider, DenseVector, EmbeddingConfig } from "./types.js";

interface OpenAIEmbeddingResponse {
  data: Array<{ index: number; embedding: number[] }>;
}

export class OpenAIEmbedding implements DenseEmbeddingProvider {
  readonly name = "openai";
  private readonly apiKey: string;
  readonly model: string;
  readonly dimensions: number;
  readonly maxBatchSize = 2048;
  // ~8191 tokens at roughly 4 chars per token, with headroom
  readonly maxInputChars = 8000;
  private readonly baseUrl = "https://api.openai.com/v1";

  constructor(config: EmbeddingConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || "text-embedding-3-small";
    this.dimensions = config.dimensions ?? 1536;
  }

  async embedBatch(texts: string[]): Promise<DenseVector[]> {
    const data = await postJson<OpenAIEmbeddingResponse>(
      this.name,
      `${this.baseUrl}/embeddings`,
      { Authorization: `Bearer ${this.apiKey}` },
      { model: this.model, input: texts, dimensions: this.dimensions },
    );
    // The API does not promise response order
    const sorted = [...data.data].sort((a, b) => a.index - b.index);
    return sorted.map((item) => item.embedding);
  }
}
