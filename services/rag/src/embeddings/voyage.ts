import { postJson } from "./http.js";
import type {
  DenseEmbeddingProvider,
  DenseVector,
  EmbeddingConfig,
  EmbeddingInputType,
} from "./types.js";

interface VoyageEmbeddingResponse {
  data: Array<{ index: number; embedding: number[] }>;
}

export class VoyageEmbedding implements DenseEmbeddingProvider {
  readonly name = "voyage";
  private readonly apiKey: string;
  readonly model: string;
  readonly dimensions: number;
  readonly maxBatchSize = 128;
  readonly maxInputChars = 16000;
  private readonly baseUrl = "https://api.voyageai.com/v1";

  constructor(config: EmbeddingConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || "voyage-2";
    this.dimensions = config.dimensions ?? 1024;
  }

  async embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<DenseVector[]> {
    const data = await postJson<VoyageEmbeddingResponse>(
      this.name,
      `${this.baseUrl}/embeddings`,
      { Authorization: `Bearer ${this.apiKey}` },
      { model: this.model, input: texts, input_type: inputType },
    );
    const sorted = [...data.data].sort((a, b) => a.index - b.index);
    return sorted.map((item) => item.embedding);
  }
}
