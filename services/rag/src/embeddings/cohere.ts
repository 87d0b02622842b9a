import { postJson } from "./http.js";
import type {
  DenseEmbeddingProvider,
  DenseVector,
  EmbeddingConfig,
  EmbeddingInputType,
} from "./types.js";

interface CohereEmbeddingResponse {
  embeddings: { float: number[][] };
}

const INPUT_TYPES: Record<EmbeddingInputType, string> = {
  document: "search_document",
  query: "search_query",
};

export class CohereEmbedding implements DenseEmbeddingProvider {
  readonly name = "cohere";
  private readonly apiKey: string;
  readonly model: string;
  readonly dimensions: number;
  readonly maxBatchSize = 96;
  // Cohere truncates past 512 tokens anyway
  readonly maxInputChars = 2048;
  private readonly baseUrl = "https://api.cohere.com/v2";

  constructor(config: EmbeddingConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || "embed-multilingual-v3.0";
    this.dimensions = config.dimensions ?? 1024;
  }

  async embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<DenseVector[]> {
    const data = await postJson<CohereEmbeddingResponse>(
      this.name,
      `${this.baseUrl}/embed`,
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: this.model,
        texts,
        input_type: INPUT_TYPES[inputType],
        embedding_types: ["float"],
      },
    );
    return data.embeddings.float;
  }
}
