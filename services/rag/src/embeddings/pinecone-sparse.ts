import { postJson } from "./http.js";
import type { EmbeddingInputType, SparseEmbeddingProvider, SparseVector } from "./types.js";

interface PineconeEmbedResponse {
  data: Array<{
    vector_type: "sparse";
    sparse_values: number[];
    sparse_indices: number[];
  }>;
}

export interface PineconeSparseConfig {
  apiKey: string;
  model?: string;
  /** Token budget per input; Pinecone rejects longer inputs rather than truncating. */
  maxTokensPerSequence?: number;
}

const INPUT_TYPES: Record<EmbeddingInputType, string> = {
  document: "passage",
  query: "query",
};

/**
 * Lexical sparse embeddings from Pinecone's hosted inference API.
 */
export class PineconeSparseEmbedding implements SparseEmbeddingProvider {
  readonly name = "pinecone-sparse";
  private readonly apiKey: string;
  readonly model: string;
  readonly maxBatchSize = 96;
  readonly maxInputChars = 8000;
  private readonly maxTokensPerSequence: number;
  private readonly baseUrl = "https://api.pinecone.io";

  constructor(config: PineconeSparseConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || "pinecone-sparse-english-v0";
    this.maxTokensPerSequence = config.maxTokensPerSequence ?? 2048;
  }

  async embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<SparseVector[]> {
    const data = await postJson<PineconeEmbedResponse>(
      this.name,
      `${this.baseUrl}/embed`,
      { "Api-Key": this.apiKey, "X-Pinecone-API-Version": "2025-04" },
      {
        model: this.model,
        inputs: texts.map((text) => ({ text })),
        parameters: {
          input_type: INPUT_TYPES[inputType],
          max_tokens_per_sequence: this.maxTokensPerSequence,
          truncate: "NONE",
        },
      },
    );
    return data.data.map((item) => ({
      indices: item.sparse_indices,
      values: item.sparse_values,
    }));
  }
}
