import { postJson } from "./http.js";
import type {
  DenseEmbeddingProvider,
  DenseVector,
  EmbeddingConfig,
  EmbeddingInputType,
} from "./types.js";

interface GeminiBatchEmbedResponse {
  embeddings: Array<{ values: number[] }>;
}

const TASK_TYPES: Record<EmbeddingInputType, string> = {
  document: "RETRIEVAL_DOCUMENT",
  query: "RETRIEVAL_QUERY",
};

/**
 * Google Gemini embeddings through the Generative Language REST API.
 * Output is truncated to `dimensions` server-side (768 by default).
 */
export class GeminiEmbedding implements DenseEmbeddingProvider {
  readonly name = "gemini";
  private readonly apiKey: string;
  readonly model: string;
  readonly dimensions: number;
  readonly maxBatchSize = 100;
  readonly maxInputChars = 8000;
  private readonly baseUrl = "https://generativelanguage.googleapis.com/v1beta";

  constructor(config: EmbeddingConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || "gemini-embedding-001";
    this.dimensions = config.dimensions ?? 768;
  }

  async embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<DenseVector[]> {
    const modelPath = `models/${this.model}`;
    const data = await postJson<GeminiBatchEmbedResponse>(
      this.name,
      `${this.baseUrl}/${modelPath}:batchEmbedContents`,
      { "x-goog-api-key": this.apiKey },
      {
        requests: texts.map((text) => ({
          model: modelPath,
          content: { parts: [{ text }] },
          taskType: TASK_TYPES[inputType],
          outputDimensionality: this.dimensions,
        })),
      },
    );
    return data.embeddings.map((e) => e.values);
  }
}
