import type { Logger } from "../logger.js";
import { EmbeddingBatchProcessor, type BackoffOptions } from "./batch-processor.js";
import { CohereEmbedding } from "./cohere.js";
import { GeminiEmbedding } from "./gemini.js";
import { normalizeDense, normalizeSparse } from "./normalize.js";
import { OpenAIEmbedding } from "./openai.js";
import { PineconeSparseEmbedding } from "./pinecone-sparse.js";
import type { DenseEmbeddingProvider, DenseVector, SparseVector } from "./types.js";
import { VoyageEmbedding } from "./voyage.js";

export type {
  DenseEmbeddingProvider,
  DenseVector,
  EmbeddingConfig,
  EmbeddingInputType,
  EmbeddingProvider,
  SparseEmbeddingProvider,
  SparseVector,
} from "./types.js";
export { EmbeddingBatchProcessor, toTextBatch } from "./batch-processor.js";
export type { BackoffOptions, BatchProcessorOptions, EmbeddingInput } from "./batch-processor.js";
export { normalizeDense, normalizeSparse } from "./normalize.js";

export type DenseEmbedder = EmbeddingBatchProcessor<DenseVector>;
export type SparseEmbedder = EmbeddingBatchProcessor<SparseVector>;

export type DenseProviderName = "openai" | "voyage" | "cohere" | "gemini";

export interface CreateDenseProviderOptions {
  provider: DenseProviderName;
  apiKey: string;
  /** Omitted: the provider's default model and vector size. */
  model?: string;
  dimensions?: number;
}

export function createDenseProvider(options: CreateDenseProviderOptions): DenseEmbeddingProvider {
  const config = { apiKey: options.apiKey, model: options.model, dimensions: options.dimensions };
  switch (options.provider) {
    case "openai":
      return new OpenAIEmbedding(config);
    case "voyage":
      return new VoyageEmbedding(config);
    case "cohere":
      return new CohereEmbedding(config);
    case "gemini":
      return new GeminiEmbedding(config);
  }
}

/** Batching and retry settings shared by both embedders. */
export interface ProcessorSettings {
  batchSize?: number;
  maxInputChars?: number;
  interBatchDelayMs: number;
  retry: BackoffOptions;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function createDenseEmbedder(
  source: CreateDenseProviderOptions | DenseEmbeddingProvider,
  settings: ProcessorSettings,
): DenseEmbedder {
  const provider = "embedBatch" in source ? source : createDenseProvider(source);
  return new EmbeddingBatchProcessor(provider, {
    ...settings,
    normalize: normalizeDense,
  });
}

export interface CreateSparseEmbedderOptions {
  apiKey: string;
  model?: string;
}

export function createSparseEmbedder(
  options: CreateSparseEmbedderOptions,
  settings: ProcessorSettings,
): SparseEmbedder {
  return new EmbeddingBatchProcessor(new PineconeSparseEmbedding(options), {
    ...settings,
    normalize: normalizeSparse,
  });
}
