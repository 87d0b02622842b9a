export type DenseVector = number[];

export interface SparseVector {
  indices: number[];
  values: number[];
}

export type EmbeddingInputType = "document" | "query";

/**
 * One embedding model behind an HTTP API. Implementations embed exactly one
 * request's worth of texts; batching, throttling and retries live in
 * EmbeddingBatchProcessor.
 */
export interface EmbeddingProvider<V> {
  /** Provider name used in logs and errors. */
  readonly name: string;
  readonly model: string;
  /** Documented per-request item maximum. */
  readonly maxBatchSize: number;
  /** Per-item character ceiling; longer texts are truncated before submission. */
  readonly maxInputChars: number;

  embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<V[]>;
}

export interface DenseEmbeddingProvider extends EmbeddingProvider<DenseVector> {
  readonly dimensions: number;
}

export type SparseEmbeddingProvider = EmbeddingProvider<SparseVector>;

export interface EmbeddingConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}
