import type { DocumentChunk } from "../chunking/types.js";
import { EmbeddingBatchError, RateLimitError, type ErrorClass } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { partition } from "../utils/partition.js";
import { withRetry } from "../utils/retry.js";
import { sleep as defaultSleep } from "../utils/sleep.js";
import type { EmbeddingInputType, EmbeddingProvider } from "./types.js";

/** Anything the processor can embed; coerced to a flat list of texts at the boundary. */
export type EmbeddingInput = string | ReadonlyArray<string | DocumentChunk>;

export interface BackoffOptions {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface BatchProcessorOptions<V> {
  /** Overrides provider.maxBatchSize. */
  batchSize?: number;
  /** Overrides provider.maxInputChars. */
  maxInputChars?: number;
  /** Proactive throttle between consecutive batches. */
  interBatchDelayMs: number;
  retry: BackoffOptions;
  retryOn?: readonly ErrorClass[];
  normalize: (vectors: V[]) => V[];
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function toTextBatch(input: EmbeddingInput): string[] {
  if (typeof input === "string") return [input];
  return input.map((item) => (typeof item === "string" ? item : item.content));
}

/**
 * Turns texts into normalized vectors through one embedding provider:
 * fixed-size batches submitted sequentially, a fixed pause between batches,
 * exponential backoff on rate limits, output order equal to input order.
 */
export class EmbeddingBatchProcessor<V> {
  readonly batchSize: number;
  readonly maxInputChars: number;
  private readonly retryOn: readonly ErrorClass[];
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly provider: EmbeddingProvider<V>,
    private readonly options: BatchProcessorOptions<V>,
  ) {
    this.batchSize = options.batchSize ?? provider.maxBatchSize;
    this.maxInputChars = options.maxInputChars ?? provider.maxInputChars;
    if (this.batchSize < 1) {
      throw new RangeError(`batchSize must be at least 1, got ${this.batchSize}`);
    }
    this.retryOn = options.retryOn ?? [RateLimitError];
    this.logger = (options.logger ?? silentLogger).child({ provider: provider.name });
    this.sleep = options.sleep ?? defaultSleep;
  }

  get providerName(): string {
    return this.provider.name;
  }

  async embedDocuments(input: EmbeddingInput): Promise<V[]> {
    return this.run(toTextBatch(input), "document");
  }

  async embedQuery(text: string): Promise<V> {
    const [vector] = await this.run([text], "query");
    return vector;
  }

  private truncate(texts: string[]): string[] {
    return texts.map((text, i) => {
      if (text.length <= this.maxInputChars) return text;
      this.logger.warn("Input too long, truncating", {
        position: i,
        length: text.length,
        maxInputChars: this.maxInputChars,
      });
      return text.slice(0, this.maxInputChars);
    });
  }

  private async run(texts: string[], operation: EmbeddingInputType): Promise<V[]> {
    const batches = partition(this.truncate(texts), this.batchSize);
    const results: V[] = [];

    for (const [index, batch] of batches.entries()) {
      this.logger.debug("Embedding batch", {
        operation,
        batch: index + 1,
        batchCount: batches.length,
        size: batch.length,
      });
      results.push(...(await this.embedOne(batch, operation, index, batches.length)));

      if (index < batches.length - 1 && this.options.interBatchDelayMs > 0) {
        await this.sleep(this.options.interBatchDelayMs);
      }
    }

    return this.options.normalize(results);
  }

  private async embedOne(
    batch: string[],
    operation: EmbeddingInputType,
    index: number,
    batchCount: number,
  ): Promise<V[]> {
    let vectors: V[];
    try {
      vectors = await withRetry(() => this.provider.embedBatch(batch, operation), {
        ...this.options.retry,
        retryOn: this.retryOn,
        sleep: this.sleep,
        logger: this.logger,
      });
    } catch (error) {
      const wrapped = new EmbeddingBatchError(this.provider.name, operation, index, batchCount, error);
      this.logger.error("Embedding batch failed", { operation, error: wrapped.message });
      throw wrapped;
    }

    if (vectors.length !== batch.length) {
      const mismatch = new EmbeddingBatchError(
        this.provider.name,
        operation,
        index,
        batchCount,
        new Error(`expected ${batch.length} vectors, received ${vectors.length}`),
      );
      this.logger.error("Embedding batch returned wrong vector count", { operation, error: mismatch.message });
      throw mismatch;
    }

    return vectors;
  }
}
