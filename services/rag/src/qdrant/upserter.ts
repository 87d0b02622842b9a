import type { DocumentChunk } from "../chunking/types.js";
import type { DenseVector, SparseVector } from "../embeddings/types.js";
import { DimensionMismatchError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { partition } from "../utils/partition.js";
import type { HybridIndex, IndexRecord } from "./types.js";

export interface UpserterOptions {
  /** Records per write call; bounded by payload size, not item count. */
  batchSize?: number;
  logger?: Logger;
}

const DEFAULT_UPSERT_BATCH_SIZE = 50;

export function toIndexRecord(
  chunk: DocumentChunk,
  denseVector: DenseVector,
  sparseVector: SparseVector,
): IndexRecord {
  return {
    id: chunk.id,
    denseVector,
    sparseVector,
    metadata: { ...chunk.metadata, chunkId: chunk.id, text: chunk.content },
  };
}

/**
 * Writes chunk + dense + sparse triples into a hybrid index in bounded batches.
 */
export class VectorStoreUpserter {
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly index: HybridIndex,
    options: UpserterOptions = {},
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_UPSERT_BATCH_SIZE;
    if (this.batchSize < 1) {
      throw new RangeError(`batchSize must be at least 1, got ${this.batchSize}`);
    }
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Validates counts before any write, skips chunks without an id, then
   * upserts batch by batch. A failed batch propagates; earlier batches stay
   * written, which is safe because upserts are idempotent per id.
   */
  async upsert(
    indexName: string,
    chunks: readonly DocumentChunk[],
    denseVectors: readonly DenseVector[],
    sparseVectors: readonly SparseVector[],
  ): Promise<number> {
    if (chunks.length !== denseVectors.length) {
      throw new DimensionMismatchError("dense vectors", chunks.length, denseVectors.length);
    }
    if (chunks.length !== sparseVectors.length) {
      throw new DimensionMismatchError("sparse vectors", chunks.length, sparseVectors.length);
    }

    const records: IndexRecord[] = [];
    for (const [i, chunk] of chunks.entries()) {
      if (!chunk.id) {
        this.logger.warn("Chunk missing id, skipping", { source: chunk.metadata.source, position: i });
        continue;
      }
      records.push(toIndexRecord(chunk, denseVectors[i], sparseVectors[i]));
    }

    if (records.length === 0) {
      this.logger.warn("No valid records to upsert", { indexName });
      return 0;
    }

    this.logger.info("Starting upsert", { indexName, records: records.length });
    const batches = partition(records, this.batchSize);
    for (const [i, batch] of batches.entries()) {
      try {
        await this.index.upsert(indexName, batch);
      } catch (error) {
        this.logger.error("Failed to upsert batch", {
          indexName,
          batch: i + 1,
          batchCount: batches.length,
          error: errorMessage(error),
        });
        throw error;
      }
      this.logger.debug("Upserted batch", { indexName, batch: i + 1, size: batch.length });
    }

    this.logger.info("Finished upsert", { indexName, records: records.length });
    return records.length;
  }
}
