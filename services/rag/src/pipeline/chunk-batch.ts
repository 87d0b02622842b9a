import type { DocumentChunk } from "../chunking/types.js";
import type { DenseEmbedder, SparseEmbedder } from "../embeddings/index.js";
import type { Logger } from "../logger.js";
import type { VectorStoreUpserter } from "../qdrant/upserter.js";

export interface ChunkBatchDeps {
  dense: DenseEmbedder;
  sparse: SparseEmbedder;
  upserter: VectorStoreUpserter;
}

/** Embed one buffer of chunks both ways and write it. Returns the number of records written. */
export async function processChunkBatch(
  chunks: DocumentChunk[],
  indexName: string,
  deps: ChunkBatchDeps,
  logger: Logger | undefined,
): Promise<number> {
  logger?.debug("Embedding chunk batch", { count: chunks.length });
  const denseVectors = await deps.dense.embedDocuments(chunks);
  const sparseVectors = await deps.sparse.embedDocuments(chunks);
  const written = await deps.upserter.upsert(indexName, chunks, denseVectors, sparseVectors);
  logger?.debug("Stored chunk batch in Qdrant", { count: written });
  return written;
}
