import type { TextChunker } from "../chunking/chunker.js";
import type { DocumentChunk } from "../chunking/types.js";
import { errorMessage } from "../errors.js";
import type { LocalFile } from "../local/types.js";
import { silentLogger, type Logger } from "../logger.js";
import type { HybridIndex } from "../qdrant/types.js";
import { withSpan } from "../tracing.js";
import { processChunkBatch, type ChunkBatchDeps } from "./chunk-batch.js";

export const DEFAULT_CHUNK_BUFFER_SIZE = 100;

export interface IngestLocalDeps extends ChunkBatchDeps {
  chunker: TextChunker;
  index: HybridIndex;
}

export interface IngestLocalOptions {
  indexName: string;
  /** Chunks buffered before an embed + upsert round. */
  batchSize?: number;
  logger?: Logger;
}

export interface IngestLocalResult {
  filesProcessed: number;
  chunksCreated: number;
  chunksStored: number;
  errors: Array<{ filePath: string; error: string }>;
}

interface PendingDocument {
  rootId: string;
  totalChunks: number;
  /** Chunks queued up to and including this document's last one. */
  queuedThrough: number;
}

/**
 * Chunk, embed and index every file. A file that fails to chunk, or whose root
 * id is already taken by an earlier file in the run, is recorded in `errors`
 * and skipped; embedding and index failures abort the run.
 *
 * Records left over from a longer previous version of a document are deleted
 * only after all of its new chunks have been written, so a failed run never
 * removes a document from the index.
 */
export async function ingestLocalFiles(
  files: AsyncIterable<LocalFile> | Iterable<LocalFile>,
  deps: IngestLocalDeps,
  options: IngestLocalOptions,
): Promise<IngestLocalResult> {
  const { indexName, batchSize = DEFAULT_CHUNK_BUFFER_SIZE } = options;
  const logger = options.logger ?? silentLogger;
  if (batchSize < 1) {
    throw new RangeError(`batchSize must be at least 1, got ${batchSize}`);
  }

  return withSpan("rag.ingest", async (span) => {
    const result: IngestLocalResult = {
      filesProcessed: 0,
      chunksCreated: 0,
      chunksStored: 0,
      errors: [],
    };
    const chunksBuffer: DocumentChunk[] = [];
    const pending: PendingDocument[] = [];
    const rootIdOwners = new Map<string, string>();
    let flushedThrough = 0;

    const recordError = (filePath: string, message: string) => {
      logger.error("File ingestion error", { filePath, error: message });
      result.errors.push({ filePath, error: message });
    };

    const flush = async (chunks: DocumentChunk[]): Promise<void> => {
      result.chunksStored += await processChunkBatch(chunks, indexName, deps, logger);
      flushedThrough += chunks.length;

      while (pending.length > 0 && pending[0].queuedThrough <= flushedThrough) {
        const { rootId, totalChunks } = pending[0];
        await deps.index.deleteByRootId(indexName, rootId, totalChunks);
        pending.shift();
      }
    };

    for await (const file of files) {
      logger.debug("Processing file", { filePath: file.relativePath });

      let chunks: DocumentChunk[];
      try {
        chunks = deps.chunker.split(file.content, file.relativePath);
      } catch (error) {
        recordError(file.relativePath, errorMessage(error));
        continue;
      }

      const rootId = chunks[0]?.metadata.rootId;
      if (rootId) {
        const owner = rootIdOwners.get(rootId);
        if (owner !== undefined) {
          recordError(file.relativePath, `Root id '${rootId}' is already used by ${owner}`);
          continue;
        }
        rootIdOwners.set(rootId, file.relativePath);
      }

      chunksBuffer.push(...chunks);
      result.filesProcessed++;
      result.chunksCreated += chunks.length;
      if (rootId) {
        pending.push({ rootId, totalChunks: chunks.length, queuedThrough: result.chunksCreated });
      }

      while (chunksBuffer.length >= batchSize) {
        await flush(chunksBuffer.splice(0, batchSize));
      }
    }

    if (chunksBuffer.length > 0) {
      await flush(chunksBuffer.splice(0));
    }

    span.setAttribute("files_processed", result.filesProcessed);
    span.setAttribute("chunks_created", result.chunksCreated);
    logger.info("Local file ingestion complete", {
      filesProcessed: result.filesProcessed,
      chunksCreated: result.chunksCreated,
      chunksStored: result.chunksStored,
      errors: result.errors.length,
    });
    return result;
  });
}
