export { ingestLocalFiles, DEFAULT_CHUNK_BUFFER_SIZE } from "./ingest-local.js";
export { processChunkBatch } from "./chunk-batch.js";
export type { IngestLocalDeps, IngestLocalOptions, IngestLocalResult } from "./ingest-local.js";
export type { ChunkBatchDeps } from "./chunk-batch.js";
