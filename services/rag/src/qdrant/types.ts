import type { ChunkMetadata } from "../chunking/types.js";
import type { DenseVector, SparseVector } from "../embeddings/types.js";

/** Chunk metadata as persisted: enrichment fields plus the full chunk text. */
export type IndexMetadata = ChunkMetadata & {
  chunkId: string;
  text: string;
};

export interface IndexRecord {
  id: string;
  denseVector: DenseVector;
  sparseVector: SparseVector;
  metadata: IndexMetadata;
}

export interface RetrievalMatch {
  id: string;
  /** Fused dense + sparse score as computed by the index; higher is more relevant. */
  score: number;
  metadata: Record<string, unknown>;
}

export interface HybridQuery {
  dense: DenseVector;
  sparse: SparseVector;
  topK: number;
}

export type DistanceMetric = "Dot" | "Cosine" | "Euclid";

export interface IndexSpec {
  dimension: number;
  metric: DistanceMetric;
}

export interface IndexInfo {
  pointsCount: number;
  indexedVectorsCount: number;
}

/**
 * A single index holding a dense and a sparse vector per record, queried with
 * both at once.
 */
export interface HybridIndex {
  exists(indexName: string): Promise<boolean>;
  create(indexName: string, spec: IndexSpec): Promise<void>;
  upsert(indexName: string, records: IndexRecord[]): Promise<void>;
  query(indexName: string, query: HybridQuery): Promise<RetrievalMatch[]>;
  /** Delete a document's records with chunkIndex above `keepChunks` (default 0: all). */
  deleteByRootId(indexName: string, rootId: string, keepChunks?: number): Promise<void>;
  info(indexName: string): Promise<IndexInfo>;
}
