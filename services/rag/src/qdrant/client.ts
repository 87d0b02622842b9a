import { createHash } from "node:crypto";
import { QdrantClient as QdrantSDK } from "@qdrant/js-client-rest";
import { IndexError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type {
  HybridIndex,
  HybridQuery,
  IndexInfo,
  IndexRecord,
  IndexSpec,
  RetrievalMatch,
} from "./types.js";

export const DENSE_VECTOR_NAME = "dense";
export const SPARSE_VECTOR_NAME = "sparse";

const PAYLOAD_INDEXES = [
  ["rootId", "keyword"],
  ["source", "keyword"],
  ["chunkIndex", "integer"],
] as const;

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  logger?: Logger;
}

/**
 * Deterministic point id for a chunk id. Qdrant only takes integers or UUIDs,
 * so the chunk id is hashed into UUID form and kept verbatim in the payload.
 */
export function toPointId(chunkId: string): string {
  const hex = createHash("md5").update(chunkId).digest("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

export class QdrantIndex implements HybridIndex {
  private readonly client: QdrantSDK;
  private readonly logger: Logger;

  constructor(config: QdrantConfig) {
    this.client = new QdrantSDK({
      url: config.url,
      apiKey: config.apiKey,
    });
    this.logger = config.logger ?? silentLogger;
  }

  private async call<T>(operation: string, indexName: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new IndexError(operation, indexName, error);
    }
  }

  async exists(indexName: string): Promise<boolean> {
    const collections = await this.call("list", indexName, () => this.client.getCollections());
    return collections.collections.some((c) => c.name === indexName);
  }

  /**
   * Create a collection with a named dense vector and a named sparse vector,
   * plus the payload indexes used for filtering and replacement.
   */
  async create(indexName: string, spec: IndexSpec): Promise<void> {
    await this.call("create", indexName, async () => {
      await this.client.createCollection(indexName, {
        vectors: {
          [DENSE_VECTOR_NAME]: { size: spec.dimension, distance: spec.metric },
        },
        sparse_vectors: {
          [SPARSE_VECTOR_NAME]: {},
        },
      });

      for (const [field, schema] of PAYLOAD_INDEXES) {
        await this.client.createPayloadIndex(indexName, {
          field_name: field,
          field_schema: schema,
        });
      }
    });
    this.logger.info("Created collection", { indexName, dimension: spec.dimension, metric: spec.metric });
  }

  /** Create the collection unless it already exists. Returns true when created. */
  async ensure(indexName: string, spec: IndexSpec): Promise<boolean> {
    if (await this.exists(indexName)) return false;
    await this.create(indexName, spec);
    return true;
  }

  async upsert(indexName: string, records: IndexRecord[]): Promise<void> {
    const points = records.map((record) => ({
      id: toPointId(record.id),
      vector: {
        [DENSE_VECTOR_NAME]: record.denseVector,
        [SPARSE_VECTOR_NAME]: {
          indices: record.sparseVector.indices,
          values: record.sparseVector.values,
        },
      },
      payload: { ...record.metadata },
    }));

    await this.call("upsert", indexName, () =>
      this.client.upsert(indexName, { wait: true, points }),
    );
  }

  /**
   * One hybrid query: dense and sparse candidates are prefetched separately
   * and fused by reciprocal rank inside Qdrant.
   */
  async query(indexName: string, query: HybridQuery): Promise<RetrievalMatch[]> {
    const response = await this.call("query", indexName, () =>
      this.client.query(indexName, {
        prefetch: [
          { query: query.dense, using: DENSE_VECTOR_NAME, limit: query.topK },
          {
            query: { indices: query.sparse.indices, values: query.sparse.values },
            using: SPARSE_VECTOR_NAME,
            limit: query.topK,
          },
        ],
        query: { fusion: "rrf" },
        limit: query.topK,
        with_payload: true,
        with_vector: false,
      }),
    );

    return response.points.map((point) => {
      const metadata: Record<string, unknown> = { ...point.payload };
      const chunkId = metadata.chunkId;
      return {
        id: typeof chunkId === "string" ? chunkId : String(point.id),
        score: point.score,
        metadata,
      };
    });
  }

  /**
   * Remove the records of one source document whose chunkIndex is above
   * `keepChunks`. With the default of 0 every record goes.
   */
  async deleteByRootId(indexName: string, rootId: string, keepChunks = 0): Promise<void> {
    const byRoot = { key: "rootId", match: { value: rootId } };
    await this.call("delete", indexName, () =>
      this.client.delete(indexName, {
        wait: true,
        filter: {
          must:
            keepChunks > 0
              ? [byRoot, { key: "chunkIndex", range: { gt: keepChunks } }]
              : [byRoot],
        },
      }),
    );
  }

  async info(indexName: string): Promise<IndexInfo> {
    const info = await this.call("info", indexName, () => this.client.getCollection(indexName));
    return {
      pointsCount: info.points_count ?? 0,
      indexedVectorsCount: info.indexed_vectors_count ?? 0,
    };
  }
}
