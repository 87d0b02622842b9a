import type { DenseEmbedder, SparseEmbedder } from "../embeddings/index.js";
import { IndexError, RetrievalError, errorMessage, type RetrievalStage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { HybridIndex, RetrievalMatch } from "../qdrant/types.js";
import { withSpan } from "../tracing.js";

export interface HybridRetrieverOptions {
  dense: DenseEmbedder;
  sparse: SparseEmbedder;
  index: HybridIndex;
  indexName: string;
  logger?: Logger;
}

/**
 * Answers a free-text query with the top-K chunks of one hybrid index.
 * Dense and sparse signals are fused by the index, not here.
 */
export class HybridRetriever {
  private readonly logger: Logger;

  constructor(private readonly options: HybridRetrieverOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  private async embed<V>(stage: RetrievalStage, fn: () => Promise<V>): Promise<V> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error("Error generating query embedding", { stage, error: errorMessage(error) });
      throw new RetrievalError(stage, error);
    }
  }

  async retrieve(query: string, topK = 5): Promise<RetrievalMatch[]> {
    const { dense, sparse, index, indexName } = this.options;

    return withSpan("rag.retrieve", async (span) => {
      span.setAttribute("top_k", topK);

      const denseVector = await this.embed("dense-embedding", () => dense.embedQuery(query));
      this.logger.debug("Generated dense query embedding", { dimensions: denseVector.length });

      const sparseVector = await this.embed("sparse-embedding", () => sparse.embedQuery(query));
      this.logger.debug("Generated sparse query embedding", { terms: sparseVector.indices.length });

      try {
        const matches = await index.query(indexName, {
          dense: denseVector,
          sparse: sparseVector,
          topK,
        });
        this.logger.info("Hybrid query complete", { indexName, matches: matches.length });
        span.setAttribute("matches", matches.length);
        return matches;
      } catch (error) {
        if (error instanceof IndexError) {
          this.logger.error("Index error during hybrid query", { indexName, error: error.message });
        } else {
          this.logger.error("Unexpected error during hybrid query", {
            indexName,
            error: errorMessage(error),
          });
        }
        throw error;
      }
    });
  }
}
