export type ErrorClass = abstract new (...args: never[]) => Error;

/**
 * Non-2xx response from an embedding provider.
 */
export class EmbeddingApiError extends Error {
  constructor(
    readonly provider: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${provider} embedding failed (${status}): ${body}`);
    this.name = "EmbeddingApiError";
  }
}

/**
 * HTTP 429 from an embedding provider. The only error the batch processor retries.
 */
export class RateLimitError extends EmbeddingApiError {
  constructor(provider: string, body: string) {
    super(provider, 429, body);
    this.name = "RateLimitError";
  }
}

export class EmbeddingBatchError extends Error {
  constructor(
    readonly provider: string,
    readonly operation: "document" | "query",
    readonly batchIndex: number,
    readonly batchCount: number,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `${provider} ${operation} embedding failed on batch ${batchIndex + 1}/${batchCount}: ${reason}`,
      { cause },
    );
    this.name = "EmbeddingBatchError";
  }
}

export class DimensionMismatchError extends Error {
  constructor(
    readonly label: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Dimension mismatch: ${expected} chunks but ${actual} ${label}`);
    this.name = "DimensionMismatchError";
  }
}

export class IndexError extends Error {
  constructor(
    readonly operation: string,
    readonly indexName: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Index ${operation} failed on '${indexName}': ${reason}`, { cause });
    this.name = "IndexError";
  }
}

export type RetrievalStage = "dense-embedding" | "sparse-embedding";

export class RetrievalError extends Error {
  constructor(
    readonly stage: RetrievalStage,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Retrieval failed during ${stage}: ${reason}`, { cause });
    this.name = "RetrievalError";
  }
}

/**
 * Files named explicitly for ingestion that are not in the documents directory.
 */
export class MissingFilesError extends Error {
  constructor(
    readonly directory: string,
    readonly missing: string[],
  ) {
    super(`Failed to find ${missing.length} requested files in ${directory}: ${missing.join(", ")}`);
    this.name = "MissingFilesError";
  }
}

export class NoDocumentsError extends Error {
  constructor(
    readonly directory: string,
    readonly extensions: string[],
  ) {
    super(`No ${extensions.join(", ")} files found in ${directory}`);
    this.name = "NoDocumentsError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
