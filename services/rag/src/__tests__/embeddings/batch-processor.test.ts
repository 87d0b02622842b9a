import { describe, it, expect, vi } from "vitest";
import { EmbeddingBatchProcessor, toTextBatch } from "../../embeddings/batch-processor.js";
import { normalizeDense } from "../../embeddings/normalize.js";
import type { DenseVector, EmbeddingInputType, EmbeddingProvider } from "../../embeddings/types.js";
import { EmbeddingApiError, EmbeddingBatchError, RateLimitError } from "../../errors.js";
import { createLogger } from "../../logger.js";
import type { DocumentChunk } from "../../chunking/types.js";

const retry = { maxRetries: 3, initialDelayMs: 2000, maxDelayMs: 60000 };

/** Returns [position-in-input, 1] for every text of the form "item-<n>". */
function indexVector(text: string): DenseVector {
  return [Number(text.split("-")[1]), 1];
}

function fakeProvider(
  embedBatch: (texts: string[], inputType: EmbeddingInputType) => Promise<DenseVector[]>,
  overrides: Partial<EmbeddingProvider<DenseVector>> = {},
): EmbeddingProvider<DenseVector> {
  return {
    name: "fake",
    model: "fake-model",
    maxBatchSize: 100,
    maxInputChars: 1000,
    ...overrides,
    embedBatch,
  };
}

function sleepSpy() {
  return vi.fn((_ms: number) => Promise.resolve());
}

const identity = (vectors: DenseVector[]) => vectors;

describe("toTextBatch", () => {
  it("wraps a single string", () => {
    expect(toTextBatch("hello")).toEqual(["hello"]);
  });

  it("takes the content of chunks and keeps plain strings", () => {
    const chunk: DocumentChunk = {
      id: "doc_chunk_1",
      content: "Context:\nSource: Doc\n---\nbody",
      metadata: {
        rootId: "doc",
        chunkIndex: 1,
        totalChunks: 1,
        source: "Doc",
        title: "",
        parent: "",
        path: "",
        url: "",
        version: "",
        lastUpdated: "",
        headers: {},
        breadcrumbs: "Source: Doc",
        originalContent: "body",
      },
    };
    expect(toTextBatch([chunk, "plain"])).toEqual(["Context:\nSource: Doc\n---\nbody", "plain"]);
  });
});

describe("EmbeddingBatchProcessor", () => {
  it("embeds 250 items in batches of 100, 100 and 50, preserving order", async () => {
    const embedBatch = vi.fn(async (texts: string[]) => texts.map(indexVector));
    const sleep = sleepSpy();
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      batchSize: 100,
      interBatchDelayMs: 1000,
      retry,
      normalize: identity,
      sleep,
    });

    const texts = Array.from({ length: 250 }, (_, i) => `item-${i}`);
    const vectors = await processor.embedDocuments(texts);

    expect(embedBatch.mock.calls.map(([batch]) => batch.length)).toEqual([100, 100, 50]);
    expect(embedBatch.mock.calls[1][0][0]).toBe("item-100");
    expect(vectors).toHaveLength(250);
    expect(vectors.map((v) => v[0])).toEqual(texts.map((_, i) => i));
  });

  it("pauses between batches but not after the last one", async () => {
    const embedBatch = vi.fn(async (texts: string[]) => texts.map(indexVector));
    const sleep = sleepSpy();
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      batchSize: 100,
      interBatchDelayMs: 1000,
      retry,
      normalize: identity,
      sleep,
    });

    await processor.embedDocuments(Array.from({ length: 250 }, (_, i) => `item-${i}`));

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 1000]);
  });

  it("falls back to the provider's batch size", async () => {
    const embedBatch = vi.fn(async (texts: string[]) => texts.map(indexVector));
    const processor = new EmbeddingBatchProcessor(
      fakeProvider(embedBatch, { maxBatchSize: 2 }),
      { interBatchDelayMs: 0, retry, normalize: identity, sleep: sleepSpy() },
    );

    await processor.embedDocuments(["item-0", "item-1", "item-2"]);

    expect(processor.batchSize).toBe(2);
    expect(embedBatch).toHaveBeenCalledTimes(2);
  });

  it("rejects a batch size below 1", () => {
    const embedBatch = vi.fn(async (texts: string[]) => texts.map(indexVector));
    expect(
      () =>
        new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
          batchSize: 0,
          interBatchDelayMs: 0,
          retry,
          normalize: identity,
        }),
    ).toThrow(RangeError);
  });

  it("normalizes the combined output", async () => {
    const embedBatch = vi.fn(async (texts: string[]) => texts.map((): DenseVector => [2, 4, 4, 8]));
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      interBatchDelayMs: 0,
      retry,
      normalize: normalizeDense,
    });

    const vectors = await processor.embedDocuments(["a", "b"]);

    expect(vectors).toEqual([
      [0.2, 0.4, 0.4, 0.8],
      [0.2, 0.4, 0.4, 0.8],
    ]);
  });

  it("embeds a query with the query input type and returns one vector", async () => {
    const embedBatch = vi.fn(async (texts: string[]) => texts.map(indexVector));
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      interBatchDelayMs: 0,
      retry,
      normalize: identity,
    });

    const vector = await processor.embedQuery("item-7");

    expect(vector).toEqual([7, 1]);
    expect(embedBatch).toHaveBeenCalledWith(["item-7"], "query");
  });

  it("sends documents with the document input type", async () => {
    const embedBatch = vi.fn(async (texts: string[]) => texts.map(indexVector));
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      interBatchDelayMs: 0,
      retry,
      normalize: identity,
    });

    await processor.embedDocuments(["item-1"]);

    expect(embedBatch).toHaveBeenCalledWith(["item-1"], "document");
  });

  it("truncates inputs longer than maxInputChars", async () => {
    const embedBatch = vi.fn(async (texts: string[]) => texts.map((): DenseVector => [1]));
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      maxInputChars: 5,
      interBatchDelayMs: 0,
      retry,
      normalize: identity,
    });

    await processor.embedDocuments(["abcdefgh", "abc"]);
    await processor.embedQuery("0123456789");

    expect(embedBatch.mock.calls[0][0]).toEqual(["abcde", "abc"]);
    expect(embedBatch.mock.calls[1][0]).toEqual(["01234"]);
  });

  it("logs a warning for each truncated input", async () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "warn", pretty: false, output: (line) => lines.push(line) });
    const embedBatch = vi.fn(async (texts: string[]) => texts.map((): DenseVector => [1]));
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      maxInputChars: 3,
      interBatchDelayMs: 0,
      retry,
      normalize: identity,
      logger,
    });

    await processor.embedDocuments(["abcdef"]);

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: "warn",
      msg: "Input too long, truncating",
      provider: "fake",
      position: 0,
      length: 6,
      maxInputChars: 3,
    });
  });

  it("retries a rate-limited batch with exponential backoff", async () => {
    const embedBatch = vi
      .fn(async (texts: string[]) => texts.map(indexVector))
      .mockRejectedValueOnce(new RateLimitError("fake", "slow down"))
      .mockRejectedValueOnce(new RateLimitError("fake", "slow down"));
    const sleep = sleepSpy();
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      interBatchDelayMs: 1000,
      retry,
      normalize: identity,
      sleep,
    });

    const vectors = await processor.embedDocuments(["item-3"]);

    expect(vectors).toEqual([[3, 1]]);
    expect(embedBatch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it("wraps exhausted retries in EmbeddingBatchError with the original cause", async () => {
    const original = new RateLimitError("fake", "slow down");
    const embedBatch = vi.fn(async (_texts: string[]): Promise<DenseVector[]> => {
      throw original;
    });
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      interBatchDelayMs: 0,
      retry: { ...retry, maxRetries: 2 },
      normalize: identity,
      sleep: sleepSpy(),
    });

    const error = await processor.embedDocuments(["item-0"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingBatchError);
    expect(error).toMatchObject({ operation: "document", batchIndex: 0, batchCount: 1, cause: original });
    expect(embedBatch).toHaveBeenCalledTimes(3);
  });

  it("fails fast on a non-rate-limit API error", async () => {
    const embedBatch = vi.fn(async (_texts: string[]): Promise<DenseVector[]> => {
      throw new EmbeddingApiError("fake", 401, "Unauthorized");
    });
    const sleep = sleepSpy();
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      interBatchDelayMs: 0,
      retry,
      normalize: identity,
      sleep,
    });

    await expect(processor.embedDocuments(["item-0"])).rejects.toThrow(
      "fake document embedding failed on batch 1/1: fake embedding failed (401): Unauthorized",
    );
    expect(embedBatch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("reports which batch failed", async () => {
    const embedBatch = vi
      .fn(async (texts: string[]) => texts.map(indexVector))
      .mockResolvedValueOnce([[0, 1]])
      .mockRejectedValueOnce(new EmbeddingApiError("fake", 500, "boom"));
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      batchSize: 1,
      interBatchDelayMs: 0,
      retry,
      normalize: identity,
    });

    await expect(processor.embedDocuments(["item-0", "item-1", "item-2"])).rejects.toMatchObject({
      batchIndex: 1,
      batchCount: 3,
    });
  });

  it("rejects a provider response with the wrong number of vectors", async () => {
    const embedBatch = vi.fn(async (_texts: string[]): Promise<DenseVector[]> => [[1]]);
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      interBatchDelayMs: 0,
      retry,
      normalize: identity,
    });

    await expect(processor.embedDocuments(["a", "b"])).rejects.toThrow(
      "fake document embedding failed on batch 1/1: expected 2 vectors, received 1",
    );
  });

  it("returns an empty list for empty input without calling the provider", async () => {
    const embedBatch = vi.fn(async (texts: string[]) => texts.map(indexVector));
    const processor = new EmbeddingBatchProcessor(fakeProvider(embedBatch), {
      interBatchDelayMs: 1000,
      retry,
      normalize: normalizeDense,
    });

    expect(await processor.embedDocuments([])).toEqual([]);
    expect(embedBatch).not.toHaveBeenCalled();
  });
});
