import { z } from "zod";

const intFromEnv = (fallback: number) => z.coerce.number().int().default(fallback);

const listFromEnv = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const items = value?.split(",").map((item) => item.trim()).filter(Boolean) ?? [];
      return items.length > 0 ? items : fallback;
    });

const ConfigSchema = z.object({
  // Dense embedding model (semantic signal)
  denseEmbedding: z.object({
    provider: z.enum(["openai", "voyage", "cohere", "gemini"]).default("gemini"),
    apiKey: z.string().min(1, "DENSE_EMBEDDING_API_KEY is required"),
    // Each provider falls back to its own default model and vector size
    model: z.string().optional(),
    dimensions: z.coerce.number().int().positive().optional(),
    batchSize: z.coerce.number().int().positive().optional(),
    maxInputChars: z.coerce.number().int().positive().optional(),
  }),

  // Sparse embedding model (lexical signal), served by Pinecone inference
  sparseEmbedding: z.object({
    apiKey: z.string().min(1, "SPARSE_EMBEDDING_API_KEY is required"),
    model: z.string().default("pinecone-sparse-english-v0"),
    batchSize: z.coerce.number().int().positive().optional(),
    maxInputChars: z.coerce.number().int().positive().optional(),
  }),

  throttle: z.object({
    batchDelayMs: intFromEnv(1000).pipe(z.number().nonnegative()),
  }),

  retry: z.object({
    maxRetries: intFromEnv(5).pipe(z.number().nonnegative()),
    initialDelayMs: intFromEnv(2000).pipe(z.number().nonnegative()),
    maxDelayMs: intFromEnv(60000).pipe(z.number().nonnegative()),
  }),

  qdrant: z.object({
    url: z.string().url().default("http://localhost:6333"),
    collectionName: z.string().min(1).default("knowledge-base"),
    apiKey: z.string().optional(),
    upsertBatchSize: intFromEnv(50).pipe(z.number().positive()),
    distance: z.enum(["Dot", "Cosine", "Euclid"]).default("Dot"),
  }),

  chunking: z
    .object({
      chunkSize: intFromEnv(1000).pipe(z.number().positive()),
      chunkOverlap: intFromEnv(200).pipe(z.number().nonnegative()),
      headerLevels: listFromEnv(["1", "2", "3"]).pipe(
        z.array(z.coerce.number().int().min(1).max(6)),
      ),
    })
    .refine((c) => c.chunkOverlap < c.chunkSize, {
      message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      path: ["chunkOverlap"],
    }),

  documents: z.object({
    directory: z.string().default("./data/processed"),
    extensions: listFromEnv([".md"]),
  }),

  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

// Blank variables count as unset so zod defaults apply.
function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: Env = process.env): Config {
  return ConfigSchema.parse({
    denseEmbedding: {
      provider: read(env, "DENSE_EMBEDDING_PROVIDER"),
      apiKey: read(env, "DENSE_EMBEDDING_API_KEY") ?? "",
      model: read(env, "DENSE_EMBEDDING_MODEL"),
      dimensions: read(env, "DENSE_EMBEDDING_DIMENSIONS"),
      batchSize: read(env, "DENSE_EMBEDDING_BATCH_SIZE"),
      maxInputChars: read(env, "DENSE_EMBEDDING_MAX_CHARS"),
    },
    sparseEmbedding: {
      apiKey: read(env, "SPARSE_EMBEDDING_API_KEY") ?? "",
      model: read(env, "SPARSE_EMBEDDING_MODEL"),
      batchSize: read(env, "SPARSE_EMBEDDING_BATCH_SIZE"),
      maxInputChars: read(env, "SPARSE_EMBEDDING_MAX_CHARS"),
    },
    throttle: {
      batchDelayMs: read(env, "EMBEDDING_BATCH_DELAY_MS"),
    },
    retry: {
      maxRetries: read(env, "RETRY_MAX_RETRIES"),
      initialDelayMs: read(env, "RETRY_INITIAL_DELAY_MS"),
      maxDelayMs: read(env, "RETRY_MAX_DELAY_MS"),
    },
    qdrant: {
      url: read(env, "QDRANT_URL"),
      collectionName: read(env, "QDRANT_COLLECTION"),
      apiKey: read(env, "QDRANT_API_KEY"),
      upsertBatchSize: read(env, "QDRANT_UPSERT_BATCH_SIZE"),
      distance: read(env, "QDRANT_DISTANCE"),
    },
    chunking: {
      chunkSize: read(env, "CHUNK_SIZE"),
      chunkOverlap: read(env, "CHUNK_OVERLAP"),
      headerLevels: read(env, "CHUNK_HEADER_LEVELS"),
    },
    documents: {
      directory: read(env, "DOCS_DIRECTORY"),
      extensions: read(env, "DOCS_EXTENSIONS"),
    },
    logLevel: read(env, "LOG_LEVEL"),
  });
}
