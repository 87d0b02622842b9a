#!/usr/bin/env node
import { loadConfig, type Config } from "./config.js";
import { TextChunker } from "./chunking/index.js";
import {
  createDenseEmbedder,
  createDenseProvider,
  createSparseEmbedder,
  type DenseEmbedder,
  type ProcessorSettings,
  type SparseEmbedder,
} from "./embeddings/index.js";
import { LocalFileClient } from "./local/index.js";
import { createLogger, type Logger } from "./logger.js";
import { ingestLocalFiles } from "./pipeline/index.js";
import { QdrantIndex, VectorStoreUpserter } from "./qdrant/index.js";
import { HybridRetriever } from "./retrieval/index.js";
import { initTracing } from "./tracing.js";

interface CliArgs {
  command: string;
  query?: string;
  directory?: string;
  files?: string[];
  topK: number;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const parsed: CliArgs = { command: "", topK: 5 };
  const positional: string[] = [];

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    const value = args[i + 1];
    if (arg === "--dir" && value) {
      parsed.directory = value;
      i += 2; // consume --dir and its value
    } else if (arg === "--files" && value) {
      const files = value.split(",").map((f) => f.trim()).filter(Boolean);
      if (files.length === 0) {
        console.error("--files needs at least one file name.");
        process.exit(1);
      }
      parsed.files = files;
      i += 2;
    } else if (arg === "--top-k" && value) {
      const topK = Number.parseInt(value, 10);
      if (!Number.isInteger(topK) || topK < 1) {
        console.error(`Invalid --top-k value: ${value}. Must be a positive integer.`);
        process.exit(1);
      }
      parsed.topK = topK;
      i += 2;
    } else {
      positional.push(arg);
      i++;
    }
  }

  parsed.command = positional[0] ?? "";
  if (positional.length > 1) parsed.query = positional.slice(1).join(" ");
  return parsed;
}

function printHelp(): void {
  console.log(`
Hybrid KB - Markdown knowledge base with dense + sparse retrieval on Qdrant

Commands:
  ingest    Chunk, embed and index the documents in the documents directory
  search    Run a hybrid query against the collection
  info      Show collection info
  help      Show this message

Options:
  --dir <path>      Documents directory (default: DOCS_DIRECTORY)
  --files <list>    Comma-separated files to ingest, relative to the directory
  --top-k <n>       Number of search results (default: 5)

Environment variables required:
  DENSE_EMBEDDING_API_KEY     API key for the dense embedding provider
  SPARSE_EMBEDDING_API_KEY    Pinecone API key for sparse embeddings

Optional:
  DENSE_EMBEDDING_PROVIDER    openai, voyage, cohere or gemini (default: gemini)
  DENSE_EMBEDDING_MODEL       Model name (default: the provider's own)
  DENSE_EMBEDDING_DIMENSIONS  Vector size (default: the provider's own)
  SPARSE_EMBEDDING_MODEL      Model name (default: pinecone-sparse-english-v0)
  EMBEDDING_BATCH_DELAY_MS    Pause between embedding batches (default: 1000)
  RETRY_MAX_RETRIES           Retries on rate limit (default: 5)

  QDRANT_URL                  Qdrant URL (default: http://localhost:6333)
  QDRANT_COLLECTION           Collection name (default: knowledge-base)
  QDRANT_DISTANCE             Dot, Cosine or Euclid (default: Dot)

  CHUNK_SIZE                  Maximum characters per chunk (default: 1000)
  CHUNK_OVERLAP               Characters shared by adjacent chunks (default: 200)
  DOCS_DIRECTORY              Directory to scan (default: ./data/processed)
  DOCS_EXTENSIONS             Comma-separated extensions (default: .md)

Examples:
  node dist/index.js ingest                          # Ingest DOCS_DIRECTORY
  node dist/index.js ingest --dir ./handbooks        # Ingest another directory
  node dist/index.js ingest --files leave.md,gpa.md  # Ingest named files only
  node dist/index.js search "how to request leave"   # Search
  node dist/index.js search --top-k 10 "GPA rules"   # Search with more results
`);
}

interface Services {
  dense: DenseEmbedder;
  denseDimensions: number;
  sparse: SparseEmbedder;
  index: QdrantIndex;
}

function buildServices(config: Config, logger: Logger): Services {
  const settings: Omit<ProcessorSettings, "batchSize" | "maxInputChars"> = {
    interBatchDelayMs: config.throttle.batchDelayMs,
    retry: config.retry,
    logger,
  };

  const denseProvider = createDenseProvider({
    provider: config.denseEmbedding.provider,
    apiKey: config.denseEmbedding.apiKey,
    model: config.denseEmbedding.model,
    dimensions: config.denseEmbedding.dimensions,
  });
  const dense = createDenseEmbedder(denseProvider, {
    ...settings,
    batchSize: config.denseEmbedding.batchSize,
    maxInputChars: config.denseEmbedding.maxInputChars,
  });

  const sparse = createSparseEmbedder(
    { apiKey: config.sparseEmbedding.apiKey, model: config.sparseEmbedding.model },
    {
      ...settings,
      batchSize: config.sparseEmbedding.batchSize,
      maxInputChars: config.sparseEmbedding.maxInputChars,
    },
  );

  const index = new QdrantIndex({
    url: config.qdrant.url,
    apiKey: config.qdrant.apiKey,
    logger,
  });

  return { dense, denseDimensions: denseProvider.dimensions, sparse, index };
}

async function handleIngest(
  config: Config,
  services: Services,
  directory: string,
  requested: string[] | undefined,
  logger: Logger,
): Promise<void> {
  const collection = config.qdrant.collectionName;
  await services.index.ensure(collection, {
    dimension: services.denseDimensions,
    metric: config.qdrant.distance,
  });

  logger.info("Local file ingestion starting", {
    directory,
    extensions: config.documents.extensions.join(", "),
    files: requested?.join(", "),
  });

  const files = new LocalFileClient({
    directory,
    extensions: config.documents.extensions,
    logger,
  });

  const result = await ingestLocalFiles(
    requested ? files.getFiles(requested) : files.getAllFiles(),
    {
      chunker: new TextChunker(config.chunking, logger),
      dense: services.dense,
      sparse: services.sparse,
      upserter: new VectorStoreUpserter(services.index, {
        batchSize: config.qdrant.upsertBatchSize,
        logger,
      }),
      index: services.index,
    },
    { indexName: collection, logger },
  );

  for (const e of result.errors) {
    logger.error("File ingestion error", { filePath: e.filePath, error: e.error });
  }
}

async function handleSearch(
  query: string | undefined,
  topK: number,
  config: Config,
  services: Services,
  logger: Logger,
): Promise<void> {
  if (!query) {
    console.error("Usage: search <query>");
    process.exit(1);
  }

  console.log(`Searching for: "${query}"\n`);

  const retriever = new HybridRetriever({
    dense: services.dense,
    sparse: services.sparse,
    index: services.index,
    indexName: config.qdrant.collectionName,
    logger,
  });
  const results = await retriever.retrieve(query, topK);

  if (results.length === 0) {
    console.log("No results found.");
    return;
  }

  console.log(`Found ${results.length} results:\n`);
  for (const result of results) {
    const { source, url, originalContent } = result.metadata;
    console.log(`--- Score: ${result.score.toFixed(3)} ---`);
    console.log(`Chunk: ${result.id}`);
    console.log(`Source: ${typeof source === "string" ? source : "Unknown Document"}`);
    if (typeof url === "string" && url) console.log(`URL: ${url}`);
    if (typeof originalContent === "string") {
      console.log(`Content preview: ${originalContent.slice(0, 200)}...`);
    }
    console.log();
  }
}

async function handleInfo(config: Config, services: Services): Promise<void> {
  const collection = config.qdrant.collectionName;
  if (!(await services.index.exists(collection))) {
    console.log(`Collection '${collection}' does not exist yet. Run 'ingest' first.`);
    return;
  }
  const info = await services.index.info(collection);
  console.log("=== Collection Info ===");
  console.log(`Collection: ${collection}`);
  console.log(`Points count: ${info.pointsCount}`);
  console.log(`Indexed vectors: ${info.indexedVectorsCount}`);
}

async function main() {
  const { command, query, directory, files, topK } = parseArgs();

  if (!command || command === "help") {
    printHelp();
    return;
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  await initTracing();

  const services = buildServices(config, logger);

  switch (command) {
    case "ingest":
      await handleIngest(config, services, directory ?? config.documents.directory, files, logger);
      break;
    case "search":
      await handleSearch(query, topK, config, services, logger);
      break;
    case "info":
      await handleInfo(config, services);
      break;
    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run with "help" to see available commands.');
      process.exit(1);
  }
}

try {
  await main();
} catch (error) {
  console.error("Fatal error:", error);
  process.exit(1);
}
