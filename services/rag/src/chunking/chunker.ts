import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { parseFrontmatter, toDateOnly } from "./frontmatter.js";
import { splitOnHeaders } from "./header-splitter.js";
import { recursiveSplit } from "./recursive-splitter.js";
import { fileStem, resolveRootId } from "./root-id.js";
import {
  DEFAULT_CHUNKING_OPTIONS,
  type ChunkingOptions,
  type DocumentChunk,
  type DocumentMetadata,
  type Segment,
} from "./types.js";

const UNKNOWN_SOURCE = "Unknown Document";

/** "graduate-student_handbook.md" → "graduate student handbook" */
function displayName(sourceName: string): string {
  return fileStem(sourceName).replace(/[-_]+/g, " ").trim();
}

function documentName(metadata: DocumentMetadata, sourceName?: string): string {
  if (metadata.title) return metadata.title;
  const name = sourceName ? displayName(sourceName) : "";
  return name || UNKNOWN_SOURCE;
}

function sourceLabel(metadata: DocumentMetadata, sourceName?: string): string {
  if (metadata.path) return metadata.path;
  if (metadata.parent && metadata.title) return `${metadata.parent} / ${metadata.title}`;
  return documentName(metadata, sourceName);
}

function contextLines(
  metadata: DocumentMetadata,
  segment: Segment,
  sourceName: string | undefined,
): string[] {
  const lines = [`Source: ${sourceLabel(metadata, sourceName)}`];
  if (metadata.version) lines.push(`Version: ${metadata.version}`);
  const lastUpdated = toDateOnly(metadata.lastUpdated);
  if (lastUpdated) lines.push(`Last Updated: ${lastUpdated}`);
  const headers = Object.values(segment.headers);
  if (headers.length > 0) lines.push(`Headers: ${headers.join(" > ")}`);
  return lines;
}

export class TextChunker {
  private readonly options: ChunkingOptions;
  private readonly logger: Logger;

  constructor(options: Partial<ChunkingOptions> = {}, logger: Logger = silentLogger) {
    this.options = { ...DEFAULT_CHUNKING_OPTIONS, ...options };
    this.logger = logger;
  }

  /**
   * Chunk one Markdown document: strip front-matter, split on headers, split
   * oversized sections by length, then prefix each piece with its context
   * block. Always returns at least one chunk.
   */
  split(text: string, sourceName?: string): DocumentChunk[] {
    try {
      const { metadata, body } = parseFrontmatter(text);
      const pieces = this.splitBody(body);
      const rootId = resolveRootId({ metadata, sourceName, body });
      const chunks = pieces.map((piece, i) =>
        this.enrich(piece, i + 1, pieces.length, rootId, metadata, sourceName),
      );

      this.logger.info("Split document into chunks", {
        source: sourceName ?? rootId,
        chunks: chunks.length,
      });
      return chunks;
    } catch (error) {
      this.logger.error("Error during text chunking", {
        source: sourceName,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  private structuralSplit(body: string): Segment[] {
    try {
      return splitOnHeaders(body, this.options.headerLevels);
    } catch (error) {
      this.logger.warn("Failed to split markdown headers, using whole body", {
        error: errorMessage(error),
      });
      return [{ headers: {}, content: body }];
    }
  }

  private splitBody(body: string): Segment[] {
    const segments = this.structuralSplit(body);
    if (segments.length === 0) {
      return [{ headers: {}, content: body.trim() }];
    }

    return segments.flatMap((segment) =>
      recursiveSplit(segment.content, {
        chunkSize: this.options.chunkSize,
        chunkOverlap: this.options.chunkOverlap,
      }).map((content) => ({ headers: { ...segment.headers }, content })),
    );
  }

  private enrich(
    piece: Segment,
    position: number,
    total: number,
    rootId: string,
    metadata: DocumentMetadata,
    sourceName: string | undefined,
  ): DocumentChunk {
    const lines = contextLines(metadata, piece, sourceName);
    const content = `Context:\n${lines.join("\n")}\n---\n${piece.content}`;

    return {
      id: `${rootId}_chunk_${position}`,
      content,
      metadata: {
        rootId,
        chunkIndex: position,
        totalChunks: total,
        source: documentName(metadata, sourceName),
        title: metadata.title ?? "",
        parent: metadata.parent ?? "",
        path: metadata.path ?? "",
        url: metadata.url ?? "",
        version: metadata.version ?? "",
        lastUpdated: toDateOnly(metadata.lastUpdated),
        headers: piece.headers,
        breadcrumbs: lines.join(" | "),
        originalContent: piece.content,
      },
    };
  }
}

/** One-shot chunking with default options. */
export function splitDocument(
  text: string,
  sourceName?: string,
  options: Partial<ChunkingOptions> = {},
  logger?: Logger,
): DocumentChunk[] {
  return new TextChunker(options, logger).split(text, sourceName);
}
