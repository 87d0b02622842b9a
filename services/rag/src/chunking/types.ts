/** Ordered header path of a segment, e.g. `{ H1: "Admissions", H2: "GPA" }`. */
export type HeaderPath = Record<string, string>;

export interface DocumentMetadata {
  title?: string;
  parent?: string;
  /** Full breadcrumb path of the source page, e.g. "Handbook / Admissions". */
  path?: string;
  pageId?: string;
  version?: string;
  /** Raw timestamp as found in the front-matter. */
  lastUpdated?: string;
  url?: string;
}

export interface ChunkMetadata {
  rootId: string;
  /** 1-based position within the source document. */
  chunkIndex: number;
  totalChunks: number;
  source: string;
  title: string;
  parent: string;
  path: string;
  url: string;
  version: string;
  /** YYYY-MM-DD, or "" when unknown. */
  lastUpdated: string;
  headers: HeaderPath;
  breadcrumbs: string;
  /** Chunk text before the context block was prepended. */
  originalContent: string;
}

export interface DocumentChunk {
  id: string; // {rootId}_chunk_{n}
  content: string; // context block + original content
  metadata: ChunkMetadata;
}

export interface Segment {
  headers: HeaderPath;
  content: string;
}

export interface ChunkingOptions {
  /** Maximum characters per piece before the context block. */
  chunkSize: number;
  chunkOverlap: number;
  /** Markdown header levels that start a new segment. */
  headerLevels: number[];
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  chunkSize: 1000,
  chunkOverlap: 200,
  headerLevels: [1, 2, 3],
};
