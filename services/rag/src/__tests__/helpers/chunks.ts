import type { DocumentChunk } from "../../chunking/types.js";

export function makeChunk(id: string, rootId = "doc", text = `content of ${id}`): DocumentChunk {
  return {
    id,
    content: `Context:\nSource: Test Doc\n---\n${text}`,
    metadata: {
      rootId,
      chunkIndex: 1,
      totalChunks: 1,
      source: "Test Doc",
      title: "Test Doc",
      parent: "",
      path: "",
      url: "",
      version: "",
      lastUpdated: "",
      headers: {},
      breadcrumbs: "Source: Test Doc",
      originalContent: text,
    },
  };
}
