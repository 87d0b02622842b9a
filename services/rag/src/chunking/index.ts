export { TextChunker, splitDocument } from "./chunker.js";
export { parseFrontmatter, toDateOnly } from "./frontmatter.js";
export { splitOnHeaders } from "./header-splitter.js";
export { recursiveSplit, DEFAULT_SEPARATORS } from "./recursive-splitter.js";
export { resolveRootId, sanitizeStem, ROOT_ID_RESOLVERS } from "./root-id.js";
export type { RootIdResolver } from "./root-id.js";
export * from "./types.js";
