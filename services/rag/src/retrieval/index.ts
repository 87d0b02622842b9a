export { HybridRetriever } from "./retriever.js";
export type { HybridRetrieverOptions } from "./retriever.js";
