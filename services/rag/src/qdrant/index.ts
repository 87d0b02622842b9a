export { QdrantIndex, toPointId, DENSE_VECTOR_NAME, SPARSE_VECTOR_NAME } from "./client.js";
export type { QdrantConfig } from "./client.js";
export { VectorStoreUpserter, toIndexRecord } from "./upserter.js";
export type { UpserterOptions } from "./upserter.js";
export type * from "./types.js";
