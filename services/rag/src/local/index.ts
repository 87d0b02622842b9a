export { LocalFileClient } from "./client.js";
export type { LocalFileClientConfig } from "./client.js";
export type { LocalFile } from "./types.js";
