import { createHash } from "node:crypto";
import { basename, extname } from "node:path";
import type { DocumentMetadata } from "./types.js";

export interface RootIdInput {
  metadata: DocumentMetadata;
  sourceName?: string;
  body: string;
}

export type RootIdResolver = (input: RootIdInput) => string | undefined;

/** Filename without directory or extension. */
export function fileStem(sourceName: string): string {
  return basename(sourceName, extname(sourceName));
}

function sanitizePart(part: string): string {
  return part
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_")
    .replace(/[^a-z0-9_]/g, "");
}

/**
 * "Graduate Student-Handbook.md" → "graduate_student_handbook".
 * Directories in a relative path are kept: "guides/README.md" → "guides_readme".
 */
export function sanitizeStem(sourceName: string): string {
  const withoutExtension = sourceName.slice(0, sourceName.length - extname(sourceName).length);
  return withoutExtension
    .split(/[\\/]/)
    .map(sanitizePart)
    .filter((part) => part !== "")
    .join("_");
}

export const fromPageId: RootIdResolver = ({ metadata }) => metadata.pageId;

export const fromFilename: RootIdResolver = ({ sourceName }) => {
  if (!sourceName) return undefined;
  const stem = sanitizeStem(sourceName);
  return stem === "" ? undefined : stem;
};

export const fromContentHash: RootIdResolver = ({ body }) =>
  `anon_${createHash("md5").update(body).digest("hex").slice(0, 8)}`;

/** Tried in order; the first defined result wins. */
export const ROOT_ID_RESOLVERS: readonly RootIdResolver[] = [fromPageId, fromFilename, fromContentHash];

export function resolveRootId(
  input: RootIdInput,
  resolvers: readonly RootIdResolver[] = ROOT_ID_RESOLVERS,
): string {
  for (const resolve of resolvers) {
    const id = resolve(input);
    if (id) return id;
  }
  throw new Error("No root id resolver produced an id");
}
