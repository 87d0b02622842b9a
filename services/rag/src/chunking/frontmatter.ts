import matter from "gray-matter";
import yaml from "js-yaml";
import type { DocumentMetadata } from "./types.js";

export interface ParsedDocument {
  metadata: DocumentMetadata;
  body: string;
}

// JSON schema keeps timestamps as written instead of turning them into UTC Dates.
function parseYaml(source: string): object {
  const data: unknown = yaml.load(source, { schema: yaml.JSON_SCHEMA });
  return typeof data === "object" && data !== null ? data : {};
}

function asText(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  const text = String(value).trim();
  return text === "" ? undefined : text;
}

/**
 * Split a leading YAML front-matter block off `text`. Text without one comes
 * back untouched with empty metadata; an empty block is still removed;
 * malformed YAML throws.
 */
export function parseFrontmatter(text: string): ParsedDocument {
  if (!matter.test(text)) {
    return { metadata: {}, body: text };
  }
  const parsed = matter(text, { engines: { yaml: parseYaml } });

  const data: Record<string, unknown> = parsed.data;
  return {
    metadata: {
      title: asText(data.title),
      parent: asText(data.parent),
      path: asText(data.path),
      pageId: asText(data.page_id),
      version: asText(data.version),
      lastUpdated: asText(data.last_updated),
      url: asText(data.original_url) ?? asText(data.url),
    },
    body: parsed.content,
  };
}

/**
 * Date-only rendering of a timestamp: "2024-05-01T10:00:00Z" → "2024-05-01".
 * Values that do not start with a date are returned as is.
 */
export function toDateOnly(timestamp: string | undefined): string {
  if (!timestamp) return "";
  const match = /^\d{4}-\d{2}-\d{2}/.exec(timestamp);
  return match ? match[0] : timestamp;
}
