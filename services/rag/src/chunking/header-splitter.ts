import type { HeaderPath, Segment } from "./types.js";

const ATX_HEADER = /^(#{1,6})[ \t]+(.+?)[ \t#]*$/;
const FENCE = /^\s*(```|~~~)/;

interface OpenHeader {
  level: number;
  text: string;
}

interface PendingSegment {
  headers: OpenHeader[];
  lines: string[];
  /** True while every line seen so far is a header line. */
  headerOnly: boolean;
}

function toHeaderPath(stack: readonly OpenHeader[]): HeaderPath {
  const path: HeaderPath = {};
  for (const header of stack) {
    path[`H${header.level}`] = header.text;
  }
  return path;
}

/**
 * Split Markdown on ATX headers of the given levels. Header lines stay in
 * their segment, and each segment carries every header open at its start.
 * A segment holding nothing but headers is folded into the one that follows,
 * so a header line only stands alone when it ends the document.
 */
export function splitOnHeaders(text: string, levels: readonly number[]): Segment[] {
  const splitLevels = new Set(levels);
  const stack: OpenHeader[] = [];
  const done: PendingSegment[] = [];
  let current: PendingSegment = { headers: [], lines: [], headerOnly: true };
  let inFence = false;

  const flush = () => {
    if (current.lines.length > 0) done.push(current);
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimEnd();

    if (FENCE.test(line)) {
      inFence = !inFence;
    }

    const match = inFence ? null : ATX_HEADER.exec(line);
    if (match && splitLevels.has(match[1].length)) {
      const level = match[1].length;
      while (stack.length > 0 && stack[stack.length - 1].level >= level) {
        stack.pop();
      }
      stack.push({ level, text: match[2].trim() });

      const carried = current.headerOnly ? current.lines : [];
      if (carried.length === 0) flush();

      current = { headers: [...stack], lines: [...carried, line], headerOnly: true };
      continue;
    }

    if (line.trim() === "" && current.lines.length === 0) continue;
    current.lines.push(line);
    if (line.trim() !== "") current.headerOnly = false;
  }
  flush();

  return done
    .map((segment) => ({
      headers: toHeaderPath(segment.headers),
      content: segment.lines.join("\n").trim(),
    }))
    .filter((segment) => segment.content !== "");
}
