import { describe, it, expect } from "vitest";
import { resolveRootId, sanitizeStem, fromFilename } from "../../chunking/root-id.js";

describe("sanitizeStem", () => {
  it("lowercases and joins words with underscores", () => {
    expect(sanitizeStem("Graduate Student-Handbook.md")).toBe("graduate_student_handbook");
  });

  it("drops punctuation and keeps directories", () => {
    expect(sanitizeStem("docs/Q&A (2024).md")).toBe("docs_qa_2024");
  });

  it("tells same-named files in different directories apart", () => {
    expect(sanitizeStem("guides/README.md")).toBe("guides_readme");
    expect(sanitizeStem("policies/README.md")).toBe("policies_readme");
  });

  it("skips empty and dot segments", () => {
    expect(sanitizeStem("./notes//Plan.md")).toBe("notes_plan");
  });
});

describe("resolveRootId", () => {
  it("uses the page id first", () => {
    expect(
      resolveRootId({ metadata: { pageId: "123" }, sourceName: "policy.md", body: "x" }),
    ).toBe("123");
  });

  it("uses the file name when there is no page id", () => {
    expect(resolveRootId({ metadata: {}, sourceName: "Leave Policy.md", body: "x" })).toBe(
      "leave_policy",
    );
  });

  it("hashes the body as a last resort", () => {
    expect(resolveRootId({ metadata: {}, body: "Just some text." })).toBe("anon_5b6d8c4a");
  });

  it("skips a file name that sanitizes to nothing", () => {
    expect(fromFilename({ metadata: {}, sourceName: "???.md", body: "" })).toBeUndefined();
  });

  it("throws when no resolver produces an id", () => {
    expect(() => resolveRootId({ metadata: {}, body: "" }, [])).toThrow(
      "No root id resolver produced an id",
    );
  });
});
