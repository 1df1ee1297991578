import { describe, expect, it } from "vitest";
import { parsePostId, parsePostInput } from "../src/posts/http";
import { CONTENT_MAX_LENGTH, TITLE_MAX_LENGTH, ValidationError } from "../src/posts/repository";

describe("parsePostInput", () => {
  it("applies defaults for published and rating", () => {
    expect(parsePostInput({ title: "A", content: "B" })).toEqual({
      title: "A",
      content: "B",
      published: true,
      rating: null
    });
  });

  it("accepts a title of exactly the maximum length and rejects one more", () => {
    expect(parsePostInput({ title: "t".repeat(TITLE_MAX_LENGTH), content: "x" }).title).toHaveLength(200);
    expect(() => parsePostInput({ title: "t".repeat(TITLE_MAX_LENGTH + 1), content: "x" })).toThrowError(
      "title must be between 1 and 200 characters"
    );
  });

  it("accepts content of exactly the maximum length and rejects one more", () => {
    expect(parsePostInput({ title: "A", content: "c".repeat(CONTENT_MAX_LENGTH) }).content).toHaveLength(20_000);
    expect(() => parsePostInput({ title: "A", content: "c".repeat(CONTENT_MAX_LENGTH + 1) })).toThrowError(
      "content must be at most 20000 characters"
    );
  });

  it("counts characters outside the basic plane once", () => {
    const title = "😀".repeat(150);
    const content = "😀".repeat(CONTENT_MAX_LENGTH);

    const input = parsePostInput({ title, content });

    expect(input.title).toBe(title);
    expect(input.content).toBe(content);
  });

  it("rejects emoji titles over the character limit", () => {
    expect(() => parsePostInput({ title: "😀".repeat(TITLE_MAX_LENGTH + 1), content: "x" })).toThrowError(
      ValidationError
    );
  });

  it("rejects arrays and null as bodies", () => {
    expect(() => parsePostInput([])).toThrowError("request body must be a JSON object");
    expect(() => parsePostInput(null)).toThrowError("request body must be a JSON object");
  });
});

describe("parsePostId", () => {
  it("parses positive integers", () => {
    expect(parsePostId("42")).toBe(42);
  });

  it("rejects zero, signs, decimals and ids beyond the safe integer range", () => {
    for (const value of ["0", "-1", "+1", "1.5", "1e3", "", "9007199254740993"]) {
      expect(() => parsePostId(value)).toThrowError("id must be a positive integer");
    }
  });
});
