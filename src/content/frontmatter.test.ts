import { describe, expect, it } from "vitest";
import { ContentError } from "../errors";
import { parseFrontMatter } from "./frontmatter";

describe("parseFrontMatter", () => {
  it("parses a TOML block and strips one blank line after the fence", () => {
    const source = `+++
title = "Hello"
tags = ["a", "b"]
+++

Body text
`;
    const result = parseFrontMatter(source, "hello.md");
    expect(result.data).toEqual({ title: "Hello", tags: ["a", "b"] });
    expect(result.body).toBe("Body text\n");
  });

  it("keeps the body intact when it follows the fence directly", () => {
    const result = parseFrontMatter('+++\ntitle = "x"\n+++\nFirst line\n\nSecond', "x.md");
    expect(result.body).toBe("First line\n\nSecond");
  });

  it("handles CRLF line endings", () => {
    const result = parseFrontMatter('+++\r\ntitle = "Windows"\r\n+++\r\n\r\nBody', "win.md");
    expect(result.data.title).toBe("Windows");
    expect(result.body).toBe("Body");
  });

  it("returns the whole text when there is no front matter", () => {
    const source = "# Just markdown\n";
    expect(parseFrontMatter(source, "plain.md")).toEqual({ data: {}, body: source });
  });

  it("returns the whole text when the opening fence is not alone on its line", () => {
    const source = '+++ title = "x"\n+++\nBody';
    expect(parseFrontMatter(source, "odd.md")).toEqual({ data: {}, body: source });
  });

  it("returns the whole text when the block is never closed", () => {
    const source = '+++\ntitle = "Unclosed"\nBody';
    expect(parseFrontMatter(source, "open.md")).toEqual({ data: {}, body: source });
  });

  it("accepts an empty block", () => {
    expect(parseFrontMatter("+++\n+++\nBody", "empty.md")).toEqual({ data: {}, body: "Body" });
  });

  it("keeps TOML dates as Date values", () => {
    const result = parseFrontMatter("+++\ndate = 2024-03-01T10:00:00Z\n+++\n", "dated.md");
    expect(result.data.date).toBeInstanceOf(Date);
    expect(result.data.date).toEqual(new Date("2024-03-01T10:00:00Z"));
  });

  it("accepts bare local dates", () => {
    const result = parseFrontMatter('+++\ntitle = "a"\ndate = 2025-01-02\n+++\nbody\n', "x.md");
    expect(result.data.date).toBeInstanceOf(Date);
    expect(result.body).toBe("body\n");
  });

  it("raises ContentError with the source path on invalid TOML", () => {
    const parse = () => parseFrontMatter("+++\ntitle = \n+++\nBody", "broken.md");
    expect(parse).toThrow(ContentError);
    expect(parse).toThrow(/broken\.md/);
  });
});
