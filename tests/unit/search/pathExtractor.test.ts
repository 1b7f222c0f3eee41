import { describe, expect, it } from "vitest";

import { ABSENT, extract, isAbsent, splitPath, toText } from "@/lib/search/pathExtractor";
import { NESTED_RESPONSE, ROOT_ARRAY_RESPONSE } from "@/tests/fixtures/providerResponses";

describe("extract", () => {
  it("returns the document itself for an empty path", () => {
    expect(extract(ROOT_ARRAY_RESPONSE, "")).toBe(ROOT_ARRAY_RESPONSE);
  });

  it("descends through nested objects to reach the results array and item fields", () => {
    const document = { data: { children: [{ data: { title: "X" } }] } };

    const children = extract(document, "data.children");
    expect(children).toEqual([{ data: { title: "X" } }]);
    if (!Array.isArray(children)) {
      throw new Error("expected an array");
    }
    expect(extract(children[0], "data.title")).toBe("X");
  });

  it("returns ABSENT when an intermediate key is missing", () => {
    const result = extract(NESTED_RESPONSE, "data.missing.title");

    expect(result).toBe(ABSENT);
    expect(isAbsent(result)).toBe(true);
  });

  it("keeps an extracted empty string distinct from ABSENT", () => {
    const result = extract({ title: "" }, "title");

    expect(result).toBe("");
    expect(isAbsent(result)).toBe(false);
  });

  it("does not index into arrays by position", () => {
    expect(extract({ items: [{ title: "first" }] }, "items.0.title")).toBe(ABSENT);
  });

  it("treats null values and non-object intermediates as ABSENT", () => {
    expect(extract({ title: null }, "title")).toBe(ABSENT);
    expect(extract({ meta: null }, "meta.title")).toBe(ABSENT);
    expect(extract({ meta: "text" }, "meta.title")).toBe(ABSENT);
    expect(extract(null, "")).toBe(ABSENT);
  });

  it("only follows own keys", () => {
    expect(extract({}, "constructor")).toBe(ABSENT);
  });
});

describe("splitPath", () => {
  it("splits on dots and ignores surrounding whitespace", () => {
    expect(splitPath(" data.children ")).toEqual(["data", "children"]);
    expect(splitPath("   ")).toEqual([]);
  });
});

describe("toText", () => {
  it("converts scalars and blanks everything else", () => {
    expect(toText("  padded  ")).toBe("padded");
    expect(toText(42)).toBe("42");
    expect(toText(false)).toBe("false");
    expect(toText(ABSENT)).toBe("");
    expect(toText(["a"])).toBe("");
    expect(toText({ nested: "value" })).toBe("");
  });
});
