import { describe, expect, it } from "vitest";

import { describeFirstItem, formatShapeLine, summarizeProviderShapes } from "@/lib/search/introspect";
import { makeSpec, NESTED_RESPONSE, ROOT_ARRAY_RESPONSE } from "@/tests/fixtures/providerResponses";
import type { JsonValue, ResultSet } from "@/types/search";

describe("describeFirstItem", () => {
  it("lists the keys of the first element of a root-array response", () => {
    expect(describeFirstItem(makeSpec({ resultsPath: "" }), ROOT_ARRAY_RESPONSE)).toEqual(["score", "show"]);
  });

  it("follows the results path into nested wrappers", () => {
    expect(describeFirstItem(makeSpec({ resultsPath: "data.children" }), NESTED_RESPONSE)).toEqual(["data"]);
  });

  it("returns no keys when the results path is missing, empty, or not an array", () => {
    expect(describeFirstItem(makeSpec({ resultsPath: "missing" }), NESTED_RESPONSE)).toEqual([]);
    expect(describeFirstItem(makeSpec(), { results: [] })).toEqual([]);
    expect(describeFirstItem(makeSpec(), { results: { title: "not a list" } })).toEqual([]);
  });

  it("returns no keys when the first element is not an object", () => {
    expect(describeFirstItem(makeSpec(), { results: ["plain", { title: "later" }] })).toEqual([]);
  });

  it("does not modify the response", () => {
    const response: JsonValue = { results: [{ b: 1, a: 2 }] };
    const before = JSON.stringify(response);

    describeFirstItem(makeSpec(), response);

    expect(JSON.stringify(response)).toBe(before);
  });
});

describe("summarizeProviderShapes", () => {
  it("flags providers that dropped items during extraction", () => {
    const tvmaze = makeSpec({ name: "tvmaze", resultsPath: "", titlePath: "name", urlPath: "link" });
    const reddit = makeSpec({ name: "reddit", resultsPath: "data.children" });
    const resultSet: ResultSet = {
      query: "lights",
      results: [],
      failures: { offline: "HTTP 502" },
      providers: [
        { name: "tvmaze", status: "success", itemCount: 0, durationMs: 12 },
        { name: "reddit", status: "success", itemCount: 2, durationMs: 20 },
        { name: "offline", status: "failure", itemCount: 0, durationMs: 5, errorKind: "http_status" }
      ]
    };
    const raw = new Map<string, JsonValue>([
      ["tvmaze", ROOT_ARRAY_RESPONSE],
      ["reddit", NESTED_RESPONSE]
    ]);

    const summaries = summarizeProviderShapes([tvmaze, reddit, makeSpec({ name: "offline" })], raw, resultSet);

    expect(summaries).toEqual([
      { provider: "tvmaze", keys: ["score", "show"], received: 2, extracted: 0, suspect: true },
      { provider: "reddit", keys: ["data"], received: 2, extracted: 2, suspect: false }
    ]);
    expect(formatShapeLine("lights", summaries)).toBe(
      'first-item keys for "lights": tvmaze[0/2]: score,show (check paths) | reddit[2/2]: data'
    );
  });

  it("describes a query with no successful providers", () => {
    expect(formatShapeLine("q", [])).toBe('first-item keys for "q": no successful providers');
  });
});
