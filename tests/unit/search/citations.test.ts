import { describe, expect, it } from "vitest";

import { buildSummaryPrompt, formatCitations } from "@/lib/search/citations";
import { emptyResultSet, type ResultSet } from "@/types/search";

const RESULT_SET: ResultSet = {
  query: "heat pumps",
  results: [
    {
      source: "searxng",
      title: "Heat pump basics",
      url: "https://example.com/heat-pumps",
      content: "How they move heat."
    },
    { source: "reddit", title: "", url: "https://example.com/thread", content: "" }
  ],
  failures: {},
  providers: []
};

describe("formatCitations", () => {
  it("numbers each result and omits empty fields", () => {
    expect(formatCitations(RESULT_SET)).toBe(
      [
        "[1] Heat pump basics\nSource: searxng\nURL: https://example.com/heat-pumps\nSnippet: How they move heat.",
        "[2] (untitled)\nSource: reddit\nURL: https://example.com/thread"
      ].join("\n\n---\n\n")
    );
  });
});

describe("buildSummaryPrompt", () => {
  it("embeds the query and the numbered results", () => {
    const prompt = buildSummaryPrompt("  heat pumps ", RESULT_SET);

    expect(prompt?.split("\n").slice(0, 4)).toEqual([
      'Based on the following search results, write a clear, concise summary answering my latest prompt: "heat pumps".',
      "Cite the results you rely on by their number, e.g. [1].",
      "",
      "Search Results:"
    ]);
    expect(prompt?.endsWith(formatCitations(RESULT_SET))).toBe(true);
  });

  it("returns null when there is nothing to summarize", () => {
    expect(buildSummaryPrompt("q", emptyResultSet("q"))).toBeNull();
  });
});
