import { describe, expect, it } from "vitest";

import {
  buildRequestUrl,
  countMarkers,
  parseProviderSpec,
  validateProviderSpec
} from "@/lib/search/providerSpec";
import { makeSpec } from "@/tests/fixtures/providerResponses";

describe("validateProviderSpec", () => {
  it("accepts a well-formed spec", () => {
    expect(validateProviderSpec(makeSpec())).toEqual([]);
  });

  it("rejects templates without exactly one query marker", () => {
    expect(validateProviderSpec(makeSpec({ urlTemplate: "https://api.example.test/search" }))).toEqual([
      "urlTemplate must contain {query} exactly once (found 0)"
    ]);
    expect(
      validateProviderSpec(makeSpec({ urlTemplate: "https://api.example.test/{query}?q={query}" }))
    ).toEqual(["urlTemplate must contain {query} exactly once (found 2)"]);
  });

  it("rejects relative and non-http templates", () => {
    expect(validateProviderSpec(makeSpec({ urlTemplate: "/search?q={query}" }))).toEqual([
      "urlTemplate is not a valid absolute URL: /search?q={query}"
    ]);
    expect(validateProviderSpec(makeSpec({ urlTemplate: "ftp://files.example.test/{query}" }))).toEqual([
      "urlTemplate must use http or https (got ftp:)"
    ]);
  });

  it("reports an empty name", () => {
    expect(validateProviderSpec(makeSpec({ name: "  " }))).toEqual(["Provider name is required"]);
  });
});

describe("buildRequestUrl", () => {
  it("url-encodes the query into the marker", () => {
    expect(buildRequestUrl(makeSpec(), "tea & cake?")).toBe(
      "https://api.example.test/search?q=tea%20%26%20cake%3F"
    );
  });

  it("does not expand replacement patterns in the query", () => {
    expect(buildRequestUrl(makeSpec(), "$&")).toBe("https://api.example.test/search?q=%24%26");
  });

  it("appends the timeframe parameter only when the spec supports one", () => {
    const spec = makeSpec({ timeframeParam: "time_range" });

    expect(buildRequestUrl(spec, "ai", "week")).toBe(
      "https://api.example.test/search?q=ai&time_range=week"
    );
    expect(buildRequestUrl(makeSpec(), "ai", "week")).toBe("https://api.example.test/search?q=ai");
  });

  it("starts a query string when the template has none", () => {
    const spec = makeSpec({ urlTemplate: "https://api.example.test/search/{query}", timeframeParam: "range" });

    expect(buildRequestUrl(spec, "ai", "day")).toBe("https://api.example.test/search/ai?range=day");
  });
});

describe("parseProviderSpec", () => {
  it("applies defaults for optional fields", () => {
    const spec = parseProviderSpec({
      name: " tvmaze ",
      urlTemplate: "https://api.example.test/search/shows?q={query}",
      titlePath: "show.name",
      urlPath: "show.url"
    });

    expect(spec).toEqual({
      name: "tvmaze",
      urlTemplate: "https://api.example.test/search/shows?q={query}",
      headers: {},
      resultsPath: "",
      titlePath: "show.name",
      urlPath: "show.url",
      contentPath: "",
      enabled: true
    });
  });

  it("rejects empty path segments", () => {
    expect(() =>
      parseProviderSpec({
        name: "broken",
        urlTemplate: "https://api.example.test/?q={query}",
        titlePath: "show..name",
        urlPath: "url"
      })
    ).toThrow("Path segments must not be empty");
  });
});

describe("countMarkers", () => {
  it("counts every occurrence", () => {
    expect(countMarkers("{query}-{query}-{query}")).toBe(3);
  });
});
