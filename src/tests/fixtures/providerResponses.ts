import type { JsonValue, ProviderSpec } from "@/types/search";

export const FAKE_API_BASE = "https://api.example.test";

export function makeSpec(overrides: Partial<ProviderSpec> = {}): ProviderSpec {
  return {
    name: "example",
    urlTemplate: `${FAKE_API_BASE}/search?q={query}`,
    headers: {},
    resultsPath: "results",
    titlePath: "title",
    urlPath: "url",
    contentPath: "content",
    enabled: true,
    ...overrides
  };
}

export const NESTED_RESPONSE: JsonValue = {
  data: {
    children: [
      { data: { title: "X", url: "https://example.com/x", selftext: "first post" } },
      { data: { title: "Y", url: "https://example.com/y", selftext: "" } }
    ]
  }
};

export const ROOT_ARRAY_RESPONSE: JsonValue = [
  {
    score: 0.9,
    show: {
      name: "Lighthouse Keepers",
      url: "https://shows.example.com/lighthouse-keepers",
      summary: "A drama about a remote station."
    }
  },
  {
    score: 0.4,
    show: {
      name: "Harbor Lights",
      url: "https://shows.example.com/harbor-lights",
      summary: null
    }
  }
];

export const FLAT_RESPONSE: JsonValue = {
  results: [
    { title: "Alpha", url: "https://example.com/alpha", content: "alpha snippet" },
    { title: "Beta", url: "https://example.com/beta/", content: "beta snippet" }
  ]
};
