import type { ServerEnv } from "@/config/env";
import type { ProviderSpec } from "@/types/search";

type PresetEnv = Pick<
  ServerEnv,
  "SEARCH_DISABLED_PRESETS" | "SEARXNG_URL" | "SEARXNG_USERNAME" | "SEARXNG_PASSWORD"
>;

const NATIVE_PRESETS: ProviderSpec[] = [
  {
    name: "wikipedia",
    urlTemplate:
      "https://en.wikipedia.org/w/api.php?action=query&format=json&formatversion=2&generator=search&gsrlimit=10&prop=info%7Cextracts&inprop=url&exintro=1&explaintext=1&exsentences=2&exlimit=max&gsrsearch={query}",
    headers: {},
    resultsPath: "query.pages",
    titlePath: "title",
    urlPath: "fullurl",
    contentPath: "extract",
    enabled: true
  },
  {
    name: "reddit",
    urlTemplate: "https://www.reddit.com/search.json?q={query}&sort=relevance&t=all&limit=10",
    headers: {},
    resultsPath: "data.children",
    titlePath: "data.title",
    urlPath: "data.url",
    contentPath: "data.selftext",
    enabled: true
  },
  {
    name: "stackexchange",
    urlTemplate:
      "https://api.stackexchange.com/2.3/search/advanced?order=desc&sort=relevance&accepted=True&answers=1&site=stackoverflow&q={query}",
    headers: {},
    resultsPath: "items",
    titlePath: "title",
    urlPath: "link",
    contentPath: "",
    enabled: true
  },
  {
    name: "hackernews",
    urlTemplate: "https://hn.algolia.com/api/v1/search?query={query}&hitsPerPage=10",
    headers: {},
    resultsPath: "hits",
    titlePath: "title",
    urlPath: "url",
    contentPath: "story_text",
    enabled: true
  }
];

const SEARXNG_PRESET_NAME = "searxng";

/**
 * Names owned by built-in providers. Stored providers may not reuse them.
 */
export const PRESET_NAMES: readonly string[] = [
  ...NATIVE_PRESETS.map((spec) => spec.name),
  SEARXNG_PRESET_NAME
];

export function isPresetName(name: string): boolean {
  return PRESET_NAMES.includes(name.trim().toLowerCase());
}

function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

export function buildSearxngSpec(env: PresetEnv): ProviderSpec | null {
  if (!env.SEARXNG_URL) {
    return null;
  }

  const headers: Record<string, string> = {};
  if (env.SEARXNG_USERNAME && env.SEARXNG_PASSWORD) {
    headers.Authorization = basicAuthHeader(env.SEARXNG_USERNAME, env.SEARXNG_PASSWORD);
  }

  return {
    name: SEARXNG_PRESET_NAME,
    urlTemplate: `${env.SEARXNG_URL}/search?q={query}&format=json`,
    headers,
    resultsPath: "results",
    titlePath: "title",
    urlPath: "url",
    contentPath: "content",
    enabled: true,
    timeframeParam: "time_range"
  };
}

/**
 * Built-in providers, in declaration order: native JSON endpoints first, then SearXNG.
 */
export function buildPresetProviders(env: PresetEnv): ProviderSpec[] {
  const disabled = new Set(env.SEARCH_DISABLED_PRESETS);
  const presets: ProviderSpec[] = NATIVE_PRESETS.map((spec) => ({
    ...spec,
    headers: { ...spec.headers },
    enabled: !disabled.has(spec.name)
  }));

  const searxng = buildSearxngSpec(env);
  if (searxng) {
    presets.push({ ...searxng, enabled: !disabled.has(searxng.name) });
  }

  return presets;
}
