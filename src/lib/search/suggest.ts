import { extract, isJsonObject, toText } from "@/lib/search/pathExtractor";
import { fetchProviderJson, type FetchLike } from "@/lib/search/providerClient";
import { logger } from "@/lib/utils/logger";
import type { JsonValue, ProviderSpec } from "@/types/search";

export interface SuggestionSource {
  name: string;
  /**
   * Endpoint with a single `{query}` marker.
   */
  urlTemplate: string;
  read(document: JsonValue): string[];
}

export interface SuggestOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  userAgent?: string;
  /**
   * Number of suggestions returned. Defaults to 10.
   */
  limit?: number;
  sources?: SuggestionSource[];
}

const DEFAULT_LIMIT = 10;

// OpenSearch suggestion format: [query, [term, ...], ...]
function openSearchTerms(document: JsonValue): string[] {
  if (!Array.isArray(document)) {
    return [];
  }
  const terms = document[1];
  if (!Array.isArray(terms)) {
    return [];
  }
  return terms.filter((term): term is string => typeof term === "string");
}

function qwantTerms(document: JsonValue): string[] {
  const items = extract(document, "data.items");
  if (!Array.isArray(items)) {
    return [];
  }
  return items.map((item) => (isJsonObject(item) ? toText(extract(item, "value")) : ""));
}

export const DEFAULT_SUGGESTION_SOURCES: SuggestionSource[] = [
  {
    name: "duckduckgo",
    urlTemplate: "https://duckduckgo.com/ac/?type=list&q={query}",
    read: openSearchTerms
  },
  {
    name: "brave",
    urlTemplate: "https://search.brave.com/api/suggest?q={query}",
    read: openSearchTerms
  },
  {
    name: "qwant",
    urlTemplate: "https://api.qwant.com/v3/suggest?q={query}&locale=en_US&version=2",
    read: qwantTerms
  },
  {
    name: "wikipedia",
    urlTemplate:
      "https://en.wikipedia.org/w/api.php?action=opensearch&format=json&formatversion=2&namespace=0&limit=10&search={query}",
    read: openSearchTerms
  }
];

function toProviderSpec(source: SuggestionSource): ProviderSpec {
  return {
    name: source.name,
    urlTemplate: source.urlTemplate,
    headers: {},
    resultsPath: "",
    titlePath: "",
    urlPath: "",
    contentPath: "",
    enabled: true
  };
}

/**
 * Orders terms by how many sources returned them. Ties keep the order in which the
 * terms were first seen, walking the sources in declaration order.
 */
export function rankSuggestions(lists: string[][], limit = DEFAULT_LIMIT): string[] {
  const counts = new Map<string, number>();

  for (const list of lists) {
    const terms = new Set(list.map((term) => term.trim()).filter((term) => term.length > 0));
    for (const term of terms) {
      counts.set(term, (counts.get(term) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, limit))
    .map(([term]) => term);
}

export async function suggest(query: string, options: SuggestOptions): Promise<string[]> {
  const trimmed = query.trim();
  if (trimmed.length === 0) {
    return [];
  }

  const sources = options.sources ?? DEFAULT_SUGGESTION_SOURCES;
  const lists = await Promise.all(
    sources.map(async (source) => {
      const outcome = await fetchProviderJson(toProviderSpec(source), trimmed, {
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        fetchImpl: options.fetchImpl,
        userAgent: options.userAgent
      });

      if (outcome.status === "failure") {
        logger.warn("search.suggest.failed", {
          source: source.name,
          kind: outcome.error.kind,
          error: outcome.error.message,
          durationMs: outcome.durationMs
        });
        return [];
      }

      return source.read(outcome.raw);
    })
  );

  const suggestions = rankSuggestions(lists, options.limit);
  logger.debug("search.suggest.completed", {
    query: trimmed,
    sources: sources.length,
    suggestions: suggestions.length
  });
  return suggestions;
}
