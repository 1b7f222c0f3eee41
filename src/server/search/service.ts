import { getServerEnv } from "@/config/env";
import { aggregateSearch } from "@/lib/search/aggregator";
import { formatShapeLine, summarizeProviderShapes } from "@/lib/search/introspect";
import { buildPresetProviders } from "@/lib/search/presets";
import type { FetchLike } from "@/lib/search/providerClient";
import { suggest, type SuggestionSource } from "@/lib/search/suggest";
import { errorMessage, logger } from "@/lib/utils/logger";
import { getHistorySink, type HistorySink } from "@/server/repositories/historyRepository";
import { getProviderSource, type ProviderSource } from "@/server/repositories/providerRepository";
import {
  emptyResultSet,
  type ProviderDiagnostic,
  type ProviderSpec,
  type ResultSet,
  type SearchTimeframe
} from "@/types/search";

export interface SearchRequestOptions {
  timeframe?: SearchTimeframe;
  signal?: AbortSignal;
  /**
   * Stored providers to search, by id. Presets are always searched; omit to use every stored provider.
   */
  providerIds?: string[];
}

export interface SuggestRequestOptions {
  signal?: AbortSignal;
}

export interface SearchService {
  search(query: string, options?: SearchRequestOptions): Promise<ResultSet>;
  suggest(query: string, options?: SuggestRequestOptions): Promise<string[]>;
}

export interface SearchServiceDependencies {
  providerSource: ProviderSource;
  historySink?: HistorySink;
  /**
   * Providers searched ahead of the stored ones. Defaults to the configured presets.
   */
  presets?: ProviderSpec[];
  fetchImpl?: FetchLike;
  suggestionSources?: SuggestionSource[];
  now?: () => Date;
}

function snapshotSpec(spec: ProviderSpec): ProviderSpec {
  return { ...spec, headers: { ...spec.headers } };
}

/**
 * Keeps the first enabled spec for each name. Later specs reusing a name, and specs
 * without one, are left out of the search and reported as configuration failures.
 */
function excludeUnkeyable(specs: ProviderSpec[]): {
  dispatched: ProviderSpec[];
  skipped: ProviderDiagnostic[];
} {
  const dispatched: ProviderSpec[] = [];
  const skipped: ProviderDiagnostic[] = [];
  const seen = new Set<string>();

  for (const spec of specs) {
    if (!spec.enabled) {
      dispatched.push(spec);
      continue;
    }

    const reason =
      spec.name.trim().length === 0
        ? "empty_name"
        : seen.has(spec.name)
          ? "duplicate_name"
          : null;
    if (reason) {
      logger.warn("search.provider.skipped", { provider: spec.name, reason });
      skipped.push({
        name: spec.name,
        status: "failure",
        itemCount: 0,
        durationMs: 0,
        errorKind: "invalid_config"
      });
      continue;
    }

    seen.add(spec.name);
    dispatched.push(spec);
  }

  return { dispatched, skipped };
}

async function recordHistory(
  sink: HistorySink,
  query: string,
  resultSet: ResultSet,
  timestamp: Date
): Promise<void> {
  try {
    await sink.record(query, resultSet, timestamp);
  } catch (error) {
    logger.error("search.history.record_failed", {
      query,
      error: errorMessage(error)
    });
  }
}

export function createSearchService({
  providerSource,
  historySink,
  presets,
  fetchImpl,
  suggestionSources,
  now = () => new Date()
}: SearchServiceDependencies): SearchService {
  return {
    async search(query, options = {}) {
      const trimmed = query.trim();
      if (trimmed.length === 0) {
        return emptyResultSet(query);
      }

      const env = getServerEnv();
      const stored = await providerSource.list({ ids: options.providerIds });
      const snapshot = [...(presets ?? buildPresetProviders(env)), ...stored].map(snapshotSpec);
      const { dispatched: specs, skipped } = excludeUnkeyable(snapshot);

      logger.info("search.query.start", {
        query: trimmed,
        providers: specs.filter((spec) => spec.enabled).map((spec) => spec.name),
        timeframe: options.timeframe
      });

      const aggregate = await aggregateSearch(trimmed, specs, {
        perProviderTimeoutMs: env.SEARCH_PROVIDER_TIMEOUT_MS,
        maxResults: env.SEARCH_MAX_RESULTS,
        userAgent: env.SEARCH_USER_AGENT,
        retry: { maxAttempts: env.SEARCH_RETRY_ATTEMPTS },
        timeframe: options.timeframe,
        signal: options.signal,
        fetchImpl
      });
      const { raw } = aggregate;
      const resultSet: ResultSet = {
        ...aggregate.resultSet,
        providers: [...aggregate.resultSet.providers, ...skipped]
      };

      const shapes = summarizeProviderShapes(specs, raw, resultSet);
      logger.info("search.debug.first_item_keys", {
        query: trimmed,
        line: formatShapeLine(trimmed, shapes),
        providers: shapes
      });

      if (historySink) {
        await recordHistory(historySink, trimmed, resultSet, now());
      }

      return resultSet;
    },

    async suggest(query, options = {}) {
      const env = getServerEnv();
      return suggest(query, {
        timeoutMs: env.SEARCH_PROVIDER_TIMEOUT_MS,
        userAgent: env.SEARCH_USER_AGENT,
        signal: options.signal,
        sources: suggestionSources,
        fetchImpl
      });
    }
  };
}

let searchServiceOverride: SearchService | null = null;
let cachedSearchService: SearchService | null = null;

export function setSearchService(instance: SearchService | null) {
  searchServiceOverride = instance;
}

export function getSearchService(): SearchService {
  if (searchServiceOverride) {
    return searchServiceOverride;
  }

  if (!cachedSearchService) {
    cachedSearchService = createSearchService({
      providerSource: getProviderSource(),
      historySink: getHistorySink()
    });
  }

  return cachedSearchService;
}
