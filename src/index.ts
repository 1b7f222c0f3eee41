export { ABSENT, extract, isAbsent, toText, type Absent } from "@/lib/search/pathExtractor";
export {
  buildRequestUrl,
  parseProviderSpec,
  providerSpecSchema,
  validateProviderSpec,
  QUERY_MARKER,
  type ProviderSpecInput
} from "@/lib/search/providerSpec";
export {
  fetchProvider,
  fetchProviderJson,
  type FetchLike,
  type ProviderJsonOutcome,
  type ProviderOutcome
} from "@/lib/search/providerClient";
export { aggregateSearch, mergeResults, normalizeUrl, type AggregateOutcome } from "@/lib/search/aggregator";
export { describeFirstItem, summarizeProviderShapes } from "@/lib/search/introspect";
export { buildSummaryPrompt, formatCitations, NO_RESULTS_MESSAGE } from "@/lib/search/citations";
export { buildPresetProviders, isPresetName, PRESET_NAMES } from "@/lib/search/presets";
export {
  DEFAULT_SUGGESTION_SOURCES,
  rankSuggestions,
  suggest,
  type SuggestionSource,
  type SuggestOptions
} from "@/lib/search/suggest";
export {
  createSearchService,
  getSearchService,
  setSearchService,
  type SearchRequestOptions,
  type SearchService,
  type SuggestRequestOptions
} from "@/server/search/service";
export { getHistorySink, setHistorySink, type HistorySink } from "@/server/repositories/historyRepository";
export {
  getProviderRepository,
  setProviderRepository,
  type ProviderFilter,
  type ProviderRepository,
  type ProviderSource
} from "@/server/repositories/providerRepository";
export * from "@/lib/utils/errors";
export type * from "@/types/search";
