import { fetchProvider, type FetchLike, type ProviderOutcome } from "@/lib/search/providerClient";
import { describeProviderError, ProviderConfigError } from "@/lib/utils/errors";
import { logger } from "@/lib/utils/logger";
import {
  emptyResultSet,
  type JsonValue,
  type ProviderDiagnostic,
  type ProviderSpec,
  type ResultItem,
  type ResultSet,
  type SearchTimeframe
} from "@/types/search";

export interface AggregateSearchOptions {
  perProviderTimeoutMs: number;
  signal?: AbortSignal;
  timeframe?: SearchTimeframe;
  /**
   * Cap applied to the merged list after deduplication.
   */
  maxResults?: number;
  fetchImpl?: FetchLike;
  userAgent?: string;
  retry?: {
    maxAttempts?: number;
    initialDelayMs?: number;
  };
}

export interface AggregateOutcome {
  resultSet: ResultSet;
  /**
   * Raw bodies of the providers that succeeded, keyed by provider name. Kept only
   * for introspection by the caller.
   */
  raw: Map<string, JsonValue>;
}

export function normalizeUrl(url: string): string {
  return url.trim().toLowerCase().replace(/\/+$/, "");
}

function assertSnapshotKeyable(specs: ProviderSpec[]): void {
  const problems: string[] = [];
  const seen = new Set<string>();

  specs.forEach((spec, index) => {
    if (spec.name.trim().length === 0) {
      problems.push(`Provider at position ${index} has an empty name`);
      return;
    }
    if (seen.has(spec.name)) {
      problems.push(`Provider name "${spec.name}" is used more than once`);
    }
    seen.add(spec.name);
  });

  if (problems.length > 0) {
    throw new ProviderConfigError(`Provider configuration is invalid: ${problems.join("; ")}`, problems);
  }
}

/**
 * Concatenates items in the given order and drops later items whose URL was already seen.
 */
export function mergeResults(lists: ResultItem[][], maxResults?: number): ResultItem[] {
  const seen = new Set<string>();
  const merged: ResultItem[] = [];

  for (const items of lists) {
    for (const item of items) {
      const key = normalizeUrl(item.url);
      if (key.length > 0) {
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
      }
      merged.push(item);
    }
  }

  return maxResults !== undefined ? merged.slice(0, Math.max(0, maxResults)) : merged;
}

export async function aggregateSearch(
  query: string,
  specs: ProviderSpec[],
  options: AggregateSearchOptions
): Promise<AggregateOutcome> {
  const enabled = specs.filter((spec) => spec.enabled);
  if (enabled.length === 0) {
    return { resultSet: emptyResultSet(query), raw: new Map() };
  }

  assertSnapshotKeyable(enabled);

  const outcomes: ProviderOutcome[] = await Promise.all(
    enabled.map((spec) =>
      fetchProvider(spec, query, {
        timeoutMs: options.perProviderTimeoutMs,
        signal: options.signal,
        timeframe: options.timeframe,
        fetchImpl: options.fetchImpl,
        userAgent: options.userAgent,
        retry: options.retry
      })
    )
  );

  const lists: ResultItem[][] = [];
  const failures: Record<string, string> = {};
  const providers: ProviderDiagnostic[] = [];
  const raw = new Map<string, JsonValue>();

  outcomes.forEach((outcome, index) => {
    const spec = enabled[index];
    if (outcome.status === "success") {
      lists.push(outcome.items);
      raw.set(spec.name, outcome.raw);
      providers.push({
        name: spec.name,
        status: "success",
        itemCount: outcome.items.length,
        durationMs: outcome.durationMs
      });
      return;
    }

    failures[spec.name] = describeProviderError(outcome.error);
    providers.push({
      name: spec.name,
      status: "failure",
      itemCount: 0,
      durationMs: outcome.durationMs,
      errorKind: outcome.error.kind
    });
    logger.warn("search.provider.failed", {
      provider: spec.name,
      kind: outcome.error.kind,
      status: outcome.error.status,
      error: outcome.error.message,
      durationMs: outcome.durationMs
    });
  });

  const results = mergeResults(lists, options.maxResults);

  logger.info("search.aggregate.completed", {
    providers: enabled.length,
    succeeded: raw.size,
    failed: enabled.length - raw.size,
    results: results.length
  });

  return {
    resultSet: {
      query,
      results,
      failures,
      providers
    },
    raw
  };
}
