import { extract, isJsonObject } from "@/lib/search/pathExtractor";
import type { JsonValue, ProviderSpec, ResultSet } from "@/types/search";

export interface ProviderShapeSummary {
  provider: string;
  keys: string[];
  received: number;
  extracted: number;
  suspect: boolean;
}

/**
 * Keys of the first entry in the provider's results list, to help author item paths.
 */
export function describeFirstItem(spec: ProviderSpec, rawResponse: JsonValue): string[] {
  const list = extract(rawResponse, spec.resultsPath);
  if (!Array.isArray(list) || list.length === 0) {
    return [];
  }

  const first = list[0];
  return isJsonObject(first) ? Object.keys(first) : [];
}

function countEntries(spec: ProviderSpec, rawResponse: JsonValue): number {
  const list = extract(rawResponse, spec.resultsPath);
  return Array.isArray(list) ? list.length : 0;
}

export function summarizeProviderShapes(
  specs: ProviderSpec[],
  raw: ReadonlyMap<string, JsonValue>,
  resultSet: ResultSet
): ProviderShapeSummary[] {
  const summaries: ProviderShapeSummary[] = [];

  for (const spec of specs) {
    const body = raw.get(spec.name);
    if (body === undefined) {
      continue;
    }
    const diagnostic = resultSet.providers.find((entry) => entry.name === spec.name);
    const received = countEntries(spec, body);
    const extracted = diagnostic?.itemCount ?? 0;
    summaries.push({
      provider: spec.name,
      keys: describeFirstItem(spec, body),
      received,
      extracted,
      suspect: extracted < received || received === 0
    });
  }

  return summaries;
}

export function formatShapeLine(query: string, summaries: ProviderShapeSummary[]): string {
  const parts = summaries.map((summary) => {
    const keys = summary.keys.length > 0 ? summary.keys.join(",") : "-";
    const flag = summary.suspect ? " (check paths)" : "";
    return `${summary.provider}[${summary.extracted}/${summary.received}]: ${keys}${flag}`;
  });
  return `first-item keys for "${query}": ${parts.length > 0 ? parts.join(" | ") : "no successful providers"}`;
}
