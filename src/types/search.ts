import type { Timestamp } from "firebase-admin/firestore";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type SearchTimeframe = "day" | "week" | "month";

export interface ProviderSpec {
  name: string;
  /**
   * Endpoint with a single `{query}` marker, e.g. `https://api.example.com/search?q={query}`.
   */
  urlTemplate: string;
  headers: Record<string, string>;
  /**
   * Dot path to the results array. Empty when the response body is the array itself.
   */
  resultsPath: string;
  titlePath: string;
  urlPath: string;
  contentPath: string;
  enabled: boolean;
  /**
   * Query-string parameter that carries the requested timeframe, when the provider supports one.
   */
  timeframeParam?: string;
}

export interface ResultItem {
  source: string;
  title: string;
  url: string;
  content: string;
}

export type ProviderErrorKind =
  | "timeout"
  | "network"
  | "http_status"
  | "invalid_json"
  | "invalid_shape"
  | "invalid_config"
  | "cancelled";

export interface ProviderDiagnostic {
  name: string;
  status: "success" | "failure";
  itemCount: number;
  durationMs: number;
  errorKind?: ProviderErrorKind;
}

export interface ResultSet {
  query: string;
  results: ResultItem[];
  failures: Record<string, string>;
  providers: ProviderDiagnostic[];
}

export interface StoredProviderSpec extends ProviderSpec {
  id: string;
  position: number;
  createdAt: Timestamp;
  updatedAt: Timestamp;
}

export interface SearchHistoryRecord {
  id: string;
  query: string;
  results: ResultItem[];
  failures: Record<string, string>;
  providers: ProviderDiagnostic[];
  createdAt: Timestamp;
}

export function emptyResultSet(query: string): ResultSet {
  return {
    query,
    results: [],
    failures: {},
    providers: []
  };
}
