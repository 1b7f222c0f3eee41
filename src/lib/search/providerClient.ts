import { extract, isJsonObject, toText } from "@/lib/search/pathExtractor";
import { buildRequestUrl, validateProviderSpec } from "@/lib/search/providerSpec";
import { ProviderError } from "@/lib/utils/errors";
import { logger } from "@/lib/utils/logger";
import { NonRetryableError, retryWithBackoff } from "@/lib/utils/retry";
import type { JsonValue, ProviderSpec, ResultItem, SearchTimeframe } from "@/types/search";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ProviderFetchOptions {
  timeoutMs: number;
  /**
   * Caller-level cancellation, e.g. when a newer query supersedes this one.
   */
  signal?: AbortSignal;
  timeframe?: SearchTimeframe;
  fetchImpl?: FetchLike;
  userAgent?: string;
  retry?: {
    maxAttempts?: number;
    initialDelayMs?: number;
  };
}

interface ProviderFetchSuccess {
  status: "success";
  items: ResultItem[];
  raw: JsonValue;
  durationMs: number;
}

interface ProviderFetchFailure {
  status: "failure";
  error: ProviderError;
  durationMs: number;
}

export type ProviderOutcome = ProviderFetchSuccess | ProviderFetchFailure;

interface ProviderJsonSuccess {
  status: "success";
  raw: JsonValue;
  durationMs: number;
}

export type ProviderJsonOutcome = ProviderJsonSuccess | ProviderFetchFailure;

const DEFAULT_USER_AGENT = "research-lens/1.0";
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

function readItems(spec: ProviderSpec, document: JsonValue): ResultItem[] {
  const list = extract(document, spec.resultsPath);
  if (!Array.isArray(list)) {
    throw new ProviderError(
      "invalid_shape",
      spec.name,
      spec.resultsPath.length === 0
        ? "Response root is not an array"
        : `Results path "${spec.resultsPath}" did not resolve to an array`
    );
  }

  const items: ResultItem[] = [];
  for (const entry of list) {
    if (!isJsonObject(entry)) {
      continue;
    }
    const item: ResultItem = {
      source: spec.name,
      title: toText(extract(entry, spec.titlePath)),
      url: toText(extract(entry, spec.urlPath)),
      content: toText(extract(entry, spec.contentPath))
    };
    if (item.url.length > 0 || item.title.length > 0) {
      items.push(item);
    }
  }
  return items;
}

function parseBody(spec: ProviderSpec, body: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(body);
    return parsed;
  } catch (error) {
    throw new ProviderError("invalid_json", spec.name, "Response was not valid JSON", {
      cause: error
    });
  }
}

/**
 * Settles with the first of `promise` or the abort of `signal`, so a request whose
 * transport ignores the signal is still abandoned on time.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function classify(spec: ProviderSpec, error: unknown, timeoutMs: number, signal: AbortSignal, callerSignal?: AbortSignal): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof NonRetryableError && error.cause instanceof ProviderError) {
    return error.cause;
  }
  if (callerSignal?.aborted) {
    return new ProviderError("cancelled", spec.name, "Search was cancelled before the provider responded", {
      cause: error
    });
  }
  if (signal.aborted) {
    return new ProviderError("timeout", spec.name, `Timed out after ${timeoutMs}ms`, { cause: error });
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new ProviderError("network", spec.name, `Network error: ${detail}`, { cause: error });
}

/**
 * Requests the spec's endpoint and parses the body, without reading items from it.
 */
export async function fetchProviderJson(
  spec: ProviderSpec,
  query: string,
  options: ProviderFetchOptions
): Promise<ProviderJsonOutcome> {
  const started = Date.now();
  const elapsed = () => Math.max(0, Date.now() - started);

  const problems = validateProviderSpec(spec);
  if (problems.length > 0) {
    return {
      status: "failure",
      error: new ProviderError("invalid_config", spec.name, `Invalid provider configuration: ${problems.join("; ")}`),
      durationMs: elapsed()
    };
  }

  const { timeoutMs, signal: callerSignal, retry } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = buildRequestUrl(spec, query, options.timeframe);
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new ProviderError("timeout", spec.name, `Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onCallerAbort = () => {
    controller.abort(
      new ProviderError("cancelled", spec.name, "Search was cancelled before the provider responded")
    );
  };
  if (callerSignal?.aborted) {
    onCallerAbort();
  } else {
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
  }

  const headers: Record<string, string> = {
    Accept: "application/json",
    "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
    ...spec.headers
  };

  try {
    const document = await raceAbort(
      retryWithBackoff(
        async () => {
          const response = await fetchImpl(url, {
            method: "GET",
            headers,
            signal: controller.signal
          });

          if (!response.ok) {
            const statusError = new ProviderError("http_status", spec.name, `HTTP ${response.status}`, {
              status: response.status
            });
            if (!RETRYABLE_STATUS_CODES.has(response.status)) {
              throw new NonRetryableError(statusError.message, { cause: statusError });
            }
            throw statusError;
          }

          const body = await response.text();
          try {
            return parseBody(spec, body);
          } catch (error) {
            throw new NonRetryableError("Response was not valid JSON", { cause: error });
          }
        },
        {
          maxAttempts: retry?.maxAttempts ?? 1,
          initialDelayMs: retry?.initialDelayMs ?? 250,
          signal: controller.signal,
          shouldRetry: (error) => {
            if (error instanceof NonRetryableError) {
              return false;
            }
            return !(error instanceof ProviderError) || error.kind === "http_status";
          },
          onRetry: (error, context) => {
            logger.warn("search.provider.retry", {
              provider: spec.name,
              attempt: context.attempt,
              maxAttempts: context.maxAttempts,
              delayMs: context.delayMs,
              error: error instanceof Error ? error.message : String(error)
            });
          }
        }
      ),
      controller.signal
    );

    return {
      status: "success",
      raw: document,
      durationMs: elapsed()
    };
  } catch (error) {
    return {
      status: "failure",
      error: classify(spec, error, timeoutMs, controller.signal, callerSignal),
      durationMs: elapsed()
    };
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener("abort", onCallerAbort);
  }
}

export async function fetchProvider(
  spec: ProviderSpec,
  query: string,
  options: ProviderFetchOptions
): Promise<ProviderOutcome> {
  const outcome = await fetchProviderJson(spec, query, options);
  if (outcome.status === "failure") {
    return outcome;
  }

  try {
    return {
      status: "success",
      items: readItems(spec, outcome.raw),
      raw: outcome.raw,
      durationMs: outcome.durationMs
    };
  } catch (error) {
    if (error instanceof ProviderError) {
      return { status: "failure", error, durationMs: outcome.durationMs };
    }
    throw error;
  }
}
