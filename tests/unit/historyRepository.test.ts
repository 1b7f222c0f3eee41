import { describe, expect, it, beforeEach } from "vitest";
import { FirestoreHistoryRepository } from "@/server/repositories/historyRepository";
import type { ResultSet, SearchHistoryRecord } from "@/types/search";
import type { CollectionReference } from "firebase-admin/firestore";

class FakeHistoryDocRef {
  constructor(
    private readonly store: Map<string, SearchHistoryRecord>,
    public readonly id: string
  ) {}

  async set(data: SearchHistoryRecord) {
    this.store.set(this.id, data);
  }
}

class FakeHistoryCollection {
  readonly store = new Map<string, SearchHistoryRecord>();
  private counter = 0;

  doc(id?: string) {
    this.counter += 1;
    return new FakeHistoryDocRef(this.store, id ?? `search-${this.counter}`);
  }
}

const RESULT_SET: ResultSet = {
  query: "tidal energy",
  results: [
    { source: "searxng", title: "Tidal power", url: "https://example.com/tidal", content: "overview" }
  ],
  failures: { reddit: "Timed out after 12000ms" },
  providers: [
    { name: "searxng", status: "success", itemCount: 1, durationMs: 120 },
    { name: "reddit", status: "failure", itemCount: 0, durationMs: 12000, errorKind: "timeout" }
  ]
};

describe("FirestoreHistoryRepository", () => {
  let collection: FakeHistoryCollection;
  let repository: FirestoreHistoryRepository;

  beforeEach(() => {
    collection = new FakeHistoryCollection();
    repository = new FirestoreHistoryRepository({
      collection: collection as unknown as CollectionReference<SearchHistoryRecord>
    });
  });

  it("stores the query, results, failures, and provider diagnostics", async () => {
    await repository.record("tidal energy", RESULT_SET, new Date("2025-03-01T10:00:00.000Z"));

    const stored = collection.store.get("search-1");
    expect(stored?.id).toBe("search-1");
    expect(stored?.query).toBe("tidal energy");
    expect(stored?.results).toEqual(RESULT_SET.results);
    expect(stored?.failures).toEqual({ reddit: "Timed out after 12000ms" });
    expect(stored?.createdAt.toDate().toISOString()).toBe("2025-03-01T10:00:00.000Z");
  });

  it("omits absent error kinds so the document has no undefined fields", async () => {
    await repository.record("tidal energy", RESULT_SET, new Date("2025-03-01T10:00:00.000Z"));

    const providers = collection.store.get("search-1")?.providers ?? [];
    expect(providers[0]).not.toHaveProperty("errorKind");
    expect(providers[1]).toEqual({
      name: "reddit",
      status: "failure",
      itemCount: 0,
      durationMs: 12000,
      errorKind: "timeout"
    });
  });

  it("copies the results instead of keeping a reference to the caller's set", async () => {
    const resultSet: ResultSet = { ...RESULT_SET, results: [...RESULT_SET.results] };

    await repository.record("tidal energy", resultSet, new Date());
    resultSet.results.push({ source: "late", title: "Late", url: "https://example.com/late", content: "" });

    expect(collection.store.get("search-1")?.results).toHaveLength(1);
  });
});
