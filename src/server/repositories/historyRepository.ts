import { adminDb } from "@/lib/firebase/admin";
import { hasFirebaseCredentials } from "@/config/env";
import { logger } from "@/lib/utils/logger";
import type { ProviderDiagnostic, ResultSet, SearchHistoryRecord } from "@/types/search";
import {
  Timestamp,
  type CollectionReference,
  type FirestoreDataConverter,
  type QueryDocumentSnapshot
} from "firebase-admin/firestore";

/**
 * Receives every completed search. Implementations may be slow or fail; callers
 * must not let either affect the search itself.
 */
export interface HistorySink {
  record(query: string, resultSet: ResultSet, timestamp: Date): Promise<void>;
}

const historyConverter: FirestoreDataConverter<SearchHistoryRecord> = {
  toFirestore(record: SearchHistoryRecord) {
    return record;
  },
  fromFirestore(snapshot: QueryDocumentSnapshot<SearchHistoryRecord>) {
    const data = snapshot.data();
    return {
      ...data,
      id: data.id ?? snapshot.id
    };
  }
};

function toStoredDiagnostic(diagnostic: ProviderDiagnostic): ProviderDiagnostic {
  return {
    name: diagnostic.name,
    status: diagnostic.status,
    itemCount: diagnostic.itemCount,
    durationMs: diagnostic.durationMs,
    ...(diagnostic.errorKind ? { errorKind: diagnostic.errorKind } : {})
  };
}

export class FirestoreHistoryRepository implements HistorySink {
  private readonly collection: CollectionReference<SearchHistoryRecord>;

  constructor(options?: { collection?: CollectionReference<SearchHistoryRecord> }) {
    this.collection =
      options?.collection ??
      adminDb().collection("searches").withConverter(historyConverter);
  }

  async record(query: string, resultSet: ResultSet, timestamp: Date): Promise<void> {
    const docRef = this.collection.doc();
    const record: SearchHistoryRecord = {
      id: docRef.id,
      query,
      results: resultSet.results.map((item) => ({ ...item })),
      failures: { ...resultSet.failures },
      providers: resultSet.providers.map(toStoredDiagnostic),
      createdAt: Timestamp.fromDate(timestamp)
    };

    await docRef.set(record);
  }
}

export class NoopHistorySink implements HistorySink {
  async record(query: string, resultSet: ResultSet): Promise<void> {
    logger.debug("search.history.skipped", {
      query,
      results: resultSet.results.length
    });
  }
}

let historySinkOverride: HistorySink | null = null;
let cachedHistorySink: HistorySink | null = null;

export function setHistorySink(instance: HistorySink | null) {
  historySinkOverride = instance;
}

export function getHistorySink(): HistorySink {
  if (historySinkOverride) {
    return historySinkOverride;
  }

  if (!cachedHistorySink) {
    cachedHistorySink = hasFirebaseCredentials()
      ? new FirestoreHistoryRepository()
      : new NoopHistorySink();
  }

  return cachedHistorySink;
}
