import { adminDb } from "@/lib/firebase/admin";
import { hasFirebaseCredentials } from "@/config/env";
import { isPresetName } from "@/lib/search/presets";
import { providerSpecSchema, type ProviderSpecInput } from "@/lib/search/providerSpec";
import { DuplicateProviderError, ProviderNotFoundError } from "@/lib/utils/errors";
import type { ProviderSpec, StoredProviderSpec } from "@/types/search";
import {
  Timestamp,
  type CollectionReference,
  type FirestoreDataConverter,
  type QueryDocumentSnapshot
} from "firebase-admin/firestore";

export type UpdateProviderInput = Partial<ProviderSpecInput>;

export interface ProviderFilter {
  /**
   * Restricts the listing to these stored ids. Unknown ids are ignored.
   */
  ids?: readonly string[];
}

/**
 * Source of the ordered provider snapshot read at the start of every search.
 */
export interface ProviderSource {
  list(filter?: ProviderFilter): Promise<ProviderSpec[]>;
}

export interface ProviderRepository extends ProviderSource {
  list(filter?: ProviderFilter): Promise<StoredProviderSpec[]>;
  getById(id: string): Promise<StoredProviderSpec | null>;
  create(input: ProviderSpecInput): Promise<StoredProviderSpec>;
  update(id: string, update: UpdateProviderInput): Promise<StoredProviderSpec>;
  remove(id: string): Promise<void>;
}

const providerConverter: FirestoreDataConverter<StoredProviderSpec> = {
  toFirestore(provider: StoredProviderSpec) {
    return provider;
  },
  fromFirestore(snapshot: QueryDocumentSnapshot<StoredProviderSpec>) {
    const data = snapshot.data();
    return {
      ...data,
      headers: data.headers ?? {},
      id: data.id ?? snapshot.id
    };
  }
};

function withoutUndefined(provider: StoredProviderSpec): StoredProviderSpec {
  const { timeframeParam, ...rest } = provider;
  return timeframeParam ? { ...rest, timeframeParam } : rest;
}

export class FirestoreProviderRepository implements ProviderRepository {
  private readonly collection: CollectionReference<StoredProviderSpec>;
  private readonly now: () => Timestamp;

  constructor(options?: {
    collection?: CollectionReference<StoredProviderSpec>;
    now?: () => Timestamp;
  }) {
    this.collection =
      options?.collection ??
      adminDb().collection("providers").withConverter(providerConverter);
    this.now = options?.now ?? (() => Timestamp.now());
  }

  async list(filter: ProviderFilter = {}): Promise<StoredProviderSpec[]> {
    const snapshot = await this.collection.orderBy("position", "asc").get();
    const providers = snapshot.docs.map((doc) => doc.data());
    if (!filter.ids) {
      return providers;
    }

    const ids = new Set(filter.ids);
    return providers.filter((provider) => ids.has(provider.id));
  }

  async getById(id: string): Promise<StoredProviderSpec | null> {
    const snapshot = await this.collection.doc(id).get();
    if (!snapshot.exists) {
      return null;
    }

    return snapshot.data() ?? null;
  }

  async create(input: ProviderSpecInput): Promise<StoredProviderSpec> {
    const spec = providerSpecSchema.parse(input);
    const existing = await this.list();

    if (isPresetName(spec.name) || existing.some((provider) => provider.name === spec.name)) {
      throw new DuplicateProviderError(spec.name);
    }

    const docRef = this.collection.doc();
    const now = this.now();
    const position = existing.reduce((max, provider) => Math.max(max, provider.position), -1) + 1;
    const provider = withoutUndefined({
      ...spec,
      id: docRef.id,
      position,
      createdAt: now,
      updatedAt: now
    });

    await docRef.set(provider);
    return provider;
  }

  async update(id: string, update: UpdateProviderInput): Promise<StoredProviderSpec> {
    const current = await this.getById(id);
    if (!current) {
      throw new ProviderNotFoundError(id);
    }

    const spec = providerSpecSchema.parse({
      name: current.name,
      urlTemplate: current.urlTemplate,
      headers: current.headers,
      resultsPath: current.resultsPath,
      titlePath: current.titlePath,
      urlPath: current.urlPath,
      contentPath: current.contentPath,
      enabled: current.enabled,
      timeframeParam: current.timeframeParam,
      ...update
    });

    if (spec.name !== current.name) {
      if (isPresetName(spec.name)) {
        throw new DuplicateProviderError(spec.name);
      }
      const existing = await this.list();
      if (existing.some((provider) => provider.id !== id && provider.name === spec.name)) {
        throw new DuplicateProviderError(spec.name);
      }
    }

    const next = withoutUndefined({
      ...spec,
      id,
      position: current.position,
      createdAt: current.createdAt,
      updatedAt: this.now()
    });

    await this.collection.doc(id).set(next);
    return next;
  }

  async remove(id: string): Promise<void> {
    const docRef = this.collection.doc(id);
    const snapshot = await docRef.get();
    if (!snapshot.exists) {
      throw new ProviderNotFoundError(id);
    }

    await docRef.delete();
  }
}

/**
 * Stand-in used when no Firestore project is configured: only presets are searched.
 */
export class EmptyProviderSource implements ProviderSource {
  async list(): Promise<ProviderSpec[]> {
    return [];
  }
}

let providerRepositoryOverride: ProviderRepository | null = null;
let cachedProviderRepository: ProviderRepository | null = null;

export function setProviderRepository(instance: ProviderRepository | null) {
  providerRepositoryOverride = instance;
}

export function getProviderRepository(): ProviderRepository {
  if (providerRepositoryOverride) {
    return providerRepositoryOverride;
  }

  if (!cachedProviderRepository) {
    cachedProviderRepository = new FirestoreProviderRepository();
  }

  return cachedProviderRepository;
}

export function getProviderSource(): ProviderSource {
  if (providerRepositoryOverride || hasFirebaseCredentials()) {
    return getProviderRepository();
  }

  return new EmptyProviderSource();
}
