import type { IdentityLookup } from "../db/store";
import { normalizeExternalId, type ExternalId, type RawExternalId } from "../types";

/** Bidirectional external <-> internal id map, scoped to one reconciliation call. */
export class IdentityCache {
  private readonly byExternal = new Map<ExternalId, number>();
  private readonly byInternal = new Map<number, ExternalId>();

  set(externalId: ExternalId, id: number) {
    this.byExternal.set(externalId, id);
    this.byInternal.set(id, externalId);
  }

  get(externalId: ExternalId): number | undefined {
    return this.byExternal.get(externalId);
  }

  externalIdOf(id: number): ExternalId | undefined {
    return this.byInternal.get(id);
  }

  has(externalId: ExternalId): boolean {
    return this.byExternal.has(externalId);
  }

  delete(externalId: ExternalId) {
    const id = this.byExternal.get(externalId);
    this.byExternal.delete(externalId);
    if (id !== undefined) this.byInternal.delete(id);
  }
}

export class IdentityResolver {
  readonly cache = new IdentityCache();
  // ids already looked up in this batch and found missing
  private readonly misses = new Set<ExternalId>();

  constructor(private readonly lookup: IdentityLookup) {}

  /**
   * Internal ids for every external id that already exists. Ids absent from
   * the result are confirmed new. Only ids not yet seen in this batch hit
   * the store, in a single query.
   */
  async resolve(
    source: string,
    externalIds: Iterable<RawExternalId>
  ): Promise<Map<ExternalId, number>> {
    const wanted = new Set<ExternalId>();
    for (const raw of externalIds) {
      const id = normalizeExternalId(raw);
      if (id !== null) wanted.add(id);
    }

    const unknown = [...wanted].filter(
      (id) => !this.cache.has(id) && !this.misses.has(id)
    );
    if (unknown.length) {
      const rows = await this.lookup.findByExternalIds(source, unknown);
      for (const row of rows) {
        if (!this.cache.has(row.externalId)) this.cache.set(row.externalId, row.id);
      }
      for (const id of unknown) {
        if (!this.cache.has(id)) this.misses.add(id);
      }
    }

    const result = new Map<ExternalId, number>();
    for (const id of wanted) {
      const internal = this.cache.get(id);
      if (internal !== undefined) result.set(id, internal);
    }
    return result;
  }

  async resolveOne(source: string, externalId: RawExternalId): Promise<number | null> {
    const id = normalizeExternalId(externalId);
    if (id === null) return null;
    const found = await this.resolve(source, [id]);
    return found.get(id) ?? null;
  }

  /** Drops what this batch knows about an id so the next resolve re-queries it. */
  forget(externalId: ExternalId) {
    this.cache.delete(externalId);
    this.misses.delete(externalId);
  }

  remember(externalId: ExternalId, id: number) {
    this.misses.delete(externalId);
    this.cache.set(externalId, id);
  }
}
