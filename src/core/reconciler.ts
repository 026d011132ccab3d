import { setTimeout as delay } from "node:timers/promises";
import { NO_LOCATION, pointGeometry, resolveLocation, type ResolvedLocation } from "../common/geometry";
import { UnclassifiableCategoryError, isUniqueViolation } from "../common/errors";
import type { Logger } from "../common/logger";
import type {
  DatastreamStore,
  EntityStore,
  NewDatastream,
  NewSensor,
  SensorStore,
} from "../db/store";
import {
  normalizeExternalId,
  type ExternalId,
  type ObservedDatastream,
  type ObservedSensor,
  type RawExternalId,
  type ReconcileResult,
} from "../types";
import type { CategoryClassifier, Classification } from "./categories";
import { IdentityResolver } from "./identity";

export interface ReconcilerOptions {
  sensors: SensorStore;
  datastreams: DatastreamStore;
  classifier: CategoryClassifier;
  logger: Logger;
  // re-lookups after a conflict, for a competing insert not yet committed
  recoverAttempts?: number;
  recoverBackoffMs?: number;
}

export interface ObservedEntities {
  sensors: ObservedSensor[];
  datastreams: ObservedDatastream[];
}

export interface ReconciledEntities {
  sensors: ReconcileResult;
  datastreams: ReconcileResult;
}

interface PendingCreate<T> {
  externalId: ExternalId;
  row: T;
}

function finite(n: number | null | undefined): n is number {
  return typeof n === "number" && Number.isFinite(n);
}

/** First occurrence per canonical external id; entries without an id are returned apart. */
function dedupe<T>(
  items: T[],
  idOf: (item: T) => RawExternalId
): { unique: Map<ExternalId, T>; missingId: T[]; duplicates: number } {
  const unique = new Map<ExternalId, T>();
  const missingId: T[] = [];
  let duplicates = 0;
  for (const item of items) {
    const id = normalizeExternalId(idOf(item));
    if (id === null) missingId.push(item);
    else if (unique.has(id)) duplicates++;
    else unique.set(id, item);
  }
  return { unique, missingId, duplicates };
}

export class EntityReconciler {
  private readonly sensors: SensorStore;
  private readonly datastreams: DatastreamStore;
  private readonly classifier: CategoryClassifier;
  private readonly logger: Logger;
  private readonly recoverAttempts: number;
  private readonly recoverBackoffMs: number;

  constructor(options: ReconcilerOptions) {
    this.sensors = options.sensors;
    this.datastreams = options.datastreams;
    this.classifier = options.classifier;
    this.logger = options.logger;
    this.recoverAttempts = options.recoverAttempts ?? 3;
    this.recoverBackoffMs = options.recoverBackoffMs ?? 50;
  }

  async reconcile(source: string, observed: ObservedEntities): Promise<ReconciledEntities> {
    const sensors = await this.reconcileSensors(source, observed.sensors);
    const datastreams = await this.reconcileDatastreams(source, observed.datastreams);
    return { sensors, datastreams };
  }

  async reconcileSensors(source: string, observed: ObservedSensor[]): Promise<ReconcileResult> {
    const { unique, missingId, duplicates } = dedupe(observed, (s) => s.externalId);
    for (const s of missingId) {
      this.logger
        .with()
        .str("source", source)
        .str("description", s.description)
        .logger()
        .error("Observed sensor has no external id; skipping");
    }
    if (duplicates) {
      this.logger
        .with()
        .str("source", source)
        .num("duplicates", duplicates)
        .logger()
        .debug("Dropped repeated sensors from batch");
    }

    const resolver = new IdentityResolver(this.sensors);
    const existing = await resolver.resolve(source, unique.keys());

    const pending: PendingCreate<NewSensor>[] = [];
    for (const [externalId, sensor] of unique) {
      if (existing.has(externalId)) continue;
      const location = this.locate(source, externalId, sensor);
      pending.push({
        externalId,
        row: {
          source,
          externalId,
          description: sensor.description,
          ...location,
          confidential: sensor.confidential ?? false,
        },
      });
    }

    const outcome = await this.createMissing(source, "sensors", this.sensors, resolver, pending);
    return {
      ids: new Map([...existing, ...outcome.ids]),
      created: outcome.created,
      recovered: outcome.recovered,
      skipped: outcome.skipped + missingId.length,
    };
  }

  async reconcileDatastreams(
    source: string,
    observed: ObservedDatastream[]
  ): Promise<ReconcileResult> {
    const { unique, missingId, duplicates } = dedupe(observed, (d) => d.externalId);
    for (const d of missingId) {
      this.logger
        .with()
        .str("source", source)
        .str("category", d.categoryLabel)
        .logger()
        .error("Observed datastream has no external id; skipping");
    }
    if (duplicates) {
      this.logger
        .with()
        .str("source", source)
        .num("duplicates", duplicates)
        .logger()
        .debug("Dropped repeated datastreams from batch");
    }

    const sensorResolver = new IdentityResolver(this.sensors);
    const sensorIds = await sensorResolver.resolve(
      source,
      [...unique.values()].map((d) => d.sensorExternalId)
    );

    const resolver = new IdentityResolver(this.datastreams);
    const existing = await resolver.resolve(source, unique.keys());

    let skipped = missingId.length;
    const pending: PendingCreate<NewDatastream>[] = [];
    for (const [externalId, datastream] of unique) {
      if (existing.has(externalId)) continue;

      const sensorExternalId = normalizeExternalId(datastream.sensorExternalId);
      const sensorId = sensorExternalId === null ? undefined : sensorIds.get(sensorExternalId);
      if (sensorId === undefined) {
        skipped++;
        this.logger
          .with()
          .str("source", source)
          .str("externalId", externalId)
          .str("sensorExternalId", sensorExternalId)
          .logger()
          .error("Owning sensor of datastream is unknown; skipping");
        continue;
      }

      let classification: Classification;
      try {
        classification = this.classifier.classifyOrThrow(source, datastream.categoryLabel);
      } catch (err) {
        if (!(err instanceof UnclassifiableCategoryError)) throw err;
        skipped++;
        this.logger
          .with()
          .str("source", source)
          .str("externalId", externalId)
          .error(err)
          .logger()
          .error("Datastream category cannot be classified; skipping");
        continue;
      }

      pending.push({
        externalId,
        row: {
          sensorId,
          externalId,
          type: classification.type,
          unit: classification.unit,
          confidential: datastream.confidential,
        },
      });
    }

    await this.warnOnDuplicateTypes(source, pending);

    const outcome = await this.createMissing(
      source,
      "datastreams",
      this.datastreams,
      resolver,
      pending
    );
    return {
      ids: new Map([...existing, ...outcome.ids]),
      created: outcome.created,
      recovered: outcome.recovered,
      skipped: skipped + outcome.skipped,
    };
  }

  private locate(source: string, externalId: ExternalId, sensor: ObservedSensor): ResolvedLocation {
    let location = NO_LOCATION;
    try {
      if (sensor.rawGeometry !== undefined && sensor.rawGeometry !== null) {
        location = resolveLocation(sensor.rawGeometry);
      } else if (finite(sensor.longitude) && finite(sensor.latitude)) {
        location = resolveLocation(pointGeometry(sensor.longitude, sensor.latitude));
      }
    } catch (err) {
      this.logger
        .with()
        .str("source", source)
        .str("externalId", externalId)
        .error(err)
        .logger()
        .warn("Could not resolve sensor geometry; storing without location");
      return NO_LOCATION;
    }
    // explicit coordinates win over a derived centroid
    if (finite(sensor.longitude) && finite(sensor.latitude)) {
      return { ...location, longitude: sensor.longitude, latitude: sensor.latitude };
    }
    return location;
  }

  // (sensor_id, type) should be unique but sources do not guarantee it;
  // colliding datastreams are kept apart by external id and reported
  private async warnOnDuplicateTypes(source: string, pending: PendingCreate<NewDatastream>[]) {
    if (!pending.length) return;
    const sensorIds = [...new Set(pending.map((p) => p.row.sensorId))];
    const known = await this.datastreams.typesForSensors(sensorIds);
    const seen = new Map<string, ExternalId | null>();
    for (const row of known) seen.set(`${row.sensorId}\u0000${row.type}`, row.externalId);
    for (const p of pending) {
      const key = `${p.row.sensorId}\u0000${p.row.type}`;
      if (seen.has(key)) {
        this.logger
          .with()
          .str("source", source)
          .num("sensorId", p.row.sensorId)
          .str("type", p.row.type)
          .str("externalId", p.externalId)
          .str("collidesWith", seen.get(key))
          .logger()
          .warn("Sensor already has a datastream of this type");
      } else {
        seen.set(key, p.externalId);
      }
    }
  }

  /**
   * Bulk insert of everything new. If the batch as a whole collides (another
   * run created some of it since the lookup) each row is retried as
   * insert-or-ignore, and rows that insert nothing are looked up again.
   */
  private async createMissing<T>(
    source: string,
    table: string,
    store: EntityStore<T>,
    resolver: IdentityResolver,
    pending: PendingCreate<T>[]
  ): Promise<{ ids: Map<ExternalId, number>; created: number; recovered: number; skipped: number }> {
    const ids = new Map<ExternalId, number>();
    if (!pending.length) return { ids, created: 0, recovered: 0, skipped: 0 };

    try {
      const rows = await store.insertMany(pending.map((p) => p.row));
      for (const row of rows) {
        ids.set(row.externalId, row.id);
        resolver.remember(row.externalId, row.id);
      }
      this.logger
        .with()
        .str("source", source)
        .str("table", table)
        .num("created", rows.length)
        .logger()
        .info("Created new entities");
      return { ids, created: rows.length, recovered: 0, skipped: 0 };
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      this.logger
        .with()
        .str("source", source)
        .str("table", table)
        .num("rows", pending.length)
        .error(err)
        .logger()
        .info("Bulk create collided with existing rows; creating one by one");
    }

    let created = 0;
    let recovered = 0;
    let skipped = 0;
    for (const p of pending) {
      let id: number | null = null;
      try {
        id = await store.insertIgnore(p.row);
      } catch (err) {
        if (!isUniqueViolation(err)) throw err;
      }
      if (id !== null) {
        created++;
      } else {
        id = await this.recover(source, resolver, p.externalId);
        if (id === null) {
          skipped++;
          this.logger
            .with()
            .str("source", source)
            .str("table", table)
            .str("externalId", p.externalId)
            .logger()
            .error("Entity neither created nor found after conflict; skipping");
          continue;
        }
        recovered++;
      }
      ids.set(p.externalId, id);
      resolver.remember(p.externalId, id);
    }

    this.logger
      .with()
      .str("source", source)
      .str("table", table)
      .num("created", created)
      .num("recovered", recovered)
      .num("skipped", skipped)
      .logger()
      .info("Row-by-row create finished");
    return { ids, created, recovered, skipped };
  }

  private async recover(
    source: string,
    resolver: IdentityResolver,
    externalId: ExternalId
  ): Promise<number | null> {
    for (let attempt = 1; attempt <= this.recoverAttempts; attempt++) {
      resolver.forget(externalId);
      const id = await resolver.resolveOne(source, externalId);
      if (id !== null) return id;
      if (attempt < this.recoverAttempts) await delay(this.recoverBackoffMs);
    }
    return null;
  }
}
