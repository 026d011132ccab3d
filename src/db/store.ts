import type {
  BucketAggregate,
  BucketWidth,
  Datastream,
  ExternalId,
  Measurement,
  Sensor,
} from "../types";

// Persistence boundary of the ingestion core. The DuckDB repositories
// implement it in production; tests substitute an in-memory double.

export interface IdentityRow {
  externalId: ExternalId;
  id: number;
}

export interface IdentityLookup {
  /** One round trip for the whole id list; unknown ids are simply absent. */
  findByExternalIds(source: string, externalIds: ExternalId[]): Promise<IdentityRow[]>;
}

export type NewSensor = Omit<Sensor, "id" | "externalId"> & {
  externalId: ExternalId;
};

export type NewDatastream = Omit<Datastream, "id" | "externalId"> & {
  externalId: ExternalId;
};

export interface DatastreamTypeRow {
  id: number;
  sensorId: number;
  externalId: ExternalId | null;
  type: string;
}

export interface EntityStore<T> extends IdentityLookup {
  /**
   * Inserts every row in one transaction or none of them. A key collision
   * surfaces as UniqueViolationError.
   */
  insertMany(rows: T[]): Promise<IdentityRow[]>;
  /** Insert-or-ignore for a single row; null when the key already exists. */
  insertIgnore(row: T): Promise<number | null>;
}

export type SensorStore = EntityStore<NewSensor>;

export interface DatastreamStore extends EntityStore<NewDatastream> {
  confidentiality(ids: number[]): Promise<Map<number, boolean>>;
  typesForSensors(sensorIds: number[]): Promise<DatastreamTypeRow[]>;
}

export type MeasurementRow = Measurement;

export interface BucketRefresh {
  width: BucketWidth;
  aggregate: BucketAggregate;
  /** Measurements before this instant are left out. */
  since: Date;
}

export interface MeasurementStore {
  /** Insert-or-ignore on (datastream_id, ts), one transaction; returns rows written. */
  insertIgnore(rows: MeasurementRow[]): Promise<number>;
  /** Latest stored timestamp per datastream external id of one source. */
  latestTimestamps(source: string): Promise<Map<ExternalId, Date>>;
  refreshLatest(): Promise<number>;
  /** Replaces one bucketed aggregate table; returns its row count. */
  refreshBuckets(refresh: BucketRefresh): Promise<number>;
}
