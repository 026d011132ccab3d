export type ExternalId = string;

export interface Sensor {
  id: number;
  source: string;
  externalId: ExternalId | null;
  description: string;
  longitude: number | null;
  latitude: number | null;
  geometry: string | null; // GeoJSON text
  confidential: boolean;
}

export interface Datastream {
  id: number;
  sensorId: number;
  externalId: ExternalId | null;
  type: string;
  unit: string;
  confidential: boolean;
}

export interface Measurement {
  datastreamId: number;
  timestamp: Date;
  value: number;
  confidential: boolean;
}

// GeoJSON subset accepted from sources
export type RawGeometry =
  | { type: "Point"; coordinates: number[] }
  | { type: "LineString"; coordinates: number[][] }
  | { type: "MultiLineString"; coordinates: number[][][] }
  | { type: "Polygon"; coordinates: number[][][] }
  | { type: "MultiPolygon"; coordinates: number[][][][] };

export type RawExternalId = string | number | bigint | null | undefined;

// Shapes produced by source adapters
export interface ObservedSensor {
  source: string;
  externalId: RawExternalId;
  description: string;
  longitude?: number | null;
  latitude?: number | null;
  rawGeometry?: unknown;
  confidential?: boolean;
}

export interface ObservedDatastream {
  sensorExternalId: RawExternalId;
  externalId: RawExternalId;
  categoryLabel: string;
  confidential: boolean;
}

export type RawValue = string | number | boolean | null | undefined;

export interface SourceObservation {
  datastreamExternalId: RawExternalId;
  timestamp: Date | string;
  rawValue: RawValue;
}

// Ingestor input: keyed by internal datastream id
export interface Observation {
  datastreamId: number;
  timestamp: Date | string;
  value: RawValue;
}

export interface IngestResult {
  written: number;
  skippedNonNumeric: number;
  skippedDuplicate: number;
  skippedInvalid: number;
}

// Widths of the pre-aggregated measurement tables, named as in their table names
export const BUCKET_WIDTHS = ["10min", "1hour", "4hour", "1day", "1week"] as const;
export type BucketWidth = (typeof BUCKET_WIDTHS)[number];

export const BUCKET_AGGREGATES = ["avg", "sum"] as const;
export type BucketAggregate = (typeof BUCKET_AGGREGATES)[number];

export interface ReconcileResult {
  ids: Map<ExternalId, number>;
  created: number;
  recovered: number;
  skipped: number;
}

const ABSENT_EXTERNAL_IDS = new Set(["", "-1"]);

/**
 * Canonical string form of an external id, or null when the source did not
 * provide one. Integer-valued numbers and digit strings collapse to the same
 * decimal text so `42`, `"42"` and `"042"` address one entity.
 */
export function normalizeExternalId(raw: RawExternalId): ExternalId | null {
  if (raw === null || raw === undefined) return null;
  let text: string;
  if (typeof raw === "bigint") {
    text = raw.toString();
  } else if (typeof raw === "number") {
    if (!Number.isFinite(raw)) return null;
    text = Number.isInteger(raw) ? BigInt(raw).toString() : String(raw);
  } else {
    text = raw.trim();
    if (/^[+-]?\d+$/.test(text)) text = BigInt(text).toString();
  }
  return ABSENT_EXTERNAL_IDS.has(text) ? null : text;
}

export function datastreamExternalId(
  sensorExternalId: ExternalId,
  categoryLabel: string
): ExternalId {
  return `${sensorExternalId}/${categoryLabel}`;
}
