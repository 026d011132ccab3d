import { parse } from "csv-parse/sync";
import { z } from "zod";
import { MalformedPayloadError, describeError } from "../common/errors";
import type { Logger } from "../common/logger";
import { floorToDay } from "../common/values";
import {
  datastreamExternalId,
  normalizeExternalId,
  type ExternalId,
  type ObservedDatastream,
  type ObservedSensor,
  type SourceObservation,
} from "../types";
import type { HttpSource } from "./http";
import type { FetchWindow, SourceAdapter, SourceBatch } from "./types";

export const SENSOR_COMMUNITY_SOURCE = "SensorCommunity";

export const DEFAULT_VALUE_TYPES = ["P1", "P2", "temperature", "humidity", "pressure"];

const entrySchema = z.object({
  timestamp: z.string(),
  location: z.object({
    latitude: z.coerce.number(),
    longitude: z.coerce.number(),
  }),
  sensor: z.object({
    id: z.union([z.number(), z.string()]),
    sensor_type: z.object({
      name: z.string(),
      manufacturer: z.string().nullish(),
    }),
  }),
  sensordatavalues: z.array(
    z.object({
      value_type: z.string(),
      value: z.union([z.string(), z.number(), z.null()]),
    })
  ),
});

const responseSchema = z.array(entrySchema);

const archiveSchema = z.array(z.object({ timestamp: z.string() }).catchall(z.string()));

const DAY_MS = 86_400_000;

export type SensorCommunityEntry = z.infer<typeof entrySchema>;

export interface SensorCommunityArea {
  latitude: number;
  longitude: number;
  radiusKm: number;
}

export interface SensorCommunityAdapterOptions {
  http: HttpSource;
  logger: Logger;
  area: SensorCommunityArea;
  valueTypes?: string[];
  /** Backfill from the daily CSV archive up to yesterday. */
  archive?: SensorCommunityArchive;
  source?: string;
  now?: () => Date;
}

export interface SensorCommunityArchive {
  baseUrl: string;
  /** Archive days read per sensor and run. */
  maxDaysPerRun: number;
}

interface Reading {
  sensorId: ExternalId;
  timestamp: string;
  values: Array<{ valueType: string; value: string | number | null }>;
}

interface SensorInfo {
  description: string;
  longitude: number;
  latitude: number;
}

// The API reports UTC without a zone designator
function utcTimestamp(raw: string): string {
  const iso = raw.trim().replace(" ", "T");
  return /(?:Z|[+-]\d{2}:?\d{2})$/i.test(iso) ? iso : `${iso}Z`;
}

/**
 * Readings of all Sensor.Community sensors inside a circle. Each sensor
 * carries one datastream per reported value type.
 *
 * With an archive configured, sensors whose datastreams lag behind today are
 * filled from the archive's daily CSV files first; their live readings join
 * once the archive has caught up to yesterday. The next archive day per
 * sensor only moves on commit.
 */
export class SensorCommunityAdapter implements SourceAdapter {
  readonly source: string;
  private readonly http: HttpSource;
  private readonly logger: Logger;
  private readonly area: SensorCommunityArea;
  private readonly valueTypes: Set<string>;
  private readonly archive: SensorCommunityArchive | undefined;
  private readonly now: () => Date;
  private readonly nextArchiveDay = new Map<ExternalId, Date>();
  private pendingArchiveDays = new Map<ExternalId, Date>();

  constructor(options: SensorCommunityAdapterOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.area = options.area;
    this.valueTypes = new Set(options.valueTypes ?? DEFAULT_VALUE_TYPES);
    this.archive = options.archive;
    this.source = options.source ?? SENSOR_COMMUNITY_SOURCE;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(window: FetchWindow): Promise<SourceBatch> {
    const { latitude, longitude, radiusKm } = this.area;
    const entries = await this.http.getJson(
      `area=${latitude},${longitude},${radiusKm}`,
      responseSchema
    );
    if (!this.archive) return this.toBatch(entries);
    return this.withArchive(entries, window, this.archive);
  }

  commit() {
    for (const [sensorId, day] of this.pendingArchiveDays) this.nextArchiveDay.set(sensorId, day);
    this.pendingArchiveDays = new Map();
  }

  rollback() {
    this.pendingArchiveDays = new Map();
  }

  toBatch(entries: SensorCommunityEntry[]): SourceBatch {
    const { info, readings } = this.fromLive(entries);
    return this.build(info, readings);
  }

  private fromLive(entries: SensorCommunityEntry[]) {
    const info = new Map<ExternalId, SensorInfo>();
    const types = new Map<ExternalId, string>();
    const readings: Reading[] = [];
    for (const entry of entries) {
      const sensorId = normalizeExternalId(entry.sensor.id);
      if (sensorId === null) continue;
      const { name, manufacturer } = entry.sensor.sensor_type;
      if (!info.has(sensorId)) {
        info.set(sensorId, {
          description: manufacturer ? `${manufacturer} - ${name}` : name,
          longitude: entry.location.longitude,
          latitude: entry.location.latitude,
        });
        types.set(sensorId, name);
      }
      readings.push({
        sensorId,
        timestamp: utcTimestamp(entry.timestamp),
        values: entry.sensordatavalues.map(({ value_type, value }) => ({
          valueType: value_type,
          value,
        })),
      });
    }
    return { info, types, readings };
  }

  private async withArchive(
    entries: SensorCommunityEntry[],
    window: FetchWindow,
    archive: SensorCommunityArchive
  ): Promise<SourceBatch> {
    const { info, types, readings } = this.fromLive(entries);
    const today = floorToDay(this.now());
    const pending = new Map<ExternalId, Date>();
    const archived: Reading[] = [];
    const live: Reading[] = [];
    let days = 0;

    for (const [sensorId, sensorType] of types) {
      const own = readings.filter((r) => r.sensorId === sensorId);
      const start = this.archiveStart(sensorId, own, window);
      if (start === null || start >= today) {
        live.push(...own);
        continue;
      }
      const behind = Math.round((today.getTime() - start.getTime()) / DAY_MS);
      const count = Math.min(behind, archive.maxDaysPerRun);
      for (let i = 0; i < count; i++) {
        const day = new Date(start.getTime() + i * DAY_MS);
        archived.push(...(await this.archiveDay(archive, sensorId, sensorType, day)));
        days++;
      }
      const next = new Date(start.getTime() + count * DAY_MS);
      pending.set(sensorId, next);
      if (next >= today) live.push(...own);
    }

    this.pendingArchiveDays = pending;
    this.logger
      .with()
      .str("source", this.source)
      .num("archiveDays", days)
      .num("archiveReadings", archived.length)
      .logger()
      .debug("Read Sensor.Community archive");
    return this.build(info, [...archived, ...live]);
  }

  // first day whose archive file may hold readings not yet stored
  private archiveStart(sensorId: ExternalId, readings: Reading[], window: FetchWindow): Date | null {
    const tracked = new Set<string>();
    for (const reading of readings) {
      for (const { valueType } of reading.values) {
        if (this.valueTypes.has(valueType)) tracked.add(valueType);
      }
    }
    if (!tracked.size) return null;
    const since = [...tracked].map((t) => window.since(datastreamExternalId(sensorId, t)).getTime());
    const stored = floorToDay(new Date(Math.min(...since)));
    const committed = this.nextArchiveDay.get(sensorId);
    return committed && committed > stored ? committed : stored;
  }

  private async archiveDay(
    archive: SensorCommunityArchive,
    sensorId: ExternalId,
    sensorType: string,
    day: Date
  ): Promise<Reading[]> {
    const date = day.toISOString().slice(0, 10);
    const url = `${archive.baseUrl}${date}/${date}_${sensorType.toLowerCase()}_sensor_${sensorId}.csv`;
    const csv = await this.http.getTextIfPresent(url);
    if (csv === null) return [];

    let records: z.infer<typeof archiveSchema>;
    try {
      records = archiveSchema.parse(
        parse(csv, {
          delimiter: ";",
          columns: true,
          relax_column_count: true,
          skip_empty_lines: true,
          trim: true,
        })
      );
    } catch (err) {
      throw new MalformedPayloadError(
        `Sensor.Community archive file is not valid CSV: ${describeError(err)}`,
        { source: this.source, url },
        { cause: err }
      );
    }

    return records.map(({ timestamp, ...columns }) => ({
      sensorId,
      timestamp: utcTimestamp(timestamp),
      values: Object.entries(columns)
        .filter(([, value]) => value !== "")
        .map(([valueType, value]) => ({ valueType, value })),
    }));
  }

  private build(info: Map<ExternalId, SensorInfo>, readings: Reading[]): SourceBatch {
    const sensors = new Map<ExternalId, ObservedSensor>();
    const datastreams = new Map<ExternalId, ObservedDatastream>();
    const observations: SourceObservation[] = [];

    for (const reading of readings) {
      const sensorId = reading.sensorId;
      const sensor = info.get(sensorId);
      if (!sensor) continue;
      if (!sensors.has(sensorId)) {
        sensors.set(sensorId, { source: this.source, externalId: sensorId, ...sensor, confidential: false });
      }

      for (const { valueType, value } of reading.values) {
        if (!this.valueTypes.has(valueType)) continue;
        const dsId = datastreamExternalId(sensorId, valueType);
        if (!datastreams.has(dsId)) {
          datastreams.set(dsId, {
            sensorExternalId: sensorId,
            externalId: dsId,
            categoryLabel: valueType,
            confidential: false,
          });
        }
        observations.push({ datastreamExternalId: dsId, timestamp: reading.timestamp, rawValue: value });
      }
    }

    this.logger
      .with()
      .str("source", this.source)
      .num("sensors", sensors.size)
      .num("observations", observations.length)
      .logger()
      .debug("Fetched Sensor.Community batch");
    return {
      sensors: [...sensors.values()],
      datastreams: [...datastreams.values()],
      observations,
    };
  }
}
