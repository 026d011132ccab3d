import { parse } from "csv-parse/sync";
import { MalformedPayloadError, describeError } from "../common/errors";
import type { Logger } from "../common/logger";
import { floorToHour } from "../common/values";
import {
  datastreamExternalId,
  type ObservedDatastream,
  type ObservedSensor,
  type SourceObservation,
} from "../types";
import type { HttpSource } from "./http";
import type { FetchWindow, SourceAdapter, SourceBatch } from "./types";

export const LANUV_SOURCE = "LANUV";

export const LANUV_POLLUTANTS = ["Ozon", "SO2", "NO2", "PM10"] as const;

// Column order of the current air quality table; a trailing empty column follows
const STATION_COLUMN = 0;
const CODE_COLUMN = 1;
const FIRST_POLLUTANT_COLUMN = 2;

export interface LanuvStation {
  code: string;
  description: string;
  longitude: number;
  latitude: number;
}

export interface LanuvAdapterOptions {
  http: HttpSource;
  logger: Logger;
  url: string;
  stations: LanuvStation[];
  encoding?: string;
  now?: () => Date;
  source?: string;
}

/**
 * Hourly air quality of a fixed set of LANUV stations. The table carries no
 * timestamps; readings are stored at the hour they were fetched in.
 */
export class LanuvAdapter implements SourceAdapter {
  readonly source: string;
  private readonly http: HttpSource;
  private readonly logger: Logger;
  private readonly url: string;
  private readonly stations: Map<string, LanuvStation>;
  private readonly encoding: string;
  private readonly now: () => Date;

  constructor(options: LanuvAdapterOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.url = options.url;
    this.stations = new Map(options.stations.map((s) => [s.code, s]));
    this.encoding = options.encoding ?? "windows-1250";
    this.now = options.now ?? (() => new Date());
    this.source = options.source ?? LANUV_SOURCE;
  }

  async fetch(_window: FetchWindow): Promise<SourceBatch> {
    const csv = await this.http.getText(this.url, this.encoding);
    return this.parse(csv, floorToHour(this.now()));
  }

  parse(csv: string, timestamp: Date): SourceBatch {
    let records: string[][];
    try {
      records = parse(csv, {
        delimiter: ";",
        from_line: 3,
        relax_column_count: true,
        skip_empty_lines: true,
        trim: true,
      });
    } catch (err) {
      throw new MalformedPayloadError(
        `LANUV table is not valid CSV: ${describeError(err)}`,
        { source: this.source },
        { cause: err }
      );
    }

    const sensors: ObservedSensor[] = [];
    const datastreams: ObservedDatastream[] = [];
    const observations: SourceObservation[] = [];
    const seen = new Set<string>();

    for (const record of records) {
      const code = record[CODE_COLUMN];
      const station = code === undefined ? undefined : this.stations.get(code);
      if (!station || seen.has(station.code)) continue;
      seen.add(station.code);

      sensors.push({
        source: this.source,
        externalId: station.code,
        description: station.description || (record[STATION_COLUMN] ?? ""),
        longitude: station.longitude,
        latitude: station.latitude,
        confidential: false,
      });

      LANUV_POLLUTANTS.forEach((pollutant, i) => {
        const dsId = datastreamExternalId(station.code, pollutant);
        datastreams.push({
          sensorExternalId: station.code,
          externalId: dsId,
          categoryLabel: pollutant,
          confidential: false,
        });
        // "<5" is below the detection limit; "-" and "*" mark missing values
        const raw = record[FIRST_POLLUTANT_COLUMN + i] ?? "";
        observations.push({
          datastreamExternalId: dsId,
          timestamp,
          rawValue: raw.replace("<", ""),
        });
      });
    }

    const missing = [...this.stations.keys()].filter((code) => !seen.has(code));
    if (missing.length) {
      this.logger
        .with()
        .str("source", this.source)
        .array("stations", missing)
        .logger()
        .warn("Configured stations missing from LANUV table");
    }
    return { sensors, datastreams, observations };
  }
}
