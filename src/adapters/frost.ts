import { z } from "zod";
import { MalformedPayloadError } from "../common/errors";
import type { Logger } from "../common/logger";
import type {
  ObservedDatastream,
  ObservedSensor,
  RawValue,
  SourceObservation,
} from "../types";
import { normalizeExternalId, type ExternalId } from "../types";
import type { HttpSource } from "./http";
import type { FetchWindow, SourceAdapter, SourceBatch } from "./types";

export const FROST_SOURCE = "FROST";

const PAGE_SIZE = 1000;

// Datastream descriptions of weather series, which carry no class
const WEATHER_TYPES = new Set([
  "SIGNIFICANTWEATHER",
  "WINDDIRECTION",
  "HUMIDITY",
  "TEMPERATURE",
  "DEWPOINT",
  "WINDSPEED",
  "PROBABILITYOFPRECIPITATION",
]);

const CHARGING_STATUS = new Map<string, number>([
  ["charging", 1],
  ["available", 0],
  ["outoforder", -1],
]);

// Thing species whose data is not published
const CONFIDENTIAL_SPECIES = new Set(["Ladestation", "Parkhaus"]);

const iotId = z.union([z.number(), z.string()]);
const properties = z.record(z.string(), z.unknown()).nullish().transform((p) => p ?? {});

const datastreamSchema = z.object({
  "@iot.id": iotId,
  description: z.string().nullish(),
  properties,
  observedArea: z.unknown().optional(),
  chargePointLocation: z
    .object({ coordinates: z.object({ lon: z.number(), lat: z.number() }) })
    .optional(),
});

const thingSchema = z.object({
  "@iot.id": iotId,
  name: z.string().nullish(),
  description: z.string().nullish(),
  properties,
});

const observationSchema = z.object({
  phenomenonTime: z.string(),
  result: z.union([z.number(), z.string(), z.boolean(), z.null()]),
});

function page<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    value: z.array(item),
    "@iot.nextLink": z.string().optional(),
  });
}

const datastreamPage = page(datastreamSchema);
const observationPage = page(observationSchema);

export type FrostDatastream = z.infer<typeof datastreamSchema>;
export type FrostThing = z.infer<typeof thingSchema>;

function text(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

/**
 * Class of a datastream: `Klasse`, then `type`, then the weather quantity
 * named by the description.
 */
export function frostCategory(ds: FrostDatastream): string {
  const klasse = text(ds.properties.Klasse) ?? text(ds.properties.type);
  if (klasse) return klasse;
  return ds.description && WEATHER_TYPES.has(ds.description)
    ? ds.description.toLowerCase()
    : "unknown";
}

export function frostValue(result: RawValue): RawValue {
  if (typeof result === "string") return CHARGING_STATUS.get(result) ?? result;
  return result;
}

/** Description and confidentiality of the sensor a thing becomes, by its species. */
export function describeThing(thing: FrostThing): { description: string; confidential: boolean } {
  const species = text(thing.properties.species);
  const props = thing.properties.props;
  const name = thing.name ?? "";
  switch (species) {
    case "Ladestation":
      return { description: thing.description ?? "", confidential: true };
    case "Zaehlstelle": {
      const label =
        props && typeof props === "object" && "label" in props ? text(props.label) : undefined;
      return { description: label ?? "", confidential: false };
    }
    case "Parkhaus":
    case "Parkplatz":
    case "Parkfläche":
      return { description: name, confidential: CONFIDENTIAL_SPECIES.has(species) };
    default:
      if (thing.properties.type === "ParkingLocation") {
        return { description: name, confidential: false };
      }
      return { description: "", confidential: true };
  }
}

function geometryOf(ds: FrostDatastream): unknown {
  if (ds.observedArea) return ds.observedArea;
  if (ds.chargePointLocation) {
    const { lon, lat } = ds.chargePointLocation.coordinates;
    return { type: "Point", coordinates: [lon, lat] };
  }
  return undefined;
}

export interface FrostAdapterOptions {
  http: HttpSource;
  logger: Logger;
  source?: string;
}

/**
 * OGC SensorThings (FROST-Server) source. Datastreams map to datastreams,
 * their Things to sensors. Observations are paged per datastream from the
 * datastream's watermark on.
 */
export class FrostAdapter implements SourceAdapter {
  readonly source: string;
  private readonly http: HttpSource;
  private readonly logger: Logger;
  // Things never move between datastreams; fetched once per process
  private readonly things = new Map<ExternalId, FrostThing>();

  constructor(options: FrostAdapterOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.source = options.source ?? FROST_SOURCE;
  }

  async fetch(window: FetchWindow): Promise<SourceBatch> {
    const sensors: ObservedSensor[] = [];
    const datastreams: ObservedDatastream[] = [];
    const observations: SourceObservation[] = [];

    for (const ds of await this.listDatastreams()) {
      const dsId = normalizeExternalId(ds["@iot.id"]);
      if (dsId === null) continue;

      const thing = await this.thingOf(dsId);
      if (!thing) continue;
      const { description, confidential } = describeThing(thing);

      sensors.push({
        source: this.source,
        externalId: thing["@iot.id"],
        description,
        rawGeometry: geometryOf(ds),
        confidential,
      });
      datastreams.push({
        sensorExternalId: thing["@iot.id"],
        externalId: dsId,
        categoryLabel: frostCategory(ds),
        confidential,
      });
      observations.push(...(await this.observationsOf(dsId, window.since(dsId))));
    }

    this.logger
      .with()
      .str("source", this.source)
      .num("datastreams", datastreams.length)
      .num("observations", observations.length)
      .logger()
      .debug("Fetched FROST batch");
    return { sensors, datastreams, observations };
  }

  private async listDatastreams(): Promise<FrostDatastream[]> {
    const all: FrostDatastream[] = [];
    let next: string | undefined =
      `Datastreams?$top=${PAGE_SIZE}&$orderby=@iot.id asc` +
      `&$select=@iot.id,description,properties,observedArea`;
    while (next) {
      const result: z.infer<typeof datastreamPage> = await this.http.getJson(next, datastreamPage);
      all.push(...result.value);
      next = result.value.length ? result["@iot.nextLink"] : undefined;
    }
    return all;
  }

  private async thingOf(dsId: ExternalId): Promise<FrostThing | null> {
    const cached = this.things.get(dsId);
    if (cached) return cached;
    try {
      const thing = await this.http.getJson(
        `Datastreams(${dsId})/Thing?$select=@iot.id,name,description,properties`,
        thingSchema
      );
      this.things.set(dsId, thing);
      return thing;
    } catch (err) {
      if (!(err instanceof MalformedPayloadError)) throw err;
      this.logger
        .with()
        .str("source", this.source)
        .str("externalId", dsId)
        .error(err)
        .logger()
        .error("Could not read thing of datastream; skipping it");
      return null;
    }
  }

  private async observationsOf(dsId: ExternalId, since: Date): Promise<SourceObservation[]> {
    const result: SourceObservation[] = [];
    let next: string | undefined =
      `Datastreams(${dsId})/Observations?$top=${PAGE_SIZE}&$orderby=phenomenonTime asc` +
      `&$select=@iot.id,phenomenonTime,result&$filter=resultTime gt ${since.toISOString()}`;
    while (next) {
      const current: z.infer<typeof observationPage> = await this.http.getJson(next, observationPage);
      for (const o of current.value) {
        result.push({
          datastreamExternalId: dsId,
          // intervals "start/end" are stored at their start
          timestamp: o.phenomenonTime.split("/")[0],
          rawValue: frostValue(o.result),
        });
      }
      next = current.value.length ? current["@iot.nextLink"] : undefined;
    }
    return result;
  }
}
