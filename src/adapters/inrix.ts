import { readFileSync } from "node:fs";
import { z } from "zod";
import { describeError } from "../common/errors";
import type { Logger } from "../common/logger";
import { ConfigError } from "../config";
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

export const INRIX_SOURCE = "INRIX";

const SEGMENT_DESCRIPTION = "INRIX Speed Segment";

// reported per segment; the field name is the datastream's category label
const SEGMENT_FIELDS = [
  "speed",
  "average",
  "reference",
  "travelTimeMinutes",
  "speedBucket",
  "segmentClosed",
] as const;

const reading = z.number().nullish();

const segmentSchema = z.object({
  code: z.union([z.string(), z.number()]),
  speed: reading,
  average: reading,
  reference: reading,
  travelTimeMinutes: reading,
  speedBucket: reading,
  segmentClosed: z.boolean().nullish(),
});

const speedResponseSchema = z.object({
  result: z.object({
    segmentspeeds: z.array(
      z.object({
        time: z.string(),
        segments: z.array(segmentSchema),
      })
    ),
  }),
});

const tokenResponseSchema = z.object({
  result: z.object({
    token: z.string().min(1),
    expiry: z.string().datetime({ offset: true }).optional(),
  }),
});

const catalogSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(
    z.object({
      properties: z.object({ XDSegID: z.union([z.string(), z.number()]) }).passthrough(),
      geometry: z.unknown(),
    })
  ),
});

export type InrixSegment = z.infer<typeof segmentSchema>;

/** Road geometry of every XDS segment, keyed by segment code. */
export type SegmentCatalog = Map<ExternalId, unknown>;

export function loadSegmentCatalog(path: string): SegmentCatalog {
  let parsed: z.infer<typeof catalogSchema>;
  try {
    parsed = catalogSchema.parse(JSON.parse(readFileSync(path, "utf8")));
  } catch (err) {
    throw new ConfigError(`Cannot read INRIX segments ${path}: ${describeError(err)}`);
  }
  const catalog: SegmentCatalog = new Map();
  for (const feature of parsed.features) {
    const code = normalizeExternalId(feature.properties.XDSegID);
    if (code !== null) catalog.set(code, feature.geometry);
  }
  return catalog;
}

export interface InrixBox {
  northwest: { latitude: number; longitude: number };
  southeast: { latitude: number; longitude: number };
}

export interface InrixAdapterOptions {
  http: HttpSource;
  logger: Logger;
  tokenUrl: string;
  segmentsUrl: string;
  appId: string;
  hashToken: string;
  box: InrixBox;
  segments: SegmentCatalog;
  source?: string;
  now?: () => Date;
}

/**
 * Current speeds of the road segments inside a box. Each catalogued segment
 * is a confidential sensor with one datastream per reported field.
 */
export class InrixAdapter implements SourceAdapter {
  readonly source: string;
  private readonly http: HttpSource;
  private readonly logger: Logger;
  private readonly options: InrixAdapterOptions;
  private readonly now: () => Date;
  private token: { value: string; expiresAt: Date | null } | null = null;

  constructor(options: InrixAdapterOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.options = options;
    this.source = options.source ?? INRIX_SOURCE;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(_window: FetchWindow): Promise<SourceBatch> {
    const { northwest: nw, southeast: se } = this.options.box;
    const token = await this.accessToken();
    try {
      const body = await this.http.getJson(this.options.segmentsUrl, speedResponseSchema, {
        box: `${nw.latitude}|${nw.longitude},${se.latitude}|${se.longitude}`,
        units: 1,
        SpeedOutputFields: "All",
        accesstoken: token,
      });
      return this.toBatch(body.result.segmentspeeds);
    } catch (err) {
      this.token = null;
      throw err;
    }
  }

  toBatch(speeds: Array<{ time: string; segments: InrixSegment[] }>): SourceBatch {
    const sensors = new Map<ExternalId, ObservedSensor>();
    const datastreams: ObservedDatastream[] = [];
    const observations: SourceObservation[] = [];
    const uncatalogued = new Set<ExternalId>();

    for (const { time, segments } of speeds) {
      for (const segment of segments) {
        const code = normalizeExternalId(segment.code);
        if (code === null) continue;
        if (!this.options.segments.has(code)) {
          uncatalogued.add(code);
          continue;
        }

        if (!sensors.has(code)) {
          sensors.set(code, {
            source: this.source,
            externalId: code,
            description: SEGMENT_DESCRIPTION,
            rawGeometry: this.options.segments.get(code),
            confidential: true,
          });
          for (const field of SEGMENT_FIELDS) {
            datastreams.push({
              sensorExternalId: code,
              externalId: datastreamExternalId(code, field),
              categoryLabel: field,
              confidential: true,
            });
          }
        }

        const values = segmentValues(segment);
        for (const field of SEGMENT_FIELDS) {
          observations.push({
            datastreamExternalId: datastreamExternalId(code, field),
            timestamp: time,
            rawValue: values[field],
          });
        }
      }
    }

    if (uncatalogued.size) {
      this.logger
        .with()
        .str("source", this.source)
        .num("segments", uncatalogued.size)
        .logger()
        .warn("Skipped segments missing from the segment catalog");
    }
    return { sensors: [...sensors.values()], datastreams, observations };
  }

  private async accessToken(): Promise<string> {
    const cached = this.token;
    if (cached && cached.expiresAt && cached.expiresAt > this.now()) return cached.value;

    const body = await this.http.getJson(this.options.tokenUrl, tokenResponseSchema, {
      appId: this.options.appId,
      hashToken: this.options.hashToken,
    });
    const { token, expiry } = body.result;
    this.token = { value: token, expiresAt: expiry ? new Date(expiry) : null };
    this.logger.with().str("source", this.source).logger().debug("Obtained INRIX access token");
    return token;
  }
}

// a missing speed counts as standstill
function segmentValues(
  segment: InrixSegment
): Record<(typeof SEGMENT_FIELDS)[number], number | null> {
  const closed = segment.segmentClosed ?? false;
  return {
    speed: segment.speed ?? 0,
    average: segment.average ?? null,
    reference: segment.reference ?? null,
    travelTimeMinutes: segment.travelTimeMinutes ?? null,
    speedBucket: segment.speedBucket ?? null,
    segmentClosed: closed ? 1 : 0,
  };
}
