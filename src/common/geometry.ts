import * as turf from "@turf/turf";
import { z } from "zod";
import type { RawGeometry } from "../types";

const position = z.array(z.number()).min(2);

const rawGeometrySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Point"), coordinates: position }),
  z.object({ type: z.literal("LineString"), coordinates: z.array(position) }),
  z.object({
    type: z.literal("MultiLineString"),
    coordinates: z.array(z.array(position)),
  }),
  z.object({
    type: z.literal("Polygon"),
    coordinates: z.array(z.array(position)),
  }),
  z.object({
    type: z.literal("MultiPolygon"),
    coordinates: z.array(z.array(z.array(position))),
  }),
]);

// null and blank cells mean the coordinate was not reported
export const optionalCoordinate = z.preprocess(
  (value) => (value === null || (typeof value === "string" && !value.trim()) ? undefined : value),
  z.coerce.number().finite().optional()
);

export interface ResolvedLocation {
  longitude: number | null;
  latitude: number | null;
  geometry: string | null;
}

export const NO_LOCATION: ResolvedLocation = {
  longitude: null,
  latitude: null,
  geometry: null,
};

function toFeature(geometry: RawGeometry) {
  switch (geometry.type) {
    case "Point":
      return turf.point(geometry.coordinates);
    case "LineString":
      return turf.lineString(geometry.coordinates);
    case "MultiLineString":
      return turf.multiLineString(geometry.coordinates);
    case "Polygon":
      return turf.polygon(geometry.coordinates);
    case "MultiPolygon":
      return turf.multiPolygon(geometry.coordinates);
  }
}

/**
 * Longitude/latitude of a GeoJSON geometry (centroid for anything but a
 * point) plus the normalised geometry text. Throws on shapes turf rejects,
 * e.g. an unclosed polygon ring.
 */
export function resolveLocation(raw: unknown): ResolvedLocation {
  const geometry: RawGeometry = rawGeometrySchema.parse(raw);
  const feature = toFeature(geometry);
  const [longitude, latitude] = turf.centroid(feature).geometry.coordinates;
  return {
    longitude,
    latitude,
    geometry: JSON.stringify(feature.geometry),
  };
}

export function pointGeometry(longitude: number, latitude: number): RawGeometry {
  return { type: "Point", coordinates: [longitude, latitude] };
}
