import { readFileSync } from "node:fs";
import { z } from "zod";
import { describeError } from "./common/errors";
import { BUCKET_AGGREGATES, BUCKET_WIDTHS } from "./types";

const sourceCommon = {
  name: z.string().min(1).optional(),
  intervalSec: z.number().positive(),
  maxRetryCount: z.number().int().min(0).default(5),
  retryBackoffSec: z.number().min(0).default(3),
  timeoutSec: z.number().positive().default(60),
};

// only sources that can read back in time take a start
const defaultStart = z
  .string()
  .datetime({ offset: true })
  .transform((s) => new Date(s));

const frostSourceSchema = z.object({
  ...sourceCommon,
  kind: z.literal("frost"),
  defaultStart,
  baseUrl: z.string().url(),
  // names of the environment variables holding the credentials
  usernameEnv: z.string().default("FROST_DB_USERNAME"),
  passwordEnv: z.string().default("FROST_DB_PASSWORD"),
});

const sensorCommunitySourceSchema = z.object({
  ...sourceCommon,
  kind: z.literal("sensor-community"),
  defaultStart,
  baseUrl: z.string().url().default("https://data.sensor.community/airrohr/v1/filter/"),
  area: z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    radiusKm: z.number().positive(),
  }),
  valueTypes: z.array(z.string()).nonempty().optional(),
  archive: z
    .object({
      baseUrl: z.string().url().default("https://archive.sensor.community/"),
      maxDaysPerRun: z.number().int().positive().default(7),
    })
    .optional(),
});

const lanuvSourceSchema = z.object({
  ...sourceCommon,
  kind: z.literal("lanuv"),
  url: z
    .string()
    .url()
    .default(
      "https://www.lanuv.nrw.de/fileadmin/lanuv/luft/immissionen/aktluftqual/eu_luftqualitaet.csv"
    ),
  encoding: z.string().default("windows-1250"),
  stations: z
    .array(
      z.object({
        code: z.string().min(1),
        description: z.string().default(""),
        longitude: z.number(),
        latitude: z.number(),
      })
    )
    .nonempty(),
});

const mqttSourceSchema = z.object({
  ...sourceCommon,
  kind: z.literal("mqtt"),
  url: z.string().url(),
  topics: z.array(z.string()).nonempty().default(["#"]),
  topicFilter: z.string().default("4traffic"),
  clientId: z.string().default(`urban-sensor-ingest-${process.pid}`),
  keepaliveSec: z.number().int().positive().default(60),
  maxBuffered: z.number().int().positive().default(100_000),
  usernameEnv: z.string().default("MQTT_USER"),
  passwordEnv: z.string().default("MQTT_PASSWORD"),
});

const coordinateSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const inrixSourceSchema = z.object({
  ...sourceCommon,
  kind: z.literal("inrix"),
  tokenUrl: z.string().url().default("https://uas-api.inrix.com/v1/appToken"),
  segmentsUrl: z.string().url().default("https://segment-api.inrix.com/v1/segments/speed"),
  appIdEnv: z.string().default("INRIX_APP_ID"),
  hashTokenEnv: z.string().default("INRIX_HASH_TOKEN"),
  box: z
    .object({ northwest: coordinateSchema, southeast: coordinateSchema })
    .default({
      northwest: { latitude: 50.8061702, longitude: 6.0530048 },
      southeast: { latitude: 50.7414927, longitude: 6.1705204 },
    }),
  /** GeoJSON FeatureCollection of the road segments, keyed by XDSegID. */
  segmentsFile: z.string().min(1),
});

const lookbackSchema = z
  .object({
    days: z.number().int().positive().optional(),
    weeks: z.number().int().positive().optional(),
    months: z.number().int().positive().optional(),
    years: z.number().int().positive().optional(),
  })
  .refine((l) => Object.values(l).some((v) => v !== undefined), {
    message: "lookback needs at least one of days, weeks, months, years",
  });

const bucketScheduleSchema = z.object({
  width: z.enum(BUCKET_WIDTHS),
  aggregates: z.array(z.enum(BUCKET_AGGREGATES)).nonempty().default(["avg", "sum"]),
  intervalSec: z.number().positive(),
  lookback: lookbackSchema,
});

export const sourceConfigSchema = z.discriminatedUnion("kind", [
  frostSourceSchema,
  sensorCommunitySourceSchema,
  lanuvSourceSchema,
  mqttSourceSchema,
  inrixSourceSchema,
]);

export const configSchema = z.object({
  database: z
    .object({
      path: z.string().min(1).optional(),
      maxRetryCount: z.number().int().min(0).default(5),
      retryBackoffSec: z.number().min(0).default(10),
    })
    .default({}),
  ingest: z
    .object({
      subBatchSize: z.number().int().positive().default(100_000),
    })
    .default({}),
  maintenance: z
    .object({
      latestRefreshIntervalSec: z.number().positive().default(900),
      buckets: z
        .array(bucketScheduleSchema)
        .default([
          { width: "10min", aggregates: ["avg", "sum"], intervalSec: 300, lookback: { days: 1 } },
          { width: "1hour", aggregates: ["avg", "sum"], intervalSec: 1800, lookback: { weeks: 1 } },
          { width: "4hour", aggregates: ["avg", "sum"], intervalSec: 7200, lookback: { months: 1 } },
          { width: "1day", aggregates: ["avg", "sum"], intervalSec: 43_200, lookback: { years: 1 } },
          { width: "1week", aggregates: ["avg", "sum"], intervalSec: 86_400, lookback: { years: 30 } },
        ]),
    })
    .default({}),
  sources: z.array(sourceConfigSchema).nonempty(),
});

export type Config = z.infer<typeof configSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parseConfig(raw: unknown): Config {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(path: string): Config {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot read configuration ${path}: ${describeError(err)}`);
  }
  return parseConfig(raw);
}

/** First timestamp a source reads when its datastreams have nothing stored. */
export function fetchStart(source: SourceConfig): Date {
  switch (source.kind) {
    case "frost":
    case "sensor-community":
      return source.defaultStart;
    default:
      return new Date(0);
  }
}

/** Value of an environment variable named in the config; undefined when unset or empty. */
export function secretFromEnv(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}
