import type { DuckDBConnection, DuckDBValue } from "@duckdb/node-api";
import { UniqueViolationError, describeError, isUniqueViolation } from "../common/errors";
import { toSqlTimestamp } from "../common/values";
import type { BucketAggregate, BucketWidth, ExternalId } from "../types";
import type { Database } from "./connection";
import type {
  BucketRefresh,
  DatastreamStore,
  DatastreamTypeRow,
  IdentityRow,
  MeasurementRow,
  MeasurementStore,
  NewDatastream,
  NewSensor,
  SensorStore,
} from "./store";

type Row = Record<string, DuckDBValue>;

function toInt(v: DuckDBValue): number {
  if (typeof v === "bigint") return Number(v);
  if (typeof v === "number") return v;
  throw new TypeError(`Expected integer column, got ${String(v)}`);
}

function toText(v: DuckDBValue): string {
  return typeof v === "string" ? v : String(v);
}

function toNullableText(v: DuckDBValue): string | null {
  return v === null ? null : toText(v);
}

// "($1::TEXT, $2::DOUBLE), ($3::TEXT, $4::DOUBLE)" for rowCount rows
function valuesClause(rowCount: number, casts: string[]): string {
  const rows: string[] = [];
  let n = 1;
  for (let r = 0; r < rowCount; r++) {
    rows.push(`(${casts.map((c) => `$${n++}::${c}`).join(", ")})`);
  }
  return rows.join(", ");
}

function inList(count: number, cast: string, offset = 0): string {
  return Array.from({ length: count }, (_, i) => `$${i + 1 + offset}::${cast}`).join(", ");
}

async function readRows(
  conn: DuckDBConnection,
  sql: string,
  params: DuckDBValue[] = []
): Promise<Row[]> {
  const reader = await conn.runAndReadAll(sql, params);
  return reader.getRowObjects();
}

function toIdentityRows(rows: Row[]): IdentityRow[] {
  return rows.map((r) => ({ id: toInt(r.id), externalId: toText(r.external_id) }));
}

function asUniqueViolation(err: unknown, table: string, rowCount: number): unknown {
  if (!isUniqueViolation(err) || err instanceof UniqueViolationError) return err;
  return new UniqueViolationError(
    `Insert into ${table} collided with an existing key: ${describeError(err)}`,
    { table, rows: rowCount },
    { cause: err }
  );
}

const SENSOR_COLUMNS = [
  ["source", "TEXT"],
  ["external_id", "TEXT"],
  ["description", "TEXT"],
  ["longitude", "DOUBLE"],
  ["latitude", "DOUBLE"],
  ["geometry", "TEXT"],
  ["confidential", "BOOLEAN"],
] as const;

function sensorParams(s: NewSensor): DuckDBValue[] {
  return [
    s.source,
    s.externalId,
    s.description,
    s.longitude,
    s.latitude,
    s.geometry,
    s.confidential,
  ];
}

export class SensorRepository implements SensorStore {
  constructor(private db: Database) {}

  async findByExternalIds(source: string, externalIds: ExternalId[]): Promise<IdentityRow[]> {
    if (!externalIds.length) return [];
    const rows = await this.db.withConnection((conn) =>
      readRows(
        conn,
        `select id, external_id from sensors
         where source = $1::TEXT and external_id in (${inList(externalIds.length, "TEXT", 1)})`,
        [source, ...externalIds]
      )
    );
    return toIdentityRows(rows);
  }

  async insertMany(sensors: NewSensor[]): Promise<IdentityRow[]> {
    if (!sensors.length) return [];
    const columns = SENSOR_COLUMNS.map(([name]) => name).join(", ");
    const casts = SENSOR_COLUMNS.map(([, cast]) => cast);
    try {
      const rows = await this.db.withTransaction((conn) =>
        readRows(
          conn,
          `insert into sensors(${columns}) values ${valuesClause(sensors.length, casts)}
           returning id, external_id`,
          sensors.flatMap(sensorParams)
        )
      );
      return toIdentityRows(rows);
    } catch (err) {
      throw asUniqueViolation(err, "sensors", sensors.length);
    }
  }

  async insertIgnore(sensor: NewSensor): Promise<number | null> {
    const columns = SENSOR_COLUMNS.map(([name]) => name).join(", ");
    const casts = SENSOR_COLUMNS.map(([, cast]) => cast);
    try {
      const rows = await this.db.withTransaction((conn) =>
        readRows(
          conn,
          `insert into sensors(${columns}) values ${valuesClause(1, casts)}
           on conflict (source, external_id) do nothing
           returning id`,
          sensorParams(sensor)
        )
      );
      return rows.length ? toInt(rows[0].id) : null;
    } catch (err) {
      throw asUniqueViolation(err, "sensors", 1);
    }
  }
}

const DATASTREAM_COLUMNS = [
  ["sensor_id", "INTEGER"],
  ["external_id", "TEXT"],
  ["type", "TEXT"],
  ["unit", "TEXT"],
  ["confidential", "BOOLEAN"],
] as const;

function datastreamParams(d: NewDatastream): DuckDBValue[] {
  return [d.sensorId, d.externalId, d.type, d.unit, d.confidential];
}

export class DatastreamRepository implements DatastreamStore {
  constructor(private db: Database) {}

  // A datastream's namespace is the source of the sensor owning it
  async findByExternalIds(source: string, externalIds: ExternalId[]): Promise<IdentityRow[]> {
    if (!externalIds.length) return [];
    const rows = await this.db.withConnection((conn) =>
      readRows(
        conn,
        `select d.id, d.external_id
         from datastreams d join sensors s on s.id = d.sensor_id
         where s.source = $1::TEXT and d.external_id in (${inList(externalIds.length, "TEXT", 1)})
         order by d.id`,
        [source, ...externalIds]
      )
    );
    return toIdentityRows(rows);
  }

  async insertMany(datastreams: NewDatastream[]): Promise<IdentityRow[]> {
    if (!datastreams.length) return [];
    const columns = DATASTREAM_COLUMNS.map(([name]) => name).join(", ");
    const casts = DATASTREAM_COLUMNS.map(([, cast]) => cast);
    try {
      const rows = await this.db.withTransaction((conn) =>
        readRows(
          conn,
          `insert into datastreams(${columns}) values ${valuesClause(datastreams.length, casts)}
           returning id, external_id`,
          datastreams.flatMap(datastreamParams)
        )
      );
      return toIdentityRows(rows);
    } catch (err) {
      throw asUniqueViolation(err, "datastreams", datastreams.length);
    }
  }

  async insertIgnore(datastream: NewDatastream): Promise<number | null> {
    const columns = DATASTREAM_COLUMNS.map(([name]) => name).join(", ");
    const casts = DATASTREAM_COLUMNS.map(([, cast]) => cast);
    try {
      const rows = await this.db.withTransaction((conn) =>
        readRows(
          conn,
          `insert into datastreams(${columns}) values ${valuesClause(1, casts)}
           on conflict (sensor_id, external_id) do nothing
           returning id`,
          datastreamParams(datastream)
        )
      );
      return rows.length ? toInt(rows[0].id) : null;
    } catch (err) {
      throw asUniqueViolation(err, "datastreams", 1);
    }
  }

  async confidentiality(ids: number[]): Promise<Map<number, boolean>> {
    const result = new Map<number, boolean>();
    if (!ids.length) return result;
    const rows = await this.db.withConnection((conn) =>
      readRows(
        conn,
        `select id, confidential from datastreams where id in (${inList(ids.length, "INTEGER")})`,
        ids
      )
    );
    for (const r of rows) result.set(toInt(r.id), r.confidential === true);
    return result;
  }

  async typesForSensors(sensorIds: number[]): Promise<DatastreamTypeRow[]> {
    if (!sensorIds.length) return [];
    const rows = await this.db.withConnection((conn) =>
      readRows(
        conn,
        `select id, sensor_id, external_id, type from datastreams
         where sensor_id in (${inList(sensorIds.length, "INTEGER")})
         order by id`,
        sensorIds
      )
    );
    return rows.map((r) => ({
      id: toInt(r.id),
      sensorId: toInt(r.sensor_id),
      externalId: toNullableText(r.external_id),
      type: toText(r.type),
    }));
  }
}

const MEASUREMENT_CASTS = ["INTEGER", "TIMESTAMP", "DOUBLE", "BOOLEAN"];

const BUCKET_INTERVALS: Record<BucketWidth, string> = {
  "10min": "10 minutes",
  "1hour": "1 hour",
  "4hour": "4 hours",
  "1day": "1 day",
  "1week": "7 days",
};

export function bucketTableName(width: BucketWidth, aggregate: BucketAggregate): string {
  return `bucketed_measurements_${width}_${aggregate}`;
}

// keeps each statement's parameter list bounded
const MEASUREMENT_ROWS_PER_STATEMENT = 1000;

export class MeasurementRepository implements MeasurementStore {
  constructor(private db: Database) {}

  async insertIgnore(rows: MeasurementRow[]): Promise<number> {
    if (!rows.length) return 0;
    return this.db.withTransaction(async (conn) => {
      let written = 0;
      for (let i = 0; i < rows.length; i += MEASUREMENT_ROWS_PER_STATEMENT) {
        const chunk = rows.slice(i, i + MEASUREMENT_ROWS_PER_STATEMENT);
        const inserted = await readRows(
          conn,
          `insert into measurements(datastream_id, ts, value, confidential)
           values ${valuesClause(chunk.length, MEASUREMENT_CASTS)}
           on conflict (datastream_id, ts) do nothing
           returning datastream_id`,
          chunk.flatMap((m) => [
            m.datastreamId,
            toSqlTimestamp(m.timestamp),
            m.value,
            m.confidential,
          ])
        );
        written += inserted.length;
      }
      return written;
    });
  }

  async latestTimestamps(source: string): Promise<Map<ExternalId, Date>> {
    const rows = await this.db.withConnection((conn) =>
      readRows(
        conn,
        `select d.external_id, epoch_ms(max(m.ts)) as latest_ms
         from measurements m
         join datastreams d on d.id = m.datastream_id
         join sensors s on s.id = d.sensor_id
         where s.source = $1::TEXT and d.external_id is not null
         group by d.external_id`,
        [source]
      )
    );
    const result = new Map<ExternalId, Date>();
    for (const r of rows) {
      result.set(toText(r.external_id), new Date(toInt(r.latest_ms)));
    }
    return result;
  }

  async refreshLatest(): Promise<number> {
    return this.db.withConnection(async (conn) => {
      await conn.run(
        `create or replace table latest_measurements as
         select datastream_id,
                max(ts) as ts,
                arg_max(value, ts) as value,
                arg_max(confidential, ts) as confidential
         from measurements
         group by datastream_id`
      );
      const rows = await readRows(conn, `select count(*) as n from latest_measurements`);
      return toInt(rows[0].n);
    });
  }

  async refreshBuckets({ width, aggregate, since }: BucketRefresh): Promise<number> {
    const table = bucketTableName(width, aggregate);
    // width and aggregate are closed unions, since is rendered by toSqlTimestamp
    return this.db.withConnection(async (conn) => {
      await conn.run(
        `create or replace table ${table} as
         select time_bucket(interval '${BUCKET_INTERVALS[width]}', ts) as bucket,
                ${aggregate}(value) as value,
                bool_or(confidential) as confidential,
                datastream_id
         from measurements
         where ts >= timestamp '${toSqlTimestamp(since)}'
         group by bucket, datastream_id
         order by bucket, datastream_id`
      );
      const rows = await readRows(conn, `select count(*) as n from ${table}`);
      return toInt(rows[0].n);
    });
  }
}
