import { DuckDBConnection } from "@duckdb/node-api";

export async function createSchema(
  connection: DuckDBConnection
): Promise<void> {
  await connection.run(`create sequence if not exists sensors_id_seq start 1`);
  await connection.run(
    `create sequence if not exists datastreams_id_seq start 1`
  );

  // sensors: (source, external_id) identifies reconciler-created rows;
  // a null external_id (manually created sensor) is outside the constraint
  await connection.run(`create table if not exists sensors (
    id integer primary key default nextval('sensors_id_seq'),
    source text not null,
    external_id text,
    description text not null default '',
    longitude double,
    latitude double,
    geometry text,
    confidential boolean not null default true,
    unique(source, external_id)
  )`);

  await connection.run(`create table if not exists datastreams (
    id integer primary key default nextval('datastreams_id_seq'),
    sensor_id integer not null references sensors(id),
    external_id text,
    type text not null,
    unit text not null,
    confidential boolean not null default true,
    unique(sensor_id, external_id)
  )`);

  // measurements: append-only, natural key (datastream_id, ts)
  await connection.run(`create table if not exists measurements (
    datastream_id integer not null references datastreams(id),
    ts timestamp not null,
    value double not null,
    confidential boolean not null default true,
    ingested_at timestamp not null default current_timestamp,
    primary key(datastream_id, ts)
  )`);

  // refreshed by the maintenance job, read by dashboards
  await connection.run(`create table if not exists latest_measurements (
    datastream_id integer not null,
    ts timestamp not null,
    value double not null,
    confidential boolean not null
  )`);

  await connection.run(
    `create index if not exists idx_sensors_source on sensors(source)`
  );
  await connection.run(
    `create index if not exists idx_datastreams_sensor on datastreams(sensor_id)`
  );
}
