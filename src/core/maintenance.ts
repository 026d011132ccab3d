import { sub, type Duration } from "date-fns";
import type { Logger } from "../common/logger";
import type { MeasurementStore } from "../db/store";
import type { BucketAggregate, BucketWidth } from "../types";
import type { ScheduledJob } from "./scheduler";

/** Rebuilds the per-datastream latest value table. */
export class LatestMeasurementsRefresh implements ScheduledJob {
  readonly name = "latest-measurements-refresh";

  constructor(
    private readonly measurements: MeasurementStore,
    readonly intervalMs: number,
    private readonly logger: Logger
  ) {}

  async run(): Promise<number> {
    const started = Date.now();
    const rows = await this.measurements.refreshLatest();
    this.logger
      .with()
      .num("datastreams", rows)
      .num("durationMs", Date.now() - started)
      .logger()
      .info("Refreshed latest measurements");
    return rows;
  }
}

export interface BucketSchedule {
  width: BucketWidth;
  aggregate: BucketAggregate;
  intervalMs: number;
  /** How far back from now the table reaches. */
  lookback: Duration;
}

/**
 * Rebuilds one bucketed aggregate table over a rolling lookback. Coarser
 * buckets reach further back and are rebuilt less often.
 */
export class BucketedMeasurementsRefresh implements ScheduledJob {
  readonly name: string;
  readonly intervalMs: number;

  constructor(
    private readonly measurements: MeasurementStore,
    private readonly schedule: BucketSchedule,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.name = `bucketed-measurements-${schedule.width}-${schedule.aggregate}`;
    this.intervalMs = schedule.intervalMs;
  }

  async run(): Promise<number> {
    const { width, aggregate, lookback } = this.schedule;
    const started = this.now();
    const since = sub(started, lookback);
    const rows = await this.measurements.refreshBuckets({ width, aggregate, since });
    this.logger
      .with()
      .str("width", width)
      .str("aggregate", aggregate)
      .str("since", since.toISOString())
      .num("buckets", rows)
      .num("durationMs", this.now().getTime() - started.getTime())
      .logger()
      .info("Refreshed bucketed measurements");
    return rows;
  }
}
