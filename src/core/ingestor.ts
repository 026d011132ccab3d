import { coerceNumeric, toUtcDate } from "../common/values";
import type { Logger } from "../common/logger";
import type { DatastreamStore, MeasurementRow, MeasurementStore } from "../db/store";
import type { IngestResult, Observation } from "../types";

export const DEFAULT_SUB_BATCH_SIZE = 100_000;

export interface IngestorOptions {
  datastreams: DatastreamStore;
  measurements: MeasurementStore;
  logger: Logger;
  subBatchSize?: number;
}

export function emptyIngestResult(): IngestResult {
  return { written: 0, skippedNonNumeric: 0, skippedDuplicate: 0, skippedInvalid: 0 };
}

/**
 * Writes observations for already-reconciled datastreams. A (datastream,
 * timestamp) pair is stored at most once: later duplicates in the same batch
 * replace earlier ones before writing, and pairs already stored are left
 * untouched.
 */
export class ObservationIngestor {
  private readonly datastreams: DatastreamStore;
  private readonly measurements: MeasurementStore;
  private readonly logger: Logger;
  private readonly subBatchSize: number;

  constructor(options: IngestorOptions) {
    this.datastreams = options.datastreams;
    this.measurements = options.measurements;
    this.logger = options.logger;
    this.subBatchSize = Math.max(1, options.subBatchSize ?? DEFAULT_SUB_BATCH_SIZE);
  }

  async ingest(observations: Observation[]): Promise<IngestResult> {
    const result = emptyIngestResult();
    const byKey = new Map<string, { datastreamId: number; timestamp: Date; value: number }>();

    for (const o of observations) {
      const timestamp = toUtcDate(o.timestamp);
      if (timestamp === null || !Number.isInteger(o.datastreamId)) {
        result.skippedInvalid++;
        continue;
      }
      const value = coerceNumeric(o.value);
      if (value === null) {
        result.skippedNonNumeric++;
        continue;
      }
      const key = `${o.datastreamId}@${timestamp.getTime()}`;
      if (byKey.has(key)) {
        result.skippedDuplicate++;
        // re-insert so the surviving entry takes the later position
        byKey.delete(key);
      }
      byKey.set(key, { datastreamId: o.datastreamId, timestamp, value });
    }

    const confidential = await this.datastreams.confidentiality([
      ...new Set([...byKey.values()].map((o) => o.datastreamId)),
    ]);

    const rows: MeasurementRow[] = [];
    for (const o of byKey.values()) {
      const flag = confidential.get(o.datastreamId);
      if (flag === undefined) {
        result.skippedInvalid++;
        continue;
      }
      rows.push({ ...o, confidential: flag });
    }

    for (let i = 0; i < rows.length; i += this.subBatchSize) {
      const batch = rows.slice(i, i + this.subBatchSize);
      const written = await this.measurements.insertIgnore(batch);
      result.written += written;
      result.skippedDuplicate += batch.length - written;
    }

    if (result.skippedNonNumeric || result.skippedInvalid) {
      this.logger
        .with()
        .num("skippedNonNumeric", result.skippedNonNumeric)
        .num("skippedInvalid", result.skippedInvalid)
        .logger()
        .warn("Dropped observations that cannot be stored");
    }
    this.logger
      .with()
      .num("received", observations.length)
      .num("written", result.written)
      .num("skippedDuplicate", result.skippedDuplicate)
      .logger()
      .debug("Ingested observations");
    return result;
  }
}
