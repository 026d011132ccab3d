import type { FetchWindow, SourceAdapter, SourceBatch } from "../adapters/types";
import { describeError } from "../common/errors";
import type { Logger } from "../common/logger";
import { withRetry } from "../common/retry";
import { toUtcDate } from "../common/values";
import type { MeasurementStore } from "../db/store";
import {
  normalizeExternalId,
  type ExternalId,
  type IngestResult,
  type Observation,
  type RawExternalId,
} from "../types";
import { emptyIngestResult, type ObservationIngestor } from "./ingestor";
import type { EntityReconciler, ReconciledEntities } from "./reconciler";

export type PipelineState = "idle" | "fetching" | "reconciling" | "ingesting";

export interface PipelineSettings {
  intervalMs: number;
  defaultStart: Date;
  /** Fetch attempts after the first one. */
  maxRetryCount: number;
  retryBackoffMs: number;
}

export interface PipelineOptions extends PipelineSettings {
  adapter: SourceAdapter;
  reconciler: EntityReconciler;
  ingestor: ObservationIngestor;
  measurements: MeasurementStore;
  logger: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface RunReport {
  source: string;
  status: "succeeded" | "failed";
  startedAt: Date;
  finishedAt: Date;
  fetched: { sensors: number; datastreams: number; observations: number };
  sensorsCreated: number;
  datastreamsCreated: number;
  unmappedObservations: number;
  ingest: IngestResult;
  error?: string;
}

/** Committed progress of one source; only a fully successful run moves it. */
export class Watermark {
  lastSuccessAt: Date | null = null;
  private readonly latest = new Map<ExternalId, Date>();

  constructor(readonly defaultStart: Date) {}

  latestFor(datastreamExternalId: RawExternalId): Date | null {
    const id = normalizeExternalId(datastreamExternalId);
    return id === null ? null : this.latest.get(id) ?? null;
  }

  advance(datastreamExternalId: ExternalId, timestamp: Date) {
    const current = this.latest.get(datastreamExternalId);
    if (!current || current < timestamp) this.latest.set(datastreamExternalId, timestamp);
  }

  /** Frozen view for one fetch, unaffected by later advances. */
  window(): FetchWindow {
    const latest = new Map(this.latest);
    const defaultStart = this.defaultStart;
    return {
      defaultStart,
      lastSuccessAt: this.lastSuccessAt,
      since(datastreamExternalId) {
        const id = normalizeExternalId(datastreamExternalId);
        return (id === null ? undefined : latest.get(id)) ?? defaultStart;
      },
    };
  }
}

/**
 * One source's fetch -> reconcile -> ingest cycle. A run moves through
 * fetching, reconciling and ingesting and always ends back in idle.
 */
export class Pipeline {
  readonly name: string;
  readonly intervalMs: number;
  private readonly adapter: SourceAdapter;
  private readonly reconciler: EntityReconciler;
  private readonly ingestor: ObservationIngestor;
  private readonly measurements: MeasurementStore;
  private readonly logger: Logger;
  private readonly settings: PipelineSettings;
  private readonly now: () => Date;
  private readonly sleep: ((ms: number) => Promise<unknown>) | undefined;

  private _state: PipelineState = "idle";
  private _lastReport: RunReport | null = null;
  private watermarkLoaded = false;
  readonly watermark: Watermark;

  constructor(options: PipelineOptions) {
    this.adapter = options.adapter;
    this.name = options.adapter.source;
    this.intervalMs = options.intervalMs;
    this.reconciler = options.reconciler;
    this.ingestor = options.ingestor;
    this.measurements = options.measurements;
    this.logger = options.logger;
    this.settings = options;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep;
    this.watermark = new Watermark(options.defaultStart);
  }

  get state(): PipelineState {
    return this._state;
  }

  get lastReport(): RunReport | null {
    return this._lastReport;
  }

  /**
   * Runs one tick to completion. Failures are logged and reported, never
   * thrown. Returns null without doing anything while a run is in progress.
   */
  async run(): Promise<RunReport | null> {
    if (this._state !== "idle") {
      this.logger
        .with()
        .str("source", this.name)
        .str("state", this._state)
        .logger()
        .warn("Previous run still active; skipping tick");
      return null;
    }

    const startedAt = this.now();
    const report: RunReport = {
      source: this.name,
      status: "failed",
      startedAt,
      finishedAt: startedAt,
      fetched: { sensors: 0, datastreams: 0, observations: 0 },
      sensorsCreated: 0,
      datastreamsCreated: 0,
      unmappedObservations: 0,
      ingest: emptyIngestResult(),
    };
    let fetched = false;

    try {
      this._state = "fetching";
      await this.loadWatermark();
      const batch = await this.fetch();
      fetched = true;
      report.fetched = {
        sensors: batch.sensors.length,
        datastreams: batch.datastreams.length,
        observations: batch.observations.length,
      };

      this._state = "reconciling";
      const reconciled = await this.reconciler.reconcile(this.name, batch);
      report.sensorsCreated = reconciled.sensors.created;
      report.datastreamsCreated = reconciled.datastreams.created;

      this._state = "ingesting";
      const { observations, latest, unmapped } = this.mapObservations(batch, reconciled);
      report.unmappedObservations = unmapped;
      report.ingest = await this.ingestor.ingest(observations);

      for (const [externalId, ts] of latest) this.watermark.advance(externalId, ts);
      this.watermark.lastSuccessAt = startedAt;
      this.adapter.commit?.();
      report.status = "succeeded";
    } catch (err) {
      if (fetched) this.adapter.rollback?.();
      report.error = describeError(err);
      this.logger
        .with()
        .str("source", this.name)
        .str("stage", this._state)
        .error(err)
        .logger()
        .error("Pipeline run failed; watermark unchanged");
    } finally {
      this._state = "idle";
    }

    report.finishedAt = this.now();
    this._lastReport = report;
    if (report.status === "succeeded") {
      this.logger
        .with()
        .str("source", this.name)
        .num("sensorsCreated", report.sensorsCreated)
        .num("datastreamsCreated", report.datastreamsCreated)
        .num("written", report.ingest.written)
        .num("skippedDuplicate", report.ingest.skippedDuplicate)
        .num("unmapped", report.unmappedObservations)
        .num("durationMs", report.finishedAt.getTime() - startedAt.getTime())
        .logger()
        .info("Pipeline run finished");
    }
    return report;
  }

  private async loadWatermark() {
    if (this.watermarkLoaded) return;
    const stored = await withRetry(() => this.measurements.latestTimestamps(this.name), {
      attempts: this.settings.maxRetryCount + 1,
      backoffMs: this.settings.retryBackoffMs,
      label: `${this.name} watermark load`,
      logger: this.logger,
      sleep: this.sleep,
    });
    for (const [externalId, ts] of stored) this.watermark.advance(externalId, ts);
    this.watermarkLoaded = true;
  }

  private fetch(): Promise<SourceBatch> {
    const window = this.watermark.window();
    return withRetry(() => this.adapter.fetch(window), {
      attempts: this.settings.maxRetryCount + 1,
      backoffMs: this.settings.retryBackoffMs,
      label: `${this.name} fetch`,
      logger: this.logger,
      sleep: this.sleep,
    });
  }

  private mapObservations(batch: SourceBatch, reconciled: ReconciledEntities) {
    const ids = reconciled.datastreams.ids;
    const observations: Observation[] = [];
    const latest = new Map<ExternalId, Date>();
    let unmapped = 0;

    for (const o of batch.observations) {
      const externalId = normalizeExternalId(o.datastreamExternalId);
      const datastreamId = externalId === null ? undefined : ids.get(externalId);
      if (externalId === null || datastreamId === undefined) {
        unmapped++;
        continue;
      }
      observations.push({ datastreamId, timestamp: o.timestamp, value: o.rawValue });
      const ts = toUtcDate(o.timestamp);
      if (ts) {
        const current = latest.get(externalId);
        if (!current || current < ts) latest.set(externalId, ts);
      }
    }

    if (unmapped) {
      this.logger
        .with()
        .str("source", this.name)
        .num("unmapped", unmapped)
        .logger()
        .warn("Observations reference datastreams that were not reconciled");
    }
    return { observations, latest, unmapped };
  }
}
