import { describe, expect, it } from "vitest";
import type { FetchWindow, SourceAdapter, SourceBatch } from "../src/adapters/types";
import { MalformedPayloadError, TransientSourceError } from "../src/common/errors";
import { CategoryClassifier } from "../src/core/categories";
import { ObservationIngestor } from "../src/core/ingestor";
import { Pipeline, Watermark } from "../src/core/pipeline";
import { EntityReconciler } from "../src/core/reconciler";
import { captureLogs } from "./support/logs";
import { memoryStores } from "./support/memoryStore";

const SOURCE = "SensorCommunity";
const DEFAULT_START = new Date("2024-01-01T00:00:00Z");
const NOW = new Date("2024-02-01T12:00:00Z");

function batch(...points: Array<[string, string, string | number]>): SourceBatch {
  const sensorIds = [...new Set(points.map(([ds]) => ds.split("/")[0]))];
  return {
    sensors: sensorIds.map((id) => ({ source: SOURCE, externalId: id, description: "SDS011" })),
    datastreams: [...new Set(points.map(([ds]) => ds))].map((ds) => ({
      sensorExternalId: ds.split("/")[0],
      externalId: ds,
      categoryLabel: ds.split("/")[1],
      confidential: false,
    })),
    observations: points.map(([ds, timestamp, rawValue]) => ({
      datastreamExternalId: ds,
      timestamp,
      rawValue,
    })),
  };
}

class FakeAdapter implements SourceAdapter {
  readonly source = SOURCE;
  calls = 0;
  commits = 0;
  rollbacks = 0;
  /** `since` of datastream 1/P1 as seen by each fetch call. */
  readonly sinces: string[] = [];
  respond: (window: FetchWindow) => Promise<SourceBatch> = async () => batch();

  async fetch(window: FetchWindow): Promise<SourceBatch> {
    this.calls++;
    this.sinces.push(window.since("1/P1").toISOString());
    return this.respond(window);
  }

  commit() {
    this.commits++;
  }

  rollback() {
    this.rollbacks++;
  }
}

describe("Pipeline", () => {
  const logs = captureLogs();

  function setup(stores = memoryStores()) {
    const adapter = new FakeAdapter();
    const classifier = new CategoryClassifier();
    const pipeline = new Pipeline({
      adapter,
      reconciler: new EntityReconciler({
        sensors: stores.sensors,
        datastreams: stores.datastreams,
        classifier,
        logger: logs.logger,
      }),
      ingestor: new ObservationIngestor({
        datastreams: stores.datastreams,
        measurements: stores.measurements,
        logger: logs.logger,
      }),
      measurements: stores.measurements,
      logger: logs.logger,
      intervalMs: 60_000,
      defaultStart: DEFAULT_START,
      maxRetryCount: 2,
      retryBackoffMs: 1000,
      now: () => NOW,
      sleep: async () => undefined,
    });
    return { ...stores, adapter, pipeline };
  }

  it("stores a fetched batch and advances the watermark", async () => {
    const { adapter, pipeline, measurements } = setup();
    adapter.respond = async () =>
      batch(["1/P1", "2024-01-01T00:00:00Z", "5"], ["1/P1", "2024-01-01T00:05:00Z", "6"]);

    const report = await pipeline.run();

    expect(report).toMatchObject({
      source: SOURCE,
      status: "succeeded",
      fetched: { sensors: 1, datastreams: 1, observations: 2 },
      sensorsCreated: 1,
      datastreamsCreated: 1,
      unmappedObservations: 0,
      ingest: { written: 2, skippedNonNumeric: 0, skippedDuplicate: 0, skippedInvalid: 0 },
    });
    expect(measurements.valuesOf(1).map((v) => v.value)).toEqual([5, 6]);
    expect(pipeline.watermark.latestFor("1/P1")?.toISOString()).toBe("2024-01-01T00:05:00.000Z");
    expect(pipeline.watermark.lastSuccessAt).toEqual(NOW);
    expect(pipeline.state).toBe("idle");
    expect(pipeline.lastReport).toBe(report);
    expect(adapter.commits).toBe(1);

    await pipeline.run();
    expect(adapter.sinces).toEqual(["2024-01-01T00:00:00.000Z", "2024-01-01T00:05:00.000Z"]);
  });

  it("leaves the watermark alone when every fetch attempt times out", async () => {
    const { adapter, pipeline } = setup();
    adapter.respond = async () => batch(["1/P1", "2024-01-01T00:05:00Z", 6]);
    await pipeline.run();

    adapter.respond = async () => {
      throw new TransientSourceError("timeout of 60000ms exceeded");
    };
    const failed = await pipeline.run();

    expect(failed).toMatchObject({ status: "failed", error: "timeout of 60000ms exceeded" });
    expect(adapter.calls).toBe(4);
    expect(pipeline.watermark.latestFor("1/P1")?.toISOString()).toBe("2024-01-01T00:05:00.000Z");
    expect(adapter.rollbacks).toBe(0);
    expect(logs.messages("error")).toEqual(["Pipeline run failed; watermark unchanged"]);

    await pipeline.run();
    expect(adapter.sinces.slice(1)).toEqual(Array(6).fill("2024-01-01T00:05:00.000Z"));
  });

  it("does not retry malformed payloads", async () => {
    const { adapter, pipeline } = setup();
    adapter.respond = async () => {
      throw new MalformedPayloadError("unexpected body");
    };
    const report = await pipeline.run();
    expect(report?.status).toBe("failed");
    expect(adapter.calls).toBe(1);
  });

  it("starts from what the store already holds", async () => {
    const stores = memoryStores();
    const first = setup(stores);
    first.adapter.respond = async () => batch(["1/P1", "2024-01-03T00:00:00Z", 1]);
    await first.pipeline.run();

    const restarted = setup(stores);
    await restarted.pipeline.run();

    expect(restarted.adapter.sinces).toEqual(["2024-01-03T00:00:00.000Z"]);
  });

  it("rolls the adapter back when ingesting fails", async () => {
    const { adapter, pipeline, measurements } = setup();
    adapter.respond = async () => batch(["1/P1", "2024-01-01T00:05:00Z", 6]);
    measurements.failures.push(new Error("database is locked"));

    const report = await pipeline.run();

    expect(report).toMatchObject({ status: "failed", error: "database is locked" });
    expect(adapter.rollbacks).toBe(1);
    expect(adapter.commits).toBe(0);
    expect(pipeline.watermark.latestFor("1/P1")).toBeNull();
    expect(pipeline.watermark.lastSuccessAt).toBeNull();
    expect(pipeline.state).toBe("idle");
  });

  it("skips a tick while the previous run is active", async () => {
    const { adapter, pipeline } = setup();
    let release: (value: SourceBatch) => void = () => undefined;
    adapter.respond = () =>
      new Promise<SourceBatch>((resolve) => {
        release = resolve;
      });

    const running = pipeline.run();
    expect(pipeline.state).toBe("fetching");
    expect(await pipeline.run()).toBeNull();
    expect(logs.messages("warn")).toEqual(["Previous run still active; skipping tick"]);

    while (adapter.calls === 0) await new Promise((r) => setImmediate(r));
    release(batch());
    expect((await running)?.status).toBe("succeeded");
  });

  it("counts observations of datastreams that were not reconciled", async () => {
    const { adapter, pipeline } = setup();
    const fetched = batch(["1/P1", "2024-01-01T00:00:00Z", 1]);
    fetched.observations.push({
      datastreamExternalId: "9/P1",
      timestamp: "2024-01-01T00:00:00Z",
      rawValue: 2,
    });
    adapter.respond = async () => fetched;

    const report = await pipeline.run();

    expect(report?.unmappedObservations).toBe(1);
    expect(report?.ingest.written).toBe(1);
    expect(pipeline.watermark.latestFor("9/P1")).toBeNull();
    expect(logs.messages("warn")).toEqual([
      "Observations reference datastreams that were not reconciled",
    ]);
  });
});

describe("Watermark", () => {
  it("only moves forward", () => {
    const watermark = new Watermark(DEFAULT_START);
    watermark.advance("a", new Date("2024-01-05T00:00:00Z"));
    watermark.advance("a", new Date("2024-01-02T00:00:00Z"));
    expect(watermark.latestFor("a")?.toISOString()).toBe("2024-01-05T00:00:00.000Z");
  });

  it("hands out windows that later advances do not change", () => {
    const watermark = new Watermark(DEFAULT_START);
    const window = watermark.window();
    watermark.advance("42", new Date("2024-01-05T00:00:00Z"));
    expect(window.since(42)).toEqual(DEFAULT_START);
    expect(watermark.window().since(42).toISOString()).toBe("2024-01-05T00:00:00.000Z");
  });
});
