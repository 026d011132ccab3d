import { describe, expect, it } from "vitest";
import { UniqueViolationError } from "../src/common/errors";
import { CategoryClassifier } from "../src/core/categories";
import { EntityReconciler } from "../src/core/reconciler";
import type { IdentityRow, NewSensor } from "../src/db/store";
import type { ObservedDatastream, ObservedSensor } from "../src/types";
import { captureLogs } from "./support/logs";
import { MemoryDatastreamStore, MemorySensorStore } from "./support/memoryStore";

const classifier = new CategoryClassifier();

function sensor(source: string, externalId: ObservedSensor["externalId"], extra: Partial<ObservedSensor> = {}): ObservedSensor {
  return { source, externalId, description: `sensor ${String(externalId)}`, ...extra };
}

function datastream(
  sensorExternalId: ObservedDatastream["sensorExternalId"],
  externalId: ObservedDatastream["externalId"],
  categoryLabel: string
): ObservedDatastream {
  return { sensorExternalId, externalId, categoryLabel, confidential: false };
}

describe("EntityReconciler", () => {
  const logs = captureLogs();

  function setup(sensors = new MemorySensorStore(), firstDatastreamId = 1) {
    const datastreams = new MemoryDatastreamStore(sensors, firstDatastreamId);
    const reconciler = new EntityReconciler({
      sensors,
      datastreams,
      classifier,
      logger: logs.logger,
      recoverBackoffMs: 0,
    });
    return { sensors, datastreams, reconciler };
  }

  it("creates sensor and datastream for a new FROST series", async () => {
    const { sensors, datastreams, reconciler } = setup(undefined, 100);

    const result = await reconciler.reconcile("FROST", {
      sensors: [sensor("FROST", "42")],
      datastreams: [datastream("42", "42", "temperature")],
    });

    expect([...result.datastreams.ids]).toEqual([["42", 100]]);
    expect(result.sensors.created).toBe(1);
    expect(result.datastreams.created).toBe(1);
    expect(sensors.rows).toHaveLength(1);
    expect(datastreams.rows).toEqual([
      {
        id: 100,
        sensorId: 1,
        externalId: "42",
        type: "temperature",
        unit: "°C",
        confidential: false,
      },
    ]);
  });

  it("only creates what is not stored yet", async () => {
    const { sensors, reconciler } = setup();
    await reconciler.reconcileSensors("FROST", [sensor("FROST", "a")]);

    const result = await reconciler.reconcileSensors("FROST", [
      sensor("FROST", "a"),
      sensor("FROST", "b"),
      sensor("FROST", "b"),
    ]);

    expect([...result.ids]).toEqual([
      ["a", 1],
      ["b", 2],
    ]);
    expect(result.created).toBe(1);
    expect(sensors.rows.map((s) => s.externalId)).toEqual(["a", "b"]);
  });

  it("is a no-op when everything exists", async () => {
    const { sensors, datastreams, reconciler } = setup();
    const observed = {
      sensors: [sensor("SensorCommunity", 7)],
      datastreams: [datastream(7, "7/P1", "P1")],
    };
    await reconciler.reconcile("SensorCommunity", observed);
    const again = await reconciler.reconcile("SensorCommunity", observed);

    expect(again.sensors.created).toBe(0);
    expect(again.datastreams.created).toBe(0);
    expect([...again.datastreams.ids]).toEqual([["7/P1", 1]]);
    expect(sensors.rows).toHaveLength(1);
    expect(datastreams.rows).toHaveLength(1);
  });

  it("keeps the same external id apart across sources", async () => {
    const { sensors, reconciler } = setup();
    const frost = await reconciler.reconcileSensors("FROST", [sensor("FROST", "42")]);
    const lanuv = await reconciler.reconcileSensors("LANUV", [sensor("LANUV", "42")]);
    expect(frost.ids.get("42")).toBe(1);
    expect(lanuv.ids.get("42")).toBe(2);
    expect(sensors.rows).toHaveLength(2);
  });

  it("gives concurrent callers one id for the same new sensor", async () => {
    const { sensors, reconciler } = setup();

    const [first, second] = await Promise.all([
      reconciler.reconcileSensors("X", [sensor("X", "9")]),
      reconciler.reconcileSensors("X", [sensor("X", "9")]),
    ]);

    expect(first.ids.get("9")).toBe(1);
    expect(second.ids.get("9")).toBe(1);
    expect(sensors.rows).toHaveLength(1);
    expect([first.created + first.recovered, second.created + second.recovered]).toEqual([1, 1]);
    expect(logs.messages("info")).toContain(
      "Bulk create collided with existing rows; creating one by one"
    );
  });

  it("skips an entity that is neither created nor found after a conflict", async () => {
    class VanishingStore extends MemorySensorStore {
      override async insertMany(): Promise<IdentityRow[]> {
        throw new UniqueViolationError("duplicate key");
      }
      override async insertIgnore(_row: NewSensor): Promise<number | null> {
        return null;
      }
    }
    const { reconciler } = setup(new VanishingStore());

    const result = await reconciler.reconcileSensors("X", [sensor("X", "9")]);

    expect(result.ids.size).toBe(0);
    expect(result.skipped).toBe(1);
    expect(logs.messages("error")).toEqual([
      "Entity neither created nor found after conflict; skipping",
    ]);
  });

  it("propagates store failures that are not key conflicts", async () => {
    class BrokenStore extends MemorySensorStore {
      override async insertMany(): Promise<IdentityRow[]> {
        throw new Error("disk full");
      }
    }
    const { reconciler } = setup(new BrokenStore());
    await expect(reconciler.reconcileSensors("X", [sensor("X", "1")])).rejects.toThrow(
      "disk full"
    );
  });

  it("skips sensors without an external id", async () => {
    const { sensors, reconciler } = setup();
    const result = await reconciler.reconcileSensors("FROST", [
      sensor("FROST", null),
      sensor("FROST", -1),
      sensor("FROST", "ok"),
    ]);
    expect(result.skipped).toBe(2);
    expect(sensors.rows.map((s) => s.externalId)).toEqual(["ok"]);
    expect(logs.messages("error")).toEqual([
      "Observed sensor has no external id; skipping",
      "Observed sensor has no external id; skipping",
    ]);
  });

  it("stores sensors with broken geometry without location", async () => {
    const { sensors, reconciler } = setup();
    await reconciler.reconcileSensors("FROST", [
      sensor("FROST", "1", { rawGeometry: { type: "Polygon", coordinates: [[[0, 0], [1, 1]]] } }),
    ]);
    expect(sensors.rows[0]).toMatchObject({ longitude: null, latitude: null, geometry: null });
    expect(logs.messages("warn")).toEqual([
      "Could not resolve sensor geometry; storing without location",
    ]);
  });

  it("derives location from geometry, explicit coordinates first", async () => {
    const { sensors, reconciler } = setup();
    const square = {
      type: "Polygon",
      coordinates: [[[0, 0], [2, 0], [2, 2], [0, 2], [0, 0]]],
    };
    await reconciler.reconcileSensors("FROST", [
      sensor("FROST", "area", { rawGeometry: square }),
      sensor("FROST", "pinned", { rawGeometry: square, longitude: 5, latitude: 6 }),
      sensor("FROST", "point", { longitude: 6.1, latitude: 50.8 }),
    ]);

    const [area, pinned, point] = sensors.rows;
    expect(area.longitude).toBeCloseTo(1);
    expect(area.latitude).toBeCloseTo(1);
    expect(pinned).toMatchObject({ longitude: 5, latitude: 6 });
    expect(pinned.geometry).toBe(area.geometry);
    expect(point).toMatchObject({
      longitude: 6.1,
      latitude: 50.8,
      geometry: '{"type":"Point","coordinates":[6.1,50.8]}',
    });
  });

  it("skips datastreams of unknown sensors and unknown categories", async () => {
    const { datastreams, reconciler } = setup();
    await reconciler.reconcileSensors("FROST", [sensor("FROST", "s1")]);

    const result = await reconciler.reconcileDatastreams("FROST", [
      datastream("ghost", "d1", "temperature"),
      datastream("s1", "d2", "Fahrrad"),
      datastream("s1", "d3", "Bike"),
    ]);

    expect([...result.ids]).toEqual([["d3", 1]]);
    expect(result.skipped).toBe(2);
    expect(datastreams.rows[0]).toMatchObject({ type: "bike traffic measurement" });
    expect(logs.messages("error")).toEqual([
      "Owning sensor of datastream is unknown; skipping",
      "Datastream category cannot be classified; skipping",
    ]);
  });

  it("warns but keeps a second datastream of the same type", async () => {
    const source = "4traffic sensors";
    const { datastreams, reconciler } = setup();

    const result = await reconciler.reconcile(source, {
      sensors: [sensor(source, "box1")],
      datastreams: [
        datastream("box1", "box1/temp", "temp"),
        datastream("box1", "box1/temperature", "temperature"),
      ],
    });

    expect(result.datastreams.created).toBe(2);
    expect(datastreams.rows.map((d) => d.type)).toEqual(["temperature", "temperature"]);
    const warning = logs.lines.find((l) => l.level === "warn");
    expect(warning).toMatchObject({
      message: "Sensor already has a datastream of this type",
      externalId: "box1/temperature",
      collidesWith: "box1/temp",
    });
  });
});
