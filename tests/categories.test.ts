import { describe, expect, it } from "vitest";
import { UnclassifiableCategoryError } from "../src/common/errors";
import { CategoryClassifier } from "../src/core/categories";

describe("CategoryClassifier", () => {
  const classifier = new CategoryClassifier();

  it("maps vendor labels case-insensitively", () => {
    expect(classifier.classify("4traffic sensors", "temp")).toEqual({
      type: "temperature",
      unit: "°C",
    });
    expect(classifier.classify("4traffic sensors", "TEMP")).toEqual({
      type: "temperature",
      unit: "°C",
    });
    expect(classifier.classify("SensorCommunity", "P2")).toEqual({
      type: "PM2.5",
      unit: "µg/m³",
    });
  });

  it("uses the label itself as type when the rule names none", () => {
    expect(classifier.classify("FROST", "E-Ladepunkt")).toEqual({
      type: "E-Ladepunkt",
      unit: "Occupancy status",
    });
  });

  it("matches pattern rules", () => {
    expect(classifier.classify("FROST", "cC7")).toEqual({
      type: "motor traffic measurement",
      unit: "Vehicles Counted",
    });
  });

  it("returns null for unknown labels and sources", () => {
    expect(classifier.classify("FROST", "Fahrrad")).toBeNull();
    expect(classifier.classify("nowhere", "temp")).toBeNull();
    expect(classifier.hasSource("LANUV")).toBe(true);
    expect(classifier.hasSource("nowhere")).toBe(false);
  });

  it("lets the first matching rule win", () => {
    const custom = new CategoryClassifier({
      demo: [
        { labels: ["x1"], type: "first", unit: "a" },
        { pattern: "^x\\d$", type: "second", unit: "b" },
      ],
    });
    expect(custom.classify("demo", "x1")).toEqual({ type: "first", unit: "a" });
    expect(custom.classify("demo", "x2")).toEqual({ type: "second", unit: "b" });
  });

  it("throws a typed error from classifyOrThrow", () => {
    expect(() => classifier.classifyOrThrow("LANUV", "CO")).toThrow(UnclassifiableCategoryError);
    expect(() => classifier.classifyOrThrow("LANUV", "CO")).toThrow(
      "No category rule for 'CO' in source LANUV"
    );
  });

  it("rejects malformed tables", () => {
    expect(() => new CategoryClassifier({ demo: [{ unit: "a" }] })).toThrow(
      "rule needs labels or a pattern"
    );
  });
});
