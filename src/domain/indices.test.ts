import { describe, expect, it } from "vitest";
import {
  adjustedAlkalinity,
  computeIndices,
  temperatureFactor,
  type BalanceInputs
} from "./indices";
import type { ChemistrySample } from "./types";

const typicalSample: ChemistrySample = {
  temperatureF: 84,
  ph: 7.5,
  freeChlorinePpm: 5,
  totalAlkalinityPpm: 80,
  calciumHardnessPpm: 300,
  cyanuricAcidPpm: 40
};

describe("temperatureFactor", () => {
  it("steps at each breakpoint without interpolating", () => {
    expect(temperatureFactor(32)).toBe(0);
    expect(temperatureFactor(36.9)).toBe(0);
    expect(temperatureFactor(37)).toBe(0.1);
    expect(temperatureFactor(83.9)).toBe(0.6);
    expect(temperatureFactor(84)).toBe(0.7);
    expect(temperatureFactor(128)).toBe(1);
  });

  it("clamps outside the table", () => {
    expect(temperatureFactor(20)).toBe(0);
    expect(temperatureFactor(140)).toBe(1);
  });
});

describe("adjustedAlkalinity", () => {
  const base: BalanceInputs = {
    temperatureF: 84,
    ph: 7.5,
    totalAlkalinityPpm: 80,
    calciumHardnessPpm: 300,
    cyanuricAcidPpm: 0,
    boratesPpm: 0,
    tdsPpm: 1000
  };

  it("equals TA without CYA or borates", () => {
    expect(adjustedAlkalinity(base)).toBe(80);
  });

  it("removes cyanurate alkalinity", () => {
    expect(adjustedAlkalinity({ ...base, cyanuricAcidPpm: 40 })).toBeCloseTo(67.2229, 4);
  });

  it("removes borate alkalinity as well", () => {
    const withCya = adjustedAlkalinity({ ...base, cyanuricAcidPpm: 40 });
    const withBorates = adjustedAlkalinity({ ...base, cyanuricAcidPpm: 40, boratesPpm: 50 });
    expect(withBorates).toBeLessThan(withCya);
  });
});

describe("computeIndices", () => {
  it("computes CSI and LSI for a typical pool", () => {
    const result = computeIndices(typicalSample);
    expect(result.csi).toBeCloseTo(0.4046, 4);
    expect(result.lsi).toBeCloseTo(-0.0314, 4);
    expect(result.issues).toEqual([]);
  });

  it("treats absent CYA as zero", () => {
    const { cyanuricAcidPpm: _cya, ...withoutCya } = typicalSample;
    const result = computeIndices(withoutCya);
    expect(result.csi).toBeCloseTo(0.4802, 4);
  });

  it("returns null indices and a calcium issue when CH is zero", () => {
    const result = computeIndices({ ...typicalSample, calciumHardnessPpm: 0 });
    expect(result.csi).toBeNull();
    expect(result.lsi).toBeNull();
    expect(result.issues).toEqual([{ parameter: "calcium_hardness", reason: "non-positive" }]);
  });

  it("drops only CSI when CYA consumes all of the alkalinity", () => {
    const result = computeIndices({ ...typicalSample, totalAlkalinityPpm: 10, cyanuricAcidPpm: 100 });
    expect(result.csi).toBeNull();
    expect(result.lsi).not.toBeNull();
    expect(result.issues).toEqual([{ parameter: "alkalinity", reason: "non-positive" }]);
  });

  it("reports a single alkalinity issue when TA is zero", () => {
    const result = computeIndices({ ...typicalSample, totalAlkalinityPpm: 0 });
    expect(result.csi).toBeNull();
    expect(result.lsi).toBeNull();
    expect(result.issues).toEqual([{ parameter: "alkalinity", reason: "non-positive" }]);
  });

  it("drops only LSI when TDS is not positive", () => {
    const result = computeIndices({ ...typicalSample, tdsPpm: 0 });
    expect(result.csi).toBeCloseTo(0.4046, 4);
    expect(result.lsi).toBeNull();
    expect(result.issues).toEqual([{ parameter: "tds", reason: "non-positive" }]);
  });

  it("lists every missing required reading", () => {
    const result = computeIndices({ freeChlorinePpm: 3, totalAlkalinityPpm: 80, calciumHardnessPpm: 300 });
    expect(result.csi).toBeNull();
    expect(result.lsi).toBeNull();
    expect(result.issues).toEqual([
      { parameter: "temperature", reason: "missing" },
      { parameter: "ph", reason: "missing" }
    ]);
  });

  it("is deterministic", () => {
    expect(computeIndices(typicalSample)).toStrictEqual(computeIndices(typicalSample));
  });
});
