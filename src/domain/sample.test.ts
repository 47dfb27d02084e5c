import { describe, expect, it } from "vitest";
import { createChemistrySample, inspectSample, readNumericState } from "./sample";

describe("readNumericState", () => {
  it("parses numeric states", () => {
    expect(readNumericState(" 7.4 ")).toBe(7.4);
    expect(readNumericState(80)).toBe(80);
    expect(readNumericState("-3")).toBe(-3);
    expect(readNumericState(".5")).toBe(0.5);
    expect(readNumericState("1.2E3")).toBe(1200);
  });

  it("rejects non-decimal number literals", () => {
    expect(readNumericState("0x1A")).toBeUndefined();
    expect(readNumericState("0b101")).toBeUndefined();
    expect(readNumericState("0o17")).toBeUndefined();
    expect(readNumericState("Infinity")).toBeUndefined();
  });

  it("treats unavailable and non-numeric states as absent", () => {
    expect(readNumericState("unavailable")).toBeUndefined();
    expect(readNumericState("Unknown")).toBeUndefined();
    expect(readNumericState("")).toBeUndefined();
    expect(readNumericState("n/a")).toBeUndefined();
    expect(readNumericState(null)).toBeUndefined();
    expect(readNumericState(Number.NaN)).toBeUndefined();
    expect(readNumericState(Number.POSITIVE_INFINITY)).toBeUndefined();
  });
});

describe("createChemistrySample", () => {
  it("converts a Celsius temperature to Fahrenheit", () => {
    const sample = createChemistrySample({ temperature: { state: "28.89", unit: "°C" } });
    expect(sample.temperatureF).toBeCloseTo(84.002, 9);
  });

  it("keeps Fahrenheit and unitless temperatures as they are", () => {
    expect(createChemistrySample({ temperature: { state: 84, unit: "°F" } }).temperatureF).toBe(84);
    expect(createChemistrySample({ temperature: { state: "84" } }).temperatureF).toBe(84);
    expect(createChemistrySample({ temperature: 84 }).temperatureF).toBe(84);
  });

  it("maps every reading and omits the absent ones", () => {
    const sample = createChemistrySample({
      temperature: 82,
      ph: { state: "7.6" },
      freeChlorine: 4,
      totalAlkalinity: { state: "90", unit: "ppm" },
      calciumHardness: 320,
      cyanuricAcid: { state: "unavailable" },
      salt: 3100
    });

    expect(sample).toEqual({
      temperatureF: 82,
      ph: 7.6,
      freeChlorinePpm: 4,
      totalAlkalinityPpm: 90,
      calciumHardnessPpm: 320,
      saltPpm: 3100
    });
    expect("cyanuricAcidPpm" in sample).toBe(false);
  });

  it("returns a frozen sample", () => {
    expect(Object.isFrozen(createChemistrySample({ ph: 7.5 }))).toBe(true);
  });
});

describe("inspectSample", () => {
  it("accepts ordinary readings", () => {
    expect(inspectSample({ ph: 7.5, freeChlorinePpm: 3, saltPpm: 3200 })).toEqual([]);
  });

  it("flags pH outside 0 to 14 and negative ppm values", () => {
    expect(inspectSample({ ph: 14.5, saltPpm: -10, boratesPpm: -1 })).toEqual([
      { parameter: "ph", reason: "out-of-range" },
      { parameter: "salt", reason: "out-of-range" },
      { parameter: "borates", reason: "out-of-range" }
    ]);
  });
});
