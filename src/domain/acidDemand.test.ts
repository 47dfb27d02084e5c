import { describe, expect, it } from "vitest";
import {
  borateStepDemand,
  carbonateStepDemand,
  referenceAcidDemand,
  temperatureMultiplier
} from "./acidDemand";

describe("carbonateStepDemand", () => {
  it("reads table rows directly", () => {
    expect(carbonateStepDemand(7.6, 80)).toBe(2.87);
    expect(carbonateStepDemand(8.0, 120)).toBe(2.03);
  });

  it("interpolates between pH rows and TA columns", () => {
    expect(carbonateStepDemand(7.65, 90)).toBeCloseTo(2.935, 9);
  });

  it("clamps at the table edges", () => {
    expect(carbonateStepDemand(9.2, 300)).toBe(3.13);
    expect(carbonateStepDemand(6.5, 80)).toBe(9.3);
  });

  it("has no carbonate demand without alkalinity", () => {
    expect(carbonateStepDemand(7.8, 0)).toBe(0);
  });
});

describe("borateStepDemand", () => {
  it("scales with the borate level", () => {
    expect(borateStepDemand(7.5, 10)).toBeCloseTo(0.429, 9);
    expect(borateStepDemand(7.5, 50)).toBeCloseTo(2.145, 9);
    expect(borateStepDemand(7.5, 0)).toBe(0);
  });
});

describe("temperatureMultiplier", () => {
  it("is 1 at the table reference temperature", () => {
    expect(temperatureMultiplier(77)).toBe(1);
  });

  it("interpolates and clamps", () => {
    expect(temperatureMultiplier(82.5)).toBeCloseTo(0.972, 9);
    expect(temperatureMultiplier(30)).toBe(1.4);
    expect(temperatureMultiplier(110)).toBe(0.903);
  });
});

describe("referenceAcidDemand", () => {
  it("uses a single table step for a 0.1 drop", () => {
    const demand = referenceAcidDemand({
      currentPh: 7.6,
      targetPh: 7.5,
      totalAlkalinityPpm: 80,
      temperatureF: 77,
      boratesPpm: 0
    });
    expect(demand).toBeCloseTo(2.87, 9);
  });

  it("prorates a partial step", () => {
    const demand = referenceAcidDemand({
      currentPh: 7.55,
      targetPh: 7.5,
      totalAlkalinityPpm: 80,
      temperatureF: 80,
      boratesPpm: 0
    });
    expect(demand).toBeCloseTo(1.57194, 5);
  });

  it("is zero when no drop is needed", () => {
    expect(
      referenceAcidDemand({
        currentPh: 7.4,
        targetPh: 7.5,
        totalAlkalinityPpm: 80,
        temperatureF: 80,
        boratesPpm: 0
      })
    ).toBe(0);
  });

  it("walks no higher than the top of the pH scale", () => {
    const base = { targetPh: 7.5, totalAlkalinityPpm: 80, temperatureF: 80, boratesPpm: 0 };
    const atTop = referenceAcidDemand({ ...base, currentPh: 14 });

    expect(atTop).toBeGreaterThan(0);
    expect(referenceAcidDemand({ ...base, currentPh: 1e6 })).toBe(atTop);
  });
});
