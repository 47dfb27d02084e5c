import { describe, expect, it } from "vitest";
import { computeFcCyaRatio, minimumFcCyaRatio } from "./ratio";

describe("computeFcCyaRatio", () => {
  it("treats a ratio exactly at the minimum as adequate", () => {
    const result = computeFcCyaRatio(3, 40, "chlorine");
    expect(result.ratioPct).toBe(7.5);
    expect(result.adequate).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it("uses the lower saltwater minimum", () => {
    expect(computeFcCyaRatio(3, 40, "saltwater")).toEqual({ ratioPct: 7.5, adequate: true, issues: [] });
    expect(computeFcCyaRatio(2, 40, "saltwater").adequate).toBe(true);
    expect(computeFcCyaRatio(2, 40, "chlorine").adequate).toBe(false);
  });

  it("uses the traditional minimum for mineral pools", () => {
    expect(minimumFcCyaRatio("mineral")).toBe(7.5);
    expect(computeFcCyaRatio(2.9, 40, "mineral").adequate).toBe(false);
  });

  it("leaves the ratio undefined at zero CYA but judges any chlorine adequate", () => {
    const expected = {
      ratioPct: null,
      adequate: true,
      issues: [{ parameter: "cyanuric_acid", reason: "undefined" }]
    };
    expect(computeFcCyaRatio(3, 0, "chlorine")).toEqual(expected);
    expect(computeFcCyaRatio(3, -5, "chlorine")).toEqual(expected);
    expect(computeFcCyaRatio(0, 0, "saltwater")).toEqual({ ...expected, adequate: false });
  });

  it("reports a missing CYA reading", () => {
    expect(computeFcCyaRatio(3, undefined, "chlorine")).toEqual({
      ratioPct: null,
      adequate: true,
      issues: [{ parameter: "cyanuric_acid", reason: "missing" }]
    });
  });

  it("reports missing free chlorine", () => {
    expect(computeFcCyaRatio(undefined, 40, "chlorine")).toEqual({
      ratioPct: null,
      adequate: null,
      issues: [{ parameter: "free_chlorine", reason: "missing" }]
    });
  });
});
