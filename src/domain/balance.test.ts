import { describe, expect, it } from "vitest";
import { classifyBalance, getBalanceLabel } from "./balance";

describe("classifyBalance", () => {
  it("maps each CSI range to one state", () => {
    expect(classifyBalance(-1.2)).toBe("severely_corrosive");
    expect(classifyBalance(-0.45)).toBe("slightly_corrosive");
    expect(classifyBalance(0)).toBe("balanced");
    expect(classifyBalance(0.45)).toBe("slightly_scaling");
    expect(classifyBalance(1.2)).toBe("severely_scaling");
  });

  it("keeps both balanced boundaries balanced", () => {
    expect(classifyBalance(-0.3)).toBe("balanced");
    expect(classifyBalance(0.3)).toBe("balanced");
    expect(classifyBalance(-0.30001)).toBe("slightly_corrosive");
    expect(classifyBalance(0.30001)).toBe("slightly_scaling");
  });

  it("places the outer boundaries on the slight side", () => {
    expect(classifyBalance(-0.6)).toBe("slightly_corrosive");
    expect(classifyBalance(-0.60001)).toBe("severely_corrosive");
    expect(classifyBalance(0.6)).toBe("slightly_scaling");
    expect(classifyBalance(0.60001)).toBe("severely_scaling");
  });

  it("returns null without a CSI", () => {
    expect(classifyBalance(null)).toBeNull();
    expect(classifyBalance(Number.NaN)).toBeNull();
  });
});

describe("getBalanceLabel", () => {
  it("labels states and the unknown case", () => {
    expect(getBalanceLabel("slightly_scaling")).toBe("Slightly scaling");
    expect(getBalanceLabel(null)).toBe("Unknown");
  });
});
