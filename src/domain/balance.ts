import type { WaterBalanceState } from "./types";

const CSI_SEVERELY_CORROSIVE = -0.6;
const CSI_BALANCED_LOW = -0.3;
const CSI_BALANCED_HIGH = 0.3;
const CSI_SLIGHTLY_SCALING = 0.6;

/** Water balance state from CSI. Both ±0.3 boundaries count as balanced. */
export function classifyBalance(csi: number | null): WaterBalanceState | null {
  if (csi === null || Number.isNaN(csi)) {
    return null;
  }
  if (csi < CSI_SEVERELY_CORROSIVE) {
    return "severely_corrosive";
  }
  if (csi < CSI_BALANCED_LOW) {
    return "slightly_corrosive";
  }
  if (csi <= CSI_BALANCED_HIGH) {
    return "balanced";
  }
  if (csi <= CSI_SLIGHTLY_SCALING) {
    return "slightly_scaling";
  }
  return "severely_scaling";
}

export function getBalanceLabel(state: WaterBalanceState | null): string {
  switch (state) {
    case "severely_corrosive":
      return "Severely corrosive";
    case "slightly_corrosive":
      return "Slightly corrosive";
    case "balanced":
      return "Balanced";
    case "slightly_scaling":
      return "Slightly scaling";
    case "severely_scaling":
      return "Severely scaling";
    default:
      return "Unknown";
  }
}
