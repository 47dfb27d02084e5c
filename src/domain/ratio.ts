import { issue } from "./issues";
import type { CalculationIssue, PoolType } from "./types";

const MIN_FC_CYA_RATIO_PCT = 7.5;
const MIN_FC_CYA_RATIO_SALTWATER_PCT = 5.0;

export interface FcCyaRatio {
  ratioPct: number | null;
  adequate: boolean | null;
  issues: CalculationIssue[];
}

export function minimumFcCyaRatio(poolType: PoolType): number {
  return poolType === "saltwater" ? MIN_FC_CYA_RATIO_SALTWATER_PCT : MIN_FC_CYA_RATIO_PCT;
}

export function computeFcCyaRatio(
  freeChlorinePpm: number | undefined,
  cyanuricAcidPpm: number | undefined,
  poolType: PoolType
): FcCyaRatio {
  if (freeChlorinePpm === undefined) {
    return { ratioPct: null, adequate: null, issues: [issue("free_chlorine", "missing")] };
  }
  // Without stabilizer the ratio is undefined, but any chlorine at all is enough
  if (cyanuricAcidPpm === undefined) {
    return {
      ratioPct: null,
      adequate: freeChlorinePpm > 0,
      issues: [issue("cyanuric_acid", "missing")]
    };
  }
  if (cyanuricAcidPpm <= 0) {
    return {
      ratioPct: null,
      adequate: freeChlorinePpm > 0,
      issues: [issue("cyanuric_acid", "undefined")]
    };
  }

  // Multiply first: 3 ppm over 40 ppm has to land on 7.5 exactly
  const ratioPct = (freeChlorinePpm * 100) / cyanuricAcidPpm;
  return {
    ratioPct,
    adequate: ratioPct >= minimumFcCyaRatio(poolType),
    issues: []
  };
}
