import { classifyBalance } from "./balance";
import { DEFAULT_TDS_PPM } from "./defaults";
import {
  calculateAcidDose,
  calculateAlkalinityDose,
  calculateBorateDose,
  calculateCalciumDose,
  calculateChlorineDose,
  calculateCyaDose,
  calculateSaltDose
} from "./dosing";
import { computeBalanceIndices, computeIndices, type IndexResult } from "./indices";
import { mergeIssues } from "./issues";
import { computeFcCyaRatio } from "./ratio";
import { inspectSample } from "./sample";
import type {
  CalculationIssue,
  CalculationResult,
  ChemistrySample,
  DoseKind,
  DoseOutcome,
  DoseResult,
  PoolProfile
} from "./types";

type DoseCalculator = (sample: ChemistrySample, profile: PoolProfile) => DoseOutcome;

const DOSE_ORDER: DoseKind[] = [
  "acid",
  "chlorine",
  "alkalinity",
  "calcium",
  "cyanuricAcid",
  "salt",
  "borates"
];

// Missing CYA, salt and borate readings count as zero when dosing
const DOSE_CALCULATORS: Record<DoseKind, DoseCalculator> = {
  acid: (sample, profile) =>
    calculateAcidDose({
      currentPh: sample.ph,
      targetPh: profile.targets.ph,
      totalAlkalinityPpm: sample.totalAlkalinityPpm,
      temperatureF: sample.temperatureF,
      boratesPpm: sample.boratesPpm,
      volumeGallons: profile.volumeGallons,
      acidType: profile.acidType
    }),
  chlorine: (sample, profile) =>
    calculateChlorineDose(
      sample.freeChlorinePpm,
      profile.targets.freeChlorinePpm,
      profile.volumeGallons,
      profile.chlorineType
    ),
  alkalinity: (sample, profile) =>
    calculateAlkalinityDose(
      sample.totalAlkalinityPpm,
      profile.targets.totalAlkalinityPpm,
      profile.volumeGallons
    ),
  calcium: (sample, profile) =>
    calculateCalciumDose(
      sample.calciumHardnessPpm,
      profile.targets.calciumHardnessPpm,
      profile.volumeGallons
    ),
  cyanuricAcid: (sample, profile) =>
    calculateCyaDose(
      sample.cyanuricAcidPpm ?? 0,
      profile.targets.cyanuricAcidPpm,
      profile.volumeGallons
    ),
  salt: (sample, profile) =>
    profile.poolType === "saltwater"
      ? calculateSaltDose(sample.saltPpm ?? 0, profile.targets.saltPpm, profile.volumeGallons)
      : { dose: null, issues: [] },
  borates: (sample, profile) =>
    calculateBorateDose(sample.boratesPpm ?? 0, profile.targets.boratesPpm, profile.volumeGallons)
};

export interface DosePlan {
  doses: Partial<Record<DoseKind, DoseResult>>;
  issues: CalculationIssue[];
}

/** Every dose the profile enables, in a fixed order. */
export function calculateDoses(sample: ChemistrySample, profile: PoolProfile): DosePlan {
  const doses: Partial<Record<DoseKind, DoseResult>> = {};
  const issues: CalculationIssue[][] = [];

  for (const kind of DOSE_ORDER) {
    if (!profile.enabledDoses[kind]) {
      continue;
    }
    const outcome = DOSE_CALCULATORS[kind](sample, profile);
    if (outcome.dose) {
      doses[kind] = outcome.dose;
    }
    issues.push(outcome.issues);
  }

  return { doses, issues: mergeIssues(...issues) };
}

/**
 * CSI and LSI the water would have with every parameter at its target,
 * keeping the measured temperature and TDS.
 */
export function computeTargetIndices(sample: ChemistrySample, profile: PoolProfile): IndexResult {
  if (sample.temperatureF === undefined) {
    return { csi: null, lsi: null, issues: [] };
  }

  const { targets } = profile;
  return computeBalanceIndices({
    temperatureF: sample.temperatureF,
    ph: targets.ph,
    totalAlkalinityPpm: targets.totalAlkalinityPpm,
    calciumHardnessPpm: targets.calciumHardnessPpm,
    cyanuricAcidPpm: targets.cyanuricAcidPpm,
    boratesPpm: targets.boratesPpm,
    tdsPpm: sample.tdsPpm ?? DEFAULT_TDS_PPM
  });
}

export function calculatePoolChemistry(
  sample: ChemistrySample,
  profile: PoolProfile
): CalculationResult {
  const indices = computeIndices(sample);
  const targetIndices = computeTargetIndices(sample, profile);
  const ratio = computeFcCyaRatio(sample.freeChlorinePpm, sample.cyanuricAcidPpm, profile.poolType);
  const plan = calculateDoses(sample, profile);

  return {
    csi: indices.csi,
    lsi: indices.lsi,
    waterBalanceState: classifyBalance(indices.csi),
    targetCsi: targetIndices.csi,
    targetLsi: targetIndices.lsi,
    targetWaterBalanceState: classifyBalance(targetIndices.csi),
    fcCyaRatioPct: ratio.ratioPct,
    fcAdequate: ratio.adequate,
    doses: plan.doses,
    errors: mergeIssues(indices.issues, ratio.issues, plan.issues, targetIndices.issues),
    warnings: inspectSample(sample)
  };
}
