import { DEFAULT_TDS_PPM } from "./defaults";
import { issue } from "./issues";
import { celsiusFromFahrenheit } from "./units";
import type { CalculationIssue, ChemistrySample } from "./types";

// Taylor/TFP temperature factor: lower bound in °F -> TF. Water below the first
// row uses the first row; no interpolation inside a band.
const TEMPERATURE_FACTORS: ReadonlyArray<readonly [number, number]> = [
  [32, 0.0],
  [37, 0.1],
  [46, 0.2],
  [53, 0.3],
  [60, 0.4],
  [66, 0.5],
  [76, 0.6],
  [84, 0.7],
  [94, 0.8],
  [105, 0.9],
  [128, 1.0]
];

const CSI_CONSTANT = 12.1;
const LSI_BASELINE = 9.3;

// Carbonate alkalinity corrections: cyanurate and borate alkalinity at the given pH
const CYA_ALKALINITY_FACTOR = 0.38772;
const CYA_PKA = 6.83;
const BORATE_ALKALINITY_FACTOR = 4.63;
const BORATE_PKA = 9.11;

export interface BalanceInputs {
  temperatureF: number;
  ph: number;
  totalAlkalinityPpm: number;
  calciumHardnessPpm: number;
  cyanuricAcidPpm: number;
  boratesPpm: number;
  tdsPpm: number;
}

export interface IndexResult {
  csi: number | null;
  lsi: number | null;
  issues: CalculationIssue[];
}

export function temperatureFactor(temperatureF: number): number {
  let factor = TEMPERATURE_FACTORS[0][1];
  for (const [lowerBoundF, value] of TEMPERATURE_FACTORS) {
    if (temperatureF < lowerBoundF) {
      break;
    }
    factor = value;
  }
  return factor;
}

export function cyanurateAlkalinity(cyanuricAcidPpm: number, ph: number): number {
  if (cyanuricAcidPpm <= 0) {
    return 0;
  }
  return (cyanuricAcidPpm * CYA_ALKALINITY_FACTOR) / (1 + 10 ** (CYA_PKA - ph));
}

export function borateAlkalinity(boratesPpm: number, ph: number): number {
  if (boratesPpm <= 0) {
    return 0;
  }
  return (boratesPpm * BORATE_ALKALINITY_FACTOR) / (1 + 10 ** (BORATE_PKA - ph));
}

/** Total alkalinity minus the part contributed by CYA and borates. */
export function adjustedAlkalinity(inputs: BalanceInputs): number {
  return (
    inputs.totalAlkalinityPpm -
    cyanurateAlkalinity(inputs.cyanuricAcidPpm, inputs.ph) -
    borateAlkalinity(inputs.boratesPpm, inputs.ph)
  );
}

/**
 * Langelier saturation pH:
 * pHs = (9.3 + A + B) - (C + D)
 *   A = (log10(TDS) - 1) / 10
 *   B = -13.12 * log10(T[K]) + 34.55
 *   C = log10(CH) - 0.4
 *   D = log10(TA)
 */
export function saturationPh(inputs: BalanceInputs): number {
  const kelvin = celsiusFromFahrenheit(inputs.temperatureF) + 273.15;
  const a = (Math.log10(inputs.tdsPpm) - 1) / 10;
  const b = -13.12 * Math.log10(kelvin) + 34.55;
  const c = Math.log10(inputs.calciumHardnessPpm) - 0.4;
  const d = Math.log10(inputs.totalAlkalinityPpm);
  return LSI_BASELINE + a + b - (c + d);
}

/**
 * CSI and LSI from fully resolved inputs. An index that would need the log
 * of a non-positive value comes back null with an issue instead.
 */
export function computeBalanceIndices(inputs: BalanceInputs): IndexResult {
  const issues: CalculationIssue[] = [];

  if (inputs.calciumHardnessPpm <= 0) {
    issues.push(issue("calcium_hardness", "non-positive"));
    return { csi: null, lsi: null, issues };
  }

  let csi: number | null = null;
  const carbonateAlkalinity = adjustedAlkalinity(inputs);
  if (carbonateAlkalinity <= 0) {
    issues.push(issue("alkalinity", "non-positive"));
  } else {
    csi =
      inputs.ph +
      temperatureFactor(inputs.temperatureF) +
      Math.log10(inputs.calciumHardnessPpm) +
      Math.log10(carbonateAlkalinity) -
      CSI_CONSTANT;
  }

  // TA <= 0 implies a non-positive adjusted alkalinity, already reported above
  let lsi: number | null = null;
  if (inputs.totalAlkalinityPpm > 0) {
    if (inputs.tdsPpm <= 0) {
      issues.push(issue("tds", "non-positive"));
    } else {
      lsi = inputs.ph - saturationPh(inputs);
    }
  }

  return { csi, lsi, issues };
}

export function computeIndices(sample: ChemistrySample): IndexResult {
  const { temperatureF, ph, totalAlkalinityPpm, calciumHardnessPpm } = sample;
  if (
    temperatureF === undefined ||
    ph === undefined ||
    totalAlkalinityPpm === undefined ||
    calciumHardnessPpm === undefined
  ) {
    const issues: CalculationIssue[] = [];
    if (temperatureF === undefined) {
      issues.push(issue("temperature", "missing"));
    }
    if (ph === undefined) {
      issues.push(issue("ph", "missing"));
    }
    if (totalAlkalinityPpm === undefined) {
      issues.push(issue("alkalinity", "missing"));
    }
    if (calciumHardnessPpm === undefined) {
      issues.push(issue("calcium_hardness", "missing"));
    }
    return { csi: null, lsi: null, issues };
  }

  return computeBalanceIndices({
    temperatureF,
    ph,
    totalAlkalinityPpm,
    calciumHardnessPpm,
    cyanuricAcidPpm: sample.cyanuricAcidPpm ?? 0,
    boratesPpm: sample.boratesPpm ?? 0,
    tdsPpm: sample.tdsPpm ?? DEFAULT_TDS_PPM
  });
}
