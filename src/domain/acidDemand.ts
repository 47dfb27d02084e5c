import acidDemandTable from "./data/acidDemand.json";

/**
 * Acid demand for lowering pH, expressed in fl oz of 31.45% muriatic acid per
 * 10,000 gallons.
 *
 * The table holds the acid needed for a single 0.1 pH drop, by starting pH
 * and total alkalinity, at 77 °F and without borates. A full correction walks
 * down from the current pH in 0.1 steps:
 *
 *   step = table(pH, TA) × temperatureMultiplier(T) + borateTable(pH) × borates / 10
 *
 * After every step TA is reduced by the alkalinity the acid consumed, so high
 * TA water keeps a higher demand all the way down. Lookups interpolate
 * bilinearly and clamp at the table edges.
 */

// Every fl oz of reference acid in 10,000 gallons removes this much TA (ppm)
export const TA_DROP_PER_REFERENCE_FL_OZ = 0.3912;

// Demand multiplier relative to 77 °F; warmer water needs less acid
const TEMPERATURE_MULTIPLIERS: ReadonlyArray<readonly [number, number]> = [
  [40, 1.4],
  [50, 1.245],
  [60, 1.13],
  [70, 1.045],
  [77, 1.0],
  [80, 0.984],
  [85, 0.96],
  [90, 0.94],
  [95, 0.925],
  [100, 0.912],
  [105, 0.903]
];

const PH_EPSILON = 1e-9;
// Top of the pH scale; readings above it are flagged upstream but still dosed
const MAX_PH = 14;

export interface AcidDemandInput {
  currentPh: number;
  targetPh: number;
  totalAlkalinityPpm: number;
  temperatureF: number;
  boratesPpm: number;
}

interface Bracket {
  lower: number;
  upper: number;
  weight: number;
}

function bracket(axis: readonly number[], value: number): Bracket {
  const last = axis.length - 1;
  if (value <= axis[0]) {
    return { lower: 0, upper: 0, weight: 0 };
  }
  if (value >= axis[last]) {
    return { lower: last, upper: last, weight: 0 };
  }

  let lower = 0;
  while (axis[lower + 1] <= value) {
    lower += 1;
  }
  const upper = lower + 1;
  return { lower, upper, weight: (value - axis[lower]) / (axis[upper] - axis[lower]) };
}

function lerp(from: number, to: number, weight: number): number {
  return from + (to - from) * weight;
}

export function temperatureMultiplier(temperatureF: number): number {
  const axis = TEMPERATURE_MULTIPLIERS.map(([temperature]) => temperature);
  const { lower, upper, weight } = bracket(axis, temperatureF);
  return lerp(TEMPERATURE_MULTIPLIERS[lower][1], TEMPERATURE_MULTIPLIERS[upper][1], weight);
}

export function carbonateStepDemand(ph: number, totalAlkalinityPpm: number): number {
  const row = bracket(acidDemandTable.ph, ph);
  const column = bracket(acidDemandTable.totalAlkalinityPpm, totalAlkalinityPpm);
  const table = acidDemandTable.flOzPerStep;

  const low = lerp(table[row.lower][column.lower], table[row.lower][column.upper], column.weight);
  const high = lerp(table[row.upper][column.lower], table[row.upper][column.upper], column.weight);
  return lerp(low, high, row.weight);
}

export function borateStepDemand(ph: number, boratesPpm: number): number {
  if (boratesPpm <= 0) {
    return 0;
  }
  const row = bracket(acidDemandTable.ph, ph);
  const perTenPpm = lerp(
    acidDemandTable.borateFlOzPerStepPer10Ppm[row.lower],
    acidDemandTable.borateFlOzPerStepPer10Ppm[row.upper],
    row.weight
  );
  return (perTenPpm * boratesPpm) / 10;
}

export function stepDemand(
  ph: number,
  totalAlkalinityPpm: number,
  temperatureF: number,
  boratesPpm: number
): number {
  return (
    carbonateStepDemand(ph, totalAlkalinityPpm) * temperatureMultiplier(temperatureF) +
    borateStepDemand(ph, boratesPpm)
  );
}

/** Reference acid (fl oz per 10,000 gallons) to move from current to target pH. */
export function referenceAcidDemand(input: AcidDemandInput): number {
  const currentPh = Math.min(input.currentPh, MAX_PH);
  const totalDrop = currentPh - input.targetPh;
  if (totalDrop <= PH_EPSILON) {
    return 0;
  }

  const stepPh = acidDemandTable.stepPh;
  const steps = Math.ceil(totalDrop / stepPh - PH_EPSILON);
  let totalAlkalinityPpm = input.totalAlkalinityPpm;
  let total = 0;

  for (let index = 0; index < steps; index += 1) {
    const ph = currentPh - index * stepPh;
    const drop = Math.min(stepPh, totalDrop - index * stepPh);
    const demand =
      stepDemand(ph, totalAlkalinityPpm, input.temperatureF, input.boratesPpm) * (drop / stepPh);
    total += demand;
    totalAlkalinityPpm = Math.max(0, totalAlkalinityPpm - demand * TA_DROP_PER_REFERENCE_FL_OZ);
  }

  return total;
}

export const ACID_REFERENCE_GALLONS = acidDemandTable.referenceGallons;
