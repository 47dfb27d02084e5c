import { issue } from "./issues";
import { toFahrenheit } from "./units";
import type { CalculationIssue, ChemistryParameter, ChemistrySample } from "./types";

export interface SensorReading {
  state: string | number | null | undefined;
  unit?: string;
}

export type ReadingInput = number | SensorReading;

export interface RawReadings {
  temperature?: ReadingInput;
  ph?: ReadingInput;
  freeChlorine?: ReadingInput;
  totalAlkalinity?: ReadingInput;
  calciumHardness?: ReadingInput;
  cyanuricAcid?: ReadingInput;
  salt?: ReadingInput;
  tds?: ReadingInput;
  borates?: ReadingInput;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const UNAVAILABLE_STATES = new Set(["", "unknown", "unavailable", "none", "null"]);
// Plain decimal or exponent notation; no hex, octal or binary literals
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/;

const PPM_FIELDS: ReadonlyArray<[keyof ChemistrySample, ChemistryParameter]> = [
  ["freeChlorinePpm", "free_chlorine"],
  ["totalAlkalinityPpm", "alkalinity"],
  ["calciumHardnessPpm", "calcium_hardness"],
  ["cyanuricAcidPpm", "cyanuric_acid"],
  ["saltPpm", "salt"],
  ["tdsPpm", "tds"],
  ["boratesPpm", "borates"]
];

/**
 * Reads a sensor state as a number. Unavailable, unknown and non-numeric
 * states come back as undefined.
 */
export function readNumericState(state: string | number | null | undefined): number | undefined {
  if (state === null || state === undefined) {
    return undefined;
  }
  if (typeof state === "number") {
    return Number.isFinite(state) ? state : undefined;
  }

  const normalized = state.trim().toLowerCase();
  if (UNAVAILABLE_STATES.has(normalized)) {
    return undefined;
  }
  if (!DECIMAL_PATTERN.test(normalized)) {
    return undefined;
  }
  const value = Number(normalized);
  return Number.isFinite(value) ? value : undefined;
}

function readValue(input: ReadingInput | undefined): number | undefined {
  if (input === undefined) {
    return undefined;
  }
  return typeof input === "number" ? readNumericState(input) : readNumericState(input.state);
}

function readTemperature(input: ReadingInput | undefined): number | undefined {
  const value = readValue(input);
  if (value === undefined || input === undefined) {
    return undefined;
  }
  return typeof input === "number" ? value : toFahrenheit(value, input.unit);
}

export function createChemistrySample(readings: RawReadings): ChemistrySample {
  const sample: Mutable<ChemistrySample> = {};
  const values: Array<[keyof ChemistrySample, number | undefined]> = [
    ["temperatureF", readTemperature(readings.temperature)],
    ["ph", readValue(readings.ph)],
    ["freeChlorinePpm", readValue(readings.freeChlorine)],
    ["totalAlkalinityPpm", readValue(readings.totalAlkalinity)],
    ["calciumHardnessPpm", readValue(readings.calciumHardness)],
    ["cyanuricAcidPpm", readValue(readings.cyanuricAcid)],
    ["saltPpm", readValue(readings.salt)],
    ["tdsPpm", readValue(readings.tds)],
    ["boratesPpm", readValue(readings.borates)]
  ];

  for (const [key, value] of values) {
    if (value !== undefined) {
      sample[key] = value;
    }
  }
  return Object.freeze(sample);
}

/**
 * Data-quality checks. Out-of-range values are still used by the
 * calculations; they are only flagged.
 */
export function inspectSample(sample: ChemistrySample): CalculationIssue[] {
  const warnings: CalculationIssue[] = [];
  if (sample.ph !== undefined && (sample.ph < 0 || sample.ph > 14)) {
    warnings.push(issue("ph", "out-of-range"));
  }
  for (const [key, parameter] of PPM_FIELDS) {
    const value = sample[key];
    if (value !== undefined && value < 0) {
      warnings.push(issue(parameter, "out-of-range"));
    }
  }
  return warnings;
}
