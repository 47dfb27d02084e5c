import { ACID_REFERENCE_GALLONS, referenceAcidDemand } from "./acidDemand";
import {
  ACID_PRODUCTS,
  CHLORINE_PRODUCTS,
  DRY_ACID_OZ_PER_REFERENCE_FL_OZ,
  REFERENCE_ACID_CONCENTRATION,
  REFERENCE_DRY_ACID_CONCENTRATION
} from "./chemicals";
import { DEFAULT_ACID_TEMPERATURE_F } from "./defaults";
import { issue } from "./issues";
import { LITERS_PER_GALLON, MG_PER_OZ, ML_PER_FL_OZ, toFixedNumber } from "./units";
import type {
  AcidType,
  CalculationIssue,
  ChemistryParameter,
  ChlorineType,
  DoseAdvisory,
  DoseKind,
  DoseOutcome,
  DoseUnit
} from "./types";

const DOSE_DIGITS = 2;

// Product needed per ppm per gallon
const BAKING_SODA_OZ_PER_PPM_GALLON = 0.000214;
const CALCIUM_CHLORIDE_OZ_PER_PPM_GALLON = 0.000177;
const STABILIZER_OZ_PER_PPM_GALLON = 0.00013;
const SALT_LB_PER_PPM_GALLON = 0.0000834;
const BORIC_ACID_OZ_PER_PPM_GALLON = 0.000764;

interface LinearDose {
  kind: DoseKind;
  chemical: string;
  parameter: ChemistryParameter;
  factor: number;
  unit: DoseUnit;
}

const ALKALINITY_DOSE: LinearDose = {
  kind: "alkalinity",
  chemical: "Baking soda",
  parameter: "alkalinity",
  factor: BAKING_SODA_OZ_PER_PPM_GALLON,
  unit: "oz"
};

const CALCIUM_DOSE: LinearDose = {
  kind: "calcium",
  chemical: "Calcium chloride",
  parameter: "calcium_hardness",
  factor: CALCIUM_CHLORIDE_OZ_PER_PPM_GALLON,
  unit: "oz"
};

const CYA_DOSE: LinearDose = {
  kind: "cyanuricAcid",
  chemical: "Stabilizer (cyanuric acid)",
  parameter: "cyanuric_acid",
  factor: STABILIZER_OZ_PER_PPM_GALLON,
  unit: "oz"
};

const SALT_DOSE: LinearDose = {
  kind: "salt",
  chemical: "Pool salt",
  parameter: "salt",
  factor: SALT_LB_PER_PPM_GALLON,
  unit: "lb"
};

const BORATE_DOSE: LinearDose = {
  kind: "borates",
  chemical: "Boric acid",
  parameter: "borates",
  factor: BORIC_ACID_OZ_PER_PPM_GALLON,
  unit: "oz"
};

function noDose(): DoseOutcome {
  return { dose: null, issues: [] };
}

/**
 * Shared guards: a non-positive volume or a missing reading is an issue, a
 * reading already at or past the target is simply no dose.
 */
function raiseDelta(
  parameter: ChemistryParameter,
  current: number | undefined,
  target: number,
  volumeGallons: number
): number | DoseOutcome {
  if (volumeGallons <= 0) {
    return { dose: null, issues: [issue("volume", "non-positive")] };
  }
  if (current === undefined) {
    return { dose: null, issues: [issue(parameter, "missing")] };
  }
  if (current >= target) {
    return noDose();
  }
  return target - current;
}

function calculateLinearDose(
  product: LinearDose,
  current: number | undefined,
  target: number,
  volumeGallons: number
): DoseOutcome {
  const delta = raiseDelta(product.parameter, current, target, volumeGallons);
  if (typeof delta !== "number") {
    return delta;
  }

  const amount = toFixedNumber(delta * volumeGallons * product.factor, DOSE_DIGITS);
  if (amount <= 0) {
    return noDose();
  }

  return {
    dose: {
      kind: product.kind,
      chemical: product.chemical,
      amount,
      unit: product.unit,
      advisories: []
    },
    issues: []
  };
}

export function calculateAlkalinityDose(
  currentPpm: number | undefined,
  targetPpm: number,
  volumeGallons: number
): DoseOutcome {
  return calculateLinearDose(ALKALINITY_DOSE, currentPpm, targetPpm, volumeGallons);
}

export function calculateCalciumDose(
  currentPpm: number | undefined,
  targetPpm: number,
  volumeGallons: number
): DoseOutcome {
  return calculateLinearDose(CALCIUM_DOSE, currentPpm, targetPpm, volumeGallons);
}

export function calculateCyaDose(
  currentPpm: number | undefined,
  targetPpm: number,
  volumeGallons: number
): DoseOutcome {
  return calculateLinearDose(CYA_DOSE, currentPpm, targetPpm, volumeGallons);
}

export function calculateSaltDose(
  currentPpm: number | undefined,
  targetPpm: number,
  volumeGallons: number
): DoseOutcome {
  return calculateLinearDose(SALT_DOSE, currentPpm, targetPpm, volumeGallons);
}

export function calculateBorateDose(
  currentPpm: number | undefined,
  targetPpm: number,
  volumeGallons: number
): DoseOutcome {
  return calculateLinearDose(BORATE_DOSE, currentPpm, targetPpm, volumeGallons);
}

export function calculateChlorineDose(
  currentFcPpm: number | undefined,
  targetFcPpm: number,
  volumeGallons: number,
  chlorineType: ChlorineType
): DoseOutcome {
  const delta = raiseDelta("free_chlorine", currentFcPpm, targetFcPpm, volumeGallons);
  if (typeof delta !== "number") {
    return delta;
  }

  const product = CHLORINE_PRODUCTS[chlorineType];
  // 1 ppm is 1 mg/L of available chlorine
  const chlorineMg = delta * volumeGallons * LITERS_PER_GALLON;
  const amount =
    product.form === "liquid"
      ? chlorineMg / (product.availableChlorine * 1000) / ML_PER_FL_OZ
      : chlorineMg / product.availableChlorine / MG_PER_OZ;
  const roundedAmount = toFixedNumber(amount, DOSE_DIGITS);
  if (roundedAmount <= 0) {
    return noDose();
  }

  const advisories: DoseAdvisory[] = [];
  if (product.cyaPerPpmFc > 0) {
    const increasePpm = toFixedNumber(delta * product.cyaPerPpmFc, DOSE_DIGITS);
    advisories.push({
      parameter: "cyanuric_acid",
      increasePpm,
      message: `${product.label} also raises CYA by about ${increasePpm} ppm`
    });
  }
  if (product.calciumPerPpmFc > 0) {
    const increasePpm = toFixedNumber(delta * product.calciumPerPpmFc, DOSE_DIGITS);
    advisories.push({
      parameter: "calcium_hardness",
      increasePpm,
      message: `${product.label} also raises calcium hardness by about ${increasePpm} ppm`
    });
  }

  return {
    dose: {
      kind: "chlorine",
      chemical: product.label,
      amount: roundedAmount,
      unit: product.unit,
      advisories
    },
    issues: []
  };
}

export interface AcidDoseInput {
  currentPh: number | undefined;
  targetPh: number;
  totalAlkalinityPpm: number | undefined;
  temperatureF?: number;
  boratesPpm?: number;
  volumeGallons: number;
  acidType: AcidType;
}

/** Product amount per fl oz of 31.45% muriatic acid. */
export function acidStrengthFactor(acidType: AcidType): number {
  const product = ACID_PRODUCTS[acidType];
  if (product.form === "liquid") {
    return REFERENCE_ACID_CONCENTRATION / product.concentration;
  }
  return DRY_ACID_OZ_PER_REFERENCE_FL_OZ * (REFERENCE_DRY_ACID_CONCENTRATION / product.concentration);
}

/**
 * Acid to bring pH down to target. Only computed when the current pH is above
 * the target.
 */
export function calculateAcidDose(input: AcidDoseInput): DoseOutcome {
  if (input.volumeGallons <= 0) {
    return { dose: null, issues: [issue("volume", "non-positive")] };
  }
  const { currentPh, totalAlkalinityPpm } = input;
  if (currentPh === undefined || totalAlkalinityPpm === undefined) {
    const issues: CalculationIssue[] = [];
    if (currentPh === undefined) {
      issues.push(issue("ph", "missing"));
    }
    if (totalAlkalinityPpm === undefined) {
      issues.push(issue("alkalinity", "missing"));
    }
    return { dose: null, issues };
  }
  if (currentPh <= input.targetPh) {
    return noDose();
  }

  const referenceFlOz = referenceAcidDemand({
    currentPh,
    targetPh: input.targetPh,
    totalAlkalinityPpm: Math.max(0, totalAlkalinityPpm),
    temperatureF: input.temperatureF ?? DEFAULT_ACID_TEMPERATURE_F,
    boratesPpm: input.boratesPpm ?? 0
  });
  const product = ACID_PRODUCTS[input.acidType];
  const amount = toFixedNumber(
    referenceFlOz * (input.volumeGallons / ACID_REFERENCE_GALLONS) * acidStrengthFactor(input.acidType),
    DOSE_DIGITS
  );
  // The table holds no demand at zero alkalinity
  if (amount <= 0) {
    return noDose();
  }

  return {
    dose: {
      kind: "acid",
      chemical: product.label,
      amount,
      unit: product.unit,
      advisories: []
    },
    issues: []
  };
}
