export type PoolType = "chlorine" | "saltwater" | "mineral";
export type SurfaceType = "plaster" | "pebble" | "vinyl" | "fiberglass" | "painted";

export type AcidType =
  | "muriatic_14_5"
  | "muriatic_28_3"
  | "muriatic_31_45"
  | "muriatic_34_6"
  | "dry_acid";

export type ChlorineType =
  | "bleach_6"
  | "bleach_8_25"
  | "bleach_10"
  | "bleach_12_5"
  | "cal_hypo_65"
  | "cal_hypo_73"
  | "dichlor"
  | "trichlor";

export type DoseKind =
  | "acid"
  | "chlorine"
  | "alkalinity"
  | "calcium"
  | "cyanuricAcid"
  | "salt"
  | "borates";

export type DoseUnit = "fl_oz" | "oz" | "lb";

export type WaterBalanceState =
  | "severely_corrosive"
  | "slightly_corrosive"
  | "balanced"
  | "slightly_scaling"
  | "severely_scaling";

export type ChemistryParameter =
  | "temperature"
  | "ph"
  | "free_chlorine"
  | "alkalinity"
  | "calcium_hardness"
  | "cyanuric_acid"
  | "salt"
  | "tds"
  | "borates"
  | "volume";

export type IssueReason = "missing" | "non-positive" | "out-of-range" | "undefined";

export interface CalculationIssue {
  parameter: ChemistryParameter;
  reason: IssueReason;
}

/**
 * One measurement cycle. Temperature is always Fahrenheit; every reading may be
 * absent when its sensor is unavailable.
 */
export interface ChemistrySample {
  readonly temperatureF?: number;
  readonly ph?: number;
  readonly freeChlorinePpm?: number;
  readonly totalAlkalinityPpm?: number;
  readonly calciumHardnessPpm?: number;
  readonly cyanuricAcidPpm?: number;
  readonly saltPpm?: number;
  readonly tdsPpm?: number;
  readonly boratesPpm?: number;
}

export interface PoolTargets {
  ph: number;
  freeChlorinePpm: number;
  totalAlkalinityPpm: number;
  calciumHardnessPpm: number;
  cyanuricAcidPpm: number;
  saltPpm: number;
  boratesPpm: number;
}

export interface PoolProfile {
  id: string;
  name: string;
  updatedAt: string;
  volumeGallons: number;
  poolType: PoolType;
  surfaceType: SurfaceType;
  targets: PoolTargets;
  acidType: AcidType;
  chlorineType: ChlorineType;
  enabledDoses: Record<DoseKind, boolean>;
}

export interface DoseAdvisory {
  parameter: "cyanuric_acid" | "calcium_hardness";
  increasePpm: number;
  message: string;
}

export interface DoseResult {
  kind: DoseKind;
  chemical: string;
  amount: number;
  unit: DoseUnit;
  advisories: DoseAdvisory[];
}

export interface DoseOutcome {
  dose: DoseResult | null;
  issues: CalculationIssue[];
}

export interface CalculationResult {
  csi: number | null;
  lsi: number | null;
  waterBalanceState: WaterBalanceState | null;
  targetCsi: number | null;
  targetLsi: number | null;
  targetWaterBalanceState: WaterBalanceState | null;
  fcCyaRatioPct: number | null;
  fcAdequate: boolean | null;
  doses: Partial<Record<DoseKind, DoseResult>>;
  errors: CalculationIssue[];
  warnings: CalculationIssue[];
}
