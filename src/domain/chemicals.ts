import type { AcidType, ChlorineType, DoseUnit } from "./types";

export type ProductForm = "liquid" | "granular";

export interface AcidProduct {
  type: AcidType;
  label: string;
  /** Mass fraction of active acid (HCl or sodium bisulfate). */
  concentration: number;
  form: ProductForm;
  unit: DoseUnit;
}

export interface ChlorineProduct {
  type: ChlorineType;
  label: string;
  /**
   * Available chlorine. For bleach this is the trade percentage (grams per
   * 100 mL); for granular products it is by weight.
   */
  availableChlorine: number;
  form: ProductForm;
  unit: DoseUnit;
  /** ppm of CYA added per ppm of FC. */
  cyaPerPpmFc: number;
  /** ppm of CH added per ppm of FC. */
  calciumPerPpmFc: number;
}

export const REFERENCE_ACID_CONCENTRATION = 0.3145;
export const REFERENCE_DRY_ACID_CONCENTRATION = 0.932;
// Sodium bisulfate (93.2%) ounces matching one fl oz of 31.45% muriatic acid
export const DRY_ACID_OZ_PER_REFERENCE_FL_OZ = 1.344;

export const ACID_PRODUCTS: Record<AcidType, AcidProduct> = {
  muriatic_14_5: {
    type: "muriatic_14_5",
    label: "Muriatic acid 14.5%",
    concentration: 0.145,
    form: "liquid",
    unit: "fl_oz"
  },
  muriatic_28_3: {
    type: "muriatic_28_3",
    label: "Muriatic acid 28.3%",
    concentration: 0.283,
    form: "liquid",
    unit: "fl_oz"
  },
  muriatic_31_45: {
    type: "muriatic_31_45",
    label: "Muriatic acid 31.45%",
    concentration: 0.3145,
    form: "liquid",
    unit: "fl_oz"
  },
  muriatic_34_6: {
    type: "muriatic_34_6",
    label: "Muriatic acid 34.6%",
    concentration: 0.346,
    form: "liquid",
    unit: "fl_oz"
  },
  dry_acid: {
    type: "dry_acid",
    label: "Dry acid (sodium bisulfate 93.2%)",
    concentration: 0.932,
    form: "granular",
    unit: "oz"
  }
};

export const CHLORINE_PRODUCTS: Record<ChlorineType, ChlorineProduct> = {
  bleach_6: {
    type: "bleach_6",
    label: "Bleach 6%",
    availableChlorine: 0.06,
    form: "liquid",
    unit: "fl_oz",
    cyaPerPpmFc: 0,
    calciumPerPpmFc: 0
  },
  bleach_8_25: {
    type: "bleach_8_25",
    label: "Bleach 8.25%",
    availableChlorine: 0.0825,
    form: "liquid",
    unit: "fl_oz",
    cyaPerPpmFc: 0,
    calciumPerPpmFc: 0
  },
  bleach_10: {
    type: "bleach_10",
    label: "Liquid chlorine 10%",
    availableChlorine: 0.1,
    form: "liquid",
    unit: "fl_oz",
    cyaPerPpmFc: 0,
    calciumPerPpmFc: 0
  },
  bleach_12_5: {
    type: "bleach_12_5",
    label: "Liquid chlorine 12.5%",
    availableChlorine: 0.125,
    form: "liquid",
    unit: "fl_oz",
    cyaPerPpmFc: 0,
    calciumPerPpmFc: 0
  },
  cal_hypo_65: {
    type: "cal_hypo_65",
    label: "Cal-hypo 65%",
    availableChlorine: 0.65,
    form: "granular",
    unit: "oz",
    cyaPerPpmFc: 0,
    calciumPerPpmFc: 0.7
  },
  cal_hypo_73: {
    type: "cal_hypo_73",
    label: "Cal-hypo 73%",
    availableChlorine: 0.73,
    form: "granular",
    unit: "oz",
    cyaPerPpmFc: 0,
    calciumPerPpmFc: 0.7
  },
  dichlor: {
    type: "dichlor",
    label: "Dichlor 56%",
    availableChlorine: 0.56,
    form: "granular",
    unit: "oz",
    cyaPerPpmFc: 0.9,
    calciumPerPpmFc: 0
  },
  trichlor: {
    type: "trichlor",
    label: "Trichlor 90%",
    availableChlorine: 0.9,
    form: "granular",
    unit: "oz",
    cyaPerPpmFc: 0.6,
    calciumPerPpmFc: 0
  }
};
