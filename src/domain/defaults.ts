import type { DoseKind, PoolProfile, PoolTargets } from "./types";

export const DEFAULT_TARGETS: Readonly<PoolTargets> = Object.freeze({
  ph: 7.5,
  freeChlorinePpm: 5,
  totalAlkalinityPpm: 80,
  calciumHardnessPpm: 350,
  cyanuricAcidPpm: 40,
  saltPpm: 3200,
  boratesPpm: 50
});

export const DEFAULT_ENABLED_DOSES: Readonly<Record<DoseKind, boolean>> = Object.freeze({
  acid: true,
  chlorine: true,
  alkalinity: true,
  calcium: true,
  cyanuricAcid: true,
  salt: false,
  borates: false
});

// Used when the matching sensor is not configured
export const DEFAULT_TDS_PPM = 1000;
export const DEFAULT_ACID_TEMPERATURE_F = 80;

export const defaultPoolProfile: Readonly<PoolProfile> = Object.freeze({
  id: "default",
  name: "Pool",
  updatedAt: new Date(0).toISOString(),
  volumeGallons: 15000,
  poolType: "chlorine",
  surfaceType: "plaster",
  targets: DEFAULT_TARGETS,
  acidType: "muriatic_31_45",
  chlorineType: "bleach_12_5",
  enabledDoses: DEFAULT_ENABLED_DOSES
});
