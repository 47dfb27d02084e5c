export * from "./domain/types";
export { calculatePoolChemistry, calculateDoses, computeTargetIndices } from "./domain/calculations";
export type { DosePlan } from "./domain/calculations";
export {
  adjustedAlkalinity,
  computeBalanceIndices,
  computeIndices,
  saturationPh,
  temperatureFactor
} from "./domain/indices";
export type { BalanceInputs, IndexResult } from "./domain/indices";
export { classifyBalance, getBalanceLabel } from "./domain/balance";
export { computeFcCyaRatio, minimumFcCyaRatio } from "./domain/ratio";
export type { FcCyaRatio } from "./domain/ratio";
export {
  acidStrengthFactor,
  calculateAcidDose,
  calculateAlkalinityDose,
  calculateBorateDose,
  calculateCalciumDose,
  calculateChlorineDose,
  calculateCyaDose,
  calculateSaltDose
} from "./domain/dosing";
export type { AcidDoseInput } from "./domain/dosing";
export { referenceAcidDemand } from "./domain/acidDemand";
export { ACID_PRODUCTS, CHLORINE_PRODUCTS } from "./domain/chemicals";
export type { AcidProduct, ChlorineProduct } from "./domain/chemicals";
export { createChemistrySample, inspectSample, readNumericState } from "./domain/sample";
export type { RawReadings, ReadingInput, SensorReading } from "./domain/sample";
export { createPoolProfile, updatePoolProfileOptions } from "./domain/profile";
export { PoolOptionsSchema, PoolProfileInputSchema, PoolProfileSchema } from "./domain/schema";
export type { PoolOptionsUpdate, PoolProfileInput } from "./domain/schema";
export { DEFAULT_ENABLED_DOSES, DEFAULT_TARGETS, defaultPoolProfile } from "./domain/defaults";
export { fahrenheitFromCelsius, celsiusFromFahrenheit, toFahrenheit, toFixedNumber } from "./domain/units";
