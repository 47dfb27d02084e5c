const CELSIUS_UNITS = new Set(["°c", "c", "celsius", "degc"]);

export const LITERS_PER_GALLON = 3.78541;
export const ML_PER_FL_OZ = 29.5735;
export const MG_PER_OZ = 28349.5;

export function fahrenheitFromCelsius(celsius: number): number {
  return (celsius * 9) / 5 + 32;
}

export function celsiusFromFahrenheit(fahrenheit: number): number {
  return ((fahrenheit - 32) * 5) / 9;
}

export function isCelsiusUnit(unit: string | undefined): boolean {
  if (unit === undefined) {
    return false;
  }
  return CELSIUS_UNITS.has(unit.trim().toLowerCase());
}

/**
 * Normalizes a temperature reading to Fahrenheit. Readings without a declared
 * unit are taken as Fahrenheit.
 */
export function toFahrenheit(value: number, unit?: string): number {
  return isCelsiusUnit(unit) ? fahrenheitFromCelsius(value) : value;
}

export function toFixedNumber(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}
