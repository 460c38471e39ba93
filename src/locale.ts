import type { TemperatureScale } from "./types.js";

const FAHRENHEIT_TERRITORIES: ReadonlySet<string> = new Set([
  "US", // United States
  "LR", // Liberia
  "FM", // Micronesia
  "KY", // Cayman Islands
  "MH", // Marshall Islands
  "PW" // Palau
]);

/**
 * Whether a locale name of the form `language_TERRITORY.encoding` names a
 * territory that measures temperature in Fahrenheit. Names without both
 * separators in that order (`C`, `POSIX`, `en_US`) are treated as Celsius.
 */
export function localeUsesFahrenheit(locale: string): boolean {
  const underscore = locale.indexOf("_");
  const dot = locale.indexOf(".");
  if (underscore === -1 || dot === -1 || dot <= underscore) {
    return false;
  }
  return FAHRENHEIT_TERRITORIES.has(locale.slice(underscore + 1, dot));
}

export function defaultScaleForLocale(locale: string): TemperatureScale {
  return localeUsesFahrenheit(locale) ? "fahrenheit" : "celsius";
}

/**
 * Name of the locale in effect for LC_MEASUREMENT, in POSIX precedence:
 * LC_ALL, then LC_MEASUREMENT, then LANG. Empty values are skipped.
 */
export function resolveMeasurementLocale(env: {
  LC_ALL?: string;
  LC_MEASUREMENT?: string;
  LANG?: string;
}): string {
  for (const value of [env.LC_ALL, env.LC_MEASUREMENT, env.LANG]) {
    if (value) return value;
  }
  return "C";
}
