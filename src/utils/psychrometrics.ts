// Dew point helpers.
//
// Magnus approximation with the Alduchov-Eskridge coefficients, see equation 8 of
// M. G. Lawrence, "The Relationship Between Relative Humidity and the Dewpoint
// Temperature in Moist Air", BAMS 86(2), 2005. https://doi.org/10.1175/BAMS-86-2-225

const MAGNUS_A = 17.625;
const MAGNUS_B = 243.04; // °C

export function fToC(f: number): number {
  return (f - 32) * (5 / 9);
}

export function cToF(c: number): number {
  return c * (9 / 5) + 32;
}

/**
 * Dew point in °C for air at `tempC` and relative humidity `rhPct`.
 * `rhPct` must be positive; values above 100 are not clamped.
 */
export function dewPointC(tempC: number, rhPct: number): number {
  const gamma = Math.log(rhPct / 100) + (MAGNUS_A * tempC) / (MAGNUS_B + tempC);
  return (MAGNUS_B * gamma) / (MAGNUS_A - gamma);
}

export function dewPointF(tempF: number, rhPct: number): number {
  return cToF(dewPointC(fToC(tempF), rhPct));
}
