// Whole-string float parsing in the grammar of C's strtof, plus ties-to-even rounding.

const DECIMAL = /^([+-]?)(\d+\.?\d*(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?)$/;
const HEX = /^([+-]?)0[xX]([0-9a-fA-F]+\.?[0-9a-fA-F]*|\.[0-9a-fA-F]+)(?:[pP]([+-]?\d+))?$/;
const INFINITY = /^([+-]?)inf(?:inity)?$/i;
const NAN = /^[+-]?nan(?:\([0-9A-Za-z_]*\))?$/i;

// isspace() in the C locale; JS \s is wider.
const LEADING_SPACE = /^[ \t\n\v\f\r]+/;

function parseHex(sign: string, mantissa: string, exponent: string | undefined): number {
  const [intPart, fracPart = ""] = mantissa.split(".");
  const digits = `${intPart}${fracPart}`;
  const binaryExponent = Number(exponent ?? "0") - 4 * fracPart.length;
  const value = parseInt(digits, 16) * 2 ** binaryExponent;
  return sign === "-" ? -value : value;
}

/**
 * Parses `text` as one floating-point literal. Returns null unless the entire
 * string is consumed; leading whitespace is allowed, trailing whitespace is not.
 */
export function parseStrictFloat(text: string): number | null {
  const s = text.replace(LEADING_SPACE, "");

  if (DECIMAL.test(s)) return Number(s);

  const hex = HEX.exec(s);
  if (hex) return parseHex(hex[1], hex[2], hex[3]);

  const inf = INFINITY.exec(s);
  if (inf) return inf[1] === "-" ? -Infinity : Infinity;

  if (NAN.test(s)) return NaN;

  return null;
}

/** Round to nearest integer, ties to even. Never returns -0. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;
  return rounded === 0 ? 0 : rounded;
}

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * `roundHalfEven` narrowed to a 32-bit integer. Null when the value is not
 * finite or rounds outside that range.
 */
export function roundToInt32(value: number): number | null {
  if (!Number.isFinite(value)) return null;
  const rounded = roundHalfEven(value);
  return rounded < INT32_MIN || rounded > INT32_MAX ? null : rounded;
}
