/**
 * Kubernetes resource quantity parsing ("20Gi", "500M", "1.5Ti", "100m")
 */

const BINARY_SUFFIXES: Record<string, number> = {
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
  Pi: 1024 ** 5,
  Ei: 1024 ** 6,
};

const DECIMAL_SUFFIXES: Record<string, number> = {
  m: 1e-3,
  "": 1,
  k: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
};

const QUANTITY_PATTERN = /^([+-]?(?:\d+\.?\d*|\.\d+))(?:([eE][+-]?\d+)|(Ki|Mi|Gi|Ti|Pi|Ei|[mkMGTPE]))?$/;

/**
 * Parse a quantity to its value in base units (bytes for storage).
 * Returns null when the string is not a valid quantity.
 */
export function parseQuantity(quantity: string): number | null {
  const match = quantity.trim().match(QUANTITY_PATTERN);
  if (!match) {
    return null;
  }

  const [, numberPart, exponent, suffix] = match;
  if (numberPart === undefined) {
    return null;
  }

  const base = Number(numberPart);
  if (exponent) {
    return Number(`${numberPart}${exponent}`);
  }

  const multiplier = suffix ? (BINARY_SUFFIXES[suffix] ?? DECIMAL_SUFFIXES[suffix]) : 1;
  if (multiplier === undefined) {
    return null;
  }

  return base * multiplier;
}

/**
 * Compare two quantities. Returns null when either side cannot be parsed.
 */
export function compareQuantities(a: string, b: string): number | null {
  const left = parseQuantity(a);
  const right = parseQuantity(b);
  if (left === null || right === null) {
    return null;
  }
  return Math.sign(left - right);
}
