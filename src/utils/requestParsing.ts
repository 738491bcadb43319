const DECIMAL_DIGITS = /^\d+$/;

/**
 * Parse a value into a positive integer (>= 1).
 *
 * Intended for query params like `personas` where we want strict integer semantics.
 * Returns `null` for invalid inputs rather than throwing so callers can map to 400s.
 */
export function parsePositiveInteger(value: unknown): number | null {
  // Plain decimal digits only: no exponents, hex, signs or fractions.
  if (typeof value === 'string' && !DECIMAL_DIGITS.test(value.trim())) {
    return null;
  }

  const numeric = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : Number.NaN;
  if (!Number.isSafeInteger(numeric) || numeric <= 0) {
    return null;
  }
  return numeric;
}

/**
 * Parse a value into a non-negative integer (>= 0).
 *
 * Used for settings like backoff milliseconds where zero is meaningful.
 * Returns `null` for invalid inputs rather than throwing.
 */
export function parseNonNegativeInteger(value: unknown): number | null {
  const numeric = typeof value === 'number' ? value : typeof value === 'string' ? parseInt(value, 10) : Number.NaN;
  if (!Number.isFinite(numeric)) {
    return null;
  }

  const parsed = Math.trunc(numeric);
  if (parsed < 0) {
    return null;
  }

  return parsed;
}

/**
 * Pick the first present value among request aliases (e.g. `personas` or `servings`).
 *
 * Query strings may repeat a key; only the first occurrence counts.
 */
export function pickFirstParam(...values: unknown[]): unknown {
  for (const value of values) {
    const single = Array.isArray(value) ? value[0] : value;
    if (single !== undefined && single !== null && single !== '') {
      return single;
    }
  }
  return undefined;
}
