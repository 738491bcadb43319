/**
 * Round half away from zero (2.345 -> 2.35, -2.345 -> -2.35).
 */
export const roundHalfAwayFromZero = (value: number, precision = 0): number => {
    const multiplier = Math.pow(10, precision);
    return (Math.sign(value) * Math.round(Math.abs(value) * multiplier)) / multiplier;
};

export const round2 = (value: number): number => roundHalfAwayFromZero(value, 2);

/**
 * Integer ceiling division; non-positive numerators need nothing.
 */
export const ceilDiv = (numerator: number, denominator: number): number => {
    if (numerator <= 0) {
        return 0;
    }
    return Math.ceil(numerator / denominator);
};

/**
 * Whole units to buy for a required mass. The mass is first rounded to the nearest gram so that
 * float noise (e.g. 300.00000000000006 g) does not buy an extra pack.
 */
export const unitsForGrams = (grams: number, unitGrams: number): number =>
    ceilDiv(roundHalfAwayFromZero(grams), unitGrams);
