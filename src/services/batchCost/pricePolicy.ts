import { PriceQuote } from '../pricing/types';

/** Which quote field an ingredient is costed from. */
export type PriceBasis = 'per-kg' | 'per-unit';

export type ResolvedPrice = {
    pricePerKg: number;
    unitPrice: number;
};

export type PricePolicyOptions = {
    /** Use the other field when the authoritative one is missing. Defaults to `true`. */
    allowFallback?: boolean;
};

/**
 * Pick the one price field an ingredient should be costed from and zero the other.
 *
 * The price source is not reliable about which field it fills: weighed products sometimes only
 * report `unitPrice`, packs sometimes only `pricePerKg`. With fallback enabled, a missing or
 * non-positive authoritative field is replaced by a positive value from the other field.
 */
export function resolvePricePolicy(
    quote: Pick<PriceQuote, 'pricePerKg' | 'unitPrice'>,
    basis: PriceBasis,
    options: PricePolicyOptions = {}
): ResolvedPrice {
    const allowFallback = options.allowFallback ?? true;
    const pricePerKg = quote.pricePerKg ?? 0;
    const unitPrice = quote.unitPrice ?? 0;

    if (basis === 'per-kg') {
        const useUnit = allowFallback && pricePerKg <= 0 && unitPrice > 0;
        return { pricePerKg: useUnit ? unitPrice : pricePerKg, unitPrice: 0 };
    }

    const useKg = allowFallback && unitPrice <= 0 && pricePerKg > 0;
    return { pricePerKg: 0, unitPrice: useKg ? pricePerKg : unitPrice };
}
