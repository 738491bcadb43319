import { PriceQuote } from './types';

export const DEFAULT_PRICE_CACHE_TTL_MS = 5 * 60 * 1000;

type CacheEntry = Readonly<{
    quote: Readonly<PriceQuote>;
    fetchedAt: number;
}>;

export type Clock = () => number;

/**
 * In-memory quote cache keyed by source key.
 *
 * Expiry is lazy: stale entries stay in the map and are ignored on read until the next
 * successful fetch overwrites them. The key set is the recipe's fixed ingredient list, so the
 * map never grows past it.
 */
export class PriceCache {
    private readonly entries = new Map<string, CacheEntry>();
    private readonly ttlMs: number;
    private readonly now: Clock;

    constructor(ttlMs: number = DEFAULT_PRICE_CACHE_TTL_MS, now: Clock = Date.now) {
        this.ttlMs = ttlMs;
        this.now = now;
    }

    get(key: string): PriceQuote | undefined {
        const entry = this.entries.get(key);
        if (!entry) {
            return undefined;
        }
        if (this.now() - entry.fetchedAt > this.ttlMs) {
            return undefined;
        }
        return entry.quote;
    }

    /**
     * Replace the entry for `key`. Quote and timestamp are frozen together so readers never
     * observe one without the other.
     */
    set(key: string, quote: PriceQuote): void {
        this.entries.set(
            key,
            Object.freeze({
                quote: Object.freeze({ ...quote }),
                fetchedAt: this.now()
            })
        );
    }

    get size(): number {
        return this.entries.size;
    }
}
