import { setTimeout as delay } from 'node:timers/promises';
import { PriceFetchError, PriceSourceError, describeError } from '../../errors';
import { PriceCache } from './priceCache';
import { PriceQuote, PriceSource, QuoteFetcher } from './types';

export const DEFAULT_FETCH_ATTEMPTS = 3;
export const DEFAULT_FETCH_BACKOFF_MS = 800;
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 60_000;

export type PriceFetcherOptions = {
    attempts?: number;
    baseDelayMs?: number;
    attemptTimeoutMs?: number;
    sleep?: (ms: number) => Promise<void>;
};

/**
 * Cache-first price fetcher with a per-attempt timeout and linear backoff.
 *
 * Failures are not classified: a 404, a socket reset and an unparsable payload are all retried
 * the same way. Every attempt gets the full timeout budget.
 */
export class RetryingPriceFetcher implements QuoteFetcher {
    private readonly source: PriceSource;
    private readonly cache: PriceCache;
    private readonly attempts: number;
    private readonly baseDelayMs: number;
    private readonly attemptTimeoutMs: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(source: PriceSource, cache: PriceCache, options: PriceFetcherOptions = {}) {
        this.source = source;
        this.cache = cache;
        this.attempts = Math.max(1, options.attempts ?? DEFAULT_FETCH_ATTEMPTS);
        this.baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_FETCH_BACKOFF_MS);
        this.attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
        this.sleep = options.sleep ?? ((ms) => delay(ms));
    }

    async fetch(
        sourceKey: string,
        attempts: number = this.attempts,
        baseDelayMs: number = this.baseDelayMs
    ): Promise<PriceQuote> {
        const cached = this.cache.get(sourceKey);
        if (cached) {
            return cached;
        }

        let lastError: unknown = new PriceSourceError(`No attempts made for ${sourceKey}`);
        for (let attempt = 1; attempt <= attempts; attempt += 1) {
            try {
                const quote = await this.attemptLookup(sourceKey);
                this.cache.set(sourceKey, quote);
                return quote;
            } catch (error) {
                lastError = error;
                console.warn(
                    `Price lookup for ${sourceKey} failed (attempt ${attempt}/${attempts}): ${describeError(error)}`
                );
            }

            if (attempt < attempts) {
                await this.sleep(baseDelayMs * attempt);
            }
        }

        throw new PriceFetchError(sourceKey, attempts, lastError);
    }

    /**
     * Run one lookup under its own deadline. The deadline is enforced here as well as passed to the
     * source, so a source that ignores its abort signal still cannot stall the attempt.
     */
    private async attemptLookup(sourceKey: string): Promise<PriceQuote> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => {
            controller.abort(new PriceSourceError(`Price lookup timed out after ${this.attemptTimeoutMs} ms`));
        }, this.attemptTimeoutMs);

        const aborted = new Promise<never>((_resolve, reject) => {
            controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
        });

        try {
            return await Promise.race([this.source.lookup(sourceKey, controller.signal), aborted]);
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
