import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PriceFetchError, PriceSourceError } from '../../errors';
import { FakePriceSource, noSleep } from '../../test/fixtures';
import { PriceCache } from './priceCache';
import { RetryingPriceFetcher } from './priceFetcher';
import { PriceQuote } from './types';

const quote: PriceQuote = { sourceKey: 'test:chorizo', unitPrice: 42, currency: 'MXN' };

describe('RetryingPriceFetcher', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('serves cached quotes without calling the source', async () => {
        const source = new FakePriceSource();
        const cache = new PriceCache();
        cache.set('test:chorizo', quote);
        const fetcher = new RetryingPriceFetcher(source, cache, { sleep: noSleep });

        await expect(fetcher.fetch('test:chorizo')).resolves.toEqual(quote);
        expect(source.calls).toEqual([]);
    });

    it('retries with linear backoff and caches the eventual success', async () => {
        const sleeps: number[] = [];
        const source = new FakePriceSource((_key, call) => {
            if (call < 3) {
                throw new Error(`boom ${call}`);
            }
            return quote;
        });
        const cache = new PriceCache();
        const fetcher = new RetryingPriceFetcher(source, cache, {
            baseDelayMs: 800,
            sleep: async (ms) => {
                sleeps.push(ms);
            }
        });

        await expect(fetcher.fetch('test:chorizo')).resolves.toEqual(quote);
        expect(source.callsFor('test:chorizo')).toBe(3);
        expect(sleeps).toEqual([800, 1600]);
        expect(cache.get('test:chorizo')).toEqual(quote);
    });

    it('wraps the last failure once every attempt is used up', async () => {
        const sleeps: number[] = [];
        const source = new FakePriceSource((_key, call) => {
            throw new Error(`boom ${call}`);
        });
        const cache = new PriceCache();
        const fetcher = new RetryingPriceFetcher(source, cache, {
            attempts: 3,
            baseDelayMs: 10,
            sleep: async (ms) => {
                sleeps.push(ms);
            }
        });

        const error = await fetcher.fetch('test:chorizo').catch((err: unknown) => err);
        expect(error).toBeInstanceOf(PriceFetchError);
        if (!(error instanceof PriceFetchError)) return;
        expect(error.attempts).toBe(3);
        expect(error.sourceKey).toBe('test:chorizo');
        expect(error.message).toBe('fetchWithRetry: boom 3');
        expect(error.cause).toBeInstanceOf(Error);
        expect(sleeps).toEqual([10, 20]);
        expect(cache.get('test:chorizo')).toBeUndefined();
    });

    it('honours an explicit attempt count per call', async () => {
        const source = new FakePriceSource(() => {
            throw new Error('down');
        });
        const fetcher = new RetryingPriceFetcher(source, new PriceCache(), { sleep: noSleep });

        await expect(fetcher.fetch('test:chorizo', 1, 0)).rejects.toBeInstanceOf(PriceFetchError);
        expect(source.callsFor('test:chorizo')).toBe(1);
    });

    it('gives each attempt its own timeout and aborts the stalled lookup', async () => {
        const signals: AbortSignal[] = [];
        const source = new FakePriceSource((_key, _call, signal) => {
            if (signal) signals.push(signal);
            return new Promise<PriceQuote>(() => {});
        });
        const fetcher = new RetryingPriceFetcher(source, new PriceCache(), {
            attempts: 2,
            attemptTimeoutMs: 20,
            sleep: noSleep
        });

        const error = await fetcher.fetch('test:chorizo').catch((err: unknown) => err);
        expect(error).toBeInstanceOf(PriceFetchError);
        if (!(error instanceof PriceFetchError)) return;
        expect(error.cause).toBeInstanceOf(PriceSourceError);
        expect(error.message).toBe('fetchWithRetry: Price lookup timed out after 20 ms');
        expect(signals).toHaveLength(2);
        expect(signals[0]).not.toBe(signals[1]);
        expect(signals.every((signal) => signal.aborted)).toBe(true);
    });
});
