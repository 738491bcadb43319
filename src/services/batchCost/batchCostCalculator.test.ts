import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { IngredientFetchError, PriceFetchError, ValidationError } from '../../errors';
import { FakePriceSource, TEST_RECIPE, lookupTestQuote, noSleep } from '../../test/fixtures';
import { PriceCache } from '../pricing/priceCache';
import { RetryingPriceFetcher } from '../pricing/priceFetcher';
import { BatchCostCalculator } from '.';

const TTL_MS = 5 * 60 * 1000;

const buildCalculator = (source: FakePriceSource, now: () => number = Date.now) => {
    const cache = new PriceCache(TTL_MS, now);
    const fetcher = new RetryingPriceFetcher(source, cache, { attempts: 3, baseDelayMs: 800, sleep: noSleep });
    return { cache, calculator: new BatchCostCalculator(TEST_RECIPE, fetcher) };
};

describe('BatchCostCalculator', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('fetches every ingredient once and costs the batch', async () => {
        const source = new FakePriceSource();
        const { calculator } = buildCalculator(source);

        const result = await calculator.calculate(10, 250);

        expect(source.calls).toHaveLength(TEST_RECIPE.ingredients.length);
        expect(result.totalGrams).toBe(2500);
        expect(result.items.map((item) => item.name)).toEqual(TEST_RECIPE.ingredients.map((i) => i.name));
        expect(result.items[0].gramsNeeded).toBe(1375);
        expect(result.items[5].gramsNeeded).toBe(437.5);
        expect(result.items[5].unitsNeeded).toBe(3);
        expect(result.totalCost).toBe(706.75);
    });

    it('returns identical results from a warm cache without new lookups', async () => {
        const source = new FakePriceSource();
        const { calculator } = buildCalculator(source);

        const first = await calculator.calculate(10, 250);
        const second = await calculator.calculate(10, 250);

        expect(JSON.stringify(second)).toBe(JSON.stringify(first));
        expect(source.calls).toHaveLength(8);
    });

    it('refetches every price once the cache has expired', async () => {
        let now = 0;
        const source = new FakePriceSource();
        const { calculator } = buildCalculator(source, () => now);

        await calculator.calculate(4, 300);
        now += TTL_MS + 1;
        await calculator.calculate(4, 300);

        expect(source.calls).toHaveLength(16);
    });

    it('rejects invalid input before contacting the price source', async () => {
        const source = new FakePriceSource();
        const { calculator } = buildCalculator(source);

        await expect(calculator.calculate(0, 250)).rejects.toBeInstanceOf(ValidationError);
        await expect(calculator.calculate(10, -5)).rejects.toBeInstanceOf(ValidationError);
        await expect(calculator.calculate(1.5, 250)).rejects.toBeInstanceOf(ValidationError);
        expect(source.calls).toEqual([]);
    });

    it('fails the whole batch when one ingredient cannot be priced, keeping the rest cached', async () => {
        const source = new FakePriceSource((sourceKey) => {
            if (sourceKey === 'test:chorizo') {
                throw new Error('product removed');
            }
            return lookupTestQuote(sourceKey);
        });
        const { calculator, cache } = buildCalculator(source);

        const error = await calculator.calculate(10, 250).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(IngredientFetchError);
        if (!(error instanceof IngredientFetchError)) return;
        expect(error.ingredient).toBe('Chorizo');
        expect(error.message).toBe('Chorizo: fetchWithRetry: product removed');
        expect(error.cause).toBeInstanceOf(PriceFetchError);
        expect(source.callsFor('test:chorizo')).toBe(3);

        const others = TEST_RECIPE.ingredients.filter((ingredient) => ingredient.sourceKey !== 'test:chorizo');
        for (const ingredient of others) {
            expect(cache.get(ingredient.sourceKey)).toEqual(lookupTestQuote(ingredient.sourceKey));
        }
        expect(cache.get('test:chorizo')).toBeUndefined();
        expect(cache.size).toBe(7);
    });
});
