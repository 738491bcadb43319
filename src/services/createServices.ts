import type { AppConfig } from '../config/environment';
import { loadRecipeConfig } from '../config/recipe';
import { BatchCostCalculator } from './batchCost';
import { createPriceFetcher, getPriceSource } from './pricing';
import { PriceCache } from './pricing/priceCache';

export type Services = {
    calculator: BatchCostCalculator;
    cache: PriceCache;
};

/**
 * Wire the recipe, price source, cache and calculator together. Fails if the recipe file is
 * missing or violates its invariants, so a bad deployment never serves a request.
 */
export const createServices = async (config: AppConfig): Promise<Services> => {
    const recipe = await loadRecipeConfig(config.recipeConfigPath);
    const { cache, fetcher } = createPriceFetcher(config, getPriceSource(config));
    return { calculator: new BatchCostCalculator(recipe, fetcher), cache };
};
