import { RecipeConfig } from '../../config/recipe';
import { fetchAllQuotes } from '../pricing/fetchAllQuotes';
import { QuoteFetcher } from '../pricing/types';
import { calculateBatch, validateBatchInput } from './calculate';
import { CalculationResult } from './types';

/**
 * Public entry point: validate the request, fetch every ingredient price, then cost the batch.
 *
 * The calculation is all-or-nothing. If any ingredient's price cannot be fetched the call rejects
 * with an `IngredientFetchError` naming it.
 */
export class BatchCostCalculator {
    private readonly recipe: RecipeConfig;
    private readonly fetcher: QuoteFetcher;

    constructor(recipe: RecipeConfig, fetcher: QuoteFetcher) {
        this.recipe = recipe;
        this.fetcher = fetcher;
    }

    get recipeName(): string {
        return this.recipe.name;
    }

    async calculate(servings: number, gramsPerServing: number): Promise<CalculationResult> {
        const input = validateBatchInput(servings, gramsPerServing);
        const quotes = await fetchAllQuotes(this.fetcher, this.recipe.ingredients);
        return calculateBatch(input, quotes, this.recipe);
    }
}

export * from './types';
export { calculateBatch, calculateLine, resolveBatchCurrency, validateBatchInput } from './calculate';
export { resolvePricePolicy } from './pricePolicy';
