import { Ingredient, RecipeConfig } from '../../config/recipe';
import { ValidationError } from '../../errors';
import { PriceQuote } from '../pricing/types';
import { ceilDiv, round2, unitsForGrams } from './math';
import { resolvePricePolicy } from './pricePolicy';
import { BatchInput, CalculationResult, IngredientLine } from './types';

type LineContext = {
    totalGrams: number;
    /** Batch size relative to the recipe's reference batch; scales beverages. */
    scale: number;
};

/**
 * Reject anything but strictly positive safe integers whose product is also a safe integer, so the
 * batch total stays exact. Run this before fetching prices.
 */
export function validateBatchInput(servings: unknown, gramsPerServing: unknown): BatchInput {
    const isPositiveInteger = (value: unknown): value is number =>
        typeof value === 'number' && Number.isSafeInteger(value) && value > 0;

    if (!isPositiveInteger(servings) || !isPositiveInteger(gramsPerServing)) {
        throw new ValidationError('servings and grams per serving must be positive integers');
    }
    if (!Number.isSafeInteger(servings * gramsPerServing)) {
        throw new ValidationError('servings times grams per serving is too large');
    }
    return { servings, gramsPerServing };
}

const emptyLine = (ingredient: Ingredient, quote: PriceQuote): IngredientLine => ({
    name: ingredient.name,
    sourceKey: ingredient.sourceKey,
    gramsNeeded: 0,
    unitsNeeded: 0,
    purchasedUnits: 0,
    pricePerKg: 0,
    unitPrice: 0,
    cost: 0,
    currency: quote.currency
});

/**
 * Cost one ingredient line from its quote.
 */
export function calculateLine(ingredient: Ingredient, quote: PriceQuote, context: LineContext): IngredientLine {
    const line = emptyLine(ingredient, quote);

    switch (ingredient.kind) {
        case 'bulk': {
            const grams = ingredient.ratio * context.totalGrams;
            const price = resolvePricePolicy(quote, 'per-kg');
            return {
                ...line,
                ...price,
                gramsNeeded: grams,
                cost: round2((grams / 1000) * price.pricePerKg)
            };
        }
        case 'packaged': {
            const grams = ingredient.ratio * context.totalGrams;
            const packs = unitsForGrams(grams, ingredient.packSizeGrams);
            const price = resolvePricePolicy(quote, 'per-unit');
            return {
                ...line,
                ...price,
                gramsNeeded: grams,
                purchasedUnits: packs,
                cost: round2(packs * price.unitPrice)
            };
        }
        case 'onion': {
            // Cost is based on the weight of whole onions bought, not the exact grams needed.
            const grams = ingredient.ratio * context.totalGrams;
            const units = unitsForGrams(grams, ingredient.unitWeightGrams);
            const price = resolvePricePolicy(quote, 'per-kg');
            return {
                ...line,
                ...price,
                gramsNeeded: grams,
                unitsNeeded: units,
                cost: round2(((units * ingredient.unitWeightGrams) / 1000) * price.pricePerKg)
            };
        }
        case 'beverage-pack': {
            const cans = Math.ceil(context.scale * ingredient.baseUnitsPerBatch);
            const packs = cans > 0 ? Math.max(1, ceilDiv(cans, ingredient.unitsPerPack)) : 0;
            const price = resolvePricePolicy(quote, 'per-unit', { allowFallback: false });
            return {
                ...line,
                ...price,
                unitsNeeded: cans,
                purchasedUnits: packs,
                cost: round2(packs * price.unitPrice)
            };
        }
        case 'beverage-can': {
            let cans = Math.ceil(context.scale * ingredient.baseUnitsPerBatch);
            if (cans === 0 && context.scale > 0) {
                cans = 1;
            }
            const price = resolvePricePolicy(quote, 'per-unit', { allowFallback: false });
            return {
                ...line,
                ...price,
                unitsNeeded: cans,
                purchasedUnits: cans,
                cost: round2(cans * price.unitPrice)
            };
        }
    }
}

/**
 * Currency of the whole batch: the last line that reports one wins, falling back to the recipe
 * default. Mixed currencies are summed as-is, so they are logged.
 */
export function resolveBatchCurrency(lines: readonly IngredientLine[], defaultCurrency: string): string {
    let currency = defaultCurrency;
    const reported = new Set<string>();
    for (const line of lines) {
        if (line.currency) {
            currency = line.currency;
            reported.add(line.currency);
        }
    }

    if (reported.size > 1) {
        console.warn(`Batch mixes currencies (${[...reported].join(', ')}); reporting total as ${currency}.`);
    }
    return currency;
}

/**
 * Scale the recipe to `servings × gramsPerServing` and cost every ingredient.
 *
 * `quotes[i]` must belong to `recipe.ingredients[i]`; lines come back in the same order.
 */
export function calculateBatch(
    input: BatchInput,
    quotes: readonly PriceQuote[],
    recipe: RecipeConfig
): CalculationResult {
    const { servings, gramsPerServing } = validateBatchInput(input.servings, input.gramsPerServing);
    if (quotes.length !== recipe.ingredients.length) {
        throw new Error(`Expected ${recipe.ingredients.length} price quotes, received ${quotes.length}.`);
    }

    const totalGrams = servings * gramsPerServing;
    const context: LineContext = {
        totalGrams,
        scale: totalGrams / recipe.referenceTotalGrams
    };

    const items = recipe.ingredients.map((ingredient, index) => calculateLine(ingredient, quotes[index], context));
    const totalCost = round2(items.reduce((sum, item) => sum + item.cost, 0));

    return {
        servings,
        gramsPerServing,
        totalGrams: round2(totalGrams),
        items,
        totalCost,
        currency: resolveBatchCurrency(items, recipe.defaultCurrency)
    };
}
