import { RecipeConfig, parseRecipeConfig } from '../config/recipe';
import { PriceQuote, PriceSource } from '../services/pricing/types';

export const TEST_RECIPE: RecipeConfig = parseRecipeConfig({
    name: 'Test discada',
    referenceTotalGrams: 2937.5,
    defaultCurrency: 'MXN',
    ingredients: [
        { kind: 'bulk', name: 'Pulpa de res picada', sourceKey: 'test:pulpa', ratio: 0.55 },
        { kind: 'bulk', name: 'Tocino picado', sourceKey: 'test:tocino', ratio: 0.075 },
        { kind: 'bulk', name: 'Jamon en cuadros', sourceKey: 'test:jamon', ratio: 0.175 },
        { kind: 'packaged', name: 'Salchicha p/Asar', sourceKey: 'test:salchicha', ratio: 0.125, packSizeGrams: 800 },
        { kind: 'packaged', name: 'Chorizo', sourceKey: 'test:chorizo', ratio: 0.075, packSizeGrams: 100 },
        { kind: 'onion', name: 'Cebolla blanca', sourceKey: 'test:cebolla', ratio: 0.175, unitWeightGrams: 150 },
        {
            kind: 'beverage-pack',
            name: 'Cerveza',
            sourceKey: 'test:cerveza',
            baseUnitsPerBatch: 3.125,
            unitsPerPack: 6
        },
        { kind: 'beverage-can', name: 'Jugo de verduras V8', sourceKey: 'test:v8', baseUnitsPerBatch: 1 }
    ]
});

/**
 * One quote per test ingredient. Jamon only reports a unit price and Chorizo only a per-kg price,
 * so both exercise the price fallback.
 */
export const TEST_QUOTES: Record<string, PriceQuote> = {
    'test:pulpa': { sourceKey: 'test:pulpa', pricePerKg: 200, currency: 'MXN' },
    'test:tocino': { sourceKey: 'test:tocino', pricePerKg: 180, currency: 'MXN' },
    'test:jamon': { sourceKey: 'test:jamon', unitPrice: 160, currency: 'MXN' },
    'test:salchicha': { sourceKey: 'test:salchicha', unitPrice: 95, currency: 'MXN' },
    'test:chorizo': { sourceKey: 'test:chorizo', pricePerKg: 35, currency: 'MXN' },
    'test:cebolla': { sourceKey: 'test:cebolla', pricePerKg: 40, currency: 'MXN' },
    'test:cerveza': { sourceKey: 'test:cerveza', unitPrice: 120, currency: 'MXN' },
    'test:v8': { sourceKey: 'test:v8', unitPrice: 25, currency: 'MXN' }
};

export const quotesInRecipeOrder = (recipe: RecipeConfig = TEST_RECIPE): PriceQuote[] =>
    recipe.ingredients.map((ingredient) => TEST_QUOTES[ingredient.sourceKey]);

type LookupHandler = (sourceKey: string, call: number, signal?: AbortSignal) => Promise<PriceQuote> | PriceQuote;

/**
 * In-process price source. Records every lookup; `call` counts lookups per source key from 1.
 */
export class FakePriceSource implements PriceSource {
    public name = 'scraper' as const;
    public readonly calls: string[] = [];
    private readonly handler: LookupHandler;

    constructor(handler: LookupHandler = (sourceKey) => lookupTestQuote(sourceKey)) {
        this.handler = handler;
    }

    async lookup(sourceKey: string, signal?: AbortSignal): Promise<PriceQuote> {
        this.calls.push(sourceKey);
        return this.handler(sourceKey, this.callsFor(sourceKey), signal);
    }

    callsFor(sourceKey: string): number {
        return this.calls.filter((key) => key === sourceKey).length;
    }
}

export const lookupTestQuote = (sourceKey: string): PriceQuote => {
    const quote = TEST_QUOTES[sourceKey];
    if (!quote) {
        throw new Error(`No test quote for ${sourceKey}`);
    }
    return quote;
};

export const noSleep = async (): Promise<void> => {};
