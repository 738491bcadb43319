export interface BatchInput {
    servings: number;
    gramsPerServing: number;
}

/**
 * Per-ingredient output. Exactly one of `pricePerKg` / `unitPrice` is non-zero, depending on how
 * the ingredient is bought.
 */
export interface IngredientLine {
    name: string;
    sourceKey: string;
    gramsNeeded: number;
    /** Display quantity: onions, cans. */
    unitsNeeded: number;
    /** Rounded-up purchase quantity: packs, six-packs, cans. */
    purchasedUnits: number;
    pricePerKg: number;
    unitPrice: number;
    cost: number;
    currency: string;
}

export interface CalculationResult {
    servings: number;
    gramsPerServing: number;
    totalGrams: number;
    items: IngredientLine[];
    totalCost: number;
    currency: string;
}
