import type { CalculationResult, IngredientLine } from '../services/batchCost/types';

export type SerializedIngredientLine = {
  name: string;
  url: string;
  grams_needed: number;
  units_needed: number;
  purchased_units: number;
  price_per_kg: number;
  unit_price: number;
  cost: number;
  currency: string;
};

export type SerializedCalculation = {
  personas: number;
  gramos_por_persona: number;
  total_grams: number;
  items: SerializedIngredientLine[];
  total_cost: number;
  currency: string;
};

const serializeLine = (line: IngredientLine): SerializedIngredientLine => ({
  name: line.name,
  url: line.sourceKey,
  grams_needed: line.gramsNeeded,
  units_needed: line.unitsNeeded,
  purchased_units: line.purchasedUnits,
  price_per_kg: line.pricePerKg,
  unit_price: line.unitPrice,
  cost: line.cost,
  currency: line.currency
});

/**
 * Convert a calculation into the snake_case JSON shape existing API clients consume.
 */
export function serializeCalculation(result: CalculationResult): SerializedCalculation {
  return {
    personas: result.servings,
    gramos_por_persona: result.gramsPerServing,
    total_grams: result.totalGrams,
    items: result.items.map(serializeLine),
    total_cost: result.totalCost,
    currency: result.currency
  };
}
