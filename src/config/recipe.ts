import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { RecipeConfigError, describeError } from '../errors';

/** Protein ratios must sum to 1 within this tolerance. */
export const RATIO_SUM_TOLERANCE = 1e-9;

const nameSchema = z.string().trim().min(1);
const sourceKeySchema = z.string().trim().min(1);
const ratioSchema = z.number().min(0).max(1);

const ingredientSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('bulk'),
    name: nameSchema,
    sourceKey: sourceKeySchema,
    ratio: ratioSchema
  }),
  z.object({
    kind: z.literal('packaged'),
    name: nameSchema,
    sourceKey: sourceKeySchema,
    ratio: ratioSchema,
    packSizeGrams: z.number().positive()
  }),
  z.object({
    kind: z.literal('onion'),
    name: nameSchema,
    sourceKey: sourceKeySchema,
    ratio: ratioSchema,
    unitWeightGrams: z.number().positive()
  }),
  z.object({
    kind: z.literal('beverage-pack'),
    name: nameSchema,
    sourceKey: sourceKeySchema,
    baseUnitsPerBatch: z.number().min(0),
    unitsPerPack: z.number().int().positive()
  }),
  z.object({
    kind: z.literal('beverage-can'),
    name: nameSchema,
    sourceKey: sourceKeySchema,
    baseUnitsPerBatch: z.number().min(0)
  })
]);

const recipeSchema = z.object({
  name: nameSchema,
  /** Total mass of the reference batch; only used to scale beverages. */
  referenceTotalGrams: z.number().positive(),
  defaultCurrency: z.string().trim().min(1).default('MXN'),
  ingredients: z.array(ingredientSchema).min(1)
});

export type Ingredient = z.infer<typeof ingredientSchema>;
export type IngredientKind = Ingredient['kind'];
export type RecipeConfig = z.infer<typeof recipeSchema>;

/** Ingredients are listed, fetched and reported in this kind order. */
export const INGREDIENT_KIND_ORDER: readonly IngredientKind[] = [
  'bulk',
  'packaged',
  'onion',
  'beverage-pack',
  'beverage-can'
];

/** Ingredients whose ratios share the protein block (and must sum to 1). */
export const isProteinIngredient = (
  ingredient: Ingredient
): ingredient is Extract<Ingredient, { kind: 'bulk' | 'packaged' }> =>
  ingredient.kind === 'bulk' || ingredient.kind === 'packaged';

/**
 * Check cross-field invariants zod cannot express. Returns a list of problems (empty when valid).
 */
export function findRecipeProblems(recipe: RecipeConfig): string[] {
  const problems: string[] = [];

  const seen = new Set<string>();
  for (const ingredient of recipe.ingredients) {
    if (seen.has(ingredient.name)) {
      problems.push(`duplicate ingredient name "${ingredient.name}"`);
    }
    seen.add(ingredient.name);
  }

  recipe.ingredients.forEach((ingredient, index) => {
    const previous = index > 0 ? recipe.ingredients[index - 1] : undefined;
    if (previous && INGREDIENT_KIND_ORDER.indexOf(ingredient.kind) < INGREDIENT_KIND_ORDER.indexOf(previous.kind)) {
      problems.push(`ingredient "${ingredient.name}" (${ingredient.kind}) is listed after ${previous.kind} ingredients`);
    }
  });

  const proteins = recipe.ingredients.filter(isProteinIngredient);
  if (proteins.length > 0) {
    const ratioSum = proteins.reduce((sum, ingredient) => sum + ingredient.ratio, 0);
    if (Math.abs(ratioSum - 1) > RATIO_SUM_TOLERANCE) {
      problems.push(`protein ratios must sum to 1 (got ${ratioSum})`);
    }
  }

  return problems;
}

/**
 * Validate a parsed JSON document as a recipe. Throws `RecipeConfigError` listing every problem.
 */
export function parseRecipeConfig(raw: unknown): RecipeConfig {
  const parsed = recipeSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RecipeConfigError(`Invalid recipe configuration: ${details}`, { cause: parsed.error });
  }

  const problems = findRecipeProblems(parsed.data);
  if (problems.length > 0) {
    throw new RecipeConfigError(`Invalid recipe configuration: ${problems.join('; ')}`);
  }

  return deepFreeze(parsed.data);
}

/**
 * Load and validate the recipe file once at startup. Relative paths resolve against the working
 * directory.
 */
export async function loadRecipeConfig(filePath: string): Promise<RecipeConfig> {
  const resolved = path.resolve(process.cwd(), filePath);

  let contents: string;
  try {
    contents = await readFile(resolved, 'utf8');
  } catch (error) {
    throw new RecipeConfigError(`Unable to read recipe configuration at ${resolved}: ${describeError(error)}`, {
      cause: error
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (error) {
    throw new RecipeConfigError(`Recipe configuration at ${resolved} is not valid JSON`, { cause: error });
  }

  return parseRecipeConfig(json);
}

const deepFreeze = <T extends object>(value: T): T => {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  Object.freeze(value);
  return value;
};
