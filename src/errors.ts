/**
 * Error types shared by the pricing pipeline and the batch cost service.
 *
 * Every error carries a typed `code` so route handlers can map failures to HTTP statuses
 * without string matching on messages.
 */

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'PRICE_SOURCE_ERROR'
  | 'PRICE_FETCH_FAILED'
  | 'INGREDIENT_FETCH_FAILED'
  | 'RECIPE_CONFIG_INVALID';

export class AppError extends Error {
  public readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
  }
}

/**
 * Rejected caller input (servings, grams per serving). Raised before any price lookup.
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

/**
 * A single lookup against the price source failed (network, status, payload).
 */
export class PriceSourceError extends AppError {
  public readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('PRICE_SOURCE_ERROR', message, { cause: options?.cause });
    this.name = 'PriceSourceError';
    this.status = options?.status;
  }
}

/**
 * Every attempt for one source key failed; `cause` holds the last attempt's error.
 */
export class PriceFetchError extends AppError {
  public readonly sourceKey: string;
  public readonly attempts: number;

  constructor(sourceKey: string, attempts: number, cause: unknown) {
    super('PRICE_FETCH_FAILED', `fetchWithRetry: ${describeError(cause)}`, { cause });
    this.name = 'PriceFetchError';
    this.sourceKey = sourceKey;
    this.attempts = attempts;
  }
}

/**
 * A price fetch failure tagged with the ingredient it belongs to.
 */
export class IngredientFetchError extends AppError {
  public readonly ingredient: string;

  constructor(ingredient: string, cause: unknown) {
    super('INGREDIENT_FETCH_FAILED', `${ingredient}: ${describeError(cause)}`, { cause });
    this.name = 'IngredientFetchError';
    this.ingredient = ingredient;
  }
}

export class RecipeConfigError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RECIPE_CONFIG_INVALID', message, options);
    this.name = 'RecipeConfigError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
};
