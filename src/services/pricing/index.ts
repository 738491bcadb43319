import { AppConfig } from '../../config/environment';
import { PriceCache } from './priceCache';
import { RetryingPriceFetcher } from './priceFetcher';
import ScraperPriceSource from './scraperPriceSource';
import { PriceSource } from './types';

let sourceInstance: PriceSource | null = null;

export const getPriceSource = (config: Pick<AppConfig, 'priceSourceBaseUrl'>): PriceSource => {
    if (sourceInstance) {
        return sourceInstance;
    }

    sourceInstance = new ScraperPriceSource(config.priceSourceBaseUrl);
    return sourceInstance;
};

/**
 * Build the process-wide cache and the fetcher that fills it.
 */
export const createPriceFetcher = (
    config: Pick<AppConfig, 'cacheTtlMs' | 'fetchAttempts' | 'fetchBackoffMs' | 'fetchTimeoutMs'>,
    source: PriceSource
): { cache: PriceCache; fetcher: RetryingPriceFetcher } => {
    const cache = new PriceCache(config.cacheTtlMs);
    const fetcher = new RetryingPriceFetcher(source, cache, {
        attempts: config.fetchAttempts,
        baseDelayMs: config.fetchBackoffMs,
        attemptTimeoutMs: config.fetchTimeoutMs
    });
    return { cache, fetcher };
};

export * from './types';
export { PriceCache } from './priceCache';
export { RetryingPriceFetcher } from './priceFetcher';
export { fetchAllQuotes } from './fetchAllQuotes';
