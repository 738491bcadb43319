export type PriceSourceName = 'scraper';

/**
 * Structured result of one price lookup.
 *
 * Sources are ambiguous about which field they fill: a product sold by weight may come back
 * with only `unitPrice`, a packaged one with only `pricePerKg`. The batch engine decides which
 * field to trust per ingredient kind.
 */
export interface PriceQuote {
    sourceKey: string;
    pricePerKg?: number;
    unitPrice?: number;
    currency: string;
    productName?: string;
    rawUnit?: string;
}

export interface PriceSource {
    name: PriceSourceName;
    lookup(sourceKey: string, signal?: AbortSignal): Promise<PriceQuote>;
}

/**
 * Anything that can resolve a quote for a source key (the retrying fetcher, or a fake in tests).
 */
export interface QuoteFetcher {
    fetch(sourceKey: string): Promise<PriceQuote>;
}
