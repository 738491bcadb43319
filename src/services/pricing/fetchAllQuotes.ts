import { IngredientFetchError } from '../../errors';
import { PriceQuote, QuoteFetcher } from './types';

export type QuoteRequest = {
    name: string;
    sourceKey: string;
};

/**
 * Fetch one quote per request concurrently and return them in request order.
 *
 * Lookups do not cancel each other: every fetch runs to completion (or its own timeout) before the
 * first failure, in declaration order, is reported. Quotes fetched successfully along the way stay
 * in the fetcher's cache even when the batch as a whole fails.
 */
export async function fetchAllQuotes(
    fetcher: QuoteFetcher,
    requests: readonly QuoteRequest[]
): Promise<PriceQuote[]> {
    const settled = await Promise.allSettled(requests.map((request) => fetcher.fetch(request.sourceKey)));

    const quotes: PriceQuote[] = [];
    for (const [index, outcome] of settled.entries()) {
        if (outcome.status === 'rejected') {
            throw new IngredientFetchError(requests[index].name, outcome.reason);
        }
        quotes.push(outcome.value);
    }

    return quotes;
}
