import { z } from 'zod';
import { PriceSourceError } from '../../errors';
import { PriceQuote, PriceSource } from './types';

export const DEFAULT_SCRAPER_BASE_URL = 'https://discada-scraper-1.onrender.com/price';

/**
 * Payload of the scraper service's `GET /price?url=...` endpoint. Optional fields arrive as
 * `null` when the page did not expose them.
 */
const scraperPriceSchema = z.object({
    url: z.string().nullish(),
    product_name: z.string().nullish(),
    price_per_kg: z.number().nullish(),
    unit_price: z.number().nullish(),
    currency: z.string().nullish(),
    raw_unit: z.string().nullish()
});

type ScraperPriceResponse = z.infer<typeof scraperPriceSchema>;

/**
 * Delegated price lookup: the source key is a product page URL, and a separate scraper service
 * turns that page into structured prices.
 */
class ScraperPriceSource implements PriceSource {
    public name = 'scraper' as const;
    private baseUrl: string;

    constructor(baseUrl: string = DEFAULT_SCRAPER_BASE_URL) {
        this.baseUrl = baseUrl;
    }

    async lookup(sourceKey: string, signal?: AbortSignal): Promise<PriceQuote> {
        const target = new URL(this.baseUrl);
        target.searchParams.set('url', sourceKey);

        let response: Response;
        try {
            response = await fetch(target, { headers: { Accept: 'application/json' }, signal });
        } catch (error) {
            throw new PriceSourceError(`Calling price source failed for ${sourceKey}`, { cause: error });
        }

        if (response.status !== 200) {
            throw new PriceSourceError(`Price source responded with status ${response.status}`, {
                status: response.status
            });
        }

        let payload: unknown;
        try {
            payload = await response.json();
        } catch (error) {
            throw new PriceSourceError('Price source returned malformed JSON', { cause: error });
        }

        const parsed = scraperPriceSchema.safeParse(payload);
        if (!parsed.success) {
            throw new PriceSourceError('Price source returned an unexpected payload', { cause: parsed.error });
        }

        return this.normalizeResponse(sourceKey, parsed.data);
    }

    /**
     * Map the scraper's snake_case payload onto a quote. A payload with neither price is a failed
     * lookup, not a zero price.
     */
    private normalizeResponse(sourceKey: string, data: ScraperPriceResponse): PriceQuote {
        const pricePerKg = data.price_per_kg ?? undefined;
        const unitPrice = data.unit_price ?? undefined;
        if (pricePerKg === undefined && unitPrice === undefined) {
            throw new PriceSourceError(`Price source returned no price for ${sourceKey}`);
        }

        return {
            sourceKey,
            pricePerKg,
            unitPrice,
            currency: data.currency?.trim() ?? '',
            productName: data.product_name ?? undefined,
            rawUnit: data.raw_unit ?? undefined
        };
    }
}

export default ScraperPriceSource;
