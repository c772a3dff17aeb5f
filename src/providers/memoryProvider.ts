import { TickerNotFoundError } from '../lib/errors.js';
import type { PriceSeries } from '../types/series.js';
import { assertRange, emptyRangeError, type PriceSource } from './priceSource.js';

/**
 * Serves fixed series held in memory. Keeps a per-ticker fetch count so
 * callers can check how often a ticker was requested.
 */
export class InMemoryPriceSource implements PriceSource {
    private series: Map<string, PriceSeries>;
    private fetches: Map<string, number> = new Map();

    constructor(series: Record<string, PriceSeries>) {
        this.series = new Map(Object.entries(series));
    }

    async fetch(ticker: string, start: Date, end: Date, _interval: string): Promise<PriceSeries> {
        this.fetches.set(ticker, this.fetchCount(ticker) + 1);
        const full = this.series.get(ticker);
        if (!full) throw new TickerNotFoundError(`Ticker '${ticker}' is not configured for the in-memory source`, { ticker });
        assertRange(ticker, start, end);

        const from = start.getTime();
        const to = end.getTime();
        const timestamps: number[] = [];
        const prices: number[] = [];
        full.timestamps.forEach((t, i) => {
            if (t < from || t > to) return;
            timestamps.push(t);
            prices.push(full.prices[i]);
        });
        if (!timestamps.length) throw emptyRangeError(ticker, start, end, 'memory');
        return { timestamps, prices, currency: full.currency };
    }

    fetchCount(ticker: string): number {
        return this.fetches.get(ticker) ?? 0;
    }
}
