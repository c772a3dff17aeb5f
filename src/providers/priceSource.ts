/**
 * PRICE SOURCE CAPABILITY
 *
 * The single contract the pipeline needs from its environment. File, REST
 * and in-memory sources all implement it; nothing downstream depends on a
 * concrete source.
 */

import { PriceRangeError } from '../lib/errors.js';
import type { PriceSeries } from '../types/series.js';

export interface PriceSource {
    /**
     * Historical prices for `ticker` in [start, end].
     * Rejects with TickerNotFoundError, PriceRangeError or PriceSourceIOError.
     */
    fetch(ticker: string, start: Date, end: Date, interval: string): Promise<PriceSeries>;
}

export function assertRange(ticker: string, start: Date, end: Date): void {
    if (!(start.getTime() < end.getTime())) {
        throw new PriceRangeError(
            `start must be earlier than end for ${ticker} (${start.toISOString()} >= ${end.toISOString()})`,
            { ticker, start: start.toISOString(), end: end.toISOString() }
        );
    }
}

export function emptyRangeError(ticker: string, start: Date, end: Date, source: string): PriceRangeError {
    return new PriceRangeError(
        `No data for ${ticker} from ${source} between ${start.toISOString()} and ${end.toISOString()}`,
        { ticker, source, start: start.toISOString(), end: end.toISOString() }
    );
}
