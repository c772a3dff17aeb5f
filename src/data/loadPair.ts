/**
 * PAIR LOADER
 *
 * Fetches both legs and the FX series they need from a PriceSource, then
 * aligns them. Each distinct FX ticker is requested once per call.
 */

import createDebug from 'debug';
import type { PriceSource } from '../providers/priceSource.js';
import type { AlignedPair, PriceSeries } from '../types/series.js';
import { alignPair, DEFAULT_BASE_CURRENCY, type PairLeg } from './alignPair.js';

const log = createDebug('statarb:loader');

/** One FX ticker for any leg that needs conversion, or one per leg ticker. */
export type FxTickers = string | Record<string, string>;

export type LoadPairOptions = {
    tickerA: string;
    tickerB: string;
    start: Date;
    end: Date;
    /** Bar frequency understood by the source, e.g. `1d`. */
    interval: string;
    baseCurrency?: string;
    fxTickers?: FxTickers;
    /** Source for FX series; defaults to the main source. */
    fxSource?: PriceSource;
};

export function resolveFxTicker(spec: FxTickers | undefined, ticker: string): string | undefined {
    if (spec === undefined) return undefined;
    if (typeof spec === 'string') return spec;
    return Object.hasOwn(spec, ticker) ? spec[ticker] : undefined;
}

export async function loadPairData(source: PriceSource, options: LoadPairOptions): Promise<AlignedPair> {
    const { tickerA, tickerB, start, end, interval } = options;
    const base = (options.baseCurrency ?? DEFAULT_BASE_CURRENCY).toUpperCase();
    const fxSource = options.fxSource ?? source;

    const seriesA = await source.fetch(tickerA, start, end, interval);
    const seriesB = await source.fetch(tickerB, start, end, interval);
    log('fetched %s (%d, %s) and %s (%d, %s)',
        tickerA, seriesA.timestamps.length, seriesA.currency, tickerB, seriesB.timestamps.length, seriesB.currency);

    const fxCache = new Map<string, PriceSeries>();
    const fxLeg = async (ticker: string, series: PriceSeries): Promise<PairLeg | undefined> => {
        if (series.currency.toUpperCase() === base) return undefined;
        const fxTicker = resolveFxTicker(options.fxTickers, ticker);
        // alignPair raises the missing-mapping error with full context
        if (fxTicker === undefined) return undefined;
        let fx = fxCache.get(fxTicker);
        if (!fx) {
            fx = await fxSource.fetch(fxTicker, start, end, interval);
            fxCache.set(fxTicker, fx);
            log('fetched FX %s (%d)', fxTicker, fx.timestamps.length);
        }
        return { ticker: fxTicker, series: fx };
    };

    const fxA = await fxLeg(tickerA, seriesA);
    const fxB = await fxLeg(tickerB, seriesB);

    return alignPair(
        { ticker: tickerA, series: seriesA },
        { ticker: tickerB, series: seriesB },
        { baseCurrency: base, fx: { A: fxA, B: fxB } }
    );
}
