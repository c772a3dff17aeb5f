/**
 * PAIR ALIGNMENT
 *
 * Joins the two legs of a pair (and the FX series needed to bring them into
 * one currency) on their common UTC timestamps, drops incomplete rows and
 * converts each leg into the base currency.
 */

import createDebug from 'debug';
import { ConfigurationError } from '../lib/errors.js';
import { convertCurrency, parseFxPair } from '../lib/fx.js';
import type { AlignedPair, PriceSeries } from '../types/series.js';

const log = createDebug('statarb:align');

export type PairLeg = { ticker: string; series: PriceSeries };

export type AlignPairOptions = {
    baseCurrency?: string;
    /** FX series per leg, required for a leg not listed in the base currency. */
    fx?: { A?: PairLeg; B?: PairLeg };
};

export const DEFAULT_BASE_CURRENCY = 'USD';

type LegPlan = { column: 'A' | 'B'; leg: PairLeg; currency: string; fx?: PairLeg };

function planLeg(column: 'A' | 'B', leg: PairLeg, base: string, fx: PairLeg | undefined): LegPlan {
    const currency = leg.series.currency.toUpperCase();
    if (currency === base) return { column, leg, currency };
    if (!fx) {
        throw new ConfigurationError(
            `Currency for ${leg.ticker} is ${currency}, but no FX ticker was provided to convert to ${base}`,
            { ticker: leg.ticker, currency, target: base }
        );
    }
    // fail on a malformed FX ticker before any joining work
    parseFxPair(fx.ticker);
    return { column, leg, currency, fx };
}

function toLookup(series: PriceSeries): Map<number, number> {
    const m = new Map<number, number>();
    series.timestamps.forEach((t, i) => m.set(t, series.prices[i]));
    return m;
}

export function alignPair(legA: PairLeg, legB: PairLeg, options: AlignPairOptions = {}): AlignedPair {
    const base = (options.baseCurrency ?? DEFAULT_BASE_CURRENCY).toUpperCase();
    const plans = [
        planLeg('A', legA, base, options.fx?.A),
        planLeg('B', legB, base, options.fx?.B)
    ];

    // one column per distinct FX ticker, first series wins
    const fxLookups = new Map<string, Map<number, number>>();
    for (const plan of plans) {
        if (plan.fx && !fxLookups.has(plan.fx.ticker)) fxLookups.set(plan.fx.ticker, toLookup(plan.fx.series));
    }

    const lookupB = toLookup(legB.series);
    const timestamps: number[] = [];
    const rawA: number[] = [];
    const rawB: number[] = [];
    const fxColumns = new Map<string, number[]>([...fxLookups.keys()].map(k => [k, []]));

    const seriesA = legA.series;
    for (let i = 0; i < seriesA.timestamps.length; i++) {
        const t = seriesA.timestamps[i];
        const a = seriesA.prices[i];
        const b = lookupB.get(t);
        if (!Number.isFinite(a) || b === undefined || !Number.isFinite(b)) continue;

        const rates: Array<[string, number]> = [];
        let complete = true;
        for (const [ticker, lookup] of fxLookups) {
            const rate = lookup.get(t);
            if (rate === undefined || !Number.isFinite(rate)) {
                complete = false;
                break;
            }
            rates.push([ticker, rate]);
        }
        if (!complete) continue;

        timestamps.push(t);
        rawA.push(a);
        rawB.push(b);
        for (const [ticker, rate] of rates) fxColumns.get(ticker)?.push(rate);
    }

    log('aligned %s/%s: %d rows (A=%d B=%d fx=%d)',
        legA.ticker, legB.ticker, timestamps.length, seriesA.timestamps.length, legB.series.timestamps.length, fxLookups.size);

    const convert = (plan: LegPlan, raw: number[]): number[] => {
        if (!plan.fx) return raw;
        return convertCurrency(raw, plan.currency, base, plan.fx.ticker, fxColumns.get(plan.fx.ticker) ?? []);
    };

    return {
        timestamps,
        a: convert(plans[0], rawA),
        b: convert(plans[1], rawB),
        currencyA: plans[0].currency,
        currencyB: plans[1].currency,
        baseCurrency: base
    };
}
