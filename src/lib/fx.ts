/**
 * FX HELPERS
 *
 * Currency-pair parsing and price conversion used when the two legs of a
 * pair are listed in different currencies.
 */

import { ConfigurationError, CurrencyIncompatibilityError } from './errors.js';

export type FxPair = { base: string; quote: string };

/**
 * Splits a ticker such as `EURUSD`, `EUR/USD` or `EUR_USD` into base and
 * quote. Exactly six letters are required; tickers carrying extra letters
 * (exchange or vendor suffixes like `EURUSD=X`) are rejected.
 */
export function parseFxPair(ticker: string): FxPair {
    const letters = ticker.replace(/[^A-Za-z]/g, '');
    if (letters.length !== 6) {
        throw new ConfigurationError(
            `Unable to infer FX pair structure from ticker '${ticker}': expected 6 letters, found ${letters.length}`,
            { ticker }
        );
    }
    return { base: letters.slice(0, 3).toUpperCase(), quote: letters.slice(3, 6).toUpperCase() };
}

/**
 * Converts `prices` from `sourceCurrency` to `targetCurrency` with the rates
 * of `fxTicker` (one rate per price, same positions).
 */
export function convertCurrency(
    prices: readonly number[],
    sourceCurrency: string,
    targetCurrency: string,
    fxTicker: string,
    rates: readonly number[]
): number[] {
    const source = sourceCurrency.toUpperCase();
    const target = targetCurrency.toUpperCase();
    if (source === target) return [...prices];
    if (prices.length !== rates.length) {
        throw new RangeError(`price and FX rate lengths differ (${prices.length} vs ${rates.length}) for ${fxTicker}`);
    }

    const { base, quote } = parseFxPair(fxTicker);
    if (source === base && target === quote) return prices.map((p, i) => p * rates[i]);
    if (source === quote && target === base) return prices.map((p, i) => p / rates[i]);
    throw new CurrencyIncompatibilityError(
        `FX ticker '${fxTicker}' is incompatible with conversion from ${source} to ${target}`,
        { ticker: fxTicker, source, target }
    );
}
