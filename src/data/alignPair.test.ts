import { describe, expect, it } from 'vitest';
import { ConfigurationError, CurrencyIncompatibilityError } from '../lib/errors.js';
import { computeSpread } from '../strategies/pairs/hedge.js';
import { createPriceSeries } from '../types/series.js';
import { alignPair } from './alignPair.js';

const day = (d: number) => Date.UTC(2024, 0, d);

describe('alignPair', () => {
    it('keeps only timestamps present in both legs with complete values', () => {
        const a = createPriceSeries({ timestamps: [day(1), day(2), day(3), day(4)], prices: [10, 11, NaN, 13], currency: 'USD' });
        const b = createPriceSeries({ timestamps: [day(2), day(3), day(4), day(5)], prices: [20, 21, 22, 23], currency: 'USD' });
        const pair = alignPair({ ticker: 'AAA', series: a }, { ticker: 'BBB', series: b });
        expect(pair.timestamps).toEqual([day(2), day(4)]);
        expect(pair.a).toEqual([11, 13]);
        expect(pair.b).toEqual([20, 22]);
        expect(pair.currencyA).toBe('USD');
        expect(pair.baseCurrency).toBe('USD');
    });

    it('normalises zoned input onto the same UTC index', () => {
        const a = createPriceSeries({ timestamps: ['2024-01-01T02:00:00+02:00'], prices: [1], currency: 'USD' });
        const b = createPriceSeries({ timestamps: ['2024-01-01T00:00:00'], prices: [2], currency: 'USD' });
        const pair = alignPair({ ticker: 'AAA', series: a }, { ticker: 'BBB', series: b });
        expect(pair.timestamps).toEqual([day(1)]);
    });

    it('converts a EUR leg into USD with an EURUSD series', () => {
        const ts = [day(1), day(2), day(3), day(4)];
        const aPrices = [50, 52, 49, 55];
        const bPrices = [20, 21, 19, 22];
        const a = createPriceSeries({ timestamps: ts, prices: aPrices, currency: 'USD' });
        const b = createPriceSeries({ timestamps: ts, prices: bPrices, currency: 'EUR' });
        const fx = createPriceSeries({ timestamps: ts, prices: [1.1, 1.1, 1.1, 1.1], currency: 'USD' });

        const pair = alignPair(
            { ticker: 'AAA', series: a },
            { ticker: 'BBB', series: b },
            { baseCurrency: 'USD', fx: { B: { ticker: 'EURUSD', series: fx } } }
        );
        expect(pair.currencyB).toBe('EUR');
        pair.b.forEach((v, i) => expect(v).toBeCloseTo(bPrices[i] * 1.1, 12));

        const ratio = 2;
        const spread = computeSpread(pair.a, pair.b, ratio);
        spread.forEach((v, i) => expect(v).toBeCloseTo(aPrices[i] - ratio * (bPrices[i] * 1.1), 10));
    });

    it('drops rows where the FX series has no quote', () => {
        const a = createPriceSeries({ timestamps: [day(1), day(2), day(3)], prices: [1, 2, 3], currency: 'USD' });
        const b = createPriceSeries({ timestamps: [day(1), day(2), day(3)], prices: [10, 20, 30], currency: 'USD' });
        const fx = createPriceSeries({ timestamps: [day(1), day(3)], prices: [2, 4], currency: 'USD' });
        const pair = alignPair(
            { ticker: 'AAA', series: a },
            { ticker: 'BBB', series: b },
            { baseCurrency: 'EUR', fx: { A: { ticker: 'EURUSD', series: fx }, B: { ticker: 'EURUSD', series: fx } } }
        );
        expect(pair.timestamps).toEqual([day(1), day(3)]);
        expect(pair.a).toEqual([0.5, 0.75]);
        expect(pair.b).toEqual([5, 7.5]);
    });

    it('requires an FX series for a leg outside the base currency', () => {
        const a = createPriceSeries({ timestamps: [day(1)], prices: [1], currency: 'USD' });
        const b = createPriceSeries({ timestamps: [day(1)], prices: [1], currency: 'EUR' });
        expect(() => alignPair({ ticker: 'AAA', series: a }, { ticker: 'BBB', series: b })).toThrow(ConfigurationError);
    });

    it('rejects an FX pair that cannot bridge the currencies', () => {
        const a = createPriceSeries({ timestamps: [day(1)], prices: [1], currency: 'USD' });
        const b = createPriceSeries({ timestamps: [day(1)], prices: [1], currency: 'GBP' });
        const fx = createPriceSeries({ timestamps: [day(1)], prices: [1.1], currency: 'USD' });
        expect(() => alignPair(
            { ticker: 'AAA', series: a },
            { ticker: 'BBB', series: b },
            { fx: { B: { ticker: 'EURUSD', series: fx } } }
        )).toThrow(CurrencyIncompatibilityError);
    });

    it('rejects a malformed FX ticker before joining', () => {
        const a = createPriceSeries({ timestamps: [day(1)], prices: [1], currency: 'USD' });
        const b = createPriceSeries({ timestamps: [day(1)], prices: [1], currency: 'EUR' });
        const fx = createPriceSeries({ timestamps: [day(1)], prices: [1.1], currency: 'USD' });
        expect(() => alignPair(
            { ticker: 'AAA', series: a },
            { ticker: 'BBB', series: b },
            { fx: { B: { ticker: 'EURUSD=X', series: fx } } }
        )).toThrow(ConfigurationError);
    });
});
