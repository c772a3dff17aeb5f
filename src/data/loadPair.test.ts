import { describe, expect, it } from 'vitest';
import { ConfigurationError, TickerNotFoundError } from '../lib/errors.js';
import { InMemoryPriceSource } from '../providers/memoryProvider.js';
import { createPriceSeries } from '../types/series.js';
import { loadPairData, resolveFxTicker } from './loadPair.js';

const ts = [Date.UTC(2024, 0, 1), Date.UTC(2024, 0, 2), Date.UTC(2024, 0, 3)];
const start = new Date(Date.UTC(2023, 11, 31));
const end = new Date(Date.UTC(2024, 0, 31));

function source() {
    return new InMemoryPriceSource({
        SAP: createPriceSeries({ timestamps: ts, prices: [100, 102, 101], currency: 'EUR' }),
        ASML: createPriceSeries({ timestamps: ts, prices: [600, 610, 605], currency: 'EUR' }),
        MSFT: createPriceSeries({ timestamps: ts, prices: [370, 372, 375], currency: 'USD' }),
        EURUSD: createPriceSeries({ timestamps: ts, prices: [1.1, 1.2, 1.0], currency: 'USD' })
    });
}

describe('resolveFxTicker', () => {
    it('supports a shared ticker or a per-leg map', () => {
        expect(resolveFxTicker('EURUSD', 'SAP')).toBe('EURUSD');
        expect(resolveFxTicker({ SAP: 'EURUSD' }, 'SAP')).toBe('EURUSD');
        expect(resolveFxTicker({ SAP: 'EURUSD' }, 'ASML')).toBeUndefined();
        expect(resolveFxTicker(undefined, 'SAP')).toBeUndefined();
    });
});

describe('loadPairData', () => {
    it('fetches a shared FX ticker once for both legs', async () => {
        const src = source();
        const pair = await loadPairData(src, { tickerA: 'SAP', tickerB: 'ASML', start, end, interval: '1d', fxTickers: 'EURUSD' });
        expect(src.fetchCount('EURUSD')).toBe(1);
        expect(pair.a[0]).toBeCloseTo(110, 10);
        expect(pair.a[1]).toBeCloseTo(122.4, 10);
        expect(pair.b[2]).toBeCloseTo(605, 10);
        expect(pair.currencyA).toBe('EUR');
        expect(pair.baseCurrency).toBe('USD');
    });

    it('skips FX for legs already in the base currency', async () => {
        const src = source();
        const pair = await loadPairData(src, { tickerA: 'MSFT', tickerB: 'SAP', start, end, interval: '1d', fxTickers: { SAP: 'EURUSD' } });
        expect(pair.a).toEqual([370, 372, 375]);
        expect(pair.b[0]).toBeCloseTo(110, 10);
        expect(src.fetchCount('EURUSD')).toBe(1);
    });

    it('fails when a leg needs conversion but has no FX ticker', async () => {
        await expect(loadPairData(source(), { tickerA: 'MSFT', tickerB: 'SAP', start, end, interval: '1d' }))
            .rejects.toBeInstanceOf(ConfigurationError);
    });

    it('propagates source errors unchanged', async () => {
        await expect(loadPairData(source(), { tickerA: 'NOPE', tickerB: 'SAP', start, end, interval: '1d' }))
            .rejects.toBeInstanceOf(TickerNotFoundError);
    });
});
