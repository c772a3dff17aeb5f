import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { createPriceSeries } from './series.js';

describe('createPriceSeries', () => {
    it('sorts by timestamp and upper-cases the currency', () => {
        const s = createPriceSeries({
            timestamps: ['2024-01-03', '2024-01-01', '2024-01-02'],
            prices: [3, 1, 2],
            currency: 'eur'
        });
        expect(s.timestamps).toEqual([Date.UTC(2024, 0, 1), Date.UTC(2024, 0, 2), Date.UTC(2024, 0, 3)]);
        expect(s.prices).toEqual([1, 2, 3]);
        expect(s.currency).toBe('EUR');
    });

    it('keeps missing prices as NaN', () => {
        const s = createPriceSeries({ timestamps: [1, 2], prices: [NaN, 5], currency: 'USD' });
        expect(s.prices[0]).toBeNaN();
        expect(s.prices[1]).toBe(5);
    });

    it('rejects duplicate timestamps', () => {
        expect(() => createPriceSeries({ timestamps: [1, 2, 2], prices: [1, 2, 3], currency: 'USD' })).toThrow(ZodError);
    });

    it('rejects mismatched lengths and malformed currencies', () => {
        expect(() => createPriceSeries({ timestamps: [1, 2], prices: [1], currency: 'USD' })).toThrow(ZodError);
        expect(() => createPriceSeries({ timestamps: [1], prices: [1], currency: 'DOLLAR' })).toThrow(ZodError);
    });
});
