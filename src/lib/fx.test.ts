import { describe, expect, it } from 'vitest';
import { ConfigurationError, CurrencyIncompatibilityError } from './errors.js';
import { convertCurrency, parseFxPair } from './fx.js';

describe('parseFxPair', () => {
    it('reads base and quote from six letters', () => {
        expect(parseFxPair('EURUSD')).toEqual({ base: 'EUR', quote: 'USD' });
        expect(parseFxPair('eur/usd')).toEqual({ base: 'EUR', quote: 'USD' });
        expect(parseFxPair('GBP_JPY')).toEqual({ base: 'GBP', quote: 'JPY' });
    });

    it('rejects tickers with too few letters', () => {
        expect(() => parseFxPair('EUR')).toThrow(ConfigurationError);
    });

    it('rejects tickers with extra letters', () => {
        expect(() => parseFxPair('EURUSD=X')).toThrow(ConfigurationError);
        const error = (() => {
            try {
                parseFxPair('EURUSD=X');
            } catch (e) {
                return e;
            }
        })();
        expect(error).toMatchObject({ context: { ticker: 'EURUSD=X' } });
    });
});

describe('convertCurrency', () => {
    it('multiplies when converting from the FX base into the quote', () => {
        expect(convertCurrency([10, 20], 'EUR', 'USD', 'EURUSD', [1.5, 2])).toEqual([15, 40]);
    });

    it('divides when converting from the FX quote into the base', () => {
        expect(convertCurrency([15, 40], 'usd', 'eur', 'EURUSD', [1.5, 2])).toEqual([10, 20]);
    });

    it('passes through prices already in the target currency', () => {
        expect(convertCurrency([1, 2], 'USD', 'USD', 'EURUSD', [])).toEqual([1, 2]);
    });

    it('fails when the pair does not connect the currencies', () => {
        expect(() => convertCurrency([1], 'GBP', 'USD', 'EURUSD', [1.1])).toThrow(CurrencyIncompatibilityError);
    });
});
