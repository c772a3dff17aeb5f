import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../lib/errors.js';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
    it('falls back to defaults', () => {
        expect(loadConfig({})).toEqual({
            baseCurrency: 'USD',
            interval: '1d',
            backtest: { windows: [10, 20, 40], numStd: 1.5, fee: 0 },
            adfLevel: 0.05,
            oanda: { apiKey: undefined, environment: 'practice', timeoutMs: 30_000 }
        });
    });

    it('reads overrides and treats blanks as unset', () => {
        const cfg = loadConfig({
            STATARB_BASE_CURRENCY: 'eur',
            STATARB_WINDOWS: '5, 15,,30',
            STATARB_NUM_STD: '2',
            STATARB_FEE: '0.001',
            STATARB_ADF_LEVEL: '',
            OANDA_API_KEY: 'test-secret',
            OANDA_ENVIRONMENT: 'live'
        });
        expect(cfg.baseCurrency).toBe('EUR');
        expect(cfg.backtest).toEqual({ windows: [5, 15, 30], numStd: 2, fee: 0.001 });
        expect(cfg.adfLevel).toBe(0.05);
        expect(cfg.oanda.apiKey).toBe('test-secret');
        expect(cfg.oanda.environment).toBe('live');
    });

    it('rejects invalid values', () => {
        expect(() => loadConfig({ STATARB_WINDOWS: '10,0' })).toThrow(ConfigurationError);
        expect(() => loadConfig({ STATARB_NUM_STD: 'wide' })).toThrow(ConfigurationError);
        expect(() => loadConfig({ OANDA_ENVIRONMENT: 'sandbox' })).toThrow(ConfigurationError);
        expect(() => loadConfig({ STATARB_BASE_CURRENCY: 'EURO' })).toThrow(ConfigurationError);
    });
});
