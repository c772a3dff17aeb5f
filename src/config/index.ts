/**
 * APPLICATION CONFIGURATION
 *
 * Typed settings for the research workflow, read from the environment
 * (a `.env` file is loaded by the entry points through dotenv):
 * - Base currency and bar interval for loading pairs
 * - Band windows, band width and per-trade fee for the backtest
 * - Significance level for the stationarity warning
 * - OANDA credentials for the REST price source
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';
import { CurrencySchema } from '../types/series.js';
import { OandaEnvironmentSchema, type OandaEnvironment } from '../providers/oandaProvider.js';

export type AppConfig = {
    baseCurrency: string;
    interval: string;
    backtest: {
        windows: number[];
        numStd: number;
        fee: number;
    };
    adfLevel: number;
    oanda: {
        apiKey?: string;
        environment: OandaEnvironment;
        timeoutMs: number;
    };
};

const WindowsSchema = z.string()
    .transform(s => s.split(',').map(p => p.trim()).filter(p => p.length > 0).map(Number))
    .pipe(z.array(z.number().int().min(1)).min(1));

const EnvSchema = z.object({
    STATARB_BASE_CURRENCY: CurrencySchema.default('USD'),
    STATARB_INTERVAL: z.string().trim().min(1).default('1d'),
    STATARB_WINDOWS: WindowsSchema.default('10,20,40'),
    STATARB_NUM_STD: z.coerce.number().nonnegative().default(1.5),
    STATARB_FEE: z.coerce.number().nonnegative().default(0),
    STATARB_ADF_LEVEL: z.coerce.number().gt(0).lt(1).default(0.05),
    OANDA_API_KEY: z.string().optional(),
    OANDA_ENVIRONMENT: OandaEnvironmentSchema.default('practice'),
    OANDA_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000)
});

// empty strings behave as unset, the way `.env` templates leave them
function definedOnly(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(env)) {
        if (v !== undefined && v.trim() !== '') out[k] = v;
    }
    return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(definedOnly(env));
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues: issues.length });
    }
    const e = parsed.data;
    return {
        baseCurrency: e.STATARB_BASE_CURRENCY,
        interval: e.STATARB_INTERVAL,
        backtest: {
            windows: e.STATARB_WINDOWS,
            numStd: e.STATARB_NUM_STD,
            fee: e.STATARB_FEE
        },
        adfLevel: e.STATARB_ADF_LEVEL,
        oanda: {
            apiKey: e.OANDA_API_KEY,
            environment: e.OANDA_ENVIRONMENT,
            timeoutMs: e.OANDA_TIMEOUT_MS
        }
    };
}
