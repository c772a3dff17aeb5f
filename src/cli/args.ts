import { ConfigurationError } from '../lib/errors.js';
import { toUtcMillis } from '../lib/time.js';
import type { FxTickers } from '../data/loadPair.js';

export type CliArgs = {
    tickerA: string;
    tickerB: string;
    csv?: string;
    fx: string[];
    start: Date;
    end: Date;
    intercept: boolean;
};

const USAGE = 'Usage: runPair TICKER_A TICKER_B [--csv mapping.json] [--fx EURUSD | --fx TICKER=EURUSD] [--start DATE] [--end DATE] [--intercept]';

export function parseArgs(argv: string[], now = new Date()): CliArgs {
    const positional: string[] = [];
    const fx: string[] = [];
    let csv: string | undefined;
    let start: Date | undefined;
    let end: Date | undefined;
    let intercept = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const value = () => {
            const v = argv[++i];
            if (v === undefined) throw new ConfigurationError(`${arg} needs a value. ${USAGE}`, { flag: arg });
            return v;
        };
        switch (arg) {
            case '--csv': csv = value(); break;
            case '--fx': fx.push(value()); break;
            case '--start': start = new Date(toUtcMillis(value())); break;
            case '--end': end = new Date(toUtcMillis(value())); break;
            case '--intercept': intercept = true; break;
            default:
                if (arg.startsWith('--')) throw new ConfigurationError(`Unknown flag ${arg}. ${USAGE}`, { flag: arg });
                positional.push(arg);
        }
    }

    if (positional.length !== 2) throw new ConfigurationError(USAGE);
    const [tickerA, tickerB] = positional;
    const resolvedEnd = end ?? now;
    const resolvedStart = start ?? new Date(resolvedEnd.getTime() - 365 * 86_400_000);
    return { tickerA, tickerB, csv, fx, start: resolvedStart, end: resolvedEnd, intercept };
}

/** `--fx EURUSD` applies to any leg; `--fx B=EURUSD` to one leg ticker. */
export function fxTickersFromArgs(fx: readonly string[]): FxTickers | undefined {
    if (!fx.length) return undefined;
    if (fx.length === 1 && !fx[0].includes('=')) return fx[0];
    const map: Record<string, string> = {};
    for (const entry of fx) {
        const [ticker, fxTicker] = entry.split('=');
        if (!ticker || !fxTicker) {
            throw new ConfigurationError(`--fx expects TICKER=FXTICKER when given more than once, got '${entry}'`, { entry });
        }
        map[ticker] = fxTicker;
    }
    return map;
}

