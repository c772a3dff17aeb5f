#!/usr/bin/env node
/**
 * RUN PAIR CLI TOOL
 *
 * End-to-end research run for one pair:
 * - Loads and aligns both legs (CSV files or the OANDA REST API)
 * - Fits the hedge ratio and builds the spread
 * - Runs the ADF stationarity test and warns on a weak result
 * - Backtests the band strategy for every configured window
 *
 * Usage:
 *   npm run pair -- TICKER_A TICKER_B --csv mapping.json [--fx EURUSD | --fx B=EURUSD]
 *                    [--start 2024-01-01] [--end 2024-06-28] [--intercept]
 *   With OANDA_API_KEY set and no --csv, prices come from OANDA.
 *
 * Settings (windows, band width, fee, base currency) come from the
 * environment; see `.env.example`.
 */

import 'dotenv/config';
import { promises as fs } from 'fs';
import createDebug from 'debug';
import { loadConfig } from '../config/index.js';
import { ConfigurationError } from '../lib/errors.js';
import { toIso } from '../lib/time.js';
import { loadPairData } from '../data/loadPair.js';
import { CsvMappingSchema, CsvPriceSource } from '../providers/csvProvider.js';
import { OandaPriceSource, type OandaEnvironment } from '../providers/oandaProvider.js';
import type { PriceSource } from '../providers/priceSource.js';
import { estimateHedgeRatio, spreadFromPair } from '../strategies/pairs/hedge.js';
import { adfTest, isStationary } from '../strategies/pairs/stationarity.js';
import { bestWindow, runMultiWindowBacktest } from '../strategies/pairs/multiWindow.js';
import { fxTickersFromArgs, parseArgs, type CliArgs } from './args.js';

const log = createDebug('statarb:cli');

async function buildSource(args: CliArgs, apiKey: string | undefined, environment: OandaEnvironment, timeoutMs: number): Promise<PriceSource> {
    if (args.csv) {
        const mapping: unknown = JSON.parse(await fs.readFile(args.csv, 'utf8'));
        return new CsvPriceSource(CsvMappingSchema.parse(mapping));
    }
    if (apiKey) return new OandaPriceSource({ apiKey, environment, timeoutMs });
    throw new ConfigurationError('No price source: pass --csv mapping.json or set OANDA_API_KEY');
}

async function main() {
    const cfg = loadConfig();
    const args = parseArgs(process.argv.slice(2));
    const source = await buildSource(args, cfg.oanda.apiKey, cfg.oanda.environment, cfg.oanda.timeoutMs);
    log('config %o', cfg.backtest);

    const pair = await loadPairData(source, {
        tickerA: args.tickerA,
        tickerB: args.tickerB,
        start: args.start,
        end: args.end,
        interval: cfg.interval,
        baseCurrency: cfg.baseCurrency,
        fxTickers: fxTickersFromArgs(args.fx)
    });
    console.log(`Aligned ${pair.timestamps.length} rows in ${pair.baseCurrency} (${args.tickerA}: ${pair.currencyA}, ${args.tickerB}: ${pair.currencyB})`);
    if (pair.timestamps.length) {
        console.log(`Range: ${toIso(pair.timestamps[0])} → ${toIso(pair.timestamps[pair.timestamps.length - 1])}`);
    }

    const hedge = estimateHedgeRatio(pair.a, pair.b, { addIntercept: args.intercept });
    const spread = spreadFromPair(pair, hedge);
    console.log(`\nHedge ratio\nratio=${hedge.ratio.toFixed(4)}, intercept=${hedge.intercept.toFixed(4)}`);
    console.log(hedge.summary);

    const adf = adfTest(spread.values);
    console.log('\nADF test');
    console.log(`statistic=${adf.statistic.toFixed(4)}, p-value=${adf.pValue.toFixed(4)}, lags=${adf.lags}, nobs=${adf.nobs}`);
    for (const [level, value] of Object.entries(adf.criticalValues)) {
        console.log(`  ${level}: ${value.toFixed(4)}`);
    }
    if (!isStationary(adf, cfg.adfLevel)) {
        console.warn(`WARNING: Spread may not be stationary at the ${(cfg.adfLevel * 100).toFixed(0)}% level.`);
    }

    const { windows, numStd, fee } = cfg.backtest;
    const results = runMultiWindowBacktest(spread, windows, numStd, fee);
    console.log('\nBacktest summary');
    for (const [window, result] of results) {
        const s = result.stats;
        console.log(
            `window=${String(window).padStart(3)} | trades=${String(s.numTrades).padStart(2)} | win%=${(s.winRate * 100).toFixed(1).padStart(5)} | ` +
            `avg win=${s.avgWin.toFixed(3)} | avg loss=${s.avgLoss.toFixed(3)} | total pnl=${s.totalPnl.toFixed(3)} | ` +
            `sharpe=${s.sharpe.toFixed(3)} | max drawdown=${s.maxDrawdown.toFixed(3)}`
        );
    }

    const best = bestWindow(results);
    if (best) console.log(`\nBest window: ${best.window} with total pnl ${best.stats.totalPnl.toFixed(3)}`);
}

main().catch((err) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exitCode = 1;
});
