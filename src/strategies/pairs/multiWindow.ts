import createDebug from 'debug';
import { runBacktest, type BacktestResult } from './backtest.js';
import type { Spread } from '../../types/series.js';

const log = createDebug('statarb:runner');

/**
 * Independent band backtests over one spread, one per window, keyed by
 * window in the order given. Repeated windows collapse to one run.
 */
export function runMultiWindowBacktest(spread: Spread, windows: Iterable<number>, numStd: number, fee = 0): Map<number, BacktestResult> {
    const results = new Map<number, BacktestResult>();
    for (const window of windows) {
        if (results.has(window)) continue;
        results.set(window, runBacktest(spread, window, numStd, fee));
    }
    log('ran %d window(s) over %d points', results.size, spread.values.length);
    return results;
}

/** Result with the highest total P&L; the earliest window wins ties. */
export function bestWindow(results: ReadonlyMap<number, BacktestResult>): BacktestResult | undefined {
    let best: BacktestResult | undefined;
    for (const r of results.values()) {
        if (!best || r.stats.totalPnl > best.stats.totalPnl) best = r;
    }
    return best;
}
