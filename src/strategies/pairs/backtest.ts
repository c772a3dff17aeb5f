/**
 * BAND BACKTEST ENGINE
 *
 * Single-position mean-reversion simulation over a spread:
 *   FLAT  → LONG   when spread ≤ lower band
 *   FLAT  → SHORT  when spread ≥ upper band
 *   LONG  → FLAT   when spread ≥ mean
 *   SHORT → FLAT   when spread ≤ mean
 * Comparisons are inclusive. A bar handles at most one transition, so a
 * position is never reversed in place. Equity is realised P&L only; an open
 * position moves it when it closes.
 */

import createDebug from 'debug';
import { mean, populationStd } from '../../lib/stats.js';
import type { Spread, TimeSeries } from '../../types/series.js';
import { computeBands, type Bands } from './bands.js';

const log = createDebug('statarb:backtest');

export type TradeSide = 'long' | 'short';

export type Trade = Readonly<{
    entryTime: number;
    exitTime: number;
    side: TradeSide;
    entrySpread: number;
    exitSpread: number;
    pnl: number;
    fee: number;
}>;

export type BacktestStats = {
    numTrades: number;
    winRate: number;
    avgWin: number;
    avgLoss: number;
    totalPnl: number;
    sharpe: number;
    maxDrawdown: number;
};

export type BacktestResult = {
    window: number;
    bands: Bands;
    trades: Trade[];
    equityCurve: TimeSeries;
    stats: BacktestStats;
};

type PositionState =
    | { kind: 'FLAT' }
    | { kind: 'LONG' | 'SHORT'; entryTime: number; entrySpread: number };

export function computeStats(equityCurve: TimeSeries, trades: readonly Trade[]): BacktestStats {
    const pnls = trades.map(t => t.pnl);
    const wins = pnls.filter(p => p > 0);
    const losses = pnls.filter(p => p < 0);
    const numTrades = trades.length;

    const equity = equityCurve.values;
    const deltas: number[] = [];
    for (let i = 1; i < equity.length; i++) deltas.push(equity[i] - equity[i - 1]);
    const deltaStd = deltas.length ? populationStd(deltas) : 0;
    const sharpe = deltas.length && deltaStd !== 0 ? mean(deltas) / deltaStd : 0;

    let runningMax = -Infinity;
    let maxDrawdown = 0;
    for (const v of equity) {
        runningMax = Math.max(runningMax, v);
        maxDrawdown = Math.min(maxDrawdown, v - runningMax);
    }

    return {
        numTrades,
        winRate: numTrades ? wins.length / numTrades : 0,
        avgWin: wins.length ? mean(wins) : 0,
        avgLoss: losses.length ? mean(losses) : 0,
        totalPnl: pnls.reduce((a, b) => a + b, 0),
        sharpe,
        maxDrawdown
    };
}

/** Runs the state machine on bands computed by the caller for this spread. */
export function runBacktestOnBands(spread: Spread, bands: Bands, fee = 0): BacktestResult {
    if (bands.mean.length !== spread.values.length) {
        throw new RangeError(`bands (${bands.mean.length}) and spread (${spread.values.length}) differ in length`);
    }

    const trades: Trade[] = [];
    const equityValues: number[] = [];
    let equity = 0;
    let state: PositionState = { kind: 'FLAT' };

    const close = (side: TradeSide, entryTime: number, entrySpread: number, exitTime: number, exitSpread: number) => {
        const pnl = side === 'long' ? exitSpread - entrySpread - fee : entrySpread - exitSpread - fee;
        equity += pnl;
        trades.push(Object.freeze({ entryTime, exitTime, side, entrySpread, exitSpread, pnl, fee }));
    };

    for (let i = 0; i < spread.values.length; i++) {
        const t = spread.timestamps[i];
        const value = spread.values[i];
        const m = bands.mean[i];
        const upper = bands.upper[i];
        const lower = bands.lower[i];

        if (m !== undefined && upper !== undefined && lower !== undefined) {
            switch (state.kind) {
                case 'FLAT':
                    if (value <= lower) state = { kind: 'LONG', entryTime: t, entrySpread: value };
                    else if (value >= upper) state = { kind: 'SHORT', entryTime: t, entrySpread: value };
                    break;
                case 'LONG':
                    if (value >= m) {
                        close('long', state.entryTime, state.entrySpread, t, value);
                        state = { kind: 'FLAT' };
                    }
                    break;
                case 'SHORT':
                    if (value <= m) {
                        close('short', state.entryTime, state.entrySpread, t, value);
                        state = { kind: 'FLAT' };
                    }
                    break;
            }
        }
        equityValues.push(equity);
    }

    const equityCurve: TimeSeries = { timestamps: [...spread.timestamps], values: equityValues };
    const stats = computeStats(equityCurve, trades);
    log('window=%d trades=%d pnl=%d open=%s', bands.window, stats.numTrades, stats.totalPnl, state.kind);
    return { window: bands.window, bands, trades, equityCurve, stats };
}

export function runBacktest(spread: Spread, window: number, numStd: number, fee = 0): BacktestResult {
    return runBacktestOnBands(spread, computeBands(spread, window, numStd), fee);
}
