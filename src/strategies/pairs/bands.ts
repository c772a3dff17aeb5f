/**
 * BOLLINGER-STYLE BANDS
 *
 * Rolling mean ± k·rolling population std over the spread. Entries before
 * the first full window are `undefined`; there are no partial windows.
 */

import { ConfigurationError } from '../../lib/errors.js';
import { rollingMeanStd } from '../../lib/stats.js';
import type { Spread } from '../../types/series.js';

export type Band = Array<number | undefined>;

export type Bands = {
    window: number;
    numStd: number;
    timestamps: number[];
    mean: Band;
    std: Band;
    upper: Band;
    lower: Band;
};

export function assertWindow(window: number): void {
    if (!Number.isInteger(window) || window < 1) {
        throw new ConfigurationError(`window must be an integer >= 1, got ${window}`, { window });
    }
}

export function computeBands(spread: Spread, window: number, numStd: number): Bands {
    assertWindow(window);
    const { mean, std } = rollingMeanStd(spread.values, window);
    const upper: Band = mean.map((m, i) => {
        const s = std[i];
        return m === undefined || s === undefined ? undefined : m + numStd * s;
    });
    const lower: Band = mean.map((m, i) => {
        const s = std[i];
        return m === undefined || s === undefined ? undefined : m - numStd * s;
    });
    return { window, numStd, timestamps: [...spread.timestamps], mean, std, upper, lower };
}

/** Bands for several windows over the same spread, keyed by window. */
export function computeMultiBands(spread: Spread, windows: Iterable<number>, numStd: number): Map<number, Bands> {
    const out = new Map<number, Bands>();
    for (const w of windows) {
        if (!out.has(w)) out.set(w, computeBands(spread, w, numStd));
    }
    return out;
}
