/**
 * HEDGE RATIO ESTIMATION
 *
 * OLS regression of leg A on leg B. The slope is the hedge ratio; the
 * spread A − (ratio·B + intercept) is the quantity the strategy trades.
 */

import createDebug from 'debug';
import { DataInsufficiencyError } from '../../lib/errors.js';
import { olsFit, type OLSResult } from '../../lib/stats.js';
import type { AlignedPair, Spread } from '../../types/series.js';

const log = createDebug('statarb:hedge');

export type HedgeRatioResult = {
    ratio: number;
    /** 0 when the regression has no intercept. */
    intercept: number;
    rSquared: number;
    nobs: number;
    /** Human-readable fit report. */
    summary: string;
};

export type HedgeOptions = { addIntercept?: boolean };

function fmt(v: number, width = 12): string {
    return (Number.isFinite(v) ? v.toFixed(4) : 'nan').padStart(width);
}

function formatSummary(fit: OLSResult, names: string[], addIntercept: boolean): string {
    const lines = [
        `OLS hedge ratio: A ~ ${addIntercept ? 'const + B' : 'B'}`,
        `Observations:        ${fit.nobs}`,
        `R-squared${addIntercept ? '' : ' (uncentered)'}: ${fit.rSquared.toFixed(4)}`,
        `Residual std error:  ${Number.isFinite(fit.residualStdError) ? fit.residualStdError.toFixed(4) : 'nan'}`,
        `${''.padEnd(8)}${'coef'.padStart(12)}${'std err'.padStart(12)}${'t'.padStart(12)}`
    ];
    names.forEach((name, j) => {
        lines.push(`${name.padEnd(8)}${fmt(fit.params[j])}${fmt(fit.stdErrors[j])}${fmt(fit.tValues[j])}`);
    });
    return lines.join('\n');
}

export function estimateHedgeRatio(a: readonly number[], b: readonly number[], options: HedgeOptions = {}): HedgeRatioResult {
    const addIntercept = options.addIntercept ?? false;
    if (a.length !== b.length) {
        throw new RangeError(`leg lengths differ (${a.length} vs ${b.length}); align the pair first`);
    }

    const y: number[] = [];
    const rows: number[][] = [];
    for (let i = 0; i < a.length; i++) {
        if (!Number.isFinite(a[i]) || !Number.isFinite(b[i])) continue;
        y.push(a[i]);
        rows.push(addIntercept ? [1, b[i]] : [b[i]]);
    }

    const required = addIntercept ? 3 : 2;
    if (y.length < required) {
        throw new DataInsufficiencyError(
            `Hedge regression needs at least ${required} aligned observations, got ${y.length}`,
            { observations: y.length, required, addIntercept }
        );
    }

    const fit = olsFit(y, rows, addIntercept);
    if (!fit) {
        throw new DataInsufficiencyError(
            'Hedge regression is singular: leg B has no usable variation',
            { observations: y.length, addIntercept }
        );
    }

    const ratio = addIntercept ? fit.params[1] : fit.params[0];
    const intercept = addIntercept ? fit.params[0] : 0;
    log('ratio=%d intercept=%d r2=%d n=%d', ratio, intercept, fit.rSquared, fit.nobs);
    return {
        ratio,
        intercept,
        rSquared: fit.rSquared,
        nobs: fit.nobs,
        summary: formatSummary(fit, addIntercept ? ['const', 'B'] : ['B'], addIntercept)
    };
}

/** a[i] − (ratio·b[i] + intercept). */
export function computeSpread(a: readonly number[], b: readonly number[], ratio: number, intercept = 0): number[] {
    if (a.length !== b.length) {
        throw new RangeError(`leg lengths differ (${a.length} vs ${b.length})`);
    }
    return a.map((v, i) => v - (ratio * b[i] + intercept));
}

export function spreadFromPair(pair: AlignedPair, hedge: Pick<HedgeRatioResult, 'ratio' | 'intercept'>): Spread {
    return {
        timestamps: [...pair.timestamps],
        values: computeSpread(pair.a, pair.b, hedge.ratio, hedge.intercept)
    };
}
