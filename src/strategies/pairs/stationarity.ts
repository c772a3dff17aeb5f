/**
 * STATIONARITY DIAGNOSTICS
 *
 * Augmented Dickey-Fuller test with a constant term:
 *   Δx_t = α + γ·x_{t−1} + Σ δ_i·Δx_{t−i} + ε_t
 * The statistic is the t-value of γ. Lag order is picked by AIC/BIC over
 * 0..maxLag on a common sample, then the regression is refitted on the
 * largest sample that lag allows.
 *
 * p-values use MacKinnon's (1994) response surface and critical values
 * MacKinnon's (2010) finite-sample table, both for one series with a
 * constant and no trend.
 */

import createDebug from 'debug';
import { ConfigurationError, DataInsufficiencyError } from '../../lib/errors.js';
import { diff, normalCdf, olsFit, polyval, type OLSResult } from '../../lib/stats.js';

const log = createDebug('statarb:adf');

export type AutoLag = 'AIC' | 'BIC' | null;

export type ADFOptions = {
    maxLag?: number;
    /** Lag selection criterion; `null` uses maxLag as given. */
    autolag?: AutoLag;
};

export type CriticalValues = { '1%': number; '5%': number; '10%': number };

export type ADFResult = {
    statistic: number;
    pValue: number;
    lags: number;
    nobs: number;
    criticalValues: CriticalValues;
    /** Best information criterion value, null without autolag. */
    icBest: number | null;
};

const TAU_MAX = 2.74;
const TAU_MIN = -18.83;
const TAU_STAR = -1.61;
const TAU_SMALL_P = [2.1659, 1.4412, 0.038269];
const TAU_LARGE_P = [1.7339, 0.93202, -0.12745, -0.010368];

const CRIT_2010 = {
    '1%': [-3.43035, -6.5393, -16.786, -79.433],
    '5%': [-2.86154, -2.8903, -4.234, -40.040],
    '10%': [-2.56677, -1.5384, -2.809, 0]
} as const;

export function mackinnonPValue(statistic: number): number {
    if (statistic > TAU_MAX) return 1;
    if (statistic < TAU_MIN) return 0;
    const coefficients = statistic <= TAU_STAR ? TAU_SMALL_P : TAU_LARGE_P;
    return normalCdf(polyval(coefficients, statistic));
}

export function mackinnonCriticalValues(nobs: number): CriticalValues {
    const inv = 1 / nobs;
    return {
        '1%': polyval(CRIT_2010['1%'], inv),
        '5%': polyval(CRIT_2010['5%'], inv),
        '10%': polyval(CRIT_2010['10%'], inv)
    };
}

/**
 * Rows for the ADF regression using `lags` lagged differences, starting at
 * difference index `first` (≥ lags). Columns: x_{t−1}, Δx_{t−1..t−lags}, 1.
 */
function buildRegression(x: readonly number[], dx: readonly number[], lags: number, first: number): { y: number[]; rows: number[][] } {
    const y: number[] = [];
    const rows: number[][] = [];
    for (let t = first; t < dx.length; t++) {
        const row = [x[t]];
        for (let i = 1; i <= lags; i++) row.push(dx[t - i]);
        row.push(1);
        y.push(dx[t]);
        rows.push(row);
    }
    return { y, rows };
}

function fitOrThrow(y: number[], rows: number[][], lags: number): OLSResult {
    const fit = olsFit(y, rows, true);
    if (!fit || !Number.isFinite(fit.tValues[0])) {
        throw new DataInsufficiencyError(
            `ADF regression is degenerate with ${lags} lag(s) on ${y.length} observations`,
            { lags, observations: y.length }
        );
    }
    return fit;
}

export function adfTest(series: readonly number[], options: ADFOptions = {}): ADFResult {
    const x = series.filter(Number.isFinite);
    const n = x.length;
    const autolag = options.autolag === undefined ? 'AIC' : options.autolag;
    const cap = Math.floor(n / 2) - 2;

    let maxLag: number;
    if (options.maxLag === undefined) {
        maxLag = Math.min(cap, Math.ceil(12 * Math.pow(n / 100, 0.25)));
        if (maxLag < 0) {
            throw new DataInsufficiencyError(
                `ADF test needs more observations than ${n}`,
                { observations: n }
            );
        }
    } else {
        maxLag = options.maxLag;
        if (!Number.isInteger(maxLag) || maxLag < 0) {
            throw new ConfigurationError(`maxLag must be a non-negative integer, got ${maxLag}`, { maxLag });
        }
        if (maxLag > cap) {
            throw new DataInsufficiencyError(
                `maxLag ${maxLag} is too large for ${n} observations (at most ${Math.max(cap, 0)})`,
                { observations: n, maxLag }
            );
        }
    }

    const dx = diff(x);
    let lags = maxLag;
    let icBest: number | null = null;

    if (autolag !== null) {
        const common = buildRegression(x, dx, maxLag, maxLag);
        for (let p = 0; p <= maxLag; p++) {
            // columns: level, first p lagged differences, constant
            const rows = common.rows.map(r => [...r.slice(0, 1 + p), 1]);
            const fit = olsFit(common.y, rows, true);
            if (!fit) continue;
            const ic = autolag === 'AIC' ? fit.aic : fit.bic;
            if (icBest === null || ic < icBest) {
                icBest = ic;
                lags = p;
            }
        }
        if (icBest === null) {
            throw new DataInsufficiencyError('ADF lag selection failed: every candidate regression is singular', { maxLag, observations: n });
        }
    }

    const { y, rows } = buildRegression(x, dx, lags, lags);
    const fit = fitOrThrow(y, rows, lags);
    const statistic = fit.tValues[0];
    const result: ADFResult = {
        statistic,
        pValue: mackinnonPValue(statistic),
        lags,
        nobs: fit.nobs,
        criticalValues: mackinnonCriticalValues(fit.nobs),
        icBest
    };
    log('adf stat=%d p=%d lags=%d nobs=%d', result.statistic, result.pValue, result.lags, result.nobs);
    return result;
}

export function isStationary(result: Pick<ADFResult, 'pValue'>, level = 0.05): boolean {
    return result.pValue <= level;
}
