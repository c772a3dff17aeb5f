/**
 * STATISTICAL COMPUTATION LIBRARY
 *
 * Numerical building blocks shared by the pairs pipeline:
 * - Descriptive statistics (mean, population standard deviation)
 * - Trailing-window statistics with explicit warm-up gaps
 * - Multiple OLS regression with standard errors and information criteria
 * - Standard normal CDF and polynomial evaluation for p-value surfaces
 */

export function sum(values: readonly number[]): number {
    return values.reduce((a, b) => a + b, 0);
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return NaN;
    return sum(values) / values.length;
}

export function populationStd(values: readonly number[]): number {
    const n = values.length;
    if (n === 0) return NaN;
    const m = mean(values);
    const variance = values.reduce((a, b) => a + (b - m) * (b - m), 0) / n;
    return Math.sqrt(variance);
}

export function diff(values: readonly number[]): number[] {
    const out: number[] = [];
    for (let i = 1; i < values.length; i++) out.push(values[i] - values[i - 1]);
    return out;
}

export type RollingStats = {
    mean: Array<number | undefined>;
    std: Array<number | undefined>;
};

/**
 * Mean and population std over trailing windows of exactly `window` points.
 * Positions before the first full window, and windows holding a non-finite
 * value, stay `undefined`.
 */
export function rollingMeanStd(values: readonly number[], window: number): RollingStats {
    const meanOut: Array<number | undefined> = new Array(values.length).fill(undefined);
    const stdOut: Array<number | undefined> = new Array(values.length).fill(undefined);
    for (let i = window - 1; i < values.length; i++) {
        const slice = values.slice(i - window + 1, i + 1);
        if (!slice.every(Number.isFinite)) continue;
        meanOut[i] = mean(slice);
        stdOut[i] = populationStd(slice);
    }
    return { mean: meanOut, std: stdOut };
}

export interface OLSResult {
    params: number[];
    stdErrors: number[];
    tValues: number[];
    residuals: number[];
    ssr: number;
    nobs: number;
    dfResid: number;
    rSquared: number;
    residualStdError: number;
    llf: number;
    aic: number;
    bic: number;
}

/**
 * Gauss-Jordan inverse with partial pivoting. Returns undefined when the
 * matrix is singular relative to its largest diagonal entry.
 */
export function invertMatrix(matrix: readonly (readonly number[])[]): number[][] | undefined {
    const k = matrix.length;
    const a = matrix.map((row, i) => [...row, ...Array.from({ length: k }, (_, j) => (i === j ? 1 : 0))]);
    const scale = Math.max(...matrix.map((row, i) => Math.abs(row[i])), 0);
    if (!(scale > 0)) return undefined;
    const tol = scale * 1e-12;

    for (let col = 0; col < k; col++) {
        let pivotRow = col;
        for (let r = col + 1; r < k; r++) {
            if (Math.abs(a[r][col]) > Math.abs(a[pivotRow][col])) pivotRow = r;
        }
        if (Math.abs(a[pivotRow][col]) <= tol) return undefined;
        [a[col], a[pivotRow]] = [a[pivotRow], a[col]];

        const pivot = a[col][col];
        for (let j = 0; j < 2 * k; j++) a[col][j] /= pivot;
        for (let r = 0; r < k; r++) {
            if (r === col) continue;
            const factor = a[r][col];
            if (factor === 0) continue;
            for (let j = 0; j < 2 * k; j++) a[r][j] -= factor * a[col][j];
        }
    }
    return a.map(row => row.slice(k));
}

/**
 * Ordinary least squares of `y` on the regressors in `rows` (one row per
 * observation). `hasConstant` selects centred or uncentred R-squared.
 * Returns undefined for an empty, underdetermined or singular design.
 */
export function olsFit(y: readonly number[], rows: readonly (readonly number[])[], hasConstant: boolean): OLSResult | undefined {
    const n = y.length;
    if (n === 0 || rows.length !== n) return undefined;
    const k = rows[0].length;
    if (k === 0 || n < k) return undefined;

    const xtx: number[][] = Array.from({ length: k }, () => new Array(k).fill(0));
    const xty: number[] = new Array(k).fill(0);
    for (let i = 0; i < n; i++) {
        const row = rows[i];
        for (let p = 0; p < k; p++) {
            xty[p] += row[p] * y[i];
            for (let q = 0; q < k; q++) xtx[p][q] += row[p] * row[q];
        }
    }

    const inv = invertMatrix(xtx);
    if (!inv) return undefined;
    const params = inv.map(invRow => invRow.reduce((acc, v, j) => acc + v * xty[j], 0));

    const residuals: number[] = [];
    let ssr = 0;
    for (let i = 0; i < n; i++) {
        const fitted = rows[i].reduce((acc, v, j) => acc + v * params[j], 0);
        const r = y[i] - fitted;
        residuals.push(r);
        ssr += r * r;
    }

    const dfResid = n - k;
    const sigma2 = dfResid > 0 ? ssr / dfResid : NaN;
    const stdErrors = params.map((_, j) => Math.sqrt(sigma2 * inv[j][j]));
    const tValues = params.map((p, j) => p / stdErrors[j]);

    const yMean = mean(y);
    const ssTot = hasConstant
        ? y.reduce((a, v) => a + (v - yMean) * (v - yMean), 0)
        : y.reduce((a, v) => a + v * v, 0);
    const rSquared = ssTot > 0 ? 1 - ssr / ssTot : 0;

    const llf = -(n / 2) * (Math.log(2 * Math.PI) + Math.log(ssr / n) + 1);

    return {
        params,
        stdErrors,
        tValues,
        residuals,
        ssr,
        nobs: n,
        dfResid,
        rSquared,
        residualStdError: Math.sqrt(sigma2),
        llf,
        aic: -2 * llf + 2 * k,
        bic: -2 * llf + Math.log(n) * k
    };
}

/** Evaluates c0 + c1·x + c2·x² + … */
export function polyval(coefficients: readonly number[], x: number): number {
    let acc = 0;
    for (let i = coefficients.length - 1; i >= 0; i--) acc = acc * x + coefficients[i];
    return acc;
}

// Abramowitz & Stegun 7.1.26, |error| < 1.5e-7
export function erf(x: number): number {
    const sign = x < 0 ? -1 : 1;
    const ax = Math.abs(x);
    const t = 1 / (1 + 0.3275911 * ax);
    const poly = ((((1.061405429 * t - 1.453152027) * t + 1.421413741) * t - 0.284496736) * t + 0.254829592) * t;
    return sign * (1 - poly * Math.exp(-ax * ax));
}

export function normalCdf(z: number): number {
    return 0.5 * (1 + erf(z / Math.SQRT2));
}
