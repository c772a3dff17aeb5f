import { z } from 'zod';
import { toUtcMillis, type TimestampInput } from '../lib/time.js';

export const CurrencySchema = z.string().trim().regex(/^[A-Za-z]{3}$/, 'expected an ISO 4217 code').transform(c => c.toUpperCase());

// NaN marks a missing price
export const PriceSchema = z.union([z.number(), z.nan()]);

export const PriceSeriesSchema = z.object({
    timestamps: z.array(z.number().int()),
    prices: z.array(PriceSchema),
    currency: CurrencySchema
}).superRefine((v, ctx) => {
    if (v.timestamps.length !== v.prices.length) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `timestamps (${v.timestamps.length}) and prices (${v.prices.length}) differ in length`,
            path: ['prices']
        });
        return;
    }
    for (let i = 1; i < v.timestamps.length; i++) {
        if (v.timestamps[i] <= v.timestamps[i - 1]) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `duplicate timestamp ${new Date(v.timestamps[i]).toISOString()}`,
                path: ['timestamps', i]
            });
            return;
        }
    }
});
export type PriceSeries = z.infer<typeof PriceSeriesSchema>;

export type PriceSeriesInput = {
    timestamps: readonly TimestampInput[];
    prices: readonly number[];
    currency: string;
};

/**
 * Normalises timestamps to UTC milliseconds, orders the points by time and
 * validates the result. Duplicate timestamps are rejected, never merged.
 */
export function createPriceSeries(input: PriceSeriesInput): PriceSeries {
    const points = input.timestamps.map((t, i) => ({ t: toUtcMillis(t), p: input.prices[i] }));
    points.sort((x, y) => x.t - y.t);
    return PriceSeriesSchema.parse({
        timestamps: points.map(pt => pt.t),
        prices: input.timestamps.length === input.prices.length ? points.map(pt => pt.p) : [...input.prices],
        currency: input.currency
    });
}

/** Values sharing one UTC index. */
export interface TimeSeries {
    timestamps: number[];
    values: number[];
}

export type Spread = TimeSeries;

export interface AlignedPair {
    timestamps: number[];
    /** Leg A converted to `baseCurrency`. */
    a: number[];
    /** Leg B converted to `baseCurrency`. */
    b: number[];
    currencyA: string;
    currencyB: string;
    baseCurrency: string;
}
