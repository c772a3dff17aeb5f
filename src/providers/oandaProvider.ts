/**
 * OANDA REST PRICE SOURCE
 *
 * Historical mid-price candles from the OANDA v20 REST API.
 * - Maps interval strings (`1h`, `1d`, …) onto OANDA granularities
 * - Pages through the range in batches of complete candles
 * - Validates payloads with zod before they reach the pipeline
 * - Retries 429s, 5xx responses and network failures with backoff
 */

import createDebug from 'debug';
import { z } from 'zod';
import { ConfigurationError, PriceSourceIOError, TickerNotFoundError } from '../lib/errors.js';
import { createPriceSeries, type PriceSeries } from '../types/series.js';
import { assertRange, emptyRangeError, type PriceSource } from './priceSource.js';

const log = createDebug('statarb:oanda');

const GRANULARITY_MAP: Record<string, string> = {
    '1m': 'M1',
    '5m': 'M5',
    '15m': 'M15',
    '30m': 'M30',
    '1h': 'H1',
    '4h': 'H4',
    '1d': 'D',
    '1w': 'W'
};

const GRANULARITY_MS: Record<string, number> = {
    M1: 60_000,
    M5: 5 * 60_000,
    M15: 15 * 60_000,
    M30: 30 * 60_000,
    H1: 3_600_000,
    H4: 4 * 3_600_000,
    D: 86_400_000,
    W: 7 * 86_400_000
};

const MAX_BATCH = 5000;

export const OandaCandleSchema = z.object({
    time: z.string(),
    complete: z.boolean().optional(),
    mid: z.object({ c: z.string() }).partial().optional()
});
export const OandaCandlesResponseSchema = z.object({
    candles: z.array(OandaCandleSchema).default([])
});

export const OandaEnvironmentSchema = z.enum(['practice', 'live']);
export type OandaEnvironment = z.infer<typeof OandaEnvironmentSchema>;

export type FetchLike = (input: string | URL, init?: { headers?: Record<string, string>; signal?: AbortSignal }) => Promise<Response>;

export type OandaOptions = {
    apiKey: string;
    environment?: OandaEnvironment;
    /** Price currency per instrument, overriding the quote-currency guess. */
    instrumentCurrencies?: Record<string, string>;
    timeoutMs?: number;
    maxAttempts?: number;
    backoffMs?: number;
    fetchImpl?: FetchLike;
};

export function normaliseGranularity(interval: string): string {
    const norm = interval.trim();
    const mapped = GRANULARITY_MAP[norm.toLowerCase()];
    if (mapped) return mapped;
    const upper = norm.toUpperCase();
    if (upper in GRANULARITY_MS) return upper;
    throw new ConfigurationError(`Unsupported interval '${interval}' for OANDA candles`, { interval });
}

const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

export class OandaPriceSource implements PriceSource {
    private baseUrl: string;
    private headers: Record<string, string>;
    private instrumentCurrencies: Map<string, string>;
    private timeoutMs: number;
    private maxAttempts: number;
    private backoffMs: number;
    private fetchImpl: FetchLike;

    constructor(options: OandaOptions) {
        if (!options.apiKey) throw new ConfigurationError('apiKey must be provided for the OANDA source');
        const env = options.environment ?? 'practice';
        this.baseUrl = env === 'live' ? 'https://api-fxtrade.oanda.com' : 'https://api-fxpractice.oanda.com';
        this.headers = { Authorization: `Bearer ${options.apiKey}`, Accept: 'application/json' };
        this.instrumentCurrencies = new Map(
            Object.entries(options.instrumentCurrencies ?? {}).map(([k, v]) => [k, v.toUpperCase()])
        );
        this.timeoutMs = options.timeoutMs ?? 30_000;
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
        this.backoffMs = options.backoffMs ?? 500;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    inferCurrency(instrument: string): string {
        const override = this.instrumentCurrencies.get(instrument);
        if (override) return override;
        const idx = instrument.lastIndexOf('_');
        return idx >= 0 ? instrument.slice(idx + 1).toUpperCase() : 'USD';
    }

    private async getJson(url: URL, ticker: string): Promise<unknown> {
        let attempt = 0;
        let lastErr: unknown;
        while (attempt < this.maxAttempts) {
            let res: Response;
            try {
                res = await this.fetchImpl(url, { headers: this.headers, signal: AbortSignal.timeout(this.timeoutMs) });
            } catch (e) {
                lastErr = e;
                const waitMs = this.backoffMs * Math.pow(2, attempt);
                log('%s: request failed; retrying in %d ms: %O', ticker, waitMs, e);
                await sleep(waitMs);
                attempt++;
                continue;
            }

            if (res.ok) return await res.json();
            const body = await res.text().catch(() => '');
            if (res.status === 404) {
                throw new TickerNotFoundError(`Instrument '${ticker}' not found on OANDA`, { ticker, status: res.status });
            }
            if (res.status === 429 || res.status >= 500) {
                const retryAfter = Number(res.headers.get('retry-after') ?? 0);
                const waitMs = retryAfter > 0 ? retryAfter * 1000 : this.backoffMs * Math.pow(2, attempt);
                lastErr = new Error(`candles ${res.status} body=${body}`);
                log('%s: HTTP %d; retrying in %d ms', ticker, res.status, waitMs);
                await sleep(waitMs);
                attempt++;
                continue;
            }
            throw new PriceSourceIOError(`OANDA candles request for ${ticker} failed with ${res.status}: ${body}`, { ticker, status: res.status });
        }
        throw new PriceSourceIOError(
            `OANDA candles request for ${ticker} failed after ${this.maxAttempts} attempts`,
            { ticker, attempts: this.maxAttempts },
            { cause: lastErr }
        );
    }

    async fetch(ticker: string, start: Date, end: Date, interval: string): Promise<PriceSeries> {
        const granularity = normaliseGranularity(interval);
        assertRange(ticker, start, end);

        const step = GRANULARITY_MS[granularity];
        const endMs = end.getTime();
        const startMs = start.getTime();
        const timestamps: number[] = [];
        const prices: number[] = [];
        let nextFrom = startMs;

        while (nextFrom < endMs) {
            const url = new URL(`${this.baseUrl}/v3/instruments/${encodeURIComponent(ticker)}/candles`);
            url.searchParams.set('granularity', granularity);
            // v20 rejects count together with from and to; pages run from + count and are cut at end
            url.searchParams.set('from', new Date(nextFrom).toISOString());
            url.searchParams.set('price', 'M');
            url.searchParams.set('count', String(MAX_BATCH));

            const payload = OandaCandlesResponseSchema.parse(await this.getJson(url, ticker));
            const batch = payload.candles;
            if (!batch.length) break;

            let lastTime: number | undefined;
            for (const candle of batch) {
                if (!candle.complete) continue;
                const close = candle.mid?.c;
                if (close === undefined) continue;
                const ts = Date.parse(candle.time);
                if (!Number.isFinite(ts) || ts < startMs || ts > endMs) continue;
                if (timestamps.length && ts <= timestamps[timestamps.length - 1]) continue;
                timestamps.push(ts);
                prices.push(Number(close));
                lastTime = ts;
            }
            log('%s: batch of %d candles, %d kept so far', ticker, batch.length, timestamps.length);

            if (lastTime === undefined) break;
            nextFrom = lastTime + step;
            if (batch.length < MAX_BATCH) break;
            if (Date.parse(batch[batch.length - 1].time) > endMs) break;
        }

        if (!timestamps.length) throw emptyRangeError(ticker, start, end, 'oanda');
        return createPriceSeries({ timestamps, prices, currency: this.inferCurrency(ticker) });
    }
}
