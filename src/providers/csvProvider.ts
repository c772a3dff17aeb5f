/**
 * CSV PRICE SOURCE
 *
 * Offline price history from CSV files, one file per ticker. Each file needs
 * a header row with a timestamp column and a price column; other columns are
 * ignored. Timestamps without a zone are read as UTC.
 */

import { promises as fs } from 'fs';
import createDebug from 'debug';
import { z } from 'zod';
import { ConfigurationError, PriceSourceIOError, TickerNotFoundError } from '../lib/errors.js';
import { toUtcMillis } from '../lib/time.js';
import { CurrencySchema, createPriceSeries, type PriceSeries } from '../types/series.js';
import { assertRange, emptyRangeError, type PriceSource } from './priceSource.js';

const log = createDebug('statarb:csv');

export const CsvSpecificationSchema = z.object({
    path: z.string().min(1),
    priceColumn: z.string().min(1).default('close'),
    timestampColumn: z.string().min(1).default('timestamp'),
    currency: CurrencySchema.default('USD')
});
export type CsvSpecification = z.infer<typeof CsvSpecificationSchema>;
export type CsvSpecificationInput = z.input<typeof CsvSpecificationSchema>;

export const CsvMappingSchema = z.record(CsvSpecificationSchema);

function splitCsvLine(line: string): string[] {
    const cells: string[] = [];
    let current = '';
    let quoted = false;
    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (quoted) {
            if (ch === '"' && line[i + 1] === '"') {
                current += '"';
                i++;
            } else if (ch === '"') {
                quoted = false;
            } else {
                current += ch;
            }
        } else if (ch === '"') {
            quoted = true;
        } else if (ch === ',') {
            cells.push(current.trim());
            current = '';
        } else {
            current += ch;
        }
    }
    cells.push(current.trim());
    return cells;
}

export type CsvTable = { header: string[]; rows: string[][] };

export function parseCsv(text: string): CsvTable {
    const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/).filter(l => l.trim().length > 0);
    const [first, ...rest] = lines;
    return {
        header: first === undefined ? [] : splitCsvLine(first),
        rows: rest.map(splitCsvLine)
    };
}

export class CsvPriceSource implements PriceSource {
    private mapping: Map<string, CsvSpecification>;

    constructor(mapping: Record<string, CsvSpecificationInput>) {
        this.mapping = new Map(Object.entries(CsvMappingSchema.parse(mapping)));
    }

    async fetch(ticker: string, start: Date, end: Date, _interval: string): Promise<PriceSeries> {
        const spec = this.mapping.get(ticker);
        if (!spec) throw new TickerNotFoundError(`Ticker '${ticker}' is not configured for the CSV source`, { ticker });
        assertRange(ticker, start, end);

        let text: string;
        try {
            text = await fs.readFile(spec.path, 'utf8');
        } catch (e) {
            throw new PriceSourceIOError(`Failed to read ${spec.path} for ${ticker}`, { ticker, path: spec.path }, { cause: e });
        }

        const { header, rows } = parseCsv(text);
        const tsIdx = header.indexOf(spec.timestampColumn);
        const pxIdx = header.indexOf(spec.priceColumn);
        for (const [column, idx] of [[spec.timestampColumn, tsIdx], [spec.priceColumn, pxIdx]] as const) {
            if (idx === -1) {
                throw new ConfigurationError(
                    `Column '${column}' not found in ${spec.path}. Adjust the CSV specification or rename the column.`,
                    { ticker, path: spec.path, column }
                );
            }
        }

        const from = start.getTime();
        const to = end.getTime();
        const timestamps: number[] = [];
        const prices: number[] = [];
        for (const row of rows) {
            const t = toUtcMillis(row[tsIdx] ?? '');
            if (t < from || t > to) continue;
            const cell = row[pxIdx] ?? '';
            timestamps.push(t);
            prices.push(cell === '' ? NaN : Number(cell));
        }
        log('%s: %d of %d rows in range from %s', ticker, timestamps.length, rows.length, spec.path);
        if (!timestamps.length) throw emptyRangeError(ticker, start, end, 'csv');

        return createPriceSeries({ timestamps, prices, currency: spec.currency });
    }
}
