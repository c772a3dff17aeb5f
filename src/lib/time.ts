export type TimestampInput = Date | string | number;

const ZONE_SUFFIX = /(Z|[+-]\d{2}(:?\d{2})?)$/i;

/**
 * Epoch milliseconds in UTC. Strings without a zone designator are read as
 * UTC rather than local time; zoned strings and Dates are converted.
 */
export function toUtcMillis(value: TimestampInput): number {
    let ms: number;
    if (value instanceof Date) {
        ms = value.getTime();
    } else if (typeof value === 'number') {
        ms = value;
    } else {
        const text = value.trim().replace(' ', 'T');
        const hasTime = text.includes('T');
        ms = Date.parse(hasTime && !ZONE_SUFFIX.test(text) ? `${text}Z` : text);
    }
    if (!Number.isFinite(ms)) throw new RangeError(`invalid timestamp: ${String(value)}`);
    return ms;
}

export function toIso(ms: number): string {
    return new Date(ms).toISOString();
}
