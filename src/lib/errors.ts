/**
 * ERROR TAXONOMY
 *
 * Typed failures raised by the pipeline and the price sources.
 * Every error carries a `context` record naming the offending
 * ticker, currency or window so callers can act on it directly.
 */

export type ErrorContext = Record<string, string | number | boolean | undefined>;

export class StatArbError extends Error {
    readonly context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.context = context;
    }
}

/** Malformed FX ticker, unsupported interval, missing FX mapping, bad settings. */
export class ConfigurationError extends StatArbError { }

/** Too few usable observations for a regression or a test. */
export class DataInsufficiencyError extends StatArbError { }

/** The FX pair cannot convert between the requested currencies. */
export class CurrencyIncompatibilityError extends StatArbError { }

export class TickerNotFoundError extends StatArbError { }

/** start >= end, or the source holds no data inside the requested range. */
export class PriceRangeError extends StatArbError { }

/** Transport or file failure inside a price source; the cause is kept as-is. */
export class PriceSourceIOError extends StatArbError { }
