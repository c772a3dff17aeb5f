export * from './lib/errors.js';
export { toUtcMillis, toIso, type TimestampInput } from './lib/time.js';
export { parseFxPair, convertCurrency, type FxPair } from './lib/fx.js';
export {
    createPriceSeries,
    PriceSeriesSchema,
    type PriceSeries,
    type PriceSeriesInput,
    type TimeSeries,
    type Spread,
    type AlignedPair
} from './types/series.js';
export { alignPair, DEFAULT_BASE_CURRENCY, type PairLeg, type AlignPairOptions } from './data/alignPair.js';
export { loadPairData, resolveFxTicker, type FxTickers, type LoadPairOptions } from './data/loadPair.js';
export type { PriceSource } from './providers/priceSource.js';
export { CsvPriceSource, type CsvSpecification, type CsvSpecificationInput } from './providers/csvProvider.js';
export { OandaPriceSource, normaliseGranularity, type OandaOptions } from './providers/oandaProvider.js';
export { InMemoryPriceSource } from './providers/memoryProvider.js';
export { estimateHedgeRatio, computeSpread, spreadFromPair, type HedgeRatioResult, type HedgeOptions } from './strategies/pairs/hedge.js';
export { adfTest, isStationary, mackinnonPValue, mackinnonCriticalValues, type ADFResult, type ADFOptions } from './strategies/pairs/stationarity.js';
export { computeBands, computeMultiBands, type Bands } from './strategies/pairs/bands.js';
export {
    runBacktest,
    runBacktestOnBands,
    computeStats,
    type Trade,
    type TradeSide,
    type BacktestStats,
    type BacktestResult
} from './strategies/pairs/backtest.js';
export { runMultiWindowBacktest, bestWindow } from './strategies/pairs/multiWindow.js';
export { loadConfig, type AppConfig } from './config/index.js';
