// Re-export indicator calculators and series from their respective modules

// Moving Averages
export { smaSeries, emaSeries, SmaCalculator, EmaCalculator } from './moving-averages';

// Volatility
export { atrSeries, AtrCalculator } from './volatility';

// Momentum
export { rsiSeries, RsiCalculator } from './momentum';

// Volume
export { vwapSeries, VwapCalculator } from './volume';

// Utils
export { wilderSmooth, emaStep, trueRange, typicalPrice, rsiFromAverages } from './utils';

// Types
export type { Num, Bar, StreamingIndicator } from './utils';
export type { TimedBar, VwapOptions } from './volume';
