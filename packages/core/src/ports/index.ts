/**
 * Ports Barrel Export
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock, createFixedClock } from './clockPort.js';
export type { PriceHistoryPort, PriceHistoryRequest } from './priceHistoryPort.js';
export type { BacktestResultsPort, BacktestResultQuery } from './backtestResultsPort.js';
