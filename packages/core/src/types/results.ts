/**
 * Persisted backtest result, one per (strategy, horizon) per evaluation cycle.
 *
 * Records are append-only: a newer record with a later createdAt supersedes
 * an older one, nothing is edited in place.
 */
export interface BacktestResultRecord {
  id: string;
  strategyName: string;
  timeframe: string;
  windowDays: number;
  /** UNIX seconds of the first bar in the evaluated history */
  startDate: number;
  /** UNIX seconds of the last bar in the evaluated history */
  endDate: number;
  winRate: number;
  profitFactor: number;
  sharpeRatio: number;
  maxDrawdown: number;
  expectancy: number;
  totalTrades: number;
  isWalkForward: boolean;
  /** Only set on walk-forward records */
  isOverfitted: boolean | null;
  walkForwardEfficiency: number | null;
  wfeWinRate: number | null;
  wfeProfitFactor: number | null;
  spreadModel: string;
  /** UNIX milliseconds of the evaluation cycle that produced the record */
  createdAt: number;
}

export type NewBacktestResultRecord = Omit<BacktestResultRecord, 'id'>;
