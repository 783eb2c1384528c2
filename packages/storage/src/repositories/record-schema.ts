import { z } from 'zod';
import type { BacktestResultRecord, NewBacktestResultRecord } from '@stratlab/core';
import { ValidationError } from '@stratlab/utils';

const finite = z.number().finite();

export const newBacktestResultRecordSchema = z.object({
  strategyName: z.string().min(1),
  timeframe: z.string().min(1),
  windowDays: z.number().int().positive(),
  startDate: finite,
  endDate: finite,
  winRate: z.number().min(0).max(1),
  profitFactor: finite.nonnegative(),
  sharpeRatio: finite,
  maxDrawdown: finite.nonnegative(),
  expectancy: finite,
  totalTrades: z.number().int().nonnegative(),
  isWalkForward: z.boolean(),
  isOverfitted: z.boolean().nullable(),
  walkForwardEfficiency: finite.nullable(),
  wfeWinRate: finite.nullable(),
  wfeProfitFactor: finite.nullable(),
  spreadModel: z.string().min(1),
  createdAt: finite,
});

/**
 * Validate a whole batch before anything is written
 *
 * @throws ValidationError naming the first bad record
 */
export function assertValidRecords(records: readonly NewBacktestResultRecord[]): void {
  records.forEach((record, index) => {
    const parsed = newBacktestResultRecordSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ValidationError(`Invalid backtest result at index ${index}`, {
        index,
        strategy: record.strategyName,
        issues,
      });
    }
  });
}

/**
 * Row shape of the backtest_results table. NUMERIC and BIGINT arrive from
 * pg as strings.
 */
export const backtestResultRowSchema = z.object({
  id: z.coerce.string(),
  strategy_name: z.string(),
  timeframe: z.string(),
  window_days: z.coerce.number(),
  start_date: z.coerce.number(),
  end_date: z.coerce.number(),
  win_rate: z.coerce.number(),
  profit_factor: z.coerce.number(),
  sharpe_ratio: z.coerce.number(),
  max_drawdown: z.coerce.number(),
  expectancy: z.coerce.number(),
  total_trades: z.coerce.number(),
  is_walk_forward: z.boolean(),
  is_overfitted: z.boolean().nullable(),
  walk_forward_efficiency: z.coerce.number().nullable(),
  wfe_win_rate: z.coerce.number().nullable(),
  wfe_profit_factor: z.coerce.number().nullable(),
  spread_model: z.string(),
  created_at: z.coerce.number(),
});

export type BacktestResultRow = z.infer<typeof backtestResultRowSchema>;

export function rowToRecord(raw: unknown): BacktestResultRecord {
  const row = backtestResultRowSchema.parse(raw);
  return {
    id: row.id,
    strategyName: row.strategy_name,
    timeframe: row.timeframe,
    windowDays: row.window_days,
    startDate: row.start_date,
    endDate: row.end_date,
    winRate: row.win_rate,
    profitFactor: row.profit_factor,
    sharpeRatio: row.sharpe_ratio,
    maxDrawdown: row.max_drawdown,
    expectancy: row.expectancy,
    totalTrades: row.total_trades,
    isWalkForward: row.is_walk_forward,
    isOverfitted: row.is_overfitted,
    walkForwardEfficiency: row.walk_forward_efficiency,
    wfeWinRate: row.wfe_win_rate,
    wfeProfitFactor: row.wfe_profit_factor,
    spreadModel: row.spread_model,
    createdAt: row.created_at,
  };
}
