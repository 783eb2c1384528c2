import { DEFAULT_SESSIONS, type SessionWindow } from '@stratlab/backtest';

/**
 * Settings every strategy factory takes besides its own parameters
 */
export interface StrategyOptions {
  timeframe?: string;
  /** Session table the session filters read; the spread model's table in a cycle */
  sessions?: Record<string, SessionWindow>;
}

export interface ResolvedStrategyOptions {
  timeframe: string;
  sessions: Record<string, SessionWindow>;
}

export function resolveStrategyOptions(options: StrategyOptions = {}): ResolvedStrategyOptions {
  return {
    timeframe: options.timeframe ?? 'H1',
    sessions: options.sessions ?? DEFAULT_SESSIONS,
  };
}
