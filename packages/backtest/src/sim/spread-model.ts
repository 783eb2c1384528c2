/**
 * Session-aware spread model
 *
 * Spreads are tighter in high-liquidity sessions (London/NY overlap) and
 * wider in the Asian session. With several sessions active the tightest
 * spread applies; with none, the conservative default.
 */

import { DEFAULT_SPREAD_CONFIG, type SpreadConfig } from '../config.js';
import { getActiveSessions } from './sessions.js';

export interface SpreadModel {
  /** Identifier persisted alongside backtest results */
  readonly name: string;
  getSpread(timestamp: number): number;
}

export class SessionSpreadModel implements SpreadModel {
  readonly name = 'session_aware';

  constructor(private readonly config: SpreadConfig = DEFAULT_SPREAD_CONFIG) {}

  getSpread(timestamp: number): number {
    const spreads = getActiveSessions(timestamp, this.config.sessions)
      .map((session) => this.config.sessionSpreads[session])
      .filter((spread): spread is number => spread !== undefined);

    if (spreads.length === 0) {
      return this.config.defaultSpread;
    }
    return Math.min(...spreads);
  }
}

/**
 * Constant spread, for tests and quick what-if runs
 */
export class FixedSpreadModel implements SpreadModel {
  readonly name = 'fixed';

  constructor(private readonly spread: number) {}

  getSpread(_timestamp: number): number {
    return this.spread;
  }
}
