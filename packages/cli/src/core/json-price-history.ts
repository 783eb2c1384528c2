import type { Candle, PriceHistoryPort, PriceHistoryRequest } from '@stratlab/core';
import { NotFoundError, ValidationError } from '@stratlab/utils';
import type { BarFile } from './json-files.js';

/**
 * PriceHistoryPort over bar files already loaded from disk, one per
 * timeframe. A file that names its symbol only answers for that symbol.
 */
export class JsonFilePriceHistory implements PriceHistoryPort {
  private readonly files: ReadonlyMap<string, BarFile>;

  constructor(files: Record<string, BarFile>) {
    this.files = new Map(Object.entries(files));
  }

  async getCandles(request: PriceHistoryRequest): Promise<Candle[]> {
    const file = this.files.get(request.timeframe);
    if (!file) {
      throw new NotFoundError('Bar file for timeframe', request.timeframe);
    }
    if (file.symbol !== undefined && file.symbol !== request.symbol) {
      throw new ValidationError(`Bar file holds ${file.symbol}, not ${request.symbol}`, {
        requested: request.symbol,
        timeframe: request.timeframe,
      });
    }

    const { from, to, limit } = request;
    const inRange = file.bars.filter(
      (bar) =>
        (from === undefined || bar.timestamp >= from) && (to === undefined || bar.timestamp <= to)
    );
    return limit === undefined ? inRange : inRange.slice(Math.max(0, inRange.length - limit));
  }
}
