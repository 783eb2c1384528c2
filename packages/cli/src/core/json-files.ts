/**
 * JSON file inputs of the CLI: bar series, stored results, live performance.
 * Every file is validated with zod before it reaches the evaluation code.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { BacktestResultRecord, Candle, LivePerformance } from '@stratlab/core';
import { newBacktestResultRecordSchema } from '@stratlab/storage';
import { ValidationError } from '@stratlab/utils';
import { coerceJson } from './coerce.js';

const finite = z.number().finite();

export const candleSchema = z.object({
  timestamp: z.number().int(),
  open: finite,
  high: finite,
  low: finite,
  close: finite,
  volume: finite.nonnegative().default(0),
});

/**
 * A bare array of bars, or an object naming the instrument and interval
 */
export const barFileSchema = z.union([
  z.array(candleSchema),
  z.object({
    symbol: z.string().min(1).optional(),
    timeframe: z.string().min(1).optional(),
    bars: z.array(candleSchema),
  }),
]);

export interface BarFile {
  symbol?: string;
  timeframe?: string;
  bars: Candle[];
}

export const resultsFileSchema = z.array(
  newBacktestResultRecordSchema.extend({ id: z.coerce.string() })
);

export const livePerformanceFileSchema = z.array(
  z.object({
    strategyName: z.string().min(1),
    winRate: z.number().min(0).max(1),
    profitFactor: finite.nonnegative(),
    avgRiskReward: finite,
    totalSignals: z.number().int().nonnegative(),
  })
);

export async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ValidationError(`Cannot read ${path}`, {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return coerceJson(text, path);
}

async function parseJsonFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const parsed = schema.safeParse(await readJsonFile(path));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(`Invalid contents in ${path}`, { path, issues });
  }
  return parsed.data;
}

/**
 * Bars sorted ascending by timestamp. Duplicate timestamps are rejected.
 */
export async function loadBarFile(path: string): Promise<BarFile> {
  const parsed = await parseJsonFile(path, barFileSchema);
  const file: BarFile = Array.isArray(parsed) ? { bars: parsed } : parsed;
  const bars = [...file.bars].sort((a, b) => a.timestamp - b.timestamp);

  for (let i = 1; i < bars.length; i++) {
    if (bars[i].timestamp === bars[i - 1].timestamp) {
      throw new ValidationError(`Duplicate bar timestamp in ${path}`, {
        path,
        timestamp: bars[i].timestamp,
      });
    }
  }

  return { ...file, bars };
}

export async function loadResultsFile(path: string): Promise<BacktestResultRecord[]> {
  return parseJsonFile(path, resultsFileSchema);
}

export async function loadLivePerformanceFile(path: string): Promise<LivePerformance[]> {
  return parseJsonFile(path, livePerformanceFileSchema);
}
