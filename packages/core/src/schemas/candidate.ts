/**
 * Candidate Schema
 *
 * zod schema for TradeCandidate plus the price-ordering rules that make a
 * candidate tradable. Used at the simulator boundary, the first place a
 * candidate is consumed.
 */

import { z } from 'zod';
import { InvalidCandidateError } from '../errors.js';
import type { TradeCandidate } from '../types/trade.js';

const price = z.number().finite().positive();

export const tradeCandidateSchema = z
  .object({
    strategyName: z.string().min(1),
    direction: z.enum(['long', 'short']),
    entryPrice: price,
    stopLoss: price,
    takeProfit1: price,
    takeProfit2: price,
    timestamp: z.number().int().nonnegative(),
    confidence: z.number().min(0).max(100),
    reasoning: z.string(),
    timeframe: z.string().optional(),
    session: z.string().optional(),
  })
  .superRefine((c, ctx) => {
    if (c.direction === 'long') {
      if (!(c.stopLoss < c.entryPrice)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'long stop must be below entry', path: ['stopLoss'] });
      }
      if (!(c.takeProfit1 > c.entryPrice)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'long TP1 must be above entry', path: ['takeProfit1'] });
      }
      if (!(c.takeProfit2 > c.takeProfit1)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'long TP2 must be above TP1', path: ['takeProfit2'] });
      }
    } else {
      if (!(c.stopLoss > c.entryPrice)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'short stop must be above entry', path: ['stopLoss'] });
      }
      if (!(c.takeProfit1 < c.entryPrice)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'short TP1 must be below entry', path: ['takeProfit1'] });
      }
      if (!(c.takeProfit2 < c.takeProfit1)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'short TP2 must be below TP1', path: ['takeProfit2'] });
      }
    }
  });

/**
 * Validate a candidate, throwing InvalidCandidateError with every issue found
 */
export function assertValidCandidate(candidate: TradeCandidate): TradeCandidate {
  const result = tradeCandidateSchema.safeParse(candidate);
  if (result.success) {
    return candidate;
  }

  const issues = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  throw new InvalidCandidateError(
    `Invalid ${candidate.direction} candidate from '${candidate.strategyName}'`,
    issues,
    { candidate }
  );
}
