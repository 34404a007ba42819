import { z } from 'zod';
import { Candle } from '@tickwise/types';

// ============================================================================
// Closed-candle event delivered by the market-data feed
// ============================================================================

export const ClosedCandleEventSchema = z
  .object({
    symbol: z.string().trim().min(1),
    open: z.number().positive(),
    high: z.number().positive(),
    low: z.number().positive(),
    close: z.number().positive(),
    volume: z.number().nonnegative(),
    closeTimestamp: z.number().int().nonnegative(),
  })
  .refine(event => event.high >= event.low, {
    message: 'high must not be below low',
    path: ['high'],
  })
  .refine(event => event.close <= event.high && event.close >= event.low, {
    message: 'close must lie within [low, high]',
    path: ['close'],
  });

export type ClosedCandleEvent = z.infer<typeof ClosedCandleEventSchema>;

export type ParsedCandle =
  | { ok: true; candle: Candle }
  | { ok: false; error: string };

export function toCandle(event: ClosedCandleEvent): Candle {
  return {
    symbol: event.symbol,
    timestamp: event.closeTimestamp,
    open: event.open,
    high: event.high,
    low: event.low,
    close: event.close,
    volume: event.volume,
  };
}

export function parseClosedCandle(raw: unknown): ParsedCandle {
  const result = ClosedCandleEventSchema.safeParse(raw);
  if (!result.success) {
    const error = result.error.issues
      .map(issue => `${issue.path.join('.') || 'event'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error };
  }
  return { ok: true, candle: toCandle(result.data) };
}
