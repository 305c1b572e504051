/**
 * Timeframe Divergence Analyzer
 *
 * Compares the short-term trend on 1m, 5m and 15m candles.
 * Bullish divergence: 15m trending down while 1m turns up hard.
 * Bearish divergence: the mirror image.
 */

import {
  Candle,
  MultiTimeframeCandles,
  TimeframeDivergence,
  TimeframeDivergenceType,
  TimeframeKey,
  TimeframeTrend,
} from '../types';
import { mean, percentChange } from '../utils/math.utils';

// ============================================================================
// CONSTANTS
// ============================================================================

const TIMEFRAMES: readonly TimeframeKey[] = ['1m', '5m', '15m'];
const TREND_WINDOW = 5;
const MIN_LOWER_TF_STRENGTH = 1; // percent
const MIN_HIGHER_TF_STRENGTH = 0.1; // divisor floor

// ============================================================================
// ANALYZER
// ============================================================================

/**
 * Trend of one timeframe: mean of the last 2 closes vs mean of the
 * 3 closes before them. null with fewer than 5 candles.
 */
export function calculateTimeframeTrend(candles: readonly Candle[]): TimeframeTrend | null {
  if (candles.length < TREND_WINDOW) {
    return null;
  }

  const closes = candles.slice(-TREND_WINDOW).map((c) => c.close);
  const recentAvg = mean(closes.slice(-2));
  const olderAvg = mean(closes.slice(0, 3));
  const trendPct = percentChange(olderAvg, recentAvg);

  return {
    direction: trendPct > 0 ? 'UP' : 'DOWN',
    strength: Math.abs(trendPct),
  };
}

export function detectTimeframeDivergence(data: Partial<MultiTimeframeCandles>): TimeframeDivergence {
  const result: TimeframeDivergence = {
    hasDivergence: false,
    type: null,
    strength: 0,
    trends: {},
  };

  for (const tf of TIMEFRAMES) {
    const candles = data[tf];
    if (!candles || candles.length === 0) {
      return result;
    }
    const trend = calculateTimeframeTrend(candles);
    if (trend) {
      result.trends[tf] = trend;
    }
  }

  const lower = result.trends['1m'];
  const higher = result.trends['15m'];
  if (!lower || !higher || !result.trends['5m']) {
    return result;
  }

  if (lower.strength <= MIN_LOWER_TF_STRENGTH || lower.direction === higher.direction) {
    return result;
  }

  result.hasDivergence = true;
  result.type = lower.direction === 'UP' ? TimeframeDivergenceType.BULLISH : TimeframeDivergenceType.BEARISH;
  result.strength = lower.strength / Math.max(higher.strength, MIN_HIGHER_TF_STRENGTH);

  return result;
}
