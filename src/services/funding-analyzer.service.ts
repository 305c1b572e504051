/**
 * Funding Analyzer Service
 *
 * Tracks perpetual funding rates per symbol and scores funding-collection
 * opportunities.
 *
 * Logic:
 * - Positive funding rate = longs pay shorts → SHORT collects
 * - Negative funding rate = shorts pay longs → LONG collects
 * - Funding settles every 8h at 00:00, 08:00 and 16:00 UTC
 *
 * Rates are cached per symbol; every fresh reading is appended to a 24h
 * in-memory history used for the trend. A failed fetch yields a stale
 * zero-state instead of an error.
 */

import {
  ExtremeFundingPair,
  FavorablePosition,
  FundingState,
  FundingTrend,
  FundingTrendStats,
  LoggerService,
  RawFundingRate,
} from '../types';
import {
  FUNDING_HOURS_UTC,
  FUNDING_INTERVAL_HOURS,
  FUNDING_PERIODS_PER_DAY,
  PERCENT_MULTIPLIER,
  TIME_UNITS,
} from '../constants';
import { mean, roundTo, standardDeviation } from '../utils/math.utils';
import { MarketDataSource } from './market-data.service';

// ============================================================================
// TYPES & CONSTANTS
// ============================================================================

export interface FundingAnalyzerConfig {
  cacheTimeMs: number;
  historyWindowMs: number;
}

const DEFAULT_CONFIG: FundingAnalyzerConfig = {
  cacheTimeMs: 5 * TIME_UNITS.MINUTE,
  historyWindowMs: TIME_UNITS.DAY,
};

const FULL_SCORE_RATE = 0.002; // 0.2% per period scores 1.0
const TREND_MIN_READINGS = 3;
const TREND_BAND_UP = 1.2;
const TREND_BAND_DOWN = 0.8;
const RSI_OVERBOUGHT = 70;
const RSI_OVERSOLD = 30;
const MARKET_CONFIRMS = 1.3;
const MARKET_CONTRADICTS = 0.7;

interface FundingReading {
  rate: number;
  timestamp: number;
}

interface CachedRate {
  data: RawFundingRate;
  fetchedAt: number;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

/**
 * Hours until the next 00/08/16 UTC settlement, rounded to 2 decimals
 */
export function getHoursToFunding(now: number): number {
  const date = new Date(now);
  const dayStart = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  const hour = date.getUTCHours();

  const nextHour = FUNDING_HOURS_UTC.find((h) => h > hour) ?? FUNDING_HOURS_UTC[0] + 24;
  const next = dayStart + nextHour * TIME_UNITS.HOUR;

  return roundTo((next - now) / TIME_UNITS.HOUR, 2);
}

/**
 * SHORT collects a positive rate, LONG a negative one
 */
export function getFavorablePosition(rate: number): FavorablePosition {
  if (rate > 0) {
    return FavorablePosition.SHORT;
  }
  if (rate < 0) {
    return FavorablePosition.LONG;
  }
  return FavorablePosition.NEUTRAL;
}

/**
 * Trend and statistics from readings ordered newest first
 */
export function calculateFundingTrend(ratesNewestFirst: readonly number[]): FundingTrendStats {
  if (ratesNewestFirst.length < TREND_MIN_READINGS) {
    return { trend: FundingTrend.UNKNOWN, avg24h: 0, rateVsAverage: 0, volatility: 0 };
  }

  const current = ratesNewestFirst[0];
  const avg = mean(ratesNewestFirst);
  const recent = ratesNewestFirst.slice(0, 3);
  const older = ratesNewestFirst.length > 6 ? ratesNewestFirst.slice(3, 6) : ratesNewestFirst.slice(3);

  let trend = FundingTrend.STABLE;
  if (older.length > 0) {
    const recentAvg = mean(recent);
    const olderAvg = mean(older);
    if (recentAvg > olderAvg * TREND_BAND_UP) {
      trend = FundingTrend.INCREASING;
    } else if (recentAvg < olderAvg * TREND_BAND_DOWN) {
      trend = FundingTrend.DECREASING;
    }
  }

  return {
    trend,
    avg24h: roundTo(avg, 6),
    rateVsAverage: avg !== 0 ? roundTo(((current - avg) / avg) * PERCENT_MULTIPLIER, 2) : 0,
    volatility: roundTo(standardDeviation(ratesNewestFirst), 6),
  };
}

/**
 * Opportunity score (0-1) for collecting the next funding payment.
 * RSI null leaves the market multiplier at 1.0.
 */
export function calculateArbitrageScore(rate: number, hoursToFunding: number, rsi: number | null): number {
  const baseScore = Math.min(Math.abs(rate) / FULL_SCORE_RATE, 1.0);
  const position = getFavorablePosition(rate);

  let timeMultiplier = 1.0;
  if (hoursToFunding < 1) {
    timeMultiplier = 1.5;
  } else if (hoursToFunding < 2) {
    timeMultiplier = 1.3;
  } else if (hoursToFunding < 4) {
    timeMultiplier = 1.1;
  } else if (hoursToFunding > 6) {
    timeMultiplier = 0.8;
  }

  let marketMultiplier = 1.0;
  if (rsi !== null) {
    const confirms =
      (position === FavorablePosition.SHORT && rsi > RSI_OVERBOUGHT) ||
      (position === FavorablePosition.LONG && rsi < RSI_OVERSOLD);
    const contradicts =
      (position === FavorablePosition.SHORT && rsi < RSI_OVERSOLD) ||
      (position === FavorablePosition.LONG && rsi > RSI_OVERBOUGHT);
    if (confirms) {
      marketMultiplier = MARKET_CONFIRMS;
    } else if (contradicts) {
      marketMultiplier = MARKET_CONTRADICTS;
    }
  }

  return Math.min(roundTo(baseScore * timeMultiplier * marketMultiplier, 2), 1.0);
}

// ============================================================================
// FUNDING ANALYZER SERVICE
// ============================================================================

export class FundingAnalyzerService {
  private readonly config: FundingAnalyzerConfig;
  private cache: Map<string, CachedRate> = new Map();
  private history: Map<string, FundingReading[]> = new Map(); // oldest first

  constructor(
    private source: MarketDataSource,
    private logger: LoggerService,
    config?: Partial<FundingAnalyzerConfig>,
    private now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Current funding state for a symbol
   *
   * @param rsi - RSI(14) of the symbol, null when unavailable
   */
  async analyze(symbol: string, rsi: number | null): Promise<FundingState> {
    const now = this.now();
    const raw = await this.getRate(symbol);

    if (!raw) {
      return this.zeroState(symbol, now);
    }

    const hoursToFunding = getHoursToFunding(now);
    const stats = calculateFundingTrend(this.getRatesNewestFirst(symbol, now));

    return {
      symbol,
      timestamp: now,
      rate: raw.rate,
      hoursToFunding,
      trend: stats.trend,
      avg24h: stats.avg24h,
      rateVsAverage: stats.rateVsAverage,
      arbitrageScore: calculateArbitrageScore(raw.rate, hoursToFunding, rsi),
      favorablePosition: getFavorablePosition(raw.rate),
      stale: false,
    };
  }

  /**
   * Symbols whose |rate| >= threshold, largest magnitude first
   */
  async getExtremeFundingPairs(symbols: readonly string[], threshold: number = 0.001): Promise<ExtremeFundingPair[]> {
    const pairs: ExtremeFundingPair[] = [];
    const hoursToFunding = getHoursToFunding(this.now());

    for (const symbol of symbols) {
      const raw = await this.getRate(symbol);
      if (raw && Math.abs(raw.rate) >= threshold) {
        pairs.push({
          symbol,
          rate: raw.rate,
          hoursToFunding,
          dailyRate: raw.rate * FUNDING_PERIODS_PER_DAY,
        });
      }
    }

    return pairs.sort((a, b) => Math.abs(b.rate) - Math.abs(a.rate));
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  /**
   * Cached rate, or a fresh one from the source. Null when the fetch fails.
   */
  private async getRate(symbol: string): Promise<RawFundingRate | null> {
    const now = this.now();
    const cached = this.cache.get(symbol);
    if (cached && now - cached.fetchedAt < this.config.cacheTimeMs) {
      return cached.data;
    }

    const result = await this.source.fetchFundingRate(symbol);
    if (!result.ok) {
      this.logger.debug(`⚠️ ${symbol} funding unavailable`, { reason: result.reason, error: result.error });
      return null;
    }

    this.cache.set(symbol, { data: result.value, fetchedAt: now });
    this.recordReading(symbol, result.value.rate, now);

    return result.value;
  }

  private recordReading(symbol: string, rate: number, timestamp: number): void {
    const readings = this.history.get(symbol) ?? [];
    readings.push({ rate, timestamp });
    const cutoff = timestamp - this.config.historyWindowMs;
    this.history.set(
      symbol,
      readings.filter((r) => r.timestamp >= cutoff),
    );
  }

  private getRatesNewestFirst(symbol: string, now: number): number[] {
    const cutoff = now - this.config.historyWindowMs;
    return (this.history.get(symbol) ?? [])
      .filter((r) => r.timestamp >= cutoff)
      .map((r) => r.rate)
      .reverse();
  }

  private zeroState(symbol: string, now: number): FundingState {
    return {
      symbol,
      timestamp: now,
      rate: 0,
      hoursToFunding: FUNDING_INTERVAL_HOURS,
      trend: FundingTrend.UNKNOWN,
      avg24h: 0,
      rateVsAverage: 0,
      arbitrageScore: 0,
      favorablePosition: FavorablePosition.NEUTRAL,
      stale: true,
    };
  }
}
