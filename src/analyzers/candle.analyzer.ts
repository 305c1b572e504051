/**
 * Candle Analyzer (Indicator Engine)
 *
 * Builds the per-cycle MarketSnapshot from a rolling candle buffer:
 * - Volume ratios (current vs last-5 mean / whole-window mean)
 * - Price changes over 1/5/15/60 samples
 * - RSI(14) and momentum(10)
 * - Volume spike flag, magnitude and short-term volume trend
 *
 * Does NOT make trading decisions - only provides the snapshot
 */

import { Candle, MarketSnapshot } from '../types';
import { RSIIndicator, DEFAULT_RSI_PERIOD } from '../indicators/rsi.indicator';
import { mean, percentChange, roundTo } from '../utils/math.utils';

// ============================================================================
// CONSTANTS
// ============================================================================

const DEFAULT_SPIKE_THRESHOLD = 3;
const SHORT_VOLUME_WINDOW = 5;
const MOMENTUM_LOOKBACK = 10;

export interface CandleAnalyzerConfig {
  spikeThreshold: number; // volume ratio that flags a spike
  rsiPeriod: number;
}

const DEFAULT_CONFIG: CandleAnalyzerConfig = {
  spikeThreshold: DEFAULT_SPIKE_THRESHOLD,
  rsiPeriod: DEFAULT_RSI_PERIOD,
};

// ============================================================================
// CANDLE ANALYZER
// ============================================================================

export class CandleAnalyzer {
  private readonly config: CandleAnalyzerConfig;
  private readonly rsi: RSIIndicator;

  constructor(config?: Partial<CandleAnalyzerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.rsi = new RSIIndicator(this.config.rsiPeriod);
  }

  /**
   * Build a snapshot from candles ordered oldest → newest
   *
   * @returns Frozen snapshot, or null for an empty candle list (skip this cycle)
   */
  buildSnapshot(symbol: string, candles: readonly Candle[]): MarketSnapshot | null {
    if (candles.length === 0) {
      return null;
    }

    const current = candles[candles.length - 1];
    const closes = candles.map((c) => c.close);
    const volumes = candles.map((c) => c.volume);

    // Volume
    const avgVolume5m = volumes.length >= SHORT_VOLUME_WINDOW
      ? mean(volumes.slice(-SHORT_VOLUME_WINDOW))
      : current.volume;
    const avgVolume60m = volumes.length > 1 ? mean(volumes) : current.volume;
    const volumeRatio5m = avgVolume5m > 0 ? current.volume / avgVolume5m : 1;
    const volumeRatio60m = avgVolume60m > 0 ? current.volume / avgVolume60m : 1;
    const volumeTrend = this.calculateVolumeTrend(volumes);

    // Price changes (guarded by history length)
    const change1m = this.changeOver(closes, 1);
    const change5m = this.changeOver(closes, 5);
    const change15m = this.changeOver(closes, 15);
    const change60m = closes.length > 1 ? percentChange(closes[0], current.close) : 0;
    const highLowRange = current.low > 0 ? ((current.high - current.low) / current.low) * 100 : 0;

    // Indicators
    const rsi14 = this.rsi.calculate(closes);
    const momentum10 = closes.length > MOMENTUM_LOOKBACK && closes[closes.length - 1 - MOMENTUM_LOOKBACK] > 0
      ? current.close / closes[closes.length - 1 - MOMENTUM_LOOKBACK]
      : null;

    const snapshot: MarketSnapshot = {
      symbol,
      timestamp: current.timestamp,
      ohlcv: Object.freeze({ ...current }),
      volume: Object.freeze({
        avgVolume5m: roundTo(avgVolume5m, 2),
        avgVolume60m: roundTo(avgVolume60m, 2),
        volumeRatio5m: roundTo(volumeRatio5m, 2),
        volumeRatio60m: roundTo(volumeRatio60m, 2),
        isSpike: volumeRatio5m > this.config.spikeThreshold || volumeRatio60m > this.config.spikeThreshold,
        spikeMagnitude: roundTo(Math.max(volumeRatio5m, volumeRatio60m), 2),
        volumeTrend: roundTo(volumeTrend, 2),
      }),
      priceChange: Object.freeze({
        change1m: roundTo(change1m, 2),
        change5m: roundTo(change5m, 2),
        change15m: roundTo(change15m, 2),
        change60m: roundTo(change60m, 2),
        highLowRange: roundTo(highLowRange, 2),
      }),
      indicators: Object.freeze({
        rsi14: rsi14 === null ? null : roundTo(rsi14, 2),
        momentum10: momentum10 === null ? null : roundTo(momentum10, 3),
      }),
    };

    return Object.freeze(snapshot);
  }

  // ============================================================================
  // PRIVATE HELPERS
  // ============================================================================

  /**
   * Mean of the last 5 volumes over the mean of the 5 before them
   * (the first 5 when history is shorter than 10)
   */
  private calculateVolumeTrend(volumes: readonly number[]): number {
    const recent = volumes.slice(-SHORT_VOLUME_WINDOW);
    const older = volumes.length >= SHORT_VOLUME_WINDOW * 2
      ? volumes.slice(-SHORT_VOLUME_WINDOW * 2, -SHORT_VOLUME_WINDOW)
      : volumes.slice(0, SHORT_VOLUME_WINDOW);
    const olderAvg = mean(older);
    return olderAvg > 0 ? mean(recent) / olderAvg : 1;
  }

  /**
   * Percent change over the last `lookback` samples, 0 without enough history
   */
  private changeOver(closes: readonly number[], lookback: number): number {
    if (closes.length <= lookback) {
      return 0;
    }
    return percentChange(closes[closes.length - 1 - lookback], closes[closes.length - 1]);
  }
}
