/**
 * Statistical Analyzer Service
 *
 * Keeps a 24h rolling window of 1-minute samples per symbol and derives:
 * - Z-scores of the current volume and 1m price change (outlier detection)
 * - Market regime (trending / ranging / volatile / mixed)
 * - Dynamic confidence threshold from regime and volatility
 *
 * Per-symbol lifecycle:
 * - UNINITIALIZED: fewer than 100 samples, Z-scores and regime unavailable
 * - WARM: 100+ samples
 * The window can be backfilled once per symbol from the signal store.
 */

import {
  LoggerService,
  MarketRegime,
  MarketSnapshot,
  RegimeDetails,
  SignificanceVerdict,
  StatisticalAnalysis,
  StatSample,
  ZScoreResult,
} from '../types';
import { STATISTICS, DEFAULT_DETECTOR_THRESHOLDS, PERCENT_MULTIPLIER } from '../constants';
import { RingBuffer } from '../utils/ring-buffer';
import { linearSlope, mean, roundTo, standardDeviation } from '../utils/math.utils';
import { createErrorLogObject } from '../utils/error.utils';
import { SignalStore } from './signal-store.service';

// ============================================================================
// TYPES
// ============================================================================

export type PercentileMetric = 'volume' | 'priceChange';

export interface StatisticalAnalyzerConfig {
  windowSize: number;
  minSamples: number;
}

const DEFAULT_CONFIG: StatisticalAnalyzerConfig = {
  windowSize: STATISTICS.WINDOW_SIZE,
  minSamples: STATISTICS.MIN_SAMPLES,
};

const NEUTRAL_PERCENTILE = 50;

// Regime classification
const TRENDING_SLOPE = 0.1;
const TRENDING_EFFICIENCY = 0.3;
const VOLATILE_VOLATILITY = 2;
const RANGING_EFFICIENCY = 0.2;

// ============================================================================
// PURE HELPERS
// ============================================================================

/**
 * Threshold = base x volatility multiplier x regime multiplier
 */
export function calculateDynamicThreshold(baseThreshold: number, regime: MarketRegime, volatility: number): number {
  let volatilityMultiplier = 1.0;
  if (volatility > 5) {
    volatilityMultiplier = 0.75;
  } else if (volatility > 3) {
    volatilityMultiplier = 0.8;
  } else if (volatility > 2) {
    volatilityMultiplier = 0.9;
  } else if (volatility < 0.5) {
    volatilityMultiplier = 1.2;
  }

  let regimeMultiplier = 1.0;
  if (regime === MarketRegime.VOLATILE) {
    regimeMultiplier = 0.75;
  } else if (regime === MarketRegime.RANGING) {
    regimeMultiplier = 0.85;
  } else if (regime === MarketRegime.TRENDING) {
    regimeMultiplier = 1.1;
  }

  return roundTo(baseThreshold * volatilityMultiplier * regimeMultiplier, 3);
}

/**
 * Stepwise multiplier from Z magnitudes, capped at 2.0
 */
export function calculateConfidenceMultiplier(volumeZ: number, priceZ: number): number {
  let multiplier = 1.0;

  const v = Math.abs(volumeZ);
  if (v > 4) {
    multiplier *= 1.5;
  } else if (v > 3) {
    multiplier *= 1.3;
  } else if (v > 2) {
    multiplier *= 1.1;
  }

  const p = Math.abs(priceZ);
  if (p > 3) {
    multiplier *= 1.4;
  } else if (p > 2) {
    multiplier *= 1.2;
  }

  return roundTo(Math.min(multiplier, STATISTICS.MAX_CONFIDENCE_MULTIPLIER), 2);
}

/**
 * Scale a confidence by the Z-score multiplier and compare it with the
 * dynamic threshold. Cold statistics leave the confidence unchanged.
 */
export function evaluateSignificance(analysis: StatisticalAnalysis, confidence: number): SignificanceVerdict {
  const multiplier = analysis.zscore ? analysis.zscore.confidenceMultiplier : 1.0;
  const adjustedConfidence = roundTo(confidence * multiplier, 3);
  return {
    adjustedConfidence,
    shouldAlert: adjustedConfidence >= analysis.dynamicThreshold,
  };
}

// ============================================================================
// STATISTICAL ANALYZER SERVICE
// ============================================================================

export class StatisticalAnalyzerService {
  private readonly config: StatisticalAnalyzerConfig;
  private windows: Map<string, RingBuffer<StatSample>> = new Map();
  private regimes: Map<string, RegimeDetails> = new Map();
  private warmUpAttempted: Set<string> = new Set();

  constructor(
    private logger: LoggerService,
    private store: SignalStore | null = null,
    config?: Partial<StatisticalAnalyzerConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Append the snapshot's close/volume/1m change to the symbol window
   */
  update(snapshot: MarketSnapshot): void {
    this.getWindow(snapshot.symbol).push({
      timestamp: snapshot.timestamp,
      price: snapshot.ohlcv.close,
      volume: snapshot.ohlcv.volume,
      priceChange: snapshot.priceChange.change1m,
    });
  }

  /**
   * Backfill a cold window from stored snapshots older than the oldest
   * in-memory sample. Runs at most once per symbol; store errors are logged.
   *
   * @returns Number of samples added
   */
  async warmUp(symbol: string): Promise<number> {
    if (!this.store || this.warmUpAttempted.has(symbol)) {
      return 0;
    }
    const window = this.getWindow(symbol);
    if (window.size() >= this.config.minSamples) {
      return 0;
    }
    this.warmUpAttempted.add(symbol);

    try {
      const records = await this.store.getRecentSnapshots(symbol, this.config.windowSize);
      const oldest = window.first();
      let added = 0;

      // records are newest first: prepend walks backwards in time
      for (const record of records) {
        if (oldest && record.timestamp >= oldest.timestamp) {
          continue;
        }
        const stored = window.prepend({
          timestamp: record.timestamp,
          price: record.close,
          volume: record.volume,
          priceChange: record.change1m,
        });
        if (!stored) {
          break;
        }
        added++;
      }

      if (added > 0) {
        this.logger.info(`📚 ${symbol} statistics backfilled`, { added, samples: window.size() });
      }
      return added;
    } catch (error) {
      this.logger.warn(`${symbol} statistics warm-up failed`, createErrorLogObject(error));
      return 0;
    }
  }

  /**
   * Z-scores of the newest sample against the rest of the window
   *
   * @returns null while the window is cold
   */
  calculateZScore(symbol: string): ZScoreResult | null {
    const window = this.windows.get(symbol);
    if (!window || window.size() < this.config.minSamples) {
      return null;
    }

    const samples = window.toArray();
    const current = samples[samples.length - 1];
    const history = samples.slice(0, -1);

    const volumes = history.map((s) => s.volume);
    const changes = history.map((s) => s.priceChange);

    const volumeMean = mean(volumes);
    const volumeStd = standardDeviation(volumes);
    const changeMean = mean(changes);
    const changeStd = standardDeviation(changes);

    const volumeZScore = volumeStd > 0 ? (current.volume - volumeMean) / volumeStd : 0;
    const priceZScore = changeStd > 0 ? (current.priceChange - changeMean) / changeStd : 0;

    return {
      volumeZScore: roundTo(volumeZScore, 2),
      priceZScore: roundTo(priceZScore, 2),
      isOutlier: Math.abs(volumeZScore) > STATISTICS.VOLUME_OUTLIER_Z || Math.abs(priceZScore) > STATISTICS.PRICE_OUTLIER_Z,
      confidenceMultiplier: calculateConfidenceMultiplier(volumeZScore, priceZScore),
      volumeMean24h: roundTo(volumeMean, 2),
      volumeStd24h: roundTo(volumeStd, 2),
      priceChangeMean24h: roundTo(changeMean, 4),
      priceChangeStd24h: roundTo(changeStd, 4),
    };
  }

  /**
   * Classify the window: trending / volatile / ranging / mixed
   *
   * @returns Regime details, or null while the window is cold
   */
  detectMarketRegime(symbol: string): RegimeDetails | null {
    const window = this.windows.get(symbol);
    if (!window || window.size() < this.config.minSamples) {
      return null;
    }

    const prices = window.toArray().map((s) => s.price);
    const avgPrice = mean(prices);
    const trendStrength = avgPrice > 0 ? (Math.abs(linearSlope(prices)) / avgPrice) * PERCENT_MULTIPLIER : 0;

    const returns: number[] = [];
    let pathLength = 0;
    for (let i = 1; i < prices.length; i++) {
      if (prices[i - 1] > 0) {
        returns.push((prices[i] - prices[i - 1]) / prices[i - 1]);
      }
      pathLength += Math.abs(prices[i] - prices[i - 1]);
    }
    const volatility = standardDeviation(returns) * PERCENT_MULTIPLIER;
    const efficiency = pathLength > 0 ? Math.abs(prices[prices.length - 1] - prices[0]) / pathLength : 0;

    let regime = MarketRegime.MIXED;
    if (trendStrength > TRENDING_SLOPE && efficiency > TRENDING_EFFICIENCY) {
      regime = MarketRegime.TRENDING;
    } else if (volatility > VOLATILE_VOLATILITY) {
      regime = MarketRegime.VOLATILE;
    } else if (efficiency < RANGING_EFFICIENCY) {
      regime = MarketRegime.RANGING;
    }

    const details: RegimeDetails = {
      regime,
      trendStrength,
      volatility,
      efficiency,
      timestamp: window.last()?.timestamp ?? Date.now(),
    };

    const previous = this.regimes.get(symbol);
    if (previous && previous.regime !== regime) {
      this.logger.debug(`🔄 ${symbol} regime ${previous.regime} → ${regime}`, {
        volatility: roundTo(volatility, 3),
        efficiency: roundTo(efficiency, 3),
      });
    }
    this.regimes.set(symbol, details);

    return details;
  }

  /**
   * Full per-cycle analysis: record the sample, then score it
   */
  analyze(snapshot: MarketSnapshot, baseThreshold: number = DEFAULT_DETECTOR_THRESHOLDS.confidenceThreshold): StatisticalAnalysis {
    this.update(snapshot);

    const symbol = snapshot.symbol;
    const zscore = this.calculateZScore(symbol);
    const regimeDetails = this.detectMarketRegime(symbol);
    const regime = regimeDetails ? regimeDetails.regime : MarketRegime.UNKNOWN;
    const volatility = regimeDetails ? regimeDetails.volatility : STATISTICS.DEFAULT_VOLATILITY;

    return {
      symbol,
      sampleCount: this.getSampleCount(symbol),
      volumePercentile: this.getPercentileRank(symbol, snapshot.ohlcv.volume),
      zscore,
      regime,
      regimeDetails,
      dynamicThreshold: calculateDynamicThreshold(baseThreshold, regime, volatility),
      statisticalSignificance: zscore ? zscore.isOutlier : false,
    };
  }

  /**
   * Percent of window samples <= value (50 while cold)
   */
  getPercentileRank(symbol: string, value: number, metric: PercentileMetric = 'volume'): number {
    const window = this.windows.get(symbol);
    if (!window || window.size() < this.config.minSamples) {
      return NEUTRAL_PERCENTILE;
    }

    const data = window.toArray().map((s) => (metric === 'volume' ? s.volume : s.priceChange));
    const below = data.filter((v) => v <= value).length;
    return roundTo((below / data.length) * PERCENT_MULTIPLIER, 1);
  }

  getSampleCount(symbol: string): number {
    return this.windows.get(symbol)?.size() ?? 0;
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  private getWindow(symbol: string): RingBuffer<StatSample> {
    let window = this.windows.get(symbol);
    if (!window) {
      window = new RingBuffer<StatSample>(this.config.windowSize);
      this.windows.set(symbol, window);
    }
    return window;
  }
}
