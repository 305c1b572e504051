/**
 * Liquidation Analyzer Service
 *
 * Liquidation pressure and cascade risk per symbol.
 * Reads the exchange liquidation feed when one exists; otherwise estimates
 * liquidations from recent volume spikes (a sharp drop on heavy volume
 * flushes longs, a sharp rise flushes shorts).
 *
 * Samples are recorded once per cycle from the market snapshot.
 */

import {
  CascadeAnalysis,
  CascadeDirection,
  LiquidationRisk,
  LiquidationSample,
  LiquidationState,
  LiquidationVolumes,
  LoggerService,
  MarketSnapshot,
  RawLiquidation,
  TradeSide,
} from '../types';
import { TIME_UNITS } from '../constants';
import { mean, roundTo } from '../utils/math.utils';
import { RingBuffer } from '../utils/ring-buffer';
import { MarketDataSource } from './market-data.service';

// ============================================================================
// TYPES & CONSTANTS
// ============================================================================

export interface LiquidationAnalyzerConfig {
  cacheTimeMs: number;
  estimationSamples: number;
  minEstimationSamples: number;
  zoneSamples: number;
}

const DEFAULT_CONFIG: LiquidationAnalyzerConfig = {
  cacheTimeMs: TIME_UNITS.MINUTE,
  estimationSamples: 60,
  minEstimationSamples: 10,
  zoneSamples: 100,
};

const ESTIMATE = {
  SPIKE: 3,
  MOVE_PCT: 0.5,
  SHARE: 0.3, // part of the bar volume counted as liquidations
} as const;

const ONE_SIDED_RATIO = 10;

const CASCADE = {
  EXTREME_RATIO_HIGH: 5,
  EXTREME_RATIO_LOW: 0.2,
  STRONG_RATIO_HIGH: 2,
  STRONG_RATIO_LOW: 0.5,
  EXTREME_BASE: 0.7,
  STRONG_BASE: 0.5,
  NEUTRAL_BASE: 0.3,
  THIN_LIQUIDITY: 0.3,
  THIN_MULTIPLIER: 1.5,
  LOW_LIQUIDITY: 0.5,
  LOW_MULTIPLIER: 1.2,
  MAX_PROBABILITY: 0.95,
  EXTREME_RISK: 0.7,
  HIGH_RISK: 0.5,
} as const;

const ZONE = {
  MIN_MOVE_PCT: 1,
  CLUSTER_BAND: 1.005,
  MIN_CLUSTER_POINTS: 3,
  BELOW: 0.99,
  ABOVE: 1.01,
} as const;

interface CachedVolumes {
  volumes: LiquidationVolumes;
  fetchedAt: number;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

/**
 * long/short; 10 when only longs were liquidated, 1 when nothing was
 */
export function calculateLiquidationRatio(longs: number, shorts: number): number {
  if (shorts > 0) {
    return roundTo(longs / shorts, 2);
  }
  return longs > 0 ? ONE_SIDED_RATIO : 1;
}

export function emptyLiquidationVolumes(): LiquidationVolumes {
  return {
    longLiquidations1h: 0,
    shortLiquidations1h: 0,
    totalLiquidations1h: 0,
    liquidationRatio: 1,
    estimated: true,
  };
}

/**
 * Sum the feed entries of the last hour by side
 */
export function aggregateLiquidationFeed(entries: readonly RawLiquidation[], now: number): LiquidationVolumes {
  const since = now - TIME_UNITS.HOUR;
  let longs = 0;
  let shorts = 0;

  for (const entry of entries) {
    if (entry.timestamp < since) {
      continue;
    }
    if (entry.side === TradeSide.BUY) {
      longs += entry.size;
    } else {
      shorts += entry.size;
    }
  }

  return {
    longLiquidations1h: roundTo(longs, 2),
    shortLiquidations1h: roundTo(shorts, 2),
    totalLiquidations1h: roundTo(longs + shorts, 2),
    liquidationRatio: calculateLiquidationRatio(longs, shorts),
    estimated: false,
  };
}

/**
 * Estimate from samples ordered oldest first. The oldest sample only
 * serves as the reference bar and is not counted.
 */
export function estimateLiquidations(
  samples: readonly LiquidationSample[],
  minSamples: number = DEFAULT_CONFIG.minEstimationSamples,
): LiquidationVolumes {
  if (samples.length < minSamples) {
    return emptyLiquidationVolumes();
  }

  let longs = 0;
  let shorts = 0;
  for (const sample of samples.slice(1)) {
    if (sample.spikeMagnitude <= ESTIMATE.SPIKE) {
      continue;
    }
    if (sample.change1m < -ESTIMATE.MOVE_PCT) {
      longs += sample.volume * ESTIMATE.SHARE;
    } else if (sample.change1m > ESTIMATE.MOVE_PCT) {
      shorts += sample.volume * ESTIMATE.SHARE;
    }
  }

  return {
    longLiquidations1h: roundTo(longs, 2),
    shortLiquidations1h: roundTo(shorts, 2),
    totalLiquidations1h: roundTo(longs + shorts, 2),
    liquidationRatio: calculateLiquidationRatio(longs, shorts),
    estimated: true,
  };
}

/**
 * Cascade probability from the liquidation ratio, raised when the book is thin
 *
 * @param liquidityScore - Order book liquidity (0-1), null without a book
 */
export function calculateCascade(
  ratio: number,
  liquidityScore: number | null,
): Omit<CascadeAnalysis, 'nearestLiquidationZone'> {
  let base: number = CASCADE.NEUTRAL_BASE;
  let direction = CascadeDirection.NEUTRAL;

  if (ratio > CASCADE.EXTREME_RATIO_HIGH) {
    base = CASCADE.EXTREME_BASE;
    direction = CascadeDirection.DOWN;
  } else if (ratio < CASCADE.EXTREME_RATIO_LOW) {
    base = CASCADE.EXTREME_BASE;
    direction = CascadeDirection.UP;
  } else if (ratio > CASCADE.STRONG_RATIO_HIGH) {
    base = CASCADE.STRONG_BASE;
    direction = CascadeDirection.DOWN;
  } else if (ratio < CASCADE.STRONG_RATIO_LOW) {
    base = CASCADE.STRONG_BASE;
    direction = CascadeDirection.UP;
  }

  if (liquidityScore !== null) {
    if (liquidityScore < CASCADE.THIN_LIQUIDITY) {
      base *= CASCADE.THIN_MULTIPLIER;
    } else if (liquidityScore < CASCADE.LOW_LIQUIDITY) {
      base *= CASCADE.LOW_MULTIPLIER;
    }
  }

  let riskLevel = LiquidationRisk.MEDIUM;
  if (base > CASCADE.EXTREME_RISK) {
    riskLevel = LiquidationRisk.EXTREME;
  } else if (base > CASCADE.HIGH_RISK) {
    riskLevel = LiquidationRisk.HIGH;
  }

  return {
    cascadeProbability: Math.min(roundTo(base, 2), CASCADE.MAX_PROBABILITY),
    cascadeDirection: direction,
    riskLevel,
  };
}

/**
 * Nearest cluster of spike closes in the cascade direction.
 * Closes are grouped while each is within 0.5% of the previous one;
 * only clusters of 3+ points count.
 */
export function findNearestLiquidationZone(
  samples: readonly LiquidationSample[],
  currentPrice: number,
  direction: CascadeDirection,
): number | null {
  if (direction === CascadeDirection.NEUTRAL) {
    return null;
  }

  const prices = samples
    .filter((s) => Math.abs(s.change1m) > ZONE.MIN_MOVE_PCT && s.close > 0)
    .map((s) => s.close)
    .sort((a, b) => a - b);
  if (prices.length === 0) {
    return null;
  }

  const clusters: number[] = [];
  let current: number[] = [prices[0]];
  for (const price of prices.slice(1)) {
    if (price <= current[current.length - 1] * ZONE.CLUSTER_BAND) {
      current.push(price);
      continue;
    }
    if (current.length >= ZONE.MIN_CLUSTER_POINTS) {
      clusters.push(mean(current));
    }
    current = [price];
  }
  if (current.length >= ZONE.MIN_CLUSTER_POINTS) {
    clusters.push(mean(current));
  }

  if (direction === CascadeDirection.DOWN) {
    const supports = clusters.filter((c) => c < currentPrice * ZONE.BELOW);
    return supports.length > 0 ? Math.max(...supports) : null;
  }

  const resistances = clusters.filter((c) => c > currentPrice * ZONE.ABOVE);
  return resistances.length > 0 ? Math.min(...resistances) : null;
}

// ============================================================================
// LIQUIDATION ANALYZER SERVICE
// ============================================================================

export class LiquidationAnalyzerService {
  private readonly config: LiquidationAnalyzerConfig;
  private samples: Map<string, RingBuffer<LiquidationSample>> = new Map();
  private spikeSamples: Map<string, RingBuffer<LiquidationSample>> = new Map();
  private cache: Map<string, CachedVolumes> = new Map();

  constructor(
    private source: MarketDataSource | null,
    private logger: LoggerService,
    config?: Partial<LiquidationAnalyzerConfig>,
    private now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Record the cycle's bar for estimation and zone detection
   */
  recordSample(snapshot: MarketSnapshot): void {
    const sample: LiquidationSample = {
      timestamp: snapshot.timestamp,
      close: snapshot.ohlcv.close,
      volume: snapshot.ohlcv.volume,
      spikeMagnitude: snapshot.volume.spikeMagnitude,
      change1m: snapshot.priceChange.change1m,
    };

    this.getBuffer(this.samples, snapshot.symbol, this.config.estimationSamples).push(sample);
    if (sample.spikeMagnitude > ESTIMATE.SPIKE) {
      this.getBuffer(this.spikeSamples, snapshot.symbol, this.config.zoneSamples).push(sample);
    }
  }

  /**
   * Liquidation volumes plus cascade analysis at the current price
   *
   * @param liquidityScore - Order book liquidity (0-1), null without a book
   */
  async analyze(symbol: string, currentPrice: number, liquidityScore: number | null): Promise<LiquidationState> {
    const volumes = await this.getVolumes(symbol);
    const cascade = calculateCascade(volumes.liquidationRatio, liquidityScore);
    const zoneSamples = this.spikeSamples.get(symbol)?.toArray() ?? [];

    const state: LiquidationState = {
      symbol,
      timestamp: this.now(),
      ...volumes,
      ...cascade,
      nearestLiquidationZone: findNearestLiquidationZone(zoneSamples, currentPrice, cascade.cascadeDirection),
    };

    if (state.riskLevel === LiquidationRisk.EXTREME) {
      this.logger.debug(`💥 ${symbol} cascade risk`, {
        probability: state.cascadeProbability,
        direction: state.cascadeDirection,
        ratio: state.liquidationRatio,
        estimated: state.estimated,
      });
    }

    return state;
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  /**
   * Direct feed (cached) when available, estimation otherwise
   */
  private async getVolumes(symbol: string): Promise<LiquidationVolumes> {
    const now = this.now();
    const cached = this.cache.get(symbol);
    if (cached && now - cached.fetchedAt < this.config.cacheTimeMs) {
      return cached.volumes;
    }

    if (this.source) {
      const result = await this.source.fetchLiquidations(symbol);
      if (result.ok) {
        const volumes = aggregateLiquidationFeed(result.value, now);
        this.cache.set(symbol, { volumes, fetchedAt: now });
        return volumes;
      }
      if (result.reason === 'ERROR') {
        this.logger.debug(`⚠️ ${symbol} liquidation feed failed, estimating`, { error: result.error });
      }
    }

    const samples = this.samples.get(symbol)?.toArray() ?? [];
    return estimateLiquidations(samples, this.config.minEstimationSamples);
  }

  private getBuffer(
    buffers: Map<string, RingBuffer<LiquidationSample>>,
    symbol: string,
    capacity: number,
  ): RingBuffer<LiquidationSample> {
    let buffer = buffers.get(symbol);
    if (!buffer) {
      buffer = new RingBuffer<LiquidationSample>(capacity);
      buffers.set(symbol, buffer);
    }
    return buffer;
  }
}
