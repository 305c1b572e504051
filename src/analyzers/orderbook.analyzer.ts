/**
 * Order Book Analyzer
 *
 * Analyzes order book depth to detect:
 * - Spread and depth near the touch (10 bps)
 * - Bid/Ask imbalance over the top 5 levels
 * - Spoofing (oversized orders parked away from the best price)
 * - Overall liquidity score
 *
 * Single Responsibility: Analyze order book data ONLY
 * Does NOT make trading decisions - only provides analysis
 */

import { BASIS_POINTS_MULTIPLIER, DECIMAL_PLACES, PERCENT_MULTIPLIER } from '../constants';
import { LoggerService, OrderbookLevel, OrderBookSnapshot } from '../types';
import { clamp, roundTo } from '../utils/math.utils';

// ============================================================================
// TYPES
// ============================================================================

export interface OrderBookConfig {
  imbalanceLevels: number; // levels summed for the imbalance ratio
  topLevels: number; // levels kept on the snapshot
  spoofMinLevels: number; // per side, below this spoofing is not scored
  spoofSizeMultiplier: number; // level size vs best level size
  spoofDistancePercent: number; // min distance from best price
  depthNormalization: number; // top-5 size that counts as full depth
  levelNormalization: number; // level count that counts as a full book
}

const DEFAULT_CONFIG: OrderBookConfig = {
  imbalanceLevels: 5,
  topLevels: 5,
  spoofMinLevels: 5,
  spoofSizeMultiplier: 3,
  spoofDistancePercent: 0.5,
  depthNormalization: 10000,
  levelNormalization: 40,
};

const DEPTH_BAND = 0.001; // 10 bps
const SKIPPED_SPOOF_LEVELS = 2;
const SPOOF_COUNT_NORMALIZATION = 10;

// ============================================================================
// ORDER BOOK ANALYZER
// ============================================================================

export class OrderBookAnalyzer {
  private readonly config: OrderBookConfig;

  constructor(
    private logger: LoggerService,
    config?: Partial<OrderBookConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Analyze one order book
   *
   * @param bids - Buy orders (price descending)
   * @param asks - Sell orders (price ascending)
   * @returns Snapshot, or null when either side is empty
   */
  analyze(
    symbol: string,
    bids: readonly OrderbookLevel[],
    asks: readonly OrderbookLevel[],
    timestamp: number = Date.now(),
  ): OrderBookSnapshot | null {
    if (bids.length === 0 || asks.length === 0) {
      this.logger.debug(`📕 ${symbol} order book has an empty side, skipping`, {
        bids: bids.length,
        asks: asks.length,
      });
      return null;
    }

    const [bestBid] = bids[0];
    const [bestAsk] = asks[0];
    const spread = bestAsk - bestBid;
    const spreadBps = bestBid > 0 ? (spread / bestBid) * BASIS_POINTS_MULTIPLIER : 0;

    const bidDepth10Bps = bids
      .filter(([price]) => price >= bestBid * (1 - DEPTH_BAND))
      .reduce((sum, [, size]) => sum + size, 0);
    const askDepth10Bps = asks
      .filter(([price]) => price <= bestAsk * (1 + DEPTH_BAND))
      .reduce((sum, [, size]) => sum + size, 0);

    return {
      symbol,
      timestamp,
      bestBid,
      bestAsk,
      spread,
      spreadBps: roundTo(spreadBps, 1),
      bidDepth10Bps,
      askDepth10Bps,
      bidCount: bids.length,
      askCount: asks.length,
      imbalanceRatio: roundTo(this.calculateImbalance(bids, asks), DECIMAL_PLACES.SCORE),
      spoofingScore: roundTo(this.calculateSpoofingScore(bids, asks), DECIMAL_PLACES.SCORE),
      liquidityScore: roundTo(this.calculateLiquidityScore(bids, asks), DECIMAL_PLACES.SCORE),
      topBids: bids.slice(0, this.config.topLevels).map(([p, s]): OrderbookLevel => [p, s]),
      topAsks: asks.slice(0, this.config.topLevels).map(([p, s]): OrderbookLevel => [p, s]),
    };
  }

  /**
   * Human-readable one-liner for logs and alerts
   */
  getSummary(snapshot: OrderBookSnapshot): string {
    return [
      `Spread: ${snapshot.spreadBps.toFixed(1)} bps`,
      `Imbalance: ${snapshot.imbalanceRatio.toFixed(DECIMAL_PLACES.SCORE)}`,
      `Liquidity: ${(snapshot.liquidityScore * PERCENT_MULTIPLIER).toFixed(0)}%`,
      `Spoofing: ${(snapshot.spoofingScore * PERCENT_MULTIPLIER).toFixed(0)}%`,
    ].join(' | ');
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  /**
   * Top-N bid size / top-N ask size (0 when the ask side sums to 0)
   */
  private calculateImbalance(bids: readonly OrderbookLevel[], asks: readonly OrderbookLevel[]): number {
    const n = this.config.imbalanceLevels;
    const bidSize = bids.slice(0, n).reduce((sum, [, size]) => sum + size, 0);
    const askSize = asks.slice(0, n).reduce((sum, [, size]) => sum + size, 0);
    return askSize > 0 ? bidSize / askSize : 0;
  }

  /**
   * Count levels beyond the top 2 that are > 3x the best size and more than
   * 0.5% away from the best price. count / 10, capped at 1.
   */
  private calculateSpoofingScore(bids: readonly OrderbookLevel[], asks: readonly OrderbookLevel[]): number {
    if (bids.length < this.config.spoofMinLevels || asks.length < this.config.spoofMinLevels) {
      return 0;
    }

    const [bestBid, bestBidSize] = bids[0];
    const [bestAsk, bestAskSize] = asks[0];
    const distance = this.config.spoofDistancePercent / PERCENT_MULTIPLIER;
    const multiplier = this.config.spoofSizeMultiplier;

    let count = 0;
    for (const [price, size] of bids.slice(SKIPPED_SPOOF_LEVELS)) {
      if (price < bestBid * (1 - distance) && size > bestBidSize * multiplier) {
        count++;
      }
    }
    for (const [price, size] of asks.slice(SKIPPED_SPOOF_LEVELS)) {
      if (price > bestAsk * (1 + distance) && size > bestAskSize * multiplier) {
        count++;
      }
    }

    return Math.min(count / SPOOF_COUNT_NORMALIZATION, 1);
  }

  /**
   * 0.4 * spread tightness + 0.4 * top-5 depth + 0.2 * level count, in [0, 1]
   */
  private calculateLiquidityScore(bids: readonly OrderbookLevel[], asks: readonly OrderbookLevel[]): number {
    const [bestBid] = bids[0];
    const [bestAsk] = asks[0];
    const mid = (bestAsk + bestBid) / 2;
    const spreadPct = mid > 0 ? ((bestAsk - bestBid) / mid) * PERCENT_MULTIPLIER : PERCENT_MULTIPLIER;
    const spreadScore = clamp(1 - spreadPct, 0, 1);

    const depth =
      bids.slice(0, 5).reduce((sum, [, size]) => sum + size, 0) +
      asks.slice(0, 5).reduce((sum, [, size]) => sum + size, 0);
    const depthScore = Math.min(depth / this.config.depthNormalization, 1);

    const levelScore = Math.min((bids.length + asks.length) / this.config.levelNormalization, 1);

    return clamp(spreadScore * 0.4 + depthScore * 0.4 + levelScore * 0.2, 0, 1);
  }
}
