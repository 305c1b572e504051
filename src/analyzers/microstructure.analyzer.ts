/**
 * Microstructure Analyzer
 *
 * Execution-cost metrics derived from an analyzed order book and the tape:
 * effective spread, price impact of a market buy, resilience and toxicity.
 */

import { BASIS_POINTS_MULTIPLIER, PERCENT_MULTIPLIER } from '../constants';
import { MicrostructureMetrics, OrderBookSnapshot, Trade, TradeSide } from '../types';
import { mean, roundTo } from '../utils/math.utils';

// ============================================================================
// CONSTANTS
// ============================================================================

const EFFECTIVE_SPREAD_TRADES = 10;
const SMALL_ORDER_QUOTE = 100;
const LARGE_ORDER_QUOTE = 1000;
const TOXIC_IMBALANCE_HIGH = 2;
const TOXIC_IMBALANCE_LOW = 0.5;
const TOXIC_IMBALANCE_PENALTY = 0.3;

// ============================================================================
// MICROSTRUCTURE ANALYZER
// ============================================================================

export class MicrostructureAnalyzer {
  /**
   * @param trades - Newest first
   * @returns Metrics, or null without trades
   */
  analyze(orderBook: OrderBookSnapshot, trades: readonly Trade[]): MicrostructureMetrics | null {
    if (trades.length === 0) {
      return null;
    }

    const mid = (orderBook.bestBid + orderBook.bestAsk) / 2;
    const spreads = trades.slice(0, EFFECTIVE_SPREAD_TRADES).map((trade) => {
      const signed = trade.side === TradeSide.BUY ? trade.price - mid : mid - trade.price;
      return mid > 0 ? Math.abs((signed / mid) * 2) : 0;
    });

    const resilience = Math.min(orderBook.liquidityScore * 2, 1);
    let toxicity = 1 - resilience;
    if (orderBook.imbalanceRatio > TOXIC_IMBALANCE_HIGH || orderBook.imbalanceRatio < TOXIC_IMBALANCE_LOW) {
      toxicity = Math.min(toxicity + TOXIC_IMBALANCE_PENALTY, 1);
    }

    return {
      effectiveSpreadBps: roundTo(mean(spreads) * BASIS_POINTS_MULTIPLIER, 1),
      priceImpact100: roundTo(this.estimatePriceImpact(orderBook, SMALL_ORDER_QUOTE), 2),
      priceImpact1000: roundTo(this.estimatePriceImpact(orderBook, LARGE_ORDER_QUOTE), 2),
      resilienceScore: roundTo(resilience, 2),
      toxicityScore: roundTo(toxicity, 2),
    };
  }

  /**
   * Percent distance of the average fill from mid for a market buy of
   * `quoteAmount`, walking the top ask levels. Unfilled remainder is ignored.
   */
  estimatePriceImpact(orderBook: OrderBookSnapshot, quoteAmount: number): number {
    if (orderBook.topAsks.length === 0) {
      return 0;
    }

    const mid = (orderBook.bestBid + orderBook.bestAsk) / 2;
    let remaining = quoteAmount;
    let filledSize = 0;
    let filledQuote = 0;

    for (const [price, size] of orderBook.topAsks) {
      const levelValue = price * size;
      if (remaining <= levelValue) {
        const partial = remaining / price;
        filledSize += partial;
        filledQuote += price * partial;
        break;
      }
      filledSize += size;
      filledQuote += levelValue;
      remaining -= levelValue;
    }

    if (filledSize === 0 || mid <= 0) {
      return 0;
    }

    const avgPrice = filledQuote / filledSize;
    return Math.abs(((avgPrice - mid) / mid) * PERCENT_MULTIPLIER);
  }
}
