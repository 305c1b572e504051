/**
 * Trade Flow Analyzer
 *
 * Aggregates the recent tape: buy/sell volume, aggressor ratio,
 * trade size statistics and a wash-trading heuristic.
 * Trades are expected newest first (exchange order).
 */

import { Trade, TradeFlowAnalysis, TradeSide } from '../types';
import { mean, roundTo } from '../utils/math.utils';
import { TIME_UNITS } from '../constants';

// ============================================================================
// CONSTANTS
// ============================================================================

const WASH_MIN_TRADES = 10;
const WASH_IDENTICAL_WINDOW = 20;
const WASH_IDENTICAL_MIN_COUNT = 3;
const WASH_IDENTICAL_SCORE = 0.3;
const WASH_ALTERNATION_WINDOW = 10;
const WASH_ALTERNATION_SIZE_DIFF = 10;
const WASH_ALTERNATION_SCORE = 0.2;
const WASH_ROUND_WINDOW = 10;
const WASH_ROUND_LOT = 100;
const WASH_ROUND_MIN_COUNT = 5;
const WASH_ROUND_SCORE = 0.2;

// ============================================================================
// TRADE FLOW ANALYZER
// ============================================================================

export class TradeFlowAnalyzer {
  /**
   * @returns Flow analysis; an empty tape gives zeros and a null aggressor ratio
   */
  analyze(trades: readonly Trade[]): TradeFlowAnalysis {
    const buys = trades.filter((t) => t.side === TradeSide.BUY);
    const sells = trades.filter((t) => t.side === TradeSide.SELL);

    const buyVolume = buys.reduce((sum, t) => sum + t.size, 0);
    const sellVolume = sells.reduce((sum, t) => sum + t.size, 0);
    const totalVolume = buyVolume + sellVolume;

    const sizes = trades.map((t) => t.size);
    const maxTradeSize = sizes.length > 0 ? Math.max(...sizes) : 0;

    const gaps: number[] = [];
    for (let i = 1; i < trades.length; i++) {
      gaps.push(Math.abs(trades[i - 1].timestamp - trades[i].timestamp) / TIME_UNITS.SECOND);
    }

    return {
      tradeCount: trades.length,
      buyVolume: roundTo(buyVolume, 2),
      sellVolume: roundTo(sellVolume, 2),
      netFlow: roundTo(buyVolume - sellVolume, 2),
      buyCount: buys.length,
      sellCount: sells.length,
      avgTradeSize: roundTo(mean(sizes), 2),
      maxTradeSize: roundTo(maxTradeSize, 2),
      aggressorRatio: this.calculateAggressorRatio(trades.length, buyVolume, sellVolume),
      washTradingScore: roundTo(this.detectWashTrading(trades), 2),
      avgTimeBetweenTradesSec: roundTo(mean(gaps), 1),
      volumeConcentration: totalVolume > 0 ? roundTo(maxTradeSize / totalVolume, 2) : 0,
    };
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  /**
   * buy / sell volume; Infinity for a one-sided buy tape, null for no trades
   */
  private calculateAggressorRatio(count: number, buyVolume: number, sellVolume: number): number | null {
    if (count === 0) {
      return null;
    }
    if (sellVolume > 0) {
      return roundTo(buyVolume / sellVolume, 2);
    }
    return buyVolume > 0 ? Infinity : 0;
  }

  /**
   * Wash trading heuristic in [0, 1]:
   * - same size 3+ times in the newest 20 trades: +0.3
   * - each side-alternating triple with near-equal sizes in the newest 10: +0.2
   * - 5+ round-lot sizes in the newest 10: +0.2
   */
  private detectWashTrading(trades: readonly Trade[]): number {
    if (trades.length < WASH_MIN_TRADES) {
      return 0;
    }

    let score = 0;

    const sizeCounts = new Map<number, number>();
    for (const trade of trades.slice(0, WASH_IDENTICAL_WINDOW)) {
      sizeCounts.set(trade.size, (sizeCounts.get(trade.size) ?? 0) + 1);
    }
    if (Math.max(...sizeCounts.values()) >= WASH_IDENTICAL_MIN_COUNT) {
      score += WASH_IDENTICAL_SCORE;
    }

    const alternationEnd = Math.min(WASH_ALTERNATION_WINDOW, trades.length);
    for (let i = 2; i < alternationEnd; i++) {
      const current = trades[i];
      if (
        current.side !== trades[i - 1].side &&
        current.side === trades[i - 2].side &&
        Math.abs(current.size - trades[i - 2].size) < WASH_ALTERNATION_SIZE_DIFF
      ) {
        score += WASH_ALTERNATION_SCORE;
      }
    }

    const roundLots = trades
      .slice(0, WASH_ROUND_WINDOW)
      .filter((t) => t.size % WASH_ROUND_LOT === 0).length;
    if (roundLots >= WASH_ROUND_MIN_COUNT) {
      score += WASH_ROUND_SCORE;
    }

    return Math.min(score, 1);
  }
}
