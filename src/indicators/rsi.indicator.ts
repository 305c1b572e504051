/**
 * RSI Indicator (Relative Strength Index)
 * Measures momentum and overbought/oversold conditions
 *
 * Formula:
 * 1. Calculate price changes (gains and losses)
 * 2. Seed average gain/loss with the simple mean of the first `period` changes
 * 3. Wilder's smoothing for every later change
 * 4. RS = Average Gain / Average Loss
 * 5. RSI = 100 - (100 / (1 + RS))
 *
 * Range: 0-100
 * - No losses in the window: exactly 100
 * - No gains in the window: exactly 0
 * - Fewer than period + 1 closes: null (no RSI signal, callers choose a default)
 */

// ============================================================================
// CONSTANTS
// ============================================================================

const RSI_MIN = 0;
const RSI_MAX = 100;
export const DEFAULT_RSI_PERIOD = 14;

// ============================================================================
// RSI CALCULATOR
// ============================================================================

export class RSIIndicator {
  constructor(private readonly period: number = DEFAULT_RSI_PERIOD) {}

  /**
   * Calculate RSI for a series of closes (oldest → newest)
   *
   * @returns RSI value (0-100) or null when there is not enough history
   */
  calculate(closes: readonly number[]): number | null {
    if (closes.length < this.period + 1) {
      return null;
    }

    const changes: number[] = [];
    for (let i = 1; i < closes.length; i++) {
      changes.push(closes[i] - closes[i - 1]);
    }

    // Initial averages (simple average for first period)
    let sumGain = 0;
    let sumLoss = 0;
    for (let i = 0; i < this.period; i++) {
      if (changes[i] > 0) {
        sumGain += changes[i];
      } else {
        sumLoss += Math.abs(changes[i]);
      }
    }

    let avgGain = sumGain / this.period;
    let avgLoss = sumLoss / this.period;

    // Wilder's smoothing for remaining changes
    for (let i = this.period; i < changes.length; i++) {
      const change = changes[i];
      avgGain = (avgGain * (this.period - 1) + (change > 0 ? change : 0)) / this.period;
      avgLoss = (avgLoss * (this.period - 1) + (change < 0 ? -change : 0)) / this.period;
    }

    if (avgLoss === 0) {
      return RSI_MAX;
    }

    const rs = avgGain / avgLoss;
    return Math.max(RSI_MIN, Math.min(RSI_MAX, RSI_MAX - RSI_MAX / (1 + rs)));
  }
}
