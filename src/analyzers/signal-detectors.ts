/**
 * Signal Detectors
 *
 * Nine independent manipulation-pattern detectors. Each one is a pure
 * function of a narrow input struct plus the profile thresholds and returns
 * {triggered, confidence in [0,1], description}.
 *
 * RSI null policy (no RSI yet = "no RSI signal"):
 * - rsiDivergence, hiddenAccumulation: do not trigger
 * - accumulationDistribution: RSI branches (all of them) do not trigger
 * - liquidationSqueeze: squeeze branches skipped, cascade branch still runs
 * - fundingArbitrage: RSI-confirmed branches skipped, order-book branch still runs
 */

import {
  CascadeDirection,
  DetectorResult,
  DetectorThresholds,
  TimeframeDivergence,
  TimeframeDivergenceType,
} from '../types';
import { FUNDING_PERIODS_PER_DAY, PERCENT_MULTIPLIER } from '../constants';
import { clamp } from '../utils/math.utils';

// ============================================================================
// INPUTS
// ============================================================================

export interface VolumeExplosionInput {
  spikeMagnitude: number;
  change5m: number;
  volumeTrend: number;
}

export interface RsiDivergenceInput {
  rsi: number | null;
  change5m: number;
}

export interface MomentumShiftInput {
  change1m: number;
  change5m: number;
  spikeMagnitude: number;
}

export interface LiquidityTrapInput {
  change5m: number;
  orderBook: { spreadBps: number; liquidityScore: number; spoofingScore: number } | null;
}

export interface AccumulationInput {
  rsi: number | null;
  spikeMagnitude: number;
  change5m: number;
  imbalanceRatio: number | null;
}

export interface LiquidationSqueezeInput {
  rsi: number | null;
  spikeMagnitude: number;
  fundingRate: number | null;
  liquidation: {
    longLiquidations1h: number;
    shortLiquidations1h: number;
    cascadeProbability: number;
    cascadeDirection: CascadeDirection;
  } | null;
}

export interface FundingArbitrageInput {
  rsi: number | null;
  fundingRate: number | null;
  hoursToFunding: number;
  imbalanceRatio: number | null;
}

export interface HiddenAccumulationInput {
  rsi: number | null;
  volumeRatio5m: number;
  change5m: number;
  volumeZScore: number; // 0 when statistics are cold
  isOutlier: boolean;
  fundingRate: number | null;
}

export interface TimeframeDivergenceInput {
  divergence: TimeframeDivergence | null;
  spikeMagnitude: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const NOT_TRIGGERED: DetectorResult = Object.freeze({ triggered: false, confidence: 0, description: '' });

const VOLUME = {
  MAX_CONFIDENCE: 0.9,
  RATIO_DIVISOR: 10,
  SUSTAINED_RATIO: 3,
  SUSTAINED_TREND: 1.5,
  SUSTAINED_CONFIDENCE: 0.7,
} as const;

const RSI = {
  MIN_MOVE: 1,
  HIDDEN_UPPER: 50,
  HIDDEN_MOVE: 2,
  HIDDEN_CONFIDENCE: 0.6,
} as const;

const MOMENTUM = {
  MIN_1M: 1,
  MIN_5M: 2,
  MIN_RATIO: 2,
  MIN_VOLUME: 2,
  DIVISOR_FLOOR: 0.1,
  CONFIDENCE_DIVISOR: 5,
  MAX_CONFIDENCE: 0.85,
  REVERSAL_CONFIDENCE: 0.7,
} as const;

const TRAP = {
  SPREAD_BPS: 50,
  LOW_LIQUIDITY: 0.3,
  CONFIDENCE: 0.8,
  SPOOFING: 0.6,
  MIN_MOVE: 1,
} as const;

const ACCUMULATION = {
  RSI_LOW: 40,
  RSI_HIGH: 70,
  MIN_VOLUME: 2,
  MAX_STABLE_MOVE: 1,
  ACCUMULATION_CONFIDENCE: 0.7,
  DISTRIBUTION_CONFIDENCE: 0.75,
  IMBALANCE: 1.5,
  IMBALANCE_RSI: 45,
  IMBALANCE_CONFIDENCE: 0.65,
} as const;

const SQUEEZE = {
  SHORT_FUNDING: 0.001,
  SHORT_LIQ_MULTIPLE: 5,
  SHORT_RSI: 75,
  SHORT_VOLUME: 4,
  SHORT_FUNDING_SCALE: 0.002,
  SHORT_MAX_CONFIDENCE: 0.9,
  LONG_FUNDING: -0.0005,
  LONG_LIQ_MULTIPLE: 3,
  LONG_RSI: 25,
  LONG_VOLUME: 3,
  LONG_FUNDING_SCALE: 0.001,
  LONG_MAX_CONFIDENCE: 0.85,
  CASCADE_PROBABILITY: 0.7,
  CASCADE_VOLUME: 2,
  CASCADE_FACTOR: 0.8,
} as const;

const FUNDING = {
  MIN_ABS_RATE: 0.0015,
  SHORT_RATE: 0.002,
  LONG_RATE: -0.001,
  MAX_HOURS: 2,
  SHORT_RSI: 65,
  SHORT_RSI_BASE: 60,
  SHORT_RATE_SCALE: 0.003,
  WEAK_BIDS: 0.7,
  WEAK_BIDS_CONFIDENCE: 0.6,
  LONG_RSI: 40,
  LONG_RATE_SCALE: 0.002,
  RSI_RANGE: 40,
  MAX_CONFIDENCE: 0.8,
} as const;

const HIDDEN = {
  RSI_LOW: 35,
  RSI_HIGH: 70,
  MIN_VOLUME_RATIO: 2,
  MAX_STABLE_MOVE: 1,
  MAX_DISTRIBUTION_MOVE: 0.5,
  MIN_ZSCORE: 2,
  ZSCORE_SCALE: 3,
  ACCUMULATION_MAX: 0.85,
  DISTRIBUTION_MAX: 0.8,
  NEGATIVE_FUNDING: -0.0005,
  FUNDING_BOOST: 1.2,
} as const;

const TF_DIVERGENCE = {
  MIN_VOLUME: 2,
  STRENGTH_FACTOR: 0.3,
  MAX_CONFIDENCE: 0.7,
} as const;

// ============================================================================
// HELPERS
// ============================================================================

function triggered(confidence: number, description: string): DetectorResult {
  return { triggered: true, confidence: clamp(confidence, 0, 1), description };
}

function signed(value: number, digits: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;
}

function pct(rate: number, digits: number): string {
  return `${(rate * PERCENT_MULTIPLIER).toFixed(digits)}%`;
}

// ============================================================================
// DETECTORS
// ============================================================================

/**
 * Explosive volume confirmed by a price move, or a sustained volume build-up
 */
export function detectVolumeExplosion(input: VolumeExplosionInput, thresholds: DetectorThresholds): DetectorResult {
  const { spikeMagnitude, change5m, volumeTrend } = input;

  if (spikeMagnitude > thresholds.volumeSpikeThreshold && Math.abs(change5m) > thresholds.priceChangeThreshold) {
    return triggered(
      Math.min(VOLUME.MAX_CONFIDENCE, spikeMagnitude / VOLUME.RATIO_DIVISOR),
      `Volume explosion ${spikeMagnitude.toFixed(1)}x with ${signed(change5m, 1)}% price move`,
    );
  }

  if (spikeMagnitude > VOLUME.SUSTAINED_RATIO && volumeTrend > VOLUME.SUSTAINED_TREND) {
    return triggered(VOLUME.SUSTAINED_CONFIDENCE, `Sustained volume increase ${spikeMagnitude.toFixed(1)}x`);
  }

  return NOT_TRIGGERED;
}

/**
 * Oversold bounce / overbought exhaustion / hidden bullish divergence
 */
export function detectRsiDivergence(input: RsiDivergenceInput, thresholds: DetectorThresholds): DetectorResult {
  const { rsi, change5m } = input;
  if (rsi === null) {
    return NOT_TRIGGERED;
  }

  const { rsiOversold, rsiOverbought } = thresholds;

  if (rsi < rsiOversold && change5m < -RSI.MIN_MOVE) {
    return triggered(
      (rsiOversold - rsi) / rsiOversold,
      `Bullish divergence: RSI ${rsi.toFixed(0)} with price down ${change5m.toFixed(1)}%`,
    );
  }

  if (rsi > rsiOverbought && change5m > RSI.MIN_MOVE) {
    return triggered(
      (rsi - rsiOverbought) / (100 - rsiOverbought),
      `Bearish divergence: RSI ${rsi.toFixed(0)} with price up ${change5m.toFixed(1)}%`,
    );
  }

  if (rsi > rsiOversold && rsi < RSI.HIDDEN_UPPER && change5m > RSI.HIDDEN_MOVE) {
    return triggered(RSI.HIDDEN_CONFIDENCE, `Hidden bullish divergence: RSI ${rsi.toFixed(0)}`);
  }

  return NOT_TRIGGERED;
}

/**
 * Accelerating 1m move in the 5m direction, or a V-shaped reversal
 */
export function detectMomentumShift(input: MomentumShiftInput): DetectorResult {
  const { change1m, change5m, spikeMagnitude } = input;

  if (Math.abs(change1m) > MOMENTUM.MIN_1M && Math.abs(change5m) > MOMENTUM.MIN_5M && change1m * change5m > 0) {
    const momentum = Math.abs(change1m) / Math.max(MOMENTUM.DIVISOR_FLOOR, Math.abs(change5m - change1m));
    if (momentum > MOMENTUM.MIN_RATIO && spikeMagnitude > MOMENTUM.MIN_VOLUME) {
      const direction = change1m > 0 ? 'up' : 'down';
      return triggered(
        Math.min(MOMENTUM.MAX_CONFIDENCE, momentum / MOMENTUM.CONFIDENCE_DIVISOR),
        `Momentum surge ${direction}: ${signed(change1m, 1)}% in 1m`,
      );
    }
  }

  if (change1m * change5m < 0 && Math.abs(change1m) > MOMENTUM.MIN_1M) {
    return triggered(
      MOMENTUM.REVERSAL_CONFIDENCE,
      `V-reversal detected: ${signed(change5m, 1)}% to ${signed(change1m, 1)}%`,
    );
  }

  return NOT_TRIGGERED;
}

/**
 * Wide spread on a thin book, or spoofing during a move
 */
export function detectLiquidityTrap(input: LiquidityTrapInput): DetectorResult {
  const { orderBook, change5m } = input;
  if (!orderBook) {
    return NOT_TRIGGERED;
  }

  if (orderBook.spreadBps > TRAP.SPREAD_BPS && orderBook.liquidityScore < TRAP.LOW_LIQUIDITY) {
    return triggered(
      TRAP.CONFIDENCE,
      `Liquidity trap: ${orderBook.spreadBps.toFixed(0)}bps spread, ${orderBook.liquidityScore.toFixed(2)} liquidity`,
    );
  }

  if (orderBook.spoofingScore > TRAP.SPOOFING && Math.abs(change5m) > TRAP.MIN_MOVE) {
    return triggered(orderBook.spoofingScore, `Spoofing detected: ${orderBook.spoofingScore.toFixed(2)} score`);
  }

  return NOT_TRIGGERED;
}

/**
 * Quiet accumulation, topping distribution, or bid-heavy book at low RSI
 */
export function detectAccumulationDistribution(input: AccumulationInput): DetectorResult {
  const { rsi, spikeMagnitude, change5m, imbalanceRatio } = input;
  if (rsi === null) {
    return NOT_TRIGGERED;
  }

  if (rsi < ACCUMULATION.RSI_LOW && spikeMagnitude > ACCUMULATION.MIN_VOLUME && Math.abs(change5m) < ACCUMULATION.MAX_STABLE_MOVE) {
    return triggered(
      ACCUMULATION.ACCUMULATION_CONFIDENCE,
      `Accumulation phase: RSI ${rsi.toFixed(0)}, volume ${spikeMagnitude.toFixed(1)}x`,
    );
  }

  if (rsi > ACCUMULATION.RSI_HIGH && spikeMagnitude > ACCUMULATION.MIN_VOLUME && change5m < 0) {
    return triggered(
      ACCUMULATION.DISTRIBUTION_CONFIDENCE,
      `Distribution phase: RSI ${rsi.toFixed(0)}, volume ${spikeMagnitude.toFixed(1)}x`,
    );
  }

  if (imbalanceRatio !== null && imbalanceRatio > ACCUMULATION.IMBALANCE && rsi < ACCUMULATION.IMBALANCE_RSI) {
    return triggered(
      ACCUMULATION.IMBALANCE_CONFIDENCE,
      `Smart accumulation: ${imbalanceRatio.toFixed(1)} bid/ask ratio`,
    );
  }

  return NOT_TRIGGERED;
}

/**
 * End of a squeeze (extreme funding + one-sided liquidations + stretched RSI),
 * or an imminent liquidation cascade
 */
export function detectLiquidationSqueeze(input: LiquidationSqueezeInput): DetectorResult {
  const { rsi, spikeMagnitude, fundingRate, liquidation } = input;
  if (!liquidation || fundingRate === null) {
    return NOT_TRIGGERED;
  }

  const longs = liquidation.longLiquidations1h;
  const shorts = liquidation.shortLiquidations1h;

  if (rsi !== null) {
    if (
      fundingRate > SQUEEZE.SHORT_FUNDING &&
      longs > shorts * SQUEEZE.SHORT_LIQ_MULTIPLE &&
      rsi > SQUEEZE.SHORT_RSI &&
      spikeMagnitude > SQUEEZE.SHORT_VOLUME
    ) {
      return triggered(
        Math.min(SQUEEZE.SHORT_MAX_CONFIDENCE, (fundingRate / SQUEEZE.SHORT_FUNDING_SCALE) * ((rsi - 70) / 30)),
        `Short squeeze ending: Funding ${pct(fundingRate, 3)}, RSI ${rsi.toFixed(0)}`,
      );
    }

    if (
      fundingRate < SQUEEZE.LONG_FUNDING &&
      shorts > longs * SQUEEZE.LONG_LIQ_MULTIPLE &&
      rsi < SQUEEZE.LONG_RSI &&
      spikeMagnitude > SQUEEZE.LONG_VOLUME
    ) {
      return triggered(
        Math.min(SQUEEZE.LONG_MAX_CONFIDENCE, Math.abs(fundingRate / SQUEEZE.LONG_FUNDING_SCALE) * ((30 - rsi) / 30)),
        `Long squeeze ending: Funding ${pct(fundingRate, 3)}, RSI ${rsi.toFixed(0)}`,
      );
    }
  }

  if (liquidation.cascadeProbability > SQUEEZE.CASCADE_PROBABILITY && spikeMagnitude > SQUEEZE.CASCADE_VOLUME) {
    return triggered(
      liquidation.cascadeProbability * SQUEEZE.CASCADE_FACTOR,
      `Liquidation cascade ${(liquidation.cascadeProbability * PERCENT_MULTIPLIER).toFixed(0)}% probability (${liquidation.cascadeDirection})`,
    );
  }

  return NOT_TRIGGERED;
}

/**
 * Extreme funding close to the funding timestamp, confirmed by RSI or the book
 */
export function detectFundingArbitrage(input: FundingArbitrageInput): DetectorResult {
  const { rsi, fundingRate, hoursToFunding, imbalanceRatio } = input;
  if (fundingRate === null || Math.abs(fundingRate) < FUNDING.MIN_ABS_RATE) {
    return NOT_TRIGGERED;
  }

  const closeToFunding = hoursToFunding < FUNDING.MAX_HOURS;
  const dailyRate = fundingRate * FUNDING_PERIODS_PER_DAY;

  if (fundingRate > FUNDING.SHORT_RATE && closeToFunding) {
    if (rsi !== null && rsi > FUNDING.SHORT_RSI) {
      return triggered(
        Math.min(FUNDING.MAX_CONFIDENCE, (fundingRate / FUNDING.SHORT_RATE_SCALE) * ((rsi - FUNDING.SHORT_RSI_BASE) / FUNDING.RSI_RANGE)),
        `Funding SHORT: ${pct(fundingRate, 3)} (${pct(dailyRate, 2)} daily), ${hoursToFunding.toFixed(1)}h left`,
      );
    }
    if (imbalanceRatio !== null && imbalanceRatio < FUNDING.WEAK_BIDS) {
      return triggered(FUNDING.WEAK_BIDS_CONFIDENCE, `Funding arbitrage: ${pct(fundingRate, 3)} rate, weak bids`);
    }
  }

  if (fundingRate < FUNDING.LONG_RATE && closeToFunding && rsi !== null && rsi < FUNDING.LONG_RSI) {
    return triggered(
      Math.min(FUNDING.MAX_CONFIDENCE, Math.abs(fundingRate / FUNDING.LONG_RATE_SCALE) * ((FUNDING.LONG_RSI - rsi) / FUNDING.RSI_RANGE)),
      `Funding LONG: ${pct(fundingRate, 3)} (${pct(dailyRate, 2)} daily), ${hoursToFunding.toFixed(1)}h left`,
    );
  }

  return NOT_TRIGGERED;
}

/**
 * Statistically significant volume while price stays flat (or stalls at highs)
 */
export function detectHiddenAccumulation(input: HiddenAccumulationInput): DetectorResult {
  const { rsi, volumeRatio5m, change5m, volumeZScore, isOutlier, fundingRate } = input;
  if (rsi === null) {
    return NOT_TRIGGERED;
  }

  if (
    rsi < HIDDEN.RSI_LOW &&
    volumeRatio5m > HIDDEN.MIN_VOLUME_RATIO &&
    Math.abs(change5m) < HIDDEN.MAX_STABLE_MOVE &&
    volumeZScore > HIDDEN.MIN_ZSCORE
  ) {
    let confidence = Math.min(
      HIDDEN.ACCUMULATION_MAX,
      ((HIDDEN.RSI_LOW - rsi) / HIDDEN.RSI_LOW) * (volumeZScore / HIDDEN.ZSCORE_SCALE),
    );
    if (fundingRate !== null && fundingRate < HIDDEN.NEGATIVE_FUNDING) {
      confidence *= HIDDEN.FUNDING_BOOST;
    }
    return triggered(confidence, `Smart accumulation: RSI ${rsi.toFixed(0)}, Volume Z-score ${volumeZScore.toFixed(1)}`);
  }

  if (rsi > HIDDEN.RSI_HIGH && volumeRatio5m > HIDDEN.MIN_VOLUME_RATIO && change5m < HIDDEN.MAX_DISTRIBUTION_MOVE && isOutlier) {
    return triggered(
      Math.min(HIDDEN.DISTRIBUTION_MAX, (rsi - HIDDEN.RSI_HIGH) / 30),
      `Hidden distribution: RSI ${rsi.toFixed(0)}, statistical outlier`,
    );
  }

  return NOT_TRIGGERED;
}

/**
 * 1m vs 15m trend divergence with volume confirmation
 */
export function detectTimeframeDivergenceSignal(input: TimeframeDivergenceInput): DetectorResult {
  const { divergence, spikeMagnitude } = input;
  if (!divergence || !divergence.hasDivergence || divergence.type === null) {
    return NOT_TRIGGERED;
  }
  if (spikeMagnitude < TF_DIVERGENCE.MIN_VOLUME) {
    return NOT_TRIGGERED;
  }

  const confidence = Math.min(TF_DIVERGENCE.MAX_CONFIDENCE, divergence.strength * TF_DIVERGENCE.STRENGTH_FACTOR);
  const description = divergence.type === TimeframeDivergenceType.BULLISH
    ? 'Bullish TF divergence: 15m down, 1m up strongly'
    : 'Bearish TF divergence: 15m up, 1m down strongly';

  return triggered(confidence, description);
}
