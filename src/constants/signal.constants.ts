/**
 * Signal Constants
 *
 * Detector weights, decision bands and prioritizer adjustments.
 * Weights are data: the composite detector reads this table and never
 * hardcodes a weight per detector.
 */

import { DetectorThresholds, DetectorType, RiskLevel } from '../types';

// ============================================================================
// DETECTOR WEIGHTS (sum = 1.0)
// ============================================================================

export const DETECTOR_WEIGHTS: Record<DetectorType, number> = {
  [DetectorType.VOLUME_EXPLOSION]: 0.2,
  [DetectorType.RSI_DIVERGENCE]: 0.15,
  [DetectorType.MOMENTUM_SHIFT]: 0.1,
  [DetectorType.LIQUIDITY_TRAP]: 0.1,
  [DetectorType.ACCUMULATION]: 0.1,
  [DetectorType.LIQUIDATION_SQUEEZE]: 0.15,
  [DetectorType.FUNDING_ARBITRAGE]: 0.1,
  [DetectorType.HIDDEN_ACCUMULATION]: 0.05,
  [DetectorType.TIMEFRAME_DIVERGENCE]: 0.05,
};

export const DEFAULT_DETECTOR_THRESHOLDS: DetectorThresholds = {
  volumeSpikeThreshold: 5.0,
  rsiOversold: 30,
  rsiOverbought: 70,
  priceChangeThreshold: 3.0,
  confidenceThreshold: 0.7,
};

// ============================================================================
// COMPOSITE DECISION
// ============================================================================

export const COMPOSITE_DECISION = {
  STRONG_WEIGHTED: 0.7,
  STRONG_MIN_SIGNALS: 3,
  STRONG_AVG: 0.6,
  MODERATE_WEIGHTED: 0.5,
  MODERATE_MIN_SIGNALS: 2,
  MODERATE_AVG: 0.5,
  SIGNIFICANCE_BOOST: 1.3,
  VETO_PENALTY: 0.7,
  VETO_CEILING: 0.8,
  MAX_DESCRIPTIONS: 3,
} as const;

// ============================================================================
// STATISTICS
// ============================================================================

export const STATISTICS = {
  WINDOW_SIZE: 1440, // 24h of 1-minute samples
  MIN_SAMPLES: 100,
  VOLUME_OUTLIER_Z: 3,
  PRICE_OUTLIER_Z: 2.5,
  MAX_CONFIDENCE_MULTIPLIER: 2.0,
  DEFAULT_VOLATILITY: 1.0,
} as const;

// ============================================================================
// ALERT PRIORITIZER
// ============================================================================

export const PRIORITY_BOUNDS = {
  MIN: 0.1,
  MAX: 1.5,
} as const;

export const COOLDOWN_MINUTES: Record<RiskLevel, number> = {
  [RiskLevel.EXTREME]: 3,
  [RiskLevel.HIGH]: 5,
  [RiskLevel.MEDIUM]: 10,
  [RiskLevel.LOW]: 10,
};

export const PRIORITIZER = {
  DEFAULT_WIN_RATE: 0.5,
  EXTREME_BYPASS_PRIORITY: 0.9,
  COOLDOWN_PRIORITY_FACTOR: 1.5,
  MAX_FUNDING_HOURS: 2,
  MAX_RECENT_ALERTS: 10,
  RECENT_ALERT_WINDOW_MIN: 60,
  FREQUENT_ALERT_COUNT: 5,
  FAILURE_WINDOW_HOURS: 2,
  FAILURE_RETENTION_HOURS: 24,
  PERFORMANCE_LOOKBACK_DAYS: 30,
} as const;
