/**
 * Futures Manipulation Monitor - All Enums
 * Centralized enum definitions for type safety
 */

// ============================================================================
// SIGNAL ENUMS
// ============================================================================

/**
 * Final action of a composite signal
 */
export enum SignalAction {
  STRONG_BUY = 'STRONG_BUY',
  BUY = 'BUY',
  STRONG_SELL = 'STRONG_SELL',
  SELL = 'SELL',
  WATCH = 'WATCH',
  NEUTRAL = 'NEUTRAL',
  FUNDING_LONG = 'FUNDING_LONG',
  FUNDING_SHORT = 'FUNDING_SHORT',
}

/**
 * Risk level of a composite signal.
 * Always derived from weighted confidence + signal count.
 */
export enum RiskLevel {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  EXTREME = 'EXTREME',
}

/**
 * Pattern detectors run by the composite signal detector
 */
export enum DetectorType {
  VOLUME_EXPLOSION = 'volume_explosion',
  RSI_DIVERGENCE = 'rsi_divergence',
  MOMENTUM_SHIFT = 'momentum_shift',
  LIQUIDITY_TRAP = 'liquidity_trap',
  ACCUMULATION = 'accumulation',
  LIQUIDATION_SQUEEZE = 'liquidation_squeeze',
  FUNDING_ARBITRAGE = 'funding_arbitrage',
  HIDDEN_ACCUMULATION = 'hidden_accumulation',
  TIMEFRAME_DIVERGENCE = 'timeframe_divergence',
}

// ============================================================================
// MARKET ENUMS
// ============================================================================

/**
 * Market regime from the rolling 24h window
 */
export enum MarketRegime {
  TRENDING = 'TRENDING',
  RANGING = 'RANGING',
  VOLATILE = 'VOLATILE',
  MIXED = 'MIXED',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Funding rate trend (last 3 vs previous 3 readings)
 */
export enum FundingTrend {
  INCREASING = 'INCREASING',
  DECREASING = 'DECREASING',
  STABLE = 'STABLE',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Side that collects funding
 * Positive rate = longs pay shorts → SHORT collects
 */
export enum FavorablePosition {
  LONG = 'LONG',
  SHORT = 'SHORT',
  NEUTRAL = 'NEUTRAL',
}

/**
 * Expected direction of a liquidation cascade
 */
export enum CascadeDirection {
  UP = 'UP',
  DOWN = 'DOWN',
  NEUTRAL = 'NEUTRAL',
}

/**
 * Liquidation risk classification
 */
export enum LiquidationRisk {
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  EXTREME = 'EXTREME',
}

/**
 * BTC trend used as global market context
 */
export enum BtcTrend {
  STRONG_UP = 'STRONG_UP',
  UP = 'UP',
  NEUTRAL = 'NEUTRAL',
  DOWN = 'DOWN',
  STRONG_DOWN = 'STRONG_DOWN',
}

/**
 * Trade aggressor side
 */
export enum TradeSide {
  BUY = 'BUY',
  SELL = 'SELL',
}

/**
 * Divergence between the 1m and 15m timeframes
 */
export enum TimeframeDivergenceType {
  BULLISH = 'BULLISH',
  BEARISH = 'BEARISH',
}

// ============================================================================
// ALERT ENUMS
// ============================================================================

/**
 * Outcome of a delivered alert, measured after the evaluation window
 */
export enum AlertOutcome {
  SUCCESS = 'success',
  FAILURE = 'failure',
  NEUTRAL = 'neutral',
}

// ============================================================================
// LOGGING ENUMS
// ============================================================================

/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}
