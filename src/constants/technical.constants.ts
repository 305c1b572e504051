/**
 * Technical Constants
 *
 * IMPORTANT: This file contains ONLY technical/mathematical constants that NEVER change.
 * Tunable thresholds belong in config.json profiles.
 */

// ============================================================================
// BASIC MATH & PERCENT
// ============================================================================

export const PERCENT_MULTIPLIER = 100;
export const BASIS_POINTS_MULTIPLIER = 10000;

export const DECIMAL_PLACES = {
  PERCENT: 2,
  PRICE: 6,
  RATE: 3,
  SCORE: 2,
} as const;

// ============================================================================
// TIME
// ============================================================================

export const TIME_MULTIPLIERS = {
  MILLISECONDS_PER_SECOND: 1000,
  SECONDS_PER_MINUTE: 60,
  MINUTES_PER_HOUR: 60,
  HOURS_PER_DAY: 24,
} as const;

export const TIME_UNITS = {
  SECOND: 1000,
  MINUTE: 60 * 1000,
  FIVE_MINUTES: 5 * 60 * 1000,
  HOUR: 60 * 60 * 1000,
  DAY: 24 * 60 * 60 * 1000,
} as const;

// ============================================================================
// FUNDING SCHEDULE
// ============================================================================

export const FUNDING_HOURS_UTC = [0, 8, 16] as const;
export const FUNDING_PERIODS_PER_DAY = 3;
export const FUNDING_INTERVAL_HOURS = 8;
// hours to the next settlement when no funding state is available
export const DEFAULT_HOURS_TO_FUNDING = FUNDING_INTERVAL_HOURS;
