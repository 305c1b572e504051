/**
 * Configuration types (config.json + .env overrides)
 */

import { LogLevel } from './enums';

// ============================================================================
// PROFILE
// ============================================================================

/**
 * Thresholds a profile tunes.
 * Defaults match the conservative detector constants.
 */
export interface DetectorThresholds {
  volumeSpikeThreshold: number; // volume explosion ratio (x)
  rsiOversold: number;
  rsiOverbought: number;
  priceChangeThreshold: number; // percent over 5m
  confidenceThreshold: number; // base of the dynamic threshold
}

/**
 * One monitoring profile. The core only reads these keys and never
 * branches on the profile name.
 */
export interface MonitorProfile {
  candleLimit: number;
  orderBookDepth: number;
  tradeLimit: number;
  updateIntervalSec: number;
  enableLiquidation: boolean;
  enableMultiTimeframe: boolean;
  enableStatistics: boolean;
  enableFunding: boolean;
  enableOrderBook: boolean;
  maxParallelRequests: number;
  requestTimeoutMs: number;
  fundingCacheMs: number;
  thresholds: DetectorThresholds;
}

// ============================================================================
// SECTIONS
// ============================================================================

export interface ExchangeConfig {
  baseUrl: string;
  requestTimeoutMs: number;
}

export interface MonitorSettings {
  mode: string;
  symbols: string[];
  btcSymbol: string;
  maxAlertsPerCycle: number;
  minRiskLevel: 'HIGH' | 'EXTREME';
  outcomeCheckIntervalMin: number;
  outcomeEvaluationMin: number;
  summaryIntervalMin: number;
}

export interface TelegramConfig {
  enabled: boolean;
  botToken?: string;
  chatId?: string;
}

export interface DatabaseConfig {
  path: string;
}

export interface JournalConfig {
  enabled: boolean;
  path: string;
}

export interface LoggingConfig {
  level: LogLevel;
  dir: string;
  toFile: boolean;
}

export interface Config {
  exchange: ExchangeConfig;
  monitor: MonitorSettings;
  profiles: Record<string, MonitorProfile>;
  telegram: TelegramConfig;
  database: DatabaseConfig;
  journal: JournalConfig;
  logging: LoggingConfig;
}
