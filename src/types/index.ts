/**
 * Futures Manipulation Monitor - Core Types
 *
 * Market data records, analyzer outputs, signals and alert state.
 * Enums live in ./enums, configuration shapes in ./config.types.
 */

import {
  AlertOutcome,
  BtcTrend,
  CascadeDirection,
  DetectorType,
  FavorablePosition,
  FundingTrend,
  LiquidationRisk,
  MarketRegime,
  RiskLevel,
  SignalAction,
  TimeframeDivergenceType,
  TradeSide,
} from './enums';

export * from './enums';
export * from './config.types';
export { LoggerService } from '../services/logger.service';
export type { LogContext } from '../services/logger.service';

// ============================================================================
// FETCH RESULTS
// ============================================================================

/**
 * Outcome of a call to an external collaborator.
 * EMPTY (nothing to analyze) is kept apart from ERROR (transport/parse failure);
 * the caller decides whether to skip or default.
 */
export type FetchResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'EMPTY' | 'ERROR'; error?: string };

// ============================================================================
// RAW MARKET DATA
// ============================================================================

export interface Candle {
  timestamp: number; // open time, ms
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  quoteVolume: number;
}

/**
 * Order book level as [price, size]
 */
export type OrderbookLevel = [number, number];

export interface RawOrderBook {
  symbol: string;
  timestamp: number;
  bids: OrderbookLevel[]; // price descending
  asks: OrderbookLevel[]; // price ascending
}

export interface Trade {
  timestamp: number;
  price: number;
  size: number;
  side: TradeSide;
}

export interface RawFundingRate {
  symbol: string;
  rate: number; // 0.0001 = 0.01%
  maxRate: number;
  timestamp: number;
}

export interface RawLiquidation {
  timestamp: number;
  price: number;
  size: number;
  side: TradeSide; // BUY = long position liquidated
}

export type TimeframeKey = '1m' | '5m' | '15m';

export type MultiTimeframeCandles = Record<TimeframeKey, Candle[]>;

// ============================================================================
// INDICATOR ENGINE
// ============================================================================

export interface VolumeAnalysis {
  avgVolume5m: number;
  avgVolume60m: number;
  volumeRatio5m: number;
  volumeRatio60m: number;
  isSpike: boolean;
  spikeMagnitude: number;
  volumeTrend: number; // mean of last 5 volumes / mean of the 5 before
}

export interface PriceChangeAnalysis {
  change1m: number; // percent
  change5m: number;
  change15m: number;
  change60m: number;
  highLowRange: number;
}

export interface SnapshotIndicators {
  rsi14: number | null; // null = not enough history
  momentum10: number | null;
}

export interface MarketSnapshot {
  readonly symbol: string;
  readonly timestamp: number;
  readonly ohlcv: Readonly<Candle>;
  readonly volume: Readonly<VolumeAnalysis>;
  readonly priceChange: Readonly<PriceChangeAnalysis>;
  readonly indicators: Readonly<SnapshotIndicators>;
}

export interface TimeframeTrend {
  direction: 'UP' | 'DOWN';
  strength: number; // absolute percent
}

export interface TimeframeDivergence {
  hasDivergence: boolean;
  type: TimeframeDivergenceType | null;
  strength: number;
  trends: Partial<Record<TimeframeKey, TimeframeTrend>>;
}

// ============================================================================
// MICROSTRUCTURE
// ============================================================================

export interface OrderBookSnapshot {
  symbol: string;
  timestamp: number;
  bestBid: number;
  bestAsk: number;
  spread: number;
  spreadBps: number;
  bidDepth10Bps: number;
  askDepth10Bps: number;
  bidCount: number;
  askCount: number;
  imbalanceRatio: number;
  spoofingScore: number;
  liquidityScore: number;
  topBids: OrderbookLevel[];
  topAsks: OrderbookLevel[];
}

export interface TradeFlowAnalysis {
  tradeCount: number;
  buyVolume: number;
  sellVolume: number;
  netFlow: number;
  buyCount: number;
  sellCount: number;
  avgTradeSize: number;
  maxTradeSize: number;
  aggressorRatio: number | null; // Infinity when there is no sell volume
  washTradingScore: number;
  avgTimeBetweenTradesSec: number;
  volumeConcentration: number;
}

export interface MicrostructureMetrics {
  effectiveSpreadBps: number;
  priceImpact100: number; // percent
  priceImpact1000: number;
  resilienceScore: number;
  toxicityScore: number;
}

// ============================================================================
// FUNDING & LIQUIDATIONS
// ============================================================================

export interface FundingState {
  symbol: string;
  timestamp: number;
  rate: number;
  hoursToFunding: number;
  trend: FundingTrend;
  avg24h: number;
  rateVsAverage: number; // percent
  arbitrageScore: number;
  favorablePosition: FavorablePosition;
  stale: boolean; // zero-state after failed fetch
}

export interface FundingTrendStats {
  trend: FundingTrend;
  avg24h: number;
  rateVsAverage: number;
  volatility: number;
}

export interface ExtremeFundingPair {
  symbol: string;
  rate: number;
  hoursToFunding: number;
  dailyRate: number;
}

export interface LiquidationSample {
  timestamp: number;
  close: number;
  volume: number;
  spikeMagnitude: number;
  change1m: number;
}

export interface LiquidationVolumes {
  longLiquidations1h: number;
  shortLiquidations1h: number;
  totalLiquidations1h: number;
  liquidationRatio: number;
  estimated: boolean;
}

export interface CascadeAnalysis {
  cascadeProbability: number;
  cascadeDirection: CascadeDirection;
  nearestLiquidationZone: number | null;
  riskLevel: LiquidationRisk;
}

export interface LiquidationState extends LiquidationVolumes, CascadeAnalysis {
  symbol: string;
  timestamp: number;
}

// ============================================================================
// STATISTICS
// ============================================================================

export interface StatSample {
  timestamp: number;
  price: number;
  volume: number;
  priceChange: number; // 1m change, percent
}

export interface ZScoreResult {
  volumeZScore: number;
  priceZScore: number;
  isOutlier: boolean;
  confidenceMultiplier: number;
  volumeMean24h: number;
  volumeStd24h: number;
  priceChangeMean24h: number;
  priceChangeStd24h: number;
}

export interface RegimeDetails {
  regime: MarketRegime;
  trendStrength: number; // normalized slope, percent
  volatility: number; // stdev of returns, percent
  efficiency: number; // 0-1
  timestamp: number;
}

export interface StatisticalAnalysis {
  symbol: string;
  sampleCount: number;
  volumePercentile: number; // rank of the newest volume in the window, 50 while cold
  zscore: ZScoreResult | null; // null until the window is warm
  regime: MarketRegime;
  regimeDetails: RegimeDetails | null;
  dynamicThreshold: number;
  statisticalSignificance: boolean;
}

export interface SignificanceVerdict {
  adjustedConfidence: number;
  shouldAlert: boolean;
}

// ============================================================================
// SIGNALS
// ============================================================================

export interface DetectorResult {
  triggered: boolean;
  confidence: number; // 0-1
  description: string;
}

export interface ActiveSignal {
  type: DetectorType;
  confidence: number;
  weight: number;
  description: string;
}

export interface CompositeSignal {
  timestamp: number;
  action: SignalAction;
  riskLevel: RiskLevel;
  confidence: number; // weighted confidence after statistical adjustment
  averageConfidence: number;
  numSignals: number;
  signals: ActiveSignal[];
  description: string;
}

/**
 * Everything the detectors may look at for one symbol in one cycle
 */
export interface SignalContext {
  snapshot: MarketSnapshot;
  orderBook: OrderBookSnapshot | null;
  funding: FundingState | null;
  liquidation: LiquidationState | null;
  statistics: StatisticalAnalysis | null;
  timeframeDivergence: TimeframeDivergence | null;
}

// ============================================================================
// ALERTS
// ============================================================================

export interface AlertCandidate {
  symbol: string;
  timestamp: number;
  signal: CompositeSignal;
  snapshot: MarketSnapshot;
  orderBook: OrderBookSnapshot | null;
  funding: FundingState | null;
  liquidation: LiquidationState | null;
  statistics: StatisticalAnalysis | null;
  priority: number;
  dynamicThreshold: number;
  recentCloses: number[];
}

export interface MarketContext {
  btcTrend: BtcTrend;
  totalSymbols: number;
  activeSymbols: number;
}

export interface SymbolPerformance {
  symbol: string;
  totalAlerts: number;
  successfulAlerts: number;
  winRate: number;
  lastAlertTime: number | null;
  recentFailures: number[]; // timestamps, last 24h
}

export interface RecentAlert {
  time: number;
  action: SignalAction;
  confidence: number;
  priority: number;
}

export interface AlertStatistics {
  totalSymbols: number;
  totalAlertsSent: number;
  globalWinRate: number;
  activeCooldowns: number;
}

export interface SymbolAlertStatistics {
  symbol: string;
  totalAlerts: number;
  winRate: number;
  lastAlert: number | null;
  recentAlertCount: number;
}

export interface TrackedAlert {
  symbol: string;
  alertTime: number;
  action: SignalAction;
  entryPrice: number;
  confidence: number;
}

export interface AlertOutcomeRecord {
  symbol: string;
  alertTime: number;
  outcomeTime: number;
  outcome: AlertOutcome;
  movePct: number | null;
}

export interface TradeSetup {
  entryMin: number;
  entryMax: number;
  stopLoss: number;
  target1: number;
  target2: number;
  riskPct: number;
  reward1Pct: number;
  reward2Pct: number;
  rr1: number;
  rr2: number;
}

export interface CycleSummary {
  processed: number;
  failed: number;
  candidates: number;
  sent: number;
  deferred: number;
  durationMs: number;
}

// ============================================================================
// PERSISTENCE
// ============================================================================

/**
 * Stored per-cycle snapshot row, enough to rebuild rolling statistics
 */
export interface SnapshotRecord {
  symbol: string;
  timestamp: number;
  close: number;
  volume: number;
  change1m: number;
  change5m: number;
  volumeRatio5m: number;
  rsi14: number | null;
}

export interface PeriodicSummary {
  hours: number;
  totalPairs: number;
  totalAlerts: number;
  alertsBlocked: number;
  globalWinRate: number;
  biggestMovers: Array<{ symbol: string; change: number }>;
}
