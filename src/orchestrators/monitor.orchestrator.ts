/**
 * MONITOR ORCHESTRATOR
 * Poll loop that runs the whole pipeline for every symbol
 *
 * Per cycle:
 * 1. Market context from the previous cycle (BTC trend, latest prices)
 * 2. Fan-out per symbol (chunks of maxParallelRequests, allSettled):
 *    candles → snapshot → statistics → multi-TF → order book → trades
 *    → funding → liquidations → composite signal → store
 * 3. HIGH/EXTREME signals are prioritised and gated
 * 4. Fan-in: sort by priority, deliver at most maxAlertsPerCycle
 *
 * Between cycles: outcome checks, periodic summary, extreme funding scan.
 * A failing symbol never aborts the batch; store failures never block alerts.
 */

import {
  AlertCandidate,
  BtcTrend,
  Candle,
  CompositeSignal,
  CycleSummary,
  LoggerService,
  MarketContext,
  MarketRegime,
  MarketSnapshot,
  MonitorProfile,
  MonitorSettings,
  OrderBookSnapshot,
  PeriodicSummary,
  RiskLevel,
  SignalContext,
  StatisticalAnalysis,
  TimeframeDivergence,
} from '../types';
import { TIME_UNITS } from '../constants';
import { CandleAnalyzer } from '../analyzers/candle.analyzer';
import { OrderBookAnalyzer } from '../analyzers/orderbook.analyzer';
import { TradeFlowAnalyzer } from '../analyzers/trade-flow.analyzer';
import { MicrostructureAnalyzer } from '../analyzers/microstructure.analyzer';
import { detectTimeframeDivergence } from '../analyzers/timeframe-divergence.analyzer';
import { MarketDataSource } from '../services/market-data.service';
import { SignalStore } from '../services/signal-store.service';
import { StatisticalAnalyzerService } from '../services/statistical-analyzer.service';
import { FundingAnalyzerService } from '../services/funding-analyzer.service';
import { LiquidationAnalyzerService } from '../services/liquidation-analyzer.service';
import { DetectorRegistry, createDefaultDetectors } from '../services/detector-registry.service';
import { CompositeSignalService } from '../services/composite-signal.service';
import { AlertPrioritizerService } from '../services/alert-prioritizer.service';
import { OutcomeTrackerService } from '../services/outcome-tracker.service';
import { AlertJournalService } from '../services/alert-journal.service';
import { Notifier } from '../services/telegram.service';
import { formatAlert, formatStartup, formatSummary } from '../utils/alert-format.utils';
import { createErrorLogObject } from '../utils/error.utils';

// ============================================================================
// TYPES & CONSTANTS
// ============================================================================

export interface MonitorDependencies {
  source: MarketDataSource;
  notifier: Notifier;
  store?: SignalStore | null;
  journal?: AlertJournalService | null;
  now?: () => number;
}

/**
 * Latest per-symbol state, read as market context by the next cycle
 */
export interface SymbolCondition {
  price: number;
  change5m: number;
  volumeRatio: number;
  rsi: number | null;
  fundingRate: number;
  regime: MarketRegime;
  updatedAt: number;
}

const BTC_TREND = {
  STRONG: 2, // percent over 5m
  MILD: 0.5,
} as const;

const RECENT_CLOSES = 20;
const EXTREME_FUNDING_THRESHOLD = 0.0015;
const EXTREME_FUNDING_EVERY_CYCLES = 30;
const BIGGEST_MOVER_PCT = 2;
const BIGGEST_MOVERS_SHOWN = 5;
const WASH_TRADING_LOG_SCORE = 0.5;

/**
 * BTC 5m change → trend bucket
 */
export function classifyBtcTrend(change5m: number): BtcTrend {
  if (change5m > BTC_TREND.STRONG) {
    return BtcTrend.STRONG_UP;
  }
  if (change5m > BTC_TREND.MILD) {
    return BtcTrend.UP;
  }
  if (change5m < -BTC_TREND.STRONG) {
    return BtcTrend.STRONG_DOWN;
  }
  if (change5m < -BTC_TREND.MILD) {
    return BtcTrend.DOWN;
  }
  return BtcTrend.NEUTRAL;
}

/**
 * Split a list into consecutive chunks of at most `size`
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}

// ============================================================================
// MONITOR ORCHESTRATOR
// ============================================================================

export class MonitorOrchestrator {
  private readonly source: MarketDataSource;
  private readonly notifier: Notifier;
  private readonly store: SignalStore | null;
  private readonly journal: AlertJournalService | null;
  private readonly now: () => number;

  private readonly candleAnalyzer: CandleAnalyzer;
  private readonly orderBookAnalyzer: OrderBookAnalyzer;
  private readonly tradeFlowAnalyzer = new TradeFlowAnalyzer();
  private readonly microstructureAnalyzer = new MicrostructureAnalyzer();
  private readonly statistics: StatisticalAnalyzerService;
  private readonly funding: FundingAnalyzerService;
  private readonly liquidation: LiquidationAnalyzerService;
  private readonly composite: CompositeSignalService;
  private readonly prioritizer: AlertPrioritizerService;
  private readonly outcomes: OutcomeTrackerService;

  private conditions: Map<string, SymbolCondition> = new Map();
  private cycles = 0;
  private totalAlertsSent = 0;
  private alertsBlocked = 0;
  private lastOutcomeCheck: number;
  private lastSummary: number;

  private running = false;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private settings: MonitorSettings,
    private profile: MonitorProfile,
    private logger: LoggerService,
    deps: MonitorDependencies,
  ) {
    this.source = deps.source;
    this.notifier = deps.notifier;
    this.store = deps.store ?? null;
    this.journal = deps.journal ?? null;
    this.now = deps.now ?? Date.now;

    this.candleAnalyzer = new CandleAnalyzer();
    this.orderBookAnalyzer = new OrderBookAnalyzer(logger);
    this.statistics = new StatisticalAnalyzerService(logger, this.store);
    this.funding = new FundingAnalyzerService(this.source, logger, { cacheTimeMs: profile.fundingCacheMs }, this.now);
    this.liquidation = new LiquidationAnalyzerService(this.source, logger, undefined, this.now);

    const registry = new DetectorRegistry(logger);
    registry.registerBatch(createDefaultDetectors());
    logger.info(`🧩 ${registry.getCount()} detectors registered`, {
      weights: registry.getDetectors().map((d) => `${d.type}:${d.weight}`),
    });
    this.composite = new CompositeSignalService(logger, registry);
    this.prioritizer = new AlertPrioritizerService(logger, this.store, this.now);
    this.outcomes = new OutcomeTrackerService(
      logger,
      this.prioritizer,
      { evaluationMs: settings.outcomeEvaluationMin * TIME_UNITS.MINUTE },
      this.now,
    );

    const startedAt = this.now();
    this.lastOutcomeCheck = startedAt;
    this.lastSummary = startedAt;
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  /**
   * Run cycles until stop() is called. Resolves after the in-flight cycle settles.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('⚠️ Monitor already running');
      return;
    }
    this.running = true;

    await this.prioritizer.loadPerformance();
    await this.notifier.send(formatStartup(this.settings.symbols.length, this.settings.mode, this.profile));

    this.logger.info(`🚀 Monitoring ${this.settings.symbols.length} symbols`, {
      mode: this.settings.mode,
      intervalSec: this.profile.updateIntervalSec,
    });

    while (this.running) {
      try {
        await this.runCycle();
        await this.runPeriodicTasks();
      } catch (error) {
        this.logger.error('❌ Monitor cycle failed', createErrorLogObject(error));
      }

      if (this.running) {
        await this.sleep(this.profile.updateIntervalSec * TIME_UNITS.SECOND);
      }
    }

    this.logger.info('🛑 Monitor stopped', { cycles: this.cycles, alertsSent: this.totalAlertsSent });
  }

  /**
   * Stop after the in-flight cycle; wakes the loop if it is sleeping
   */
  stop(): void {
    this.running = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    if (this.wake) {
      const wake = this.wake;
      this.wake = null;
      wake();
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  // ============================================================================
  // CYCLE
  // ============================================================================

  /**
   * One full poll cycle over every symbol
   */
  async runCycle(): Promise<CycleSummary> {
    const startedAt = this.now();
    this.cycles++;

    const market = this.getMarketContext();
    const candidates: AlertCandidate[] = [];
    let processed = 0;
    let failed = 0;

    for (const batch of chunk(this.settings.symbols, this.profile.maxParallelRequests)) {
      const results = await Promise.allSettled(batch.map((symbol) => this.processSymbol(symbol, market)));

      results.forEach((result, i) => {
        if (result.status === 'rejected') {
          failed++;
          this.logger.error(`❌ Error processing ${batch[i]}`, createErrorLogObject(result.reason));
          return;
        }
        if (result.value === undefined) {
          failed++;
          return;
        }
        processed++;
        if (result.value !== null) {
          candidates.push(result.value);
        }
      });
    }

    candidates.sort((a, b) => b.priority - a.priority);
    const toSend = candidates.slice(0, this.settings.maxAlertsPerCycle);
    const deferred = candidates.length - toSend.length;
    if (deferred > 0) {
      this.logger.info(`Limited alerts to ${this.settings.maxAlertsPerCycle}, skipped ${deferred}`);
    }

    let sent = 0;
    for (const candidate of toSend) {
      if (await this.deliver(candidate)) {
        sent++;
      }
    }

    const summary: CycleSummary = {
      processed,
      failed,
      candidates: candidates.length,
      sent,
      deferred,
      durationMs: this.now() - startedAt,
    };
    this.logger.info(`🔄 Cycle ${this.cycles} completed`, { ...summary });
    return summary;
  }

  /**
   * Full pipeline for one symbol
   *
   * @returns Candidate that passed the gate, null when nothing to send,
   *          undefined when the symbol could not be analysed this cycle
   */
  async processSymbol(symbol: string, market: MarketContext): Promise<AlertCandidate | null | undefined> {
    const profile = this.profile;

    // 1. Candles
    const candleResult = await this.source.fetchCandles(symbol, 'Min1', profile.candleLimit);
    if (!candleResult.ok) {
      this.logger.warn(`[${symbol}] No candles returned`, { reason: candleResult.reason, error: candleResult.error });
      return undefined;
    }
    const candles = candleResult.value;

    // 2. Snapshot
    const snapshot = this.candleAnalyzer.buildSnapshot(symbol, candles);
    if (!snapshot) {
      return undefined;
    }

    // 3. Statistics
    let statistics: StatisticalAnalysis | null = null;
    if (profile.enableStatistics) {
      await this.statistics.warmUp(symbol);
      statistics = this.statistics.analyze(snapshot, profile.thresholds.confidenceThreshold);
    }
    if (profile.enableLiquidation) {
      this.liquidation.recordSample(snapshot);
    }

    // 4. Multi-timeframe
    const timeframeDivergence = profile.enableMultiTimeframe ? await this.fetchTimeframeDivergence(symbol, candles) : null;

    // 5. Order book + trades
    const orderBook = profile.enableOrderBook ? await this.fetchOrderBook(symbol) : null;
    if (orderBook) {
      await this.analyzeTradeFlow(symbol, orderBook);
    }

    // 6. Funding + liquidations
    const fundingState = profile.enableFunding ? await this.funding.analyze(symbol, snapshot.indicators.rsi14) : null;
    const funding = fundingState && !fundingState.stale ? fundingState : null;
    const liquidation = profile.enableLiquidation
      ? await this.liquidation.analyze(symbol, snapshot.ohlcv.close, orderBook ? orderBook.liquidityScore : null)
      : null;

    // 7. Composite signal
    const context: SignalContext = { snapshot, orderBook, funding, liquidation, statistics, timeframeDivergence };
    const signal = this.composite.calculate(context, profile.thresholds);

    this.logger.debug(`[${symbol}] ${signal.action}`, {
      risk: signal.riskLevel,
      confidence: Number(signal.confidence.toFixed(3)),
      signals: signal.numSignals,
      volumePercentile: statistics ? statistics.volumePercentile : null,
    });

    // 8. Persist + remember
    await this.persist(symbol, snapshot, context, signal.numSignals > 0 ? signal : null);
    this.conditions.set(symbol, {
      price: snapshot.ohlcv.close,
      change5m: snapshot.priceChange.change5m,
      volumeRatio: snapshot.volume.volumeRatio5m,
      rsi: snapshot.indicators.rsi14,
      fundingRate: funding ? funding.rate : 0,
      regime: statistics ? statistics.regime : MarketRegime.UNKNOWN,
      updatedAt: this.now(),
    });

    // 9. Gate
    if (!this.meetsMinRisk(signal.riskLevel)) {
      return null;
    }

    const dynamicThreshold = statistics ? statistics.dynamicThreshold : profile.thresholds.confidenceThreshold;
    const base = { symbol, signal, statistics, funding, liquidation };
    const priority = this.prioritizer.calculatePriority(base, market);

    if (!this.prioritizer.shouldSend(base, priority, dynamicThreshold)) {
      this.alertsBlocked++;
      this.logger.debug(`[${symbol}] Alert blocked by prioritizer`, {
        priority,
        threshold: dynamicThreshold,
        cooldownUntil: this.prioritizer.getCooldownExpiry(symbol),
        recentAlerts: this.prioritizer.getRecentAlerts(symbol).length,
      });
      return null;
    }

    return {
      ...base,
      timestamp: this.now(),
      snapshot,
      orderBook,
      priority,
      dynamicThreshold,
      recentCloses: candles.slice(-RECENT_CLOSES).map((c) => c.close),
    };
  }

  /**
   * Market context from the previous cycle's conditions
   */
  getMarketContext(): MarketContext {
    const btc = this.conditions.get(this.settings.btcSymbol);
    return {
      btcTrend: btc ? classifyBtcTrend(btc.change5m) : BtcTrend.NEUTRAL,
      totalSymbols: this.settings.symbols.length,
      activeSymbols: this.conditions.size,
    };
  }

  // ============================================================================
  // PERIODIC TASKS
  // ============================================================================

  /**
   * Outcome check, summary and extreme funding scan when due
   */
  async runPeriodicTasks(): Promise<void> {
    const now = this.now();

    if (now - this.lastOutcomeCheck >= this.settings.outcomeCheckIntervalMin * TIME_UNITS.MINUTE) {
      await this.checkOutcomes();
      this.lastOutcomeCheck = now;
    }

    if (now - this.lastSummary >= this.settings.summaryIntervalMin * TIME_UNITS.MINUTE) {
      await this.sendSummary();
      this.lastSummary = now;
    }

    if (this.profile.enableFunding && this.cycles % EXTREME_FUNDING_EVERY_CYCLES === 0) {
      const pairs = await this.funding.getExtremeFundingPairs(this.settings.symbols, EXTREME_FUNDING_THRESHOLD);
      if (pairs.length > 0) {
        this.logger.info(`💰 Found ${pairs.length} pairs with extreme funding`, {
          top: pairs.slice(0, BIGGEST_MOVERS_SHOWN).map((p) => `${p.symbol} ${(p.rate * 100).toFixed(3)}%`),
        });
      }
    }
  }

  /**
   * Grade tracked alerts against the latest prices
   */
  async checkOutcomes(): Promise<number> {
    const prices = new Map<string, number>();
    for (const [symbol, condition] of this.conditions) {
      prices.set(symbol, condition.price);
    }
    const graded = await this.outcomes.checkOutcomes(prices);
    this.logger.debug('🎯 Outcome check complete', { graded, pending: this.outcomes.getPendingCount() });
    return graded;
  }

  buildSummary(): PeriodicSummary {
    const movers = Array.from(this.conditions.entries())
      .filter(([, c]) => Math.abs(c.change5m) > BIGGEST_MOVER_PCT)
      .map(([symbol, c]) => ({ symbol, change: c.change5m }))
      .sort((a, b) => Math.abs(b.change) - Math.abs(a.change))
      .slice(0, BIGGEST_MOVERS_SHOWN);

    return {
      hours: this.settings.summaryIntervalMin / 60,
      totalPairs: this.settings.symbols.length,
      totalAlerts: this.totalAlertsSent,
      alertsBlocked: this.alertsBlocked,
      globalWinRate: this.prioritizer.getStatistics().globalWinRate,
      biggestMovers: movers,
    };
  }

  async sendSummary(): Promise<boolean> {
    return this.notifier.send(formatSummary(this.buildSummary()));
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  private meetsMinRisk(risk: RiskLevel): boolean {
    if (this.settings.minRiskLevel === 'EXTREME') {
      return risk === RiskLevel.EXTREME;
    }
    return risk === RiskLevel.HIGH || risk === RiskLevel.EXTREME;
  }

  /**
   * Send one alert; cooldown, history, tracking and journal only on success
   */
  private async deliver(candidate: AlertCandidate): Promise<boolean> {
    const message = formatAlert(candidate, this.prioritizer.getPerformance(candidate.symbol));
    const delivered = await this.notifier.send(message);

    if (!delivered) {
      this.logger.warn(`⚠️ Alert for ${candidate.symbol} not delivered`, { priority: candidate.priority });
      return false;
    }

    const sentAt = this.now();
    await this.prioritizer.recordSent(candidate);
    this.outcomes.track(candidate, sentAt);
    this.journal?.append(candidate, sentAt);
    this.totalAlertsSent++;

    this.logger.warn(`🚨 Alert sent for ${candidate.symbol}: ${candidate.signal.riskLevel} risk`, {
      action: candidate.signal.action,
      priority: candidate.priority,
    });
    return true;
  }

  private async fetchTimeframeDivergence(symbol: string, candles1m: Candle[]): Promise<TimeframeDivergence | null> {
    const [m5, m15] = await Promise.all([
      this.source.fetchCandles(symbol, 'Min5', this.profile.candleLimit),
      this.source.fetchCandles(symbol, 'Min15', this.profile.candleLimit),
    ]);
    if (!m5.ok || !m15.ok) {
      this.logger.debug(`[${symbol}] Multi-TF data unavailable`);
      return null;
    }
    return detectTimeframeDivergence({ '1m': candles1m, '5m': m5.value, '15m': m15.value });
  }

  private async fetchOrderBook(symbol: string): Promise<OrderBookSnapshot | null> {
    const result = await this.source.fetchOrderBook(symbol, this.profile.orderBookDepth);
    if (!result.ok) {
      this.logger.debug(`[${symbol}] Order book unavailable`, { reason: result.reason });
      return null;
    }
    const orderBook = this.orderBookAnalyzer.analyze(symbol, result.value.bids, result.value.asks, result.value.timestamp);
    this.logger.debug(`[${symbol}] ${this.orderBookAnalyzer.getSummary(orderBook)}`);
    return orderBook;
  }

  /**
   * Trade tape and microstructure are informational: logged, not scored
   */
  private async analyzeTradeFlow(symbol: string, orderBook: OrderBookSnapshot): Promise<void> {
    const result = await this.source.fetchTrades(symbol, this.profile.tradeLimit);
    if (!result.ok) {
      return;
    }

    const flow = this.tradeFlowAnalyzer.analyze(result.value);
    const micro = this.microstructureAnalyzer.analyze(orderBook, result.value);

    if (flow.washTradingScore > WASH_TRADING_LOG_SCORE) {
      this.logger.info(`🔁 [${symbol}] Possible wash trading`, {
        score: flow.washTradingScore,
        trades: flow.tradeCount,
        toxicity: micro ? micro.toxicityScore : null,
      });
    }
  }

  /**
   * Best-effort audit trail
   */
  private async persist(
    symbol: string,
    snapshot: MarketSnapshot,
    context: SignalContext,
    signal: CompositeSignal | null,
  ): Promise<void> {
    const store = this.store;
    if (!store) {
      return;
    }
    try {
      await store.saveSnapshot(snapshot);
      if (signal) {
        await store.saveSignal(symbol, signal);
      }
      if (context.funding) {
        await store.saveFunding(context.funding);
      }
      if (context.liquidation && context.liquidation.totalLiquidations1h > 0) {
        await store.saveLiquidation(context.liquidation);
      }
    } catch (error) {
      this.logger.error(`Failed to store analysis for ${symbol}`, createErrorLogObject(error));
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }
}
