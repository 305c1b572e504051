/**
 * Alert Prioritizer Service
 *
 * Turns a scored candidate into a bounded priority and decides whether it is
 * delivered. Keeps per-symbol performance (fed back from outcome tracking),
 * recent-alert history and a single cooldown expiry per symbol.
 *
 * Priority = base confidence × (1 + Σ adjustments), clamped to [0.1, 1.5]
 *
 * State is mutated only by the monitor loop; persistence is best-effort.
 */

import {
  AlertCandidate,
  AlertOutcome,
  AlertStatistics,
  BtcTrend,
  LoggerService,
  MarketContext,
  RecentAlert,
  RiskLevel,
  SignalAction,
  SymbolAlertStatistics,
  SymbolPerformance,
} from '../types';
import { COOLDOWN_MINUTES, DEFAULT_HOURS_TO_FUNDING, PRIORITIZER, PRIORITY_BOUNDS, TIME_UNITS } from '../constants';
import { clamp, roundTo } from '../utils/math.utils';
import { createErrorLogObject } from '../utils/error.utils';
import { isFundingAction } from '../utils/action.utils';
import { SignalStore } from './signal-store.service';

// ============================================================================
// TYPES & CONSTANTS
// ============================================================================

export type PriorityInput = Pick<AlertCandidate, 'symbol' | 'signal' | 'statistics' | 'funding' | 'liquidation'>;

export type SendDecisionInput = Pick<AlertCandidate, 'symbol' | 'signal' | 'funding'>;

// fighting the BTC trend: directional actions only, funding plays excluded
const BUY_ACTIONS: ReadonlySet<SignalAction> = new Set([SignalAction.BUY, SignalAction.STRONG_BUY]);
const SELL_ACTIONS: ReadonlySet<SignalAction> = new Set([SignalAction.SELL, SignalAction.STRONG_SELL]);

// ============================================================================
// ALERT PRIORITIZER SERVICE
// ============================================================================

export class AlertPrioritizerService {
  private performance: Map<string, SymbolPerformance> = new Map();
  private recentAlerts: Map<string, RecentAlert[]> = new Map();
  private cooldowns: Map<string, number> = new Map(); // symbol → expiry (ms)

  constructor(
    private logger: LoggerService,
    private store: SignalStore | null = null,
    private now: () => number = Date.now,
  ) {}

  /**
   * Restore performance of the last 30 days from the store
   *
   * @returns Number of symbols loaded
   */
  async loadPerformance(): Promise<number> {
    if (!this.store) {
      return 0;
    }
    try {
      const since = this.now() - PRIORITIZER.PERFORMANCE_LOOKBACK_DAYS * TIME_UNITS.DAY;
      const records = await this.store.loadPerformance(since);
      for (const record of records) {
        this.performance.set(record.symbol, { ...record, recentFailures: [...record.recentFailures] });
      }
      this.logger.info(`📈 Loaded alert performance for ${records.length} symbols`);
      return records.length;
    } catch (error) {
      this.logger.error('Failed to load alert performance', createErrorLogObject(error));
      return 0;
    }
  }

  /**
   * Priority in [0.1, 1.5] rounded to 3 decimals
   */
  calculatePriority(candidate: PriorityInput, market: MarketContext | null = null): number {
    const { symbol, signal } = candidate;
    const base = clamp(signal.confidence, 0, 1);
    const perf = this.performance.get(symbol);
    let adjustments = 0;

    // 1. Symbol track record
    const winRate = perf ? perf.winRate : PRIORITIZER.DEFAULT_WIN_RATE;
    if (winRate > 0.7) {
      adjustments += 0.2;
    } else if (winRate > 0.6) {
      adjustments += 0.1;
    } else if (winRate < 0.3) {
      adjustments -= 0.3;
    } else if (winRate < 0.4) {
      adjustments -= 0.1;
    }

    // 2. Alert frequency
    const recentCount = this.countRecentAlerts(symbol);
    if (recentCount === 0) {
      adjustments += 0.2;
    } else if (recentCount > PRIORITIZER.FREQUENT_ALERT_COUNT) {
      adjustments -= 0.2;
    }

    // 3. Statistical extremity
    const zscore = candidate.statistics?.zscore;
    if (zscore) {
      if (zscore.volumeZScore > 4) {
        adjustments += 0.3;
      } else if (zscore.volumeZScore > 3) {
        adjustments += 0.2;
      }
      if (zscore.isOutlier) {
        adjustments += 0.1;
      }
    }

    // 4. Funding magnitude
    if (isFundingAction(signal.action) && candidate.funding) {
      const rate = Math.abs(candidate.funding.rate);
      if (rate > 0.002) {
        adjustments += 0.3;
      } else if (rate > 0.001) {
        adjustments += 0.2;
      }
    }

    // 5. Cascade risk
    if (candidate.liquidation) {
      const probability = candidate.liquidation.cascadeProbability;
      if (probability > 0.8) {
        adjustments += 0.3;
      } else if (probability > 0.6) {
        adjustments += 0.2;
      }
    }

    // 6. Confluence
    if (signal.numSignals >= 4) {
      adjustments += 0.2;
    } else if (signal.numSignals >= 3) {
      adjustments += 0.1;
    }

    // 7. Recent failures
    const failures = this.countRecentFailures(perf);
    if (failures >= 3) {
      adjustments -= 0.4;
    } else if (failures >= 2) {
      adjustments -= 0.2;
    }

    // 8. Fighting a strong BTC move
    if (market) {
      if (market.btcTrend === BtcTrend.STRONG_DOWN && BUY_ACTIONS.has(signal.action)) {
        adjustments -= 0.2;
      } else if (market.btcTrend === BtcTrend.STRONG_UP && SELL_ACTIONS.has(signal.action)) {
        adjustments -= 0.2;
      }
    }

    const priority = clamp(base * (1 + adjustments), PRIORITY_BOUNDS.MIN, PRIORITY_BOUNDS.MAX);
    return roundTo(priority, 3);
  }

  /**
   * Delivery gate:
   * 1. EXTREME with priority > 0.9 always passes
   * 2. Inside a cooldown the priority must reach 1.5 × threshold
   * 3. Priority must reach the threshold
   * 4. Funding actions only within 2h of settlement
   */
  shouldSend(candidate: SendDecisionInput, priority: number, dynamicThreshold: number = 0.7): boolean {
    const { symbol, signal } = candidate;

    if (signal.riskLevel === RiskLevel.EXTREME && priority > PRIORITIZER.EXTREME_BYPASS_PRIORITY) {
      return true;
    }

    if (this.isInCooldown(symbol) && priority < dynamicThreshold * PRIORITIZER.COOLDOWN_PRIORITY_FACTOR) {
      return false;
    }

    if (priority < dynamicThreshold) {
      return false;
    }

    if (isFundingAction(signal.action)) {
      const hoursToFunding = candidate.funding ? candidate.funding.hoursToFunding : DEFAULT_HOURS_TO_FUNDING;
      if (hoursToFunding > PRIORITIZER.MAX_FUNDING_HOURS) {
        return false;
      }
    }

    return true;
  }

  /**
   * Update history, cooldown and totals after a successful delivery
   */
  async recordSent(candidate: AlertCandidate): Promise<void> {
    const { symbol, signal } = candidate;
    const now = this.now();

    const history = this.recentAlerts.get(symbol) ?? [];
    history.push({ time: now, action: signal.action, confidence: signal.confidence, priority: candidate.priority });
    this.recentAlerts.set(symbol, history.slice(-PRIORITIZER.MAX_RECENT_ALERTS));

    this.cooldowns.set(symbol, now + COOLDOWN_MINUTES[signal.riskLevel] * TIME_UNITS.MINUTE);

    const perf = this.getOrCreatePerformance(symbol);
    perf.totalAlerts++;
    perf.lastAlertTime = now;

    if (this.store) {
      try {
        await this.store.saveAlert(candidate, now);
        await this.store.upsertPerformance(perf, now);
      } catch (error) {
        this.logger.error(`Failed to store alert for ${symbol}`, createErrorLogObject(error));
      }
    }
  }

  /**
   * Feed back the outcome of a delivered alert
   *
   * @param movePct - Price move after the alert, percent
   */
  async trackOutcome(symbol: string, alertTime: number, outcome: AlertOutcome, movePct: number | null = null): Promise<void> {
    const now = this.now();
    const perf = this.getOrCreatePerformance(symbol);

    if (outcome === AlertOutcome.SUCCESS) {
      perf.successfulAlerts++;
    } else if (outcome === AlertOutcome.FAILURE) {
      const cutoff = now - PRIORITIZER.FAILURE_RETENTION_HOURS * TIME_UNITS.HOUR;
      perf.recentFailures = [...perf.recentFailures, alertTime].filter((t) => t > cutoff);
    }

    if (perf.totalAlerts > 0) {
      perf.winRate = perf.successfulAlerts / perf.totalAlerts;
    }

    this.logger.debug(`🎯 ${symbol} alert outcome: ${outcome}`, {
      movePct,
      winRate: roundTo(perf.winRate, 3),
    });

    if (this.store) {
      try {
        await this.store.upsertPerformance(perf, now);
        await this.store.saveOutcome({ symbol, alertTime, outcomeTime: now, outcome, movePct });
      } catch (error) {
        this.logger.error(`Failed to store outcome for ${symbol}`, createErrorLogObject(error));
      }
    }
  }

  isInCooldown(symbol: string): boolean {
    const expiry = this.cooldowns.get(symbol);
    return expiry !== undefined && this.now() < expiry;
  }

  getCooldownExpiry(symbol: string): number | null {
    return this.cooldowns.get(symbol) ?? null;
  }

  getPerformance(symbol: string): SymbolPerformance | undefined {
    return this.performance.get(symbol);
  }

  getRecentAlerts(symbol: string): RecentAlert[] {
    return [...(this.recentAlerts.get(symbol) ?? [])];
  }

  getStatistics(): AlertStatistics;
  getStatistics(symbol: string): SymbolAlertStatistics;
  getStatistics(symbol?: string): AlertStatistics | SymbolAlertStatistics {
    if (symbol !== undefined) {
      const perf = this.performance.get(symbol);
      return {
        symbol,
        totalAlerts: perf ? perf.totalAlerts : 0,
        winRate: roundTo(perf ? perf.winRate : PRIORITIZER.DEFAULT_WIN_RATE, 3),
        lastAlert: perf ? perf.lastAlertTime : null,
        recentAlertCount: this.recentAlerts.get(symbol)?.length ?? 0,
      };
    }

    let totalAlerts = 0;
    let totalWins = 0;
    for (const perf of this.performance.values()) {
      totalAlerts += perf.totalAlerts;
      totalWins += perf.successfulAlerts;
    }
    const now = this.now();

    return {
      totalSymbols: this.performance.size,
      totalAlertsSent: totalAlerts,
      globalWinRate: totalAlerts > 0 ? roundTo(totalWins / totalAlerts, 3) : 0,
      activeCooldowns: Array.from(this.cooldowns.values()).filter((expiry) => expiry > now).length,
    };
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  private getOrCreatePerformance(symbol: string): SymbolPerformance {
    let perf = this.performance.get(symbol);
    if (!perf) {
      perf = {
        symbol,
        totalAlerts: 0,
        successfulAlerts: 0,
        winRate: PRIORITIZER.DEFAULT_WIN_RATE,
        lastAlertTime: null,
        recentFailures: [],
      };
      this.performance.set(symbol, perf);
    }
    return perf;
  }

  private countRecentAlerts(symbol: string): number {
    const since = this.now() - PRIORITIZER.RECENT_ALERT_WINDOW_MIN * TIME_UNITS.MINUTE;
    return (this.recentAlerts.get(symbol) ?? []).filter((a) => a.time >= since).length;
  }

  private countRecentFailures(perf: SymbolPerformance | undefined): number {
    if (!perf) {
      return 0;
    }
    const since = this.now() - PRIORITIZER.FAILURE_WINDOW_HOURS * TIME_UNITS.HOUR;
    return perf.recentFailures.filter((t) => t > since).length;
  }
}
