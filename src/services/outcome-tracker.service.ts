/**
 * Outcome Tracker Service
 *
 * Remembers delivered alerts and, once the evaluation window has passed,
 * grades them against the latest price:
 * - move of more than 1% in the alert direction → success
 * - move of more than 1% against it → failure
 * - anything else → neutral
 * Outcomes are fed back to the prioritizer.
 */

import { AlertCandidate, AlertOutcome, LoggerService, SignalAction, TrackedAlert } from '../types';
import { TIME_UNITS } from '../constants';
import { percentChange, roundTo } from '../utils/math.utils';
import { isLongAction } from '../utils/action.utils';
import { AlertPrioritizerService } from './alert-prioritizer.service';

// ============================================================================
// TYPES & CONSTANTS
// ============================================================================

export interface OutcomeTrackerConfig {
  evaluationMs: number;
  moveThresholdPct: number;
}

const DEFAULT_CONFIG: OutcomeTrackerConfig = {
  evaluationMs: 60 * TIME_UNITS.MINUTE,
  moveThresholdPct: 1,
};

export interface OutcomeGrade {
  outcome: AlertOutcome;
  movePct: number;
}

/**
 * Grade a price move for an alert action. Long actions win on a rise,
 * every other action wins on a drop.
 */
export function classifyOutcome(
  action: SignalAction,
  entryPrice: number,
  currentPrice: number,
  thresholdPct: number = DEFAULT_CONFIG.moveThresholdPct,
): OutcomeGrade {
  const move = percentChange(entryPrice, currentPrice);
  const directional = isLongAction(action) ? move : -move;

  let outcome = AlertOutcome.NEUTRAL;
  if (directional > thresholdPct) {
    outcome = AlertOutcome.SUCCESS;
  } else if (directional < -thresholdPct) {
    outcome = AlertOutcome.FAILURE;
  }

  return { outcome, movePct: roundTo(move, 2) };
}

// ============================================================================
// OUTCOME TRACKER SERVICE
// ============================================================================

export class OutcomeTrackerService {
  private readonly config: OutcomeTrackerConfig;
  private pending: Map<string, TrackedAlert> = new Map();

  constructor(
    private logger: LoggerService,
    private prioritizer: AlertPrioritizerService,
    config?: Partial<OutcomeTrackerConfig>,
    private now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Start tracking a delivered alert
   */
  track(candidate: AlertCandidate, sentAt: number = this.now()): void {
    this.pending.set(`${candidate.symbol}_${sentAt}`, {
      symbol: candidate.symbol,
      alertTime: sentAt,
      action: candidate.signal.action,
      entryPrice: candidate.snapshot.ohlcv.close,
      confidence: candidate.signal.confidence,
    });
  }

  /**
   * Grade every alert older than the evaluation window.
   * A symbol without a fresh price is graded against its entry (neutral).
   *
   * @returns Number of alerts graded
   */
  async checkOutcomes(latestPrices: ReadonlyMap<string, number>): Promise<number> {
    const cutoff = this.now() - this.config.evaluationMs;
    let graded = 0;

    for (const [key, alert] of Array.from(this.pending.entries())) {
      if (alert.alertTime >= cutoff) {
        continue;
      }

      const currentPrice = latestPrices.get(alert.symbol) ?? alert.entryPrice;
      const { outcome, movePct } = classifyOutcome(
        alert.action,
        alert.entryPrice,
        currentPrice,
        this.config.moveThresholdPct,
      );

      this.pending.delete(key);
      graded++;

      await this.prioritizer.trackOutcome(alert.symbol, alert.alertTime, outcome, movePct);

      this.logger.info(`🎯 Alert outcome for ${alert.symbol}: ${outcome}`, {
        action: alert.action,
        movePct,
      });
    }

    return graded;
  }

  getPendingCount(): number {
    return this.pending.size;
  }
}
