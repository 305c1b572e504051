/**
 * Composite Signal Service
 *
 * Fuses the triggered detectors into one decision per symbol:
 * weighted confidence, statistical adjustment, action and risk level.
 *
 * Decision (first match wins):
 * - weighted > 0.7, or 3+ signals averaging > 0.6 → EXTREME
 *   (FUNDING_SHORT/LONG when funding arbitrage drove it, else STRONG_BUY/SELL)
 * - weighted > 0.5, or 2+ signals averaging > 0.5 → BUY/SELL, HIGH
 * - any signal → WATCH, MEDIUM
 * - nothing → NEUTRAL, LOW
 */

import {
  ActiveSignal,
  CompositeSignal,
  DetectorThresholds,
  DetectorType,
  FavorablePosition,
  FundingState,
  LoggerService,
  RiskLevel,
  SignalAction,
  SignalContext,
  StatisticalAnalysis,
} from '../types';
import { COMPOSITE_DECISION, DEFAULT_DETECTOR_THRESHOLDS } from '../constants';
import { evaluateSignificance } from './statistical-analyzer.service';
import { DetectorRegistry } from './detector-registry.service';

const NO_PATTERNS = 'No significant patterns';

// ============================================================================
// COMPOSITE SIGNAL SERVICE
// ============================================================================

export class CompositeSignalService {
  constructor(
    private logger: LoggerService,
    private registry: DetectorRegistry,
  ) {}

  calculate(context: SignalContext, thresholds: DetectorThresholds = DEFAULT_DETECTOR_THRESHOLDS): CompositeSignal {
    const signals = this.registry.collectSignals(context, thresholds);
    const timestamp = context.snapshot.timestamp;

    if (signals.length === 0) {
      return {
        timestamp,
        action: SignalAction.NEUTRAL,
        riskLevel: RiskLevel.LOW,
        confidence: 0,
        averageConfidence: 0,
        numSignals: 0,
        signals: [],
        description: NO_PATTERNS,
      };
    }

    const rawWeighted = signals.reduce((sum, s) => sum + s.confidence * s.weight, 0);
    const averageConfidence = signals.reduce((sum, s) => sum + s.confidence, 0) / signals.length;
    const weighted = this.applyStatistics(rawWeighted, context.statistics);

    const upward = context.snapshot.priceChange.change5m >= 0;
    let action: SignalAction;
    let riskLevel: RiskLevel;

    if (
      weighted > COMPOSITE_DECISION.STRONG_WEIGHTED ||
      (signals.length >= COMPOSITE_DECISION.STRONG_MIN_SIGNALS && averageConfidence > COMPOSITE_DECISION.STRONG_AVG)
    ) {
      action = this.resolveStrongAction(signals, context.funding, upward);
      riskLevel = RiskLevel.EXTREME;
    } else if (
      weighted > COMPOSITE_DECISION.MODERATE_WEIGHTED ||
      (signals.length >= COMPOSITE_DECISION.MODERATE_MIN_SIGNALS && averageConfidence > COMPOSITE_DECISION.MODERATE_AVG)
    ) {
      action = upward ? SignalAction.BUY : SignalAction.SELL;
      riskLevel = RiskLevel.HIGH;
    } else {
      action = SignalAction.WATCH;
      riskLevel = RiskLevel.MEDIUM;
    }

    if (riskLevel === RiskLevel.EXTREME) {
      this.logger.info(`🚨 ${context.snapshot.symbol} ${action}`, {
        confidence: weighted,
        signals: signals.map((s) => s.type),
      });
    }

    return {
      timestamp,
      action,
      riskLevel,
      confidence: weighted,
      averageConfidence,
      numSignals: signals.length,
      signals,
      description: signals
        .slice(0, COMPOSITE_DECISION.MAX_DESCRIPTIONS)
        .map((s) => s.description)
        .join(' | '),
    };
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  /**
   * Outliers boost the confidence; a weak signal the dynamic threshold
   * rejects is damped
   */
  private applyStatistics(weighted: number, statistics: StatisticalAnalysis | null): number {
    if (!statistics) {
      return weighted;
    }

    let adjusted = weighted;
    if (statistics.statisticalSignificance) {
      adjusted *= COMPOSITE_DECISION.SIGNIFICANCE_BOOST;
    }
    if (!evaluateSignificance(statistics, adjusted).shouldAlert && adjusted < COMPOSITE_DECISION.VETO_CEILING) {
      adjusted *= COMPOSITE_DECISION.VETO_PENALTY;
    }
    return adjusted;
  }

  private resolveStrongAction(signals: ActiveSignal[], funding: FundingState | null, upward: boolean): SignalAction {
    const fundingDriven = signals.some((s) => s.type === DetectorType.FUNDING_ARBITRAGE);
    if (fundingDriven && funding) {
      if (funding.favorablePosition === FavorablePosition.SHORT) {
        return SignalAction.FUNDING_SHORT;
      }
      if (funding.favorablePosition === FavorablePosition.LONG) {
        return SignalAction.FUNDING_LONG;
      }
    }
    return upward ? SignalAction.STRONG_BUY : SignalAction.STRONG_SELL;
  }
}
