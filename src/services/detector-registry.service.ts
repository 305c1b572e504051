/**
 * Detector Registry Service
 *
 * Central registry for the manipulation-pattern detectors.
 * Each definition pairs a detector with its weight and the projection of
 * the per-symbol SignalContext onto that detector's narrow input.
 *
 * Purpose:
 * - Register detectors as independent signal sources
 * - Run every detector against one context
 * - Collect triggered signals with their weights
 */

import {
  ActiveSignal,
  DetectorResult,
  DetectorThresholds,
  DetectorType,
  LoggerService,
  SignalContext,
} from '../types';
import {
  detectAccumulationDistribution,
  detectFundingArbitrage,
  detectHiddenAccumulation,
  detectLiquidationSqueeze,
  detectLiquidityTrap,
  detectMomentumShift,
  detectRsiDivergence,
  detectTimeframeDivergenceSignal,
  detectVolumeExplosion,
} from '../analyzers/signal-detectors';
import { DEFAULT_HOURS_TO_FUNDING, DETECTOR_WEIGHTS } from '../constants';
import { createErrorLogObject } from '../utils/error.utils';

// ============================================================================
// TYPES
// ============================================================================

export interface DetectorDefinition {
  type: DetectorType;
  weight: number;
  evaluate: (context: SignalContext, thresholds: DetectorThresholds) => DetectorResult;
}

// ============================================================================
// DEFAULT DETECTORS
// ============================================================================

/**
 * The nine built-in detectors, weighted from the weights table
 */
export function createDefaultDetectors(
  weights: Record<DetectorType, number> = DETECTOR_WEIGHTS,
): DetectorDefinition[] {
  const define = (
    type: DetectorType,
    evaluate: DetectorDefinition['evaluate'],
  ): DetectorDefinition => ({ type, weight: weights[type], evaluate });

  return [
    define(DetectorType.VOLUME_EXPLOSION, ({ snapshot }, thresholds) =>
      detectVolumeExplosion(
        {
          spikeMagnitude: snapshot.volume.spikeMagnitude,
          change5m: snapshot.priceChange.change5m,
          volumeTrend: snapshot.volume.volumeTrend,
        },
        thresholds,
      ),
    ),
    define(DetectorType.RSI_DIVERGENCE, ({ snapshot }, thresholds) =>
      detectRsiDivergence({ rsi: snapshot.indicators.rsi14, change5m: snapshot.priceChange.change5m }, thresholds),
    ),
    define(DetectorType.MOMENTUM_SHIFT, ({ snapshot }) =>
      detectMomentumShift({
        change1m: snapshot.priceChange.change1m,
        change5m: snapshot.priceChange.change5m,
        spikeMagnitude: snapshot.volume.spikeMagnitude,
      }),
    ),
    define(DetectorType.LIQUIDITY_TRAP, ({ snapshot, orderBook }) =>
      detectLiquidityTrap({ change5m: snapshot.priceChange.change5m, orderBook }),
    ),
    define(DetectorType.ACCUMULATION, ({ snapshot, orderBook }) =>
      detectAccumulationDistribution({
        rsi: snapshot.indicators.rsi14,
        spikeMagnitude: snapshot.volume.spikeMagnitude,
        change5m: snapshot.priceChange.change5m,
        imbalanceRatio: orderBook ? orderBook.imbalanceRatio : null,
      }),
    ),
    define(DetectorType.LIQUIDATION_SQUEEZE, ({ snapshot, funding, liquidation }) =>
      detectLiquidationSqueeze({
        rsi: snapshot.indicators.rsi14,
        spikeMagnitude: snapshot.volume.spikeMagnitude,
        fundingRate: funding ? funding.rate : null,
        liquidation,
      }),
    ),
    define(DetectorType.FUNDING_ARBITRAGE, ({ snapshot, funding, orderBook }) =>
      detectFundingArbitrage({
        rsi: snapshot.indicators.rsi14,
        fundingRate: funding ? funding.rate : null,
        hoursToFunding: funding ? funding.hoursToFunding : DEFAULT_HOURS_TO_FUNDING,
        imbalanceRatio: orderBook ? orderBook.imbalanceRatio : null,
      }),
    ),
    define(DetectorType.HIDDEN_ACCUMULATION, ({ snapshot, statistics, funding }) =>
      detectHiddenAccumulation({
        rsi: snapshot.indicators.rsi14,
        volumeRatio5m: snapshot.volume.volumeRatio5m,
        change5m: snapshot.priceChange.change5m,
        volumeZScore: statistics?.zscore ? statistics.zscore.volumeZScore : 0,
        isOutlier: statistics?.zscore ? statistics.zscore.isOutlier : false,
        fundingRate: funding ? funding.rate : null,
      }),
    ),
    define(DetectorType.TIMEFRAME_DIVERGENCE, ({ snapshot, timeframeDivergence }) =>
      detectTimeframeDivergenceSignal({
        divergence: timeframeDivergence,
        spikeMagnitude: snapshot.volume.spikeMagnitude,
      }),
    ),
  ];
}

// ============================================================================
// DETECTOR REGISTRY
// ============================================================================

export class DetectorRegistry {
  private detectors: Map<DetectorType, DetectorDefinition> = new Map();

  constructor(private logger: LoggerService) {}

  /**
   * Register a detector (replaces an existing one of the same type)
   */
  register(detector: DetectorDefinition): void {
    this.detectors.set(detector.type, detector);
    this.logger.debug(`Detector registered: ${detector.type}`, {
      weight: detector.weight,
    });
  }

  registerBatch(detectors: DetectorDefinition[]): void {
    for (const detector of detectors) {
      this.register(detector);
    }
  }

  /**
   * Run every detector and collect the triggered ones.
   * A throwing detector is logged and counted as not triggered.
   */
  collectSignals(context: SignalContext, thresholds: DetectorThresholds): ActiveSignal[] {
    const signals: ActiveSignal[] = [];

    for (const detector of this.detectors.values()) {
      let result: DetectorResult;
      try {
        result = detector.evaluate(context, thresholds);
      } catch (error) {
        this.logger.error(`❌ DetectorError | ${detector.type}`, {
          symbol: context.snapshot.symbol,
          ...createErrorLogObject(error),
        });
        continue;
      }

      if (result.triggered && result.confidence > 0) {
        signals.push({
          type: detector.type,
          confidence: result.confidence,
          weight: detector.weight,
          description: result.description,
        });
      }
    }

    if (signals.length > 0) {
      this.logger.debug(`📊 ${context.snapshot.symbol} detectors triggered`, {
        triggered: signals.map((s) => s.type),
      });
    }

    return signals;
  }

  getDetectors(): DetectorDefinition[] {
    return Array.from(this.detectors.values());
  }

  getCount(): number {
    return this.detectors.size;
  }
}
