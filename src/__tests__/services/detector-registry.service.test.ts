/**
 * Detector Registry Tests
 */

import { createDefaultDetectors, DetectorRegistry } from '../../services/detector-registry.service';
import { DEFAULT_DETECTOR_THRESHOLDS } from '../../constants';
import { DetectorType, SignalContext } from '../../types';
import { createMockLogger, createSnapshot } from '../helpers/test-data.helper';

function context(overrides: Partial<SignalContext> = {}): SignalContext {
  return {
    snapshot: createSnapshot(),
    orderBook: null,
    funding: null,
    liquidation: null,
    statistics: null,
    timeframeDivergence: null,
    ...overrides,
  };
}

describe('DetectorRegistry', () => {
  let registry: DetectorRegistry;

  beforeEach(() => {
    registry = new DetectorRegistry(createMockLogger());
    registry.registerBatch(createDefaultDetectors());
  });

  it('should register all nine detectors with weights summing to 1', () => {
    const totalWeight = registry.getDetectors().reduce((sum, d) => sum + d.weight, 0);

    expect(registry.getCount()).toBe(9);
    expect(totalWeight).toBeCloseTo(1, 10);
  });

  it('should collect nothing on a quiet market', () => {
    expect(registry.collectSignals(context(), DEFAULT_DETECTOR_THRESHOLDS)).toEqual([]);
  });

  it('should collect a triggered detector with its weight', () => {
    const snapshot = createSnapshot({ volume: { spikeMagnitude: 6 }, priceChange: { change5m: 4 } });
    const signals = registry.collectSignals(context({ snapshot }), DEFAULT_DETECTOR_THRESHOLDS);

    expect(signals).toHaveLength(1);
    expect(signals[0].type).toBe(DetectorType.VOLUME_EXPLOSION);
    expect(signals[0].weight).toBe(0.2);
    expect(signals[0].confidence).toBeCloseTo(0.6, 10);
  });

  it('should replace a detector registered under the same type', () => {
    registry.register({
      type: DetectorType.VOLUME_EXPLOSION,
      weight: 0.5,
      evaluate: () => ({ triggered: true, confidence: 0.4, description: 'replacement' }),
    });

    const signals = registry.collectSignals(context(), DEFAULT_DETECTOR_THRESHOLDS);

    expect(registry.getCount()).toBe(9);
    expect(signals).toEqual([
      { type: DetectorType.VOLUME_EXPLOSION, confidence: 0.4, weight: 0.5, description: 'replacement' },
    ]);
  });

  it('should treat a throwing detector as not triggered', () => {
    registry.register({
      type: DetectorType.MOMENTUM_SHIFT,
      weight: 0.1,
      evaluate: () => {
        throw new Error('broken detector');
      },
    });

    expect(registry.collectSignals(context(), DEFAULT_DETECTOR_THRESHOLDS)).toEqual([]);
    expect(registry.getCount()).toBe(9);
  });

  it('should feed cold statistics to the hidden accumulation detector as zero', () => {
    const snapshot = createSnapshot({ volume: { volumeRatio5m: 3 }, indicators: { rsi14: 20 } });
    const signals = registry.collectSignals(context({ snapshot }), DEFAULT_DETECTOR_THRESHOLDS);

    expect(signals.map((s) => s.type)).not.toContain(DetectorType.HIDDEN_ACCUMULATION);
  });
});
