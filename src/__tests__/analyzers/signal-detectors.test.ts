/**
 * Signal Detectors Tests
 */

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
} from '../../analyzers/signal-detectors';
import { DEFAULT_DETECTOR_THRESHOLDS } from '../../constants';
import { CascadeDirection, TimeframeDivergenceType } from '../../types';

const thresholds = DEFAULT_DETECTOR_THRESHOLDS;

describe('Signal Detectors', () => {
  describe('detectVolumeExplosion', () => {
    it('should trigger on a spike confirmed by a price move', () => {
      const result = detectVolumeExplosion({ spikeMagnitude: 6, change5m: 4, volumeTrend: 1 }, thresholds);
      expect(result.triggered).toBe(true);
      expect(result.confidence).toBeCloseTo(0.6, 10);
      expect(result.description).toBe('Volume explosion 6.0x with +4.0% price move');
    });

    it('should cap confidence at 0.9', () => {
      expect(detectVolumeExplosion({ spikeMagnitude: 12, change5m: -5, volumeTrend: 1 }, thresholds).confidence).toBe(0.9);
    });

    it('should trigger on a sustained build-up without a price move', () => {
      const result = detectVolumeExplosion({ spikeMagnitude: 4, change5m: 0, volumeTrend: 2 }, thresholds);
      expect(result.confidence).toBe(0.7);
      expect(result.description).toBe('Sustained volume increase 4.0x');
    });

    it('should not trigger on a flat trend', () => {
      expect(detectVolumeExplosion({ spikeMagnitude: 4, change5m: 0, volumeTrend: 1 }, thresholds).triggered).toBe(false);
    });
  });

  describe('detectRsiDivergence', () => {
    it('should detect an oversold bounce setup', () => {
      const result = detectRsiDivergence({ rsi: 15, change5m: -2 }, thresholds);
      expect(result.confidence).toBe(0.5);
      expect(result.description).toBe('Bullish divergence: RSI 15 with price down -2.0%');
    });

    it('should detect overbought exhaustion', () => {
      expect(detectRsiDivergence({ rsi: 85, change5m: 2 }, thresholds).confidence).toBe(0.5);
    });

    it('should detect hidden bullish divergence', () => {
      const result = detectRsiDivergence({ rsi: 40, change5m: 3 }, thresholds);
      expect(result.confidence).toBe(0.6);
      expect(result.description).toBe('Hidden bullish divergence: RSI 40');
    });

    it('should not trigger without RSI', () => {
      expect(detectRsiDivergence({ rsi: null, change5m: -5 }, thresholds).triggered).toBe(false);
    });
  });

  describe('detectMomentumShift', () => {
    it('should detect an accelerating move with volume', () => {
      const result = detectMomentumShift({ change1m: 2, change5m: 2.5, spikeMagnitude: 3 });
      expect(result.confidence).toBeCloseTo(0.8, 10);
      expect(result.description).toBe('Momentum surge up: +2.0% in 1m');
    });

    it('should not report a surge without volume', () => {
      expect(detectMomentumShift({ change1m: 2, change5m: 2.5, spikeMagnitude: 1 }).triggered).toBe(false);
    });

    it('should detect a V-reversal', () => {
      const result = detectMomentumShift({ change1m: -1.5, change5m: 3, spikeMagnitude: 1 });
      expect(result.confidence).toBe(0.7);
      expect(result.description).toBe('V-reversal detected: +3.0% to -1.5%');
    });
  });

  describe('detectLiquidityTrap', () => {
    it('should not trigger without an order book', () => {
      expect(detectLiquidityTrap({ change5m: 5, orderBook: null }).triggered).toBe(false);
    });

    it('should trigger on a wide spread and thin book', () => {
      const result = detectLiquidityTrap({ change5m: 0, orderBook: { spreadBps: 60, liquidityScore: 0.2, spoofingScore: 0 } });
      expect(result.confidence).toBe(0.8);
      expect(result.description).toBe('Liquidity trap: 60bps spread, 0.20 liquidity');
    });

    it('should use the spoofing score during a move', () => {
      const result = detectLiquidityTrap({ change5m: 2, orderBook: { spreadBps: 10, liquidityScore: 0.8, spoofingScore: 0.7 } });
      expect(result.confidence).toBe(0.7);
    });
  });

  describe('detectAccumulationDistribution', () => {
    it('should detect accumulation', () => {
      expect(detectAccumulationDistribution({ rsi: 35, spikeMagnitude: 3, change5m: 0.5, imbalanceRatio: null }).confidence).toBe(0.7);
    });

    it('should detect distribution', () => {
      expect(detectAccumulationDistribution({ rsi: 75, spikeMagnitude: 3, change5m: -1, imbalanceRatio: null }).confidence).toBe(0.75);
    });

    it('should detect a bid-heavy book at low RSI', () => {
      const result = detectAccumulationDistribution({ rsi: 42, spikeMagnitude: 1, change5m: 0, imbalanceRatio: 2 });
      expect(result.confidence).toBe(0.65);
      expect(result.description).toBe('Smart accumulation: 2.0 bid/ask ratio');
    });

    it('should not trigger without RSI', () => {
      expect(detectAccumulationDistribution({ rsi: null, spikeMagnitude: 3, change5m: 0, imbalanceRatio: 2 }).triggered).toBe(false);
    });
  });

  describe('detectLiquidationSqueeze', () => {
    const liquidation = {
      longLiquidations1h: 80,
      shortLiquidations1h: 10,
      cascadeProbability: 0,
      cascadeDirection: CascadeDirection.NEUTRAL,
    };

    it('should detect the end of a short squeeze', () => {
      const result = detectLiquidationSqueeze({ rsi: 78, spikeMagnitude: 5, fundingRate: 0.0015, liquidation });
      expect(result.confidence).toBeCloseTo(0.2, 10);
      expect(result.description).toBe('Short squeeze ending: Funding 0.150%, RSI 78');
    });

    it('should detect the end of a long squeeze', () => {
      const result = detectLiquidationSqueeze({
        rsi: 20,
        spikeMagnitude: 4,
        fundingRate: -0.001,
        liquidation: { ...liquidation, longLiquidations1h: 10, shortLiquidations1h: 40 },
      });
      expect(result.confidence).toBeCloseTo(1 / 3, 10);
    });

    it('should still detect a cascade without RSI', () => {
      const result = detectLiquidationSqueeze({
        rsi: null,
        spikeMagnitude: 3,
        fundingRate: 0,
        liquidation: { ...liquidation, cascadeProbability: 0.8, cascadeDirection: CascadeDirection.DOWN },
      });
      expect(result.confidence).toBeCloseTo(0.64, 10);
      expect(result.description).toBe('Liquidation cascade 80% probability (DOWN)');
    });

    it('should not trigger without funding', () => {
      expect(detectLiquidationSqueeze({ rsi: 78, spikeMagnitude: 5, fundingRate: null, liquidation }).triggered).toBe(false);
    });
  });

  describe('detectFundingArbitrage', () => {
    it('should detect an RSI-confirmed short opportunity', () => {
      const result = detectFundingArbitrage({ rsi: 72, fundingRate: 0.0025, hoursToFunding: 0.5, imbalanceRatio: null });
      expect(result.confidence).toBeCloseTo(0.25, 10);
      expect(result.description).toBe('Funding SHORT: 0.250% (0.75% daily), 0.5h left');
    });

    it('should fall back to weak bids', () => {
      const result = detectFundingArbitrage({ rsi: 50, fundingRate: 0.0025, hoursToFunding: 0.5, imbalanceRatio: 0.5 });
      expect(result.confidence).toBe(0.6);
    });

    it('should detect a long opportunity', () => {
      const result = detectFundingArbitrage({ rsi: 30, fundingRate: -0.002, hoursToFunding: 1, imbalanceRatio: null });
      expect(result.confidence).toBeCloseTo(0.25, 10);
    });

    it('should ignore funding far from the funding time', () => {
      expect(detectFundingArbitrage({ rsi: 72, fundingRate: 0.0025, hoursToFunding: 5, imbalanceRatio: 0.5 }).triggered).toBe(false);
    });

    it('should ignore moderate funding', () => {
      expect(detectFundingArbitrage({ rsi: 72, fundingRate: 0.001, hoursToFunding: 0.5, imbalanceRatio: 0.5 }).triggered).toBe(false);
    });
  });

  describe('detectHiddenAccumulation', () => {
    const base = { rsi: 20, volumeRatio5m: 3, change5m: 0.5, volumeZScore: 3, isOutlier: true, fundingRate: null };

    it('should detect significant volume on a flat price', () => {
      expect(detectHiddenAccumulation(base).confidence).toBeCloseTo(15 / 35, 10);
    });

    it('should boost confidence on negative funding', () => {
      expect(detectHiddenAccumulation({ ...base, fundingRate: -0.001 }).confidence).toBeCloseTo((15 / 35) * 1.2, 10);
    });

    it('should detect hidden distribution', () => {
      const result = detectHiddenAccumulation({ ...base, rsi: 80, change5m: 0.2 });
      expect(result.confidence).toBeCloseTo(1 / 3, 10);
      expect(result.description).toBe('Hidden distribution: RSI 80, statistical outlier');
    });

    it('should not trigger while statistics are cold', () => {
      expect(detectHiddenAccumulation({ ...base, volumeZScore: 0 }).triggered).toBe(false);
    });
  });

  describe('detectTimeframeDivergenceSignal', () => {
    const divergence = { hasDivergence: true, type: TimeframeDivergenceType.BULLISH, strength: 2, trends: {} };

    it('should scale confidence by strength', () => {
      const result = detectTimeframeDivergenceSignal({ divergence, spikeMagnitude: 3 });
      expect(result.confidence).toBeCloseTo(0.6, 10);
      expect(result.description).toBe('Bullish TF divergence: 15m down, 1m up strongly');
    });

    it('should cap confidence at 0.7', () => {
      expect(detectTimeframeDivergenceSignal({ divergence: { ...divergence, strength: 5 }, spikeMagnitude: 3 }).confidence).toBe(0.7);
    });

    it('should require volume confirmation', () => {
      expect(detectTimeframeDivergenceSignal({ divergence, spikeMagnitude: 1 }).triggered).toBe(false);
    });

    it('should not trigger without a divergence', () => {
      expect(detectTimeframeDivergenceSignal({ divergence: null, spikeMagnitude: 3 }).triggered).toBe(false);
    });
  });
});
