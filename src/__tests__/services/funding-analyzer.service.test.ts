/**
 * Funding Analyzer Tests
 */

import {
  calculateArbitrageScore,
  calculateFundingTrend,
  FundingAnalyzerService,
  getFavorablePosition,
  getHoursToFunding,
} from '../../services/funding-analyzer.service';
import { FavorablePosition, FundingTrend, RawFundingRate } from '../../types';
import { createMockLogger, FakeMarketDataSource, TestClock } from '../helpers/test-data.helper';

const AT_0630 = Date.UTC(2024, 0, 1, 6, 30);

function rate(symbol: string, value: number): RawFundingRate {
  return { symbol, rate: value, maxRate: 0.003, timestamp: AT_0630 };
}

describe('FundingAnalyzerService', () => {
  describe('getHoursToFunding', () => {
    it('should count down to the next 00/08/16 UTC settlement', () => {
      expect(getHoursToFunding(AT_0630)).toBe(1.5);
      expect(getHoursToFunding(Date.UTC(2024, 0, 1, 8, 0))).toBe(8);
      expect(getHoursToFunding(Date.UTC(2024, 0, 1, 17, 0))).toBe(7);
    });
  });

  describe('getFavorablePosition', () => {
    it('should map the sign of the rate to the collecting side', () => {
      expect(getFavorablePosition(0.001)).toBe(FavorablePosition.SHORT);
      expect(getFavorablePosition(-0.001)).toBe(FavorablePosition.LONG);
      expect(getFavorablePosition(0)).toBe(FavorablePosition.NEUTRAL);
    });
  });

  describe('calculateFundingTrend', () => {
    it('should be UNKNOWN with fewer than 3 readings', () => {
      expect(calculateFundingTrend([0.001, 0.001]).trend).toBe(FundingTrend.UNKNOWN);
    });

    it('should be STABLE without older readings', () => {
      expect(calculateFundingTrend([0.001, 0.001, 0.001]).trend).toBe(FundingTrend.STABLE);
    });

    it('should detect an increasing rate', () => {
      const stats = calculateFundingTrend([0.003, 0.003, 0.003, 0.001, 0.001, 0.001]);
      expect(stats.trend).toBe(FundingTrend.INCREASING);
      expect(stats.avg24h).toBe(0.002);
      expect(stats.rateVsAverage).toBe(50);
    });

    it('should detect a decreasing rate', () => {
      expect(calculateFundingTrend([0.001, 0.001, 0.001, 0.003, 0.003, 0.003]).trend).toBe(FundingTrend.DECREASING);
    });
  });

  describe('calculateArbitrageScore', () => {
    it('should cap at 1', () => {
      expect(calculateArbitrageScore(0.002, 0.5, 75)).toBe(1);
    });

    it('should scale with rate alone in the neutral time band', () => {
      expect(calculateArbitrageScore(0.001, 5, null)).toBe(0.5);
    });

    it('should penalise a distant settlement and a contradicting RSI', () => {
      expect(calculateArbitrageScore(0.001, 7, 20)).toBe(0.28);
    });

    it('should reward an RSI that confirms a long', () => {
      expect(calculateArbitrageScore(-0.001, 5, 20)).toBe(0.65);
    });
  });

  describe('analyze', () => {
    let source: FakeMarketDataSource;
    let clock: TestClock;
    let analyzer: FundingAnalyzerService;

    beforeEach(() => {
      source = new FakeMarketDataSource();
      clock = new TestClock(AT_0630);
      analyzer = new FundingAnalyzerService(source, createMockLogger(), { cacheTimeMs: 60_000 }, clock.now);
    });

    it('should build the funding state from a fresh rate', async () => {
      source.funding = (symbol) => ({ ok: true, value: rate(symbol, 0.001) });
      const state = await analyzer.analyze('TEST_USDT', null);

      expect(state).toEqual({
        symbol: 'TEST_USDT',
        timestamp: AT_0630,
        rate: 0.001,
        hoursToFunding: 1.5,
        trend: FundingTrend.UNKNOWN,
        avg24h: 0,
        rateVsAverage: 0,
        arbitrageScore: 0.65,
        favorablePosition: FavorablePosition.SHORT,
        stale: false,
      });
    });

    it('should serve cached rates until they expire', async () => {
      source.funding = (symbol) => ({ ok: true, value: rate(symbol, 0.001) });

      await analyzer.analyze('TEST_USDT', null);
      clock.advance(30_000);
      await analyzer.analyze('TEST_USDT', null);
      expect(source.calls.funding).toBe(1);

      clock.advance(60_000);
      await analyzer.analyze('TEST_USDT', null);
      expect(source.calls.funding).toBe(2);
    });

    it('should return a stale zero-state when the fetch fails', async () => {
      source.funding = () => ({ ok: false, reason: 'ERROR', error: 'timeout' });
      const state = await analyzer.analyze('TEST_USDT', 80);

      expect(state.stale).toBe(true);
      expect(state.rate).toBe(0);
      expect(state.hoursToFunding).toBe(8);
      expect(state.favorablePosition).toBe(FavorablePosition.NEUTRAL);
      expect(state.arbitrageScore).toBe(0);
    });

    it('should list extreme pairs by magnitude', async () => {
      const rates: Record<string, number> = { A_USDT: 0.001, B_USDT: -0.003, C_USDT: 0.002 };
      source.funding = (symbol) => ({ ok: true, value: rate(symbol, rates[symbol]) });

      const pairs = await analyzer.getExtremeFundingPairs(['A_USDT', 'B_USDT', 'C_USDT'], 0.0015);

      expect(pairs.map((p) => p.symbol)).toEqual(['B_USDT', 'C_USDT']);
      expect(pairs[0].dailyRate).toBeCloseTo(-0.009, 10);
      expect(pairs[0].hoursToFunding).toBe(1.5);
    });
  });
});
