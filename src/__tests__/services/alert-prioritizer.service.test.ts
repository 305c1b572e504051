/**
 * Alert Prioritizer Tests
 */

import { AlertPrioritizerService } from '../../services/alert-prioritizer.service';
import {
  AlertOutcome,
  BtcTrend,
  CascadeDirection,
  LiquidationRisk,
  LiquidationState,
  MarketContext,
  MarketRegime,
  RiskLevel,
  SignalAction,
  StatisticalAnalysis,
} from '../../types';
import {
  createCandidate,
  createCompositeSignal,
  createFundingState,
  createMockLogger,
  InMemorySignalStore,
  TestClock,
} from '../helpers/test-data.helper';

const MINUTE = 60_000;

function market(btcTrend: BtcTrend): MarketContext {
  return { btcTrend, totalSymbols: 6, activeSymbols: 6 };
}

function outlierStatistics(volumeZScore: number): StatisticalAnalysis {
  return {
    symbol: 'TEST_USDT',
    sampleCount: 200,
    volumePercentile: 50,
    zscore: {
      volumeZScore,
      priceZScore: 0,
      isOutlier: volumeZScore > 3,
      confidenceMultiplier: 1,
      volumeMean24h: 0,
      volumeStd24h: 0,
      priceChangeMean24h: 0,
      priceChangeStd24h: 0,
    },
    regime: MarketRegime.MIXED,
    regimeDetails: null,
    dynamicThreshold: 0.7,
    statisticalSignificance: volumeZScore > 3,
  };
}

function liquidation(cascadeProbability: number): LiquidationState {
  return {
    symbol: 'TEST_USDT',
    timestamp: 0,
    longLiquidations1h: 0,
    shortLiquidations1h: 0,
    totalLiquidations1h: 0,
    liquidationRatio: 1,
    estimated: true,
    cascadeProbability,
    cascadeDirection: CascadeDirection.DOWN,
    nearestLiquidationZone: null,
    riskLevel: LiquidationRisk.EXTREME,
  };
}

/**
 * Deterministic pseudo-random sequence in [0, 1)
 */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

describe('AlertPrioritizerService', () => {
  let clock: TestClock;
  let store: InMemorySignalStore;
  let prioritizer: AlertPrioritizerService;

  beforeEach(() => {
    clock = new TestClock();
    store = new InMemorySignalStore();
    prioritizer = new AlertPrioritizerService(createMockLogger(), store, clock.now);
  });

  describe('calculatePriority', () => {
    it('should reward a symbol that has not alerted recently', () => {
      // 0.8 * (1 + 0.2)
      expect(prioritizer.calculatePriority(createCandidate())).toBe(0.96);
    });

    it('should drop the freshness bonus after an alert', async () => {
      await prioritizer.recordSent(createCandidate());
      expect(prioritizer.calculatePriority(createCandidate())).toBe(0.8);
    });

    it('should add statistical extremity', () => {
      const candidate = createCandidate({ statistics: outlierStatistics(5) });
      // 0.2 fresh + 0.3 volume Z + 0.1 outlier
      expect(prioritizer.calculatePriority(candidate)).toBe(1.28);
    });

    it('should add funding magnitude for funding actions only', () => {
      const funding = createFundingState({ rate: 0.0025 });
      const fundingPlay = createCandidate({
        signal: createCompositeSignal({ action: SignalAction.FUNDING_SHORT }),
        funding,
      });

      expect(prioritizer.calculatePriority(fundingPlay)).toBe(1.2);
      expect(prioritizer.calculatePriority(createCandidate({ funding }))).toBe(0.96);
    });

    it('should add cascade risk and confluence', () => {
      expect(prioritizer.calculatePriority(createCandidate({ liquidation: liquidation(0.85) }))).toBe(1.2);
      expect(prioritizer.calculatePriority(createCandidate({ signal: createCompositeSignal({ numSignals: 4 }) }))).toBe(1.12);
    });

    it('should penalise buying into a strong BTC drop', () => {
      expect(prioritizer.calculatePriority(createCandidate(), market(BtcTrend.STRONG_DOWN))).toBe(0.8);
      const sell = createCandidate({ signal: createCompositeSignal({ action: SignalAction.SELL }) });
      expect(prioritizer.calculatePriority(sell, market(BtcTrend.STRONG_DOWN))).toBe(0.96);
      expect(prioritizer.calculatePriority(sell, market(BtcTrend.STRONG_UP))).toBe(0.8);
    });

    it('should penalise recent failures', async () => {
      for (let i = 0; i < 3; i++) {
        await prioritizer.trackOutcome('TEST_USDT', clock.current - i * MINUTE, AlertOutcome.FAILURE, -2);
      }
      // 0.2 fresh - 0.4 failures
      expect(prioritizer.calculatePriority(createCandidate())).toBe(0.64);
    });

    it('should clamp to the priority bounds', () => {
      const hot = createCandidate({
        signal: createCompositeSignal({ confidence: 1, numSignals: 5, action: SignalAction.FUNDING_LONG }),
        statistics: outlierStatistics(5),
        funding: createFundingState({ rate: -0.003 }),
        liquidation: liquidation(0.9),
      });
      const cold = createCandidate({ signal: createCompositeSignal({ confidence: 0.05 }) });

      expect(prioritizer.calculatePriority(hot)).toBe(1.5);
      expect(prioritizer.calculatePriority(cold)).toBe(0.1);
    });

    it('should stay within [0.1, 1.5] for arbitrary inputs', async () => {
      const random = lcg(42);
      const actions = Object.values(SignalAction);
      const trends = Object.values(BtcTrend);

      for (let i = 0; i < 3; i++) {
        await prioritizer.trackOutcome('TEST_USDT', clock.current, AlertOutcome.FAILURE, -1);
      }

      for (let i = 0; i < 10_000; i++) {
        const candidate = createCandidate({
          signal: createCompositeSignal({
            confidence: random() * 1.5 - 0.25,
            numSignals: Math.floor(random() * 10),
            action: actions[Math.floor(random() * actions.length)],
          }),
          statistics: random() < 0.5 ? outlierStatistics(random() * 8 - 2) : null,
          funding: random() < 0.5 ? createFundingState({ rate: random() * 0.01 - 0.005 }) : null,
          liquidation: random() < 0.5 ? liquidation(random()) : null,
          symbol: random() < 0.5 ? 'TEST_USDT' : 'OTHER_USDT',
        });
        const priority = prioritizer.calculatePriority(candidate, market(trends[Math.floor(random() * trends.length)]));

        expect(priority).toBeGreaterThanOrEqual(0.1);
        expect(priority).toBeLessThanOrEqual(1.5);
      }
    });
  });

  describe('shouldSend', () => {
    it('should gate on the dynamic threshold', () => {
      const candidate = createCandidate();
      expect(prioritizer.shouldSend(candidate, 0.75, 0.7)).toBe(true);
      expect(prioritizer.shouldSend(candidate, 0.65, 0.7)).toBe(false);
    });

    it('should require 1.5x the threshold during a cooldown', async () => {
      const candidate = createCandidate();
      await prioritizer.recordSent(candidate);

      expect(prioritizer.isInCooldown('TEST_USDT')).toBe(true);
      expect(prioritizer.shouldSend(candidate, 0.9, 0.7)).toBe(false);
      expect(prioritizer.shouldSend(candidate, 1.1, 0.7)).toBe(true);

      clock.advance(5 * MINUTE);
      expect(prioritizer.isInCooldown('TEST_USDT')).toBe(false);
      expect(prioritizer.shouldSend(candidate, 0.75, 0.7)).toBe(true);
    });

    it('should let urgent EXTREME alerts through a cooldown', async () => {
      const extreme = createCandidate({ signal: createCompositeSignal({ riskLevel: RiskLevel.EXTREME }) });
      await prioritizer.recordSent(extreme);

      expect(prioritizer.getCooldownExpiry('TEST_USDT')).toBe(clock.current + 3 * MINUTE);
      expect(prioritizer.shouldSend(extreme, 0.95, 0.7)).toBe(true);
      expect(prioritizer.shouldSend(extreme, 0.9, 0.7)).toBe(false);
    });

    it('should only send funding plays close to settlement', () => {
      const signal = createCompositeSignal({ action: SignalAction.FUNDING_SHORT });

      expect(prioritizer.shouldSend(createCandidate({ signal, funding: createFundingState({ hoursToFunding: 1 }) }), 0.8)).toBe(true);
      expect(prioritizer.shouldSend(createCandidate({ signal, funding: createFundingState({ hoursToFunding: 3 }) }), 0.8)).toBe(false);
      expect(prioritizer.shouldSend(createCandidate({ signal, funding: null }), 0.8)).toBe(false);
    });
  });

  describe('history and performance', () => {
    it('should record sends and persist them', async () => {
      await prioritizer.recordSent(createCandidate());

      expect(store.alerts).toHaveLength(1);
      expect(store.alerts[0].sentAt).toBe(clock.current);
      expect(prioritizer.getStatistics('TEST_USDT')).toEqual({
        symbol: 'TEST_USDT',
        totalAlerts: 1,
        winRate: 0.5,
        lastAlert: clock.current,
        recentAlertCount: 1,
      });
    });

    it('should keep the last 10 alerts', async () => {
      for (let i = 0; i < 12; i++) {
        await prioritizer.recordSent(createCandidate());
        clock.advance(MINUTE);
      }
      expect(prioritizer.getRecentAlerts('TEST_USDT')).toHaveLength(10);
    });

    it('should derive the win rate from outcomes', async () => {
      await prioritizer.recordSent(createCandidate());
      await prioritizer.recordSent(createCandidate({ symbol: 'OTHER_USDT' }));
      await prioritizer.trackOutcome('TEST_USDT', clock.current, AlertOutcome.SUCCESS, 2.5);

      expect(prioritizer.getPerformance('TEST_USDT')?.winRate).toBe(1);
      expect(store.outcomes).toEqual([
        { symbol: 'TEST_USDT', alertTime: clock.current, outcomeTime: clock.current, outcome: AlertOutcome.SUCCESS, movePct: 2.5 },
      ]);
      expect(prioritizer.getStatistics()).toEqual({
        totalSymbols: 2,
        totalAlertsSent: 2,
        globalWinRate: 0.5,
        activeCooldowns: 2,
      });

      clock.advance(10 * MINUTE);
      expect(prioritizer.getStatistics().activeCooldowns).toBe(0);
    });

    it('should restore recent performance from the store', async () => {
      await store.upsertPerformance(
        { symbol: 'TEST_USDT', totalAlerts: 10, successfulAlerts: 8, winRate: 0.8, lastAlertTime: null, recentFailures: [] },
        clock.current - MINUTE,
      );
      await store.upsertPerformance(
        { symbol: 'OLD_USDT', totalAlerts: 3, successfulAlerts: 0, winRate: 0, lastAlertTime: null, recentFailures: [] },
        clock.current - 31 * 24 * 60 * MINUTE,
      );

      expect(await prioritizer.loadPerformance()).toBe(1);
      // 0.2 win rate + 0.2 fresh
      expect(prioritizer.calculatePriority(createCandidate())).toBe(1.12);
      expect(prioritizer.getPerformance('OLD_USDT')).toBeUndefined();
    });

    it('should keep alerting when the store fails', async () => {
      store.failWrites = true;
      await expect(prioritizer.recordSent(createCandidate())).resolves.toBeUndefined();
      await expect(prioritizer.trackOutcome('TEST_USDT', clock.current, AlertOutcome.NEUTRAL)).resolves.toBeUndefined();
      expect(prioritizer.getStatistics('TEST_USDT').totalAlerts).toBe(1);
    });
  });
});
