/**
 * Monitor Orchestrator Tests
 *
 * Full cycles against in-process market data, notifier and store.
 * A "pump" symbol ends 20 flat minutes with a +5% candle on 10x volume:
 * volume explosion, RSI exhaustion and momentum surge fire together
 * (STRONG_BUY, EXTREME, weighted confidence 0.375).
 */

import { chunk, classifyBtcTrend, MonitorOrchestrator } from '../../orchestrators/monitor.orchestrator';
import { AlertOutcome, BtcTrend, Candle, FetchResult, MonitorProfile, MonitorSettings, SignalAction } from '../../types';
import { DEFAULT_DETECTOR_THRESHOLDS, TIME_UNITS } from '../../constants';
import {
  createCandleSeries,
  createMockLogger,
  createMonitorSettings,
  createProfile,
  FakeMarketDataSource,
  InMemorySignalStore,
  RecordingNotifier,
  TestClock,
} from '../helpers/test-data.helper';

const FLAT = 20;

function pumpCandles(): FetchResult<Candle[]> {
  const closes = [...Array<number>(FLAT).fill(100), 105];
  const volumes = [...Array<number>(FLAT).fill(1000), 10000];
  return { ok: true, value: createCandleSeries(closes, volumes) };
}

function flatCandles(price: number): FetchResult<Candle[]> {
  return { ok: true, value: createCandleSeries(Array<number>(FLAT + 1).fill(price)) };
}

describe('MonitorOrchestrator', () => {
  let source: FakeMarketDataSource;
  let notifier: RecordingNotifier;
  let store: InMemorySignalStore;
  let clock: TestClock;

  const profile = createProfile({ thresholds: { ...DEFAULT_DETECTOR_THRESHOLDS, confidenceThreshold: 0.3 } });

  function createMonitor(settings: MonitorSettings, monitorProfile: MonitorProfile = profile): MonitorOrchestrator {
    return new MonitorOrchestrator(settings, monitorProfile, createMockLogger(), {
      source,
      notifier,
      store,
      now: clock.now,
    });
  }

  beforeEach(() => {
    source = new FakeMarketDataSource();
    notifier = new RecordingNotifier();
    store = new InMemorySignalStore();
    clock = new TestClock();
  });

  describe('helpers', () => {
    it('should bucket the BTC 5m change', () => {
      expect(classifyBtcTrend(2.5)).toBe(BtcTrend.STRONG_UP);
      expect(classifyBtcTrend(1)).toBe(BtcTrend.UP);
      expect(classifyBtcTrend(0.5)).toBe(BtcTrend.NEUTRAL);
      expect(classifyBtcTrend(-1)).toBe(BtcTrend.DOWN);
      expect(classifyBtcTrend(-2)).toBe(BtcTrend.DOWN);
      expect(classifyBtcTrend(-3)).toBe(BtcTrend.STRONG_DOWN);
    });

    it('should split into chunks', () => {
      expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
      expect(chunk(['a', 'b'], 0)).toEqual([['a'], ['b']]);
      expect(chunk([], 5)).toEqual([]);
    });
  });

  describe('runCycle', () => {
    it('should send a pump alert and stay quiet on a flat market', async () => {
      source.candles = (symbol) => (symbol === 'PUMP_USDT' ? pumpCandles() : flatCandles(100));
      const monitor = createMonitor(createMonitorSettings({ symbols: ['PUMP_USDT', 'FLAT_USDT'] }));

      const summary = await monitor.runCycle();

      expect(summary).toEqual({ processed: 2, failed: 0, candidates: 1, sent: 1, deferred: 0, durationMs: 0 });
      expect(notifier.messages).toHaveLength(1);
      expect(notifier.messages[0].split('\n')[0]).toContain(' - PUMP_USDT</b>');

      expect(store.alerts).toHaveLength(1);
      expect(store.alerts[0].candidate.signal.action).toBe(SignalAction.STRONG_BUY);
      expect(store.alerts[0].candidate.priority).toBeCloseTo(0.4875, 2);
      expect(store.alerts[0].candidate.recentCloses).toHaveLength(20);

      expect(store.snapshots.map((s) => s.symbol).sort()).toEqual(['FLAT_USDT', 'PUMP_USDT']);
      expect(store.signals.map((s) => s.symbol)).toEqual(['PUMP_USDT']);
    });

    it('should score without funding when the funding fetch fails', async () => {
      source.candles = () => pumpCandles();
      const fundingProfile = createProfile({ ...profile, enableFunding: true });
      const monitor = createMonitor(createMonitorSettings({ symbols: ['PUMP_USDT'] }), fundingProfile);

      const summary = await monitor.runCycle();

      expect(source.calls.funding).toBe(1);
      expect(summary.sent).toBe(1);
      expect(store.alerts[0].candidate.funding).toBeNull();
      expect(store.alerts[0].candidate.priority).toBeCloseTo(0.4875, 2);
      expect(store.funding).toEqual([]);
    });

    it('should deliver at most maxAlertsPerCycle alerts', async () => {
      const symbols = ['A_USDT', 'B_USDT', 'C_USDT', 'D_USDT', 'E_USDT', 'F_USDT', 'G_USDT'];
      source.candles = () => pumpCandles();
      const monitor = createMonitor(createMonitorSettings({ symbols }));

      const summary = await monitor.runCycle();

      expect(summary).toEqual({ processed: 7, failed: 0, candidates: 7, sent: 5, deferred: 2, durationMs: 0 });
      expect(notifier.messages).toHaveLength(5);
    });

    it('should count failing symbols without aborting the batch', async () => {
      source.candles = (symbol) => {
        if (symbol === 'BROKEN_USDT') {
          throw new Error('socket hang up');
        }
        if (symbol === 'EMPTY_USDT') {
          return { ok: false, reason: 'EMPTY' };
        }
        return pumpCandles();
      };
      const monitor = createMonitor(createMonitorSettings({ symbols: ['BROKEN_USDT', 'EMPTY_USDT', 'PUMP_USDT'] }));

      const summary = await monitor.runCycle();

      expect(summary.processed).toBe(1);
      expect(summary.failed).toBe(2);
      expect(summary.sent).toBe(1);
    });

    it('should leave cooldown and history untouched when delivery fails', async () => {
      source.candles = () => pumpCandles();
      notifier.succeed = false;
      const monitor = createMonitor(createMonitorSettings({ symbols: ['PUMP_USDT'] }));

      const summary = await monitor.runCycle();

      expect(summary.candidates).toBe(1);
      expect(summary.sent).toBe(0);
      expect(store.alerts).toEqual([]);

      // no cooldown and no recent alert: the next cycle proposes it again
      clock.advance(10 * TIME_UNITS.SECOND);
      const retry = await monitor.runCycle();
      expect(retry.candidates).toBe(1);

      clock.advance(61 * TIME_UNITS.MINUTE);
      await monitor.checkOutcomes();
      expect(store.outcomes).toEqual([]);
    });

    it('should keep alerting when the store fails', async () => {
      source.candles = () => pumpCandles();
      store.failWrites = true;
      const monitor = createMonitor(createMonitorSettings({ symbols: ['PUMP_USDT'] }));

      const summary = await monitor.runCycle();

      expect(summary.sent).toBe(1);
      expect(notifier.messages).toHaveLength(1);
    });

    it('should block a repeat alert inside the cooldown and allow it after', async () => {
      source.candles = () => pumpCandles();
      const monitor = createMonitor(createMonitorSettings({ symbols: ['PUMP_USDT'] }));

      await monitor.runCycle();

      // one recent alert drops the frequency bonus: 0.375 × 1.1 < 1.5 × 0.3
      clock.advance(10 * TIME_UNITS.SECOND);
      const blocked = await monitor.runCycle();
      expect(blocked.candidates).toBe(0);

      clock.advance(4 * TIME_UNITS.MINUTE);
      const allowed = await monitor.runCycle();
      expect(allowed.sent).toBe(1);
      expect(notifier.messages).toHaveLength(2);
    });
  });

  describe('market context', () => {
    it('should derive the BTC trend from the previous cycle', async () => {
      source.candles = () => pumpCandles();
      const monitor = createMonitor(createMonitorSettings({ symbols: ['BTC_USDT'] }));

      expect(monitor.getMarketContext()).toEqual({ btcTrend: BtcTrend.NEUTRAL, totalSymbols: 1, activeSymbols: 0 });

      await monitor.runCycle();

      expect(monitor.getMarketContext()).toEqual({ btcTrend: BtcTrend.STRONG_UP, totalSymbols: 1, activeSymbols: 1 });
      expect(monitor.buildSummary().biggestMovers).toEqual([{ symbol: 'BTC_USDT', change: 5 }]);
    });
  });

  describe('runPeriodicTasks', () => {
    it('should grade alerts and send the summary when due', async () => {
      source.candles = () => pumpCandles();
      const monitor = createMonitor(createMonitorSettings({ symbols: ['PUMP_USDT'] }));
      await monitor.runCycle();
      const alertTime = clock.current;

      clock.advance(61 * TIME_UNITS.MINUTE);
      source.candles = () => flatCandles(107);
      await monitor.runCycle();
      await monitor.runPeriodicTasks();

      expect(store.outcomes).toEqual([
        {
          symbol: 'PUMP_USDT',
          alertTime,
          outcomeTime: clock.current,
          outcome: AlertOutcome.SUCCESS,
          movePct: 1.9,
        },
      ]);
      expect(monitor.buildSummary().globalWinRate).toBe(1);

      expect(notifier.messages).toHaveLength(2);
      const summaryLines = notifier.messages[1].split('\n');
      expect(summaryLines[0]).toBe('<b>📊 1H Summary Report</b>');
      expect(summaryLines).toContain('• Alerts sent: 1');
      expect(summaryLines).toContain('• Win rate: 100.0%');
    });

    it('should do nothing before anything is due', async () => {
      const monitor = createMonitor(createMonitorSettings());

      await monitor.runPeriodicTasks();

      expect(notifier.messages).toEqual([]);
      expect(store.outcomes).toEqual([]);
    });
  });

  describe('start / stop', () => {
    it('should announce startup and exit after stop', async () => {
      const monitor = createMonitor(createMonitorSettings({ symbols: ['FLAT_USDT'] }));
      source.candles = () => {
        monitor.stop();
        return flatCandles(100);
      };

      await monitor.start();

      expect(monitor.isRunning()).toBe(false);
      expect(source.calls.candles).toBe(1);
      expect(notifier.messages).toHaveLength(1);
      expect(notifier.messages[0].split('\n')[0]).toBe('<b>🚀 Manipulation Monitor Started</b>');
    });
  });
});
