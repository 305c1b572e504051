/**
 * Outcome Tracker Tests
 */

import { classifyOutcome, OutcomeTrackerService } from '../../services/outcome-tracker.service';
import { AlertPrioritizerService } from '../../services/alert-prioritizer.service';
import { AlertOutcome, SignalAction } from '../../types';
import {
  createCandidate,
  createCompositeSignal,
  createMockLogger,
  InMemorySignalStore,
  TestClock,
} from '../helpers/test-data.helper';

const MINUTE = 60_000;

describe('OutcomeTrackerService', () => {
  describe('classifyOutcome', () => {
    it('should grade long actions on a rise', () => {
      expect(classifyOutcome(SignalAction.BUY, 100, 102)).toEqual({ outcome: AlertOutcome.SUCCESS, movePct: 2 });
      expect(classifyOutcome(SignalAction.FUNDING_LONG, 100, 98)).toEqual({ outcome: AlertOutcome.FAILURE, movePct: -2 });
    });

    it('should grade every other action on a drop', () => {
      expect(classifyOutcome(SignalAction.SELL, 100, 102).outcome).toBe(AlertOutcome.FAILURE);
      expect(classifyOutcome(SignalAction.FUNDING_SHORT, 100, 98).outcome).toBe(AlertOutcome.SUCCESS);
      expect(classifyOutcome(SignalAction.WATCH, 100, 98).outcome).toBe(AlertOutcome.SUCCESS);
    });

    it('should call small moves neutral', () => {
      expect(classifyOutcome(SignalAction.BUY, 100, 100.5)).toEqual({ outcome: AlertOutcome.NEUTRAL, movePct: 0.5 });
    });
  });

  describe('checkOutcomes', () => {
    let clock: TestClock;
    let store: InMemorySignalStore;
    let prioritizer: AlertPrioritizerService;
    let tracker: OutcomeTrackerService;

    beforeEach(() => {
      clock = new TestClock();
      store = new InMemorySignalStore();
      prioritizer = new AlertPrioritizerService(createMockLogger(), store, clock.now);
      tracker = new OutcomeTrackerService(createMockLogger(), prioritizer, { evaluationMs: 60 * MINUTE }, clock.now);
    });

    it('should wait for the evaluation window', async () => {
      tracker.track(createCandidate(), clock.current);
      clock.advance(30 * MINUTE);

      expect(await tracker.checkOutcomes(new Map([['TEST_USDT', 110]]))).toBe(0);
      expect(tracker.getPendingCount()).toBe(1);
    });

    it('should grade expired alerts and feed the prioritizer', async () => {
      const candidate = createCandidate();
      await prioritizer.recordSent(candidate);
      tracker.track(candidate, clock.current);
      const sentAt = clock.current;
      clock.advance(61 * MINUTE);

      expect(await tracker.checkOutcomes(new Map([['TEST_USDT', 102]]))).toBe(1);
      expect(tracker.getPendingCount()).toBe(0);
      expect(prioritizer.getPerformance('TEST_USDT')?.successfulAlerts).toBe(1);
      expect(store.outcomes).toEqual([
        { symbol: 'TEST_USDT', alertTime: sentAt, outcomeTime: clock.current, outcome: AlertOutcome.SUCCESS, movePct: 2 },
      ]);
    });

    it('should grade against the entry price when no fresh price exists', async () => {
      tracker.track(createCandidate({ signal: createCompositeSignal({ action: SignalAction.SELL }) }), clock.current);
      clock.advance(61 * MINUTE);

      await tracker.checkOutcomes(new Map());
      expect(store.outcomes[0].outcome).toBe(AlertOutcome.NEUTRAL);
      expect(store.outcomes[0].movePct).toBe(0);
    });

    it('should track alerts of one symbol separately', async () => {
      const first = clock.current;
      tracker.track(createCandidate(), first);
      tracker.track(createCandidate(), first + MINUTE);
      expect(tracker.getPendingCount()).toBe(2);

      clock.advance(62 * MINUTE);
      const graded = await tracker.checkOutcomes(new Map());

      expect(graded).toBe(2);
      expect(store.outcomes.map((o) => o.alertTime)).toEqual([first, first + MINUTE]);
      expect(tracker.getPendingCount()).toBe(0);
    });
  });
});
