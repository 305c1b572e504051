/**
 * Signal action helpers
 */

import { SignalAction } from '../types';

const FUNDING_ACTIONS: ReadonlySet<SignalAction> = new Set([SignalAction.FUNDING_LONG, SignalAction.FUNDING_SHORT]);
const LONG_ACTIONS: ReadonlySet<SignalAction> = new Set([SignalAction.BUY, SignalAction.STRONG_BUY, SignalAction.FUNDING_LONG]);

export function isFundingAction(action: SignalAction): boolean {
  return FUNDING_ACTIONS.has(action);
}

/**
 * BUY, STRONG_BUY and FUNDING_LONG
 */
export function isLongAction(action: SignalAction): boolean {
  return LONG_ACTIONS.has(action);
}
