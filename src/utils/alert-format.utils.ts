/**
 * Alert Formatting
 *
 * Telegram (HTML parse mode) text for alerts, the periodic summary and the
 * startup notice, plus the trade setup an alert suggests.
 */

import {
  AlertCandidate,
  DetectorType,
  MonitorProfile,
  PeriodicSummary,
  SignalAction,
  SymbolPerformance,
  TradeSetup,
} from '../types';
import { PERCENT_MULTIPLIER } from '../constants';
import { isFundingAction } from './action.utils';
import { mean, roundTo } from './math.utils';

// ============================================================================
// CONSTANTS
// ============================================================================

const RULE = '═'.repeat(35);
const TOTAL_DETECTORS = Object.keys(DetectorType).length;
const MAX_LISTED_SIGNALS = 5;

const ATR_PERIOD = 14;
const ATR_LOOKBACK = 20;
const DEFAULT_ATR_PCT = 0.01;
const ENTRY_ZONE = 0.002;
const STOP_ATR = 1.5;
const TARGET1_ATR = 2;
const TARGET2_ATR = 4;

type PositionSide = 'LONG' | 'SHORT' | 'NEUTRAL';

interface ActionStyle {
  emoji: string;
  label: string;
  side: PositionSide;
}

const ACTION_STYLES: Record<SignalAction, ActionStyle> = {
  [SignalAction.STRONG_BUY]: { emoji: '🟢🚀', label: 'STRONG BUY', side: 'LONG' },
  [SignalAction.BUY]: { emoji: '🟢', label: 'BUY', side: 'LONG' },
  [SignalAction.STRONG_SELL]: { emoji: '🔴💥', label: 'STRONG SELL', side: 'SHORT' },
  [SignalAction.SELL]: { emoji: '🔴', label: 'SELL', side: 'SHORT' },
  [SignalAction.FUNDING_SHORT]: { emoji: '💰🔴', label: 'FUNDING SHORT', side: 'SHORT' },
  [SignalAction.FUNDING_LONG]: { emoji: '💰🟢', label: 'FUNDING LONG', side: 'LONG' },
  [SignalAction.WATCH]: { emoji: '👀', label: 'WATCH', side: 'NEUTRAL' },
  [SignalAction.NEUTRAL]: { emoji: '👀', label: 'NEUTRAL', side: 'NEUTRAL' },
};

const DETECTOR_EMOJI: Record<DetectorType, string> = {
  [DetectorType.VOLUME_EXPLOSION]: '💥',
  [DetectorType.RSI_DIVERGENCE]: '📊',
  [DetectorType.MOMENTUM_SHIFT]: '🚀',
  [DetectorType.LIQUIDITY_TRAP]: '🪤',
  [DetectorType.ACCUMULATION]: '📈',
  [DetectorType.LIQUIDATION_SQUEEZE]: '💀',
  [DetectorType.FUNDING_ARBITRAGE]: '💰',
  [DetectorType.HIDDEN_ACCUMULATION]: '🤫',
  [DetectorType.TIMEFRAME_DIVERGENCE]: '⏱️',
};

// ============================================================================
// TRADE SETUP
// ============================================================================

/**
 * Mean absolute close-to-close move over the last 14 intervals.
 * Returns 0 with fewer than 15 closes.
 */
export function calculateCloseToCloseAtr(closes: readonly number[], period: number = ATR_PERIOD): number {
  if (closes.length < period + 1) {
    return 0;
  }
  const moves: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    moves.push(Math.abs(closes[i] - closes[i - 1]));
  }
  return mean(moves.slice(-period));
}

/**
 * Entry zone, 1.5 ATR stop and 2/4 ATR targets. ATR comes from the last 20
 * closes, or 1% of price when there are too few of them.
 */
export function calculateTradeSetup(price: number, side: 'LONG' | 'SHORT', recentCloses: readonly number[]): TradeSetup {
  const closes = recentCloses.slice(-ATR_LOOKBACK);
  const atr = closes.length > ATR_PERIOD ? calculateCloseToCloseAtr(closes) : price * DEFAULT_ATR_PCT;

  let entryMin: number;
  let entryMax: number;
  let stopLoss: number;
  let target1: number;
  let target2: number;

  if (side === 'LONG') {
    entryMin = price;
    entryMax = price * (1 + ENTRY_ZONE);
    stopLoss = entryMin - atr * STOP_ATR;
    target1 = entryMin + atr * TARGET1_ATR;
    target2 = entryMin + atr * TARGET2_ATR;
  } else {
    entryMax = price;
    entryMin = price * (1 - ENTRY_ZONE);
    stopLoss = entryMax + atr * STOP_ATR;
    target1 = entryMax - atr * TARGET1_ATR;
    target2 = entryMax - atr * TARGET2_ATR;
  }

  const risk = Math.abs(stopLoss - entryMin);
  const reward1 = Math.abs(target1 - entryMin);
  const reward2 = Math.abs(target2 - entryMin);

  return {
    entryMin: roundTo(entryMin, 6),
    entryMax: roundTo(entryMax, 6),
    stopLoss: roundTo(stopLoss, 6),
    target1: roundTo(target1, 6),
    target2: roundTo(target2, 6),
    riskPct: roundTo((risk / entryMin) * PERCENT_MULTIPLIER, 2),
    reward1Pct: roundTo((reward1 / entryMin) * PERCENT_MULTIPLIER, 2),
    reward2Pct: roundTo((reward2 / entryMin) * PERCENT_MULTIPLIER, 2),
    rr1: risk > 0 ? roundTo(reward1 / risk, 1) : 0,
    rr2: risk > 0 ? roundTo(reward2 / risk, 1) : 0,
  };
}

// ============================================================================
// SETUP QUALITY
// ============================================================================

/**
 * 0-100 score shown in the alert header
 */
export function calculateSetupQuality(candidate: AlertCandidate, performance?: SymbolPerformance): number {
  const { signal, snapshot } = candidate;
  let score = 50;

  score += Math.trunc(signal.confidence * 30);
  score += Math.min(signal.numSignals * 4, 20);

  if (candidate.statistics?.zscore?.isOutlier) {
    score += 10;
  }

  const volumeRatio = snapshot.volume.spikeMagnitude;
  if (volumeRatio > 5) {
    score += 10;
  } else if (volumeRatio > 3) {
    score += 7;
  } else if (volumeRatio > 2) {
    score += 5;
  }

  if (isFundingAction(signal.action) && candidate.funding) {
    const rate = Math.abs(candidate.funding.rate);
    if (rate > 0.002) {
      score += 10;
    } else if (rate > 0.001) {
      score += 7;
    }
  }

  if (candidate.priority > 1.0) {
    score += 10;
  } else if (candidate.priority > 0.9) {
    score += 7;
  } else if (candidate.priority > 0.8) {
    score += 5;
  }

  if (performance && performance.totalAlerts > 0) {
    const winRate = performance.winRate * PERCENT_MULTIPLIER;
    if (winRate > 70) {
      score += 10;
    } else if (winRate > 60) {
      score += 5;
    } else if (winRate < 30) {
      score -= 10;
    } else if (winRate < 40) {
      score -= 5;
    }
  }

  return Math.min(Math.max(score, 0), 100);
}

// ============================================================================
// MESSAGES
// ============================================================================

function formatPercent(rate: number, digits: number): string {
  return `${(rate * PERCENT_MULTIPLIER).toFixed(digits)}%`;
}

function signed(value: number, digits: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;
}

function formatUtcTime(timestamp: number): string {
  return `${new Date(timestamp).toISOString().slice(11, 19)} UTC`;
}

export function formatAlert(candidate: AlertCandidate, performance?: SymbolPerformance): string {
  const { symbol, signal, snapshot, funding, liquidation } = candidate;
  const style = ACTION_STYLES[signal.action];
  const price = snapshot.ohlcv.close;
  const lines: string[] = [];

  lines.push(`<b>${style.emoji} ${style.label} - ${symbol}</b>`);
  lines.push(RULE);
  lines.push('');
  lines.push(`<b>📊 Setup Quality: ${calculateSetupQuality(candidate, performance)}/100</b>`);
  lines.push(`├─ Price: $${price.toFixed(6)} (${signed(snapshot.priceChange.change5m, 2)}%)`);

  const volumeRatio = snapshot.volume.spikeMagnitude;
  if (volumeRatio > 1) {
    const volumeEmoji = volumeRatio > 5 ? '🔥' : volumeRatio > 3 ? '⚡' : '📈';
    lines.push(`├─ Volume: ${volumeEmoji} ${volumeRatio.toFixed(1)}x average`);
  }

  const rsi = snapshot.indicators.rsi14;
  if (rsi !== null) {
    let rsiText = rsi.toFixed(0);
    if (rsi > 70) {
      rsiText = `🔴 ${rsiText} (overbought)`;
    } else if (rsi < 30) {
      rsiText = `🟢 ${rsiText} (oversold)`;
    }
    lines.push(`├─ RSI(14): ${rsiText}`);
  }

  if (funding && !funding.stale && Math.abs(funding.rate) > 0.0001) {
    lines.push(`└─ Funding: ${formatPercent(funding.rate, 3)} (${funding.hoursToFunding.toFixed(1)}h left)`);
  }

  if (signal.signals.length > 0) {
    const listed = [...signal.signals].sort((a, b) => b.confidence - a.confidence).slice(0, MAX_LISTED_SIGNALS);
    lines.push('');
    lines.push(`<b>🔍 Signals (${signal.signals.length}/${TOTAL_DETECTORS} triggered):</b>`);
    listed.forEach((s, i) => {
      const prefix = i === listed.length - 1 ? '└' : '├';
      lines.push(`${prefix} ${DETECTOR_EMOJI[s.type]} ${s.description}`);
    });
  }

  if (style.side !== 'NEUTRAL') {
    const setup = calculateTradeSetup(price, style.side, candidate.recentCloses);
    lines.push('');
    lines.push('<b>📈 Trade Setup:</b>');
    lines.push(`• Entry: $${setup.entryMin.toFixed(6)}-$${setup.entryMax.toFixed(6)}`);
    lines.push(`• Stop Loss: $${setup.stopLoss.toFixed(6)} (${setup.riskPct.toFixed(1)}% risk)`);
    lines.push(`• Target 1: $${setup.target1.toFixed(6)} (${setup.reward1Pct.toFixed(1)}% / ${setup.rr1.toFixed(1)}R)`);
    lines.push(`• Target 2: $${setup.target2.toFixed(6)} (${setup.reward2Pct.toFixed(1)}% / ${setup.rr2.toFixed(1)}R)`);

    if (isFundingAction(signal.action) && funding) {
      const bonus = Math.abs(funding.rate) * (funding.hoursToFunding / 8) * PERCENT_MULTIPLIER;
      lines.push(`• Funding: +${bonus.toFixed(2)}% if held ${funding.hoursToFunding.toFixed(1)}h`);
    }
  }

  if (performance && performance.totalAlerts > 0) {
    lines.push('');
    lines.push('<b>⚡ Historical Performance:</b>');
    lines.push(
      `Win Rate: ${(performance.winRate * PERCENT_MULTIPLIER).toFixed(0)}% (${performance.successfulAlerts}/${performance.totalAlerts} alerts)`,
    );
  }

  if (liquidation && liquidation.cascadeProbability > 0.6) {
    lines.push('');
    lines.push('<b>⚠️ Liquidation Risk:</b>');
    lines.push(`Cascade probability: ${(liquidation.cascadeProbability * PERCENT_MULTIPLIER).toFixed(0)}%`);
    if (liquidation.nearestLiquidationZone !== null) {
      lines.push(`Key level: $${liquidation.nearestLiquidationZone.toFixed(6)}`);
    }
  }

  lines.push('');
  lines.push('<b>⏰ Valid for: 5 minutes</b>');
  lines.push(`<i>${formatUtcTime(candidate.timestamp)}</i>`);

  return lines.join('\n');
}

export function formatSummary(summary: PeriodicSummary): string {
  const lines: string[] = [];

  lines.push(`<b>📊 ${summary.hours}H Summary Report</b>`);
  lines.push(RULE);
  lines.push('');
  lines.push('<b>Overview:</b>');
  lines.push(`• Pairs monitored: ${summary.totalPairs}`);
  lines.push(`• Alerts sent: ${summary.totalAlerts}`);
  lines.push(`• Alerts blocked: ${summary.alertsBlocked}`);
  lines.push(`• Win rate: ${(summary.globalWinRate * PERCENT_MULTIPLIER).toFixed(1)}%`);

  if (summary.biggestMovers.length > 0) {
    lines.push('');
    lines.push('<b>🔥 Biggest Movers:</b>');
    for (const mover of summary.biggestMovers.slice(0, 3)) {
      const emoji = mover.change > 0 ? '📈' : '📉';
      lines.push(`${emoji} ${mover.symbol}: ${signed(mover.change, 2)}%`);
    }
  }

  lines.push('');
  lines.push(`<i>Next summary in ${summary.hours} hour(s)</i>`);

  return lines.join('\n');
}

export function formatStartup(symbolCount: number, mode: string, profile: MonitorProfile): string {
  const flag = (enabled: boolean): string => (enabled ? 'on' : 'off');
  return [
    '<b>🚀 Manipulation Monitor Started</b>',
    '',
    `• Tracking ${symbolCount} pairs (${mode} mode)`,
    `• Funding analysis: ${flag(profile.enableFunding)}`,
    `• Liquidation monitoring: ${flag(profile.enableLiquidation)}`,
    `• Statistical filtering: ${flag(profile.enableStatistics)}`,
    `• Multi-timeframe: ${flag(profile.enableMultiTimeframe)}`,
    `• Update interval: ${profile.updateIntervalSec}s`,
  ].join('\n');
}
