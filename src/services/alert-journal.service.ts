/**
 * Alert Journal Service
 *
 * Append-only CSV journal of delivered alerts, one row per alert.
 * The file (and its directory) is created with a header on first use.
 * Write failures are logged and never block alerting.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AlertCandidate, LoggerService } from '../types';
import { createErrorLogObject } from '../utils/error.utils';

// ============================================================================
// CONSTANTS
// ============================================================================

export const JOURNAL_COLUMNS = [
  'timestamp',
  'symbol',
  'action',
  'riskLevel',
  'confidence',
  'priority',
  'price',
  'change5m',
  'volumeSpike',
  'rsi',
  'fundingRate',
  'signals',
  'description',
] as const;

export type JournalColumn = (typeof JOURNAL_COLUMNS)[number];

export type AlertJournalRecord = Record<JournalColumn, string | number | null>;

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Flatten a candidate into one journal row
 */
export function toJournalRecord(candidate: AlertCandidate, sentAt: number): AlertJournalRecord {
  const { signal, snapshot } = candidate;
  return {
    timestamp: new Date(sentAt).toISOString(),
    symbol: candidate.symbol,
    action: signal.action,
    riskLevel: signal.riskLevel,
    confidence: Number(signal.confidence.toFixed(3)),
    priority: candidate.priority,
    price: snapshot.ohlcv.close,
    change5m: Number(snapshot.priceChange.change5m.toFixed(2)),
    volumeSpike: Number(snapshot.volume.spikeMagnitude.toFixed(2)),
    rsi: snapshot.indicators.rsi14 === null ? null : Number(snapshot.indicators.rsi14.toFixed(1)),
    fundingRate: candidate.funding ? candidate.funding.rate : null,
    signals: signal.signals.map((s) => s.type).join(';'),
    description: signal.description,
  };
}

/**
 * Strings are quoted with inner quotes doubled, numbers are written as is
 */
export function formatCsvValue(value: string | number | null): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return String(value);
}

// ============================================================================
// ALERT JOURNAL SERVICE
// ============================================================================

export class AlertJournalService {
  constructor(
    private logger: LoggerService,
    private readonly filePath: string,
  ) {}

  /**
   * Append one delivered alert
   *
   * @returns false when the row could not be written
   */
  append(candidate: AlertCandidate, sentAt: number = Date.now()): boolean {
    try {
      this.ensureFile();
      const record = toJournalRecord(candidate, sentAt);
      const line = JOURNAL_COLUMNS.map((column) => formatCsvValue(record[column])).join(',');
      fs.appendFileSync(this.filePath, line + '\n', 'utf-8');

      this.logger.debug('📝 Alert appended to journal', {
        symbol: candidate.symbol,
        action: record.action,
      });
      return true;
    } catch (error) {
      this.logger.error('❌ Failed to append alert to journal', {
        symbol: candidate.symbol,
        ...createErrorLogObject(error),
      });
      return false;
    }
  }

  getPath(): string {
    return this.filePath;
  }

  private ensureFile(): void {
    if (fs.existsSync(this.filePath)) {
      return;
    }
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, JOURNAL_COLUMNS.join(',') + '\n', 'utf-8');
    this.logger.info('✅ Alert journal created', { path: this.filePath });
  }
}
