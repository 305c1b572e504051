/**
 * Signal Store
 *
 * Audit trail of the monitor in SQLite: snapshots, composite signals,
 * funding and liquidation states, delivered alerts, outcomes and
 * per-symbol alert performance.
 *
 * Writes are best-effort for the caller: the orchestrator logs a failed
 * write and keeps alerting. Only open() failures are fatal.
 */

import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';
import {
  AlertCandidate,
  AlertOutcomeRecord,
  CompositeSignal,
  FundingState,
  LiquidationState,
  LoggerService,
  MarketSnapshot,
  SnapshotRecord,
  SymbolPerformance,
} from '../types';
import { createErrorLogObject } from '../utils/error.utils';

// ============================================================================
// INTERFACE
// ============================================================================

export interface SignalStore {
  open(): Promise<void>;
  close(): Promise<void>;
  saveSnapshot(snapshot: MarketSnapshot): Promise<void>;
  saveSignal(symbol: string, signal: CompositeSignal): Promise<void>;
  saveFunding(state: FundingState): Promise<void>;
  saveLiquidation(state: LiquidationState): Promise<void>;
  saveAlert(candidate: AlertCandidate, sentAt: number): Promise<void>;
  saveOutcome(record: AlertOutcomeRecord): Promise<void>;
  /** Newest first */
  getRecentSnapshots(symbol: string, limit: number): Promise<SnapshotRecord[]>;
  upsertPerformance(performance: SymbolPerformance, updatedAt: number): Promise<void>;
  loadPerformance(sinceMs: number): Promise<SymbolPerformance[]>;
}

// ============================================================================
// ROW TYPES
// ============================================================================

interface SnapshotRow {
  symbol: string;
  timestamp: number;
  close: number;
  volume: number;
  change1m: number;
  change5m: number;
  volumeRatio5m: number;
  rsi14: number | null;
}

interface PerformanceRow {
  symbol: string;
  totalAlerts: number;
  successfulAlerts: number;
  winRate: number;
  lastAlertTime: number | null;
  recentFailures: string;
}

// ============================================================================
// SQLITE STORE
// ============================================================================

export class SqliteSignalStore implements SignalStore {
  private db: Database | null = null;

  constructor(
    private readonly dbPath: string,
    private logger: LoggerService,
  ) {}

  /**
   * Open the database and create tables
   *
   * @throws {Error} If the database cannot be opened (fatal at startup)
   */
  async open(): Promise<void> {
    try {
      this.db = await open({
        filename: this.dbPath,
        driver: sqlite3.Database,
      });
      await this.createTables();
      this.logger.info('🗄️ Signal store opened', { path: this.dbPath });
    } catch (error) {
      this.logger.error('Failed to open signal store', {
        path: this.dbPath,
        ...createErrorLogObject(error),
      });
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = null;
    }
  }

  async saveSnapshot(snapshot: MarketSnapshot): Promise<void> {
    await this.getDb().run(
      `INSERT OR IGNORE INTO snapshots
         (symbol, timestamp, open, high, low, close, volume, change1m, change5m, change15m,
          volumeRatio5m, spikeMagnitude, rsi14)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        snapshot.symbol,
        snapshot.timestamp,
        snapshot.ohlcv.open,
        snapshot.ohlcv.high,
        snapshot.ohlcv.low,
        snapshot.ohlcv.close,
        snapshot.ohlcv.volume,
        snapshot.priceChange.change1m,
        snapshot.priceChange.change5m,
        snapshot.priceChange.change15m,
        snapshot.volume.volumeRatio5m,
        snapshot.volume.spikeMagnitude,
        snapshot.indicators.rsi14,
      ],
    );
  }

  async saveSignal(symbol: string, signal: CompositeSignal): Promise<void> {
    await this.getDb().run(
      `INSERT INTO signals (symbol, timestamp, action, riskLevel, confidence, numSignals, signals, description)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        symbol,
        signal.timestamp,
        signal.action,
        signal.riskLevel,
        signal.confidence,
        signal.numSignals,
        JSON.stringify(signal.signals),
        signal.description,
      ],
    );
  }

  async saveFunding(state: FundingState): Promise<void> {
    await this.getDb().run(
      `INSERT INTO funding (symbol, timestamp, rate, hoursToFunding, trend, arbitrageScore, favorablePosition)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        state.symbol,
        state.timestamp,
        state.rate,
        state.hoursToFunding,
        state.trend,
        state.arbitrageScore,
        state.favorablePosition,
      ],
    );
  }

  async saveLiquidation(state: LiquidationState): Promise<void> {
    await this.getDb().run(
      `INSERT INTO liquidations
         (symbol, timestamp, longLiquidations1h, shortLiquidations1h, liquidationRatio,
          cascadeProbability, cascadeDirection, riskLevel, estimated)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        state.symbol,
        state.timestamp,
        state.longLiquidations1h,
        state.shortLiquidations1h,
        state.liquidationRatio,
        state.cascadeProbability,
        state.cascadeDirection,
        state.riskLevel,
        state.estimated ? 1 : 0,
      ],
    );
  }

  async saveAlert(candidate: AlertCandidate, sentAt: number): Promise<void> {
    await this.getDb().run(
      `INSERT INTO alert_history (symbol, timestamp, action, riskLevel, confidence, priority, price, description)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        candidate.symbol,
        sentAt,
        candidate.signal.action,
        candidate.signal.riskLevel,
        candidate.signal.confidence,
        candidate.priority,
        candidate.snapshot.ohlcv.close,
        candidate.signal.description,
      ],
    );
  }

  async saveOutcome(record: AlertOutcomeRecord): Promise<void> {
    await this.getDb().run(
      `INSERT INTO alert_outcomes (symbol, alertTime, outcomeTime, outcome, movePct)
       VALUES (?, ?, ?, ?, ?)`,
      [record.symbol, record.alertTime, record.outcomeTime, record.outcome, record.movePct],
    );
  }

  async getRecentSnapshots(symbol: string, limit: number): Promise<SnapshotRecord[]> {
    const rows = await this.getDb().all<SnapshotRow[]>(
      `SELECT symbol, timestamp, close, volume, change1m, change5m, volumeRatio5m, rsi14
       FROM snapshots
       WHERE symbol = ?
       ORDER BY timestamp DESC
       LIMIT ?`,
      [symbol, limit],
    );
    return rows.map((row) => ({ ...row }));
  }

  async upsertPerformance(performance: SymbolPerformance, updatedAt: number): Promise<void> {
    await this.getDb().run(
      `INSERT INTO alert_performance
         (symbol, updatedAt, totalAlerts, successfulAlerts, winRate, lastAlertTime, recentFailures)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(symbol) DO UPDATE SET
         updatedAt = excluded.updatedAt,
         totalAlerts = excluded.totalAlerts,
         successfulAlerts = excluded.successfulAlerts,
         winRate = excluded.winRate,
         lastAlertTime = excluded.lastAlertTime,
         recentFailures = excluded.recentFailures`,
      [
        performance.symbol,
        updatedAt,
        performance.totalAlerts,
        performance.successfulAlerts,
        performance.winRate,
        performance.lastAlertTime,
        JSON.stringify(performance.recentFailures),
      ],
    );
  }

  async loadPerformance(sinceMs: number): Promise<SymbolPerformance[]> {
    const rows = await this.getDb().all<PerformanceRow[]>(
      `SELECT symbol, totalAlerts, successfulAlerts, winRate, lastAlertTime, recentFailures
       FROM alert_performance
       WHERE updatedAt >= ?`,
      [sinceMs],
    );

    return rows.map((row) => ({
      symbol: row.symbol,
      totalAlerts: row.totalAlerts,
      successfulAlerts: row.successfulAlerts,
      winRate: row.winRate,
      lastAlertTime: row.lastAlertTime,
      recentFailures: this.parseTimestamps(row.recentFailures),
    }));
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  private getDb(): Database {
    if (!this.db) {
      throw new Error('Signal store not opened');
    }
    return this.db;
  }

  private parseTimestamps(json: string): number[] {
    try {
      const parsed: unknown = JSON.parse(json);
      if (!Array.isArray(parsed)) {
        return [];
      }
      return parsed.filter((value): value is number => typeof value === 'number');
    } catch (error) {
      this.logger.warn('Corrupt recentFailures column, resetting', createErrorLogObject(error));
      return [];
    }
  }

  private async createTables(): Promise<void> {
    const db = this.getDb();

    await db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        symbol TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        open REAL NOT NULL,
        high REAL NOT NULL,
        low REAL NOT NULL,
        close REAL NOT NULL,
        volume REAL NOT NULL,
        change1m REAL NOT NULL,
        change5m REAL NOT NULL,
        change15m REAL NOT NULL,
        volumeRatio5m REAL NOT NULL,
        spikeMagnitude REAL NOT NULL,
        rsi14 REAL
      );
      CREATE UNIQUE INDEX IF NOT EXISTS idx_snapshots_unique
        ON snapshots(symbol, timestamp);
    `);

    await db.exec(`
      CREATE TABLE IF NOT EXISTS signals (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        symbol TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        action TEXT NOT NULL,
        riskLevel TEXT NOT NULL,
        confidence REAL NOT NULL,
        numSignals INTEGER NOT NULL,
        signals TEXT NOT NULL,
        description TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_signals_symbol_timestamp
        ON signals(symbol, timestamp);
    `);

    await db.exec(`
      CREATE TABLE IF NOT EXISTS funding (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        symbol TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        rate REAL NOT NULL,
        hoursToFunding REAL NOT NULL,
        trend TEXT NOT NULL,
        arbitrageScore REAL NOT NULL,
        favorablePosition TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_funding_symbol_timestamp
        ON funding(symbol, timestamp);
    `);

    await db.exec(`
      CREATE TABLE IF NOT EXISTS liquidations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        symbol TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        longLiquidations1h REAL NOT NULL,
        shortLiquidations1h REAL NOT NULL,
        liquidationRatio REAL NOT NULL,
        cascadeProbability REAL NOT NULL,
        cascadeDirection TEXT NOT NULL,
        riskLevel TEXT NOT NULL,
        estimated INTEGER NOT NULL
      );
    `);

    await db.exec(`
      CREATE TABLE IF NOT EXISTS alert_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        symbol TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        action TEXT NOT NULL,
        riskLevel TEXT NOT NULL,
        confidence REAL NOT NULL,
        priority REAL NOT NULL,
        price REAL NOT NULL,
        description TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_alert_history_symbol_timestamp
        ON alert_history(symbol, timestamp);

      CREATE TABLE IF NOT EXISTS alert_outcomes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        symbol TEXT NOT NULL,
        alertTime INTEGER NOT NULL,
        outcomeTime INTEGER NOT NULL,
        outcome TEXT NOT NULL,
        movePct REAL
      );
      CREATE INDEX IF NOT EXISTS idx_alert_outcomes_symbol_alert_time
        ON alert_outcomes(symbol, alertTime);

      CREATE TABLE IF NOT EXISTS alert_performance (
        symbol TEXT PRIMARY KEY,
        updatedAt INTEGER NOT NULL,
        totalAlerts INTEGER NOT NULL,
        successfulAlerts INTEGER NOT NULL,
        winRate REAL NOT NULL,
        lastAlertTime INTEGER,
        recentFailures TEXT NOT NULL
      );
    `);
  }
}
