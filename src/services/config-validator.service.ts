/**
 * Config Validator Service
 *
 * Validates the merged configuration (config.json + .env) before the
 * monitor starts. Fails fast with every problem listed at once.
 */

import { Config, MonitorProfile } from '../types';

const PROFILE_RANGES: Array<{ key: keyof MonitorProfile; min: number; max: number }> = [
  { key: 'candleLimit', min: 15, max: 1000 },
  { key: 'orderBookDepth', min: 1, max: 1000 },
  { key: 'tradeLimit', min: 1, max: 1000 },
  { key: 'updateIntervalSec', min: 1, max: 3600 },
  { key: 'maxParallelRequests', min: 1, max: 100 },
  { key: 'requestTimeoutMs', min: 100, max: 60000 },
  { key: 'fundingCacheMs', min: 0, max: 3600000 },
];

const MAX_SYMBOLS = 100;

export class ConfigValidatorService {
  /**
   * Collect every problem of a single profile
   */
  static validateProfile(name: string, profile: MonitorProfile): string[] {
    const errors: string[] = [];

    for (const { key, min, max } of PROFILE_RANGES) {
      const value = profile[key];
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        errors.push(`REQUIRED FIELD MISSING: "profiles.${name}.${key}"`);
      } else if (value < min || value > max) {
        errors.push(`INVALID: profiles.${name}.${key} = ${value} (must be ${min}-${max})`);
      }
    }

    const t = profile.thresholds;
    if (!t) {
      errors.push(`REQUIRED FIELD MISSING: "profiles.${name}.thresholds"`);
      return errors;
    }

    if (!(t.volumeSpikeThreshold > 1)) {
      errors.push(`INVALID: profiles.${name}.thresholds.volumeSpikeThreshold = ${t.volumeSpikeThreshold} (must be > 1)`);
    }
    if (!(t.rsiOversold > 0 && t.rsiOversold < t.rsiOverbought && t.rsiOverbought < 100)) {
      errors.push(
        `INVALID: profiles.${name}.thresholds rsiOversold/rsiOverbought = ${t.rsiOversold}/${t.rsiOverbought} (need 0 < oversold < overbought < 100)`,
      );
    }
    if (!(t.priceChangeThreshold > 0)) {
      errors.push(`INVALID: profiles.${name}.thresholds.priceChangeThreshold = ${t.priceChangeThreshold} (must be > 0)`);
    }
    if (!(t.confidenceThreshold > 0 && t.confidenceThreshold <= 1)) {
      errors.push(
        `INVALID FORMAT: "profiles.${name}.thresholds.confidenceThreshold" = ${t.confidenceThreshold} (must be 0-1, not 0-100)`,
      );
    }

    return errors;
  }

  /**
   * Collect every problem of the whole configuration
   */
  static collectErrors(config: Config): string[] {
    const errors: string[] = [];

    if (!config.exchange?.baseUrl) {
      errors.push('REQUIRED FIELD MISSING: "exchange.baseUrl"');
    }

    const monitor = config.monitor;
    if (!monitor) {
      errors.push('REQUIRED FIELD MISSING: "monitor"');
    } else {
      if (!config.profiles?.[monitor.mode]) {
        const known = Object.keys(config.profiles ?? {}).join(', ');
        errors.push(`UNKNOWN MODE: "${monitor.mode}" (profiles: ${known || 'none'})`);
      }
      if (!Array.isArray(monitor.symbols) || monitor.symbols.length === 0) {
        errors.push('REQUIRED FIELD MISSING: "monitor.symbols" (at least one symbol)');
      } else if (monitor.symbols.length > MAX_SYMBOLS) {
        errors.push(`INVALID: monitor.symbols has ${monitor.symbols.length} entries (max ${MAX_SYMBOLS})`);
      }
      if (!(monitor.maxAlertsPerCycle >= 1)) {
        errors.push(`INVALID: monitor.maxAlertsPerCycle = ${monitor.maxAlertsPerCycle} (must be >= 1)`);
      }
      if (monitor.minRiskLevel !== 'HIGH' && monitor.minRiskLevel !== 'EXTREME') {
        errors.push(`INVALID: monitor.minRiskLevel = ${String(monitor.minRiskLevel)} (HIGH or EXTREME)`);
      }
      for (const key of ['outcomeCheckIntervalMin', 'outcomeEvaluationMin', 'summaryIntervalMin'] as const) {
        if (!(monitor[key] > 0)) {
          errors.push(`INVALID: monitor.${key} = ${monitor[key]} (must be > 0)`);
        }
      }
    }

    for (const [name, profile] of Object.entries(config.profiles ?? {})) {
      errors.push(...ConfigValidatorService.validateProfile(name, profile));
    }

    if (config.telegram?.enabled && (!config.telegram.botToken || !config.telegram.chatId)) {
      errors.push('TELEGRAM: enabled without botToken/chatId (set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID)');
    }

    if (!config.database?.path) {
      errors.push('REQUIRED FIELD MISSING: "database.path"');
    }
    if (config.journal?.enabled && !config.journal.path) {
      errors.push('REQUIRED FIELD MISSING: "journal.path"');
    }

    return errors;
  }

  /**
   * Static validation for use at startup (before logger is available)
   *
   * @throws {Error} Listing every problem found
   */
  static validateAtStartup(config: Config): void {
    const errors = ConfigValidatorService.collectErrors(config);

    if (errors.length > 0) {
      const errorMessage = `
═══════════════════════════════════════════════════════════════
❌ CONFIGURATION ERROR - FAST FAIL AT STARTUP
═══════════════════════════════════════════════════════════════

${errors.map((e, i) => `${i + 1}. ${e}`).join('\n')}

═══════════════════════════════════════════════════════════════
FIX: Update your config.json / .env and restart.
═══════════════════════════════════════════════════════════════
      `;
      throw new Error(errorMessage);
    }

    console.log('✅ Config validation passed');
  }
}
