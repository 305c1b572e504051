/**
 * Configuration Loader
 * Loads config from config.json and applies environment variables
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { Config, LogLevel, MonitorProfile } from './types';

/**
 * Environment variables that override config.json
 */
export interface EnvOverrides {
  MONITOR_MODE?: string;
  MONITOR_SYMBOLS?: string; // comma separated
  TELEGRAM_BOT_TOKEN?: string;
  TELEGRAM_CHAT_ID?: string;
  TELEGRAM_ENABLED?: string;
  DB_PATH?: string;
  LOG_LEVEL?: string;
}

const LOG_LEVELS: ReadonlySet<string> = new Set(Object.values(LogLevel));

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

/**
 * Apply environment overrides on top of a parsed config (mutates and returns it)
 */
export function applyEnvOverrides(config: Config, env: EnvOverrides): Config {
  if (env.MONITOR_MODE) {
    config.monitor.mode = env.MONITOR_MODE;
  }
  if (env.MONITOR_SYMBOLS) {
    config.monitor.symbols = env.MONITOR_SYMBOLS.split(',')
      .map((s) => s.trim().toUpperCase())
      .filter(Boolean);
  }
  if (env.TELEGRAM_BOT_TOKEN) {
    config.telegram.botToken = env.TELEGRAM_BOT_TOKEN;
  }
  if (env.TELEGRAM_CHAT_ID) {
    config.telegram.chatId = env.TELEGRAM_CHAT_ID;
  }
  if (env.TELEGRAM_ENABLED !== undefined) {
    config.telegram.enabled = env.TELEGRAM_ENABLED === 'true';
  }
  if (env.DB_PATH) {
    config.database.path = env.DB_PATH;
  }
  if (env.LOG_LEVEL) {
    const level = env.LOG_LEVEL.toUpperCase();
    if (isLogLevel(level)) {
      config.logging.level = level;
    }
  }
  return config;
}

/**
 * Load configuration from config.json (project root by default)
 */
export function getConfig(configPath: string = path.join(__dirname, '..', 'config.json')): Config {
  dotenv.config();

  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const config: Config = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  return applyEnvOverrides(config, process.env);
}

/**
 * Profile selected by monitor.mode
 *
 * @throws {Error} If the mode names no profile
 */
export function getActiveProfile(config: Config): MonitorProfile {
  const profile = config.profiles[config.monitor.mode];
  if (!profile) {
    throw new Error(`Unknown monitor mode: ${config.monitor.mode}`);
  }
  return profile;
}
