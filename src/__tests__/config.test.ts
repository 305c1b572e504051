/**
 * Config Loader Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { applyEnvOverrides, getActiveProfile, getConfig } from '../config';
import { LogLevel } from '../types';
import { createConfig, createMonitorSettings } from './helpers/test-data.helper';

describe('config', () => {
  describe('applyEnvOverrides', () => {
    it('should leave the config alone without overrides', () => {
      expect(applyEnvOverrides(createConfig(), {})).toEqual(createConfig());
    });

    it('should split and upper-case the symbol list', () => {
      const config = applyEnvOverrides(createConfig(), { MONITOR_SYMBOLS: ' btc_usdt, pepe_usdt ,,' });
      expect(config.monitor.symbols).toEqual(['BTC_USDT', 'PEPE_USDT']);
    });

    it('should apply telegram credentials and the enabled flag', () => {
      const config = applyEnvOverrides(createConfig(), {
        TELEGRAM_BOT_TOKEN: 'test-token',
        TELEGRAM_CHAT_ID: 'test-chat',
        TELEGRAM_ENABLED: 'true',
      });

      expect(config.telegram).toEqual({ enabled: true, botToken: 'test-token', chatId: 'test-chat' });
    });

    it('should take a known log level in any case and ignore unknown ones', () => {
      expect(applyEnvOverrides(createConfig(), { LOG_LEVEL: 'debug' }).logging.level).toBe(LogLevel.DEBUG);
      expect(applyEnvOverrides(createConfig(), { LOG_LEVEL: 'verbose' }).logging.level).toBe(LogLevel.INFO);
    });

    it('should override mode and database path', () => {
      const config = applyEnvOverrides(createConfig(), { MONITOR_MODE: 'aggressive', DB_PATH: '/tmp/signals.db' });
      expect(config.monitor.mode).toBe('aggressive');
      expect(config.database.path).toBe('/tmp/signals.db');
    });
  });

  describe('getActiveProfile', () => {
    it('should return the profile named by the mode', () => {
      const config = createConfig();
      expect(getActiveProfile(config)).toBe(config.profiles.balanced);
    });

    it('should throw for an unknown mode', () => {
      const config = { ...createConfig(), monitor: createMonitorSettings({ mode: 'turbo' }) };
      expect(() => getActiveProfile(config)).toThrow('Unknown monitor mode: turbo');
    });
  });

  describe('getConfig', () => {
    it('should throw when the file is missing', () => {
      const missing = path.join(os.tmpdir(), 'no-such-dir', 'config.json');
      expect(() => getConfig(missing)).toThrow(`Config file not found: ${missing}`);
    });

    it('should read a config file', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, JSON.stringify(createConfig()), 'utf-8');

      try {
        expect(getConfig(file).exchange.baseUrl).toBe('https://contract.example.test');
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
