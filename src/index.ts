/**
 * Entry point
 *
 * Loads and validates config, opens the store, wires the monitor and
 * runs it until SIGINT/SIGTERM.
 */

import { getActiveProfile, getConfig } from './config';
import { LoggerService } from './types';
import { ConfigValidatorService } from './services/config-validator.service';
import { MexcMarketDataService } from './services/market-data.service';
import { SqliteSignalStore } from './services/signal-store.service';
import { TelegramService } from './services/telegram.service';
import { AlertJournalService } from './services/alert-journal.service';
import { MonitorOrchestrator } from './orchestrators/monitor.orchestrator';
import { createErrorLogObject } from './utils/error.utils';

async function main(): Promise<void> {
  const config = getConfig();
  ConfigValidatorService.validateAtStartup(config);

  const logger = new LoggerService(config.logging.level, config.logging.dir, config.logging.toFile);
  const profile = getActiveProfile(config);

  const store = new SqliteSignalStore(config.database.path, logger);
  await store.open();

  const source = new MexcMarketDataService(
    { ...config.exchange, requestTimeoutMs: profile.requestTimeoutMs },
    logger,
  );
  const telegram = new TelegramService(config.telegram, logger);
  const journal = config.journal.enabled ? new AlertJournalService(logger, config.journal.path) : null;

  logger.info('🗂️ Output files', {
    logFile: logger.getLogFilePath(),
    journal: journal ? journal.getPath() : null,
    database: config.database.path,
  });

  const monitor = new MonitorOrchestrator(config.monitor, profile, logger, {
    source,
    notifier: telegram,
    store,
    journal,
  });

  const shutdown = (signal: string): void => {
    if (!monitor.isRunning()) {
      return;
    }
    logger.info(`${signal} received, shutting down...`);
    monitor.stop();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await monitor.start();
  } finally {
    await telegram.notifyStopped('Shutdown requested');
    await store.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Fatal error', createErrorLogObject(error));
  process.exit(1);
});
