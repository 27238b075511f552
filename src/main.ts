import { CONFIG, AppConfig, validateConfig, logConfigSummary } from './config/env';
import { logger, parseLogLevel } from './core/StructuredLogger';
import { ZonedClock } from './core/Timing';
import { BaselineManager } from './core/BaselineManager';
import { ListingDiffEngine } from './core/ListingDiffEngine';
import { ListingScheduler } from './core/ListingScheduler';
import { HistoryService } from './core/HistoryViews';
import { BaselineError, toError } from './core/errors';
import { ExchangeManager } from './exchanges/ExchangeManager';
import { HttpClient } from './lib/httpClient';
import { RecordStore } from './store/RecordStore';
import { JsonFileRecordBackend } from './store/JsonFileRecordBackend';
import { Notifier, ConsoleNotifier } from './notify/Notifier';
import { TelegramService } from './notify/TelegramService';
import { CommandController } from './api/CommandController';
import { HttpServer } from './api/HttpServer';

const log = logger.child('main');

// Variables globales pour la gestion d'arrêt
let isShuttingDown = false;
let scheduler: ListingScheduler | null = null;
let httpServer: HttpServer | null = null;

function createNotifier(config: AppConfig, http: HttpClient): Notifier {
  if (config.TELEGRAM_ENABLED) {
    return new TelegramService(http, {
      botToken: config.TELEGRAM_BOT_TOKEN,
      chatId: config.TELEGRAM_CHAT_ID,
      timeoutMs: config.HTTP_TIMEOUT_MS
    });
  }
  log.warn('⚠️ Telegram disabled - console notifications only');
  return new ConsoleNotifier();
}

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    log.info(`[${signal}] Shutdown already in progress, ignoring...`);
    return;
  }

  isShuttingDown = true;
  log.info(`🛑 Received ${signal}, shutting down gracefully...`);

  try {
    scheduler?.stop();

    if (httpServer) {
      await httpServer.stop();
      log.info('✅ HTTP server stopped');
    }

    process.exit(0);
  } catch (error) {
    log.error('❌ Error during shutdown', toError(error));
    process.exit(1);
  }
}

async function main(): Promise<void> {
  logger.setLogLevel(parseLogLevel(CONFIG.LOG_LEVEL));
  log.info('🚀 Starting listing monitor...');

  const validation = validateConfig(CONFIG);
  validation.warnings.forEach(warning => log.warn(`⚠️ ${warning}`));
  if (!validation.isValid) {
    validation.errors.forEach(error => log.error(`❌ ${error}`));
    process.exit(1);
  }
  logConfigSummary(CONFIG);

  const clock = new ZonedClock(CONFIG.TIMEZONE);
  const http = new HttpClient(CONFIG.HTTP_TIMEOUT_MS);

  const store = new RecordStore(new JsonFileRecordBackend(CONFIG.RECORD_FILE, {
    backupEnabled: CONFIG.BACKUP_ENABLED,
    clock
  }), clock);
  const exchanges = ExchangeManager.createDefault(http, CONFIG.HTTP_TIMEOUT_MS);
  const notifier = createNotifier(CONFIG, http);

  const baseline = new BaselineManager(exchanges, store, logger, {
    attempts: CONFIG.BASELINE_ATTEMPTS,
    retryDelayMs: CONFIG.BASELINE_RETRY_MS
  });
  await baseline.initialize();

  const engine = new ListingDiffEngine(exchanges, store, notifier);
  scheduler = new ListingScheduler(engine, CONFIG.POLL_INTERVAL_MS);

  if (CONFIG.HTTP_ENABLED) {
    const commands = new CommandController(engine, new HistoryService(store), store.description, {
      historyLimit: CONFIG.HISTORY_LIMIT,
      summaryPerSource: CONFIG.SUMMARY_PER_SOURCE
    });
    httpServer = new HttpServer(commands, { port: CONFIG.HTTP_PORT });
    await httpServer.start();
  }

  scheduler.start();

  log.info('✅ Listing monitor started');
  await notifier.notify('✅ Listing monitor started');
}

process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });

main().catch((error: unknown) => {
  if (error instanceof BaselineError) {
    log.fatal('💥 Record log unusable, refusing to start', error);
  } else {
    log.fatal('💥 Fatal startup error', toError(error));
  }
  process.exit(1);
});
