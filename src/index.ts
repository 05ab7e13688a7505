import { Telegraf } from 'telegraf';
import { config } from './config';
import { TraderSeed, validateConfig } from './config/validate';
import { logger } from './utils/logger';
import { ConfigurationError, describeError, handleError } from './utils/error-handler';
import { OkxRestClient } from './services/okx/rest-client';
import { TraderResolver } from './services/okx/trader-resolver';
import { MonitorRegistry, PositionMonitor } from './services/position-monitor';
import { TelegramNotifier } from './services/notifications/telegram-notifier';
import { NotificationDispatcher } from './services/notifications/notification-dispatcher';
import { BotService } from './bot';

function loadSeeds(): TraderSeed[] {
  try {
    const seeds = validateConfig();
    logger.info('Configuration validation successful', { traders: seeds.length });
    return seeds;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('Configuration validation failed', { problems: error.problems });
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const seeds = loadSeeds();

  const bot = new Telegraf(config.telegram.botToken);
  const notifier = new TelegramNotifier({ telegram: bot.telegram, chatId: config.telegram.chatId });
  const okx = new OkxRestClient();

  const registry = new MonitorRegistry();
  for (const seed of seeds) {
    registry.add(seed.traderId, seed.alias);
  }

  const dispatcher = new NotificationDispatcher(notifier);
  const monitor = new PositionMonitor({
    registry,
    fetcher: okx,
    dispatcher,
    pollIntervalMs: config.monitor.pollIntervalSeconds * 1000,
    sizeEpsilon: config.monitor.sizeEpsilon,
    failureThreshold: config.monitor.failureThreshold,
  });

  const botService = new BotService({
    bot,
    chatId: config.telegram.chatId,
    deps: { monitor, resolver: new TraderResolver(okx), directory: okx },
  });

  const telegramCheck = await notifier.testConnection();
  logger.info('Telegram connection check', telegramCheck);
  if (okx.hasCredentials()) {
    logger.info('OKX connection check', await okx.testConnection());
  }

  monitor.start();
  await dispatcher.announceStarted(monitor.getAllHealth(), config.monitor.pollIntervalSeconds);
  await botService.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received. Shutting down gracefully...`);
    botService.stop(signal);
    await monitor.stop();
    await dispatcher.announceStopped();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Error during shutdown', { error: describeError(error) });
        process.exitCode = 1;
      });
    });
  }
}

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', { error: describeError(reason) });
});

main().catch((error: unknown) => {
  handleError(error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
