import { Context, Telegraf } from 'telegraf';
import { chatGuardMiddleware } from './middleware';
import { HandlerDependencies, HandlerRegistry } from './handlers';
import { logger } from '../utils/logger';
import { describeError } from '../utils/error-handler';

export interface BotServiceConfig {
  bot: Telegraf;
  chatId: string;
  deps: HandlerDependencies;
}

/**
 * Command surface of the monitor. Only the configured chat may talk to it.
 */
export class BotService {
  private bot: Telegraf;
  private handlerRegistry: HandlerRegistry;
  private isRunning = false;

  constructor(serviceConfig: BotServiceConfig) {
    this.bot = serviceConfig.bot;
    this.handlerRegistry = new HandlerRegistry(serviceConfig.deps);

    this.bot.use(chatGuardMiddleware(serviceConfig.chatId));
    this.handlerRegistry.registerAll(this.bot);
    this.setupErrorHandling();
  }

  getCommands(): { command: string; description: string }[] {
    return this.handlerRegistry.getAllHandlers().map(handler => ({
      command: handler.command,
      description: handler.description,
    }));
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Bot is already running');
      return;
    }

    try {
      await this.bot.telegram.setMyCommands(this.getCommands());
    } catch (error) {
      logger.warn('Failed to publish bot commands', { error: describeError(error) });
    }

    // launch() settles only when polling ends
    this.bot.launch({ dropPendingUpdates: true }).catch((error: unknown) => {
      this.isRunning = false;
      logger.error('Bot polling stopped with an error', { error: describeError(error) });
    });

    this.isRunning = true;
    logger.info('Bot polling started');
  }

  stop(reason = 'shutdown'): void {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    try {
      this.bot.stop(reason);
      logger.info('Bot stopped', { reason });
    } catch (error) {
      // polling had not started yet
      logger.warn('Bot stop skipped', { reason, error: describeError(error) });
    }
  }

  private setupErrorHandling(): void {
    this.bot.catch(async (error: unknown, ctx: Context) => {
      logger.error('Unhandled bot error', {
        error: describeError(error),
        updateType: ctx.updateType,
        chatId: ctx.chat?.id,
      });
      try {
        await ctx.reply('❌ An unexpected error occurred. Please try again later.');
      } catch (replyError) {
        logger.error('Failed to send error reply', { error: describeError(replyError) });
      }
    });
  }
}
