import { Telegraf } from 'telegraf';
import { logger } from '../../utils/logger';
import { AppError, ErrorType, describeError } from '../../utils/error-handler';
import { LeadTraderDirectory } from '../../types/monitor';
import { PositionMonitor } from '../../services/position-monitor';
import { TraderResolver } from '../../services/okx/trader-resolver';

/**
 * The part of a telegraf Context the handlers use.
 */
export interface ReplyContext {
  reply(text: string, extra?: { parse_mode?: 'HTML' }): Promise<unknown>;
}

export interface HandlerDependencies {
  monitor: PositionMonitor;
  resolver: Pick<TraderResolver, 'resolveTraderId'>;
  directory: LeadTraderDirectory;
}

export abstract class BaseCommandHandler {
  protected readonly deps: HandlerDependencies;
  readonly command: string;
  readonly description: string;

  constructor(deps: HandlerDependencies, command: string, description: string) {
    this.deps = deps;
    this.command = command;
    this.description = description;
  }

  abstract handle(ctx: ReplyContext, args: string[]): Promise<void>;

  parseArgs(text?: string): string[] {
    if (!text) {
      return [];
    }
    return text.trim().split(/\s+/).slice(1);
  }

  /**
   * Runs the handler; user errors are answered with their message, anything
   * else with a generic reply.
   */
  async execute(ctx: ReplyContext, args: string[]): Promise<void> {
    try {
      await this.handle(ctx, args);
    } catch (error) {
      await this.handleError(ctx, error);
    }
  }

  register(bot: Telegraf): void {
    bot.command(this.command, async ctx => {
      await this.execute(ctx, this.parseArgs(ctx.message.text));
    });
  }

  protected async reply(ctx: ReplyContext, message: string): Promise<void> {
    await ctx.reply(message, { parse_mode: 'HTML' });
  }

  protected async handleError(ctx: ReplyContext, error: unknown): Promise<void> {
    const details = describeError(error);

    if (error instanceof AppError && error.type === ErrorType.VALIDATION) {
      logger.info(`Rejected /${this.command} input`, { reason: details.message });
      await ctx.reply(`⚠️ ${details.message}`);
      return;
    }

    logger.error(`Error in /${this.command} handler`, { error: details });
    await ctx.reply('❌ An error occurred. Please try again later.');
  }
}
