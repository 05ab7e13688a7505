import { Context, MiddlewareFn } from 'telegraf';
import { logger } from '../../utils/logger';

export function isAllowedChat(chatId: number | string | undefined, allowedChatId: string): boolean {
  return chatId !== undefined && String(chatId) === allowedChatId;
}

/**
 * Drops every update that does not come from the configured chat.
 */
export const chatGuardMiddleware = (allowedChatId: string): MiddlewareFn<Context> => {
  return async (ctx: Context, next: () => Promise<void>) => {
    if (!isAllowedChat(ctx.chat?.id, allowedChatId)) {
      logger.warn('Ignoring update from unauthorized chat', {
        chatId: ctx.chat?.id,
        userId: ctx.from?.id,
      });
      return;
    }
    await next();
  };
};
