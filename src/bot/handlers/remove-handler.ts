import { BaseCommandHandler, HandlerDependencies, ReplyContext } from './base-handler';
import { toTraderId } from '../../types/monitor';
import { escapeHtml } from '../../services/notifications/notification-templates';

export class RemoveHandler extends BaseCommandHandler {
  constructor(deps: HandlerDependencies) {
    super(deps, 'remove', 'Stop monitoring a trader: /remove <id>');
  }

  async handle(ctx: ReplyContext, args: string[]): Promise<void> {
    const input = args[0];
    if (!input) {
      await this.reply(ctx, 'Usage: /remove &lt;trader id&gt;');
      return;
    }

    const traderId = toTraderId(input);
    const alias = this.deps.monitor.getHealth(traderId)?.alias ?? traderId;
    this.deps.monitor.removeTrader(traderId);

    await this.reply(ctx, `🗑️ Stopped monitoring <b>${escapeHtml(alias)}</b>.`);
  }
}
