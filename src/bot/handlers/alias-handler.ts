import { BaseCommandHandler, HandlerDependencies, ReplyContext } from './base-handler';
import { toTraderId } from '../../types/monitor';
import { escapeHtml } from '../../services/notifications/notification-templates';

export class AliasHandler extends BaseCommandHandler {
  constructor(deps: HandlerDependencies) {
    super(deps, 'alias', 'Rename a trader: /alias <id> <alias>');
  }

  async handle(ctx: ReplyContext, args: string[]): Promise<void> {
    const [input, ...aliasParts] = args;
    if (!input || aliasParts.length === 0) {
      await this.reply(ctx, 'Usage: /alias &lt;trader id&gt; &lt;alias&gt;');
      return;
    }

    const health = this.deps.monitor.setAlias(toTraderId(input), aliasParts.join(' '));
    await this.reply(ctx, `🏷️ <code>${health.traderId}</code> is now <b>${escapeHtml(health.alias)}</b>.`);
  }
}
