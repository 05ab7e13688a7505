import { BaseCommandHandler, HandlerDependencies, ReplyContext } from './base-handler';
import { escapeHtml } from '../../services/notifications/notification-templates';

export class AddHandler extends BaseCommandHandler {
  constructor(deps: HandlerDependencies) {
    super(deps, 'add', 'Monitor a trader: /add <link or id> [alias]');
  }

  async handle(ctx: ReplyContext, args: string[]): Promise<void> {
    const [input, ...aliasParts] = args;
    if (!input) {
      await this.reply(ctx, 'Usage: /add &lt;profile link, short link or trader id&gt; [alias]');
      return;
    }

    const traderId = await this.deps.resolver.resolveTraderId(input);
    const health = this.deps.monitor.addTrader(traderId, aliasParts.join(' ') || undefined);

    await this.reply(
      ctx,
      '✅ <b>Trader added</b>\n\n' +
        `🏷️ ${escapeHtml(health.alias)}\n` +
        `🆔 <code>${traderId}</code>\n\n` +
        'Current positions become the baseline; changes from now on are reported.'
    );
  }
}
