import { BaseCommandHandler, HandlerDependencies, ReplyContext } from './base-handler';
import { toTraderId } from '../../types/monitor';
import { escapeHtml } from '../../services/notifications/notification-templates';

/**
 * /enable and /disable. A disabled trader keeps its baseline.
 */
export class ToggleHandler extends BaseCommandHandler {
  private readonly enable: boolean;

  constructor(deps: HandlerDependencies, enable: boolean) {
    super(
      deps,
      enable ? 'enable' : 'disable',
      enable ? 'Resume polling a trader: /enable <id>' : 'Pause polling a trader: /disable <id>'
    );
    this.enable = enable;
  }

  async handle(ctx: ReplyContext, args: string[]): Promise<void> {
    const input = args[0];
    if (!input) {
      await this.reply(ctx, `Usage: /${this.command} &lt;trader id&gt;`);
      return;
    }

    const traderId = toTraderId(input);
    const health = this.enable
      ? this.deps.monitor.enableTrader(traderId)
      : this.deps.monitor.disableTrader(traderId);

    await this.reply(
      ctx,
      this.enable
        ? `▶️ Polling resumed for <b>${escapeHtml(health.alias)}</b>.`
        : `⏸️ Polling paused for <b>${escapeHtml(health.alias)}</b>.`
    );
  }
}
