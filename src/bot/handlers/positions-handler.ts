import { BaseCommandHandler, HandlerDependencies, ReplyContext } from './base-handler';
import { toTraderId } from '../../types/monitor';
import { formatPositionsList } from '../../services/notifications/notification-templates';

export class PositionsHandler extends BaseCommandHandler {
  constructor(deps: HandlerDependencies) {
    super(deps, 'positions', 'Last known positions: /positions <id>');
  }

  async handle(ctx: ReplyContext, args: string[]): Promise<void> {
    const input = args[0];
    if (!input) {
      await this.reply(ctx, 'Usage: /positions &lt;trader id&gt;');
      return;
    }

    const traderId = toTraderId(input);
    const health = this.deps.monitor.getHealth(traderId);
    if (!health) {
      await this.reply(ctx, `⚠️ <code>${traderId}</code> is not monitored.`);
      return;
    }
    if (health.status === 'uninitialized') {
      await this.reply(ctx, '⏳ No snapshot yet, try again after the first poll.');
      return;
    }

    await this.reply(ctx, formatPositionsList(health.alias, this.deps.monitor.getPositions(traderId)));
  }
}
