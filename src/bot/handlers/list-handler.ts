import { BaseCommandHandler, HandlerDependencies, ReplyContext } from './base-handler';
import { escapeHtml } from '../../services/notifications/notification-templates';

export class ListHandler extends BaseCommandHandler {
  constructor(deps: HandlerDependencies) {
    super(deps, 'list', 'List monitored traders');
  }

  async handle(ctx: ReplyContext): Promise<void> {
    const healths = this.deps.monitor.getAllHealth();

    if (healths.length === 0) {
      await this.reply(ctx, '📭 No traders monitored yet.\n\nUse /add &lt;link or id&gt; [alias] to start.');
      return;
    }

    const lines = healths.map((health, index) => {
      const state = health.enabled ? '' : ' (paused)';
      return `${index + 1}. <b>${escapeHtml(health.alias)}</b>${state}\n   <code>${health.traderId}</code>`;
    });

    await this.reply(ctx, `📋 <b>Monitored traders</b> (${healths.length})\n\n${lines.join('\n')}`);
  }
}
