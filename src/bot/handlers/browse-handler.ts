import { BaseCommandHandler, HandlerDependencies, ReplyContext } from './base-handler';
import { formatLeadTraderList } from '../../services/notifications/notification-templates';

const DEFAULT_BROWSE_LIMIT = 10;
const MAX_BROWSE_LIMIT = 50;

export class BrowseHandler extends BaseCommandHandler {
  constructor(deps: HandlerDependencies) {
    super(deps, 'browse', 'Top public lead traders: /browse [count]');
  }

  async handle(ctx: ReplyContext, args: string[]): Promise<void> {
    const requested = args[0] ? parseInt(args[0], 10) : DEFAULT_BROWSE_LIMIT;
    const limit = Number.isFinite(requested) && requested > 0
      ? Math.min(requested, MAX_BROWSE_LIMIT)
      : DEFAULT_BROWSE_LIMIT;

    const traders = await this.deps.directory.listLeadTraders(limit);
    await this.reply(ctx, `${formatLeadTraderList(traders)}\n\nAdd one with /add &lt;id&gt;.`);
  }
}
