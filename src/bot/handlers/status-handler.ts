import { BaseCommandHandler, HandlerDependencies, ReplyContext } from './base-handler';
import { formatStatusReport } from '../../services/notifications/notification-templates';

export class StatusHandler extends BaseCommandHandler {
  constructor(deps: HandlerDependencies) {
    super(deps, 'status', 'Health of every monitored trader');
  }

  async handle(ctx: ReplyContext): Promise<void> {
    const { monitor } = this.deps;
    await this.reply(ctx, formatStatusReport(monitor.getAllHealth(), monitor.isRunning()));
  }
}
