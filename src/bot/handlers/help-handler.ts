import { BaseCommandHandler, HandlerDependencies, ReplyContext } from './base-handler';
import { escapeHtml } from '../../services/notifications/notification-templates';

export class HelpHandler extends BaseCommandHandler {
  private readonly listCommands: () => BaseCommandHandler[];

  constructor(deps: HandlerDependencies, listCommands: () => BaseCommandHandler[]) {
    super(deps, 'help', 'Show this help message');
    this.listCommands = listCommands;
  }

  async handle(ctx: ReplyContext): Promise<void> {
    const lines = this.listCommands().map(
      handler => `/${handler.command} - ${escapeHtml(handler.description)}`
    );
    await this.reply(ctx, `📋 <b>Commands</b>\n\n${lines.join('\n')}`);
  }
}
