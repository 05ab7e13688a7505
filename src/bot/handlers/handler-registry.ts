import { Telegraf } from 'telegraf';
import { BaseCommandHandler, HandlerDependencies } from './base-handler';
import { AddHandler } from './add-handler';
import { RemoveHandler } from './remove-handler';
import { ToggleHandler } from './toggle-handler';
import { AliasHandler } from './alias-handler';
import { ListHandler } from './list-handler';
import { StatusHandler } from './status-handler';
import { PositionsHandler } from './positions-handler';
import { BrowseHandler } from './browse-handler';
import { HelpHandler } from './help-handler';
import { logger } from '../../utils/logger';

export class HandlerRegistry {
  private handlers: Map<string, BaseCommandHandler> = new Map();

  constructor(deps: HandlerDependencies) {
    const handlers = [
      new AddHandler(deps),
      new RemoveHandler(deps),
      new ToggleHandler(deps, true),
      new ToggleHandler(deps, false),
      new AliasHandler(deps),
      new ListHandler(deps),
      new StatusHandler(deps),
      new PositionsHandler(deps),
      new BrowseHandler(deps),
      new HelpHandler(deps, () => this.getAllHandlers()),
    ];

    for (const handler of handlers) {
      this.handlers.set(handler.command, handler);
    }
  }

  getAllHandlers(): BaseCommandHandler[] {
    return Array.from(this.handlers.values());
  }

  registerAll(bot: Telegraf): void {
    for (const handler of this.handlers.values()) {
      handler.register(bot);
    }
    logger.info(`Initialized ${this.handlers.size} command handlers`);
  }
}
