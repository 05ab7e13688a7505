export { BaseCommandHandler } from './base-handler';
export type { HandlerDependencies, ReplyContext } from './base-handler';
export { HandlerRegistry } from './handler-registry';
