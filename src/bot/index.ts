export { BotService } from './bot-service';
export type { BotServiceConfig } from './bot-service';
export * from './handlers';
export * from './middleware';
