export { chatGuardMiddleware, isAllowedChat } from './auth';
