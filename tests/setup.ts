// Test environment; set before any module reads the config
process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'error';
process.env['TELEGRAM_BOT_TOKEN'] = 'test-bot-token';
process.env['TELEGRAM_CHAT_ID'] = 'test-chat';
process.env['MONITOR_TRADERS'] = '';

afterEach(() => {
  jest.useRealTimers();
});
