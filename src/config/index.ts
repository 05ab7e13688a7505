import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

interface Config {
  okx: {
    apiKey: string;
    secretKey: string;
    passphrase: string;
    baseUrl: string;
    instType: string;
    requestTimeoutMs: number;
  };
  telegram: {
    botToken: string;
    chatId: string;
  };
  monitor: {
    pollIntervalSeconds: number;
    sizeEpsilon: number;
    failureThreshold: number;
    traders: string;
  };
  server: {
    nodeEnv: string;
    logLevel: string;
  };
}

type Env = Record<string, string | undefined>;

function loadConfig(env: Env = process.env): Config {
  return {
    okx: {
      apiKey: env['OKX_API_KEY'] || '',
      secretKey: env['OKX_SECRET_KEY'] || '',
      passphrase: env['OKX_PASSPHRASE'] || '',
      baseUrl: env['OKX_BASE_URL'] || 'https://www.okx.com',
      instType: env['OKX_INST_TYPE'] || 'SWAP',
      requestTimeoutMs: parseInt(env['OKX_REQUEST_TIMEOUT_MS'] || '15000', 10),
    },
    telegram: {
      botToken: env['TELEGRAM_BOT_TOKEN'] || '',
      chatId: env['TELEGRAM_CHAT_ID'] || '',
    },
    monitor: {
      pollIntervalSeconds: parseFloat(env['MONITOR_POLL_INTERVAL_SECONDS'] || '10'),
      sizeEpsilon: parseFloat(env['MONITOR_SIZE_EPSILON'] || '0.0001'),
      failureThreshold: parseInt(env['MONITOR_FAILURE_THRESHOLD'] || '5', 10),
      traders: env['MONITOR_TRADERS'] || '',
    },
    server: {
      nodeEnv: env['NODE_ENV'] || 'development',
      logLevel: env['LOG_LEVEL'] || 'info',
    },
  };
}

const config: Config = loadConfig();

export { config, loadConfig };
export type { Config, Env };
