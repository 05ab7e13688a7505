import { config } from './index';

export interface OkxClientConfig {
  baseUrl: string;
  instType: string;
  timeout: number;
  credentials?: {
    apiKey: string;
    secretKey: string;
    passphrase: string;
  };
}

export const okxEndpoints = {
  currentSubpositions: '/api/v5/copytrading/public-current-subpositions',
  leadTraders: '/api/v5/copytrading/public-lead-traders',
  accountBalance: '/api/v5/account/balance',
} as const;

// The public endpoints reject some non-browser clients
export const OKX_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export const okxErrorCodes = {
  success: '0',
  rateLimited: ['50011', '50061'],
  authentication: ['50111', '50112', '50113', '50114'],
} as const;

export const leadTraderPaging = {
  sortTypes: ['pnl', 'aum'],
  pageSize: 20,
  maxPagesPerSort: 5,
  defaultLimit: 100,
} as const;

export function buildOkxClientConfig(source = config.okx): OkxClientConfig {
  const hasCredentials = Boolean(source.apiKey && source.secretKey && source.passphrase);

  return {
    baseUrl: source.baseUrl.replace(/\/+$/, ''),
    instType: source.instType,
    timeout: source.requestTimeoutMs,
    credentials: hasCredentials
      ? {
          apiKey: source.apiKey,
          secretKey: source.secretKey,
          passphrase: source.passphrase,
        }
      : undefined,
  };
}
