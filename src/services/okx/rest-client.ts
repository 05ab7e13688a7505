import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { createHmac } from 'crypto';
import logger from '../../utils/logger';
import {
  ApiError,
  AppError,
  AuthenticationError,
  NetworkError,
  RateLimitError,
} from '../../utils/error-handler';
import {
  OKX_USER_AGENT,
  OkxClientConfig,
  buildOkxClientConfig,
  leadTraderPaging,
  okxEndpoints,
  okxErrorCodes,
} from '../../config/okx';
import {
  FetchOptions,
  LeadTraderDirectory,
  LeadTraderSummary,
  PositionSnapshot,
  SnapshotFetcher,
  TraderId,
  isTraderId,
} from '../../types/monitor';
import { OkxLeadTraderRank, OkxSubPosition } from '../../types/okx';
import { PositionInput, createSnapshot } from '../position-monitor/position-diff-detector';

const MAX_REDIRECTS = 5;

type QueryParams = Record<string, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value !== '') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

export function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseSubPosition(row: unknown): OkxSubPosition | null {
  if (!isRecord(row)) return null;

  const instId = readString(row, 'instId');
  const subPos = readString(row, 'subPos', 'pos');
  const openAvgPx = readString(row, 'openAvgPx', 'avgPx');
  if (!instId || subPos === undefined || openAvgPx === undefined) return null;

  return {
    instId,
    posSide: readString(row, 'posSide') ?? 'net',
    subPos,
    openAvgPx,
    subPosId: readString(row, 'subPosId'),
    markPx: readString(row, 'markPx'),
    upl: readString(row, 'upl'),
    uplRatio: readString(row, 'uplRatio'),
    lever: readString(row, 'lever'),
    margin: readString(row, 'margin'),
  };
}

export function toPositionInput(sub: OkxSubPosition): PositionInput {
  return {
    instId: sub.instId,
    posSide: sub.posSide,
    size: Number(sub.subPos),
    entryPrice: Number(sub.openAvgPx),
    markPrice: parseOptionalNumber(sub.markPx),
    unrealizedPnl: parseOptionalNumber(sub.upl),
    leverage: parseOptionalNumber(sub.lever),
  };
}

export function parseLeadTraderRank(row: unknown): OkxLeadTraderRank | null {
  if (!isRecord(row)) return null;
  const uniqueCode = readString(row, 'uniqueCode');
  if (!uniqueCode) return null;

  return {
    uniqueCode,
    nickName: readString(row, 'nickName') ?? '',
    pnl: readString(row, 'pnl'),
    pnlRatio: readString(row, 'pnlRatio'),
    winRatio: readString(row, 'winRatio'),
    aum: readString(row, 'aum'),
    copyTraderNum: readString(row, 'copyTraderNum', 'accCopyTraderNum'),
  };
}

function toLeadTraderSummary(rank: OkxLeadTraderRank, id: TraderId): LeadTraderSummary {
  return {
    id,
    alias: rank.nickName || `Trader-${id.slice(0, 8)}`,
    pnl: parseOptionalNumber(rank.pnl),
    pnlRatio: parseOptionalNumber(rank.pnlRatio),
    winRatio: parseOptionalNumber(rank.winRatio),
    aum: parseOptionalNumber(rank.aum),
    copyTraderNum: parseOptionalNumber(rank.copyTraderNum),
  };
}

/**
 * Client for the OKX v5 REST API. Public copy-trading endpoints need no
 * credentials; the signed balance call is only used as a connection check.
 */
export class OkxRestClient implements SnapshotFetcher, LeadTraderDirectory {
  private http: AxiosInstance;
  private config: OkxClientConfig;

  constructor(clientConfig: OkxClientConfig = buildOkxClientConfig(), httpClient?: AxiosInstance) {
    this.config = clientConfig;
    this.http =
      httpClient ??
      axios.create({
        baseURL: clientConfig.baseUrl,
        timeout: clientConfig.timeout,
        headers: {
          'User-Agent': OKX_USER_AGENT,
          'Content-Type': 'application/json',
        },
      });
  }

  hasCredentials(): boolean {
    return this.config.credentials !== undefined;
  }

  async fetchPositions(traderId: TraderId, options: FetchOptions = {}): Promise<PositionSnapshot> {
    const rows = await this.publicGet(
      okxEndpoints.currentSubpositions,
      { instType: this.config.instType, uniqueCode: traderId },
      options.signal
    );

    const inputs: PositionInput[] = [];
    for (const row of rows) {
      const sub = parseSubPosition(row);
      if (!sub) {
        logger.debug('Skipping unreadable sub-position row', { traderId });
        continue;
      }
      inputs.push(toPositionInput(sub));
    }

    return createSnapshot(traderId, inputs, new Date());
  }

  /**
   * Pages the public leaderboard by pnl, then by aum, until `limit` distinct
   * traders are collected or a page brings nothing new.
   */
  async listLeadTraders(limit: number = leadTraderPaging.defaultLimit): Promise<LeadTraderSummary[]> {
    const traders: LeadTraderSummary[] = [];
    const seen = new Set<string>();

    for (const sortType of leadTraderPaging.sortTypes) {
      for (let page = 1; page <= leadTraderPaging.maxPagesPerSort; page++) {
        const rows = await this.publicGet(okxEndpoints.leadTraders, {
          instType: this.config.instType,
          sortType,
          limit: String(leadTraderPaging.pageSize),
          page: String(page),
        });

        const first = rows[0];
        const ranks = isRecord(first) && Array.isArray(first['ranks']) ? first['ranks'] : [];
        let added = 0;

        for (const row of ranks) {
          const rank = parseLeadTraderRank(row);
          if (!rank || seen.has(rank.uniqueCode) || !isTraderId(rank.uniqueCode)) continue;
          seen.add(rank.uniqueCode);
          traders.push(toLeadTraderSummary(rank, rank.uniqueCode));
          added++;
        }

        if (added === 0 || traders.length >= limit) break;
      }

      if (traders.length >= limit) break;
    }

    logger.debug('Fetched lead traders', { count: traders.length, limit });
    return traders.slice(0, limit);
  }

  /**
   * Follows HTTP redirects from `url` and returns the final location.
   */
  async resolveRedirect(url: string): Promise<string> {
    let current = url;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.head(current, {
          maxRedirects: 0,
          validateStatus: () => true,
        });
      } catch (error) {
        throw this.toAppError(error);
      }

      const location = response.headers['location'];
      if (response.status < 300 || response.status >= 400 || typeof location !== 'string') {
        return current;
      }
      current = new URL(location, current).toString();
    }

    throw new ApiError(`Too many redirects resolving ${url}`, 508);
  }

  async testConnection(): Promise<{ success: boolean; message: string }> {
    if (!this.config.credentials) {
      return { success: false, message: 'OKX credentials are not configured' };
    }

    try {
      await this.signedGet(okxEndpoints.accountBalance);
      return { success: true, message: 'Connected' };
    } catch (error) {
      return { success: false, message: error instanceof Error ? error.message : String(error) };
    }
  }

  private async publicGet(path: string, params: QueryParams, signal?: AbortSignal): Promise<unknown[]> {
    try {
      const response = await this.http.get<unknown>(path, {
        params,
        signal,
        validateStatus: () => true,
      });
      return this.unwrap(response, path);
    } catch (error) {
      throw this.toAppError(error);
    }
  }

  private async signedGet(path: string, params: QueryParams = {}): Promise<unknown[]> {
    const credentials = this.config.credentials;
    if (!credentials) {
      throw new AuthenticationError('OKX credentials are not configured');
    }

    const query = new URLSearchParams(params).toString();
    const requestPath = query ? `${path}?${query}` : path;
    const timestamp = new Date().toISOString();

    try {
      const response = await this.http.get<unknown>(requestPath, {
        headers: {
          'OK-ACCESS-KEY': credentials.apiKey,
          'OK-ACCESS-SIGN': signRequest(credentials.secretKey, timestamp, 'GET', requestPath),
          'OK-ACCESS-TIMESTAMP': timestamp,
          'OK-ACCESS-PASSPHRASE': credentials.passphrase,
        },
        validateStatus: () => true,
      });
      return this.unwrap(response, path);
    } catch (error) {
      throw this.toAppError(error);
    }
  }

  private unwrap(response: AxiosResponse<unknown>, path: string): unknown[] {
    const body = response.data;
    const code = isRecord(body) ? readString(body, 'code') : undefined;
    const msg = (isRecord(body) ? readString(body, 'msg') : undefined) || `HTTP ${response.status}`;

    if (response.status === 429 || (code !== undefined && isOneOf(code, okxErrorCodes.rateLimited))) {
      throw new RateLimitError(`Rate limited on ${path}: ${msg}`);
    }
    if (
      response.status === 401 ||
      response.status === 403 ||
      (code !== undefined && isOneOf(code, okxErrorCodes.authentication))
    ) {
      throw new AuthenticationError(`Authentication rejected on ${path}: ${msg}`);
    }
    if (response.status >= 400) {
      throw new ApiError(`Request to ${path} failed: ${msg}`, response.status, code);
    }
    if (!isRecord(body) || code === undefined) {
      throw new ApiError(`Malformed response from ${path}`, 502);
    }
    if (code !== okxErrorCodes.success) {
      throw new ApiError(`OKX error ${code} on ${path}: ${msg}`, response.status, code);
    }

    const data = body['data'];
    return Array.isArray(data) ? data : [];
  }

  private toAppError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }
    if (axios.isCancel(error)) {
      return new NetworkError('Request aborted');
    }
    if (axios.isAxiosError(error)) {
      return new NetworkError(`Network error: ${error.code ?? error.message}`);
    }
    return new NetworkError(error instanceof Error ? error.message : String(error));
  }
}

function isOneOf(code: string, codes: readonly string[]): boolean {
  return codes.includes(code);
}

/**
 * Base64 HMAC-SHA256 of `timestamp + METHOD + requestPath + body`.
 */
export function signRequest(
  secretKey: string,
  timestamp: string,
  method: string,
  requestPath: string,
  body = ''
): string {
  return createHmac('sha256', secretKey)
    .update(`${timestamp}${method.toUpperCase()}${requestPath}${body}`)
    .digest('base64');
}
