import { Config, config } from './index';
import { ConfigurationError } from '../utils/error-handler';
import { TraderId, isTraderId } from '../types/monitor';

/** Largest delay a Node.js timer accepts (2^31 - 1 ms), in whole seconds */
export const MAX_POLL_INTERVAL_SECONDS = 2147483;

export interface TraderSeed {
  traderId: TraderId;
  alias?: string;
}

/**
 * Parses `id[:alias],id[:alias]`. Malformed entries are reported, not dropped.
 */
export function parseTraderSeeds(raw: string): { seeds: TraderSeed[]; problems: string[] } {
  const seeds: TraderSeed[] = [];
  const problems: string[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(',').map(part => part.trim()).filter(Boolean)) {
    const separator = entry.indexOf(':');
    const id = (separator === -1 ? entry : entry.slice(0, separator)).trim();
    const alias = separator === -1 ? undefined : entry.slice(separator + 1).trim() || undefined;

    if (!isTraderId(id)) {
      problems.push(`MONITOR_TRADERS contains an invalid trader id: "${id}"`);
      continue;
    }
    if (seen.has(id)) {
      problems.push(`MONITOR_TRADERS lists ${id} more than once`);
      continue;
    }

    seen.add(id);
    seeds.push({ traderId: id, alias });
  }

  return { seeds, problems };
}

/**
 * Checks everything needed before polling may begin and returns the parsed
 * trader seeds. Throws ConfigurationError listing every problem found.
 */
export function validateConfig(cfg: Config = config): TraderSeed[] {
  const problems: string[] = [];

  if (!cfg.telegram.botToken) {
    problems.push('TELEGRAM_BOT_TOKEN is required');
  }
  if (!cfg.telegram.chatId) {
    problems.push('TELEGRAM_CHAT_ID is required');
  }

  const credentials = [cfg.okx.apiKey, cfg.okx.secretKey, cfg.okx.passphrase];
  const provided = credentials.filter(Boolean).length;
  if (provided > 0 && provided < credentials.length) {
    problems.push('OKX_API_KEY, OKX_SECRET_KEY and OKX_PASSPHRASE must be set together');
  }

  if (!Number.isFinite(cfg.okx.requestTimeoutMs) || cfg.okx.requestTimeoutMs <= 0) {
    problems.push('OKX_REQUEST_TIMEOUT_MS must be a positive number');
  }
  if (!Number.isFinite(cfg.monitor.pollIntervalSeconds) || cfg.monitor.pollIntervalSeconds <= 0) {
    problems.push('MONITOR_POLL_INTERVAL_SECONDS must be a positive number');
  } else if (cfg.monitor.pollIntervalSeconds > MAX_POLL_INTERVAL_SECONDS) {
    problems.push(`MONITOR_POLL_INTERVAL_SECONDS must be at most ${MAX_POLL_INTERVAL_SECONDS}`);
  }
  if (!Number.isFinite(cfg.monitor.sizeEpsilon) || cfg.monitor.sizeEpsilon < 0) {
    problems.push('MONITOR_SIZE_EPSILON must be zero or a positive number');
  }
  if (!Number.isInteger(cfg.monitor.failureThreshold) || cfg.monitor.failureThreshold < 1) {
    problems.push('MONITOR_FAILURE_THRESHOLD must be an integer of at least 1');
  }

  const { seeds, problems: seedProblems } = parseTraderSeeds(cfg.monitor.traders);
  problems.push(...seedProblems);

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return seeds;
}
