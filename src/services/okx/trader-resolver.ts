import { InvalidInputError } from '../../utils/error-handler';
import { TraderId, isTraderId } from '../../types/monitor';
import { logger } from '../../utils/logger';

const ACCOUNT_PATH_PATTERN = /account\/([A-Za-z0-9]+)/;
const UNIQUE_CODE_PARAM_PATTERN = /uniqueCode=([A-Za-z0-9]+)/;
const SHORT_LINK_HOST_MARKER = 'oyidl';

export interface RedirectResolver {
  resolveRedirect(url: string): Promise<string>;
}

export function isShortLink(input: string): boolean {
  const lower = input.toLowerCase();
  return lower.startsWith('http') && lower.includes(SHORT_LINK_HOST_MARKER);
}

/**
 * Pulls a trader code out of a profile link (`.../account/<code>` or
 * `?uniqueCode=<code>`) or accepts a bare code.
 */
export function extractTraderId(text: string): TraderId | null {
  const fromPath = ACCOUNT_PATH_PATTERN.exec(text)?.[1];
  if (fromPath && isTraderId(fromPath)) {
    return fromPath;
  }

  const fromParam = UNIQUE_CODE_PARAM_PATTERN.exec(text)?.[1];
  if (fromParam && isTraderId(fromParam)) {
    return fromParam;
  }

  return isTraderId(text) ? text : null;
}

export class TraderResolver {
  constructor(private readonly redirects: RedirectResolver) {}

  /**
   * Accepts a full profile link, a short share link or a raw trader id.
   * Throws InvalidInputError when nothing usable is found.
   */
  async resolveTraderId(input: string): Promise<TraderId> {
    const text = input.trim();
    if (!text) {
      throw new InvalidInputError('Trader link or id is empty');
    }

    if (isShortLink(text)) {
      const finalUrl = await this.followShortLink(text);
      const resolved = finalUrl ? extractTraderId(finalUrl) : null;
      if (resolved) {
        return resolved;
      }
    }

    const traderId = extractTraderId(text);
    if (!traderId) {
      throw new InvalidInputError(`Unrecognized trader link or id: ${text}`);
    }
    return traderId;
  }

  private async followShortLink(url: string): Promise<string | null> {
    try {
      return await this.redirects.resolveRedirect(url);
    } catch (error) {
      logger.warn('Failed to resolve short link', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
