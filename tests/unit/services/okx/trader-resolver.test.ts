import { TraderResolver, extractTraderId, isShortLink } from '@/services/okx/trader-resolver';
import { InvalidInputError, NetworkError } from '@/utils/error-handler';

describe('extractTraderId', () => {
  it('reads the code from a profile path', () => {
    expect(extractTraderId('https://www.okx.com/copy-trading/account/ABCDEF1234567890?tab=swap')).toBe(
      'ABCDEF1234567890'
    );
  });

  it('reads the code from a uniqueCode parameter', () => {
    expect(extractTraderId('https://www.okx.com/copy-trading/trader?uniqueCode=ABCDEF1234567890&x=1')).toBe(
      'ABCDEF1234567890'
    );
  });

  it('accepts a bare code and rejects anything else', () => {
    expect(extractTraderId('ABCDEF1234567890')).toBe('ABCDEF1234567890');
    expect(extractTraderId('short')).toBeNull();
    expect(extractTraderId('https://www.okx.com/markets')).toBeNull();
  });
});

describe('isShortLink', () => {
  it('recognizes share links', () => {
    expect(isShortLink('https://oyidl.net/ul/4Xy9')).toBe(true);
    expect(isShortLink('https://www.okx.com/copy-trading/account/ABCDEF1234567890')).toBe(false);
    expect(isShortLink('oyidl')).toBe(false);
  });
});

describe('TraderResolver', () => {
  const resolveRedirect = jest.fn<Promise<string>, [string]>();
  const resolver = new TraderResolver({ resolveRedirect });

  beforeEach(() => {
    resolveRedirect.mockReset();
  });

  it('trims a raw id', async () => {
    await expect(resolver.resolveTraderId('  ABCDEF1234567890 ')).resolves.toBe('ABCDEF1234567890');
    expect(resolveRedirect).not.toHaveBeenCalled();
  });

  it('follows a short link to the profile it points at', async () => {
    resolveRedirect.mockResolvedValue('https://www.okx.com/copy-trading/account/ABCDEF1234567890?tab=swap');

    await expect(resolver.resolveTraderId('https://oyidl.net/ul/4Xy9')).resolves.toBe('ABCDEF1234567890');
    expect(resolveRedirect).toHaveBeenCalledWith('https://oyidl.net/ul/4Xy9');
  });

  it('rejects a short link that cannot be followed', async () => {
    resolveRedirect.mockRejectedValue(new NetworkError('Network error: ETIMEDOUT'));

    await expect(resolver.resolveTraderId('https://oyidl.net/ul/4Xy9')).rejects.toThrow(
      'Unrecognized trader link or id: https://oyidl.net/ul/4Xy9'
    );
  });

  it('rejects empty and unrecognized input', async () => {
    await expect(resolver.resolveTraderId('   ')).rejects.toThrow('Trader link or id is empty');
    await expect(resolver.resolveTraderId('not-a-trader')).rejects.toBeInstanceOf(InvalidInputError);
  });
});
