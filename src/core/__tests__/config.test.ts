import { ZodError } from 'zod';
import { DEFAULT_BASE_URL, defaultBaseUrl, resolveConfiguration } from '../config';

describe('config', () => {
  describe('resolveConfiguration', () => {
    it('trims the key and falls back to the default base URL', () => {
      const config = resolveConfiguration({ apiKey: '  test-key  ' }, {});

      expect(config).toEqual({
        apiKey: 'test-key',
        appUserId: undefined,
        baseUrl: DEFAULT_BASE_URL,
        timeoutMs: undefined,
      });
    });

    it('keeps explicit options', () => {
      const config = resolveConfiguration(
        { apiKey: 'test-key', appUserId: 'user_123', baseUrl: 'https://sync.test', timeoutMs: 5000 },
        { ENTITLEMENT_SYNC_BASE_URL: 'https://ignored.test' }
      );

      expect(config).toEqual({
        apiKey: 'test-key',
        appUserId: 'user_123',
        baseUrl: 'https://sync.test',
        timeoutMs: 5000,
      });
    });

    it('takes the base URL from the environment', () => {
      const config = resolveConfiguration(
        { apiKey: 'test-key' },
        { ENTITLEMENT_SYNC_BASE_URL: 'https://staging.test' }
      );

      expect(config.baseUrl).toBe('https://staging.test');
    });

    it('rejects a blank api key', () => {
      expect(() => resolveConfiguration({ apiKey: '   ' }, {})).toThrow(ZodError);
    });

    it('rejects a blank user id', () => {
      expect(() => resolveConfiguration({ apiKey: 'test-key', appUserId: '' }, {})).toThrow(ZodError);
    });

    it('rejects a malformed base URL and a negative timeout', () => {
      expect(() => resolveConfiguration({ apiKey: 'test-key', baseUrl: 'not a url' }, {})).toThrow(ZodError);
      expect(() => resolveConfiguration({ apiKey: 'test-key', timeoutMs: -1 }, {})).toThrow(ZodError);
    });
  });

  it('ignores a blank base URL in the environment', () => {
    expect(defaultBaseUrl({ ENTITLEMENT_SYNC_BASE_URL: '  ' })).toBe(DEFAULT_BASE_URL);
  });
});
