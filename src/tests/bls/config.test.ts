import { describe, it, expect } from 'vitest';
import { DEFAULT_API_URL, loadConfig } from '@/lib/bls/config';
import { ConfigError } from '@/lib/bls/errors';

describe('config.ts', () => {
  describe('loadConfig', () => {
    it('未設定なら既定値', () => {
      expect(loadConfig({})).toEqual({
        apiUrl: DEFAULT_API_URL,
        seriesLimit: 50,
        yearsLimit: 20,
        retry: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 32000 },
        concurrency: 2,
        timeoutMs: 60000,
        requestsPerMinute: 50,
        mappingPath: undefined,
        patternsPath: undefined,
      });
    });

    it('文字列を数値に変換し、空白のみの値は未設定として扱う', () => {
      const config = loadConfig({
        BLS_SERIES_LIMIT: ' 25 ',
        BLS_YEARS_LIMIT: '10',
        BLS_CONCURRENCY: '   ',
        BLS_MAPPING_PATH: 'data/custom.json',
      });

      expect(config.seriesLimit).toBe(25);
      expect(config.yearsLimit).toBe(10);
      expect(config.concurrency).toBe(2);
      expect(config.mappingPath).toBe('data/custom.json');
    });

    it('関係のない環境変数は無視する', () => {
      expect(loadConfig({ PATH: '/usr/bin', BLS_API_KEY_0: 'test-api-key' }).apiUrl).toBe(DEFAULT_API_URL);
    });

    it('不正な値はすべて列挙して ConfigError', () => {
      let caught: unknown;
      try {
        loadConfig({ BLS_API_URL: 'not-a-url', BLS_CONCURRENCY: '0' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught).toMatchObject({
        code: 'CONFIG',
        issues: ['BLS_API_URL: Invalid url', 'BLS_CONCURRENCY: Number must be greater than 0'],
        message: 'Invalid configuration: BLS_API_URL: Invalid url; BLS_CONCURRENCY: Number must be greater than 0',
      });
    });

    it('最大遅延が基本遅延より小さい場合は ConfigError', () => {
      expect(() => loadConfig({ BLS_BACKOFF_BASE_MS: '5000', BLS_BACKOFF_MAX_MS: '1000' })).toThrow(
        new ConfigError('Invalid configuration: BLS_BACKOFF_MAX_MS: must be >= BLS_BACKOFF_BASE_MS')
      );
    });
  });
});
