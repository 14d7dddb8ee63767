import { vi, beforeEach, afterEach } from 'vitest';

// 環境変数
process.env.NODE_ENV = 'test';

// 各テスト前にモックをクリアし、ログ出力を抑制
beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

// 各テスト後にタイマーをリセット
afterEach(() => {
  vi.useRealTimers();
});
