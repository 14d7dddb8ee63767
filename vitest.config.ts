import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    // 環境: Node.js（ブラウザAPIは不使用）
    environment: 'node',

    // グローバルAPI有効（describe, it, expect をimport不要に）
    globals: true,

    // テストファイルパターン
    include: ['src/tests/**/*.test.ts'],

    // セットアップファイル
    setupFiles: ['./src/tests/setup.ts'],

    // タイムアウト（ms）
    testTimeout: 10000,

    // モック設定
    mockReset: true,
    restoreMocks: true,

    // カバレッジ
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        // utils
        'src/lib/utils/retry.ts',
        'src/lib/utils/logger.ts',
        'src/lib/utils/batch.ts',
        'src/lib/utils/csv.ts',
        // bls
        'src/lib/bls/alias-resolver.ts',
        'src/lib/bls/series-patterns.ts',
        'src/lib/bls/chunk-planner.ts',
        'src/lib/bls/client.ts',
        'src/lib/bls/credentials.ts',
        'src/lib/bls/normalizer.ts',
        'src/lib/bls/orchestrator.ts',
        'src/lib/bls/table.ts',
        'src/lib/bls/config.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },
  },

  // パスエイリアス
  resolve: {
    alias: {
      '@': path.resolve(__dirname, './src'),
    },
  },
});
