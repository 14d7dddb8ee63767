/**
 * 構造化ロギングユーティリティ
 *
 * @description 1行1JSONで出力し、jq 等で集計しやすくする
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** モジュール名 */
  module?: string;
  /** 実行ID (UUID) */
  runId?: string;
  /** チャンク番号 */
  chunkIndex?: number;
  /** 系列ID */
  seriesId?: string;
  /** 処理行数 */
  rowCount?: number;
  /** 処理時間（ミリ秒） */
  durationMs?: number;
  /** エラーコード */
  errorCode?: string;
  /** その他のコンテキスト */
  [key: string]: unknown;
}

interface LogPayload extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

/**
 * ログレベルの優先度
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * 最小ログレベル（モジュールロード時に環境変数から決定、CLI から上書き可）
 */
let minLogLevel: LogLevel = (() => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
})();

/**
 * 最小ログレベルを変更（CLI の --log オプション用）
 */
export function setLogLevel(level: LogLevel): void {
  minLogLevel = level;
}

/**
 * ログを出力すべきかどうかを判定
 */
function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLogLevel];
}

/**
 * エラーオブジェクトをシリアライズ可能な形式に変換
 */
function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack?.split('\n').slice(0, 5).join('\n'), // スタックトレースを5行に制限
      ...(error.cause ? { cause: serializeError(error.cause) } : {}),
    };
  }
  return { value: String(error) };
}

/**
 * ロガーを作成
 *
 * @param defaultContext 全ログに付与するデフォルトコンテキスト
 *
 * @example
 * ```typescript
 * const logger = createLogger({ module: 'orchestrator', runId: 'xxx-xxx' });
 * logger.info('Chunk fetched', { chunkIndex: 3 });
 * logger.error('Chunk failed', { error: err, statusCode: 503 });
 * ```
 */
export function createLogger(defaultContext: LogContext = {}) {
  const log = (level: LogLevel, message: string, context: LogContext = {}) => {
    if (!shouldLog(level)) {
      return;
    }

    // エラーオブジェクトがあればシリアライズ
    const processedContext = { ...context };
    if (processedContext.error) {
      processedContext.error = serializeError(processedContext.error);
    }

    const payload: LogPayload = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...defaultContext,
      ...processedContext,
    };

    const jsonStr = JSON.stringify(payload);

    // stdout は CSV / サンプル表示に使うため、ログはすべて stderr へ
    if (level === 'warn') {
      console.warn(jsonStr);
    } else {
      console.error(jsonStr);
    }
  };

  return {
    debug: (message: string, context?: LogContext) => log('debug', message, context),
    info: (message: string, context?: LogContext) => log('info', message, context),
    warn: (message: string, context?: LogContext) => log('warn', message, context),
    error: (message: string, context?: LogContext) => log('error', message, context),

    /**
     * 子ロガーを作成（コンテキストを追加）
     */
    child: (additionalContext: LogContext) =>
      createLogger({ ...defaultContext, ...additionalContext }),

    /**
     * 処理時間を計測するタイマーを開始
     */
    startTimer: (label: string) => {
      const startTime = Date.now();
      return {
        end: (context?: LogContext) => {
          const durationMs = Date.now() - startTime;
          log('info', `${label} completed`, { ...context, durationMs });
          return durationMs;
        },
        endWithError: (error: Error, context?: LogContext) => {
          const durationMs = Date.now() - startTime;
          log('error', `${label} failed`, { ...context, durationMs, error });
          return durationMs;
        },
      };
    },
  };
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * デフォルトロガー
 */
export const logger = createLogger();
