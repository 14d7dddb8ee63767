import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel, setLogLevel } from '@/lib/utils/logger';

function lastPayload(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const calls = spy.mock.calls;
  return JSON.parse(String(calls[calls.length - 1][0]));
}

describe('logger.ts', () => {
  afterEach(() => {
    setLogLevel('debug');
  });

  it('1行1JSONで stderr に出力する', () => {
    setLogLevel('debug');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger({ module: 'orchestrator', runId: 'run-1' }).info('Chunk fetched', { chunkIndex: 3 });

    expect(error).toHaveBeenCalledTimes(1);
    const payload = lastPayload(error);
    expect(payload).toMatchObject({
      level: 'info',
      message: 'Chunk fetched',
      module: 'orchestrator',
      runId: 'run-1',
      chunkIndex: 3,
    });
    expect(typeof payload.timestamp).toBe('string');
  });

  it('warn は console.warn', () => {
    setLogLevel('debug');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createLogger().warn('Retrying');

    expect(lastPayload(warn)).toMatchObject({ level: 'warn', message: 'Retrying' });
  });

  it('最小レベル未満は出力しない', () => {
    setLogLevel('warn');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const log = createLogger();
    log.debug('hidden');
    log.info('hidden');
    log.error('shown');

    expect(error).toHaveBeenCalledTimes(1);
    expect(lastPayload(error).message).toBe('shown');
  });

  it('エラーは cause を含めてシリアライズする', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger().error('Failed', { error: new Error('boom', { cause: new Error('root') }) });

    expect(lastPayload(error).error).toMatchObject({
      name: 'Error',
      message: 'boom',
      cause: { name: 'Error', message: 'root' },
    });
  });

  it('子ロガーはコンテキストを引き継ぐ', () => {
    setLogLevel('debug');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger({ module: 'bls-client' }).child({ chunkIndex: 2 }).debug('BLS API request');

    expect(lastPayload(error)).toMatchObject({ module: 'bls-client', chunkIndex: 2, message: 'BLS API request' });
  });

  it('タイマーは経過時間を記録する', () => {
    vi.useFakeTimers();
    setLogLevel('debug');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const timer = createLogger().startTimer('Extraction');
    vi.advanceTimersByTime(250);

    expect(timer.end({ rowCount: 36 })).toBe(250);
    expect(lastPayload(error)).toMatchObject({ message: 'Extraction completed', rowCount: 36, durationMs: 250 });

    expect(timer.endWithError(new Error('x'))).toBe(250);
    expect(lastPayload(error)).toMatchObject({ level: 'error', message: 'Extraction failed' });
  });

  it('isLogLevel', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
