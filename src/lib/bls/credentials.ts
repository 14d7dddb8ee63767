/**
 * API キー供給
 *
 * @description クライアントは「次に使うキー」を受け取るだけで、キープールの管理はしない
 */

import { ConfigError } from './errors';

/** 環境変数のキー接頭辞（BLS_API_KEY_0, BLS_API_KEY_1, ...） */
export const API_KEY_ENV_PREFIX = 'BLS_API_KEY_';

/**
 * キー供給インターフェース
 */
export interface CredentialProvider {
  /** 次のリクエストに付与するキー（未登録利用の場合は undefined） */
  nextKey(): string | undefined;
}

/**
 * 固定キー（テスト・単一キー運用向け）
 */
export class StaticCredential implements CredentialProvider {
  constructor(private readonly key: string | undefined) {}

  nextKey(): string | undefined {
    return this.key;
  }
}

/**
 * 環境変数のキープールからランダムに選択
 */
export class EnvKeyPool implements CredentialProvider {
  readonly size: number;

  private constructor(
    private readonly keys: readonly string[],
    private readonly random: () => number
  ) {
    this.size = keys.length;
  }

  /**
   * BLS_API_KEY_* と BLS_API_KEY からプールを構築
   *
   * @throws {ConfigError} キーが1つもない場合
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    random: () => number = Math.random
  ): EnvKeyPool {
    const keys = Object.keys(env)
      .filter((name) => name.startsWith(API_KEY_ENV_PREFIX) || name === 'BLS_API_KEY')
      .sort()
      .map((name) => env[name]?.trim() ?? '')
      .filter((value) => value.length > 0);

    const unique = [...new Set(keys)];
    if (unique.length === 0) {
      throw new ConfigError(
        `No BLS API keys found. Set ${API_KEY_ENV_PREFIX}0 (or BLS_API_KEY) in the environment.`
      );
    }
    return new EnvKeyPool(unique, random);
  }

  nextKey(): string {
    const index = Math.min(Math.floor(this.random() * this.keys.length), this.keys.length - 1);
    return this.keys[index];
  }
}
