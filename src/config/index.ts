// 設定モジュールの統合エクスポート

export { type AppConfig, AppConfigSchema, appConfig, getAppConfigWithOverrides } from './app.config'

import { type AppConfig, getAppConfigWithOverrides } from './app.config'

// 初期化が必要な場合のヘルパー
export function ensureConfigLoaded(): void {
  try {
    getAppConfigWithOverrides()
  } catch (error) {
    throw new Error(
      `Configuration loading failed: ${
        error instanceof Error ? error.message : 'Unknown error'
      }. Check app.config.ts and the environment overrides.`,
    )
  }
}

// アプリケーション設定を取得（環境変数オーバーライド適用済み）
export function getAppConfig(): AppConfig {
  return getAppConfigWithOverrides()
}

export function getDatabaseConfig(): AppConfig['database'] {
  return getAppConfig().database
}

export function getLoggingConfig(): AppConfig['logging'] {
  return getAppConfig().logging
}
