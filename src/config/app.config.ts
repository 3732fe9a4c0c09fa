// Application configuration (single source of defaults)
//
// ENV overrides:
//   DATABASE_PATH        -> database.path
//   DB_BUSY_TIMEOUT_MS   -> database.busyTimeoutMs
//   DB_ECHO              -> database.echo ('true' enables SQL echo at debug level)
//   LOG_LEVEL            -> logging.level
//   ENABLE_FILE_LOG      -> logging.file ('1' enables the file sink)
//   LOG_DIR              -> logging.dir
// 上書き後の値は AppConfigSchema で検証し、不正値は即座に throw する。
import { z } from 'zod'

export const appConfig = {
  database: {
    path: './database/crud.db',
    busyTimeoutMs: 5000,
    echo: false,
  },
  logging: {
    level: 'info' as 'error' | 'warn' | 'info' | 'debug',
    file: false,
    dir: 'logs',
  },
}

export const AppConfigSchema = z.object({
  database: z.object({
    path: z.string().min(1),
    busyTimeoutMs: z.number().int().nonnegative(),
    echo: z.boolean(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    file: z.boolean(),
    dir: z.string().min(1),
  }),
})

export type AppConfig = z.infer<typeof AppConfigSchema>

type Env = Record<string, string | undefined>

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined
  // NaN は schema 側で弾く
  return Number(raw)
}

function parseFlag(raw: string | undefined, truthy: string): boolean | undefined {
  if (raw === undefined) return undefined
  return raw.trim().toLowerCase() === truthy
}

export function getAppConfigWithOverrides(env: Env = process.env): AppConfig {
  const candidate = {
    database: {
      path: env.DATABASE_PATH ?? appConfig.database.path,
      busyTimeoutMs: parseNumber(env.DB_BUSY_TIMEOUT_MS) ?? appConfig.database.busyTimeoutMs,
      echo: parseFlag(env.DB_ECHO, 'true') ?? appConfig.database.echo,
    },
    logging: {
      level: env.LOG_LEVEL?.toLowerCase() ?? appConfig.logging.level,
      file: parseFlag(env.ENABLE_FILE_LOG, '1') ?? appConfig.logging.file,
      dir: env.LOG_DIR ?? appConfig.logging.dir,
    },
  }

  const parsed = AppConfigSchema.safeParse(candidate)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ')
    throw new Error(`AppConfig validation failed: ${detail}`)
  }
  return parsed.data
}
