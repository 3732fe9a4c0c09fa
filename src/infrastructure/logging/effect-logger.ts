/**
 * Effect Logger Layer
 *
 * getLogger() の LoggerPort を Effect プログラムへ橋渡しする。
 *  - LoggerEffectService Tag / LoggerEffectLayer (live 実装)
 *  - withEffectLogContext: FiberRef に積んだメタデータを以降のログへ付与
 *  - logDebug/logInfo/logWarn/logError: structured message + meta
 *
 * The layer resolves the logger when it is built, so tests that swap the
 * logger with setLogger() before running a program see their own instance.
 */

import { Context, Effect, FiberRef, Layer } from 'effect'
import { getLogger, type LoggerPort } from '@/infrastructure/logging/logger'

type LogMeta = Readonly<Record<string, unknown>>

const LogMetaRef = FiberRef.unsafeMake<LogMeta>({})

export interface LoggerEffectService {
  readonly withMeta: (
    meta: Record<string, unknown>,
  ) => <A, E, R>(eff: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>
  readonly logDebug: (msg: string, meta?: Record<string, unknown>) => Effect.Effect<void>
  readonly logInfo: (msg: string, meta?: Record<string, unknown>) => Effect.Effect<void>
  readonly logWarn: (msg: string, meta?: Record<string, unknown>) => Effect.Effect<void>
  readonly logError: (msg: string, meta?: Record<string, unknown>) => Effect.Effect<void>
}

export const LoggerEffectService = Context.GenericTag<LoggerEffectService>('LoggerEffectService')

function mergeMeta(base: LogMeta, patch?: Record<string, unknown>): Record<string, unknown> {
  if (!patch || Object.keys(patch).length === 0) return { ...base }
  return { ...base, ...patch }
}

const makeService = (logger: LoggerPort): LoggerEffectService => {
  const emit =
    (write: (msg: string, meta: Record<string, unknown>) => void) =>
    (msg: string, meta?: Record<string, unknown>) =>
      Effect.flatMap(FiberRef.get(LogMetaRef), (ctx) =>
        Effect.sync(() => write(msg, mergeMeta(ctx, meta))),
      )

  return {
    withMeta: (meta) => (eff) =>
      Effect.flatMap(FiberRef.get(LogMetaRef), (prev) =>
        Effect.locally(LogMetaRef, mergeMeta(prev, meta))(eff),
      ),
    logDebug: emit((msg, meta) => logger.debug(msg, meta)),
    logInfo: emit((msg, meta) => logger.info(msg, meta)),
    logWarn: emit((msg, meta) => logger.warn(msg, meta)),
    logError: emit((msg, meta) => logger.error(msg, meta)),
  }
}

export const LoggerEffectLayer = Layer.effect(
  LoggerEffectService,
  Effect.sync(() => makeService(getLogger())),
)

// Effect 内でメタ付与 (例: withEffectLogContext({ entity: 'users' })(program))
export const withEffectLogContext =
  (meta: Record<string, unknown>) =>
  <A, E, R>(eff: Effect.Effect<A, E, R>) =>
    Effect.flatMap(LoggerEffectService, (svc) => svc.withMeta(meta)(eff))

export const logDebug = (msg: string, meta?: Record<string, unknown>) =>
  Effect.flatMap(LoggerEffectService, (svc) => svc.logDebug(msg, meta))
export const logInfo = (msg: string, meta?: Record<string, unknown>) =>
  Effect.flatMap(LoggerEffectService, (svc) => svc.logInfo(msg, meta))
export const logWarn = (msg: string, meta?: Record<string, unknown>) =>
  Effect.flatMap(LoggerEffectService, (svc) => svc.logWarn(msg, meta))
export const logError = (msg: string, meta?: Record<string, unknown>) =>
  Effect.flatMap(LoggerEffectService, (svc) => svc.logError(msg, meta))

export type { LoggerPort } from '@/infrastructure/logging/logger'
