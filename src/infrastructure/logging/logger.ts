// ---------------------------------------------------------------------------
// Pure Logger Implementation (import = zero side-effects)
//  - import 時にファイル生成/console 出力を一切行わない
//  - 初めて getLogger() が呼ばれた時のみ設定を読んで初期化
//  - 出力は 1 行 1 JSON (ts, level, msg, context, meta)
// ---------------------------------------------------------------------------

import { AsyncLocalStorage } from 'node:async_hooks'
import fs from 'node:fs'
import path from 'node:path'
import { getLoggingConfig } from '@/config'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const levelOrder: LogLevel[] = ['debug', 'info', 'warn', 'error']

function isEnabled(level: LogLevel, min: LogLevel): boolean {
  return levelOrder.indexOf(level) >= levelOrder.indexOf(min)
}

export interface LoggerPort {
  debug(msg: string, meta?: Record<string, unknown>): void
  info(msg: string, meta?: Record<string, unknown>): void
  warn(msg: string, meta?: Record<string, unknown>): void
  error(msg: string, meta?: Record<string, unknown>): void
  withContext(ctx: Record<string, unknown>): LoggerPort
}

type LogContext = Record<string, unknown>
const ctxStore = new AsyncLocalStorage<LogContext>()

export function runWithLogContext<T>(ctx: LogContext, fn: () => T): T {
  return ctxStore.run({ ...(ctxStore.getStore() ?? {}), ...ctx }, fn)
}

export function getLogContext(): LogContext | undefined {
  return ctxStore.getStore()
}

function formatRecord(
  level: LogLevel,
  msg: string,
  base: Record<string, unknown>,
  meta?: Record<string, unknown>,
): string {
  return JSON.stringify({
    ts: new Date().toISOString(),
    level,
    msg,
    ...base,
    ...(getLogContext() ?? {}),
    ...(meta ?? {}),
  })
}

export class NoopLogger implements LoggerPort {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  withContext(): LoggerPort {
    return this
  }
}

class ConsoleLogger implements LoggerPort {
  constructor(
    private readonly base: Record<string, unknown> = {},
    private readonly min: LogLevel = 'info',
  ) {}

  private line(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
    if (!isEnabled(level, this.min)) return
    // eslint-disable-next-line no-console
    console[level](formatRecord(level, msg, this.base, meta))
  }

  debug(m: string, meta?: Record<string, unknown>) {
    this.line('debug', m, meta)
  }
  info(m: string, meta?: Record<string, unknown>) {
    this.line('info', m, meta)
  }
  warn(m: string, meta?: Record<string, unknown>) {
    this.line('warn', m, meta)
  }
  error(m: string, meta?: Record<string, unknown>) {
    this.line('error', m, meta)
  }
  withContext(ctx: Record<string, unknown>): LoggerPort {
    return new ConsoleLogger({ ...this.base, ...ctx }, this.min)
  }
}

class LazyFileLogger implements LoggerPort {
  private stream: fs.WriteStream | null = null

  constructor(
    private readonly filePath: string,
    private readonly base: Record<string, unknown> = {},
    private readonly min: LogLevel = 'debug',
  ) {}

  private ensure(): fs.WriteStream {
    if (!this.stream) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true })
      this.stream = fs.createWriteStream(this.filePath, { flags: 'a', encoding: 'utf8' })
    }
    return this.stream
  }

  private write(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
    if (!isEnabled(level, this.min)) return
    this.ensure().write(`${formatRecord(level, msg, this.base, meta)}\n`)
  }

  debug(m: string, meta?: Record<string, unknown>) {
    this.write('debug', m, meta)
  }
  info(m: string, meta?: Record<string, unknown>) {
    this.write('info', m, meta)
  }
  warn(m: string, meta?: Record<string, unknown>) {
    this.write('warn', m, meta)
  }
  error(m: string, meta?: Record<string, unknown>) {
    this.write('error', m, meta)
  }
  withContext(ctx: Record<string, unknown>): LoggerPort {
    return new LazyFileLogger(this.filePath, { ...this.base, ...ctx }, this.min)
  }
}

class CombinedLogger implements LoggerPort {
  constructor(private readonly parts: LoggerPort[]) {}
  debug(m: string, meta?: Record<string, unknown>) {
    for (const p of this.parts) p.debug(m, meta)
  }
  info(m: string, meta?: Record<string, unknown>) {
    for (const p of this.parts) p.info(m, meta)
  }
  warn(m: string, meta?: Record<string, unknown>) {
    for (const p of this.parts) p.warn(m, meta)
  }
  error(m: string, meta?: Record<string, unknown>) {
    for (const p of this.parts) p.error(m, meta)
  }
  withContext(ctx: Record<string, unknown>): LoggerPort {
    return new CombinedLogger(this.parts.map((p) => p.withContext(ctx)))
  }
}

let singleton: LoggerPort | null = null

export function getLogger(): LoggerPort {
  if (singleton) return singleton
  const config = getLoggingConfig()
  const consoleLogger = new ConsoleLogger({}, config.level)
  singleton = config.file
    ? new CombinedLogger([
        consoleLogger,
        new LazyFileLogger(
          path.resolve(process.cwd(), config.dir, `app-${new Date().toISOString().split('T')[0]}.log`),
          {},
          config.level,
        ),
      ])
    : consoleLogger
  return singleton
}

/** Replace the process-wide logger (tests, embedding hosts). `null` re-reads the config on next use. */
export function setLogger(logger: LoggerPort | null): void {
  singleton = logger
}
