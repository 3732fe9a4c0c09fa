import type { LoggerPort, LogLevel } from '@/infrastructure/logging/logger'

export interface LogRecord {
  level: LogLevel
  msg: string
  meta: Record<string, unknown>
}

/** Collects log lines in memory; children created with withContext share the same buffer. */
export class MemoryLogger implements LoggerPort {
  constructor(
    readonly records: LogRecord[] = [],
    private readonly base: Record<string, unknown> = {},
  ) {}

  private push(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
    this.records.push({ level, msg, meta: { ...this.base, ...(meta ?? {}) } })
  }

  debug(msg: string, meta?: Record<string, unknown>) {
    this.push('debug', msg, meta)
  }
  info(msg: string, meta?: Record<string, unknown>) {
    this.push('info', msg, meta)
  }
  warn(msg: string, meta?: Record<string, unknown>) {
    this.push('warn', msg, meta)
  }
  error(msg: string, meta?: Record<string, unknown>) {
    this.push('error', msg, meta)
  }
  withContext(ctx: Record<string, unknown>): LoggerPort {
    return new MemoryLogger(this.records, { ...this.base, ...ctx })
  }

  messages(level?: LogLevel): string[] {
    return this.records.filter((r) => level === undefined || r.level === level).map((r) => r.msg)
  }
}
