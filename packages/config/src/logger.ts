/**
 * Structured logging: one JSON line per event.
 *
 * Each line carries `ts`, `level`, `msg` and any bound or per-call fields.
 * Lines go to stdout unless a sink is supplied.
 */

import type { LogLevel } from './settings'

export type LogFields = Readonly<Record<string, unknown>>
export type LogSink = (line: string) => void

export interface Logger {
  readonly level: LogLevel
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean
  /** Logger with `fields` bound to every line. */
  child(fields: LogFields): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  fields?: LogFields
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function stdoutSink(line: string): void {
  process.stdout.write(line + '\n')
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'warn'
  const sink = options.sink ?? stdoutSink
  const bound = options.fields ?? {}

  const isEnabled = (at: Exclude<LogLevel, 'silent'>): boolean => SEVERITY[at] >= SEVERITY[level]

  const emit = (at: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void => {
    if (!isEnabled(at)) return
    sink(JSON.stringify({ ts: new Date().toISOString(), level: at, msg, ...bound, ...fields }))
  }

  return {
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    isEnabled,
    child: (fields) => createLogger({ level, sink, fields: { ...bound, ...fields } }),
  }
}
