import { type Logger, createLogger, settings } from '@warpkit/config'

let logger: Logger | null = null

/** Engine logger, created from the current settings on first use. */
export function engineLogger(): Logger {
  if (logger === null) {
    logger = createLogger({ level: settings().logLevel, fields: { component: 'warpkit' } })
  }
  return logger
}

/** Replace the engine logger; `null` rebuilds it from settings on next use. */
export function setEngineLogger(next: Logger | null): void {
  logger = next
}
