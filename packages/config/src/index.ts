// Shared configuration: environment-backed settings and structured logging.

export {
  settings,
  resetSettings,
  resolveSettings,
  readEnvSettings,
  settingsSchema,
  SettingsError,
  DEFAULT_SETTINGS,
  ENV_KEYS,
  LOG_LEVELS,
  type Settings,
  type LogLevel,
  type Env,
} from './settings'

export {
  createLogger,
  stdoutSink,
  type Logger,
  type LoggerOptions,
  type LogFields,
  type LogSink,
} from './logger'
