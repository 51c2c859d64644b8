/**
 * Runtime settings for the augmentation engine.
 *
 * Resolution order: explicit overrides > environment > defaults.
 * Invalid environment values fail fast with the offending keys named.
 */

import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export const settingsSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
  /** Seed for the process-wide random source; unseeded when absent. */
  seed: z.number().int().nonnegative().optional(),
  interpolation: z.enum(['nearest', 'linear']),
  /** Fill value for pixels mapped from outside the source data. */
  fill: z.number().finite(),
})

export type Settings = z.infer<typeof settingsSchema>

export const DEFAULT_SETTINGS: Settings = {
  logLevel: 'warn',
  interpolation: 'linear',
  fill: 0,
}

/** Environment variable backing each setting. */
export const ENV_KEYS: Record<keyof Settings, string> = {
  logLevel: 'WARPKIT_LOG_LEVEL',
  seed: 'WARPKIT_SEED',
  interpolation: 'WARPKIT_INTERPOLATION',
  fill: 'WARPKIT_FILL',
}

const envSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).optional(),
  seed: z.coerce.number().int().nonnegative().optional(),
  interpolation: z.enum(['nearest', 'linear']).optional(),
  fill: z.coerce.number().finite().optional(),
})

export type Env = Readonly<Record<string, string | undefined>>

/** Error raised when settings fail validation. */
export class SettingsError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid warpkit settings: ${issues.join('; ')}`)
    this.name = 'SettingsError'
  }
}

function issuesOf(error: z.ZodError, keyName: (path: string) => string): string[] {
  return error.issues.map((issue) => `${keyName(issue.path.join('.'))}: ${issue.message}`)
}

/** Read the settings present in `env`. Blank values count as unset. */
export function readEnvSettings(env: Env = process.env): Partial<Settings> {
  const raw: Record<string, string> = {}
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const val = env[envKey]
    if (val !== undefined && val.trim() !== '') raw[key] = val.trim()
  }
  const result = envSchema.safeParse(raw)
  if (!result.success) {
    throw new SettingsError(issuesOf(result.error, (path) => {
      const key = Object.entries(ENV_KEYS).find(([k]) => k === path)
      return key ? key[1] : path
    }))
  }
  const out: Partial<Settings> = {}
  if (result.data.logLevel !== undefined) out.logLevel = result.data.logLevel
  if (result.data.seed !== undefined) out.seed = result.data.seed
  if (result.data.interpolation !== undefined) out.interpolation = result.data.interpolation
  if (result.data.fill !== undefined) out.fill = result.data.fill
  return out
}

/** Merge defaults, environment and overrides into validated settings. */
export function resolveSettings(overrides: Partial<Settings> = {}, env: Env = process.env): Settings {
  const result = settingsSchema.safeParse({ ...DEFAULT_SETTINGS, ...readEnvSettings(env), ...overrides })
  if (!result.success) throw new SettingsError(issuesOf(result.error, (path) => path))
  return result.data
}

let cached: Settings | null = null

/** Process-wide settings, read from the environment on first use. */
export function settings(): Settings {
  if (cached === null) cached = resolveSettings()
  return cached
}

/** Drop the cached settings so the next read sees the current environment. */
export function resetSettings(): void {
  cached = null
}
