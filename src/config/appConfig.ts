import { z } from 'zod'
import { LOG_LEVELS, type LogLevel } from '../core/ports/logger.js'

export const PROVIDERS = ['openai', 'mock'] as const
export type ProviderName = (typeof PROVIDERS)[number]

export const DEFAULT_MODEL = 'gpt-4o-mini'
export const DEFAULT_MAX_OUTPUT_TOKENS = 16000

/** Parallel workers when none are configured; sized to each provider's usual rate limit. */
const DEFAULT_WORKERS: Record<ProviderName, number> = {
  openai: 8,
  mock: 1
}

export type AppConfig = {
  provider: {
    name: ProviderName
    apiKey: string | null
    baseURL: string | null
    model: string
    maxOutputTokens: number
  }
  workers: number
  logLevel: LogLevel
  warnings: string[]
}

const PositiveIntString = z
  .string()
  .regex(/^[1-9]\d*$/, 'must be a positive integer')
  .transform(Number)

const EnvSchema = z.object({
  DOCWEAVE_PROVIDER: z.enum(PROVIDERS).default('openai'),
  DOCWEAVE_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  DOCWEAVE_BASE_URL: z.string().url().optional(),
  DOCWEAVE_MODEL: z.string().min(1).optional(),
  DOCWEAVE_MAX_OUTPUT_TOKENS: PositiveIntString.optional(),
  DOCWEAVE_WORKERS: PositiveIntString.optional(),
  DOCWEAVE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
})

function blankToUndefined(env: Record<string, string | undefined>): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {}
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim() === '' ? undefined : value.trim()
  }
  return out
}

/**
 * Build the validated application config from environment variables.
 *
 * `overrides` carry CLI flags, which win over the environment.
 */
export function loadAppConfig(
  env: Record<string, string | undefined>,
  overrides: { provider?: ProviderName; workers?: number } = {}
): AppConfig {
  const result = EnvSchema.safeParse(blankToUndefined(env))
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Environment validation failed: ${message}`)
  }

  const parsed = result.data
  const name = overrides.provider ?? parsed.DOCWEAVE_PROVIDER
  const apiKey = parsed.DOCWEAVE_API_KEY ?? parsed.OPENAI_API_KEY ?? null

  if (name === 'openai' && !apiKey) {
    throw new Error('Environment validation failed: DOCWEAVE_API_KEY (or OPENAI_API_KEY) is required for provider "openai"')
  }

  if (overrides.workers !== undefined && (!Number.isInteger(overrides.workers) || overrides.workers < 1)) {
    throw new Error(`--workers must be a positive integer, got ${overrides.workers}`)
  }

  const warnings: string[] = []
  if (name === 'openai') {
    warnings.push('The openai provider bills per request')
  } else {
    warnings.push('Mock mode: generated documentation is placeholder text')
  }

  return {
    provider: {
      name,
      apiKey,
      baseURL: parsed.DOCWEAVE_BASE_URL ?? null,
      model: parsed.DOCWEAVE_MODEL ?? DEFAULT_MODEL,
      maxOutputTokens: parsed.DOCWEAVE_MAX_OUTPUT_TOKENS ?? DEFAULT_MAX_OUTPUT_TOKENS
    },
    workers: overrides.workers ?? parsed.DOCWEAVE_WORKERS ?? DEFAULT_WORKERS[name],
    logLevel: parsed.DOCWEAVE_LOG_LEVEL,
    warnings
  }
}
