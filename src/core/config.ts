/**
 * config.ts
 *
 * Validated configuration for PaginatorClient and the root logger.
 *
 * Only the serializable settings go through zod; functions (classifyError,
 * logger) are passed alongside and merged by the client untouched.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Idle paginators stay cached for five minutes. */
export const DEFAULT_GC_TIME = 5 * 60 * 1000

/** Upper bound on paginators held by one PaginatorCache. */
export const DEFAULT_MAX_PAGINATORS = 50

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export const logLevelSchema = z.enum(LOG_LEVELS)

export type LogLevel = z.infer<typeof logLevelSchema>

export const paginatorClientConfigSchema = z.object({
  defaultOptions: z
    .object({
      timeout: z.number().int().positive().optional(),
      gcTime: z.number().nonnegative().default(DEFAULT_GC_TIME),
    })
    .default({}),
  cache: z
    .object({
      maxSize: z.number().int().positive().default(DEFAULT_MAX_PAGINATORS),
    })
    .default({}),
})

/** Settings after defaults have been applied. */
export type PaginatorClientSettings = z.output<typeof paginatorClientConfigSchema>

/** Settings as a caller writes them. */
export type PaginatorClientSettingsInput = z.input<typeof paginatorClientConfigSchema>

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Thrown when a client is constructed with settings that fail validation. */
export class PaginatorConfigError extends Error {
  readonly issues: ReadonlyArray<z.ZodIssue>

  constructor(error: z.ZodError) {
    super(
      `Invalid paginator configuration: ${error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
    )
    this.name = 'PaginatorConfigError'
    this.issues = error.issues
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate client settings and fill in defaults.
 *
 * @throws PaginatorConfigError
 */
export function parseClientSettings(
  input: PaginatorClientSettingsInput = {},
): PaginatorClientSettings {
  const parsed = paginatorClientConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new PaginatorConfigError(parsed.error)
  }
  return parsed.data
}

type Env = Record<string, string | undefined>

function readEnv(): Env {
  return typeof process !== 'undefined' && process.env ? process.env : {}
}

/**
 * The log level named by LOG_LEVEL, or 'info' when it is unset or unknown.
 * Returns 'info' in browsers, where there is no process.env.
 */
export function resolveLogLevel(env: Env = readEnv()): LogLevel {
  const parsed = logLevelSchema.safeParse(env.LOG_LEVEL?.trim().toLowerCase())
  return parsed.success ? parsed.data : 'info'
}
