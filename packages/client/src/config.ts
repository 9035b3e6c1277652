/**
 * Client option validation and environment loading.
 */

import { z } from "zod"
import {
  AUTH_TOKEN_ENV,
  DATABASE_PATH_ENV,
  DATABASE_URL_ENV,
  DEBUG_ENV,
  DEFAULT_MAX_REDIRECTS,
  FUNCTIONS_URL_ENV,
} from "./constants"
import { RealtimeDatabaseError } from "./error"
import { logWarning } from "./log"
import type { RealtimeDatabaseOptions } from "./types"

export interface ValidationResult {
  valid: boolean
  error?: string
}

/**
 * Validate a URL string.
 * Must be a valid HTTP or HTTPS URL.
 */
export function validateUrl(url: string): ValidationResult {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return {
      valid: false,
      error: `Invalid URL format: "${url}". Expected format: https://<project>.firebaseio.com`,
    }
  }

  if (parsed.protocol !== `http:` && parsed.protocol !== `https:`) {
    return {
      valid: false,
      error: `Invalid URL protocol: "${parsed.protocol}". Only http:// and https:// are supported`,
    }
  }

  return { valid: true }
}

export const clientOptionsSchema = z.object({
  host: z.string().default(``),
  functionHost: z.string().default(``),
  databasePath: z.string().default(``),
  authToken: z.string().default(``),
  debug: z.boolean().default(false),
  maxRedirects: z.number().int().nonnegative().default(DEFAULT_MAX_REDIRECTS),
})

export type ResolvedClientOptions = z.infer<typeof clientOptionsSchema>

/**
 * Warn about a host that fetch will not be able to request. The host is
 * still used as given.
 */
export function warnIfNotUrl(name: string, value: string): void {
  const trimmed = value.trim()
  if (trimmed.length === 0) return
  const result = validateUrl(trimmed)
  if (!result.valid) {
    logWarning(`${name}: ${result.error}`)
  }
}

/**
 * Validate constructor options and fill in defaults.
 * Throws RealtimeDatabaseError(INVALID_OPTIONS) listing every problem with
 * the option types or the redirect limit. Hosts are never rejected.
 */
export function resolveClientOptions(
  options: RealtimeDatabaseOptions
): ResolvedClientOptions {
  const result = clientOptionsSchema.safeParse({
    host: options.host,
    functionHost: options.functionHost,
    databasePath: options.databasePath,
    authToken: options.authToken,
    debug: options.debug,
    maxRedirects: options.maxRedirects,
  })

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(`.`)}: ${issue.message}`)
      .join(`; `)
    throw new RealtimeDatabaseError(
      `Invalid client options: ${problems}`,
      `INVALID_OPTIONS`,
      undefined,
      result.error.issues
    )
  }

  warnIfNotUrl(`host`, result.data.host)
  warnIfNotUrl(`functionHost`, result.data.functionHost)
  return result.data
}

/**
 * Read client options from environment variables.
 * Unset or empty variables are left out so explicit options can fill them.
 */
export function optionsFromEnv(
  env: Record<string, string | undefined> = process.env
): RealtimeDatabaseOptions {
  const options: RealtimeDatabaseOptions = {}

  const host = env[DATABASE_URL_ENV]
  if (host) options.host = host

  const databasePath = env[DATABASE_PATH_ENV]
  if (databasePath) options.databasePath = databasePath

  const functionHost = env[FUNCTIONS_URL_ENV]
  if (functionHost) options.functionHost = functionHost

  const authToken = env[AUTH_TOKEN_ENV]
  if (authToken) options.authToken = authToken

  const debug = env[DEBUG_ENV]
  if (debug) {
    options.debug = debug === `1` || debug.toLowerCase() === `true`
  }

  return options
}
