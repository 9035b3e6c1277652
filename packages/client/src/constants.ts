/**
 * Realtime Database REST Constants
 *
 * Header values, stream event literals and environment variable names used by
 * the client.
 */

// ============================================================================
// Request Headers
// ============================================================================

/**
 * Accept header value that turns a database GET into an event stream.
 */
export const EVENT_STREAM_ACCEPT = `text/event-stream`

/**
 * Content type sent with write requests.
 * The body is JSON but the REST endpoint has always been called with this
 * header; changing it would change the wire behavior against real servers.
 */
export const WRITE_CONTENT_TYPE = `application/x-www-form-urlencoded`

// ============================================================================
// URLs
// ============================================================================

/**
 * Suffix that addresses a database location through the REST API.
 */
export const JSON_SUFFIX = `.json`

/**
 * Query parameter carrying the auth token on database requests.
 */
export const AUTH_QUERY_PARAM = `auth`

// ============================================================================
// Stream Events
// ============================================================================

/**
 * Header line of a keep-alive event, including its line terminator.
 */
export const KEEP_ALIVE_HEADER = `event: keep-alive\n`

/**
 * Header line of a put event, including its line terminator.
 */
export const PUT_HEADER = `event: put\n`

// ============================================================================
// Internal Constants
// ============================================================================

/**
 * HTTP verbs accepted by write().
 */
export const WRITE_VERBS = [`PUT`, `PATCH`, `POST`, `DELETE`] as const

/**
 * Status codes treated as a redirect of the event stream.
 */
export const REDIRECT_STATUS_CODES: ReadonlyArray<number> = [
  301, 302, 303, 307, 308,
]

/**
 * Consecutive stream redirects followed before giving up.
 * Same limit the fetch standard applies to its own redirect handling.
 */
export const DEFAULT_MAX_REDIRECTS = 20

/**
 * Prefix of every diagnostic line written by the client.
 */
export const LOG_PREFIX = `[RealtimeDatabase]`

// ============================================================================
// Environment Variables
// ============================================================================

export const DATABASE_URL_ENV = `FIREBASE_DATABASE_URL`
export const DATABASE_PATH_ENV = `FIREBASE_DATABASE_PATH`
export const FUNCTIONS_URL_ENV = `FIREBASE_FUNCTIONS_URL`
export const AUTH_TOKEN_ENV = `FIREBASE_AUTH_TOKEN`
export const DEBUG_ENV = `FIREBASE_DEBUG`
