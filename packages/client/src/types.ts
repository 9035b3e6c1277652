import type { WRITE_VERBS } from "./constants"
import type { RealtimeDatabaseError } from "./error"

/**
 * A value that can be written to the database.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | Array<JsonValue>
  | { [key: string]: JsonValue }

/**
 * A JSON object as delivered by a put event.
 */
export type JsonObject = { [key: string]: unknown }

/**
 * HTTP verb used by write().
 */
export type WriteVerb = (typeof WRITE_VERBS)[number]

/**
 * Event parsed from the database event stream.
 */
export interface KeepAliveEvent {
  type: `keep-alive`
}

export interface PutEvent {
  type: `put`
  data: JsonObject
}

export type StreamEvent = KeepAliveEvent | PutEvent

/**
 * Lifecycle state of a stream connection.
 */
export type StreamState = `connecting` | `streaming` | `redirecting` | `closed`

/**
 * Callbacks a client reports to. A client has a single listener; every
 * callback is optional.
 */
export interface RealtimeDatabaseListener {
  /**
   * Full response body of a callFunction() request.
   */
  onFunctionResult?: (body: Uint8Array) => void

  /**
   * Full response body of a read() request.
   */
  onResponse?: (body: Uint8Array) => void

  /**
   * A keep-alive event arrived on an open stream.
   */
  onKeepAlive?: () => void

  /**
   * A put event arrived on an open stream. The first one carries the initial
   * contents of the watched location.
   */
  onPut?: (data: JsonObject) => void

  /**
   * A stream failed for a reason other than close().
   */
  onError?: (error: RealtimeDatabaseError) => void
}

/**
 * Options for the RealtimeDatabase constructor.
 */
export interface RealtimeDatabaseOptions {
  /**
   * Database URL, e.g. `https://<project>.firebaseio.com`. A `/` is added
   * if missing. An empty host leaves a root-relative URL, which only a
   * custom `fetch` can resolve.
   */
  host?: string

  /**
   * Base URL that function names are appended to.
   */
  functionHost?: string

  /**
   * Location inside the database. `.json` is added when a request is built.
   */
  databasePath?: string

  /**
   * Sent as the `auth` query parameter of database requests when non-empty.
   */
  authToken?: string

  /**
   * Custom fetch implementation.
   */
  fetch?: typeof fetch

  /**
   * Initial listener.
   */
  listener?: RealtimeDatabaseListener

  /**
   * Log every request to console.log.
   */
  debug?: boolean

  /**
   * Consecutive redirects a stream follows before failing.
   */
  maxRedirects?: number
}
