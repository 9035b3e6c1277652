/**
 * Realtime Database REST Client
 *
 * A client library for the Firebase Realtime Database REST API: one-shot
 * reads and writes, function calls and streaming reads.
 *
 * @packageDocumentation
 */

// ============================================================================
// Client API
// ============================================================================

export { RealtimeDatabase } from "./client"

export {
  StreamSubscription,
  type StreamSubscriptionOptions,
} from "./subscription"

// ============================================================================
// Types
// ============================================================================

export type {
  JsonValue,
  JsonObject,
  WriteVerb,
  KeepAliveEvent,
  PutEvent,
  StreamEvent,
  StreamState,
  RealtimeDatabaseListener,
  RealtimeDatabaseOptions,
} from "./types"

// ============================================================================
// Errors
// ============================================================================

export {
  FetchError,
  RealtimeDatabaseError,
  type RealtimeDatabaseErrorCode,
} from "./error"

// ============================================================================
// Building blocks (for advanced users)
// ============================================================================

export {
  buildPath,
  forceEndChar,
  forceStartChar,
  normalizeEndpoint,
} from "./endpoint"

export { EventStreamParser, parsePutData, trimFieldValue } from "./event-stream"

export {
  clientOptionsSchema,
  optionsFromEnv,
  resolveClientOptions,
  validateUrl,
  type ResolvedClientOptions,
  type ValidationResult,
} from "./config"

export {
  createFetchWithConsumedBody,
  createFetchWithTracing,
  getRedirectTarget,
} from "./fetch"

// ============================================================================
// Constants
// ============================================================================

export {
  EVENT_STREAM_ACCEPT,
  WRITE_CONTENT_TYPE,
  JSON_SUFFIX,
  AUTH_QUERY_PARAM,
  KEEP_ALIVE_HEADER,
  PUT_HEADER,
  WRITE_VERBS,
  DEFAULT_MAX_REDIRECTS,
} from "./constants"
