/**
 * RealtimeDatabase - a client for one location of a Firebase Realtime
 * Database, through the REST API.
 */

import { WRITE_CONTENT_TYPE } from "./constants"
import { optionsFromEnv, resolveClientOptions } from "./config"
import { buildPath, normalizeEndpoint } from "./endpoint"
import { createFetchWithConsumedBody, createFetchWithTracing } from "./fetch"
import { logWarning } from "./log"
import { StreamSubscription } from "./subscription"
import type { RealtimeDatabaseError } from "./error"
import type {
  JsonValue,
  RealtimeDatabaseListener,
  RealtimeDatabaseOptions,
  StreamEvent,
  WriteVerb,
} from "./types"

/**
 * A client bound to a database location and a function host.
 *
 * Results are delivered to a single listener. One-shot requests also resolve
 * their promise once the transport completes; HTTP error statuses are not
 * inspected.
 *
 * @example
 * ```typescript
 * const db = new RealtimeDatabase({
 *   host: "https://my-project.firebaseio.com",
 *   databasePath: "users",
 *   listener: {
 *     onPut: (data) => console.log(data.path, data.data),
 *   },
 * })
 *
 * await db.write({ ada: { score: 3 } })
 * const subscription = db.listen()
 * ```
 */
export class RealtimeDatabase {
  #endpoint: string
  #functionHost: string
  #authToken: string
  #listener: RealtimeDatabaseListener

  readonly #streamFetch: typeof fetch
  readonly #requestFetch: typeof fetch
  readonly #maxRedirects: number
  readonly #subscriptions = new Set<StreamSubscription>()

  /**
   * No network IO is performed by the constructor.
   */
  constructor(opts: RealtimeDatabaseOptions = {}) {
    const options = resolveClientOptions(opts)

    this.#endpoint = normalizeEndpoint(options.host, options.databasePath)
    this.#functionHost = options.functionHost
    this.#authToken = options.authToken
    this.#listener = opts.listener ?? {}
    this.#maxRedirects = options.maxRedirects

    const baseFetchClient =
      opts.fetch ?? ((...args: Parameters<typeof fetch>) => fetch(...args))

    this.#streamFetch = createFetchWithTracing(baseFetchClient, options.debug)
    this.#requestFetch = createFetchWithConsumedBody(this.#streamFetch)
  }

  /**
   * Create a client from FIREBASE_* environment variables.
   * Explicit options take precedence.
   */
  static fromEnv(
    overrides: RealtimeDatabaseOptions = {},
    env: Record<string, string | undefined> = process.env
  ): RealtimeDatabase {
    return new RealtimeDatabase({ ...optionsFromEnv(env), ...overrides })
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  /**
   * Host and database path joined, without `.json` or query.
   */
  get endpoint(): string {
    return this.#endpoint
  }

  get functionHost(): string {
    return this.#functionHost
  }

  get authToken(): string {
    return this.#authToken
  }

  /**
   * Number of streams opened by this client that are not closed yet.
   */
  get openStreams(): number {
    return this.#subscriptions.size
  }

  setAuthToken(token: string): void {
    this.#authToken = token
  }

  /**
   * Replace the listener. Streams that are already open report to the new
   * listener from their next event on.
   */
  setListener(listener: RealtimeDatabaseListener): void {
    this.#listener = listener
  }

  /**
   * Point the client at another host and database path.
   *
   * Every open stream is closed first; call listen() again to follow the new
   * location.
   */
  resetHost(host: string, databasePath: string): void {
    const options = resolveClientOptions({ host, databasePath })
    this.#closeStreams()
    this.#endpoint = normalizeEndpoint(options.host, options.databasePath)
  }

  /**
   * URL a database request with this query would use.
   */
  buildPath(query = ``): string {
    return buildPath(this.#endpoint, query, this.#authToken)
  }

  /**
   * Alias of buildPath(), for inspection and debugging.
   */
  getPath(query = ``): string {
    return this.buildPath(query)
  }

  // ============================================================================
  // Requests
  // ============================================================================

  /**
   * Send a write request.
   *
   * The body is sent as compact JSON with an
   * `application/x-www-form-urlencoded` content type, which is what the REST
   * endpoint has always been called with.
   */
  async write(
    body: JsonValue,
    verb: WriteVerb = `PATCH`,
    query = ``
  ): Promise<void> {
    await this.#requestFetch(this.buildPath(query), {
      method: verb,
      headers: { "content-type": WRITE_CONTENT_TYPE },
      body: JSON.stringify(body),
    })
  }

  /**
   * Send a read request. The body is passed to `onResponse` and returned.
   */
  async read(query = ``): Promise<Uint8Array> {
    const response = await this.#requestFetch(this.buildPath(query), {
      method: `GET`,
    })
    const body = new Uint8Array(await response.arrayBuffer())
    this.#listener.onResponse?.(body)
    return body
  }

  /**
   * Call a function hosted under the function host. The body is passed to
   * `onFunctionResult` and returned.
   */
  async callFunction(name: string): Promise<Uint8Array> {
    const response = await this.#requestFetch(`${this.#functionHost}${name}`, {
      method: `GET`,
    })
    const body = new Uint8Array(await response.arrayBuffer())
    this.#listener.onFunctionResult?.(body)
    return body
  }

  /**
   * Open a stream of changes at the database location.
   *
   * Keep-alive and put events go to the listener. Redirects are followed.
   * When the server ends the response the stream is closed for good.
   */
  listen(query = ``): StreamSubscription {
    const subscription = new StreamSubscription({
      url: this.buildPath(query),
      fetchClient: this.#streamFetch,
      maxRedirects: this.#maxRedirects,
      onEvent: (event) => this.#dispatch(event),
      onError: (error) => this.#reportError(error),
      onClose: (closed) => this.#subscriptions.delete(closed),
    })
    this.#subscriptions.add(subscription)
    return subscription
  }

  /**
   * Close every open stream and wait for them to finish.
   */
  async close(): Promise<void> {
    const pending = [...this.#subscriptions].map((s) => s.closed)
    this.#closeStreams()
    await Promise.all(pending)
  }

  // ============================================================================
  // Private methods
  // ============================================================================

  #closeStreams(): void {
    for (const subscription of this.#subscriptions) {
      subscription.close()
    }
  }

  #dispatch(event: StreamEvent): void {
    switch (event.type) {
      case `keep-alive`:
        this.#listener.onKeepAlive?.()
        break
      case `put`:
        this.#listener.onPut?.(event.data)
        break
    }
  }

  #reportError(error: RealtimeDatabaseError): void {
    if (this.#listener.onError) {
      this.#listener.onError(error)
    } else {
      logWarning(error.message)
    }
  }
}
