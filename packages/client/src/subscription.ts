/**
 * StreamSubscription - the handle of one open event stream.
 *
 * Lifecycle: connecting -> streaming -> closed, with a detour through
 * redirecting -> connecting whenever the server answers with a redirect.
 * Closed is terminal: there is no reconnection.
 */

import { EVENT_STREAM_ACCEPT } from "./constants"
import { RealtimeDatabaseError } from "./error"
import { EventStreamParser } from "./event-stream"
import { getRedirectTarget } from "./fetch"
import { logWarning } from "./log"
import type { StreamEvent, StreamState } from "./types"

export interface StreamSubscriptionOptions {
  url: string
  fetchClient: typeof fetch
  maxRedirects: number
  onEvent: (event: StreamEvent) => void
  onError: (error: RealtimeDatabaseError) => void
  onClose?: (subscription: StreamSubscription) => void
}

/**
 * An open streaming read. Created by RealtimeDatabase.listen(); the request
 * starts immediately.
 *
 * @example
 * ```typescript
 * const subscription = db.listen(`orderBy="$key"`)
 * // later
 * subscription.close()
 * await subscription.closed
 * ```
 */
export class StreamSubscription {
  /**
   * Resolves once the stream is closed, whatever the cause. Never rejects.
   */
  readonly closed: Promise<void>

  readonly #options: StreamSubscriptionOptions
  readonly #aborter = new AbortController()
  #url: string
  #state: StreamState = `connecting`

  constructor(options: StreamSubscriptionOptions) {
    this.#options = options
    this.#url = options.url
    this.closed = this.#run()
      .catch((error: unknown) => this.#report(error))
      .finally(() => {
        this.#state = `closed`
        this.#options.onClose?.(this)
      })
  }

  /**
   * URL of the current connection. Changes when a redirect is followed.
   */
  get url(): string {
    return this.#url
  }

  get state(): StreamState {
    return this.#state
  }

  /**
   * Abort the request. Safe to call more than once.
   */
  close(): void {
    if (this.#state !== `closed`) {
      this.#aborter.abort()
    }
  }

  async #run(): Promise<void> {
    let redirects = 0

    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    while (true) {
      this.#state = `connecting`
      const response = await this.#options.fetchClient(this.#url, {
        method: `GET`,
        headers: { accept: EVENT_STREAM_ACCEPT },
        redirect: `manual`,
        signal: this.#aborter.signal,
      })

      const target = getRedirectTarget(response, this.#url)
      if (target === undefined) {
        this.#state = `streaming`
        await this.#consume(response)
        return
      }

      await response.body?.cancel()
      redirects++
      if (redirects > this.#options.maxRedirects) {
        throw new RealtimeDatabaseError(
          `Too many redirects (${redirects}) while opening ${this.#options.url}`,
          `TOO_MANY_REDIRECTS`,
          response.status
        )
      }

      this.#state = `redirecting`
      this.#url = target
    }
  }

  async #consume(response: Response): Promise<void> {
    if (!response.body) {
      return
    }

    const parser = new EventStreamParser(this.#options.onEvent)
    const reader = response.body.getReader()

    try {
      // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
      while (true) {
        const { done, value } = await reader.read()
        if (done) break
        try {
          parser.push(value)
        } catch (error) {
          // A throwing listener ends the stream; release the connection too
          await reader.cancel(error)
          throw error
        }
      }
      parser.end()
    } finally {
      reader.releaseLock()
    }
  }

  #report(error: unknown): void {
    // Aborts caused by close() end the stream silently
    if (this.#aborter.signal.aborted) {
      return
    }

    try {
      this.#options.onError(
        RealtimeDatabaseError.fromStreamFailure(error, this.#url)
      )
    } catch (listenerError) {
      logWarning(`Stream error listener threw`, listenerError)
    }
  }
}
