/**
 * Fetch utilities shared by one-shot requests and event streams.
 */

import { FetchError } from "./error"
import { REDIRECT_STATUS_CODES } from "./constants"
import { logDebug } from "./log"

/**
 * Status codes where we shouldn't try to read the body.
 */
const NO_BODY_STATUS_CODES = [101, 204, 205, 304]

/**
 * Creates a fetch client that ensures the response body is fully consumed.
 * This prevents issues with connection pooling when bodies aren't read.
 *
 * Uses arrayBuffer() instead of text() to preserve binary data integrity.
 *
 * @param fetchClient - The base fetch client to wrap
 * @returns A fetch function that consumes response bodies
 */
export function createFetchWithConsumedBody(
  fetchClient: typeof fetch
): typeof fetch {
  return async (...args: Parameters<typeof fetch>): Promise<Response> => {
    const url = args[0]
    const res = await fetchClient(...args)

    try {
      if (NO_BODY_STATUS_CODES.includes(res.status)) {
        return res
      }

      // Read body as arrayBuffer to preserve binary data integrity
      const buf = await res.arrayBuffer()
      return new Response(buf, {
        status: res.status,
        statusText: res.statusText,
        headers: res.headers,
      })
    } catch (err) {
      throw new FetchError(
        res.status,
        Object.fromEntries([...res.headers.entries()]),
        url.toString(),
        err instanceof Error
          ? err.message
          : typeof err === `string`
            ? err
            : `failed to read body`
      )
    }
  }
}

/**
 * Creates a fetch client that traces each request when debug is on.
 */
export function createFetchWithTracing(
  fetchClient: typeof fetch,
  debug: boolean
): typeof fetch {
  if (!debug) {
    return fetchClient
  }

  return async (...args: Parameters<typeof fetch>): Promise<Response> => {
    const [input, init] = args
    const method = init?.method ?? `GET`
    const url = input instanceof Request ? input.url : input.toString()
    logDebug(`${method} ${url}`)
    const res = await fetchClient(...args)
    logDebug(`${method} ${url} -> ${res.status}`)
    return res
  }
}

/**
 * Resolve the redirect target of a response fetched with `redirect: "manual"`.
 * Returns undefined when the response is not a redirect.
 */
export function getRedirectTarget(
  response: Response,
  requestUrl: string
): string | undefined {
  if (!REDIRECT_STATUS_CODES.includes(response.status)) {
    return undefined
  }

  const location = response.headers.get(`location`)
  if (!location) {
    return undefined
  }

  return new URL(location, requestUrl).toString()
}
