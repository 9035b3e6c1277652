/**
 * Endpoint URL construction for the Realtime Database REST API.
 *
 * A database location is addressed as `<host>/<path>.json`, optionally
 * followed by a query string such as `?orderBy="name"`.
 */

import { AUTH_QUERY_PARAM, JSON_SUFFIX } from "./constants"

/**
 * Append `ch` unless the string already ends with it.
 */
export function forceEndChar(value: string, ch: string): string {
  return value.endsWith(ch) ? value : `${value}${ch}`
}

/**
 * Prepend `ch` to a non-empty string unless it already starts with it.
 */
export function forceStartChar(value: string, ch: string): string {
  if (value.length > 0 && !value.startsWith(ch)) {
    return `${ch}${value}`
  }
  return value
}

/**
 * Join a host and a database path into an endpoint.
 * The host always ends with `/`, so an empty host gives a root-relative
 * endpoint such as `/users`.
 *
 * @example
 * normalizeEndpoint(`https://x.firebaseio.com`, `users`)
 * // => `https://x.firebaseio.com/users`
 */
export function normalizeEndpoint(host: string, databasePath: string): string {
  return `${forceEndChar(host.trim(), `/`)}${databasePath.trim()}`
}

/**
 * Build the request URL for an endpoint.
 *
 * `.json` is appended unless already present, then the auth token and the
 * query. Calling it on its own output with no query returns the same URL.
 */
export function buildPath(endpoint: string, query = ``, authToken = ``): string {
  let destination = endpoint

  if (
    destination.length <= JSON_SUFFIX.length ||
    !destination.endsWith(JSON_SUFFIX)
  ) {
    destination += JSON_SUFFIX
  }

  if (authToken.length === 0) {
    return query.length > 0
      ? `${destination}${forceStartChar(query, `?`)}`
      : destination
  }

  const auth = `${AUTH_QUERY_PARAM}=${encodeURIComponent(authToken)}`
  const rest = query.startsWith(`?`) ? query.slice(1) : query
  return rest.length > 0
    ? `${destination}?${auth}&${rest}`
    : `${destination}?${auth}`
}
