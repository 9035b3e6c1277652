/**
 * Event stream parsing for Realtime Database streaming reads.
 *
 * Each event arrives as a header line followed by its data:
 * - `event: keep-alive` with ignored data
 * - `event: put` with `data: <json object>`
 *
 * A readable chunk is split at its first line break: the line is the header
 * and everything after it is the data. When a chunk holds only a header, the
 * next chunk is taken as its data.
 */

import { z } from "zod"
import { KEEP_ALIVE_HEADER, PUT_HEADER } from "./constants"
import { logWarning } from "./log"
import type { JsonObject, StreamEvent } from "./types"

const jsonObjectSchema = z.record(z.string(), z.unknown())

/**
 * Strip the field name from a `name: value` line and trim the value.
 * A line without a field name yields an empty string.
 */
export function trimFieldValue(line: string): string {
  const index = line.indexOf(`:`)
  if (index <= 0) {
    return ``
  }
  return line.slice(index + 1).trim()
}

/**
 * Parse the data of a put event. Returns undefined, after logging a warning,
 * when the data is not a JSON object.
 */
export function parsePutData(data: string): JsonObject | undefined {
  const value = trimFieldValue(data)

  let parsed: unknown
  try {
    parsed = JSON.parse(value)
  } catch (error) {
    logWarning(
      `Malformed put data: ${JSON.stringify(value)}`,
      error instanceof Error ? error.message : error
    )
    return undefined
  }

  const result = jsonObjectSchema.safeParse(parsed)
  if (!result.success) {
    logWarning(
      `Malformed put data: ${JSON.stringify(value)}`,
      `expected a JSON object`
    )
    return undefined
  }

  return result.data
}

/**
 * Incremental parser fed with the chunks of a stream response.
 */
export class EventStreamParser {
  readonly #onEvent: (event: StreamEvent) => void
  readonly #decoder = new TextDecoder()
  #pendingHeader: string | undefined

  constructor(onEvent: (event: StreamEvent) => void) {
    this.#onEvent = onEvent
  }

  /**
   * Feed one readable chunk.
   */
  push(chunk: Uint8Array): void {
    this.#handleText(this.#decoder.decode(chunk, { stream: true }))
  }

  /**
   * Signal the end of the response. A header still waiting for its data is
   * dispatched with empty data.
   */
  end(): void {
    const remaining = this.#decoder.decode()
    if (remaining.length > 0) {
      this.#handleText(remaining)
    }

    const header = this.#pendingHeader
    if (header !== undefined) {
      this.#pendingHeader = undefined
      this.#dispatch(header, ``)
    }
  }

  #handleText(text: string): void {
    if (text.length === 0) {
      return
    }

    const header = this.#pendingHeader
    if (header !== undefined) {
      this.#pendingHeader = undefined
      this.#dispatch(header, text)
      return
    }

    const newline = text.indexOf(`\n`)
    if (newline === -1) {
      this.#dispatch(text, ``)
      return
    }

    const line = text.slice(0, newline + 1)
    const data = text.slice(newline + 1)
    if (data.length === 0) {
      this.#pendingHeader = line
      return
    }

    this.#dispatch(line, data)
  }

  #dispatch(header: string, data: string): void {
    if (header === KEEP_ALIVE_HEADER) {
      this.#onEvent({ type: `keep-alive` })
    } else if (header === PUT_HEADER) {
      const parsed = parsePutData(data)
      if (parsed) {
        this.#onEvent({ type: `put`, data: parsed })
      }
    } else {
      logWarning(`Unknown event: ${JSON.stringify(header)}`)
    }
  }
}
