/**
 * Test helper utilities: in-process responses standing in for the
 * Realtime Database server.
 */

/**
 * Encode a string to Uint8Array.
 */
export function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text)
}

/**
 * Decode a Uint8Array to string.
 */
export function decode(data: Uint8Array): string {
  return new TextDecoder().decode(data)
}

/**
 * Create a ReadableStream that delivers each string as a separate chunk
 * (simulates network chunking), then ends.
 */
export function createChunkedStream(
  chunks: Array<string>
): ReadableStream<Uint8Array> {
  let index = 0
  return new ReadableStream({
    pull(controller) {
      const chunk = chunks[index]
      if (chunk === undefined) {
        controller.close()
        return
      }
      controller.enqueue(encode(chunk))
      index++
    },
  })
}

/**
 * A 200 event-stream response whose body is the given chunks.
 */
export function eventStreamResponse(chunks: Array<string>): Response {
  return new Response(createChunkedStream(chunks), {
    status: 200,
    headers: { "content-type": `text/event-stream` },
  })
}

/**
 * A redirect response pointing at `location`.
 */
export function redirectResponse(location: string, status = 307): Response {
  return new Response(null, { status, headers: { location } })
}

/**
 * An event stream that stays open until the test ends it.
 */
export interface LiveEventStream {
  response: Response
  push: (text: string) => void
  end: () => void
  fail: (error: Error) => void
  cancelled: () => boolean
}

export function createLiveEventStream(): LiveEventStream {
  const handle: {
    controller?: ReadableStreamDefaultController<Uint8Array>
    cancelled: boolean
  } = { cancelled: false }

  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      handle.controller = controller
    },
    cancel() {
      handle.cancelled = true
    },
  })

  return {
    response: new Response(body, {
      status: 200,
      headers: { "content-type": `text/event-stream` },
    }),
    push: (text) => handle.controller?.enqueue(encode(text)),
    end: () => handle.controller?.close(),
    fail: (error) => handle.controller?.error(error),
    cancelled: () => handle.cancelled,
  }
}

/**
 * Error a body read fails with once its request is aborted.
 */
export function abortError(): Error {
  const error = new Error(`This operation was aborted`)
  error.name = `AbortError`
  return error
}

/**
 * Resolve after pending microtasks and one macrotask have run.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0))
}
