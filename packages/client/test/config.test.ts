import { describe, expect, it, vi } from "vitest"
import {
  optionsFromEnv,
  resolveClientOptions,
  validateUrl,
} from "../src/config"
import { RealtimeDatabaseError } from "../src/error"

describe(`validateUrl`, () => {
  it(`accepts http and https URLs`, () => {
    expect(validateUrl(`https://demo-project.firebaseio.com`)).toEqual({
      valid: true,
    })
    expect(validateUrl(`http://localhost:9000`)).toEqual({ valid: true })
  })

  it(`rejects text that is not a URL`, () => {
    expect(validateUrl(`demo-project.firebaseio.com`)).toEqual({
      valid: false,
      error: `Invalid URL format: "demo-project.firebaseio.com". Expected format: https://<project>.firebaseio.com`,
    })
  })

  it(`rejects other protocols`, () => {
    expect(validateUrl(`ws://demo-project.firebaseio.com`)).toEqual({
      valid: false,
      error: `Invalid URL protocol: "ws:". Only http:// and https:// are supported`,
    })
  })
})

describe(`resolveClientOptions`, () => {
  it(`fills in defaults`, () => {
    expect(resolveClientOptions({})).toEqual({
      host: ``,
      functionHost: ``,
      databasePath: ``,
      authToken: ``,
      debug: false,
      maxRedirects: 20,
    })
  })

  it(`keeps given values`, () => {
    expect(
      resolveClientOptions({
        host: `https://demo-project.firebaseio.com`,
        databasePath: `users`,
        authToken: `test-secret`,
        debug: true,
        maxRedirects: 0,
      })
    ).toMatchObject({
      host: `https://demo-project.firebaseio.com`,
      databasePath: `users`,
      authToken: `test-secret`,
      debug: true,
      maxRedirects: 0,
    })
  })

  it(`accepts a blank host`, () => {
    expect(resolveClientOptions({ host: `  ` }).host).toBe(`  `)
  })

  it(`keeps hosts that are not URLs and warns about each`, () => {
    const warnSpy = vi.spyOn(console, `warn`).mockImplementation(() => {})
    try {
      const options = resolveClientOptions({
        host: `nope`,
        functionHost: `ftp://functions`,
      })

      expect(options.host).toBe(`nope`)
      expect(options.functionHost).toBe(`ftp://functions`)
      expect(warnSpy.mock.calls).toEqual([
        [
          `[RealtimeDatabase] host: Invalid URL format: "nope". Expected format: https://<project>.firebaseio.com`,
        ],
        [
          `[RealtimeDatabase] functionHost: Invalid URL protocol: "ftp:". Only http:// and https:// are supported`,
        ],
      ])
    } finally {
      warnSpy.mockRestore()
    }
  })

  it(`rejects a fractional redirect limit`, () => {
    let error: unknown
    try {
      resolveClientOptions({ maxRedirects: 1.5 })
    } catch (e) {
      error = e
    }

    expect(error).toBeInstanceOf(RealtimeDatabaseError)
    expect(error).toMatchObject({ code: `INVALID_OPTIONS` })
    const message = error instanceof Error ? error.message : ``
    expect(message.startsWith(`Invalid client options: maxRedirects: `)).toBe(true)
  })
})

describe(`optionsFromEnv`, () => {
  it(`reads every variable`, () => {
    expect(
      optionsFromEnv({
        FIREBASE_DATABASE_URL: `https://demo-project.firebaseio.com`,
        FIREBASE_DATABASE_PATH: `users`,
        FIREBASE_FUNCTIONS_URL: `https://functions.example.com/`,
        FIREBASE_AUTH_TOKEN: `test-secret`,
        FIREBASE_DEBUG: `true`,
      })
    ).toEqual({
      host: `https://demo-project.firebaseio.com`,
      databasePath: `users`,
      functionHost: `https://functions.example.com/`,
      authToken: `test-secret`,
      debug: true,
    })
  })

  it(`leaves out unset and empty variables`, () => {
    expect(
      optionsFromEnv({ FIREBASE_DATABASE_URL: ``, FIREBASE_DATABASE_PATH: undefined })
    ).toEqual({})
  })

  it(`parses the debug flag`, () => {
    expect(optionsFromEnv({ FIREBASE_DEBUG: `1` }).debug).toBe(true)
    expect(optionsFromEnv({ FIREBASE_DEBUG: `TRUE` }).debug).toBe(true)
    expect(optionsFromEnv({ FIREBASE_DEBUG: `0` }).debug).toBe(false)
  })
})
