/**
 * Diagnostic output of the client.
 */

import { LOG_PREFIX } from "./constants"

/**
 * Report a dropped event or an unreported failure.
 */
export function logWarning(message: string, ...details: Array<unknown>): void {
  console.warn(`${LOG_PREFIX} ${message}`, ...details)
}

/**
 * Trace a request. Only called when the debug option is on.
 */
export function logDebug(message: string): void {
  console.log(`${LOG_PREFIX} ${message}`)
}
