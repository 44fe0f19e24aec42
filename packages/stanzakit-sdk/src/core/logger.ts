/**
 * Codec diagnostic logger.
 *
 * Logs to `console.info/warn/error` with a `[Stanzakit]` prefix so the
 * host application can filter or forward codec diagnostics.
 *
 * **Privacy**: Never pass stanza bodies or full JIDs to these functions.
 * Qualified names, stanza ids and error conditions are acceptable.
 *
 * @module Core/Logger
 */

const PREFIX = '[Stanzakit]'

export function logInfo(message: string): void {
  console.info(PREFIX, message)
}

export function logWarn(message: string): void {
  console.warn(PREFIX, message)
}

export function logError(message: string): void {
  console.error(PREFIX, message)
}
