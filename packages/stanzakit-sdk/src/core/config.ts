/**
 * Codec Configuration Constants
 *
 * Options objects and fixed tables shared by the codec modules.
 */

import type { PayloadRegistry } from './registry'
import type { StanzaErrorType } from './stanzaError'

/**
 * Options for {@link Iq.decode} and {@link Iq.parse}.
 */
export interface DecodeOptions {
  /** Registry used to resolve payloads. Defaults to the shared `defaultRegistry`. */
  registry?: PayloadRegistry
  /** Keep the IQ's inner markup in `rawXml`. Defaults to true. */
  captureRawXml?: boolean
}

/**
 * Legacy numeric codes and error types for the RFC 6120 defined
 * conditions (XEP-0086). An error is only written to the wire when it
 * has a non-zero code, so errors built from a condition take their code
 * from here.
 */
export const LEGACY_ERROR_CODES = {
  'bad-request': { code: 400, type: 'modify' },
  'conflict': { code: 409, type: 'cancel' },
  'feature-not-implemented': { code: 501, type: 'cancel' },
  'forbidden': { code: 403, type: 'auth' },
  'gone': { code: 302, type: 'modify' },
  'internal-server-error': { code: 500, type: 'wait' },
  'item-not-found': { code: 404, type: 'cancel' },
  'jid-malformed': { code: 400, type: 'modify' },
  'not-acceptable': { code: 406, type: 'modify' },
  'not-allowed': { code: 405, type: 'cancel' },
  'not-authorized': { code: 401, type: 'auth' },
  'payment-required': { code: 402, type: 'auth' },
  'recipient-unavailable': { code: 404, type: 'wait' },
  'redirect': { code: 302, type: 'modify' },
  'registration-required': { code: 407, type: 'auth' },
  'remote-server-not-found': { code: 404, type: 'cancel' },
  'remote-server-timeout': { code: 504, type: 'wait' },
  'resource-constraint': { code: 500, type: 'wait' },
  'service-unavailable': { code: 503, type: 'cancel' },
  'subscription-required': { code: 407, type: 'auth' },
  'undefined-condition': { code: 500, type: 'cancel' },
  'unexpected-request': { code: 400, type: 'wait' },
} as const satisfies Record<string, { code: number; type: StanzaErrorType }>

export type DefinedCondition = keyof typeof LEGACY_ERROR_CODES
