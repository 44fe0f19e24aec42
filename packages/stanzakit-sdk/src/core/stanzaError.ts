import type { Element } from 'ltx'
import { LEGACY_ERROR_CODES, type DefinedCondition } from './config'
import { NS_XMPP_STANZAS } from './namespaces'
import { childElements, createElement, getAttr, qualifiedName } from './xml'

/**
 * RFC 6120 §8.3 error type categories.
 *
 * - cancel:   Do not retry (the error condition is not expected to change)
 * - continue: Proceed (the condition was only a warning)
 * - modify:   Retry after changing the data sent
 * - auth:     Provide credentials and retry
 * - wait:     Retry after waiting (the error is temporary)
 */
export type StanzaErrorType = 'cancel' | 'continue' | 'modify' | 'auth' | 'wait'

const STRICT_INTEGER = /^[+-]?\d+$/

function isDefinedCondition(condition: string): condition is DefinedCondition {
  return Object.hasOwn(LEGACY_ERROR_CODES, condition)
}

/**
 * The `<error>` substructure of a stanza.
 *
 * ```xml
 * <error code="404" type="cancel">
 *   <item-not-found xmlns="urn:ietf:params:xml:ns:xmpp-stanzas"/>
 *   <text xmlns="urn:ietf:params:xml:ns:xmpp-stanzas">No such node</text>
 * </error>
 * ```
 *
 * A `code` of 0 means "no error": such a value encodes to nothing.
 */
export class StanzaError {
  code = 0
  /** Usually one of {@link StanzaErrorType}; kept as received. */
  type = ''
  /** Local name of the defined condition element, e.g. `item-not-found`. */
  reason = ''
  text = ''

  constructor(init: Partial<Pick<StanzaError, 'code' | 'type' | 'reason' | 'text'>> = {}) {
    Object.assign(this, init)
  }

  /**
   * Build an error for a defined condition, with the code and type
   * from the legacy table. Unknown conditions get 500/cancel.
   */
  static fromCondition(condition: string, text = ''): StanzaError {
    const legacy = isDefinedCondition(condition)
      ? LEGACY_ERROR_CODES[condition]
      : LEGACY_ERROR_CODES['undefined-condition']
    return new StanzaError({ code: legacy.code, type: legacy.type, reason: condition, text })
  }

  static decode(element: Element): StanzaError {
    const error = new StanzaError()

    const code = getAttr(element, 'code')
    if (code !== undefined && STRICT_INTEGER.test(code)) {
      const parsed = Number.parseInt(code, 10)
      if (Number.isSafeInteger(parsed)) error.code = parsed
    }
    error.type = getAttr(element, 'type') ?? ''

    // Children outside the stanzas namespace are dropped
    for (const child of childElements(element)) {
      const { namespace, local } = qualifiedName(child)
      if (namespace !== NS_XMPP_STANZAS) continue
      if (local === 'text') {
        error.text = child.getText()
      } else {
        error.reason = local
      }
    }
    return error
  }

  /** The `<error>` element, or null when `code` is 0. */
  encode(): Element | null {
    if (this.code === 0) return null

    const element = createElement('error', { code: String(this.code), type: this.type })
    if (this.reason) {
      element.c(this.reason, { xmlns: NS_XMPP_STANZAS })
    }
    if (this.text) {
      element.c('text', { xmlns: NS_XMPP_STANZAS }).t(this.text)
    }
    return element
  }
}

/**
 * Thrown by an IQ handler to answer with a specific stanza error instead
 * of the generic `internal-server-error`.
 */
export class StanzaErrorException extends Error {
  constructor(public readonly stanzaError: StanzaError) {
    super(formatStanzaError(stanzaError))
    this.name = 'StanzaErrorException'
  }
}

/**
 * Format a stanza error into a human-readable string.
 *
 * Prefers the peer-provided text when available, falls back to
 * converting the condition from kebab-case to a readable form
 * (e.g. 'not-allowed' → 'Not allowed').
 */
export function formatStanzaError(error: StanzaError): string {
  if (error.text) return error.text

  const condition = error.reason || 'undefined-condition'
  const words = condition.split('-')
  words[0] = words[0].charAt(0).toUpperCase() + words[0].slice(1)
  return words.join(' ')
}
