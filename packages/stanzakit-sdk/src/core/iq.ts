import { Element, escapeXMLText } from 'ltx'
import type { DecodeOptions } from './config'
import { defaultRegistry } from './defaultRegistry'
import { XmppParseError } from './errors'
import type { IqPayload } from './payload'
import { StanzaError } from './stanzaError'
import { childElements, createElement, getAttr, parseStanza, qualifiedName } from './xml'

/**
 * The four IQ types. Decoding only accepts these: an `<iq>` whose
 * `type` is missing or anything else is rejected as malformed, so
 * every decoded {@link Iq} has one of them.
 */
export type IqType = 'get' | 'set' | 'result' | 'error'

const IQ_TYPES: ReadonlySet<string> = new Set<IqType>(['get', 'set', 'result', 'error'])

export function isIqType(value: string | undefined): value is IqType {
  return value !== undefined && IQ_TYPES.has(value)
}

export interface IqAttributes {
  type: IqType
  from?: string
  to?: string
  id?: string
  lang?: string
}

/**
 * Info/Query stanza: one request or response.
 *
 * Payloads are the first-level children of `<iq>`, in document order.
 * Anything nested deeper belongs to its payload. A first-level
 * `<error>` is not a payload; it is decoded into {@link error}.
 *
 * @example
 * ```typescript
 * const request = Iq.parse('<iq type="get" id="q1" to="jukebox@example.com">' +
 *   '<query xmlns="http://jabber.org/protocol/disco#info"/></iq>')
 *
 * const info = new DiscoInfo()
 * info.features.push(NS_DISCO_INFO)
 * const reply = request.makeResultResponse(info)
 * await client.send(reply.encode())
 * ```
 */
export class Iq {
  type: IqType
  id: string
  from: string
  to: string
  lang: string
  payloads: IqPayload[] = []
  /** Inner markup of the decoded `<iq>`, when captured. Never encoded. */
  rawXml?: string
  /** Encoded only when its code is non-zero. */
  error?: StanzaError

  constructor({ type, from = '', to = '', id = '', lang = '' }: IqAttributes) {
    this.type = type
    this.from = from
    this.to = to
    this.id = id
    this.lang = lang
  }

  get name(): 'iq' {
    return 'iq'
  }

  /** Append a payload. Repeats of the same payload type are kept. */
  addPayload(payload: IqPayload): void {
    this.payloads.push(payload)
  }

  /**
   * Error reply to this IQ: addresses swapped, type `error`, same id.
   *
   * @remarks
   * The reply carries the request's payloads as well (same objects,
   * new list), so the peer sees what it asked for next to the error.
   */
  makeErrorResponse(error: StanzaError): Iq {
    const reply = new Iq({ type: 'error', from: this.to, to: this.from, id: this.id, lang: this.lang })
    reply.payloads = [...this.payloads]
    reply.error = error
    return reply
  }

  /** Result reply to this IQ: addresses swapped, type `result`, same id. */
  makeResultResponse(...payloads: IqPayload[]): Iq {
    const reply = new Iq({ type: 'result', from: this.to, to: this.from, id: this.id, lang: this.lang })
    reply.payloads = payloads
    return reply
  }

  /**
   * Decode an `<iq>` element.
   *
   * Each first-level child is resolved through the registry (falling
   * back to {@link GenericNode}) and decoded by the resulting payload.
   *
   * @throws {XmppParseError} when the root isn't `<iq>` or its type is
   *         missing or unknown
   */
  static decode(element: Element, options: DecodeOptions = {}): Iq {
    const { registry = defaultRegistry, captureRawXml = true } = options

    const root = qualifiedName(element)
    if (root.local !== 'iq') throw XmppParseError.unexpectedRoot('iq', element.name)

    const type = getAttr(element, 'type')
    if (!isIqType(type)) throw XmppParseError.invalidType(type)

    const iq = new Iq({
      type,
      id: getAttr(element, 'id'),
      to: getAttr(element, 'to'),
      from: getAttr(element, 'from'),
      lang: getAttr(element, 'xml:lang'),
    })

    for (const child of childElements(element)) {
      const { namespace, local } = qualifiedName(child)
      if (local === 'error' && namespace === root.namespace) {
        iq.error = StanzaError.decode(child)
        continue
      }
      const payload = registry.resolve(namespace, local)
      payload.decode(child)
      iq.payloads.push(payload)
    }

    if (captureRawXml) {
      iq.rawXml = element.children
        .map((child) => (typeof child === 'string' ? escapeXMLText(child) : child.toString()))
        .join('')
    }
    return iq
  }

  /** Parse markup text and decode it as an IQ. */
  static parse(markup: string, options: DecodeOptions = {}): Iq {
    return Iq.decode(parseStanza(markup), options)
  }

  encode(): Element {
    const element = createElement('iq', {
      id: this.id,
      type: this.type,
      to: this.to,
      from: this.from,
      'xml:lang': this.lang,
    })
    for (const payload of this.payloads) {
      element.cnode(payload.encode())
    }
    const error = this.error?.encode()
    if (error) element.cnode(error)
    return element
  }

  toString(): string {
    return this.encode().toString()
  }
}
