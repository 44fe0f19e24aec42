import type { Element } from 'ltx'
import { defaultRegistry } from './defaultRegistry'
import { Iq, type IqType } from './iq'
import { logError } from './logger'
import type { IqPayload } from './payload'
import type { PayloadRegistry } from './registry'
import { StanzaError, StanzaErrorException } from './stanzaError'
import { childElements, qnameKey, qualifiedName } from './xml'

export interface IqRequestContext {
  iq: Iq
  /** First payload of the request, the one the handler was chosen for. */
  payload: IqPayload
}

/**
 * Answers a request. Return the result payloads (or nothing for an
 * empty result); throw a {@link StanzaErrorException} to answer with a
 * specific error.
 */
export type IqHandler = (
  context: IqRequestContext,
) => IqPayload | IqPayload[] | undefined | Promise<IqPayload | IqPayload[] | undefined>

export interface IqCalleeOptions {
  /** Registry used to decode requests. Defaults to `defaultRegistry`. */
  registry?: PayloadRegistry
}

type RequestType = Extract<IqType, 'get' | 'set'>

/**
 * Routes incoming `get`/`set` IQs to handlers by the qualified name of
 * their first payload and builds the reply.
 *
 * Requests nobody handles are answered with `service-unavailable`;
 * handlers that fail unexpectedly produce `internal-server-error`.
 * `result` and `error` IQs are responses, not requests, and are ignored.
 *
 * @example
 * ```typescript
 * const callee = new IqCallee()
 * callee.set(NS_IOT_CONTROL, 'set', ({ payload }) => {
 *   if (!(payload instanceof ControlSet)) throw new StanzaErrorException(StanzaError.fromCondition('bad-request'))
 *   player.play(payload.getField('url', 'string')?.value ?? '')
 *   return new ControlSetResponse()
 * })
 * ```
 */
export class IqCallee {
  private readonly handlers = new Map<string, IqHandler>()
  private readonly registry: PayloadRegistry

  constructor(options: IqCalleeOptions = {}) {
    this.registry = options.registry ?? defaultRegistry
  }

  get(namespace: string, local: string, handler: IqHandler): void {
    this.handlers.set(handlerKey('get', namespace, local), handler)
  }

  set(namespace: string, local: string, handler: IqHandler): void {
    this.handlers.set(handlerKey('set', namespace, local), handler)
  }

  /**
   * Decode a request and produce its reply, or null when the stanza is
   * itself a response.
   *
   * @throws {XmppParseError} when the stanza isn't a well-formed IQ
   */
  async handle(stanza: Element): Promise<Iq | null> {
    const iq = Iq.decode(stanza, { registry: this.registry })
    if (iq.type !== 'get' && iq.type !== 'set') return null

    const target = firstPayloadElement(stanza)
    const payload = iq.payloads[0]
    if (!target || !payload) {
      return iq.makeErrorResponse(StanzaError.fromCondition('service-unavailable'))
    }

    const { namespace, local } = qualifiedName(target)
    const handler = this.handlers.get(handlerKey(iq.type, namespace, local))
    if (!handler) {
      return iq.makeErrorResponse(StanzaError.fromCondition('service-unavailable'))
    }

    try {
      const result = await handler({ iq, payload })
      if (!result) return iq.makeResultResponse()
      return iq.makeResultResponse(...(Array.isArray(result) ? result : [result]))
    } catch (err) {
      if (err instanceof StanzaErrorException) {
        return iq.makeErrorResponse(err.stanzaError)
      }
      logError(`IQ ${iq.type} handler for ${qnameKey(namespace, local)} failed: ${err instanceof Error ? err.message : String(err)}`)
      return iq.makeErrorResponse(StanzaError.fromCondition('internal-server-error'))
    }
  }
}

function handlerKey(type: RequestType, namespace: string, local: string): string {
  return `${type}:${qnameKey(namespace, local)}`
}

// Same selection Iq.decode makes: the first child that isn't the IQ's own <error>
function firstPayloadElement(stanza: Element): Element | undefined {
  const rootNamespace = qualifiedName(stanza).namespace
  return childElements(stanza).find((child) => {
    const { namespace, local } = qualifiedName(child)
    return !(local === 'error' && namespace === rootNamespace)
  })
}
