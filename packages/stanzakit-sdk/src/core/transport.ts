import type { Element } from 'ltx'
import { XmppParseError } from './errors'
import type { IqCallee } from './iqCallee'
import { logError, logWarn } from './logger'

/**
 * The part of an XMPP client the codec talks to: it emits every
 * inbound stanza as an element and sends elements out. An
 * `@xmpp/client` client has this shape.
 */
export interface StanzaTransport {
  on(event: 'stanza', listener: (stanza: Element) => void): unknown
  removeListener(event: 'stanza', listener: (stanza: Element) => void): unknown
  send(element: Element): Promise<unknown>
}

/**
 * Answer inbound IQ requests on a transport with an {@link IqCallee}.
 *
 * Stanzas that aren't `<iq>` are left alone. Malformed IQs are logged
 * and dropped; no reply is sent for them. Replies are sent as each
 * handler completes.
 *
 * @returns A function that stops listening.
 */
export function attachIqCallee(transport: StanzaTransport, callee: IqCallee): () => void {
  const respond = async (stanza: Element): Promise<void> => {
    try {
      const reply = await callee.handle(stanza)
      if (reply) await transport.send(reply.encode())
    } catch (err) {
      if (err instanceof XmppParseError) {
        logWarn(`Dropped malformed IQ: ${err.message}`)
        return
      }
      logError(`Failed to answer IQ: ${err instanceof Error ? err.message : String(err)}`)
    }
  }

  const onStanza = (stanza: Element): void => {
    if (stanza.getName() !== 'iq') return
    void respond(stanza)
  }

  transport.on('stanza', onStanza)
  return () => {
    transport.removeListener('stanza', onStanza)
  }
}
