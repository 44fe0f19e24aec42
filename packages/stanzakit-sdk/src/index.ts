/**
 * # Stanzakit SDK
 *
 * Typed encoding and decoding of XMPP IQ stanzas.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Iq, DiscoItems, NS_DISCO_ITEMS } from '@stanzakit/sdk'
 *
 * const iq = Iq.parse(
 *   '<iq type="result" id="items1"><query xmlns="http://jabber.org/protocol/disco#items">' +
 *   '<item jid="conference.example.com"/></query></iq>'
 * )
 * const [items] = iq.payloads
 * if (items instanceof DiscoItems) {
 *   console.log(items.items.map((item) => item.jid))
 * }
 * ```
 *
 * Payloads nobody registered decode to a {@link GenericNode} that keeps
 * the element's name, attributes and children.
 *
 * ## Custom payloads
 *
 * ```typescript
 * import { createDefaultRegistry, Iq } from '@stanzakit/sdk'
 *
 * const registry = createDefaultRegistry()
 * registry.register('urn:example:weather', 'forecast', () => new Forecast())
 * const iq = Iq.parse(markup, { registry })
 * ```
 *
 * ## Answering requests
 *
 * ```typescript
 * import { client } from '@xmpp/client'
 * import { IqCallee, attachIqCallee, DiscoInfo, NS_DISCO_INFO } from '@stanzakit/sdk'
 *
 * const callee = new IqCallee()
 * callee.get(NS_DISCO_INFO, 'query', () => {
 *   const info = new DiscoInfo()
 *   info.identities.push({ category: 'client', type: 'bot' })
 *   return info
 * })
 * attachIqCallee(client({ service, domain }), callee)
 * ```
 *
 * @packageDocumentation
 */

export * from './core'
