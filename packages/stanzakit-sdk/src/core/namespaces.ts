/**
 * XMPP Namespace Constants
 *
 * Namespaces of the payloads and substructures this package knows how
 * to encode and decode. Qualified names are matched on these URIs only,
 * never on prefixes.
 */

// RFC 6120: client stream namespace (default namespace of stanzas)
export const NS_CLIENT = 'jabber:client'

// RFC 6120 §7: Resource Binding
export const NS_BIND = 'urn:ietf:params:xml:ns:xmpp-bind'

// RFC 6120 §8.3: XMPP Stanza Error Conditions
export const NS_XMPP_STANZAS = 'urn:ietf:params:xml:ns:xmpp-stanzas'

// XEP-0030: Service Discovery
export const NS_DISCO_INFO = 'http://jabber.org/protocol/disco#info'
export const NS_DISCO_ITEMS = 'http://jabber.org/protocol/disco#items'

// XEP-0325: Internet of Things - Control
export const NS_IOT_CONTROL = 'urn:xmpp:iot:control'
