import { describe, it, expect } from 'vitest'
import { DiscoInfo, DiscoItems } from './disco'
import { parseStanza } from '../xml'

const NS_INFO = 'http://jabber.org/protocol/disco#info'
const NS_ITEMS = 'http://jabber.org/protocol/disco#items'

describe('DiscoInfo', () => {
  it('should decode node, identities and features', () => {
    const info = new DiscoInfo()
    info.decode(parseStanza(
      `<query xmlns="${NS_INFO}" node="music">` +
      '<identity category="client" type="bot" name="Jukebox"/>' +
      '<identity category="automation" type="command-list"/>' +
      `<feature var="${NS_INFO}"/>` +
      '<feature var="urn:xmpp:iot:control"/>' +
      '<feature/>' +
      '</query>'
    ))

    expect(info.node).toBe('music')
    expect(info.identities).toEqual([
      { category: 'client', type: 'bot', name: 'Jukebox' },
      { category: 'automation', type: 'command-list', name: undefined },
    ])
    expect(info.features).toEqual([NS_INFO, 'urn:xmpp:iot:control'])
    expect(info.hasFeature('urn:xmpp:iot:control')).toBe(true)
    expect(info.hasFeature('urn:xmpp:ping')).toBe(false)
  })

  it('should ignore children from other namespaces', () => {
    const info = new DiscoInfo()
    info.decode(parseStanza(
      `<query xmlns="${NS_INFO}"><feature xmlns="urn:example:other" var="x"/><feature var="y"/></query>`
    ))

    expect(info.features).toEqual(['y'])
  })

  it('should encode identities before features', () => {
    const info = new DiscoInfo()
    info.features.push('urn:xmpp:iot:control')
    info.identities.push({ category: 'client', type: 'bot', name: 'Jukebox' })

    expect(info.encode().toString()).toBe(
      `<query xmlns="${NS_INFO}">` +
      '<identity category="client" type="bot" name="Jukebox"/>' +
      '<feature var="urn:xmpp:iot:control"/>' +
      '</query>'
    )
  })

  it('should encode an empty query', () => {
    expect(new DiscoInfo().encode().toString()).toBe(`<query xmlns="${NS_INFO}"/>`)
  })
})

describe('DiscoItems', () => {
  it('should decode node and items', () => {
    const items = new DiscoItems()
    items.decode(parseStanza(
      `<query xmlns="${NS_ITEMS}" node="rooms">` +
      '<item jid="lounge@conference.example.com" name="Lounge"/>' +
      '<item jid="pubsub.example.com" node="news"/>' +
      '</query>'
    ))

    expect(items.node).toBe('rooms')
    expect(items.items).toEqual([
      { jid: 'lounge@conference.example.com', name: 'Lounge', node: undefined },
      { jid: 'pubsub.example.com', name: undefined, node: 'news' },
    ])
  })

  it('should encode items with their optional attributes', () => {
    const items = new DiscoItems()
    items.node = 'rooms'
    items.items.push({ jid: 'lounge@conference.example.com', name: 'Lounge' })
    items.items.push({ jid: 'pubsub.example.com', node: 'news' })

    expect(items.encode().toString()).toBe(
      `<query xmlns="${NS_ITEMS}" node="rooms">` +
      '<item jid="lounge@conference.example.com" name="Lounge"/>' +
      '<item jid="pubsub.example.com" node="news"/>' +
      '</query>'
    )
  })

  it('should come back equal after encode and decode', () => {
    const items = new DiscoItems()
    items.items.push({ jid: 'a.example.com', name: 'A' })

    const again = new DiscoItems()
    again.decode(parseStanza(items.encode().toString()))

    expect(again.items).toEqual([{ jid: 'a.example.com', name: 'A', node: undefined }])
    expect(again.node).toBeUndefined()
  })
})
