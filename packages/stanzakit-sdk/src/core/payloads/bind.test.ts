import { describe, it, expect } from 'vitest'
import { BindBind } from './bind'
import { parseStanza } from '../xml'

const NS_BIND = 'urn:ietf:params:xml:ns:xmpp-bind'

describe('BindBind', () => {
  it('should decode the bound jid from a server result', () => {
    const bind = new BindBind()
    bind.decode(parseStanza(`<bind xmlns="${NS_BIND}"><jid>juliet@example.com/balcony</jid></bind>`))

    expect(bind.jid).toBe('juliet@example.com/balcony')
    expect(bind.resource).toBeUndefined()
  })

  it('should decode the requested resource', () => {
    const bind = new BindBind()
    bind.decode(parseStanza(`<bind xmlns="${NS_BIND}"><resource>balcony</resource></bind>`))

    expect(bind.resource).toBe('balcony')
    expect(bind.jid).toBeUndefined()
  })

  it('should treat empty children as absent', () => {
    const bind = new BindBind()
    bind.decode(parseStanza(`<bind xmlns="${NS_BIND}"><resource/></bind>`))

    expect(bind.resource).toBeUndefined()
  })

  it('should encode only the fields that are set', () => {
    const bind = new BindBind()
    expect(bind.encode().toString()).toBe(`<bind xmlns="${NS_BIND}"/>`)

    bind.resource = 'balcony'
    expect(bind.encode().toString()).toBe(`<bind xmlns="${NS_BIND}"><resource>balcony</resource></bind>`)

    bind.resource = undefined
    bind.jid = 'juliet@example.com/balcony'
    expect(bind.encode().toString()).toBe(`<bind xmlns="${NS_BIND}"><jid>juliet@example.com/balcony</jid></bind>`)
  })
})
