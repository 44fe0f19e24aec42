import { describe, it, expect } from 'vitest'
import { StanzaError, StanzaErrorException, formatStanzaError } from './stanzaError'
import { parseStanza } from './xml'

const NS = 'urn:ietf:params:xml:ns:xmpp-stanzas'

describe('StanzaError.decode', () => {
  it('should decode code, type, reason and text', () => {
    const error = StanzaError.decode(parseStanza(
      `<error code="404" type="cancel"><item-not-found xmlns="${NS}"/><text xmlns="${NS}">No such node</text></error>`
    ))

    expect(error).toMatchObject({ code: 404, type: 'cancel', reason: 'item-not-found', text: 'No such node' })
  })

  it('should leave code at 0 when it is not an integer', () => {
    expect(StanzaError.decode(parseStanza('<error code="abc" type="cancel"/>')).code).toBe(0)
    expect(StanzaError.decode(parseStanza('<error code="404abc"/>')).code).toBe(0)
    expect(StanzaError.decode(parseStanza('<error code=""/>')).code).toBe(0)
  })

  it('should leave code at 0 when it is out of integer range', () => {
    expect(StanzaError.decode(parseStanza('<error code="99999999999999999999" type="cancel"/>')).code).toBe(0)
    expect(StanzaError.decode(parseStanza('<error code="-500"/>')).code).toBe(-500)
  })

  it('should default every field when the element is empty', () => {
    expect(StanzaError.decode(parseStanza('<error/>'))).toMatchObject({ code: 0, type: '', reason: '', text: '' })
  })

  it('should keep the last condition when several are present', () => {
    const error = StanzaError.decode(parseStanza(
      `<error code="400" type="modify"><bad-request xmlns="${NS}"/><not-acceptable xmlns="${NS}"/></error>`
    ))

    expect(error.reason).toBe('not-acceptable')
  })

  it('should ignore children outside the stanzas namespace', () => {
    const error = StanzaError.decode(parseStanza(
      `<error code="403" type="auth"><forbidden xmlns="${NS}"/><quota-exceeded xmlns="urn:example:app"/></error>`
    ))

    expect(error.reason).toBe('forbidden')
    expect(error.text).toBe('')
  })

  it('should not treat a text element from another namespace as the error text', () => {
    const error = StanzaError.decode(parseStanza(
      '<error code="500" type="wait"><text xmlns="urn:example:app">internal</text></error>'
    ))

    expect(error.text).toBe('')
    expect(error.reason).toBe('')
  })

  it('should unescape character data in the text', () => {
    const error = StanzaError.decode(parseStanza(
      `<error code="406" type="modify"><text xmlns="${NS}">a &amp; b</text></error>`
    ))

    expect(error.text).toBe('a & b')
  })
})

describe('StanzaError.encode', () => {
  it('should emit nothing when code is 0', () => {
    expect(new StanzaError({ type: 'cancel', reason: 'forbidden', text: 'no' }).encode()).toBeNull()
  })

  it('should emit code, type, reason and text in order', () => {
    const error = new StanzaError({ code: 404, type: 'cancel', reason: 'item-not-found', text: 'No such node' })

    expect(error.encode()?.toString()).toBe(
      '<error code="404" type="cancel">' +
      `<item-not-found xmlns="${NS}"/>` +
      `<text xmlns="${NS}">No such node</text>` +
      '</error>'
    )
  })

  it('should omit type, reason and text when empty', () => {
    expect(new StanzaError({ code: 500 }).encode()?.toString()).toBe('<error code="500"/>')
  })

  it('should preserve every field through encode and decode', () => {
    const original = new StanzaError({ code: 406, type: 'modify', reason: 'not-acceptable', text: 'a & b < c' })

    const encoded = original.encode()
    expect(encoded).not.toBeNull()
    const decoded = StanzaError.decode(parseStanza(String(encoded)))

    expect(decoded).toEqual(original)
  })
})

describe('StanzaError.fromCondition', () => {
  it('should take code and type from the legacy table', () => {
    expect(StanzaError.fromCondition('forbidden')).toMatchObject({
      code: 403,
      type: 'auth',
      reason: 'forbidden',
      text: '',
    })
    expect(StanzaError.fromCondition('service-unavailable', 'Not here')).toMatchObject({
      code: 503,
      type: 'cancel',
      reason: 'service-unavailable',
      text: 'Not here',
    })
  })

  it('should use 500/cancel for conditions outside the table', () => {
    expect(StanzaError.fromCondition('policy-violation')).toMatchObject({
      code: 500,
      type: 'cancel',
      reason: 'policy-violation',
    })
  })

  it('should not resolve inherited object keys as conditions', () => {
    expect(StanzaError.fromCondition('toString').code).toBe(500)
  })
})

describe('formatStanzaError', () => {
  it('should prefer the text', () => {
    expect(formatStanzaError(new StanzaError({ reason: 'forbidden', text: 'Members only' }))).toBe('Members only')
  })

  it('should turn the condition into a sentence', () => {
    expect(formatStanzaError(new StanzaError({ reason: 'not-allowed' }))).toBe('Not allowed')
    expect(formatStanzaError(new StanzaError({ reason: 'item-not-found' }))).toBe('Item not found')
  })

  it('should fall back to undefined-condition when there is no reason', () => {
    expect(formatStanzaError(new StanzaError())).toBe('Undefined condition')
  })
})

describe('StanzaErrorException', () => {
  it('should carry the stanza error and a readable message', () => {
    const stanzaError = StanzaError.fromCondition('item-not-found')
    const exception = new StanzaErrorException(stanzaError)

    expect(exception.stanzaError).toBe(stanzaError)
    expect(exception.message).toBe('Item not found')
    expect(exception).toBeInstanceOf(Error)
  })
})
