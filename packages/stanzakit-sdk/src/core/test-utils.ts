/**
 * Shared test utilities for codec and callee tests
 */
import { vi, type Mock } from 'vitest'
import type { Element } from 'ltx'
import type { StanzaTransport } from './transport'
import { parseStanza } from './xml'

type StanzaListener = (stanza: Element) => void

export type MockTransport = StanzaTransport & {
  on: Mock<(event: 'stanza', listener: StanzaListener) => unknown>
  removeListener: Mock<(event: 'stanza', listener: StanzaListener) => unknown>
  send: Mock<(element: Element) => Promise<unknown>>
  /** Deliver markup to every registered stanza listener. */
  receive: (markup: string) => void
  /** Sent elements, serialized. */
  sent: () => string[]
}

// Mock of the XMPP client surface the transport binding uses
export const createMockTransport = (): MockTransport => {
  const listeners: StanzaListener[] = []
  const send = vi.fn<(element: Element) => Promise<unknown>>(() => Promise.resolve(undefined))
  return {
    on: vi.fn<(event: 'stanza', listener: StanzaListener) => unknown>((_event, listener) => {
      listeners.push(listener)
    }),
    removeListener: vi.fn<(event: 'stanza', listener: StanzaListener) => unknown>((_event, listener) => {
      const idx = listeners.indexOf(listener)
      if (idx > -1) listeners.splice(idx, 1)
    }),
    send,
    receive: (markup: string) => {
      const stanza = parseStanza(markup)
      for (const listener of [...listeners]) listener(stanza)
    },
    sent: () => send.mock.calls.map(([element]) => element.toString()),
  }
}
