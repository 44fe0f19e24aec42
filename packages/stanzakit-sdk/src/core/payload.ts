import type { Element } from 'ltx'

/**
 * Capability shared by everything that can ride inside an IQ.
 *
 * A payload is created empty by its registry factory, then filled by
 * `decode()` from the element it was resolved for. `encode()` rebuilds
 * an element carrying the payload's own namespace.
 */
export interface IqPayload {
  decode(element: Element): void
  encode(): Element
}

/**
 * Creates an empty payload instance. Returns `unknown` on purpose: a
 * factory registered from untyped code is checked with
 * {@link isIqPayload} before use.
 */
export type PayloadFactory = () => unknown

export function isIqPayload(value: unknown): value is IqPayload {
  if (typeof value !== 'object' || value === null) return false
  return 'decode' in value && typeof value.decode === 'function'
    && 'encode' in value && typeof value.encode === 'function'
}
