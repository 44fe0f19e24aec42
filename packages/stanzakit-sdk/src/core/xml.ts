import { Element, parse } from 'ltx'
import { XmppParseError } from './errors'

/**
 * Namespace-qualified element name. Prefixes are resolved away: two
 * elements with the same namespace URI and local name are the same
 * element type whatever prefix the sender used.
 */
export interface QName {
  namespace: string
  local: string
}

export interface XmlAttr {
  name: string
  value: string
}

/**
 * Parse markup text into its root element.
 *
 * Parser errors for malformed input propagate unchanged.
 */
export function parseStanza(markup: string): Element {
  const root: unknown = parse(markup)
  if (!(root instanceof Element)) throw XmppParseError.empty()
  return root
}

/**
 * Resolve the qualified name of an element.
 *
 * The namespace is looked up through the element's ancestors, so an
 * unprefixed child inherits its parent's default namespace and a
 * prefixed one resolves its `xmlns:prefix` declaration. The nearest
 * declaration wins even when it is empty: `xmlns=""` puts an element
 * back in no namespace.
 */
export function qualifiedName(element: Element): QName {
  const colon = element.name.indexOf(':')
  const declaration = colon === -1 ? 'xmlns' : `xmlns:${element.name.slice(0, colon)}`
  return {
    namespace: lookupNamespace(element, declaration),
    local: element.getName(),
  }
}

function lookupNamespace(element: Element, declaration: string): string {
  let current: Element | null = element
  while (current) {
    const value: unknown = current.attrs[declaration]
    if (typeof value === 'string') return value
    current = current.parent ?? null
  }
  return ''
}

/** Registry key for a qualified name. */
export function qnameKey(namespace: string, local: string): string {
  return `${namespace} ${local}`
}

/**
 * Read a string attribute. Missing and non-string values yield undefined.
 */
export function getAttr(element: Element, name: string): string | undefined {
  const value: unknown = element.attrs[name]
  return typeof value === 'string' ? value : undefined
}

/** Attributes in document order, skipping any that aren't strings. */
export function getAttrs(element: Element): XmlAttr[] {
  const attrs: XmlAttr[] = []
  for (const [name, value] of Object.entries(element.attrs)) {
    if (typeof value === 'string') attrs.push({ name, value })
  }
  return attrs
}

/** Child elements in document order, without text nodes. */
export function childElements(element: Element): Element[] {
  return element.children.filter((child): child is Element => child instanceof Element)
}

/**
 * Create an element, dropping attributes whose value is empty or absent.
 */
export function createElement(name: string, attrs: Record<string, string | undefined> = {}): Element {
  const present: Record<string, string> = {}
  for (const [key, value] of Object.entries(attrs)) {
    if (value) present[key] = value
  }
  return new Element(name, present)
}
