import { Element } from 'ltx'
import type { IqPayload } from './payload'
import { childElements, getAttrs, qualifiedName, type QName, type XmlAttr } from './xml'

/**
 * Schema-less representation of any namespaced element.
 *
 * Used as the payload for every qualified name the registry doesn't
 * know, so unknown extensions survive a decode/encode cycle, and as a
 * building block for walking substructures.
 *
 * @remarks
 * `encode()` replays the name, attributes and child nodes only.
 * `content` holds the element's character data but is not written back,
 * so an element with text and no child elements comes out empty:
 *
 * ```xml
 * <note xmlns="urn:example">hello</note>  ->  <note xmlns="urn:example"/>
 * ```
 */
export class GenericNode implements IqPayload {
  name: QName = { namespace: '', local: '' }
  /** Attributes in document order, never including `xmlns`. */
  attrs: XmlAttr[] = []
  content = ''
  nodes: GenericNode[] = []

  decode(element: Element): void {
    this.name = qualifiedName(element)
    // The default namespace is already captured in `name`
    this.attrs = getAttrs(element).filter((attr) => attr.name !== 'xmlns')
    this.content = element.getText()
    this.nodes = childElements(element).map((child) => {
      const node = new GenericNode()
      node.decode(child)
      return node
    })
  }

  /**
   * @param parentNamespace - Namespace the element will be written under.
   *        A node in no namespace below a namespaced parent gets
   *        `xmlns=""` so it doesn't inherit the parent's.
   */
  encode(parentNamespace = ''): Element {
    const attrs: Record<string, string> = {}
    if (this.name.namespace || parentNamespace) attrs.xmlns = this.name.namespace
    for (const { name, value } of this.attrs) attrs[name] = value

    const element = new Element(this.name.local, attrs)
    for (const node of this.nodes) element.cnode(node.encode(this.name.namespace))
    return element
  }
}
