import type { Element } from 'ltx'
import type { IqPayload } from '../payload'
import { NS_BIND } from '../namespaces'
import { createElement } from '../xml'

/**
 * RFC 6120 §7 resource binding. The client sends an optional
 * `resource`; the server answers with the bound full `jid`.
 */
export class BindBind implements IqPayload {
  resource?: string
  jid?: string

  decode(element: Element): void {
    this.resource = element.getChild('resource', NS_BIND)?.getText() || undefined
    this.jid = element.getChild('jid', NS_BIND)?.getText() || undefined
  }

  encode(): Element {
    const bind = createElement('bind', { xmlns: NS_BIND })
    if (this.resource) bind.c('resource').t(this.resource)
    if (this.jid) bind.c('jid').t(this.jid)
    return bind
  }
}
