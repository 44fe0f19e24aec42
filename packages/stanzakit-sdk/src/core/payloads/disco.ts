import type { Element } from 'ltx'
import type { IqPayload } from '../payload'
import { NS_DISCO_INFO, NS_DISCO_ITEMS } from '../namespaces'
import { createElement, getAttr } from '../xml'

export interface DiscoIdentity {
  category: string
  type: string
  name?: string
}

export interface DiscoItem {
  jid: string
  name?: string
  node?: string
}

/**
 * XEP-0030 disco#info query: identities and features of an entity.
 *
 * @example
 * ```typescript
 * const info = new DiscoInfo()
 * info.identities.push({ category: 'client', type: 'bot', name: 'Jukebox' })
 * info.features.push(NS_DISCO_INFO, NS_IOT_CONTROL)
 * iq.addPayload(info)
 * ```
 */
export class DiscoInfo implements IqPayload {
  node?: string
  identities: DiscoIdentity[] = []
  features: string[] = []

  decode(element: Element): void {
    this.node = getAttr(element, 'node')
    this.identities = element.getChildren('identity', NS_DISCO_INFO).map((identity) => ({
      category: getAttr(identity, 'category') ?? '',
      type: getAttr(identity, 'type') ?? '',
      name: getAttr(identity, 'name'),
    }))
    this.features = element.getChildren('feature', NS_DISCO_INFO)
      .map((feature) => getAttr(feature, 'var') ?? '')
      .filter(Boolean)
  }

  encode(): Element {
    const query = createElement('query', { xmlns: NS_DISCO_INFO, node: this.node })
    for (const identity of this.identities) {
      query.cnode(createElement('identity', {
        category: identity.category,
        type: identity.type,
        name: identity.name,
      }))
    }
    for (const feature of this.features) {
      query.cnode(createElement('feature', { var: feature }))
    }
    return query
  }

  hasFeature(feature: string): boolean {
    return this.features.includes(feature)
  }
}

/**
 * XEP-0030 disco#items query: the items associated with an entity.
 */
export class DiscoItems implements IqPayload {
  node?: string
  items: DiscoItem[] = []

  decode(element: Element): void {
    this.node = getAttr(element, 'node')
    this.items = element.getChildren('item', NS_DISCO_ITEMS).map((item) => ({
      jid: getAttr(item, 'jid') ?? '',
      name: getAttr(item, 'name'),
      node: getAttr(item, 'node'),
    }))
  }

  encode(): Element {
    const query = createElement('query', { xmlns: NS_DISCO_ITEMS, node: this.node })
    for (const item of this.items) {
      query.cnode(createElement('item', { jid: item.jid, name: item.name, node: item.node }))
    }
    return query
  }
}
