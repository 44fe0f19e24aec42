import { NS_BIND, NS_DISCO_INFO, NS_DISCO_ITEMS, NS_IOT_CONTROL } from './namespaces'
import { BindBind, ControlSet, DiscoInfo, DiscoItems } from './payloads'
import { PayloadRegistry } from './registry'

/**
 * New registry holding the payloads this package knows. Start from
 * this when adding application payloads, or in tests that must not
 * share state.
 */
export function createDefaultRegistry(): PayloadRegistry {
  const registry = new PayloadRegistry()
  registry.register(NS_DISCO_INFO, 'query', () => new DiscoInfo())
  registry.register(NS_DISCO_ITEMS, 'query', () => new DiscoItems())
  registry.register(NS_BIND, 'bind', () => new BindBind())
  registry.register(NS_IOT_CONTROL, 'set', () => new ControlSet())
  return registry
}

/**
 * Process-wide registry used when a decode call doesn't pass one.
 * Register application payloads on it before the first decode.
 */
export const defaultRegistry: PayloadRegistry = createDefaultRegistry()
