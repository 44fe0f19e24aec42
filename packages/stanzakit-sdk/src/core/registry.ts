import { RegistryError } from './errors'
import { logInfo, logWarn } from './logger'
import { GenericNode } from './node'
import { isIqPayload, type IqPayload, type PayloadFactory } from './payload'
import { qnameKey } from './xml'

/**
 * Table from qualified name to payload factory.
 *
 * Populate it during start-up, then hand it to {@link Iq.decode}. The
 * table is append-only: entries can't be replaced or removed, and the
 * first {@link resolve} call seals it, after which reads need no
 * synchronization.
 *
 * @example
 * ```typescript
 * const registry = createDefaultRegistry()
 * registry.register('urn:example:weather', 'forecast', () => new Forecast())
 * const iq = Iq.parse(markup, { registry })
 * ```
 */
export class PayloadRegistry {
  private readonly factories = new Map<string, PayloadFactory>()
  private sealed = false

  register(namespace: string, local: string, factory: PayloadFactory): void {
    const key = qnameKey(namespace, local)
    if (this.sealed) throw RegistryError.sealed(key)
    if (this.factories.has(key)) throw RegistryError.duplicate(key)
    this.factories.set(key, factory)
  }

  has(namespace: string, local: string): boolean {
    return this.factories.has(qnameKey(namespace, local))
  }

  get size(): number {
    return this.factories.size
  }

  get isSealed(): boolean {
    return this.sealed
  }

  /**
   * Fresh, empty payload for a qualified name.
   *
   * Unregistered names get a {@link GenericNode}. So does a registered
   * name whose factory throws or produces something that isn't a
   * payload; the broken entry is reported and skipped.
   */
  resolve(namespace: string, local: string): IqPayload {
    if (!this.sealed) {
      this.sealed = true
      logInfo(`Payload registry sealed with ${this.factories.size} entries`)
    }

    const key = qnameKey(namespace, local)
    const factory = this.factories.get(key)
    if (!factory) return new GenericNode()

    let candidate: unknown
    try {
      candidate = factory()
    } catch (err) {
      logWarn(`Payload factory for ${key} failed: ${err instanceof Error ? err.message : String(err)}`)
      return new GenericNode()
    }

    if (!isIqPayload(candidate)) {
      logWarn(`Payload factory for ${key} did not return an IQ payload`)
      return new GenericNode()
    }
    return candidate
  }
}
