/**
 * Core-only entry: the IQ codec without any client wiring.
 *
 * @module Core
 */

export { Iq, isIqType, type IqType, type IqAttributes } from './iq'
export { GenericNode } from './node'
export { PayloadRegistry } from './registry'
export { createDefaultRegistry, defaultRegistry } from './defaultRegistry'
export { isIqPayload, type IqPayload, type PayloadFactory } from './payload'
export { StanzaError, StanzaErrorException, formatStanzaError, type StanzaErrorType } from './stanzaError'
export { IqCallee, type IqHandler, type IqRequestContext, type IqCalleeOptions } from './iqCallee'
export { attachIqCallee, type StanzaTransport } from './transport'
export { StanzakitError, XmppParseError, RegistryError } from './errors'
export { LEGACY_ERROR_CODES, type DecodeOptions, type DefinedCondition } from './config'
export { parseStanza, qualifiedName, type QName, type XmlAttr } from './xml'
export * from './namespaces'
export * from './payloads'
