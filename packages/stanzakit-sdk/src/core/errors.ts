/**
 * Local faults raised by the codec.
 *
 * Errors reported *to a remote peer* are not exceptions: they are
 * {@link StanzaError} values carried inside an IQ of type `error`.
 * The classes here cover input that cannot be turned into a stanza at
 * all, and misuse of the payload registry.
 *
 * Parser errors raised by ltx for malformed markup are not wrapped; they
 * reach the caller unchanged.
 *
 * @module Core/Errors
 */

/**
 * Base error class for all codec errors.
 */
export class StanzakitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Structurally malformed stanza.
 * - XmppParseError.empty() - Markup contained no root element
 * - XmppParseError.unexpectedRoot() - Root element is not the expected stanza
 * - XmppParseError.invalidType() - IQ type attribute missing or unknown
 */
export class XmppParseError extends StanzakitError {
  private constructor(message: string, code: string) {
    super(message, code)
  }

  static empty(): XmppParseError {
    return new XmppParseError('No root element in markup', 'PARSE_ERROR:EMPTY')
  }

  static unexpectedRoot(expected: string, actual: string): XmppParseError {
    return new XmppParseError(
      `Expected <${expected}> root element, got <${actual}>`,
      'PARSE_ERROR:UNEXPECTED_ROOT',
    )
  }

  static invalidType(value: string | undefined): XmppParseError {
    return new XmppParseError(
      value === undefined ? 'IQ has no type attribute' : `Invalid IQ type "${value}"`,
      'PARSE_ERROR:INVALID_TYPE',
    )
  }
}

/**
 * Payload registry misuse.
 * - RegistryError.duplicate() - Qualified name already registered
 * - RegistryError.sealed() - Registration after decoding started
 */
export class RegistryError extends StanzakitError {
  private constructor(message: string, code: string) {
    super(message, code)
  }

  static duplicate(key: string): RegistryError {
    return new RegistryError(`Payload already registered for ${key}`, 'REGISTRY_ERROR:DUPLICATE')
  }

  static sealed(key: string): RegistryError {
    return new RegistryError(
      `Cannot register ${key}: registry is sealed once decoding has started`,
      'REGISTRY_ERROR:SEALED',
    )
  }
}
