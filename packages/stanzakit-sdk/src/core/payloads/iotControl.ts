import type { Element } from 'ltx'
import type { IqPayload } from '../payload'
import { NS_IOT_CONTROL } from '../namespaces'
import { childElements, createElement, getAttr, qualifiedName } from '../xml'

/** XEP-0325 control parameter data types, one element name each. */
export type ControlFieldType =
  | 'boolean'
  | 'color'
  | 'date'
  | 'dateTime'
  | 'double'
  | 'duration'
  | 'int'
  | 'long'
  | 'string'
  | 'time'

const FIELD_TYPES: ReadonlySet<string> = new Set<ControlFieldType>([
  'boolean', 'color', 'date', 'dateTime', 'double', 'duration', 'int', 'long', 'string', 'time',
])

function isControlFieldType(value: string): value is ControlFieldType {
  return FIELD_TYPES.has(value)
}

export interface ControlField {
  type: ControlFieldType
  name: string
  value: string
}

/**
 * XEP-0325 control `set` request: a list of typed parameters to apply.
 *
 * ```xml
 * <set xmlns="urn:xmpp:iot:control">
 *   <string name="url" value="https://music.example/track/42"/>
 *   <boolean name="shuffle" value="true"/>
 * </set>
 * ```
 *
 * Children that aren't one of the parameter types are skipped.
 */
export class ControlSet implements IqPayload {
  fields: ControlField[] = []

  decode(element: Element): void {
    this.fields = []
    for (const child of childElements(element)) {
      const { namespace, local } = qualifiedName(child)
      if (namespace !== NS_IOT_CONTROL || !isControlFieldType(local)) continue
      this.fields.push({
        type: local,
        name: getAttr(child, 'name') ?? '',
        value: getAttr(child, 'value') ?? '',
      })
    }
  }

  encode(): Element {
    const set = createElement('set', { xmlns: NS_IOT_CONTROL })
    for (const field of this.fields) {
      // name and value are always written, even when empty
      set.c(field.type, { name: field.name, value: field.value })
    }
    return set
  }

  /** First field with the given name, optionally restricted to a type. */
  getField(name: string, type?: ControlFieldType): ControlField | undefined {
    return this.fields.find((field) => field.name === name && (!type || field.type === type))
  }
}

/**
 * XEP-0325 acknowledgement of a successful `set`.
 */
export class ControlSetResponse implements IqPayload {
  decode(_element: Element): void {
    // Empty element; nothing to read
  }

  encode(): Element {
    return createElement('setResponse', { xmlns: NS_IOT_CONTROL })
  }
}
