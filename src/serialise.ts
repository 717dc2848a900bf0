/**
 * String serialisation of property values, following each declaration's
 * `format` and `parse` rules. List items are joined with `DELIMITER`.
 *
 * ```ts
 * serialise(owner, 'range')              // '0#10'
 * deserialise(owner, 'range', '5#15')    // owner.get('range') -> [5, 15]
 * ```
 */

import type { PropertyOwner } from './properties'
import type { PropertyDecl, PropertyName, PropertySchema } from './properties-types'

const DELIMITER = '#'

function serialise<S extends PropertySchema>(owner: PropertyOwner<S>, name: PropertyName<S>): string {
  const decl: PropertyDecl = owner.getProp(name)
  const value = owner.getValue(name)
  if (decl.kind === 'value') return decl.format(value)
  const items = Array.isArray(value) ? value : []
  return items.map(item => decl.item.format(item)).join(DELIMITER)
}

/**
 * Parses `text` for property `name`, sets it, and returns the parsed value.
 *
 * @throws CastError, ValidationError, LengthMismatchError from `set()`, or
 *         the parse error of the declaration.
 */
function deserialise<S extends PropertySchema>(owner: PropertyOwner<S>, name: PropertyName<S>, text: string): unknown {
  const decl: PropertyDecl = owner.getProp(name)
  const value = decl.kind === 'value' ? decl.parse(text) : parseItems(text).map(part => decl.item.parse(part))
  owner.setValue(name, value)
  return value
}

function parseItems(text: string): string[] {
  return text === '' ? [] : text.split(DELIMITER)
}

/** Every property, serialised, keyed by name. */
function serialiseAll<S extends PropertySchema>(owner: PropertyOwner<S>): Record<string, string> {
  return Object.fromEntries(owner.getPropertyNames().map(name => [name, serialise(owner, name)]))
}

export { DELIMITER, serialise, deserialise, serialiseAll }
