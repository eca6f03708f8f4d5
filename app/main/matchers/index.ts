// Format matchers: decide whether one value conforms to one declared type and pattern

import type { AttributeType, ScalarAttributeType } from '../types'
import { matchDateTime } from './datetime'
import { matchRegex } from './regex'

export { matchDateTime, isoToDateFnsFormat, parseDateStrict } from './datetime'
export { matchRegex, compileRegex } from './regex'
export { matchCharacterEncoding, resolveBufferEncoding, SUPPORTED_ENCODINGS } from './encoding'

// Literal forms accepted for Boolean attributes
const BOOLEAN_LITERALS: ReadonlySet<string> = new Set([
  'True',
  'true',
  'TRUE',
  'T',
  '1',
  '1.0',
  'False',
  'false',
  'FALSE',
  'F',
  '0',
  '0.0'
])

export function matchBoolean(value: string): boolean {
  return BOOLEAN_LITERALS.has(value)
}

function parseScalarType(tag: string): ScalarAttributeType {
  switch (tag) {
    case 'Text':
    case 'Numeric':
    case 'Boolean':
    case 'DateTime':
      return { kind: tag }
    default:
      return { kind: 'Unknown', tag }
  }
}

/**
 * Read a capture base type tag. Array[Text] and "Array of Text" are arrays of Text;
 * tags outside the known set are Unknown.
 */
export function parseAttributeType(tag: string): AttributeType {
  const trimmed = tag.trim()
  const array = /^Array\s*(?:\[\s*([^\]]+?)\s*\]|of\s+(.+))$/.exec(trimmed)
  if (array) {
    const item = (array[1] ?? array[2] ?? '').trim()
    return { kind: 'Array', item: parseScalarType(item) }
  }
  return parseScalarType(trimmed)
}

export function describeType(type: AttributeType): string {
  if (type.kind === 'Array') return `Array[${describeType(type.item)}]`
  if (type.kind === 'Unknown') return type.tag
  return type.kind
}

/**
 * Match one value against a type and its format pattern. Arrays dispatch on their item type,
 * unknown types are unconstrained.
 */
export function matchFormat(type: AttributeType, pattern: string | null | undefined, value: string): boolean {
  switch (type.kind) {
    case 'Array':
      return matchFormat(type.item, pattern, value)
    case 'DateTime':
      return matchDateTime(pattern, value)
    case 'Numeric':
    case 'Text':
      return matchRegex(pattern, value)
    case 'Boolean':
      return matchBoolean(value)
    case 'Unknown':
      return true
  }
}
