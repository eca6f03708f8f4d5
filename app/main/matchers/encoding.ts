// Character encoding checks

import type { DataCell } from '../types'
import { cellToString } from '../dataset'

const BUFFER_ENCODINGS: Record<string, BufferEncoding> = {
  'utf-8': 'utf8',
  'utf-16le': 'utf16le',
  'iso-8859-1': 'latin1'
}

export const SUPPORTED_ENCODINGS = Object.keys(BUFFER_ENCODINGS)

export function resolveBufferEncoding(encodingName: string | null | undefined): BufferEncoding | undefined {
  if (!encodingName) return undefined
  return BUFFER_ENCODINGS[encodingName.trim().toLowerCase()]
}

/**
 * True when the value's string form survives an encode/decode round trip in the named encoding.
 * Unknown encodings never match.
 */
export function matchCharacterEncoding(value: DataCell, encodingName: string | null | undefined): boolean {
  const encoding = resolveBufferEncoding(encodingName)
  if (!encoding) {
    return false
  }
  const text = cellToString(value)
  return Buffer.from(text, encoding).toString(encoding) === text
}
