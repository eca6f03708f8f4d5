// Bundle keys, defaults and finding messages used by the validator

import type { ValidatorSettings } from './types'

// OCA Technical Specification version the validator is written against
export const OCA_VERSION = '1.0'

// Above this many attributes, summaries give a count instead of names
export const ERR_THRESHOLD = 5

export const DEFAULT_ENCODING = 'utf-8'

// Tab of the Excel data entry file that holds the data
export const DATA_ENTRY_SHEET = 'Schema conformant data'

export const DEFAULT_SETTINGS: ValidatorSettings = {
  supportedVersion: OCA_VERSION,
  errorThreshold: ERR_THRESHOLD,
  defaultEncoding: DEFAULT_ENCODING,
  dataEntrySheet: DATA_ENTRY_SHEET,
  previewRows: 5,
  logLevel: 'warn'
}

// =============================================================================
// BUNDLE KEYS
// =============================================================================

export const BundleKey = {
  captureBase: 'capture_base',
  overlays: 'overlays',
  format: 'format',
  conformance: 'conformance',
  entryCode: 'entry_code',
  characterEncoding: 'character_encoding'
} as const

export const MANDATORY = 'M'

// =============================================================================
// MESSAGES
// =============================================================================

export const Messages = {
  unmatchedAttribute: 'Unmatched attribute (attribute not found in the OCA bundle).',
  missingAttribute: 'Missing attribute (attribute not found in the data set).',
  missingMandatory: 'Missing mandatory attribute.',
  invalidArray: 'Valid array required.',
  formatMismatch: (format: string) => `Format mismatch. Supported format: ${format}.`,
  entryCodeFormatMismatch: (format: string) =>
    `Entry code format mismatch (fix the attribute format manually). Supported format for entry code: ${format}.`,
  entryCodeViolation: (codes: readonly string[]) =>
    `One of the entry codes required. Entry codes allowed: [${codes.join(', ')}].`,
  encodingMismatch: (encoding: string) =>
    `Character encoding mismatch. Supported character encoding: ${encoding}.`,
  noError: 'No error was found.'
} as const
