// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

// Settings
export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly'

export interface ValidatorSettings {
  supportedVersion: string
  errorThreshold: number
  defaultEncoding: string
  dataEntrySheet: string
  previewRows: number
  logLevel: LogLevel
}

// Attribute types
export type ScalarAttributeType =
  | { kind: 'Text' }
  | { kind: 'Numeric' }
  | { kind: 'Boolean' }
  | { kind: 'DateTime' }
  | { kind: 'Unknown'; tag: string }

export type AttributeType =
  | ScalarAttributeType
  | { kind: 'Array'; item: ScalarAttributeType }

// Fallible parse result used by the matchers
export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string }

// Core data types
export type DataCell = string | number | boolean | Date | null | undefined

export type DataRow = Record<string, DataCell>

// Raw bundle tree, as read from a .json bundle or assembled from a .zip
export interface RawSection {
  type?: string
  [key: string]: unknown
}

export interface RawCaptureBase extends RawSection {
  attributes: Record<string, string>
  flagged_attributes?: string[]
}

export interface RawBundle {
  capture_base: RawCaptureBase
  overlays: Record<string, RawSection>
}

// Error report
export type AttributeErrorKind = 'UNMATCHED' | 'MISSING'

export interface AttributeError {
  attribute: string
  kind: AttributeErrorKind
  message: string
}

export type ValidationPass = 'format' | 'entryCode' | 'encoding'

/** attribute name -> row index -> message; only failing rows appear */
export type CellErrorMap = Map<string, Map<number, string>>

export interface RowMessage {
  row: number
  message: string
}

export interface ReportRow {
  attribute: string
  row: number | null
  pass: ValidationPass | 'attribute'
  message: string
}

export interface ValidationNotice {
  kind: 'flagged' | 'version'
  message: string
}

export interface ReportOverview {
  ok: boolean
  missingAttributes: string[]
  unmatchedAttributes: string[]
  affectedRowCount: number
  affectedColumns: string[]
  lines: string[]
}

export interface ColumnDetail {
  attribute: string | null
  hasErrors: boolean
  formatErrors: RowMessage[]
  entryCodeErrors: RowMessage[]
  encodingErrors: RowMessage[]
  lines: string[]
}

export interface ValidateOptions {
  showDataPreview?: boolean
  enableFlaggedAlarm?: boolean
  enableVersionAlarm?: boolean
  supportedVersion?: string
  defaultEncoding?: string
  errorThreshold?: number
  previewRows?: number
}
