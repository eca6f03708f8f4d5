// Validation error report: raw findings per pass plus derived summaries

import type {
  AttributeError,
  AttributeErrorKind,
  CellErrorMap,
  ColumnDetail,
  ReportOverview,
  ReportRow,
  RowMessage,
  ValidationNotice,
  ValidationPass
} from '../types'
import { ERR_THRESHOLD, Messages } from '../constants'

export interface ErrorReportInit {
  attributeErrors?: AttributeError[]
  formatErrors?: CellErrorMap
  entryCodeErrors?: CellErrorMap
  encodingErrors?: CellErrorMap
  warnings?: ValidationNotice[]
  errorThreshold?: number
}

const ATTRIBUTE_MESSAGES: Record<AttributeErrorKind, string> = {
  UNMATCHED: Messages.unmatchedAttribute,
  MISSING: Messages.missingAttribute
}

/**
 * Set the finding of one cell, replacing an earlier one for the same row
 */
export function setCellError(errors: CellErrorMap, attribute: string, row: number, message: string): void {
  let rows = errors.get(attribute)
  if (!rows) {
    rows = new Map()
    errors.set(attribute, rows)
  }
  rows.set(row, message)
}

function rowMessages(errors: ReadonlyMap<number, string> | undefined): RowMessage[] {
  if (!errors) return []
  return Array.from(errors.entries()).map(([row, message]) => ({ row, message }))
}

function mapToObject(errors: CellErrorMap): Record<string, Record<number, string>> {
  const out: Record<string, Record<number, string>> = {}
  for (const [attribute, rows] of errors) {
    out[attribute] = Object.fromEntries(rows)
  }
  return out
}

export class ErrorReport {
  private readonly attributeErrors: AttributeError[]
  private readonly formatErrors: CellErrorMap
  private readonly entryCodeErrors: CellErrorMap
  private readonly encodingErrors: CellErrorMap
  private readonly errorThreshold: number
  readonly warnings: ValidationNotice[]

  // Derived views, rebuilt from the raw collections by refresh()
  private readonly errorColumns = new Set<string>()
  private readonly errorRows = new Set<number>()
  private readonly missing = new Set<string>()
  private readonly unmatched = new Set<string>()

  constructor(init: ErrorReportInit = {}) {
    this.attributeErrors = init.attributeErrors ?? []
    this.formatErrors = init.formatErrors ?? new Map()
    this.entryCodeErrors = init.entryCodeErrors ?? new Map()
    this.encodingErrors = init.encodingErrors ?? new Map()
    this.warnings = init.warnings ?? []
    this.errorThreshold = init.errorThreshold ?? ERR_THRESHOLD
  }

  // ===========================================================================
  // RECORDING
  // ===========================================================================

  addAttributeError(attribute: string, kind: AttributeErrorKind): void {
    this.attributeErrors.push({ attribute, kind, message: ATTRIBUTE_MESSAGES[kind] })
  }

  record(pass: ValidationPass, attribute: string, row: number, message: string): void {
    setCellError(this.passErrors(pass), attribute, row, message)
  }

  private passErrors(pass: ValidationPass): CellErrorMap {
    switch (pass) {
      case 'format':
        return this.formatErrors
      case 'entryCode':
        return this.entryCodeErrors
      case 'encoding':
        return this.encodingErrors
    }
  }

  // ===========================================================================
  // DERIVED VIEWS
  // ===========================================================================

  /**
   * Rebuild affected columns/rows and missing/unmatched attributes from the raw findings
   */
  refresh(): void {
    this.errorColumns.clear()
    this.errorRows.clear()
    this.missing.clear()
    this.unmatched.clear()

    for (const error of this.attributeErrors) {
      if (error.kind === 'MISSING') {
        this.missing.add(error.attribute)
      } else {
        this.unmatched.add(error.attribute)
      }
    }

    for (const errors of [this.formatErrors, this.entryCodeErrors, this.encodingErrors]) {
      for (const [attribute, rows] of errors) {
        if (rows.size === 0) continue
        this.errorColumns.add(attribute)
        for (const row of rows.keys()) {
          this.errorRows.add(row)
        }
      }
    }
  }

  get affectedColumns(): ReadonlySet<string> {
    this.refresh()
    return this.errorColumns
  }

  get affectedRows(): ReadonlySet<number> {
    this.refresh()
    return this.errorRows
  }

  get missingAttributes(): ReadonlySet<string> {
    this.refresh()
    return this.missing
  }

  get unmatchedAttributes(): ReadonlySet<string> {
    this.refresh()
    return this.unmatched
  }

  hasErrors(): boolean {
    this.refresh()
    return this.attributeErrors.length > 0 || this.errorColumns.size > 0 || this.errorRows.size > 0
  }

  private describeAttributes(names: string[]): string {
    if (names.length > this.errorThreshold) {
      return `${names.length} attributes`
    }
    return `[${names.join(', ')}]`
  }

  /**
   * Minimal summary: missing/unmatched attributes and how many rows and columns have findings
   */
  overview(): ReportOverview {
    this.refresh()
    const missingAttributes = Array.from(this.missing)
    const unmatchedAttributes = Array.from(this.unmatched)
    const affectedColumns = Array.from(this.errorColumns).sort()
    const affectedRowCount = this.errorRows.size
    const ok = this.attributeErrors.length === 0 && affectedColumns.length === 0 && affectedRowCount === 0

    const lines: string[] = []
    if (ok) {
      lines.push(Messages.noError)
    }
    if (this.attributeErrors.length > 0) {
      lines.push(
        `Attribute error found. ${this.describeAttributes(missingAttributes)} found in the OCA bundle but not in the data set; ` +
          `${this.describeAttributes(unmatchedAttributes)} found in the data set but not in the OCA bundle.`
      )
    }
    if (affectedColumns.length > 0 || affectedRowCount > 0) {
      const columns = affectedColumns.length > this.errorThreshold
        ? `${affectedColumns.length} attributes`
        : `the following attribute(s): [${affectedColumns.join(', ')}]`
      lines.push(`Found ${affectedRowCount} problematic row(s) in ${columns}.`)
    }

    return { ok, missingAttributes, unmatchedAttributes, affectedRowCount, affectedColumns, lines }
  }

  /**
   * Detail for the lexicographically first column with findings
   */
  firstErrorColumn(): ColumnDetail {
    this.refresh()
    const first = Array.from(this.errorColumns).sort()[0]
    if (first === undefined) {
      return this.emptyDetail(null)
    }
    const detail = this.getColumnDetail(first)
    return { ...detail, lines: [`The first problematic column is: ${first}`, ...detail.lines] }
  }

  /**
   * Findings of one column by row: format, then entry code, then character encoding
   */
  getColumnDetail(attribute: string): ColumnDetail {
    this.refresh()
    if (this.errorColumns.size === 0) {
      return this.emptyDetail(attribute)
    }

    const formatErrors = rowMessages(this.formatErrors.get(attribute))
    const entryCodeErrors = rowMessages(this.entryCodeErrors.get(attribute))
    const encodingErrors = rowMessages(this.encodingErrors.get(attribute))

    const lines: string[] = []
    if (formatErrors.length > 0) {
      lines.push('Format error(s) would occur in the following row(s):')
      lines.push(...formatErrors.map(e => `row ${e.row}: ${e.message}`))
    } else {
      lines.push('No format error found in the column.')
    }
    if (entryCodeErrors.length > 0) {
      lines.push('Entry code error(s) would occur in the following row(s):')
      lines.push(...entryCodeErrors.map(e => `row ${e.row}: ${e.message}`))
    }
    if (encodingErrors.length > 0) {
      lines.push('Character encoding error(s) would occur in the following row(s):')
      lines.push(...encodingErrors.map(e => `row ${e.row}: ${e.message}`))
    }

    return {
      attribute,
      hasErrors: formatErrors.length + entryCodeErrors.length + encodingErrors.length > 0,
      formatErrors,
      entryCodeErrors,
      encodingErrors,
      lines
    }
  }

  private emptyDetail(attribute: string | null): ColumnDetail {
    return {
      attribute,
      hasErrors: false,
      formatErrors: [],
      entryCodeErrors: [],
      encodingErrors: [],
      lines: [Messages.noError]
    }
  }

  // ===========================================================================
  // RAW ACCESSORS
  // ===========================================================================

  getAttributeErrors(): AttributeError[] {
    return this.attributeErrors
  }

  getFormatErrors(): CellErrorMap {
    return this.formatErrors
  }

  getEntryCodeErrors(): CellErrorMap {
    return this.entryCodeErrors
  }

  getEncodingErrors(): CellErrorMap {
    return this.encodingErrors
  }

  // ===========================================================================
  // EXPORT
  // ===========================================================================

  /**
   * Every finding as one flat record, attribute findings first
   */
  toRows(): ReportRow[] {
    const rows: ReportRow[] = this.attributeErrors.map((e): ReportRow => ({
      attribute: e.attribute,
      row: null,
      pass: 'attribute',
      message: e.message
    }))

    const passes: Array<[ValidationPass, CellErrorMap]> = [
      ['format', this.formatErrors],
      ['entryCode', this.entryCodeErrors],
      ['encoding', this.encodingErrors]
    ]
    for (const [pass, errors] of passes) {
      for (const [attribute, cells] of errors) {
        for (const [row, message] of cells) {
          rows.push({ attribute, row, pass, message })
        }
      }
    }
    return rows
  }

  toJSON(): Record<string, unknown> {
    return {
      ok: !this.hasErrors(),
      attributeErrors: this.attributeErrors,
      formatErrors: mapToObject(this.formatErrors),
      entryCodeErrors: mapToObject(this.entryCodeErrors),
      encodingErrors: mapToObject(this.encodingErrors),
      warnings: this.warnings
    }
  }
}
