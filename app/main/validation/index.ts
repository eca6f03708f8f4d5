// Data set validation against an OCA bundle

import log from '../logger'
import type { AttributeError, CellErrorMap, ParseResult, ValidateOptions, ValidationNotice, ValidationPass } from '../types'
import type { OcaBundle } from '../bundle'
import type { DataSet } from '../dataset'
import { cellToString, isMissing } from '../dataset'
import { ErrorReport, setCellError } from '../report'
import { describeType, matchCharacterEncoding, matchFormat, resolveBufferEncoding, SUPPORTED_ENCODINGS } from '../matchers'
import { DEFAULT_SETTINGS, Messages } from '../constants'

const JSON_TOKEN = /"(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|[[\]{}]/g

/**
 * Source text of the numbers directly inside the outer array, in order.
 * 1.0 stays "1.0" instead of becoming "1".
 */
function topLevelNumberTexts(text: string): string[] {
  const numbers: string[] = []
  let depth = 0
  for (const [token] of text.matchAll(JSON_TOKEN)) {
    if (token === '[' || token === '{') {
      depth++
    } else if (token === ']' || token === '}') {
      depth--
    } else if (depth === 1 && !token.startsWith('"')) {
      numbers.push(token)
    }
  }
  return numbers
}

/**
 * Read a cell as a JSON array and return the string form of each item
 */
function readArrayItems(text: string): ParseResult<string[]> {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) }
  }
  if (!Array.isArray(parsed)) {
    return { ok: false, reason: 'not an array' }
  }

  const numberTexts = topLevelNumberTexts(text)
  let nextNumber = 0
  const items = parsed.map((item: unknown): string => {
    if (typeof item === 'number') return numberTexts[nextNumber++] ?? String(item)
    if (typeof item === 'string') return item
    if (item !== null && typeof item === 'object') return JSON.stringify(item)
    return String(item)
  })
  return { ok: true, value: items }
}

/**
 * Compare data set columns with capture base attributes: unmatched columns first
 * (data set order), then missing attributes (bundle order)
 */
export function validateAttribute(bundle: OcaBundle, dataSet: DataSet): AttributeError[] {
  const unmatched: AttributeError[] = dataSet
    .columnNames()
    .filter(name => !bundle.hasAttribute(name))
    .map((attribute): AttributeError => ({ attribute, kind: 'UNMATCHED', message: Messages.unmatchedAttribute }))

  const missing: AttributeError[] = bundle
    .attributeNames()
    .filter(name => !dataSet.hasColumn(name))
    .map((attribute): AttributeError => ({ attribute, kind: 'MISSING', message: Messages.missingAttribute }))

  return [...unmatched, ...missing]
}

/**
 * Check every cell against its attribute's type and format; also reports empty mandatory cells
 */
export function validateFormat(bundle: OcaBundle, dataSet: DataSet): CellErrorMap {
  const errors: CellErrorMap = new Map()

  for (const attribute of bundle.attributeNames()) {
    const type = bundle.attributeType(attribute)
    const column = dataSet.column(attribute)
    // Absent columns are reported by validateAttribute
    if (!type || !column) continue

    const pattern = bundle.format(attribute)
    const mandatory = bundle.isMandatory(attribute)
    const expected = pattern ?? describeType(type)

    column.forEach((cell, row) => {
      let text: string
      if (isMissing(cell)) {
        if (mandatory) {
          setCellError(errors, attribute, row, Messages.missingMandatory)
          return
        }
        text = ''
      } else {
        text = cellToString(cell)
      }

      if (type.kind === 'Array') {
        const items = readArrayItems(text)
        if (!items.ok) {
          setCellError(errors, attribute, row, Messages.invalidArray)
          return
        }
        // First failing item decides the cell
        if (items.value.some(item => !matchFormat(type, pattern, item))) {
          setCellError(errors, attribute, row, Messages.formatMismatch(expected))
        }
        return
      }

      if (!matchFormat(type, pattern, text)) {
        const message = bundle.hasEntryCodes(attribute)
          ? Messages.entryCodeFormatMismatch(expected)
          : Messages.formatMismatch(expected)
        setCellError(errors, attribute, row, message)
      }
    })
  }

  return errors
}

/**
 * Check cells of attributes with entry codes against the permitted codes.
 * Missing cells are compared as the empty string.
 */
export function validateEntryCode(bundle: OcaBundle, dataSet: DataSet): CellErrorMap {
  const errors: CellErrorMap = new Map()

  for (const attribute of bundle.attributeNames()) {
    const codes = bundle.entryCodes(attribute)
    const column = dataSet.column(attribute)
    if (!codes || !column) continue

    const permitted = new Set(codes)
    column.forEach((cell, row) => {
      if (!permitted.has(cellToString(cell))) {
        setCellError(errors, attribute, row, Messages.entryCodeViolation(codes))
      }
    })
  }

  return errors
}

/**
 * Check that every cell can be represented in its attribute's character encoding
 */
export function validateEncoding(
  bundle: OcaBundle,
  dataSet: DataSet,
  defaultEncoding: string = DEFAULT_SETTINGS.defaultEncoding
): CellErrorMap {
  const errors: CellErrorMap = new Map()

  for (const attribute of bundle.attributeNames()) {
    const column = dataSet.column(attribute)
    if (!column) continue

    const encoding = bundle.characterEncoding(attribute) ?? defaultEncoding
    if (!resolveBufferEncoding(encoding)) {
      log.warn(`[VALIDATE] Unsupported character encoding "${encoding}" for ${attribute} (supported: ${SUPPORTED_ENCODINGS.join(', ')})`)
    }
    column.forEach((cell, row) => {
      if (!matchCharacterEncoding(cell, encoding)) {
        setCellError(errors, attribute, row, Messages.encodingMismatch(encoding))
      }
    })
  }

  return errors
}

// =============================================================================
// NOTICES
// =============================================================================

export function flaggedNotice(bundle: OcaBundle): ValidationNotice[] {
  const flagged = bundle.flaggedAttributes()
  if (flagged.length === 0) return []
  return [
    {
      kind: 'flagged',
      message: `Contains flagged data. Please check the following attribute(s): ${flagged.join(', ')}`
    }
  ]
}

export function versionNotice(bundle: OcaBundle, supportedVersion: string = DEFAULT_SETTINGS.supportedVersion): ValidationNotice[] {
  const notices: ValidationNotice[] = []
  for (const [section, version] of bundle.sectionVersions()) {
    if (version !== supportedVersion) {
      notices.push({
        kind: 'version',
        message: `Overlay ${section} has a different OCA specification version (${version}, expected ${supportedVersion}).`
      })
    }
  }
  return notices
}

// =============================================================================
// VALIDATE
// =============================================================================

/**
 * Run the attribute, format, entry code and encoding passes and collect their findings.
 * Options only control the advisory output; they never change the findings.
 */
export function validate(bundle: OcaBundle, dataSet: DataSet, options: ValidateOptions = {}): ErrorReport {
  const {
    showDataPreview = false,
    enableFlaggedAlarm = true,
    enableVersionAlarm = true,
    supportedVersion = DEFAULT_SETTINGS.supportedVersion,
    defaultEncoding = DEFAULT_SETTINGS.defaultEncoding,
    errorThreshold = DEFAULT_SETTINGS.errorThreshold,
    previewRows = DEFAULT_SETTINGS.previewRows
  } = options

  if (showDataPreview) {
    log.info(`[VALIDATE] Data set preview (${dataSet.rowCount} rows):`, JSON.stringify(dataSet.head(previewRows), null, 2))
  }

  const warnings: ValidationNotice[] = []
  if (enableFlaggedAlarm) warnings.push(...flaggedNotice(bundle))
  if (enableVersionAlarm) warnings.push(...versionNotice(bundle, supportedVersion))
  for (const warning of warnings) {
    log.warn(`[VALIDATE] ${warning.message}`)
  }

  const report = new ErrorReport({ warnings, errorThreshold })
  for (const error of validateAttribute(bundle, dataSet)) {
    report.addAttributeError(error.attribute, error.kind)
  }

  const passes: Array<[ValidationPass, CellErrorMap]> = [
    ['format', validateFormat(bundle, dataSet)],
    ['entryCode', validateEntryCode(bundle, dataSet)],
    ['encoding', validateEncoding(bundle, dataSet, defaultEncoding)]
  ]
  for (const [pass, errors] of passes) {
    for (const [attribute, rows] of errors) {
      for (const [row, message] of rows) {
        report.record(pass, attribute, row, message)
      }
    }
  }

  log.info(`[VALIDATE] ${report.overview().lines.join(' ')}`)
  return report
}
