// Public API

export * from './types'
export { OCA_VERSION, ERR_THRESHOLD, DEFAULT_ENCODING, DATA_ENTRY_SHEET, DEFAULT_SETTINGS, Messages } from './constants'
export {
  matchBoolean,
  matchRegex,
  matchDateTime,
  matchCharacterEncoding,
  matchFormat,
  parseAttributeType,
  describeType,
  SUPPORTED_ENCODINGS
} from './matchers'
export { OcaBundle, parseRawBundle } from './bundle'
export { loadBundle, readBundleArchive } from './bundle/loader'
export { DataSet, isMissing, cellToString } from './dataset'
export { loadDataSet, parseCsvText, parseWorkbook } from './parsers'
export { ErrorReport } from './report'
export type { ErrorReportInit } from './report'
export {
  validate,
  validateAttribute,
  validateFormat,
  validateEntryCode,
  validateEncoding,
  flaggedNotice,
  versionNotice
} from './validation'
export { reportToTable, toCsv, writeCsv, writeXlsx } from './writers'
export { SettingsManager } from './SettingsManager'
