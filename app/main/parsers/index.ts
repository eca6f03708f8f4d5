// Data set parsers for CSV files and Excel data entry files

import * as fs from 'fs'
import * as XLSX from 'xlsx'
import log from '../logger'
import type { DataCell } from '../types'
import { DATA_ENTRY_SHEET } from '../constants'
import { DataSet } from '../dataset'
import { fileExtension, isValidFilePath } from '../utils/security'

function normalizeCell(value: unknown): DataCell {
  if (value === null || value === undefined || value === '') {
    return null
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }

  if (value instanceof Date) {
    return value
  }

  return String(value)
}

/**
 * Turn a worksheet into a data set; the first row holds the attribute names
 */
export function worksheetToDataSet(worksheet: XLSX.WorkSheet, raw: boolean): DataSet {
  const table = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    raw,
    defval: null,
    blankrows: false,
    dateNF: 'yyyy-mm-dd'
  })

  const [header = [], ...body] = table
  const names = header.map((cell, index) => {
    const name = cell === null || cell === undefined ? '' : String(cell).trim()
    return name || `Unnamed: ${index}`
  })

  const columns = new Map<string, DataCell[]>()
  names.forEach((name, index) => {
    if (columns.has(name)) {
      log.warn(`[DATASET] Duplicate column "${name}", keeping the first one`)
      return
    }
    columns.set(name, body.map(row => normalizeCell(row[index])))
  })

  return new DataSet(columns)
}

export function parseCsvText(content: string): DataSet {
  // raw: true keeps every cell as the exact text in the file
  const workbook = XLSX.read(content, { type: 'string', raw: true })

  const sheetName = workbook.SheetNames[0]
  if (!sheetName) {
    throw new Error('No data found in CSV file')
  }

  const worksheet = workbook.Sheets[sheetName]
  if (!worksheet) {
    throw new Error('Could not read CSV data')
  }

  return worksheetToDataSet(worksheet, true)
}

export function parseWorkbook(buffer: Buffer, sheetName: string = DATA_ENTRY_SHEET): DataSet {
  const workbook = XLSX.read(buffer, { type: 'buffer' })

  const worksheet = workbook.Sheets[sheetName]
  if (!worksheet) {
    throw new Error(`Sheet "${sheetName}" not found in workbook (sheets: ${workbook.SheetNames.join(', ')})`)
  }

  // Formatted cell text, so numbers and dates read the way they are shown
  return worksheetToDataSet(worksheet, false)
}

/**
 * Load a data set from a .csv file or an Excel data entry file (.xls/.xlsx)
 */
export function loadDataSet(filePath: string, sheetName: string = DATA_ENTRY_SHEET): DataSet {
  if (!isValidFilePath(filePath)) {
    throw new Error('Invalid file path')
  }

  const ext = fileExtension(filePath)
  if (ext !== 'csv' && ext !== 'xls' && ext !== 'xlsx') {
    throw new Error(`Unsupported data set file type: ${ext || filePath}`)
  }

  if (!fs.existsSync(filePath)) {
    throw new Error(`Data set file does not exist: ${filePath}`)
  }

  if (ext === 'csv') {
    return parseCsvText(fs.readFileSync(filePath, 'utf-8'))
  }
  return parseWorkbook(fs.readFileSync(filePath), sheetName)
}
