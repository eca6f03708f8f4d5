// Writers for exporting validation findings as CSV or XLSX

import * as fs from 'fs'
import * as XLSX from 'xlsx'
import type { ReportRow } from '../types'
import type { ErrorReport } from '../report'

export type TableRow = Record<string, string | number | null>

// Column headers of an exported report
const REPORT_COLUMNS = {
  attribute: 'Attribute',
  row: 'Row',
  pass: 'Check',
  message: 'Message'
} as const

const PASS_LABELS: Record<ReportRow['pass'], string> = {
  attribute: 'attribute',
  format: 'format',
  entryCode: 'entry code',
  encoding: 'character encoding'
}

function escapeCsvValue(value: unknown): string {
  if (value === null || value === undefined) {
    return ''
  }

  const str = String(value)

  // If contains comma, quote, or newline, wrap in quotes and escape quotes
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

/**
 * Flatten a report into table rows, one per finding
 */
export function reportToTable(report: ErrorReport): TableRow[] {
  return report.toRows().map(row => ({
    [REPORT_COLUMNS.attribute]: row.attribute,
    [REPORT_COLUMNS.row]: row.row,
    [REPORT_COLUMNS.pass]: PASS_LABELS[row.pass],
    [REPORT_COLUMNS.message]: row.message
  }))
}

export function toCsv(data: TableRow[]): string {
  // Get all unique keys from all rows
  const allKeys = new Set<string>()
  for (const row of data) {
    for (const key of Object.keys(row)) {
      allKeys.add(key)
    }
  }
  const headers = Array.from(allKeys)

  const lines: string[] = [headers.map(h => escapeCsvValue(h)).join(',')]
  for (const row of data) {
    lines.push(headers.map(h => escapeCsvValue(row[h])).join(','))
  }

  return lines.join('\n') + '\n'
}

/**
 * Write rows to a CSV file
 */
export function writeCsv(data: TableRow[], outputPath: string): void {
  if (data.length === 0) {
    throw new Error('Cannot write empty dataset to CSV')
  }
  fs.writeFileSync(outputPath, toCsv(data), 'utf-8')
}

/**
 * Write rows to an XLSX file
 */
export function writeXlsx(data: TableRow[], outputPath: string): void {
  if (data.length === 0) {
    throw new Error('Cannot write empty dataset to XLSX')
  }

  const workbook = XLSX.utils.book_new()
  const worksheet = XLSX.utils.json_to_sheet(data)
  XLSX.utils.book_append_sheet(workbook, worksheet, 'Findings')

  XLSX.writeFile(workbook, outputPath)
}
