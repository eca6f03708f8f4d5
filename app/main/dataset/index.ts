// In-memory tabular data set: attribute name -> ordered cells, one row count for all columns

import type { DataCell, DataRow } from '../types'

/**
 * True for the missing-value sentinel: null, undefined, NaN or an invalid Date
 */
export function isMissing(cell: DataCell): boolean {
  if (cell === null || cell === undefined) return true
  if (typeof cell === 'number') return Number.isNaN(cell)
  if (cell instanceof Date) return Number.isNaN(cell.getTime())
  return false
}

/**
 * String form of a cell; missing cells become the empty string
 */
export function cellToString(cell: DataCell): string {
  if (isMissing(cell)) {
    return ''
  }
  if (cell instanceof Date) {
    return cell.toISOString()
  }
  return String(cell)
}

export class DataSet {
  private readonly columns: ReadonlyMap<string, readonly DataCell[]>
  readonly rowCount: number

  constructor(columns: Map<string, DataCell[]> | Record<string, DataCell[]>) {
    const entries = columns instanceof Map ? Array.from(columns.entries()) : Object.entries(columns)
    const first = entries[0]
    const rowCount = first ? first[1].length : 0

    for (const [name, cells] of entries) {
      if (cells.length !== rowCount) {
        throw new Error(`Column "${name}" has ${cells.length} rows, expected ${rowCount}`)
      }
    }

    this.columns = new Map(entries.map(([name, cells]): [string, DataCell[]] => [name, [...cells]]))
    this.rowCount = rowCount
  }

  /**
   * Build a data set from row objects. Column order follows first appearance;
   * a row without a column gets the missing sentinel.
   */
  static fromRows(rows: DataRow[], columnOrder?: string[]): DataSet {
    const names = new Set<string>(columnOrder ?? [])
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        names.add(key)
      }
    }

    const columns = new Map<string, DataCell[]>()
    for (const name of names) {
      columns.set(name, rows.map(row => row[name] ?? null))
    }
    return new DataSet(columns)
  }

  columnNames(): string[] {
    return Array.from(this.columns.keys())
  }

  hasColumn(name: string): boolean {
    return this.columns.has(name)
  }

  column(name: string): readonly DataCell[] | undefined {
    return this.columns.get(name)
  }

  /**
   * First rows as plain objects, for previews
   */
  head(count: number): DataRow[] {
    const rows: DataRow[] = []
    for (let i = 0; i < Math.min(count, this.rowCount); i++) {
      const row: DataRow = {}
      for (const [name, cells] of this.columns) {
        row[name] = cells[i]
      }
      rows.push(row)
    }
    return rows
  }
}
