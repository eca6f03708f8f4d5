import { describe, it, expect, beforeEach } from 'vitest'
import type { CellErrorMap } from '../types'
import { ErrorReport } from '.'

function cells(entries: Array<[string, Array<[number, string]>]>): CellErrorMap {
  return new Map(entries.map(([attribute, rows]): [string, Map<number, string>] => [attribute, new Map(rows)]))
}

describe('ErrorReport', () => {
  describe('overview', () => {
    it('should report no error for an empty report', () => {
      const overview = new ErrorReport().overview()
      expect(overview.ok).toBe(true)
      expect(overview.lines).toEqual(['No error was found.'])
    })

    it('should summarise a single format error', () => {
      const report = new ErrorReport({
        formatErrors: cells([['stemCount', [[1, 'Format mismatch. Supported format: ^[0-9]+$.']]]])
      })

      expect(report.affectedColumns.size).toBe(1)
      expect(report.affectedRows.size).toBe(1)
      expect(report.overview().lines).toEqual(['Found 1 problematic row(s) in the following attribute(s): [stemCount].'])
    })

    it('should list missing and unmatched attributes', () => {
      const report = new ErrorReport()
      report.addAttributeError('observer', 'UNMATCHED')
      report.addAttributeError('canopyCover', 'MISSING')

      const overview = report.overview()
      expect(overview.ok).toBe(false)
      expect(overview.missingAttributes).toEqual(['canopyCover'])
      expect(overview.unmatchedAttributes).toEqual(['observer'])
      expect(overview.lines).toEqual([
        'Attribute error found. [canopyCover] found in the OCA bundle but not in the data set; [observer] found in the data set but not in the OCA bundle.'
      ])
    })

    it('should count attributes above the threshold', () => {
      const report = new ErrorReport({ errorThreshold: 2 })
      report.record('format', 'a', 0, 'bad')
      report.record('format', 'b', 0, 'bad')
      report.record('entryCode', 'c', 4, 'bad')
      report.addAttributeError('x', 'MISSING')
      report.addAttributeError('y', 'MISSING')
      report.addAttributeError('z', 'MISSING')
      report.addAttributeError('w', 'UNMATCHED')

      expect(report.overview().lines).toEqual([
        'Attribute error found. 3 attributes found in the OCA bundle but not in the data set; [w] found in the data set but not in the OCA bundle.',
        'Found 2 problematic row(s) in 3 attributes.'
      ])
    })

    it('should sort affected columns', () => {
      const report = new ErrorReport()
      report.record('encoding', 'notes', 0, 'bad')
      report.record('format', 'healthy', 2, 'bad')
      expect(report.overview().affectedColumns).toEqual(['healthy', 'notes'])
    })
  })

  describe('derived views', () => {
    let report: ErrorReport

    beforeEach(() => {
      report = new ErrorReport()
      report.record('format', 'plotId', 0, 'Missing mandatory attribute.')
      report.record('entryCode', 'status', 0, 'bad code')
      report.record('encoding', 'notes', 3, 'bad encoding')
    })

    it('should union rows and columns of every pass', () => {
      expect(Array.from(report.affectedColumns).sort()).toEqual(['notes', 'plotId', 'status'])
      expect(Array.from(report.affectedRows).sort()).toEqual([0, 3])
    })

    it('should give the same views when refreshed again', () => {
      report.refresh()
      report.refresh()
      expect(report.affectedColumns.size).toBe(3)
      expect(report.affectedRows.size).toBe(2)
    })

    it('should pick up findings recorded after a refresh', () => {
      expect(report.affectedRows.size).toBe(2)
      report.record('format', 'plotId', 5, 'bad')
      expect(report.affectedRows.size).toBe(3)
    })

    it('should ignore attributes without findings', () => {
      const empty = new ErrorReport({ formatErrors: cells([['plotId', []]]) })
      expect(empty.affectedColumns.size).toBe(0)
      expect(empty.hasErrors()).toBe(false)
    })
  })

  describe('column detail', () => {
    let report: ErrorReport

    beforeEach(() => {
      report = new ErrorReport()
      report.record('format', 'speciesCode', 2, 'Format mismatch. Supported format: ^[A-Z]{3}$.')
      report.record('entryCode', 'speciesCode', 2, 'One of the entry codes required. Entry codes allowed: [OAK, MAP].')
      report.record('entryCode', 'speciesCode', 4, 'One of the entry codes required. Entry codes allowed: [OAK, MAP].')
      report.record('encoding', 'notes', 1, 'Character encoding mismatch. Supported character encoding: iso-8859-1.')
    })

    it('should list format and entry code findings by row', () => {
      expect(report.getColumnDetail('speciesCode').lines).toEqual([
        'Format error(s) would occur in the following row(s):',
        'row 2: Format mismatch. Supported format: ^[A-Z]{3}$.',
        'Entry code error(s) would occur in the following row(s):',
        'row 2: One of the entry codes required. Entry codes allowed: [OAK, MAP].',
        'row 4: One of the entry codes required. Entry codes allowed: [OAK, MAP].'
      ])
    })

    it('should list encoding findings after format findings', () => {
      const detail = report.getColumnDetail('notes')
      expect(detail.hasErrors).toBe(true)
      expect(detail.lines).toEqual([
        'No format error found in the column.',
        'Character encoding error(s) would occur in the following row(s):',
        'row 1: Character encoding mismatch. Supported character encoding: iso-8859-1.'
      ])
    })

    it('should report a clean column', () => {
      const detail = report.getColumnDetail('plotId')
      expect(detail.hasErrors).toBe(false)
      expect(detail.lines).toEqual(['No format error found in the column.'])
    })

    it('should report no error when nothing was found', () => {
      const detail = new ErrorReport().getColumnDetail('plotId')
      expect(detail.lines).toEqual(['No error was found.'])
    })

    it('should describe the first problematic column', () => {
      const detail = report.firstErrorColumn()
      expect(detail.attribute).toBe('notes')
      expect(detail.lines[0]).toBe('The first problematic column is: notes')
      expect(detail.lines).toHaveLength(4)
    })

    it('should have no first column without findings', () => {
      const detail = new ErrorReport().firstErrorColumn()
      expect(detail.attribute).toBeNull()
      expect(detail.lines).toEqual(['No error was found.'])
    })
  })

  describe('export', () => {
    it('should flatten findings with attribute findings first', () => {
      const report = new ErrorReport()
      report.record('entryCode', 'status', 1, 'bad code')
      report.record('format', 'plotId', 0, 'bad format')
      report.addAttributeError('observer', 'UNMATCHED')

      expect(report.toRows()).toEqual([
        { attribute: 'observer', row: null, pass: 'attribute', message: 'Unmatched attribute (attribute not found in the OCA bundle).' },
        { attribute: 'plotId', row: 0, pass: 'format', message: 'bad format' },
        { attribute: 'status', row: 1, pass: 'entryCode', message: 'bad code' }
      ])
    })

    it('should serialise to plain JSON', () => {
      const report = new ErrorReport()
      report.record('format', 'plotId', 0, 'bad format')

      expect(JSON.parse(JSON.stringify(report))).toEqual({
        ok: false,
        attributeErrors: [],
        formatErrors: { plotId: { '0': 'bad format' } },
        entryCodeErrors: {},
        encodingErrors: {},
        warnings: []
      })
    })
  })
})
