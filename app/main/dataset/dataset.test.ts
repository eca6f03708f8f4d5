import { describe, it, expect } from 'vitest'
import { DataSet, cellToString, isMissing } from '.'

describe('isMissing', () => {
  it('should treat null, undefined, NaN and invalid dates as missing', () => {
    expect(isMissing(null)).toBe(true)
    expect(isMissing(undefined)).toBe(true)
    expect(isMissing(Number.NaN)).toBe(true)
    expect(isMissing(new Date('not a date'))).toBe(true)
  })

  it('should keep empty-looking values that are present', () => {
    expect(isMissing(0)).toBe(false)
    expect(isMissing(false)).toBe(false)
    expect(isMissing(' ')).toBe(false)
  })
})

describe('cellToString', () => {
  it('should stringify present cells', () => {
    expect(cellToString(12)).toBe('12')
    expect(cellToString(true)).toBe('true')
    expect(cellToString(new Date(Date.UTC(2023, 4, 17)))).toBe('2023-05-17T00:00:00.000Z')
  })

  it('should return the empty string for missing cells', () => {
    expect(cellToString(null)).toBe('')
    expect(cellToString(Number.NaN)).toBe('')
    expect(cellToString(new Date('not a date'))).toBe('')
  })
})

describe('DataSet', () => {
  it('should keep column order and row count', () => {
    const dataSet = new DataSet({ plotId: ['P001', 'P002'], stemCount: [3, null] })
    expect(dataSet.columnNames()).toEqual(['plotId', 'stemCount'])
    expect(dataSet.rowCount).toBe(2)
    expect(dataSet.column('stemCount')).toEqual([3, null])
    expect(dataSet.column('absent')).toBeUndefined()
  })

  it('should reject columns of different lengths', () => {
    expect(() => new DataSet({ a: [1, 2], b: [1] })).toThrow('Column "b" has 1 rows, expected 2')
  })

  it('should accept a map of columns', () => {
    const dataSet = new DataSet(new Map([['a', ['x']]]))
    expect(dataSet.hasColumn('a')).toBe(true)
    expect(dataSet.rowCount).toBe(1)
  })

  it('should build from rows and fill gaps with null', () => {
    const dataSet = DataSet.fromRows([{ a: 1 }, { a: 2, b: 'x' }])
    expect(dataSet.columnNames()).toEqual(['a', 'b'])
    expect(dataSet.column('b')).toEqual([null, 'x'])
  })

  it('should honour an explicit column order', () => {
    const dataSet = DataSet.fromRows([{ a: 1, b: 2 }], ['b', 'c'])
    expect(dataSet.columnNames()).toEqual(['b', 'c', 'a'])
    expect(dataSet.column('c')).toEqual([null])
  })

  it('should return the first rows for previews', () => {
    const dataSet = new DataSet({ a: [1, 2, 3], b: ['x', 'y', 'z'] })
    expect(dataSet.head(2)).toEqual([
      { a: 1, b: 'x' },
      { a: 2, b: 'y' }
    ])
    expect(dataSet.head(10)).toHaveLength(3)
  })

  it('should be empty without columns', () => {
    const dataSet = new DataSet({})
    expect(dataSet.rowCount).toBe(0)
    expect(dataSet.columnNames()).toEqual([])
  })
})
