import * as XLSX from 'xlsx'
import { describe, expect, it } from 'vitest'
import BioscreenXlsx, { dayFractionToClock } from './BioscreenXlsx'

function workbook(rows: unknown[][]): Uint8Array {
  const wb = XLSX.utils.book_new()
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), 'Plate')
  return new Uint8Array(XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' }))
}

describe('dayFractionToClock', () => {
  it('formats fractions of a day as HH:MM:SS', () => {
    expect(dayFractionToClock(0)).toBe('00:00:00')
    expect(dayFractionToClock(1 / 48)).toBe('00:30:00')
    expect(dayFractionToClock(1.5)).toBe('36:00:00')
  })
})

describe('BioscreenXlsx', () => {
  it('finds the header row and converts numeric time cells', () => {
    const bytes = workbook([
      ['Bioscreen run'],
      ['Time', 1, 2],
      [0, 0.1, 0.2],
      [1 / 48, 0.3, 0.4],
    ])
    expect(BioscreenXlsx.detect(bytes, 'run.bin')).toBe(true)
    const result = BioscreenXlsx.parse(bytes, 'run.xlsx')
    if (!result.ok) throw new Error(result.error)
    expect(result.table.time).toEqual(['00:00:00', '00:30:00'])
    expect(result.table.wells.get(1)).toEqual([0.1, 0.3])
    expect(result.table.wells.get(2)).toEqual([0.2, 0.4])
    expect(result.table.meta?.encoding).toBeNull()
  })

  it('keeps text time cells as they are', () => {
    const result = BioscreenXlsx.parse(workbook([['Time', 7], ['00:15:00', 1]]), 'run.xlsx')
    if (!result.ok) throw new Error(result.error)
    expect(result.table.time).toEqual(['00:15:00'])
  })

  it('uses an explicit header row when given', () => {
    const result = BioscreenXlsx.parse(workbook([['note'], ['Time', 3], ['00:00:00', 2]]), 'run.xlsx', { skipRows: 0 })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toMatch(/^Missing required "Time" column in header: note/)
  })

  it('fails without a Time header', () => {
    const result = BioscreenXlsx.parse(workbook([['A', 'B'], [1, 2]]), 'run.xlsx')
    expect(result).toEqual({ ok: false, error: 'No header row with a "Time" cell found' })
  })
})
