import * as XLSX from 'xlsx'
import type { Parser, ParseResult } from './BaseParser'
import { TIME_COLUMN, tableFromMatrix } from './wideTable'

const SECONDS_PER_DAY = 24 * 60 * 60

/** Excel stores clock times as fractions of a day. */
export function dayFractionToClock(fraction: number): string {
  const total = Math.round(fraction * SECONDS_PER_DAY)
  const h = Math.floor(total / 3600)
  const m = Math.floor((total % 3600) / 60)
  const s = total % 60
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${pad(h)}:${pad(m)}:${pad(s)}`
}

function timeCell(cell: unknown): string {
  if (typeof cell === 'number' && Number.isFinite(cell) && cell >= 0) return dayFractionToClock(cell)
  return String(cell ?? '').trim()
}

function isZip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x50 && bytes[1] === 0x4b
}

const BioscreenXlsx: Parser = {
  id: 'bioscreen-xlsx',
  label: 'Bioscreen Excel export (.xlsx, .xls)',
  description: 'First worksheet; header row holds Time and numbered well columns',
  fileExtensions: ['.xlsx', '.xls'],
  detect: (bytes, filename) => {
    const lower = filename.toLowerCase()
    return lower.endsWith('.xlsx') || lower.endsWith('.xls') || isZip(bytes)
  },
  parse: (bytes, filename, options = {}): ParseResult => {
    let matrix: unknown[][]
    try {
      const wb = XLSX.read(bytes, { type: 'array' })
      const sheetName = wb.SheetNames[0]
      const ws = sheetName ? wb.Sheets[sheetName] : undefined
      if (!ws) return { ok: false, error: 'Worksheet not found in workbook' }
      matrix = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, raw: true, defval: '', blankrows: false })
    } catch (e) {
      return { ok: false, error: 'Failed to read Excel workbook: ' + (e instanceof Error ? e.message : String(e)) }
    }

    // Without an explicit skip count, the header is the first row holding a Time cell.
    let headerRowIdx = options.skipRows ?? -1
    if (headerRowIdx < 0) {
      headerRowIdx = matrix.findIndex((row) => row.some((cell) => String(cell ?? '').trim() === TIME_COLUMN))
      if (headerRowIdx < 0) return { ok: false, error: `No header row with a "${TIME_COLUMN}" cell found` }
    }
    return tableFromMatrix(matrix.slice(headerRowIdx), { sourceFile: filename, parserId: 'bioscreen-xlsx', encoding: null }, timeCell)
  },
}

export default BioscreenXlsx
