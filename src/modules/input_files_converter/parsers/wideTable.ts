import { TextDecoder } from 'node:util'
import { v4 as uuidv4 } from 'uuid'
import type { RawTable, WellIndex } from '@/types'
import { parseDelimited } from '@/utils/csv'
import { toNumber } from '@/utils/numbers'
import { wellColumnIndex } from '@/utils/wells'
import type { ParseResult, RawReadOptions } from './BaseParser'

export const TIME_COLUMN = 'Time'

export function decodeText(bytes: Uint8Array, encoding: string): { ok: true; text: string } | { ok: false; error: string } {
  try {
    return { ok: true, text: new TextDecoder(encoding).decode(bytes) }
  } catch (err) {
    return { ok: false, error: `Unsupported text encoding "${encoding}": ${err instanceof Error ? err.message : String(err)}` }
  }
}

/**
 * Builds a RawTable from a cell matrix whose first row is the header.
 * Columns named by a positive integer are wells; `Time` is required; other
 * columns are ignored with a warning.
 */
export function tableFromMatrix(
  matrix: readonly (readonly unknown[])[],
  meta: { sourceFile: string; parserId: string; encoding: string | null },
  timeCell: (cell: unknown) => string = (cell) => String(cell ?? '').trim()
): ParseResult {
  if (!matrix.length) return { ok: false, error: 'No header row found' }
  const header = matrix[0].map((h) => String(h ?? '').trim())
  const timeIdx = header.indexOf(TIME_COLUMN)
  if (timeIdx < 0) {
    return { ok: false, error: `Missing required "${TIME_COLUMN}" column in header: ${header.join(', ')}` }
  }

  const warnings: string[] = []
  const wellCols: { well: WellIndex; idx: number }[] = []
  const ignored: string[] = []
  header.forEach((name, idx) => {
    if (idx === timeIdx || name === '') return
    const well = wellColumnIndex(name)
    if (well === null) {
      ignored.push(name)
      return
    }
    if (wellCols.some((c) => c.well === well)) {
      warnings.push(`Duplicate column for well ${well}; keeping the first one`)
      return
    }
    wellCols.push({ well, idx })
  })
  if (ignored.length) warnings.push(`Ignored non-well columns: ${ignored.join(', ')}`)

  const body = matrix.slice(1)
  const time = body.map((row) => timeCell(row[timeIdx]))
  const wells = new Map<WellIndex, number[]>()
  for (const { well, idx } of wellCols) {
    wells.set(well, body.map((row) => toNumber(row[idx])))
  }

  const table: RawTable = {
    time,
    wells,
    rowCount: body.length,
    meta: { runId: uuidv4(), createdAt: new Date().toISOString(), ...meta },
  }
  return { ok: true, table, warnings: warnings.length ? warnings : undefined }
}

export function parseDelimitedWide(
  bytes: Uint8Array,
  filename: string,
  parserId: string,
  options: RawReadOptions
): ParseResult {
  const decoded = decodeText(bytes, options.encoding)
  if (!decoded.ok) return decoded
  const body = decoded.text.split(/\r\n|\n|\r/).slice(options.skipRows).join('\n')
  const parsed = parseDelimited(body, options.separator)
  if (!parsed.ok) return parsed
  return tableFromMatrix(parsed.rows, { sourceFile: filename, parserId, encoding: options.encoding })
}
