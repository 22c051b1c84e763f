import type { WellIndex } from '@/types'

export function isWellIndex(value: unknown): value is WellIndex {
  return typeof value === 'number' && Number.isInteger(value) && value > 0
}

/** Consecutive wells from `a` to `b`, both included. */
export function wellRange(a: WellIndex, b: WellIndex): WellIndex[] {
  if (b < a) return []
  return Array.from({ length: b - a + 1 }, (_, i) => a + i)
}

/**
 * Parses a wells field: `a-b` (inclusive range) or a comma separated list.
 * Returns null when any part is not a positive integer.
 */
export function parseWellsField(field: string): WellIndex[] | null {
  const trimmed = field.trim()
  if (!trimmed) return null
  const range = /^(\d+)\s*-\s*(\d+)$/.exec(trimmed)
  if (range) {
    const start = Number.parseInt(range[1], 10)
    const end = Number.parseInt(range[2], 10)
    if (!isWellIndex(start) || !isWellIndex(end) || end < start) return null
    return wellRange(start, end)
  }
  const wells: WellIndex[] = []
  for (const part of trimmed.split(',')) {
    const token = part.trim()
    if (!/^\d+$/.test(token)) return null
    const well = Number.parseInt(token, 10)
    if (!isWellIndex(well)) return null
    wells.push(well)
  }
  return wells
}

export function wellColumnIndex(header: string): WellIndex | null {
  const trimmed = header.trim()
  if (!/^\d+$/.test(trimmed)) return null
  const well = Number.parseInt(trimmed, 10)
  return isWellIndex(well) ? well : null
}
