import type { SeriesSelection, SummaryColumn, SummaryTable } from '@/types'
import { createLogger } from '@/utils/logger'
import { groupOfLabel } from './summarize'

const log = createLogger('selection')

export interface SeriesFilter {
  /** Group names; a column is kept when the text before `__` matches. */
  groups?: readonly string[]
  /** Full `<Group>__<Sample>` labels. Wins over `groups` when both are given. */
  samples?: readonly string[]
}

/**
 * Picks the columns to chart. Unknown names never fail the selection; they
 * come back as warnings (and are logged).
 */
export function selectSeries(table: SummaryTable, filter: SeriesFilter = {}): SeriesSelection {
  const warnings: string[] = []
  let columns: readonly SummaryColumn[] = table.columns

  if (filter.groups && filter.samples) {
    warnings.push('Both groups and samples were given to graph; using samples')
  }

  if (filter.samples) {
    const wanted = new Set(filter.samples)
    columns = columns.filter((c) => wanted.has(c.label))
    for (const sample of filter.samples) {
      if (!columns.some((c) => c.label === sample)) warnings.push(`Sample ${sample} not found`)
    }
  } else if (filter.groups) {
    const wanted = new Set(filter.groups)
    columns = columns.filter((c) => wanted.has(groupOfLabel(c.label)))
    const found = new Set(columns.map((c) => groupOfLabel(c.label)))
    for (const group of filter.groups) {
      if (!found.has(group)) warnings.push(`Group ${group} not found`)
    }
  }

  warnings.forEach((w) => log.warn(w))
  const time = [...table.time]
  return {
    time,
    series: columns.map((c) => ({
      label: c.label,
      group: groupOfLabel(c.label),
      points: time.map((x, row) => ({ x, y: c.values[row] ?? NaN })),
    })),
    warnings,
  }
}
