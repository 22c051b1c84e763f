import type { Configuration, RawTable, SummaryColumn, SummaryTable, TimeSpec, WellIndex } from '@/types'
import { resolveTimepoints } from './timepoints'

export const LABEL_SEPARATOR = '__'

export function columnLabel(group: string, sample: string): string {
  return `${group}${LABEL_SEPARATOR}${sample}`
}

/** Group part of a column label: everything before the first separator. */
export function groupOfLabel(label: string): string {
  const idx = label.indexOf(LABEL_SEPARATOR)
  return idx < 0 ? label : label.slice(0, idx)
}

export function sampleOfLabel(label: string): string {
  const idx = label.indexOf(LABEL_SEPARATOR)
  return idx < 0 ? '' : label.slice(idx + LABEL_SEPARATOR.length)
}

export function groupsOfColumns(columns: readonly { label: string }[]): string[] {
  const groups: string[] = []
  for (const { label } of columns) {
    const group = groupOfLabel(label)
    if (!groups.includes(group)) groups.push(group)
  }
  return groups
}

/**
 * Row-wise mean over the wells present in the table. Absent columns and NaN
 * readings are left out; a row with nothing left is NaN.
 */
export function meanOfWells(raw: RawTable, wells: readonly WellIndex[]): number[] {
  const columns = wells.flatMap((well) => {
    const column = raw.wells.get(well)
    return column ? [column] : []
  })
  return Array.from({ length: raw.rowCount }, (_, row) => {
    let sum = 0
    let n = 0
    for (const column of columns) {
      const value = column[row]
      if (Number.isNaN(value) || value === undefined) continue
      sum += value
      n += 1
    }
    return n ? sum / n : NaN
  })
}

/**
 * Blank-corrected replicate means, one column per (group, sample) in
 * declaration order. Groups without blank wells use a zero baseline.
 */
export function summarize(config: Configuration, raw: RawTable, time: TimeSpec): SummaryTable {
  const timepoints = resolveTimepoints(raw.time, time)
  const columns: SummaryColumn[] = []
  for (const group of config) {
    const baseline = group.blankWells
      ? meanOfWells(raw, group.blankWells)
      : new Array<number>(raw.rowCount).fill(0)
    for (const sample of group.samples) {
      const mean = meanOfWells(raw, sample.wells)
      columns.push(
        Object.freeze({
          label: columnLabel(group.name, sample.name),
          group: group.name,
          sample: sample.name,
          values: Object.freeze(mean.map((v, row) => v - baseline[row])),
        })
      )
    }
  }
  return Object.freeze({
    time: Object.freeze(timepoints),
    columns: Object.freeze(columns),
    groups: Object.freeze(groupsOfColumns(columns)),
  })
}
