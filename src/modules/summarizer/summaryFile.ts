import { readFile, writeFile } from 'node:fs/promises'
import type { SummaryColumn, SummaryTable } from '@/types'
import { parseDelimited, toDelimited } from '@/utils/csv'
import { IOError } from '@/utils/errors'
import { formatNumber, toNumber } from '@/utils/numbers'
import { groupOfLabel, groupsOfColumns, sampleOfLabel } from './summarize'

export const SUMMARY_TIME_COLUMN = 'Time'

/** Tab-delimited summary: `Time`, then one column per label, no index column. */
export function formatSummary(table: SummaryTable): string {
  const fields = [SUMMARY_TIME_COLUMN, ...table.columns.map((c) => c.label)]
  const rows = table.time.map((t, row) => [
    formatNumber(t),
    ...table.columns.map((c) => formatNumber(c.values[row] ?? NaN)),
  ])
  return toDelimited(fields, rows, '\t')
}

export async function writeSummaryFile(path: string, table: SummaryTable): Promise<void> {
  try {
    await writeFile(path, formatSummary(table), 'utf8')
  } catch (err) {
    throw new IOError(`Unable to write summary file: ${path}`, { cause: err })
  }
}

/**
 * Reads a summary back. Groups are recovered from the labels (text before the
 * first `__`) in first-seen order.
 */
export function parseSummary(text: string): SummaryTable {
  // Every row is a timepoint, even one whose fields are all empty.
  const parsed = parseDelimited(text, '\t', true)
  if (!parsed.ok) throw new IOError(`Unable to load table: ${parsed.error}`)
  const [header, ...body] = parsed.rows
  if (!header) throw new IOError('Unable to load table: file is empty')
  const timeIdx = header.indexOf(SUMMARY_TIME_COLUMN)
  if (timeIdx < 0) throw new IOError(`Unable to load table: no "${SUMMARY_TIME_COLUMN}" column`)

  const columns: SummaryColumn[] = []
  header.forEach((label, idx) => {
    if (idx === timeIdx) return
    columns.push(
      Object.freeze({
        label,
        group: groupOfLabel(label),
        sample: sampleOfLabel(label),
        values: Object.freeze(body.map((row) => toNumber(row[idx]))),
      })
    )
  })
  return Object.freeze({
    time: Object.freeze(body.map((row) => toNumber(row[timeIdx]))),
    columns: Object.freeze(columns),
    groups: Object.freeze(groupsOfColumns(columns)),
  })
}

export async function loadSummary(path: string): Promise<SummaryTable> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    throw new IOError(`Unable to load table: ${path}`, { cause: err })
  }
  return parseSummary(text)
}
