import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import type { RawTable, WellIndex } from '@/types'
import { IOError, TimeLengthError } from '@/utils/errors'
import { createLogger } from '@/utils/logger'
import { getParser, pickParserFor } from './index'
import type { RawReadOptions } from './parsers/BaseParser'

const log = createLogger('raw data')

export interface ReadRawTableOptions extends Partial<RawReadOptions> {
  /** Forces a parser instead of detecting one from the file name and content. */
  parserId?: string
}

/** Reads and parses a plate reader export into a RawTable. */
export async function readRawTable(path: string, options: ReadRawTableOptions = {}): Promise<RawTable> {
  let bytes: Uint8Array
  try {
    bytes = await readFile(path)
  } catch (err) {
    throw new IOError(`Unable to read data file: ${path}`, { cause: err })
  }
  const filename = basename(path)
  const { parserId, ...readOptions } = options
  const parser = parserId ? getParser(parserId) : pickParserFor(bytes, filename)
  if (!parser) {
    throw new IOError(
      parserId ? `Unknown parser "${parserId}"` : `No parser recognizes ${filename}; pass a parser id explicitly`
    )
  }
  const result = parser.parse(bytes, filename, readOptions)
  if (!result.ok) throw new IOError(`Unable to load data file ${path}: ${result.error}`)
  result.warnings?.forEach((w) => log.warn(`${filename}: ${w}`))
  log.debug(`${filename}: ${result.table.rowCount} timepoints, ${result.table.wells.size} wells (${parser.id})`)
  return result.table
}

/** Builds a RawTable from in-memory columns keyed by well number. */
export function rawTableFromColumns(
  time: readonly string[],
  columns: Readonly<Record<number, readonly number[]>>
): RawTable {
  const wells = new Map<WellIndex, readonly number[]>()
  for (const [key, values] of Object.entries(columns)) {
    if (values.length !== time.length) {
      throw new TimeLengthError(
        `Well ${key} has ${values.length} readings while the time column has ${time.length} rows`
      )
    }
    wells.set(Number(key), values)
  }
  return { time, wells, rowCount: time.length }
}
