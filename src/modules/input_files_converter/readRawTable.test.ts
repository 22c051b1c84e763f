import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest'
import { IOError } from '@/utils/errors'
import { getParser, getParsers, pickParserFor } from './index'
import { readRawTable } from './readRawTable'

const CSV = 'Bioscreen C export\nRun 1\nTime,1,2,3\n00:00:00,0.1,0.2,0.3\n00:30:00,0.15,0.25,0.35\n'

let dir: string

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'raw-'))
  await writeFile(join(dir, 'plate.csv'), CSV)
  await writeFile(join(dir, 'plate.bsm'), Buffer.from('\ufeff' + CSV, 'utf16le'))
  await writeFile(join(dir, 'plate.dat'), CSV)
  await writeFile(join(dir, 'plate.tsv'), 'x\ny\nTime\t1\t2\n00:00:00\t0.1\t0.2\n')
  await writeFile(join(dir, 'notime.csv'), 'a\nb\nWell,1\nx,1\n')
})

afterAll(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('parser registry', () => {
  it('lists every parser once', () => {
    expect(getParsers().map((p) => p.id)).toEqual(['bioscreen-xlsx', 'bioscreen-bsm', 'delimited-wide-csv'])
    expect(getParser('bioscreen-bsm')?.fileExtensions).toEqual(['.bsm'])
    expect(getParser('missing')).toBeNull()
  })

  it('picks a parser from the file name', () => {
    expect(pickParserFor(new Uint8Array(), 'a.xlsx')?.id).toBe('bioscreen-xlsx')
    expect(pickParserFor(new Uint8Array(), 'a.csv')?.id).toBe('delimited-wide-csv')
    expect(pickParserFor(new Uint8Array(), 'a.dat')).toBeNull()
  })
})

describe('readRawTable', () => {
  it('reads a CSV export', async () => {
    const table = await readRawTable(join(dir, 'plate.csv'))
    expect(table.time).toEqual(['00:00:00', '00:30:00'])
    expect(table.wells.get(3)).toEqual([0.3, 0.35])
    expect(table.meta?.sourceFile).toBe('plate.csv')
  })

  it('reads a tab-separated export by its extension', async () => {
    const table = await readRawTable(join(dir, 'plate.tsv'))
    expect(table.time).toEqual(['00:00:00'])
    expect(table.wells.get(1)).toEqual([0.1])
    expect(table.wells.get(2)).toEqual([0.2])
  })

  it('lets an explicit separator win over the .tsv default', async () => {
    await expect(readRawTable(join(dir, 'plate.tsv'), { separator: ',' })).rejects.toThrow(
      'Missing required "Time" column'
    )
  })

  it('reads a native UTF-16 export', async () => {
    const table = await readRawTable(join(dir, 'plate.bsm'))
    expect(table.wells.get(1)).toEqual([0.1, 0.15])
    expect(table.meta?.parserId).toBe('bioscreen-bsm')
  })

  it('needs an explicit parser for unknown files', async () => {
    await expect(readRawTable(join(dir, 'plate.dat'))).rejects.toThrow(
      'No parser recognizes plate.dat; pass a parser id explicitly'
    )
    const table = await readRawTable(join(dir, 'plate.dat'), { parserId: 'delimited-wide-csv' })
    expect(table.rowCount).toBe(2)
  })

  it('rejects an unknown parser id', async () => {
    await expect(readRawTable(join(dir, 'plate.csv'), { parserId: 'nope' })).rejects.toThrow('Unknown parser "nope"')
  })

  it('wraps parse and read failures in IOError', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const notime = join(dir, 'notime.csv')
    await expect(readRawTable(notime)).rejects.toBeInstanceOf(IOError)
    await expect(readRawTable(notime)).rejects.toThrow(`Unable to load data file ${notime}: Missing required "Time" column`)
    await expect(readRawTable(join(dir, 'absent.csv'))).rejects.toThrow('Unable to read data file')
    vi.restoreAllMocks()
  })
})
