import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import { runCli } from './cli'

const DATA = [
  'Bioscreen C export',
  'Run 1',
  'Time,1,2,3,4',
  '00:00:00,0.25,0.5,0.125,0.25',
  '01:00:00,0.25,1,0.125,0.625',
  '',
].join('\n')

let dir: string
let data: string

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'cli-'))
  data = join(dir, 'plate.csv')
  await writeFile(data, DATA)
  await writeFile(join(dir, 'layout.tsv'), 'LB\tblank\t1\nLB\tWT\t2\nM9\tblank\t3\nM9\tWT\t4\n')
})

afterAll(async () => {
  await rm(dir, { recursive: true, force: true })
})

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => undefined)
  vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  vi.spyOn(console, 'error').mockImplementation(() => undefined)
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('summarize command', () => {
  it('builds a template configuration and writes summary and charts', async () => {
    const out = join(dir, 'summary.tsv')
    const chart = join(dir, 'all.svg')
    const base = join(dir, 'template')
    const code = await runCli([
      'summarize', data,
      '--groups', 'LB,M9', '--samples', 'blank,WT', '--replicates', '1',
      '--out', out, '--graph', chart, '--graph-groups', base,
    ])
    expect(code).toBe(0)
    expect(await readFile(out, 'utf8')).toBe('Time\tLB__WT\tM9__WT\n0\t0.25\t0.125\n1\t0.75\t0.5\n')
    expect(await readFile(chart, 'utf8')).toContain('>M9__WT</text>')
    expect(await readFile(`${base}.LB.svg`, 'utf8')).not.toContain('M9__WT')
  })

  it('reads a layout file and converts time to minutes', async () => {
    const out = join(dir, 'layout-summary.tsv')
    const code = await runCli(['summarize', data, '--layout', join(dir, 'layout.tsv'), '--unit', 'minutes', '--out', out])
    expect(code).toBe(0)
    expect(await readFile(out, 'utf8')).toBe('Time\tLB__WT\tM9__WT\n0\t0.25\t0.125\n60\t0.75\t0.5\n')
  })

  it('takes per-group sample lists and explicit timepoints', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    const code = await runCli([
      'summarize', data, '--groups', 'LB,M9', '--samples', 'blank,WT;WT,KO', '--replicates', '1', '--timepoints', '0,2',
    ])
    expect(code).toBe(0)
    expect(write).toHaveBeenCalledWith('Time\tLB__WT\tM9__WT\tM9__KO\n0\t0.25\t0.125\t0.25\n2\t0.75\t0.125\t0.625\n')
  })

  it('fails with exit code 1 on bad input', async () => {
    expect(await runCli(['summarize', data])).toBe(1)
    expect(console.error).toHaveBeenCalledWith(
      '[BIOSCREEN] Configuration Error: give either --layout or both --groups and --samples'
    )
    expect(await runCli(['summarize', data, '--groups', 'A', '--samples', 'X', '--replicates', 'two'])).toBe(1)
    expect(await runCli(['summarize', data, '--groups', 'A', '--samples', 'X', '--timepoints', '0'])).toBe(1)
  })
})

describe('graph command', () => {
  it('charts a saved summary per group', async () => {
    const summary = join(dir, 'for-graph.tsv')
    await writeFile(summary, 'Time\tLB__WT\tM9__WT\n0\t0.25\t0.125\n1\t0.75\t0.5\n')
    const base = join(dir, 'graph')
    const single = join(dir, 'graph-single.svg')
    const code = await runCli(['graph', summary, '--per-group', base, '--out', single, '--samples', 'LB__WT', '--no-legend'])
    expect(code).toBe(0)
    expect(await readFile(`${base}.M9.svg`, 'utf8')).toContain('class="series-line"')
    const svg = await readFile(single, 'utf8')
    expect(svg.split('class="series-line"')).toHaveLength(2)
    expect(svg).not.toContain('class="legend"')
  })

  it('passes the font scale to the chart', async () => {
    const out = join(dir, 'scaled.svg')
    const code = await runCli(['graph', join(dir, 'for-graph.tsv'), '--out', out, '--title', 'Run', '--font-scale', '2'])
    expect(code).toBe(0)
    expect(await readFile(out, 'utf8')).toContain('font-size="30" font-weight="600"')
    expect(await runCli(['graph', join(dir, 'for-graph.tsv'), '--out', out, '--font-scale', 'big'])).toBe(1)
  })

  it('needs somewhere to write', async () => {
    expect(await runCli(['graph', join(dir, 'for-graph.tsv')])).toBe(1)
  })
})

describe('usage', () => {
  it('prints help', async () => {
    expect(await runCli(['--help'])).toBe(0)
    expect(console.log).toHaveBeenCalledTimes(1)
    expect(await runCli(['explode'])).toBe(1)
    expect(await runCli([])).toBe(1)
  })
})
