import { parseArgs } from 'node:util'
import { pathToFileURL } from 'node:url'
import { loadRuntimeConfig } from '@/config'
import { buildFromFile } from '@/modules/configuration_builder/buildFromFile'
import { buildPerGroupConfiguration, buildUniformConfiguration } from '@/modules/configuration_builder/template'
import { readRawTable } from '@/modules/input_files_converter/readRawTable'
import { writeChart, writeGroupCharts } from '@/modules/plots_viewer/renderChart'
import type { ChartOptions } from '@/modules/plots_viewer/types'
import { summarize } from '@/modules/summarizer/summarize'
import { formatSummary, loadSummary, writeSummaryFile } from '@/modules/summarizer/summaryFile'
import { UNIT_LABELS, parseTimeUnit } from '@/modules/summarizer/timepoints'
import type { Configuration, SummaryTable, TimeSpec } from '@/types'
import { ConfigurationError, TimeFormatError, describeError } from '@/utils/errors'
import { createLogger, setLogLevel } from '@/utils/logger'
import { parseWellsField } from '@/utils/wells'

const log = createLogger('bioscreen')

const USAGE = `Usage:
  bioscreen summarize <data-file> (--layout <file> | --groups A,B --samples blank,WT[;blank,KO])
      [--replicates 4] [--wells 1-4;5-8;...] [--unit hours | --timepoints 0,0.5,...]
      [--out summary.tsv] [--graph chart.svg] [--graph-groups <base>]
      [--sep ,] [--skip-rows 2] [--encoding utf-16le] [--parser <id>] [--lenient]
  bioscreen graph <summary-file> [--out chart.svg] [--per-group <base>]
      [--groups A,B | --samples A__WT,B__WT] [chart options]

Chart options: --title <text> --x-label <text> --y-label <text> --colors red,blue
               --no-legend --no-markers --dashed --labels --font-scale 1.5`

const chartFlags = {
  title: { type: 'string' },
  'x-label': { type: 'string' },
  'y-label': { type: 'string' },
  colors: { type: 'string' },
  'no-legend': { type: 'boolean' },
  'no-markers': { type: 'boolean' },
  dashed: { type: 'boolean' },
  labels: { type: 'boolean' },
  'font-scale': { type: 'string' },
} as const

function list(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined
  return value.split(',').map((s) => s.trim()).filter(Boolean)
}

function integer(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined
  if (!/^\d+$/.test(value.trim())) throw new ConfigurationError(`--${flag} expects a non-negative integer, got "${value}"`)
  return Number.parseInt(value, 10)
}

function chartOptions(values: {
  title?: string
  'x-label'?: string
  'y-label'?: string
  colors?: string
  'no-legend'?: boolean
  'no-markers'?: boolean
  dashed?: boolean
  labels?: boolean
  'font-scale'?: string
}): ChartOptions {
  const colors = list(values.colors)
  const fontScale = values['font-scale'] === undefined ? undefined : Number(values['font-scale'])
  if (fontScale !== undefined && !(fontScale > 0)) {
    throw new ConfigurationError(`--font-scale expects a positive number, got "${values['font-scale']}"`)
  }
  return {
    title: values.title,
    xLabel: values['x-label'],
    yLabel: values['y-label'],
    lineColors: colors && colors.length === 1 ? colors[0] : colors,
    legend: !values['no-legend'],
    marker: values['no-markers'] ? 'none' : 'circle',
    lineStyle: values.dashed ? 'dashed' : 'solid',
    addLabels: values.labels ?? false,
    fontScale,
  }
}

async function writeCharts(table: SummaryTable, single: string | undefined, perGroupBase: string | undefined, options: ChartOptions) {
  if (single) {
    await writeChart(table, single, options)
    log.info(`wrote ${single}`)
  }
  if (perGroupBase) {
    const written = await writeGroupCharts(table, perGroupBase, options)
    written.forEach((path) => log.info(`wrote ${path}`))
  }
}

function templateConfiguration(groups: string[], samplesArg: string, replicates?: number, wellsArg?: string): Configuration {
  const wells = wellsArg?.split(';').map((field) => {
    const parsed = parseWellsField(field)
    if (!parsed) throw new ConfigurationError(`cannot read wells "${field}" in --wells`)
    return parsed
  })
  const options = { replicates, wells }
  if (samplesArg.includes(';')) {
    const perGroup = samplesArg.split(';').map((part) => list(part) ?? [])
    return buildPerGroupConfiguration(groups, perGroup, options)
  }
  return buildUniformConfiguration(groups, list(samplesArg) ?? [], options)
}

async function runSummarize(args: string[], defaultUnit: string): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      layout: { type: 'string' },
      lenient: { type: 'boolean' },
      groups: { type: 'string' },
      samples: { type: 'string' },
      replicates: { type: 'string' },
      wells: { type: 'string' },
      unit: { type: 'string' },
      timepoints: { type: 'string' },
      out: { type: 'string' },
      graph: { type: 'string' },
      'graph-groups': { type: 'string' },
      sep: { type: 'string' },
      'skip-rows': { type: 'string' },
      encoding: { type: 'string' },
      parser: { type: 'string' },
      ...chartFlags,
    },
  })
  const [dataFile] = positionals
  if (!dataFile) throw new ConfigurationError('no data file given')

  let configuration: Configuration
  if (values.layout) {
    configuration = await buildFromFile(values.layout, { strict: !values.lenient })
  } else if (values.groups && values.samples) {
    configuration = templateConfiguration(list(values.groups) ?? [], values.samples, integer(values.replicates, 'replicates'), values.wells)
  } else {
    throw new ConfigurationError('give either --layout or both --groups and --samples')
  }

  const raw = await readRawTable(dataFile, {
    separator: values.sep,
    skipRows: integer(values['skip-rows'], 'skip-rows'),
    encoding: values.encoding,
    parserId: values.parser,
  })

  let time: TimeSpec
  let xLabel: string
  if (values.timepoints) {
    const timepoints = (list(values.timepoints) ?? []).map(Number)
    if (timepoints.some((t) => !Number.isFinite(t))) {
      throw new TimeFormatError(`--timepoints expects comma separated numbers, got "${values.timepoints}"`)
    }
    time = timepoints
    xLabel = 'Time'
  } else {
    const unit = parseTimeUnit(values.unit ?? defaultUnit)
    time = unit
    xLabel = `Time (${UNIT_LABELS[unit]})`
  }

  const table = summarize(configuration, raw, time)
  if (values.out) {
    await writeSummaryFile(values.out, table)
    log.info(`wrote ${values.out} (${table.columns.length} columns, ${table.time.length} timepoints)`)
  } else {
    process.stdout.write(formatSummary(table))
  }

  const options = chartOptions(values)
  await writeCharts(table, values.graph, values['graph-groups'], { ...options, xLabel: options.xLabel ?? xLabel })
  return 0
}

async function runGraph(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      out: { type: 'string' },
      'per-group': { type: 'string' },
      groups: { type: 'string' },
      samples: { type: 'string' },
      ...chartFlags,
    },
  })
  const [summaryFile] = positionals
  if (!summaryFile) throw new ConfigurationError('no summary file given')
  if (!values.out && !values['per-group']) throw new ConfigurationError('give --out and/or --per-group')

  const table = await loadSummary(summaryFile)
  const options: ChartOptions & { groups?: string[]; samples?: string[] } = {
    ...chartOptions(values),
    groups: list(values.groups),
    samples: list(values.samples),
  }
  if (values.out) {
    await writeChart(table, values.out, options)
    log.info(`wrote ${values.out}`)
  }
  if (values['per-group']) {
    await writeCharts(table, undefined, values['per-group'], chartOptions(values))
  }
  return 0
}

/** Runs one command and returns the exit code. */
export async function runCli(argv: string[]): Promise<number> {
  const { config, issues } = loadRuntimeConfig()
  setLogLevel(config.logLevel)
  issues.forEach((issue) => log.warn(`ignoring environment setting ${issue}`))

  const [command, ...rest] = argv
  try {
    switch (command) {
      case 'summarize':
        return await runSummarize(rest, config.timeUnit)
      case 'graph':
        return await runGraph(rest)
      case undefined:
      case '-h':
      case '--help':
        console.log(USAGE)
        return command === undefined ? 1 : 0
      default:
        log.error(`unknown command "${command}"`)
        console.log(USAGE)
        return 1
    }
  } catch (err) {
    log.error(describeError(err))
    if (err instanceof Error && err.cause !== undefined) log.debug(`caused by: ${describeError(err.cause)}`)
    return 1
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (err: unknown) => {
      log.error(describeError(err))
      process.exitCode = 1
    }
  )
}
