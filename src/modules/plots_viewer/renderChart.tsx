import { writeFile } from 'node:fs/promises'
import { renderToStaticMarkup } from 'react-dom/server'
import GrowthChart, { type ChartSeries } from '@/components/GrowthChart'
import { selectSeries, type SeriesFilter } from '@/modules/summarizer/selectSeries'
import type { SeriesSelection, SummaryTable } from '@/types'
import { resolveLineColors } from '@/utils/colors'
import { IOError } from '@/utils/errors'
import { createLogger } from '@/utils/logger'
import { sanitizeFileName } from '@/utils/sanitize'
import {
  CHART_EXTENSION,
  CHART_HEIGHT,
  CHART_WIDTH,
  DEFAULT_MARKER_SIZE,
  DEFAULT_X_LABEL,
  DEFAULT_Y_LABEL,
} from './constants'
import type { ChartOptions } from './types'

const log = createLogger('charts')

export function chartSeries(selection: SeriesSelection, lineColors?: ChartOptions['lineColors']): ChartSeries[] {
  const colors = resolveLineColors(selection.series.length, lineColors)
  return selection.series.map((s, i) => ({ name: s.label, color: colors[i], points: s.points }))
}

export function renderChartSvg(selection: SeriesSelection, options: ChartOptions = {}): string {
  const markup = renderToStaticMarkup(
    <GrowthChart
      series={chartSeries(selection, options.lineColors)}
      title={options.title}
      xLabel={options.xLabel ?? DEFAULT_X_LABEL}
      yLabel={options.yLabel ?? DEFAULT_Y_LABEL}
      width={options.width ?? CHART_WIDTH}
      height={options.height ?? CHART_HEIGHT}
      legend={options.legend ?? true}
      marker={options.marker ?? 'circle'}
      markerSize={options.markerSize ?? DEFAULT_MARKER_SIZE}
      lineStyle={options.lineStyle ?? 'solid'}
      addLabels={options.addLabels ?? false}
      fontScale={options.fontScale}
    />
  )
  return `<?xml version="1.0" encoding="UTF-8"?>\n${markup}\n`
}

/** Selects, renders and writes one chart. Returns the selection that was drawn. */
export async function writeChart(
  table: SummaryTable,
  outputFile: string,
  options: ChartOptions & SeriesFilter = {}
): Promise<SeriesSelection> {
  const { groups, samples, ...chartOptions } = options
  const selection = selectSeries(table, { groups, samples })
  if (!selection.series.length) log.warn(`${outputFile}: no series selected, writing an empty chart`)
  try {
    await writeFile(outputFile, renderChartSvg(selection, chartOptions), 'utf8')
  } catch (err) {
    throw new IOError(`Unable to write chart: ${outputFile}`, { cause: err })
  }
  return selection
}

export function groupChartPath(base: string, group: string): string {
  return `${base}.${sanitizeFileName(group)}${CHART_EXTENSION}`
}

/** One chart per group, written to `<base>.<group>.svg`. Returns the paths written. */
export async function writeGroupCharts(table: SummaryTable, base: string, options: ChartOptions = {}): Promise<string[]> {
  const written: string[] = []
  for (const group of table.groups) {
    const path = groupChartPath(base, group)
    await writeChart(table, path, { ...options, groups: [group] })
    written.push(path)
  }
  return written
}
