export { chartSeries, groupChartPath, renderChartSvg, writeChart, writeGroupCharts } from './renderChart'
export type { ChartOptions } from './types'
