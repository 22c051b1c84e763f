export type ChartOptions = {
  title?: string
  xLabel?: string
  yLabel?: string
  width?: number
  height?: number
  // One color for every line, or a list matched to lines in order
  lineColors?: string | readonly string[]
  legend?: boolean
  marker?: 'circle' | 'none'
  markerSize?: number
  lineStyle?: 'solid' | 'dashed'
  addLabels?: boolean
  // Multiplies text sizes and the padding around the plot
  fontScale?: number
}
