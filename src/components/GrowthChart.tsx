import type { TimePoint } from '@/types'

export interface ChartSeries {
  name: string
  color: string
  points: TimePoint[]
}

export interface GrowthChartProps {
  series: ChartSeries[]
  title?: string
  xLabel: string
  yLabel: string
  width: number
  height: number
  legend: boolean
  marker: 'circle' | 'none'
  markerSize: number
  lineStyle: 'solid' | 'dashed'
  // Series name printed at the last point of each line
  addLabels: boolean
  fontScale?: number
}

const APPROX_CHAR_WIDTH = 7

function computeTickPrecision(span: number) {
  if (!Number.isFinite(span) || span <= 0) return 0
  const step = Math.max(Math.abs(span) / 5, Number.EPSILON)
  const decimals = Math.max(0, Math.ceil(-Math.log10(step)))
  return Math.min(decimals, 6)
}

function formatTickValue(value: number, decimals: number) {
  if (!Number.isFinite(value)) return ''
  const clamped = Math.min(Math.max(decimals, 0), 8)
  return value.toFixed(clamped)
}

function isFinitePoint(p: TimePoint) {
  return Number.isFinite(p.x) && Number.isFinite(p.y)
}

export function legendWidthFor(names: string[], fontScale = 1) {
  const longest = names.reduce((acc, n) => Math.max(acc, n.length), 0)
  return Math.max(120, longest * APPROX_CHAR_WIDTH * fontScale + 48)
}

/** Static line chart of growth curves; everything is computed from props, nothing is interactive. */
export default function GrowthChart({
  series,
  title,
  xLabel,
  yLabel,
  width,
  height,
  legend,
  marker,
  markerSize,
  lineStyle,
  addLabels,
  fontScale = 1,
}: GrowthChartProps) {
  const legendWidth = legend && series.length ? legendWidthFor(series.map((s) => s.name), fontScale) : 0
  const pad = {
    top: (title ? 44 : 24) * fontScale,
    right: 16 + legendWidth,
    bottom: 52 * fontScale,
    left: Math.max(64, 64 * fontScale),
  }
  const innerW = Math.max(10, width - pad.left - pad.right)
  const innerH = Math.max(10, height - pad.top - pad.bottom)

  const finite = series.flatMap((s) => s.points.filter(isFinitePoint))
  const allX = finite.map((p) => p.x)
  const allY = finite.map((p) => p.y)
  const minX = allX.length ? Math.min(...allX) : 0
  const maxX = allX.length ? Math.max(...allX) : 1
  let minY = allY.length ? Math.min(...allY) : 0
  let maxY = allY.length ? Math.max(...allY) : 1
  if (allY.length) {
    const spanY = maxY - minY
    const padFactor = 0.12
    const padY = spanY > 0 ? spanY * padFactor : Math.max(Math.abs(maxY), Math.abs(minY), 1) * padFactor
    maxY += padY
    if (spanY === 0) minY -= padY * 0.25
  }
  const dx = (maxX - minX) || 1
  const dy = (maxY - minY) || 1

  const sx = (x: number) => pad.left + ((x - minX) / dx) * innerW
  const sy = (y: number) => pad.top + innerH - ((y - minY) / dy) * innerH

  // Non-finite values break the line instead of being drawn as zero.
  function renderPath(points: TimePoint[]) {
    let d = ''
    let penDown = false
    for (const p of points) {
      if (!isFinitePoint(p)) {
        penDown = false
        continue
      }
      d += `${d ? ' ' : ''}${penDown ? 'L' : 'M'} ${sx(p.x).toFixed(2)} ${sy(p.y).toFixed(2)}`
      penDown = true
    }
    return d
  }

  const xticks = Array.from({ length: 6 }, (_, i) => minX + (dx * i) / 5)
  const yticks = Array.from({ length: 6 }, (_, i) => minY + (dy * i) / 5)
  const xTickPrecision = computeTickPrecision(dx)
  const yTickPrecision = computeTickPrecision(dy)
  const dash = lineStyle === 'dashed' ? '6,4' : undefined
  const legendX = pad.left + innerW + 24

  return (
    <svg xmlns="http://www.w3.org/2000/svg" width={width} height={height} viewBox={`0 0 ${width} ${height}`} role="img">
      <defs>
        <clipPath id="plot-clip">
          <rect x={pad.left} y={pad.top} width={innerW} height={innerH} />
        </clipPath>
      </defs>
      <rect x={0} y={0} width={width} height={height} fill="#ffffff" />
      {title && (
        <text x={width / 2} y={22 * fontScale} textAnchor="middle" fontSize={15 * fontScale} fontWeight={600} fill="#111">
          {title}
        </text>
      )}

      {/* Axes */}
      <line x1={pad.left} y1={pad.top + innerH} x2={pad.left} y2={pad.top} stroke="#555" />
      <line x1={pad.left} y1={pad.top + innerH} x2={pad.left + innerW} y2={pad.top + innerH} stroke="#555" />

      {/* Grid + ticks */}
      {xticks.map((t, i) => (
        <g key={`x-${i}`}>
          <line x1={sx(t)} y1={pad.top} x2={sx(t)} y2={pad.top + innerH} stroke="#ccc" strokeDasharray="3,4" />
          <text x={sx(t)} y={pad.top + innerH + 16 * fontScale} textAnchor="middle" fontSize={11 * fontScale} fill="#111">
            {formatTickValue(t, xTickPrecision)}
          </text>
        </g>
      ))}
      {yticks.map((t, i) => (
        <g key={`y-${i}`}>
          <line x1={pad.left} y1={sy(t)} x2={pad.left + innerW} y2={sy(t)} stroke="#ccc" strokeDasharray="3,4" />
          <text x={pad.left - 8} y={sy(t) + 4} textAnchor="end" fontSize={11 * fontScale} fill="#111">
            {formatTickValue(t, yTickPrecision)}
          </text>
        </g>
      ))}

      <g clipPath="url(#plot-clip)">
        {series.map((s, idx) => (
          <path key={idx} className="series-line" d={renderPath(s.points)} fill="none" stroke={s.color} strokeWidth={2} strokeDasharray={dash} />
        ))}
        {marker === 'circle' &&
          series.map((s, si) =>
            s.points.filter(isFinitePoint).map((p, pi) => (
              <circle key={`pt-${si}-${pi}`} className="series-marker" cx={sx(p.x)} cy={sy(p.y)} r={markerSize} fill={s.color} />
            ))
          )}
      </g>

      {addLabels &&
        series.map((s, idx) => {
          const last = s.points.filter(isFinitePoint).at(-1)
          if (!last) return null
          return (
            <text key={`label-${idx}`} className="series-label" x={sx(last.x)} y={sy(last.y) - 6} textAnchor="middle" fontSize={11 * fontScale} fill={s.color}>
              {s.name}
            </text>
          )
        })}

      {/* Axis labels */}
      <text x={pad.left + innerW / 2} y={pad.top + innerH + 40 * fontScale} textAnchor="middle" fontSize={12 * fontScale} fill="#111">
        {xLabel}
      </text>
      <text
        x={18 * fontScale}
        y={pad.top + innerH / 2}
        textAnchor="middle"
        fontSize={12 * fontScale}
        fill="#111"
        transform={`rotate(-90 ${18 * fontScale} ${pad.top + innerH / 2})`}
      >
        {yLabel}
      </text>

      {legendWidth > 0 && (
        <g className="legend">
          {series.map((s, i) => {
            const y = pad.top + 12 + i * 18 * fontScale
            return (
              <g key={`legend-${i}`}>
                <line x1={legendX} y1={y} x2={legendX + 20} y2={y} stroke={s.color} strokeWidth={2} strokeDasharray={dash} />
                <text x={legendX + 28} y={y + 4} fontSize={11 * fontScale} fill="#111">
                  {s.name}
                </text>
              </g>
            )
          })}
        </g>
      )}
    </svg>
  )
}
