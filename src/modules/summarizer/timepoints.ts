import type { TimeSpec, TimeUnit } from '@/types'
import { TimeFormatError, TimeLengthError } from '@/utils/errors'

const UNIT_ALIASES = new Map<string, TimeUnit>([
  ['days', 'days'],
  ['day', 'days'],
  ['d', 'days'],
  ['hours', 'hours'],
  ['hour', 'hours'],
  ['h', 'hours'],
  ['minutes', 'minutes'],
  ['min', 'minutes'],
  ['mins', 'minutes'],
  ['m', 'minutes'],
])

export const UNIT_LABELS: Record<TimeUnit, string> = {
  minutes: 'min',
  hours: 'h',
  days: 'd',
}

export function parseTimeUnit(unit: string): TimeUnit {
  const resolved = UNIT_ALIASES.get(unit.trim().toLowerCase())
  if (!resolved) throw new TimeFormatError(`Time unit not a valid value: ${unit} (use days, hours, or minutes)`)
  return resolved
}

const TIME_FORMAT_ERROR = 'Time values not in expected format, which is HH:MM:SS'

function splitClock(label: string, row: number): [number, number, number] {
  const parts = label.split(':')
  if (parts.length !== 3 || parts.some((p) => !/^\d+$/.test(p.trim()))) {
    throw new TimeFormatError(`${TIME_FORMAT_ERROR} (row ${row + 1}: "${label}")`)
  }
  const [h, m, s] = parts.map((p) => Number.parseInt(p, 10))
  return [h, m, s]
}

/**
 * Converts HH:MM:SS labels to numbers in `unit`. Only the first label must
 * have exactly two digits per field; later ones only need three numeric fields.
 */
export function convertClockTimes(labels: readonly string[], unit: TimeUnit): number[] {
  if (!labels.length) return []
  const first = labels[0].split(':')
  if (first.length !== 3 || first.some((field) => !/^\d{2}$/.test(field))) {
    throw new TimeFormatError(`${TIME_FORMAT_ERROR} (first row: "${labels[0]}")`)
  }
  return labels.map((label, row) => {
    const [hh, mm, ss] = splitClock(label, row)
    const minutes = mm + ss / 60
    const hours = hh + minutes / 60
    switch (unit) {
      case 'minutes':
        return minutes + hh * 60
      case 'hours':
        return hours
      case 'days':
        return hours / 24
    }
  })
}

/** Timepoints for every row: converted from the clock labels, or taken from an explicit list. */
export function resolveTimepoints(labels: readonly string[], spec: TimeSpec): number[] {
  if (typeof spec === 'string') return convertClockTimes(labels, parseTimeUnit(spec))
  if (spec.length !== labels.length) {
    throw new TimeLengthError(
      `List given for timepoints is not of correct length. Data has length of ${labels.length}, while time is of length ${spec.length}`
    )
  }
  const bad = spec.findIndex((t) => !Number.isFinite(t))
  if (bad >= 0) throw new TimeFormatError(`Timepoint ${bad + 1} is not a finite number: ${spec[bad]}`)
  return [...spec]
}
