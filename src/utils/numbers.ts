export function toNumber(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : NaN
  if (typeof value !== 'string') return NaN
  // allow comma as decimal separator
  const cleaned = value.replace(',', '.').trim()
  if (!cleaned.length) return NaN
  const num = Number(cleaned)
  return Number.isFinite(num) ? num : NaN
}

/** Missing values are written as empty fields. */
export function formatNumber(value: number): string {
  return Number.isNaN(value) ? '' : String(value)
}
