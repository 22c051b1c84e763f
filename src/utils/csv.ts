import Papa from 'papaparse'

export function toDelimited(fields: string[], rows: string[][], delimiter = ','): string {
  return Papa.unparse({ fields, data: rows }, { delimiter, newline: '\n' }) + '\n'
}

export type DelimitedParse = { ok: true; rows: string[][] } | { ok: false; error: string }

/** `skipEmptyLines: true` keeps rows made only of delimiters. */
export function parseDelimited(
  text: string,
  delimiter = ',',
  skipEmptyLines: boolean | 'greedy' = 'greedy'
): DelimitedParse {
  const res = Papa.parse<string[]>(text, { delimiter, skipEmptyLines })
  if (res.errors.length) {
    const first = res.errors[0]
    return { ok: false, error: `CSV parse error: ${first.message}${first.row !== undefined ? ` (row ${first.row})` : ''}` }
  }
  return { ok: true, rows: res.data }
}
