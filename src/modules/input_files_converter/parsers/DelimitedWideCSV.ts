import { resolveOptions, type Parser, type RawReadOptions } from './BaseParser'
import { parseDelimitedWide } from './wideTable'

const defaults: RawReadOptions = { separator: ',', skipRows: 2, encoding: 'utf-8' }

// .tsv files are tab-separated unless the caller says otherwise.
function defaultsFor(filename: string): RawReadOptions {
  return filename.toLowerCase().endsWith('.tsv') ? { ...defaults, separator: '\t' } : defaults
}

const DelimitedWideCSV: Parser = {
  id: 'delimited-wide-csv',
  label: 'Wide delimited text (Time, 1..N)',
  description: 'Plain text export: preamble lines, then Time followed by one column per numbered well',
  fileExtensions: ['.csv', '.tsv', '.txt'],
  detect: (_bytes, filename) => {
    const lower = filename.toLowerCase()
    return DelimitedWideCSV.fileExtensions.some((ext) => lower.endsWith(ext))
  },
  parse: (bytes, filename, options) =>
    parseDelimitedWide(bytes, filename, 'delimited-wide-csv', resolveOptions(defaultsFor(filename), options)),
}

export default DelimitedWideCSV
