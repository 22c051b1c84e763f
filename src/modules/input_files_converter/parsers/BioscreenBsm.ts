import { resolveOptions, type Parser, type RawReadOptions } from './BaseParser'
import { parseDelimitedWide } from './wideTable'

const defaults: RawReadOptions = { separator: ',', skipRows: 2, encoding: 'utf-16le' }

function hasUtf16LeBom(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe
}

const BioscreenBsm: Parser = {
  id: 'bioscreen-bsm',
  label: 'Bioscreen native export (.bsm)',
  description: 'UTF-16LE text; two preamble lines, then Time and numbered well columns',
  fileExtensions: ['.bsm'],
  detect: (bytes, filename) => filename.toLowerCase().endsWith('.bsm') || hasUtf16LeBom(bytes),
  parse: (bytes, filename, options) =>
    parseDelimitedWide(bytes, filename, 'bioscreen-bsm', resolveOptions(defaults, options)),
}

export default BioscreenBsm
