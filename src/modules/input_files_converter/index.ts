import type { Parser } from './parsers/BaseParser'
import BioscreenXlsx from './parsers/BioscreenXlsx'
import BioscreenBsm from './parsers/BioscreenBsm'
import DelimitedWideCSV from './parsers/DelimitedWideCSV'

const registry: Parser[] = [
  BioscreenXlsx,
  BioscreenBsm,
  DelimitedWideCSV
]

export function getParsers(){ return registry }

export function getParser(id: string): Parser | null {
  return registry.find(p => p.id === id) ?? null
}

export function pickParserFor(bytes: Uint8Array, filename: string): Parser | null {
  return registry.find(p => p.detect(bytes, filename)) ?? null
}

export type { Parser, ParseResult, RawReadOptions } from './parsers/BaseParser'
