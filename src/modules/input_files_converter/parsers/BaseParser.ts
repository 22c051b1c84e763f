import type { RawTable } from '@/types'

export interface RawReadOptions {
  separator: string
  skipRows: number
  encoding: string
}

export interface ParseResultOk {
  ok: true
  table: RawTable
  warnings?: string[]
}
export interface ParseResultErr {
  ok: false
  error: string
}
export type ParseResult = ParseResultOk | ParseResultErr

export interface Parser {
  id: string
  label: string
  description: string
  fileExtensions: string[]
  detect: (bytes: Uint8Array, filename: string) => boolean
  parse: (bytes: Uint8Array, filename: string, options?: Partial<RawReadOptions>) => ParseResult
}

export function resolveOptions(defaults: RawReadOptions, options: Partial<RawReadOptions> = {}): RawReadOptions {
  return {
    separator: options.separator ?? defaults.separator,
    skipRows: options.skipRows ?? defaults.skipRows,
    encoding: options.encoding ?? defaults.encoding,
  }
}
