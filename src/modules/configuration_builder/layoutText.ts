import type { Configuration, WellIndex } from '@/types'
import { ConfigurationError } from '@/utils/errors'
import { createLogger } from '@/utils/logger'
import { sanitize } from '@/utils/sanitize'
import { parseWellsField } from '@/utils/wells'
import { declareGroup, finalizeConfiguration } from './finalize'

const log = createLogger('layout')

export interface LayoutParseOptions {
  /** Malformed lines raise instead of being skipped with a warning. */
  strict?: boolean
}

export interface LayoutParseResult {
  configuration: Configuration
  warnings: string[]
}

/**
 * Parses the tab-delimited layout format: `group<TAB>sample<TAB>wells` per
 * line, `#` comments and blank lines ignored. Wells are `a-b` or `1,2,3`.
 * A sample named `blank` becomes the group's blank.
 */
export function parseLayoutText(text: string, options: LayoutParseOptions = {}): LayoutParseResult {
  const strict = options.strict ?? true
  const warnings: string[] = []
  const problem = (lineNo: number, message: string) => {
    const full = `line ${lineNo}: ${message}`
    if (strict) throw new ConfigurationError(full)
    warnings.push(full)
    log.warn(full)
  }

  const groups = new Map<string, { name: string; wells: WellIndex[] }[]>()
  const lines = text.split(/\r\n|\n|\r/)
  lines.forEach((line, i) => {
    const lineNo = i + 1
    if (!line.trim() || line.trimStart().startsWith('#')) return
    const fields = line.split('\t')
    if (fields.length !== 3) {
      problem(lineNo, `expected 3 tab-separated fields (group, sample, wells), found ${fields.length}`)
      return
    }
    const group = sanitize(fields[0])
    const sample = sanitize(fields[1])
    if (!group || !sample) {
      problem(lineNo, 'group and sample names must not be empty')
      return
    }
    const wells = parseWellsField(fields[2])
    if (!wells) {
      problem(lineNo, `cannot read wells "${fields[2].trim()}"; use a-b or a comma separated list`)
      return
    }
    let samples = groups.get(group)
    if (!samples) {
      samples = []
      groups.set(group, samples)
    }
    if (samples.some((s) => s.name === sample)) {
      problem(lineNo, `sample ${sample} already declared for group ${group}`)
      return
    }
    samples.push({ name: sample, wells })
  })

  const declarations = Array.from(groups.entries()).map(([name, entries]) => declareGroup(name, entries))
  return { configuration: finalizeConfiguration(declarations), warnings }
}
