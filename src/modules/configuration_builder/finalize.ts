import type { Configuration, GroupDeclaration, GroupDefinition, SampleDefinition, WellIndex } from '@/types'
import { ConfigurationError } from '@/utils/errors'
import { sanitize } from '@/utils/sanitize'
import { isWellIndex } from '@/utils/wells'

export const BLANK_SAMPLE = 'blank'

function cleanName(raw: string, what: string): string {
  const name = sanitize(raw)
  if (!name) throw new ConfigurationError(`${what} name "${raw}" is empty after removing disallowed characters`)
  return name
}

function cleanWells(wells: readonly WellIndex[], owner: string): WellIndex[] {
  if (!wells.length) throw new ConfigurationError(`no wells given for ${owner}`)
  const out: WellIndex[] = []
  for (const well of wells) {
    if (!isWellIndex(well)) {
      throw new ConfigurationError(`well "${String(well)}" of ${owner} is not a positive integer`)
    }
    if (!out.includes(well)) out.push(well)
  }
  return out
}

/**
 * Sanitizes and validates group declarations into a frozen Configuration.
 * Every builder entry point ends here; nothing partial is ever returned.
 */
export function finalizeConfiguration(declarations: readonly GroupDeclaration[]): Configuration {
  if (!declarations.length) throw new ConfigurationError('no groups declared')

  const groups: GroupDefinition[] = []
  const seenGroups = new Set<string>()
  for (const decl of declarations) {
    const name = cleanName(decl.name, 'group')
    if (seenGroups.has(name)) {
      const all = declarations.map((d) => sanitize(d.name))
      throw new ConfigurationError(`group name ${name} present more than once in group names: ${all.join(', ')}`)
    }
    seenGroups.add(name)

    if (!decl.samples.length && !decl.blankWells) {
      throw new ConfigurationError(`group ${name} declares no samples`)
    }

    const samples: SampleDefinition[] = []
    const seenSamples = new Set<string>()
    for (const sample of decl.samples) {
      const sampleName = cleanName(sample.name, `sample (group ${name})`)
      if (seenSamples.has(sampleName)) {
        throw new ConfigurationError(`sample ${sampleName} declared more than once in group ${name}`)
      }
      seenSamples.add(sampleName)
      const wells = cleanWells(sample.wells, `sample ${name}__${sampleName}`)
      samples.push(Object.freeze({ name: sampleName, wells: Object.freeze(wells) }))
    }

    const group: GroupDefinition = decl.blankWells
      ? { name, blankWells: Object.freeze(cleanWells(decl.blankWells, `the blank of group ${name}`)), samples: Object.freeze(samples) }
      : { name, samples: Object.freeze(samples) }
    groups.push(Object.freeze(group))
  }
  return Object.freeze(groups)
}

/**
 * Collects a group's (name, wells) pairs, routing the reserved `blank`
 * name into the blank field. Used by template and layout-file builders.
 */
export function declareGroup(
  name: string,
  entries: readonly { name: string; wells: readonly WellIndex[] }[]
): GroupDeclaration {
  const samples: { name: string; wells: readonly WellIndex[] }[] = []
  let blankWells: readonly WellIndex[] | undefined
  for (const entry of entries) {
    if (sanitize(entry.name) === BLANK_SAMPLE) {
      if (blankWells) throw new ConfigurationError(`blank declared more than once in group ${sanitize(name)}`)
      blankWells = entry.wells
      continue
    }
    samples.push(entry)
  }
  return blankWells ? { name, blankWells, samples } : { name, samples }
}

export function buildConfiguration(groups: readonly GroupDeclaration[]): Configuration {
  return finalizeConfiguration(groups)
}
