import type { Configuration, WellIndex } from '@/types'
import { ConfigurationError } from '@/utils/errors'
import { wellRange } from '@/utils/wells'
import { declareGroup, finalizeConfiguration } from './finalize'

export const DEFAULT_REPLICATES = 4

export interface TemplateOptions {
  /** Wells per sample when wells are assigned automatically. */
  replicates?: number
  /** Explicit well list per sample slot, in group-major then sample-major order. */
  wells?: readonly (readonly WellIndex[])[]
}

export type TemplateDeclaration =
  | { kind: 'uniform'; groups: readonly string[]; samples: readonly string[] }
  | { kind: 'per-group'; groups: readonly string[]; samples: readonly (readonly string[])[] }

function slotWells(slotCount: number, options: TemplateOptions): readonly (readonly WellIndex[])[] {
  if (options.wells) {
    if (options.wells.length !== slotCount) {
      throw new ConfigurationError(
        `the length of the provided list of wells does not match the number of needed well groups. ` +
          `len(wells): ${options.wells.length}, should be ${slotCount}`
      )
    }
    return options.wells
  }
  const replicates = options.replicates ?? DEFAULT_REPLICATES
  if (!Number.isInteger(replicates) || replicates < 1) {
    throw new ConfigurationError(`replicates must be a positive integer, got ${replicates}`)
  }
  return Array.from({ length: slotCount }, (_, slot) =>
    wellRange(slot * replicates + 1, (slot + 1) * replicates)
  )
}

function isStringList(value: unknown): boolean {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function assemble(
  groups: readonly string[],
  samplesList: readonly (readonly string[])[],
  options: TemplateOptions
): Configuration {
  if (!groups.length) throw new ConfigurationError('no groups declared')
  if (groups.length !== samplesList.length) {
    throw new ConfigurationError(
      `groups and samples lists should be equal in length. Groups: ${groups.length}, samples: ${samplesList.length}`
    )
  }
  // Untyped callers can hand over any shape.
  if (!isStringList(groups)) {
    throw new ConfigurationError(`unable to understand the groups list: ${JSON.stringify(groups)}`)
  }
  samplesList.forEach((samples, i) => {
    if (!isStringList(samples)) {
      throw new ConfigurationError(`unable to understand the samples list: ${JSON.stringify(samples)}`)
    }
    if (!samples.length) throw new ConfigurationError(`no samples declared for group ${groups[i]}`)
  })

  const slotCount = samplesList.reduce((acc, samples) => acc + samples.length, 0)
  const wells = slotWells(slotCount, options)

  let slot = 0
  const declarations = groups.map((group, g) =>
    declareGroup(
      group,
      samplesList[g].map((sample) => ({ name: sample, wells: wells[slot++] }))
    )
  )
  return finalizeConfiguration(declarations)
}

/** Every group gets the same sample list. */
export function buildUniformConfiguration(
  groups: readonly string[],
  samples: readonly string[],
  options: TemplateOptions = {}
): Configuration {
  return assemble(groups, groups.map(() => samples), options)
}

/** `samples[i]` is the sample list of `groups[i]`. */
export function buildPerGroupConfiguration(
  groups: readonly string[],
  samples: readonly (readonly string[])[],
  options: TemplateOptions = {}
): Configuration {
  return assemble(groups, samples, options)
}

export function buildFromTemplate(declaration: TemplateDeclaration, options: TemplateOptions = {}): Configuration {
  switch (declaration.kind) {
    case 'uniform':
      return buildUniformConfiguration(declaration.groups, declaration.samples, options)
    case 'per-group':
      return buildPerGroupConfiguration(declaration.groups, declaration.samples, options)
    default: {
      const unknown: never = declaration
      throw new ConfigurationError(`unable to understand the samples list: ${JSON.stringify(unknown)}`)
    }
  }
}
